import { Failure, Success, type Result } from '@/types';
import {
  COMPONENTS,
  componentSelectionSchema,
  type Component,
  type ComponentSelection,
} from '@/config/constants';
import { ERROR_MESSAGES } from '@/lib/errors';

/**
 * Parse a component argument; no argument means both services
 */
export function parseComponentSelection(arg: string | undefined): Result<ComponentSelection> {
  if (arg === undefined) {
    return Success('all');
  }

  const parsed = componentSelectionSchema.safeParse(arg);
  if (!parsed.success) {
    return Failure(ERROR_MESSAGES.UNKNOWN_COMPONENT(arg, componentSelectionSchema.options));
  }
  return Success(parsed.data);
}

/**
 * Components in the order they are processed: frontend before backend
 */
export function componentsFor(selection: ComponentSelection): Component[] {
  return selection === 'all' ? [...COMPONENTS] : [selection];
}
