import type { ComponentSelection } from '@/config/constants';
import { parseComponentSelection } from '@/workflows/components';
import { handleUsageError } from '../error-formatting';

export const CLI_NAME = 'modernizer-ops';

/**
 * Parse a `[frontend|backend|all]` argument or print usage and exit
 */
export function requireSelection(command: string, arg: string | undefined): ComponentSelection {
  const selection = parseComponentSelection(arg);
  if (!selection.ok) {
    handleUsageError(`${CLI_NAME} ${command} [frontend|backend|all]`, selection.error);
  }
  return selection.value;
}
