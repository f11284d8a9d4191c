/**
 * Core type definitions shared by the operations toolkit.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information shown to the operator alongside a failure
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** What went wrong, in operator terms */
  hint?: string;
  /** Steps that usually fix the problem */
  resolution?: string;
  /** Raw fields from the failing SDK or command */
  details?: Record<string, unknown>;
}

/**
 * Result type used across infrastructure and workflow boundaries
 *
 * Operations never throw across a module boundary; a failed step returns
 * `{ ok: false }` and the caller decides whether to stop.
 *
 * @example
 * ```typescript
 * const account = await identity.getAccountId();
 * if (!account.ok) {
 *   return account;
 * }
 * console.log(account.value);
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Message surfaced to the operator
 * @param guidance - Optional structured guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};

