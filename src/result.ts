import { AutomatonError } from './errors';

export type Result<T, E extends AutomatonError = AutomatonError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Run `fn`, turning a thrown {@link AutomatonError} into a failed result.
 * Anything else is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof AutomatonError) return { ok: false, error: e };
    throw e;
  }
}
