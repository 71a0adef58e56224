import { ToolboxError, errorMessage } from '../utils/errors.js';
import type { ErrorCode } from '../utils/errors.js';
import type { ToolSuccess, ToolFailure } from './types.js';

export function succeed<P extends object>(payload: P): ToolSuccess<P> {
  return { ...payload, success: true };
}

export function fail<P extends object>(payload: P, error: string, code: ErrorCode): ToolFailure<P> {
  return { ...payload, success: false, error, code };
}

/** Code carried by a ToolboxError, otherwise the caller's fallback. */
export function codeOf(err: unknown, fallback: ErrorCode): ErrorCode {
  return ToolboxError.isToolboxError(err) ? err.code : fallback;
}

/**
 * Runs `effect` and turns any rejection into a failure envelope built from
 * `payload(message)`.
 */
export async function capture<S extends object, F extends object>(
  effect: () => Promise<S>,
  payload: (message: string) => F,
  fallbackCode: ErrorCode
): Promise<ToolSuccess<S> | ToolFailure<F>> {
  try {
    return succeed(await effect());
  } catch (err: unknown) {
    const message = errorMessage(err);
    return fail(payload(message), message, codeOf(err, fallbackCode));
  }
}
