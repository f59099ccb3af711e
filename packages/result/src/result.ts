/**
 * Two-variant outcome type used across package boundaries instead of
 * exceptions. Shaped like the `{ success: true } | { success: false }`
 * results returned by the lock helpers, with a payload on each side.
 */

export interface Ok<T> {
  readonly success: true;
  readonly value: T;
}

export interface Err<E = string> {
  readonly success: false;
  readonly error: E;
  /**
   * HTTP status code when the failure came from a remote response.
   */
  readonly statusCode?: number;
}

export type Result<T, E = string> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ success: true, value });

export const err = <E = string>(error: E, statusCode?: number): Err<E> =>
  statusCode === undefined
    ? { success: false, error }
    : { success: false, error, statusCode };

const describeThrown = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Transforms the success value. A throwing callback becomes a failure.
 */
export const map = <T, U>(
  result: Result<T, string>,
  fn: (value: T) => U
): Result<U, string> => {
  if (!result.success) {
    return result;
  }
  try {
    return ok(fn(result.value));
  } catch (error) {
    return err(`map() callback threw: ${describeThrown(error)}`);
  }
};

export const mapErr = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => {
  if (result.success) {
    return result;
  }
  return err(fn(result.error), result.statusCode);
};

export const unwrapOr = <T, E>(result: Result<T, E>, fallback: T): T =>
  result.success ? result.value : fallback;

export const match = <T, E, R>(
  result: Result<T, E>,
  handlers: { ok: (value: T) => R; err: (error: E) => R }
): R => (result.success ? handlers.ok(result.value) : handlers.err(result.error));

/**
 * Settles a promise into a Result. Rejections are converted with `toError`.
 */
export const fromPromise = async <T>(
  promise: Promise<T>,
  toError: (error: unknown) => string = describeThrown
): Promise<Result<T, string>> => {
  try {
    return ok(await promise);
  } catch (error) {
    return err(toError(error));
  }
};
