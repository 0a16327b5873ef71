export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

export type Option<T> = Result<T, undefined>;

export const some = <T>(data: T): Option<T> => ok(data);

const NONE = Object.freeze(err(undefined));

export const none = <T>(): Option<T> => NONE;

/**
 * Wraps a possibly-undefined value: `undefined` becomes None, anything else Some.
 */
export const fromNullable = <T>(value: T | undefined): Option<T> =>
  value === undefined ? none() : some(value);

/**
 * Unwraps a Result, throwing its error wrapped in an Error otherwise.
 * Meant for call sites where failure is a programming mistake.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
  if (result.success) return result.data;
  throw new Error(`Unwrapped a failed result: ${JSON.stringify(result.error)}`);
};
