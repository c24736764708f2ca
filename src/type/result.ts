export type Result<T> = {
  data: T | null;
  err: Error | null;

  unwrap: () => T;
  unwrapOr: (defaultValue: T) => T;

  isOk: () => boolean;
  isErr: () => boolean;
};

/**
 * Wrap either a value or an error
 *
 * An Error argument always produces a failed result, so results whose
 * value type is itself an Error are not supported.
 */
export function Result<T>(data: T): Result<T>;
export function Result<T>(err: Error): Result<T>;
export function Result<T>(value: T | Error): Result<T> {
  if (value instanceof Error) {
    return failure<T>(value);
  }
  return success<T>(value);
}

const success = <T>(data: T): Result<T> => ({
  data,
  err: null,
  unwrap: () => data,
  unwrapOr: () => data,
  isOk: () => true,
  isErr: () => false,
});

const failure = <T>(err: Error): Result<T> => ({
  data: null,
  err,
  unwrap: () => {
    throw err;
  },
  unwrapOr: (defaultValue: T) => defaultValue,
  isOk: () => false,
  isErr: () => true,
});
