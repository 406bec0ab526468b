/********* RESULT MONAD *********/
export type Result<T, E = string> =
  | {
      success: true;
      data: T;
    }
  | {
      success: false;
      error: E;
    };

export function success<T, E = string>(data: T): Result<T, E> {
  return { success: true, data };
}

export function failure<T, E = string>(error: E): Result<T, E> {
  return { success: false, error };
}
