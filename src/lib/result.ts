import { errorMessage } from './errors';

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: unknown; diagnostic: string };
export type Result<T> = Success<T> | Failure;

export const success = <T>(value: T): Success<T> => ({ ok: true, value });

export const failure = (error: unknown, diagnostic = errorMessage(error)): Failure => ({
  ok: false,
  error,
  diagnostic,
});

/**
 * Await a promise and fold its outcome into a Result. Never rejects.
 */
export async function settle<T>(promise: Promise<T>): Promise<Result<T>> {
  try {
    return success(await promise);
  } catch (err) {
    return failure(err);
  }
}
