/**
 * Settled outcome of a background task.
 * Use the discriminated union: check `result.ok` to access either `value` or `error`.
 */
export type Result<T, E = unknown> =
	| { ok: true; value: T }
	| { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/**
 * Turn a promise into one that never rejects.
 * Lets a caller start work now and inspect the outcome later without
 * tripping unhandled-rejection tracking in between.
 */
export function settle<T>(promise: Promise<T>): Promise<Result<T>> {
	return promise.then(
		(value) => ok(value),
		(error: unknown) => err(error),
	);
}
