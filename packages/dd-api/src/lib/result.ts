/**
 * Settled outcome of an async operation.
 * Using a discriminated union so a pending request can be held without an
 * unobserved rejection: check `result.ok` to access either `value` or `error`.
 */
export type Result<T, E = unknown> =
	| { ok: true; value: T }
	| { ok: false; error: E };

/**
 * Constructs a successful result.
 */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/**
 * Constructs a failed result.
 */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/**
 * Waits for a promise and captures its outcome instead of rejecting.
 */
export function settle<T>(promise: Promise<T>): Promise<Result<T>> {
	return promise.then(
		(value) => ok(value),
		(error: unknown) => err(error),
	);
}

