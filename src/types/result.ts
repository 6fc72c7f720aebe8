/**
 * Result type for operations that fail with a typed error instead of throwing.
 */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly data: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(data: T): { readonly ok: true; readonly data: T } {
	return { ok: true, data };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
	return { ok: false, error };
}

/** Return the data or throw the error. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.data;
	throw result.error;
}

/** Return the error; throws if the result succeeded. */
export function unwrapErr<T, E>(result: Result<T, E>): E {
	if (!result.ok) return result.error;
	throw new Error("called unwrapErr() on a successful result");
}
