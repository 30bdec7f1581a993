/**
 * Outcome of an extraction step.
 *
 * A page object asks for its request to be scheduled again by returning
 * `retry(reason)` from `toItem()` rather than throwing; genuine faults are
 * reported as `Fail`. The crawl engine pattern-matches on `kind`.
 *
 * @example
 * ```typescript
 * const outcome = await injector.run(parseBook, request, response);
 * switch (outcome.kind) {
 *   case 'ok': return emit(outcome.value);
 *   case 'retry': return reschedule(request, outcome.reason);
 *   case 'fail': return drop(request, outcome.error);
 * }
 * ```
 */
export type Ok<T> = { readonly kind: 'ok'; readonly value: T };
export type Fail = { readonly kind: 'fail'; readonly error: unknown };
export type Outcome<T> = Ok<T> | Retry | Fail;

export class Retry {
	readonly kind = 'retry' as const;
	readonly reason: string;

	constructor(reason: string) {
		this.reason = reason;
	}
}

export function ok<T>(value: T): Ok<T> {
	return { kind: 'ok', value };
}

export function retry(reason = 'page_object_retry'): Retry {
	return new Retry(reason);
}

export function fail(error: unknown): Fail {
	return { kind: 'fail', error };
}

export function isRetry(value: unknown): value is Retry {
	return value instanceof Retry;
}
