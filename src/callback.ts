import { CrawlResponse, DummyResponse } from './http.js';
import { hasToItem, isInjectable } from './page.js';
import type { CallbackSignature } from './plan.js';
import { type AnyTag, Tag } from './tag.js';
import { type SpecType, type TypeSpec, Untyped } from './type-spec.js';

/**
 * Parameter declarations of a callback, in order. The leading parameter may
 * be `Untyped`, `CrawlResponse` or `DummyResponse` to receive the engine's
 * response.
 */
export type CallbackParams = Readonly<Record<string, TypeSpec>>;

export type ArgsOf<P extends CallbackParams> = {
	readonly [K in keyof P]: P[K] extends Untyped ? CrawlResponse : SpecType<P[K]>;
};

/**
 * A callback together with the declarations the injector plans it from.
 */
export interface InjectableCallback<A, R> {
	readonly name: string;
	readonly signature: CallbackSignature;
	/** The page object or item type a `callbackFor()` callback returns. */
	readonly returns?: AnyTag;
	invoke(args: A): R;
}

/**
 * Declares the parameters of a callback. Parameters are planned in the order
 * their keys are declared.
 *
 * @example
 * ```typescript
 * const parseBook = callback(
 *   { response: DummyResponse, page: BookPage },
 *   ({ page }) => page.toItem()
 * );
 * ```
 */
export function callback<const P extends CallbackParams, R>(
	params: P,
	fn: (args: ArgsOf<P>) => R,
	name = fn.name
): InjectableCallback<ArgsOf<P>, R> {
	return {
		name: name === '' ? '<anonymous callback>' : name,
		signature: Object.freeze(Object.entries(params)),
		invoke: fn,
	};
}

const callbacks = new WeakMap<
	AnyTag,
	InjectableCallback<Readonly<Record<string, unknown>>, unknown>
>();

/**
 * Returns a callback that asks for one page object (or item type) and returns
 * the item it extracts. The download is skipped unless a provider behind the
 * page needs the response.
 *
 * The same callback is returned for the same type.
 */
export function callbackFor(
	type: AnyTag
): InjectableCallback<Readonly<Record<string, unknown>>, unknown> {
	const existing = callbacks.get(type);
	if (existing !== undefined) {
		return existing;
	}
	const created = callback(
		{ response: DummyResponse, page: type },
		({ page }) => (isInjectable(type) && hasToItem(page) ? page.toItem() : page),
		`callbackFor(${Tag.name(type)})`
	);
	const result = { ...created, returns: type };
	callbacks.set(type, result);
	return result;
}
