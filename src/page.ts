import { Retry } from './result.js';
import type { AnyTag, TagType } from './tag.js';
import { type SpecType, type TypeSpec, Untyped } from './type-spec.js';
import type { PromiseOrValue } from './types.js';

/**
 * Marker carried by every self-buildable type.
 *
 * Note: A string key is used so that declaration files of classes extending
 * `Page()` do not reference a private symbol.
 *
 * @internal
 */
export const InjectableKey = '__pagewright/Injectable__';

/**
 * Declared inputs of a page object or provider, keyed by the name under which
 * the resolved instance is handed over.
 */
export type Dependencies = Readonly<Record<string, Exclude<TypeSpec, Untyped>>>;

export type InputsOf<D extends Dependencies> = {
	readonly [K in keyof D]: SpecType<D[K]>;
};

/**
 * A self-buildable class: constructed by the injector from the instances of
 * its `dependencies`.
 */
export interface AnyPageClass<T = unknown> {
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	new (inputs: any): T;
	readonly [InjectableKey]: true;
	readonly dependencies: Dependencies;
	readonly returns?: AnyTag;
}

/**
 * Creates a base class for page objects.
 *
 * Classes that extend the returned base are self-buildable: whenever they are
 * requested, the injector resolves every declared dependency and calls the
 * constructor with them.
 *
 * @example
 * ```typescript
 * class ProductLinks extends Page({ response: HttpResponse }) {
 *   links() {
 *     return this.inputs.response.text.match(/href="([^"]+)"/g) ?? [];
 *   }
 * }
 * ```
 */
export function Page<const D extends Dependencies>(dependencies: D) {
	class PageObject {
		static readonly [InjectableKey] = true as const;
		static readonly dependencies: D = dependencies;

		readonly inputs: InputsOf<D>;

		constructor(inputs: InputsOf<D>) {
			this.inputs = inputs;
		}
	}
	return PageObject;
}

/**
 * Creates a base class for page objects that extract an item.
 *
 * `returns` is the item type the page produces; override rules use it as the
 * default `toReturn`, so that callbacks can ask for the item type directly.
 *
 * @example
 * ```typescript
 * const Book = Tag.of('Book')<{ title: string }>();
 *
 * class BookPage extends ItemPage({ response: HttpResponse }, Book) {
 *   toItem() {
 *     return { title: this.inputs.response.text };
 *   }
 * }
 * ```
 */
export function ItemPage<const D extends Dependencies, TReturns extends AnyTag>(
	dependencies: D,
	returns: TReturns
) {
	abstract class ItemPageObject extends Page(dependencies) {
		static readonly returns: AnyTag = returns;

		/**
		 * Extracts the item, or returns `retry(reason)` to have the request
		 * scheduled again.
		 */
		abstract toItem(): PromiseOrValue<TagType<TReturns> | Retry>;
	}
	return ItemPageObject;
}

const injectableCache = new WeakMap<object, boolean>();

/**
 * Capability predicate: whether a type can be built from its declared
 * dependencies without a provider.
 *
 * The check looks for the injectable marker rather than a base class, and is
 * computed once per type.
 */
export function isInjectable(type: unknown): type is AnyPageClass {
	if (typeof type !== 'function') {
		return false;
	}
	let cached = injectableCache.get(type);
	if (cached === undefined) {
		cached = InjectableKey in type && type[InjectableKey] === true;
		injectableCache.set(type, cached);
	}
	return cached;
}

/**
 * Returns the item type a page declares, if any.
 */
export function pageReturns(page: AnyPageClass): AnyTag | undefined {
	return page.returns;
}

/**
 * Whether a value is an item page instance.
 * @internal
 */
export function hasToItem(
	value: unknown
): value is { toItem(): PromiseOrValue<unknown> } {
	return (
		typeof value === 'object' &&
		value !== null &&
		'toItem' in value &&
		typeof value.toItem === 'function'
	);
}
