import { MalformedProviderDeclaration } from './errors.js';
import { CrawlRequest } from './http.js';
import type { Dependencies, InputsOf } from './page.js';
import { type AnyTag, Tag, type TagType } from './tag.js';
import type { PromiseOrValue } from './types.js';

/**
 * The types a provider can produce: either an explicit set, or a predicate
 * that answers for any type.
 */
export type ProvidedTypes = ReadonlySet<AnyTag> | ((type: AnyTag) => boolean);

/**
 * One instance returned by a provider, tagged with the type it satisfies.
 */
export interface Provided<T extends AnyTag = AnyTag> {
	readonly tag: T;
	readonly value: TagType<T>;
}

export function provide<T extends AnyTag>(
	tag: T,
	value: TagType<T>
): Provided<T> {
	return { tag, value };
}

export type ProvideOptions = {
	readonly request: CrawlRequest;
	readonly signal?: AbortSignal;
};

/**
 * Contract every registered provider satisfies.
 *
 * `provide` is called at most once per resolution with the subset of its
 * types that are still needed, and must only return instances of that subset.
 */
export interface InputProvider {
	/** Unique across providers; prefixes cache fingerprints. */
	readonly name: string;
	readonly provides: ProvidedTypes;
	/** Own inputs, built from the resolution context. */
	readonly dependencies: Dependencies;
	readonly priority?: number;
	/** Set to `false` for providers whose results must not be persisted. */
	readonly cacheable?: boolean;

	provide(
		toProvide: ReadonlySet<AnyTag>,
		deps: Record<string, unknown>,
		options: ProvideOptions
	): PromiseOrValue<readonly Provided[]>;

	fingerprint?(toProvide: ReadonlySet<AnyTag>, request: CrawlRequest): string;
}

/**
 * Whether a provider's declaration covers the given type.
 *
 * @throws {MalformedProviderDeclaration} If `provides` is neither a set nor a function
 */
export function isProvidedBy(
	provider: Pick<InputProvider, 'name' | 'provides'>,
	type: AnyTag
): boolean {
	const { provides } = provider;
	if (provides instanceof Set) {
		return provides.has(type);
	}
	if (typeof provides === 'function') {
		return provides(type);
	}
	throw new MalformedProviderDeclaration(provider.name, typeof provides);
}

/**
 * Creates a base class for input providers.
 *
 * The returned class types the `deps` argument of `provide()` after the
 * declared dependencies, which may be context types (`CrawlRequest`,
 * `CrawlResponse`, `DummyResponse`, `Settings`, `StatsCollector` and any extra
 * singletons) or page objects built from them.
 *
 * @example
 * ```typescript
 * const BodyHtml = Tag.of('BodyHtml')<string>();
 *
 * class BodyHtmlProvider extends PageInputProvider({ response: CrawlResponse }) {
 *   readonly name = 'body_html';
 *   readonly provides = new Set<AnyTag>([BodyHtml]);
 *
 *   provide(_toProvide: ReadonlySet<AnyTag>, { response }: { response: CrawlResponse }) {
 *     return [provide(BodyHtml, response.body)];
 *   }
 * }
 * ```
 */
export function PageInputProvider<const D extends Dependencies>(dependencies: D) {
	abstract class Provider {
		abstract readonly name: string;
		abstract readonly provides: ProvidedTypes;
		readonly dependencies: D = dependencies;

		abstract provide(
			toProvide: ReadonlySet<AnyTag>,
			deps: InputsOf<D>,
			options: ProvideOptions
		): PromiseOrValue<readonly Provided[]>;

		isProvided(type: AnyTag): boolean {
			return isProvidedBy(this, type);
		}

		toString(): string {
			return this.name;
		}
	}
	return Provider;
}

export function describeProvider(provider: InputProvider): string {
	return `${provider.constructor.name}(${provider.name})`;
}

export function describeTypes(types: Iterable<AnyTag>): string[] {
	return Array.from(types, (type) => Tag.name(type)).sort();
}
