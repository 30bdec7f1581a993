import { z } from 'zod/v4';
import { CONTEXT_TYPES } from './context.js';
import {
	InjectionError,
	MalformedProviderDeclaration,
	NonCallableProviderError,
	RegistrySealedError,
} from './errors.js';
import { CrawlResponse } from './http.js';
import {
	planProviderDependencies,
	type ProviderDepsPlan,
} from './provider-deps.js';
import {
	describeProvider,
	type InputProvider,
	isProvidedBy,
	type ProvidedTypes,
} from './provider.js';
import type { AnyTag } from './tag.js';

const DEFAULT_PRIORITY = 500;

const ProvidesSchema = z.custom<ProvidedTypes>(
	(value) => value instanceof Set || typeof value === 'function'
);
const CallableSchema = z.custom<InputProvider['provide']>(
	(value) => typeof value === 'function'
);
const PrioritySchema = z.number().finite();

type Entry = {
	readonly provider: InputProvider;
	readonly priority: number;
	readonly sequence: number;
	readonly dependencyPlan: ProviderDepsPlan;
	readonly requiresResponse: boolean;
};

export type ProviderRegistryOptions = {
	/** Singletons providers may depend on on top of the standard context types. */
	contextTypes?: Iterable<AnyTag>;
};

function describeReceived(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	return typeof value;
}

/**
 * Ordered collection of input providers.
 *
 * Providers are kept sorted by priority (lowest first), ties broken by the
 * order in which they were first registered. A provider registered again,
 * identified by its class, replaces the earlier registration in place.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry();
 * registry.register(new HttpResponseProvider(), 500);
 * registry.providersFor([HttpResponse]); // Map { HttpResponseProvider => Set { HttpResponse } }
 * ```
 */
export class ProviderRegistry {
	private readonly entries = new Map<unknown, Entry>();
	private readonly contextTypes: ReadonlySet<AnyTag>;
	private sorted: readonly Entry[] = [];
	private sequence = 0;
	private sealed = false;

	constructor(options: ProviderRegistryOptions = {}) {
		this.contextTypes = new Set([
			...CONTEXT_TYPES,
			...(options.contextTypes ?? []),
		]);
	}

	/**
	 * Adds a provider.
	 *
	 * @throws {MalformedProviderDeclaration} If `provides` is neither a set nor a function
	 * @throws {NonCallableProviderError} If the provider has no `provide` method
	 * @throws {InjectionError} If its dependencies cannot be built from the context
	 * @throws {RegistrySealedError} If the registry is already in use
	 */
	register(provider: InputProvider, priority?: number): this {
		if (this.sealed) {
			throw new RegistrySealedError(
				`Cannot register ${describeProvider(provider)}: the provider registry is sealed`
			);
		}
		if (!ProvidesSchema.safeParse(provider.provides).success) {
			throw new MalformedProviderDeclaration(
				provider.name,
				describeReceived(provider.provides)
			);
		}
		if (!CallableSchema.safeParse(provider.provide).success) {
			throw new NonCallableProviderError(provider.name);
		}
		const resolvedPriority = priority ?? provider.priority ?? DEFAULT_PRIORITY;
		if (!PrioritySchema.safeParse(resolvedPriority).success) {
			throw new InjectionError(
				`Invalid priority ${String(resolvedPriority)} for ${describeProvider(provider)}`
			);
		}

		const dependencyPlan = planProviderDependencies(
			provider.name,
			provider.dependencies,
			this.contextTypes
		);
		// Object literals share a constructor, so they are keyed by identity
		const key =
			provider.constructor === Object ? provider : provider.constructor;
		const previous = this.entries.get(key);
		this.entries.set(key, {
			provider,
			priority: resolvedPriority,
			sequence: previous?.sequence ?? this.sequence++,
			dependencyPlan,
			requiresResponse: dependencyPlan.order.includes(CrawlResponse),
		});
		this.sorted = [...this.entries.values()].sort(
			(a, b) => a.priority - b.priority || a.sequence - b.sequence
		);
		return this;
	}

	/** Registered providers in invocation order. */
	get providers(): readonly InputProvider[] {
		return this.sorted.map((entry) => entry.provider);
	}

	priorityOf(provider: InputProvider): number | undefined {
		return this.entryOf(provider)?.priority;
	}

	/**
	 * Whether any registered provider supports the type.
	 */
	isProvided(type: AnyTag): boolean {
		return this.sorted.some(({ provider }) => isProvidedBy(provider, type));
	}

	/**
	 * Assigns each type to the first provider, in priority order, that supports
	 * it. Types no provider supports are left out.
	 */
	providersFor(types: Iterable<AnyTag>): Map<InputProvider, Set<AnyTag>> {
		const pending = new Set(types);
		const result = new Map<InputProvider, Set<AnyTag>>();
		for (const { provider } of this.sorted) {
			if (pending.size === 0) break;
			for (const type of pending) {
				if (!isProvidedBy(provider, type)) continue;
				let assigned = result.get(provider);
				if (assigned === undefined) {
					assigned = new Set();
					result.set(provider, assigned);
				}
				assigned.add(type);
				pending.delete(type);
			}
		}
		return result;
	}

	/**
	 * Whether a provider needs the downloaded response, directly or through a
	 * page object it depends on.
	 */
	requiresResponse(provider: InputProvider): boolean {
		return this.entryOf(provider)?.requiresResponse ?? false;
	}

	/** @internal */
	dependencyPlanOf(provider: InputProvider): ProviderDepsPlan {
		const entry = this.entryOf(provider);
		if (entry === undefined) {
			throw new InjectionError(
				`${describeProvider(provider)} is not registered`
			);
		}
		return entry.dependencyPlan;
	}

	seal(): this {
		this.sealed = true;
		return this;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	private entryOf(provider: InputProvider): Entry | undefined {
		return this.sorted.find((entry) => entry.provider === provider);
	}
}
