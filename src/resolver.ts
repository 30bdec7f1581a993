import { createHash } from 'node:crypto';
import type { CacheEntry, CacheStore } from './cache.js';
import {
	contextInstances,
	describeContext,
	type ResolutionContext,
} from './context.js';
import {
	InjectionError,
	ReplayedProviderError,
	ResolutionAbortedError,
	UndeclaredProvidedTypeError,
} from './errors.js';
import { CrawlRequest } from './http.js';
import defaultLogger, { type Logger } from './logger.js';
import { type Plan, providedTypes } from './plan.js';
import { buildProviderDependencies } from './provider-deps.js';
import { ProviderRegistry } from './provider-registry.js';
import {
	describeProvider,
	describeTypes,
	type InputProvider,
	type Provided,
} from './provider.js';
import { isRetry, ok, type Ok, Retry } from './result.js';
import { InstanceScope } from './scope.js';
import { SerializationRegistry } from './serialization.js';
import { type AnyTag, Tag } from './tag.js';

/**
 * Instances for every callback parameter, keyed by parameter name, or the
 * retry requested by a page object on the way.
 */
export type Resolution = Ok<Record<string, unknown>> | Retry;

export type ResolverOptions = {
	providers: ProviderRegistry;
	cache?: CacheStore;
	/** Persist provider errors and re-throw them on later hits. */
	cacheErrors?: boolean;
	serialization?: SerializationRegistry;
	logger?: Logger;
};

export type ResolveOptions = {
	signal?: AbortSignal;
	scope?: InstanceScope;
};

/**
 * Default cache fingerprint: the provider name and a digest of the request
 * and of the types asked for.
 */
export function defaultFingerprint(
	provider: InputProvider,
	toProvide: ReadonlySet<AnyTag>,
	request: CrawlRequest
): string {
	const digest = createHash('sha1')
		.update(
			JSON.stringify([
				request.method,
				request.url,
				request.body,
				describeTypes(toProvide),
			])
		)
		.digest('hex');
	return `${provider.name}_${digest}`;
}

/**
 * Names under which the requested types and their plain descriptors are
 * written to the cache.
 *
 * @throws {InjectionError} If two of the types share a name
 */
function cacheKeys(
	provider: InputProvider,
	toProvide: ReadonlySet<AnyTag>
): Map<string, AnyTag> {
	const byName = new Map<string, AnyTag>();
	for (const type of toProvide) {
		for (const key of [type, Tag.base(type)]) {
			const name = Tag.name(key);
			const existing = byName.get(name);
			if (existing !== undefined && existing !== key) {
				throw new InjectionError(
					`Cannot cache ${describeProvider(provider)}: several requested types are named ${name}`,
					{ detail: { provider: provider.name, type: name } }
				);
			}
			byName.set(name, key);
		}
	}
	return byName;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
	if (signal?.aborted === true) {
		throw new ResolutionAbortedError(signal.reason);
	}
}

/**
 * Turns dependency plans into instances.
 *
 * Providers run one at a time in priority order, each at most once per
 * resolution and only for the types still missing. Page objects and builders
 * then run in plan order.
 */
export class Resolver {
	private readonly providers: ProviderRegistry;
	private readonly cache: CacheStore | undefined;
	private readonly cacheErrors: boolean;
	private readonly serialization: SerializationRegistry;
	private readonly logger: Logger;

	constructor(options: ResolverOptions) {
		this.providers = options.providers;
		this.cache = options.cache;
		this.cacheErrors = options.cacheErrors ?? false;
		this.serialization =
			options.serialization ?? SerializationRegistry.withDefaults();
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * @throws {InjectionError} If the plan has required parameters that cannot be built
	 * @throws {UndeclaredProvidedTypeError} If a provider returns types it was not asked for
	 * @throws {ResolutionAbortedError} If the signal is aborted
	 */
	async resolve(
		plan: Plan,
		context: ResolutionContext,
		options: ResolveOptions = {}
	): Promise<Resolution> {
		if (plan.missing.size > 0) {
			const reasons = [...plan.missing].map(
				([name, reason]) => `${name} (${reason})`
			);
			throw new InjectionError(
				`Cannot build the arguments for ${plan.url}: ${reasons.join(', ')}`,
				{ detail: { url: plan.url, missing: Object.fromEntries(plan.missing) } }
			);
		}

		const { signal, scope } = options;
		const instances = new Map<AnyTag, unknown>();
		for (const type of providedTypes(plan)) {
			if (scope?.has(type) === true) {
				instances.set(type, scope.get(type));
			}
		}
		await this.runProviders(plan, context, instances, options);

		for (const step of plan.steps) {
			if (step.kind === 'provided') {
				continue;
			}
			const inputs: Record<string, unknown> = {};
			for (const [name, key] of step.inputs) {
				inputs[name] = key === null ? null : instances.get(key);
			}
			if (step.kind === 'page') {
				instances.set(step.type, new step.type(inputs));
			} else {
				throwIfAborted(signal);
				const value = await step.build(inputs);
				if (isRetry(value)) {
					this.logger.debug(
						{ type: Tag.name(step.type), reason: value.reason },
						`Retry requested while building ${Tag.name(step.type)} for ${plan.url}`
					);
					return value;
				}
				instances.set(step.type, value);
			}
			context.stats.inc(`pagewright/injector/${Tag.name(step.type)}`);
		}

		const kwargs: Record<string, unknown> = {};
		for (const [name, key] of plan.params) {
			kwargs[name] = key === null ? null : instances.get(key);
		}
		return ok(kwargs);
	}

	private async runProviders(
		plan: Plan,
		context: ResolutionContext,
		instances: Map<AnyTag, unknown>,
		{ signal, scope }: ResolveOptions
	): Promise<void> {
		const pending = providedTypes(plan).filter((type) => !instances.has(type));
		if (pending.length === 0) {
			return;
		}
		const available = contextInstances(context);
		for (const [provider, assigned] of this.providers.providersFor(pending)) {
			const toProvide = new Set(
				[...assigned].filter((type) => !instances.has(type))
			);
			if (toProvide.size === 0) {
				continue;
			}
			throwIfAborted(signal);
			const results = await this.callProvider(
				provider,
				toProvide,
				available,
				context,
				signal
			);
			for (const [type, value] of results) {
				instances.set(type, value);
				scope?.set(type, value);
			}
		}
	}

	private async callProvider(
		provider: InputProvider,
		toProvide: ReadonlySet<AnyTag>,
		available: ReadonlyMap<AnyTag, unknown>,
		context: ResolutionContext,
		signal: AbortSignal | undefined
	): Promise<Map<AnyTag, unknown>> {
		const { request, stats } = context;
		const cache = provider.cacheable === false ? undefined : this.cache;
		let fingerprint = '';
		if (cache !== undefined) {
			cacheKeys(provider, toProvide);
			fingerprint =
				provider.fingerprint?.(toProvide, request) ??
				defaultFingerprint(provider, toProvide, request);
			const entry = await cache.get(fingerprint);
			if (entry !== undefined) {
				stats.inc('pagewright/cache/hit');
				return this.collect(
					provider,
					toProvide,
					this.replay(provider, toProvide, entry, fingerprint)
				);
			}
			stats.inc('pagewright/cache/miss');
		}

		const deps = buildProviderDependencies(
			this.providers.dependencyPlanOf(provider),
			available
		);
		this.logger.debug(
			{ provider: provider.name, types: describeTypes(toProvide) },
			`Calling ${describeProvider(provider)} for ${describeContext(context)}`
		);
		let results: readonly Provided[];
		try {
			results = await provider.provide(toProvide, deps, { request, signal });
		} catch (err) {
			if (cache !== undefined && this.cacheErrors && signal?.aborted !== true) {
				const error = err instanceof Error ? err : new Error(String(err));
				await cache.put(fingerprint, {
					kind: 'error',
					type: error.constructor.name,
					name: error.name,
					message: error.message,
					data: this.serialization.serializeError(error),
				});
				stats.inc('pagewright/cache/firsthand');
			}
			throw err;
		}
		throwIfAborted(signal);
		const collected = this.collect(provider, toProvide, results);

		if (cache !== undefined) {
			const entry: CacheEntry = {
				kind: 'values',
				items: results.map(({ tag, value }) => ({
					type: Tag.name(tag),
					data: this.serialization.serialize(tag, value),
				})),
			};
			await cache.put(fingerprint, entry);
			stats.inc('pagewright/cache/firsthand');
		}
		return collected;
	}

	private replay(
		provider: InputProvider,
		toProvide: ReadonlySet<AnyTag>,
		entry: CacheEntry,
		fingerprint: string
	): Provided[] {
		if (entry.kind === 'error') {
			throw (
				this.serialization.deserializeError(entry.type, entry.message, entry.data) ??
				new ReplayedProviderError(entry.type, entry.name, entry.message, fingerprint)
			);
		}
		const byName = cacheKeys(provider, toProvide);
		return entry.items.map(({ type: name, data }) => {
			const tag = byName.get(name);
			if (tag === undefined) {
				throw new UndeclaredProvidedTypeError(
					describeProvider(provider),
					[name],
					describeTypes(toProvide)
				);
			}
			return { tag, value: this.serialization.deserialize(tag, data) };
		});
	}

	/**
	 * Matches provider results to the requested types. An instance of a plain
	 * type also serves every requested annotation of that type the provider did
	 * not return on its own.
	 */
	private collect(
		provider: InputProvider,
		toProvide: ReadonlySet<AnyTag>,
		results: readonly Provided[]
	): Map<AnyTag, unknown> {
		const collected = new Map<AnyTag, unknown>();
		const extra: string[] = [];
		for (const { tag, value } of results) {
			if (toProvide.has(tag)) {
				collected.set(tag, value);
			} else if (this.annotationsOf(tag, toProvide).length === 0) {
				extra.push(Tag.name(tag));
			}
		}
		for (const { tag, value } of results) {
			for (const target of this.annotationsOf(tag, toProvide)) {
				if (!collected.has(target)) {
					collected.set(target, value);
				}
			}
		}
		if (extra.length > 0) {
			throw new UndeclaredProvidedTypeError(
				describeProvider(provider),
				extra.sort(),
				describeTypes(toProvide)
			);
		}
		const absent = [...toProvide].filter((type) => !collected.has(type));
		if (absent.length > 0) {
			throw new InjectionError(
				`${describeProvider(provider)} did not return instances of [${describeTypes(absent).join(', ')}]`,
				{ detail: { provider: provider.name, absent: describeTypes(absent) } }
			);
		}
		return collected;
	}

	private annotationsOf(tag: AnyTag, toProvide: ReadonlySet<AnyTag>): AnyTag[] {
		return [...toProvide].filter(
			(type) => Tag.isAnnotated(type) && Tag.base(type) === tag
		);
	}
}
