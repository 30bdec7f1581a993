import { z } from 'zod/v4';
import { type CacheStore, SqliteCacheStore } from './cache.js';
import type { InjectableCallback } from './callback.js';
import { loadSettings } from './config.js';
import {
	MemoryStats,
	type ResolutionContext,
	Settings,
	type StatsSink,
} from './context.js';
import { InjectorClosedError } from './errors.js';
import { CrawlRequest, CrawlResponse } from './http.js';
import defaultLogger, { type Logger } from './logger.js';
import type { Plan, PlanTarget } from './plan.js';
import { Planner } from './planner.js';
import { ProviderRegistry } from './provider-registry.js';
import type { InputProvider } from './provider.js';
import { DEFAULT_PROVIDERS } from './providers.js';
import { ResponseOracle } from './response-oracle.js';
import { type Resolution, type ResolveOptions, Resolver } from './resolver.js';
import { fail, isRetry, ok, type Outcome } from './result.js';
import { RulesRegistry } from './rules.js';
import { SerializationRegistry } from './serialization.js';
import { type AnyTag, Tag } from './tag.js';

/**
 * Callbacks of any parameter list can be run by the injector.
 */
export type AnyCallback<R = unknown> = InjectableCallback<
	Readonly<Record<string, unknown>>,
	R
>;

export type InjectorOptions = {
	providers?: ProviderRegistry;
	rules?: RulesRegistry;
	cache?: CacheStore;
	cacheErrors?: boolean;
	serialization?: SerializationRegistry;
	settings?: Settings;
	stats?: StatsSink;
	logger?: Logger;
	/** Singletons providers may depend on, keyed by the type they declare. */
	extra?: ReadonlyMap<AnyTag, unknown>;
};

export type FromSettingsOptions = Omit<
	InjectorOptions,
	'providers' | 'cache' | 'cacheErrors' | 'settings'
> & {
	/** Providers registered on top of the defaults. */
	providers?: Iterable<InputProvider>;
};

export type RunOptions = ResolveOptions & {
	/** Types to inject as `DynamicDeps`; defaults to the request's `meta.inject`. */
	inject?: readonly AnyTag[];
};

const InjectMetaSchema = z.array(z.custom<AnyTag>((value) => Tag.isTag(value)));

/**
 * Entry point tying planning, resolution and the response check together for
 * a crawl engine.
 *
 * Registries are sealed when the injector is created; afterwards they can be
 * shared by concurrent resolutions.
 *
 * @example
 * ```typescript
 * const injector = Injector.fromSettings(new Settings({ cache: true }), { rules });
 * const parse = callback({ response: DummyResponse, page: BookPage }, ({ page }) => page.toItem());
 *
 * if (!injector.isResponseRequired(parse, request)) {
 *   response = new DummyResponse(request.url, request);
 * }
 * const outcome = await injector.run(parse, request, response);
 * ```
 */
export class Injector {
	readonly providers: ProviderRegistry;
	readonly rules: RulesRegistry;
	readonly settings: Settings;
	readonly stats: StatsSink;
	readonly logger: Logger;
	private readonly planner: Planner;
	private readonly oracle: ResponseOracle;
	private readonly resolver: Resolver;
	private readonly cache: CacheStore | undefined;
	private readonly extra: ReadonlyMap<AnyTag, unknown>;
	private closed = false;

	constructor(options: InjectorOptions = {}) {
		this.extra = options.extra ?? new Map();
		this.providers = (
			options.providers ??
			new ProviderRegistry({ contextTypes: this.extra.keys() })
		).seal();
		this.rules = (options.rules ?? new RulesRegistry()).seal();
		this.settings = options.settings ?? new Settings();
		this.stats = options.stats ?? new MemoryStats();
		this.logger = options.logger ?? defaultLogger;
		this.cache = options.cache;
		this.planner = new Planner(this.providers, this.rules);
		this.oracle = new ResponseOracle(this.providers, this.planner);
		this.resolver = new Resolver({
			providers: this.providers,
			cache: options.cache,
			cacheErrors: options.cacheErrors,
			serialization: options.serialization,
			logger: this.logger,
		});
	}

	/**
	 * Creates an injector with the default providers, adjusted by the
	 * `providers` setting, and the cache the settings ask for.
	 *
	 * @throws {SettingsError} If the settings are invalid
	 */
	static fromSettings(
		settings: Settings,
		options: FromSettingsOptions = {}
	): Injector {
		const config = loadSettings({
			providers: settings.get('providers'),
			cache: settings.get('cache'),
			cacheErrors: settings.get('cacheErrors'),
			cacheCompressed: settings.get('cacheCompressed'),
		});
		const logger = options.logger ?? defaultLogger;
		const registry = new ProviderRegistry({
			contextTypes: options.extra?.keys(),
		});
		for (const [name, { create, priority }] of DEFAULT_PROVIDERS) {
			const configured = config.providers[name];
			if (configured !== null) {
				registry.register(create(), configured ?? priority);
			}
		}
		for (const provider of options.providers ?? []) {
			const configured = config.providers[provider.name];
			if (configured !== null) {
				registry.register(provider, configured);
			}
		}

		let cache: CacheStore | undefined;
		if (config.cachePath !== undefined) {
			cache = new SqliteCacheStore(config.cachePath, {
				compressed: config.cacheCompressed,
			});
			logger.info(
				{ path: config.cachePath, cacheErrors: config.cacheErrors },
				`Cache enabled: ${config.cachePath}`
			);
		}

		return new Injector({
			...options,
			providers: registry,
			cache,
			cacheErrors: config.cacheErrors,
			settings,
			logger,
		});
	}

	buildPlan(cb: AnyCallback, target: PlanTarget | CrawlRequest): Plan {
		this.assertOpen();
		return this.planner.buildPlan(cb.signature, this.targetOf(target));
	}

	/**
	 * Whether the request must actually be downloaded for the callback.
	 */
	isResponseRequired(
		cb: AnyCallback,
		target: Plan | PlanTarget | CrawlRequest
	): boolean {
		this.assertOpen();
		const resolved =
			typeof target === 'object' && 'steps' in target
				? target
				: this.targetOf(target);
		return this.oracle.isResponseRequired(cb.signature, resolved);
	}

	async resolve(
		plan: Plan,
		request: CrawlRequest,
		response: CrawlResponse,
		options: ResolveOptions = {}
	): Promise<Resolution> {
		this.assertOpen();
		return this.resolver.resolve(plan, this.contextFor(request, response), options);
	}

	/**
	 * Plans and resolves the arguments of a callback. The response parameter,
	 * if the callback declares one, receives `response`.
	 */
	async buildCallbackArguments(
		cb: AnyCallback,
		request: CrawlRequest,
		response: CrawlResponse,
		options: RunOptions = {}
	): Promise<Resolution> {
		const plan = this.buildPlan(cb, this.targetOf(request, options.inject));
		const resolution = await this.resolve(plan, request, response, options);
		if (isRetry(resolution) || plan.responseParam === undefined) {
			return resolution;
		}
		return ok({ [plan.responseParam]: response, ...resolution.value });
	}

	/**
	 * Builds the arguments of a callback and runs it. Errors are reported as a
	 * `fail` outcome; a retry asked for by a page object or by the callback as
	 * a `retry` outcome.
	 */
	async run<R>(
		cb: AnyCallback<R>,
		request: CrawlRequest,
		response: CrawlResponse,
		options: RunOptions = {}
	): Promise<Outcome<Awaited<R>>> {
		try {
			const resolution = await this.buildCallbackArguments(
				cb,
				request,
				response,
				options
			);
			if (isRetry(resolution)) {
				return resolution;
			}
			const value = await cb.invoke(resolution.value);
			return isRetry(value) ? value : ok(value);
		} catch (err) {
			this.logger.error(
				{ callback: cb.name, url: request.url, error: err },
				`Callback ${cb.name} failed for ${request.url}`
			);
			return fail(err);
		}
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await this.cache?.close();
	}

	private contextFor(
		request: CrawlRequest,
		response: CrawlResponse
	): ResolutionContext {
		return {
			request,
			response,
			settings: this.settings,
			stats: this.stats,
			extra: this.extra,
		};
	}

	private targetOf(
		target: PlanTarget | CrawlRequest,
		inject?: readonly AnyTag[]
	): PlanTarget {
		if (!(target instanceof CrawlRequest)) {
			return target;
		}
		const fromMeta = InjectMetaSchema.safeParse(target.meta['inject']);
		return {
			url: target.url,
			inject: inject ?? (fromMeta.success ? fromMeta.data : []),
		};
	}

	private assertOpen(): void {
		if (this.closed) {
			throw new InjectorClosedError();
		}
	}
}
