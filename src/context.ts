import { CrawlRequest, CrawlResponse, DummyResponse } from './http.js';
import { type AnyTag, Tag } from './tag.js';

export interface StatsSink {
	inc(key: string, by?: number): void;
	set(key: string, value: number): void;
}

/**
 * In-memory stats sink, handy for tests and single-process crawls.
 */
export class MemoryStats implements StatsSink {
	private readonly values = new Map<string, number>();

	inc(key: string, by = 1): void {
		this.values.set(key, (this.values.get(key) ?? 0) + by);
	}

	set(key: string, value: number): void {
		this.values.set(key, value);
	}

	get(key: string): number | undefined {
		return this.values.get(key);
	}

	toJSON(): Record<string, number> {
		return Object.fromEntries(this.values);
	}
}

/**
 * Read-only key/value store of crawl-wide settings.
 */
export class Settings {
	private readonly values: ReadonlyMap<string, unknown>;

	constructor(values: Readonly<Record<string, unknown>> = {}) {
		this.values = new Map(Object.entries(values));
	}

	has(key: string): boolean {
		return this.values.has(key);
	}

	get(key: string): unknown {
		return this.values.get(key);
	}

	getString(key: string, fallback = ''): string {
		const value = this.values.get(key);
		return typeof value === 'string' ? value : fallback;
	}

	getBoolean(key: string, fallback = false): boolean {
		const value = this.values.get(key);
		return typeof value === 'boolean' ? value : fallback;
	}

	getNumber(key: string, fallback = 0): number {
		const value = this.values.get(key);
		return typeof value === 'number' ? value : fallback;
	}
}

export const StatsCollector = Tag.of('StatsCollector')<StatsSink>();

/**
 * Framework-scoped objects available to providers for one resolution.
 */
export interface ResolutionContext {
	readonly request: CrawlRequest;
	/** The downloaded response, or a `DummyResponse` when the fetch was skipped. */
	readonly response: CrawlResponse;
	readonly settings: Settings;
	readonly stats: StatsSink;
	/** Additional singletons, keyed by the type providers declare them as. */
	readonly extra?: ReadonlyMap<AnyTag, unknown>;
}

/**
 * Types that providers may depend on without a provider of their own.
 */
export const CONTEXT_TYPES: readonly AnyTag[] = [
	CrawlRequest,
	CrawlResponse,
	DummyResponse,
	Settings,
	StatsCollector,
];

/**
 * Flattens a context into the instance map provider dependencies are built
 * from.
 * @internal
 */
export function contextInstances(
	context: ResolutionContext
): Map<AnyTag, unknown> {
	const { request, response } = context;
	const instances = new Map<AnyTag, unknown>([
		[CrawlRequest, request],
		[CrawlResponse, response],
		[
			DummyResponse,
			response instanceof DummyResponse
				? response
				: new DummyResponse(response.url, request),
		],
		[Settings, context.settings],
		[StatsCollector, context.stats],
	]);
	for (const [tag, value] of context.extra ?? []) {
		instances.set(tag, value);
	}
	return instances;
}

export function describeContext(context: ResolutionContext): string {
	return `${context.request.method} ${context.request.url}`;
}

