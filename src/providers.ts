import { z } from 'zod/v4';
import { StatsCollector, type StatsSink } from './context.js';
import { CrawlRequest, CrawlResponse } from './http.js';
import {
	HttpRequest,
	HttpResponse,
	PageParams,
	RequestUrl,
	ResponseUrl,
	Stats,
} from './page-inputs.js';
import {
	type InputProvider,
	PageInputProvider,
	provide,
	type Provided,
} from './provider.js';
import type { AnyTag } from './tag.js';

export class HttpRequestProvider extends PageInputProvider({
	request: CrawlRequest,
}) {
	readonly name = 'http_request';
	readonly provides = new Set<AnyTag>([HttpRequest]);

	provide(
		_toProvide: ReadonlySet<AnyTag>,
		{ request }: { request: CrawlRequest }
	): Provided[] {
		return [
			provide(
				HttpRequest,
				new HttpRequest(
					request.url,
					request.method,
					request.headers,
					request.body
				)
			),
		];
	}
}

/**
 * Builds `HttpResponse` page inputs out of the downloaded response. This is
 * the provider that keeps downloads from being skipped.
 */
export class HttpResponseProvider extends PageInputProvider({
	response: CrawlResponse,
}) {
	readonly name = 'http_response';
	readonly provides = new Set<AnyTag>([HttpResponse]);

	provide(
		_toProvide: ReadonlySet<AnyTag>,
		{ response }: { response: CrawlResponse }
	): Provided[] {
		return [
			provide(
				HttpResponse,
				new HttpResponse(
					response.url,
					response.body,
					response.status,
					response.headers
				)
			),
		];
	}
}

const PageParamsMetaSchema = z.record(z.string(), z.unknown());

/**
 * Reads `meta.pageParams` from the request; an absent or non-object value
 * yields empty params.
 */
export class PageParamsProvider extends PageInputProvider({
	request: CrawlRequest,
}) {
	readonly name = 'page_params';
	readonly provides = new Set<AnyTag>([PageParams]);

	provide(
		_toProvide: ReadonlySet<AnyTag>,
		{ request }: { request: CrawlRequest }
	): Provided[] {
		const params = PageParamsMetaSchema.safeParse(request.meta['pageParams']);
		return [provide(PageParams, params.success ? params.data : {})];
	}
}

export class RequestUrlProvider extends PageInputProvider({
	request: CrawlRequest,
}) {
	readonly name = 'request_url';
	readonly provides = new Set<AnyTag>([RequestUrl]);

	provide(
		_toProvide: ReadonlySet<AnyTag>,
		{ request }: { request: CrawlRequest }
	): Provided[] {
		return [provide(RequestUrl, new RequestUrl(request.url))];
	}
}

export class ResponseUrlProvider extends PageInputProvider({
	response: CrawlResponse,
}) {
	readonly name = 'response_url';
	readonly provides = new Set<AnyTag>([ResponseUrl]);

	provide(
		_toProvide: ReadonlySet<AnyTag>,
		{ response }: { response: CrawlResponse }
	): Provided[] {
		return [provide(ResponseUrl, new ResponseUrl(response.url))];
	}
}

export class StatsProvider extends PageInputProvider({
	stats: StatsCollector,
}) {
	readonly name = 'stats';
	readonly provides = new Set<AnyTag>([Stats]);
	// Wraps the live stats sink
	readonly cacheable = false;

	provide(
		_toProvide: ReadonlySet<AnyTag>,
		{ stats }: { stats: StatsSink }
	): Provided[] {
		return [provide(Stats, new Stats(stats))];
	}
}

/**
 * Providers registered by `Injector.fromSettings()`, keyed by the name used in
 * the `providers` setting, with their default priorities.
 */
export const DEFAULT_PROVIDERS: ReadonlyMap<
	string,
	{ create: () => InputProvider; priority: number }
> = new Map([
	['http_request', { create: () => new HttpRequestProvider(), priority: 400 }],
	['http_response', { create: () => new HttpResponseProvider(), priority: 500 }],
	['page_params', { create: () => new PageParamsProvider(), priority: 700 }],
	['request_url', { create: () => new RequestUrlProvider(), priority: 800 }],
	['response_url', { create: () => new ResponseUrlProvider(), priority: 900 }],
	['stats', { create: () => new StatsProvider(), priority: 1000 }],
]);
