import { CrawlRequest, CrawlResponse, DummyResponse } from './http.js';
import { type AnyCallback, Injector, type RunOptions } from './injector.js';
import type { Outcome } from './result.js';

/**
 * Engine-side hooks around one request: skips downloads nobody needs and
 * runs callbacks with their injected arguments.
 *
 * @example
 * ```typescript
 * const middleware = new InjectionMiddleware(injector);
 * const response =
 *   middleware.processRequest(request, parseBook) ?? (await download(request));
 * const outcome = await middleware.processResponse(request, response, parseBook);
 * ```
 */
export class InjectionMiddleware {
	readonly name = 'injection';

	constructor(private readonly injector: Injector) {}

	/**
	 * Returns a stand-in response when the download can be skipped, `null` when
	 * the request must be fetched.
	 */
	processRequest(request: CrawlRequest, cb: AnyCallback): DummyResponse | null {
		if (this.injector.isResponseRequired(cb, request)) {
			return null;
		}
		this.injector.stats.inc('pagewright/dummy_response_count');
		this.injector.logger.debug(
			{ url: request.url, callback: cb.name },
			`Skipping download of ${request.url}: ${cb.name} does not need the response`
		);
		return new DummyResponse(request.url, request);
	}

	processResponse<R>(
		request: CrawlRequest,
		response: CrawlResponse,
		cb: AnyCallback<R>,
		options: RunOptions = {}
	): Promise<Outcome<Awaited<R>>> {
		return this.injector.run(cb, request, response, options);
	}
}
