/**
 * Request and response objects exchanged with the crawl engine.
 *
 * They are deliberately minimal: the engine owns scheduling and network I/O
 * and only hands these over so that providers can read from them.
 */

export type Headers = Readonly<Record<string, string>>;

export type CrawlRequestInit = {
	method?: string;
	headers?: Headers;
	body?: string;
	meta?: Readonly<Record<string, unknown>>;
};

export class CrawlRequest {
	readonly url: string;
	readonly method: string;
	readonly headers: Headers;
	readonly body: string;
	readonly meta: Readonly<Record<string, unknown>>;

	constructor(url: string, init: CrawlRequestInit = {}) {
		this.url = url;
		this.method = init.method ?? 'GET';
		this.headers = init.headers ?? {};
		this.body = init.body ?? '';
		this.meta = init.meta ?? {};
	}
}

export type CrawlResponseInit = {
	status?: number;
	headers?: Headers;
	body?: string;
	request?: CrawlRequest | null;
};

export class CrawlResponse {
	readonly url: string;
	readonly status: number;
	readonly headers: Headers;
	readonly body: string;
	readonly request: CrawlRequest | null;

	constructor(url: string, init: CrawlResponseInit = {}) {
		this.url = url;
		this.status = init.status ?? 200;
		this.headers = init.headers ?? {};
		this.body = init.body ?? '';
		this.request = init.request ?? null;
	}
}

/**
 * Zero-cost stand-in used when the download of a request is skipped.
 *
 * Annotate the leading parameter of a callback with `DummyResponse` to signal
 * that the callback does not read the response body itself. If no provider in
 * the plan needs the real response either, the engine is told to skip the
 * fetch and this object takes its place.
 */
export class DummyResponse extends CrawlResponse {
	constructor(url: string, request: CrawlRequest | null = null) {
		super(url, { request });
	}
}
