import type { Headers } from './http.js';
import type { StatsSink } from './context.js';
import { type AnyTag, Tag } from './tag.js';

/**
 * Page inputs are the externally provided types page objects are built from.
 * They are plain data, decoupled from the crawl engine's own request and
 * response objects.
 */

export class HttpRequest {
	constructor(
		readonly url: string,
		readonly method: string = 'GET',
		readonly headers: Headers = {},
		readonly body: string = ''
	) {}
}

export class HttpResponse {
	constructor(
		readonly url: string,
		readonly body: string,
		readonly status: number = 200,
		readonly headers: Headers = {}
	) {}

	get text(): string {
		return this.body;
	}

	json(): unknown {
		return JSON.parse(this.body);
	}
}

class Url {
	constructor(readonly url: string) {}

	toString(): string {
		return this.url;
	}
}

/** URL of the request, before any redirect. */
export class RequestUrl extends Url {}

/** URL of the response, after redirects. */
export class ResponseUrl extends Url {}

/**
 * Free-form parameters attached to a request under `meta.pageParams`.
 */
export const PageParams = Tag.of('PageParams')<Readonly<Record<string, unknown>>>();

/**
 * Lets page objects record custom stats. Keys are namespaced under
 * `pagewright/stats/`.
 */
export class Stats {
	constructor(private readonly sink: StatsSink) {}

	set(key: string, value: number): void {
		this.sink.set(`pagewright/stats/${key}`, value);
	}

	inc(key: string, by = 1): void {
		this.sink.inc(`pagewright/stats/${key}`, by);
	}
}

/**
 * Instances of the types a request lists under its injection target, keyed by
 * type. Lets a callback receive dependencies chosen per request.
 */
export const DynamicDeps =
	Tag.of('DynamicDeps')<ReadonlyMap<AnyTag, unknown>>();
