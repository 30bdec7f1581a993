import { MemoryStats, type ResolutionContext, Settings } from '@/context.js';
import { CrawlRequest, CrawlResponse } from '@/http.js';
import { ItemPage, Page } from '@/page.js';
import { HttpResponse, RequestUrl } from '@/page-inputs.js';
import { ProviderRegistry } from '@/provider-registry.js';
import {
	HttpRequestProvider,
	HttpResponseProvider,
	PageParamsProvider,
	RequestUrlProvider,
	ResponseUrlProvider,
	StatsProvider,
} from '@/providers.js';
import { retry } from '@/result.js';
import { Tag } from '@/tag.js';

export const BOOK_URL = 'https://books.toscrape.com/catalogue/dune_1/index.html';
export const BOOK_HTML = '<html><h1>Dune</h1><p class="price">£12.50</p></html>';

export const Book = Tag.of('Book')<{ title: string; price: string }>();

function between(text: string, pattern: RegExp): string {
	return pattern.exec(text)?.[1] ?? '';
}

export class BookPage extends ItemPage({ response: HttpResponse }, Book) {
	toItem() {
		const html = this.inputs.response.text;
		return {
			title: between(html, /<h1>([^<]*)<\/h1>/),
			price: between(html, /class="price">([^<]*)</),
		};
	}
}

/** Only needs the URL, so the download can be skipped. */
export class BookUrlPage extends Page({ url: RequestUrl }) {
	slug(): string {
		return this.inputs.url.url.split('/').at(-2) ?? '';
	}
}

export const RetryItem = Tag.of('RetryItem')<{ title: string }>();

export class RetryingPage extends ItemPage({ response: HttpResponse }, RetryItem) {
	toItem() {
		return this.inputs.response.body === ''
			? retry('empty body')
			: { title: this.inputs.response.body };
	}
}

/** A type nothing can build. */
export const Unprovided = Tag.of('Unprovided')<string>();

export function defaultRegistry(): ProviderRegistry {
	return new ProviderRegistry()
		.register(new HttpRequestProvider(), 400)
		.register(new HttpResponseProvider(), 500)
		.register(new PageParamsProvider(), 700)
		.register(new RequestUrlProvider(), 800)
		.register(new ResponseUrlProvider(), 900)
		.register(new StatsProvider(), 1000);
}

export function makeContext(
	url = BOOK_URL,
	body = BOOK_HTML,
	meta: Readonly<Record<string, unknown>> = {}
): ResolutionContext & { stats: MemoryStats } {
	const request = new CrawlRequest(url, { meta });
	return {
		request,
		response: new CrawlResponse(url, { body, request }),
		settings: new Settings(),
		stats: new MemoryStats(),
	};
}
