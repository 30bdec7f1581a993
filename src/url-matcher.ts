/**
 * URL patterns used by override rules.
 *
 * A pattern reads `[scheme://]host[:port][/path][?query]`:
 * - the host matches itself and its subdomains (a leading `*.` is accepted);
 * - the path is a prefix, in which `*` matches any run of characters;
 * - every query entry must be present in the URL with the same value.
 *
 * An empty pattern matches every URL.
 */

const DEFAULT_PORTS: Readonly<Record<string, string>> = {
	'http:': '80',
	'https:': '443',
	'ws:': '80',
	'wss:': '443',
	'ftp:': '21',
};

type CompiledPattern = {
	readonly scheme: string | undefined;
	readonly host: string;
	readonly port: string | undefined;
	readonly path: RegExp | undefined;
	readonly query: readonly (readonly [string, string])[];
};

const compiledCache = new Map<string, CompiledPattern>();

function escapeRegex(value: string): string {
	return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

function compile(pattern: string): CompiledPattern {
	const cached = compiledCache.get(pattern);
	if (cached !== undefined) {
		return cached;
	}

	let rest = pattern.trim();
	let scheme: string | undefined;
	const schemeEnd = rest.indexOf('://');
	if (schemeEnd !== -1) {
		scheme = `${rest.slice(0, schemeEnd).toLowerCase()}:`;
		rest = rest.slice(schemeEnd + 3);
	}

	let query: [string, string][] = [];
	const queryStart = rest.indexOf('?');
	if (queryStart !== -1) {
		query = [...new URLSearchParams(rest.slice(queryStart + 1))];
		rest = rest.slice(0, queryStart);
	}

	let path: RegExp | undefined;
	const pathStart = rest.indexOf('/');
	if (pathStart !== -1) {
		const prefix = rest.slice(pathStart);
		path = new RegExp(`^${escapeRegex(prefix).replace(/\*/g, '.*')}`);
		rest = rest.slice(0, pathStart);
	}

	let port: string | undefined;
	const portStart = rest.lastIndexOf(':');
	if (portStart !== -1) {
		port = rest.slice(portStart + 1);
		rest = rest.slice(0, portStart);
	}

	const host = rest.toLowerCase().replace(/^\*\./, '');
	const compiled: CompiledPattern = { scheme, host, port, path, query };
	compiledCache.set(pattern, compiled);
	return compiled;
}

function matchesCompiled(compiled: CompiledPattern, url: URL): boolean {
	if (compiled.scheme !== undefined && compiled.scheme !== url.protocol) {
		return false;
	}
	const hostname = url.hostname.toLowerCase();
	if (
		compiled.host !== '' &&
		hostname !== compiled.host &&
		!hostname.endsWith(`.${compiled.host}`)
	) {
		return false;
	}
	if (compiled.port !== undefined) {
		const port = url.port === '' ? DEFAULT_PORTS[url.protocol] : url.port;
		if (port !== compiled.port) {
			return false;
		}
	}
	if (compiled.path !== undefined && !compiled.path.test(url.pathname)) {
		return false;
	}
	return compiled.query.every(([key, value]) =>
		url.searchParams.getAll(key).includes(value)
	);
}

function parseUrl(url: string): URL | undefined {
	try {
		return new URL(url);
	} catch {
		return undefined;
	}
}

/**
 * Include and exclude URL patterns with a priority.
 *
 * @example
 * ```typescript
 * const books = new Patterns(['toscrape.com/catalogue'], ['toscrape.com/catalogue/category']);
 * books.matches('https://books.toscrape.com/catalogue/page-2.html'); // true
 * ```
 */
export class Patterns {
	readonly include: readonly string[];
	readonly exclude: readonly string[];
	readonly priority: number;

	constructor(
		include: readonly string[] = [],
		exclude: readonly string[] = [],
		priority = 500
	) {
		this.include = Object.freeze([...include]);
		this.exclude = Object.freeze([...exclude]);
		this.priority = priority;
	}

	/**
	 * Whether the URL is matched by an include pattern and by no exclude
	 * pattern. URLs that cannot be parsed never match.
	 */
	matches(url: string): boolean {
		const parsed = parseUrl(url);
		if (parsed === undefined) {
			return false;
		}
		const included =
			this.include.length === 0 ||
			this.include.some((pattern) => matchesCompiled(compile(pattern), parsed));
		return (
			included &&
			!this.exclude.some((pattern) => matchesCompiled(compile(pattern), parsed))
		);
	}

	/** Same include and exclude patterns, in the same order, and same priority. */
	equals(other: Patterns): boolean {
		return (
			this.priority === other.priority &&
			sameItems(this.include, other.include) &&
			sameItems(this.exclude, other.exclude)
		);
	}

	toString(): string {
		const parts = [`include=[${this.include.join(', ')}]`];
		if (this.exclude.length > 0) {
			parts.push(`exclude=[${this.exclude.join(', ')}]`);
		}
		parts.push(`priority=${this.priority}`);
		return `Patterns(${parts.join(', ')})`;
	}
}

function sameItems(a: readonly string[], b: readonly string[]): boolean {
	return a.length === b.length && a.every((item, index) => item === b[index]);
}

/**
 * Selects, for a URL, the identifier whose patterns match with the highest
 * priority. On equal priority the identifier added (or updated) last wins.
 */
export class UrlMatcher<TId> {
	private readonly entries = new Map<TId, Patterns>();

	addOrUpdate(id: TId, patterns: Patterns): void {
		this.entries.delete(id);
		this.entries.set(id, patterns);
	}

	get(id: TId): Patterns | undefined {
		return this.entries.get(id);
	}

	get patterns(): ReadonlyMap<TId, Patterns> {
		return this.entries;
	}

	match(url: string): TId | undefined {
		let best: { id: TId; priority: number } | undefined;
		for (const [id, patterns] of this.entries) {
			if (
				patterns.matches(url) &&
				(best === undefined || patterns.priority >= best.priority)
			) {
				best = { id, priority: patterns.priority };
			}
		}
		return best?.id;
	}
}
