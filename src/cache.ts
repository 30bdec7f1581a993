import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod/v4';
import { JsonValueSchema, jsonParse, jsonStringify } from './utils/json.js';
import type { PromiseOrValue } from './types.js';

const CacheEntrySchema = z.discriminatedUnion('kind', [
	z.object({
		kind: z.literal('values'),
		items: z.array(z.object({ type: z.string(), data: JsonValueSchema })),
	}),
	z.object({
		kind: z.literal('error'),
		type: z.string(),
		name: z.string(),
		message: z.string(),
		data: JsonValueSchema,
	}),
]);

/**
 * What the provider cache keeps for one fingerprint: either the serialized
 * instances a provider returned, keyed by type name, or the error it threw,
 * keyed by its constructor name.
 */
export type CacheEntry = z.infer<typeof CacheEntrySchema>;

/**
 * Persistent store of provider results, shared across requests.
 */
export interface CacheStore {
	get(fingerprint: string): PromiseOrValue<CacheEntry | undefined>;
	put(fingerprint: string, entry: CacheEntry): PromiseOrValue<void>;
	close(): PromiseOrValue<void>;
}

export class MemoryCacheStore implements CacheStore {
	private readonly entries = new Map<string, CacheEntry>();

	get(fingerprint: string): CacheEntry | undefined {
		return this.entries.get(fingerprint);
	}

	put(fingerprint: string, entry: CacheEntry): void {
		this.entries.set(fingerprint, entry);
	}

	get size(): number {
		return this.entries.size;
	}

	close(): void {
		this.entries.clear();
	}
}

export type SqliteCacheStoreOptions = {
	/** Gzip entries before writing them. Defaults to `true`. */
	compressed?: boolean;
};

/**
 * SQLite-backed cache store. Compressed and uncompressed entries live in
 * separate tables, so one database file can hold both.
 *
 * @example
 * ```typescript
 * const cache = new SqliteCacheStore('.pagewright/cache.db');
 * cache.put('http_response_1f3a', { kind: 'values', items: [] });
 * cache.close();
 * ```
 */
export class SqliteCacheStore implements CacheStore {
	readonly path: string;
	readonly compressed: boolean;
	private readonly db: Database.Database;
	private readonly table: string;

	constructor(path: string, options: SqliteCacheStoreOptions = {}) {
		this.path = path;
		this.compressed = options.compressed ?? true;
		this.table = this.compressed ? 'responses_gzip' : 'responses';
		if (path !== ':memory:') {
			mkdirSync(dirname(path), { recursive: true });
		}
		this.db = new Database(path);
		this.db.pragma('journal_mode = WAL');
		this.db.exec(
			`CREATE TABLE IF NOT EXISTS ${this.table} (fingerprint TEXT PRIMARY KEY, value BLOB NOT NULL)`
		);
	}

	get(fingerprint: string): CacheEntry | undefined {
		const row: unknown = this.db
			.prepare(`SELECT value FROM ${this.table} WHERE fingerprint = ?`)
			.get(fingerprint);
		if (row === undefined) {
			return undefined;
		}
		const { value } = z.object({ value: z.instanceof(Buffer) }).parse(row);
		return this.decode(value);
	}

	put(fingerprint: string, entry: CacheEntry): void {
		this.db
			.prepare(
				`INSERT OR REPLACE INTO ${this.table} (fingerprint, value) VALUES (?, ?)`
			)
			.run(fingerprint, this.encode(entry));
	}

	get size(): number {
		const row: unknown = this.db
			.prepare(`SELECT COUNT(*) AS count FROM ${this.table}`)
			.get();
		return z.object({ count: z.number() }).parse(row).count;
	}

	close(): void {
		this.db.close();
	}

	toString(): string {
		return `SqliteCacheStore(${this.path}, compressed: ${String(this.compressed)})`;
	}

	private encode(entry: CacheEntry): Buffer {
		const data = Buffer.from(jsonStringify(entry), 'utf8');
		return this.compressed ? gzipSync(data, { level: 3 }) : data;
	}

	private decode(value: Buffer): CacheEntry {
		const data = this.compressed ? gunzipSync(value) : value;
		return CacheEntrySchema.parse(jsonParse(data.toString('utf8')));
	}
}
