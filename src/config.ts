import { z } from 'zod/v4';
import { SettingsError } from './errors.js';

export const DEFAULT_CACHE_PATH = '.pagewright/cache.db';

const SettingsSchema = z.object({
	/** Provider name to priority; `null` disables a default provider. */
	providers: z.record(z.string(), z.number().finite().nullable()).default({}),
	/** `true` caches under the default path, a string under that path. */
	cache: z.union([z.boolean(), z.string().min(1)]).default(false),
	cacheErrors: z.boolean().default(false),
	cacheCompressed: z.boolean().default(true),
});

export type InjectionSettings = {
	readonly providers: Readonly<Record<string, number | null>>;
	/** Path of the cache database, or `undefined` when caching is off. */
	readonly cachePath: string | undefined;
	readonly cacheErrors: boolean;
	readonly cacheCompressed: boolean;
};

export type RawSettings = z.input<typeof SettingsSchema>;

/**
 * Validates the injection settings.
 *
 * @throws {SettingsError} If a value has the wrong shape
 *
 * @example
 * ```typescript
 * loadSettings({ cache: true, providers: { stats: null } });
 * // { providers: { stats: null }, cachePath: '.pagewright/cache.db', cacheErrors: false, cacheCompressed: true }
 * ```
 */
export function loadSettings(raw: unknown = {}): InjectionSettings {
	let parsed: z.output<typeof SettingsSchema>;
	try {
		parsed = SettingsSchema.parse(raw);
	} catch (err) {
		throw new SettingsError('Invalid injection settings', {
			cause: err,
			detail: err instanceof z.ZodError ? { issues: err.issues } : {},
		});
	}
	const { cache } = parsed;
	return {
		providers: parsed.providers,
		cachePath:
			cache === false ? undefined : cache === true ? DEFAULT_CACHE_PATH : cache,
		cacheErrors: parsed.cacheErrors,
		cacheCompressed: parsed.cacheCompressed,
	};
}
