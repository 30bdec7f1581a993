import type { JsonValue } from '../types.js';
import { z } from 'zod/v4';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([
		z.string(),
		z.number(),
		z.boolean(),
		z.null(),
		z.array(JsonValueSchema),
		z.record(z.string(), JsonValueSchema),
	])
);

/**
 * JSON.parse that checks the result is plain JSON data
 */
export function jsonParse(input: string): JsonValue {
	return JsonValueSchema.parse(JSON.parse(input));
}

/**
 * Type-safe version of JSON.stringify
 */
export function jsonStringify(
	value: JsonValue,
	replacer: Parameters<typeof JSON.stringify>[1] = undefined,
	space?: Parameters<typeof JSON.stringify>[2]
): string {
	return JSON.stringify(value, replacer, space);
}
