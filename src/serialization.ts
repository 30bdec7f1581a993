import { z } from 'zod/v4';
import { MissingSerializerError } from './errors.js';
import {
	HttpRequest,
	HttpResponse,
	PageParams,
	RequestUrl,
	ResponseUrl,
} from './page-inputs.js';
import { type AnyTag, Tag, type TagType } from './tag.js';
import type { JsonValue } from './types.js';
import { JsonValueSchema } from './utils/json.js';

/**
 * Converts instances of one type to and from plain JSON data, so that they can
 * be written to the provider cache.
 */
export interface Serializer<T> {
	serialize(value: T): JsonValue;
	deserialize(data: JsonValue): T;
}

/**
 * Rebuilds errors of one class from the message and the data its `serialize`
 * kept, so that cached provider errors are thrown again as the same class.
 */
export interface ErrorSerializer<E extends Error> {
	serialize?(error: E): JsonValue;
	deserialize(message: string, data: JsonValue): E;
}

type ErrorClass<E extends Error> = abstract new (...args: never[]) => E;

const HeadersSchema = z.record(z.string(), z.string());

const HttpRequestSchema = z.object({
	url: z.string(),
	method: z.string(),
	headers: HeadersSchema,
	body: z.string(),
});

const HttpResponseSchema = z.object({
	url: z.string(),
	body: z.string(),
	status: z.number().int(),
	headers: HeadersSchema,
});

const PageParamsSchema = z.record(z.string(), JsonValueSchema);

function urlSerializer<T extends { url: string }>(
	create: (url: string) => T
): Serializer<T> {
	return {
		serialize: (value) => value.url,
		deserialize: (data) => create(z.string().parse(data)),
	};
}

/**
 * Serializers for the types providers return, looked up by the plain
 * descriptor underneath any annotation.
 */
export class SerializationRegistry {
	private readonly serializers = new Map<AnyTag, Serializer<unknown>>();
	// Keyed by constructor
	private readonly errorsByClass = new Map<unknown, ErrorSerializer<Error>>();
	private readonly errorsByName = new Map<string, ErrorSerializer<Error>>();

	register<T extends AnyTag>(tag: T, serializer: Serializer<TagType<T>>): this {
		this.serializers.set(Tag.base(tag), serializer);
		return this;
	}

	has(tag: AnyTag): boolean {
		return this.serializers.has(Tag.base(tag));
	}

	/**
	 * @throws {MissingSerializerError} If no serializer is registered for the type
	 */
	serialize(tag: AnyTag, value: unknown): JsonValue {
		return this.get(tag).serialize(value);
	}

	/**
	 * @throws {MissingSerializerError} If no serializer is registered for the type
	 */
	deserialize(tag: AnyTag, data: JsonValue): unknown {
		return this.get(tag).deserialize(data);
	}

	/**
	 * Registers an error class under its constructor name. Only errors whose
	 * constructor is exactly this class use the serializer.
	 */
	registerError<E extends Error>(
		errorClass: ErrorClass<E>,
		serializer: ErrorSerializer<E>
	): this {
		const entry: ErrorSerializer<Error> = {
			serialize: (error) =>
				error instanceof errorClass
					? (serializer.serialize?.(error) ?? null)
					: null,
			deserialize: (message, data) => serializer.deserialize(message, data),
		};
		this.errorsByClass.set(errorClass, entry);
		this.errorsByName.set(errorClass.name, entry);
		return this;
	}

	/**
	 * Data kept for a thrown error, or `null` when its class is not registered.
	 */
	serializeError(error: Error): JsonValue {
		return this.errorsByClass.get(error.constructor)?.serialize?.(error) ?? null;
	}

	/**
	 * Rebuilds an error recorded under its constructor name, or returns
	 * `undefined` when no class is registered under that name.
	 */
	deserializeError(
		type: string,
		message: string,
		data: JsonValue
	): Error | undefined {
		return this.errorsByName.get(type)?.deserialize(message, data);
	}

	private get(tag: AnyTag): Serializer<unknown> {
		const serializer = this.serializers.get(Tag.base(tag));
		if (serializer === undefined) {
			throw new MissingSerializerError(Tag.name(tag));
		}
		return serializer;
	}

	/**
	 * A registry that knows the page inputs of the default providers and the
	 * built-in error classes.
	 */
	static withDefaults(): SerializationRegistry {
		return new SerializationRegistry()
			.register(HttpRequest, {
				serialize: ({ url, method, headers, body }) => ({
					url,
					method,
					headers: { ...headers },
					body,
				}),
				deserialize: (data) => {
					const { url, method, headers, body } = HttpRequestSchema.parse(data);
					return new HttpRequest(url, method, headers, body);
				},
			})
			.register(HttpResponse, {
				serialize: ({ url, body, status, headers }) => ({
					url,
					body,
					status,
					headers: { ...headers },
				}),
				deserialize: (data) => {
					const { url, body, status, headers } = HttpResponseSchema.parse(data);
					return new HttpResponse(url, body, status, headers);
				},
			})
			.register(RequestUrl, urlSerializer((url) => new RequestUrl(url)))
			.register(ResponseUrl, urlSerializer((url) => new ResponseUrl(url)))
			.register(PageParams, {
				serialize: (params) => PageParamsSchema.parse(params),
				deserialize: (data) => PageParamsSchema.parse(data),
			});
	}
}
