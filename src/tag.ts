/**
 * Type representing a tag identifier (string or symbol).
 * @internal
 */
export type TagId = string | symbol;

/**
 * Property key carrying the identifier of a value tag.
 *
 * Note: A string is used instead of a symbol so that the key can appear in the
 * declaration files of classes that extend tagged bases.
 *
 * @internal
 */
export const TagIdKey = '__pagewright/TagIdKey__';

/**
 * Phantom property used to carry the value type of a value tag.
 * @internal
 */
export const TagTypeKey: unique symbol = Symbol.for('pagewright/TagTypeKey');

/**
 * Property keys attached to annotated descriptors.
 * @internal
 */
export const AnnotatedBaseKey: unique symbol = Symbol.for(
	'pagewright/AnnotatedBase'
);
export const AnnotatedMetadataKey: unique symbol = Symbol.for(
	'pagewright/AnnotatedMetadata'
);

/**
 * Type representing a value-based type descriptor.
 *
 * Value tags describe dependencies that are not classes, such as plain strings
 * or records. They use a phantom type to keep the value type at compile time
 * while being distinguishable at runtime by object identity.
 *
 * @example
 * ```typescript
 * const ApiKey = Tag.of('ApiKey')<string>();
 * ```
 */
export interface ValueTag<Id extends TagId, T> {
	readonly [TagIdKey]: Id;
	readonly [TagTypeKey]: T;
}

/**
 * Any class can serve as a type descriptor. Page objects and page inputs such
 * as `HttpResponse` are classes; the class object itself is the identifier.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ClassTag<T = unknown> = abstract new (...args: any[]) => T;

/**
 * A descriptor carrying immutable metadata on top of a base descriptor.
 *
 * Annotated descriptors are interned: `Tag.annotated(X, 'a')` returns the same
 * object every time it is called with the same arguments, so equality stays a
 * matter of identity.
 */
export interface AnnotatedTag<TBase extends AnyTag = AnyTag>
	extends ValueTag<string, TagType<TBase>> {
	readonly [AnnotatedBaseKey]: TBase;
	readonly [AnnotatedMetadataKey]: readonly string[];
}

/**
 * Union type representing any valid type descriptor.
 */
export type AnyTag =
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	ValueTag<TagId, any> | ClassTag;

/**
 * Extracts the instance type a descriptor stands for.
 *
 * @example
 * ```typescript
 * const RequestUrl = Tag.of('RequestUrl')<string>();
 * type A = TagType<typeof RequestUrl>; // string
 * type B = TagType<typeof HttpResponse>; // HttpResponse
 * ```
 */
export type TagType<TTag> =
	// eslint-disable-next-line @typescript-eslint/no-explicit-any
	TTag extends ValueTag<any, infer T>
		? T
		: // eslint-disable-next-line @typescript-eslint/no-explicit-any
			TTag extends abstract new (...args: any[]) => infer T
			? T
			: never;

const interned = new Map<AnyTag, Map<string, AnnotatedTag>>();

function isValueTag(tag: AnyTag): tag is Exclude<AnyTag, ClassTag> {
	return typeof tag === 'object' && TagIdKey in tag;
}

function isAnnotated(tag: AnyTag): tag is AnnotatedTag {
	return typeof tag === 'object' && AnnotatedBaseKey in tag;
}

/**
 * Utility object containing factory functions for type descriptors.
 */
export const Tag = {
	/**
	 * Creates a value tag factory for dependencies that are not classes.
	 *
	 * @example
	 * ```typescript
	 * const PageParams = Tag.of('PageParams')<Record<string, unknown>>();
	 * ```
	 */
	of: <Id extends TagId>(id: Id) => {
		return <T>(): ValueTag<Id, T> => ({
			[TagIdKey]: id,
			[TagTypeKey]: undefined as T,
		});
	},

	/**
	 * Returns the descriptor for `base` tagged with the given metadata.
	 *
	 * Calling it with no metadata returns `base` itself. Nested annotations are
	 * flattened onto the innermost base.
	 *
	 * @example
	 * ```typescript
	 * const Listing = Tag.annotated(HttpResponse, 'listing');
	 * Listing === Tag.annotated(HttpResponse, 'listing'); // true
	 * ```
	 */
	annotated: <TBase extends AnyTag>(
		base: TBase,
		...metadata: string[]
	): TBase | AnnotatedTag<TBase> => {
		if (metadata.length === 0) {
			return base;
		}
		if (isAnnotated(base)) {
			// The base of an annotated tag is always a plain descriptor
			return Tag.annotated(
				base[AnnotatedBaseKey],
				...base[AnnotatedMetadataKey],
				...metadata
			) as AnnotatedTag<TBase>;
		}

		const key = JSON.stringify(metadata);
		let byMetadata = interned.get(base);
		if (byMetadata === undefined) {
			byMetadata = new Map();
			interned.set(base, byMetadata);
		}
		const existing = byMetadata.get(key);
		if (existing !== undefined) {
			return existing as AnnotatedTag<TBase>;
		}

		const tag: AnnotatedTag<TBase> = Object.freeze({
			[TagIdKey]: `${Tag.name(base)}[${metadata.join(', ')}]`,
			[TagTypeKey]: undefined as TagType<TBase>,
			[AnnotatedBaseKey]: base,
			[AnnotatedMetadataKey]: Object.freeze([...metadata]),
		});
		byMetadata.set(key, tag);
		return tag;
	},

	/**
	 * Returns the plain descriptor underneath any annotation.
	 */
	base: (tag: AnyTag): AnyTag => {
		return isAnnotated(tag) ? tag[AnnotatedBaseKey] : tag;
	},

	/**
	 * Returns the annotation metadata of a descriptor (empty for plain ones).
	 */
	metadata: (tag: AnyTag): readonly string[] => {
		return isAnnotated(tag) ? tag[AnnotatedMetadataKey] : [];
	},

	isAnnotated,

	/**
	 * Whether a value can serve as a type descriptor.
	 */
	isTag: (value: unknown): value is AnyTag => {
		return (
			typeof value === 'function' ||
			(typeof value === 'object' && value !== null && TagIdKey in value)
		);
	},

	/**
	 * Human-readable name of a descriptor, used in errors, logs and stats.
	 *
	 * @example
	 * ```typescript
	 * Tag.name(Tag.of('RequestUrl')<string>()); // "RequestUrl"
	 * Tag.name(BookPage); // "BookPage"
	 * ```
	 */
	name: (tag: AnyTag): string => {
		if (isValueTag(tag)) {
			return String(tag[TagIdKey]);
		}
		return tag.name === '' ? '<anonymous class>' : tag.name;
	},
};
