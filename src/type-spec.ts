import { type AnyTag, Tag, type TagType } from './tag.js';

export const OptionalKey: unique symbol = Symbol.for('pagewright/Optional');
export const UnionKey: unique symbol = Symbol.for('pagewright/Union');

/**
 * Marks a leading callback parameter that carries no declaration. It stands for
 * the raw network response handed over by the crawl engine.
 */
export const Untyped: unique symbol = Symbol.for('pagewright/Untyped');
export type Untyped = typeof Untyped;

export interface OptionalSpec<T extends AnyTag = AnyTag> {
	readonly [OptionalKey]: readonly T[];
}

export interface UnionSpec<T extends AnyTag = AnyTag> {
	readonly [UnionKey]: readonly T[];
}

/**
 * Anything a parameter or dependency can be declared as.
 */
export type TypeSpec = AnyTag | OptionalSpec | UnionSpec | Untyped;

/**
 * Declares a dependency that resolves to `null` when none of its alternatives
 * can be built.
 *
 * @example
 * ```typescript
 * class BookPage extends Page({ params: Optional(PageParams) }) {}
 * ```
 */
export function Optional<const T extends readonly AnyTag[]>(
	...alternatives: T
): OptionalSpec<T[number]> {
	return Object.freeze({ [OptionalKey]: Object.freeze([...alternatives]) });
}

/**
 * Declares a dependency satisfied by the first alternative that can be built.
 */
export function Union<const T extends readonly AnyTag[]>(
	...alternatives: T
): UnionSpec<T[number]> {
	return Object.freeze({ [UnionKey]: Object.freeze([...alternatives]) });
}

export function isOptionalSpec(spec: unknown): spec is OptionalSpec {
	return typeof spec === 'object' && spec !== null && OptionalKey in spec;
}

export function isUnionSpec(spec: unknown): spec is UnionSpec {
	return typeof spec === 'object' && spec !== null && UnionKey in spec;
}

export type ExpandedSpec = {
	alternatives: readonly AnyTag[];
	optional: boolean;
};

/**
 * Flattens a declaration into its alternatives in declared order.
 * @internal
 */
export function expandSpec(spec: Exclude<TypeSpec, Untyped>): ExpandedSpec {
	if (isOptionalSpec(spec)) {
		return { alternatives: spec[OptionalKey], optional: true };
	}
	if (isUnionSpec(spec)) {
		return { alternatives: spec[UnionKey], optional: false };
	}
	return { alternatives: [spec], optional: false };
}

export function describeSpec(spec: TypeSpec): string {
	if (spec === Untyped) {
		return '<untyped>';
	}
	const { alternatives, optional } = expandSpec(spec);
	const names = alternatives.map((tag) => Tag.name(tag));
	if (optional) {
		return `Optional[${names.join(' | ')}]`;
	}
	return names.length === 1 ? (names[0] ?? '') : `Union[${names.join(' | ')}]`;
}

/**
 * The value a declaration resolves to.
 */
export type SpecType<S> = S extends OptionalSpec<infer T>
	? TagType<T> | null
	: S extends UnionSpec<infer T>
		? TagType<T>
		: S extends AnyTag
			? TagType<S>
			: never;
