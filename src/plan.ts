import type { AnyPageClass } from './page.js';
import { type AnyTag, Tag } from './tag.js';
import type { TypeSpec } from './type-spec.js';
import type { PromiseOrValue } from './types.js';

/**
 * Ordered `[name, declaration]` pairs describing the parameters of a callback.
 */
export type CallbackSignature = readonly (readonly [string, TypeSpec])[];

/**
 * Where a plan is built for: the request URL, plus the types the request asks
 * to have injected as `DynamicDeps`.
 */
export type PlanTarget =
	| string
	| {
			readonly url: string;
			readonly inject?: readonly AnyTag[];
	  };

/**
 * Leaf obtained from a provider.
 */
export type ProvidedStep = {
	readonly kind: 'provided';
	readonly type: AnyTag;
};

/**
 * Page object built by calling its constructor with its resolved inputs.
 * `source` is the type that was asked for when an override replaced it.
 */
export type PageStep = {
	readonly kind: 'page';
	readonly type: AnyPageClass;
	readonly source: AnyTag;
	readonly inputs: ReadonlyMap<string, AnyTag | null>;
};

/**
 * Value computed asynchronously from its inputs, such as an item returned by
 * a page object.
 */
export type BuilderStep = {
	readonly kind: 'builder';
	readonly type: AnyTag;
	readonly inputs: ReadonlyMap<string, AnyTag | null>;
	readonly build: (inputs: Record<string, unknown>) => PromiseOrValue<unknown>;
};

export type PlanStep = ProvidedStep | PageStep | BuilderStep;

/**
 * Dependency plan of one callback for one request.
 *
 * `steps` are ordered so that every step comes after the steps it depends on,
 * and hold each type once.
 */
export interface Plan {
	readonly url: string;
	readonly steps: readonly PlanStep[];
	/** Callback parameter name to the type built for it, `null` for an absent optional. */
	readonly params: ReadonlyMap<string, AnyTag | null>;
	/** Name of the leading parameter that receives the engine's response. */
	readonly responseParam: string | undefined;
	/** Required parameters that cannot be built, with the reason. */
	readonly missing: ReadonlyMap<string, string>;
}

export function providedTypes(plan: Plan): AnyTag[] {
	return plan.steps.flatMap((step) =>
		step.kind === 'provided' ? [step.type] : []
	);
}

export function describePlan(plan: Plan): string {
	return plan.steps
		.map((step) => `${step.kind}:${Tag.name(step.type)}`)
		.join(', ');
}
