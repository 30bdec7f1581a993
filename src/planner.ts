import {
	InjectionError,
	ProviderDependencyDeadlockError,
} from './errors.js';
import { CrawlResponse, DummyResponse } from './http.js';
import { type AnyPageClass, hasToItem, isInjectable } from './page.js';
import { DynamicDeps } from './page-inputs.js';
import type { CallbackSignature, Plan, PlanStep, PlanTarget } from './plan.js';
import { ProviderRegistry } from './provider-registry.js';
import { RulesRegistry } from './rules.js';
import { type AnyTag, Tag } from './tag.js';
import {
	describeSpec,
	expandSpec,
	type TypeSpec,
	Untyped,
} from './type-spec.js';

type Visit =
	| { readonly ok: true; readonly key: AnyTag }
	| { readonly ok: false; readonly reason: string };

type Selection =
	| { readonly ok: true; readonly key: AnyTag | null }
	| { readonly ok: false; readonly reason: string };

/**
 * Whether a leading parameter declaration stands for the engine's response.
 */
export function isResponseSpec(spec: TypeSpec): boolean {
	return spec === Untyped || spec === CrawlResponse || spec === DummyResponse;
}

/**
 * Mutable state of one planning pass.
 */
class PlanBuilder {
	steps = new Map<AnyTag, PlanStep>();
	private readonly overrides = new Map<AnyTag, AnyPageClass | undefined>();

	constructor(
		private readonly providers: ProviderRegistry,
		private readonly rules: RulesRegistry,
		private readonly url: string,
		private readonly inject: readonly AnyTag[]
	) {}

	/**
	 * Picks the first alternative of a declaration that can be built. Failed
	 * attempts leave no steps behind.
	 */
	select(
		spec: Exclude<TypeSpec, Untyped>,
		path: readonly AnyTag[],
		overridden: ReadonlySet<AnyTag>
	): Selection {
		const { alternatives, optional } = expandSpec(spec);
		const reasons: string[] = [];
		for (const alternative of alternatives) {
			const snapshot = new Map(this.steps);
			const visited = this.visit(alternative, path, overridden);
			if (visited.ok) {
				return visited;
			}
			this.steps = snapshot;
			reasons.push(visited.reason);
		}
		if (optional) {
			return { ok: true, key: null };
		}
		return {
			ok: false,
			reason:
				alternatives.length === 1
					? (reasons[0] ?? '')
					: `no alternative of ${describeSpec(spec)} can be built (${reasons.join('; ')})`,
		};
	}

	private overrideFor(type: AnyTag): AnyPageClass | undefined {
		if (!this.overrides.has(type)) {
			this.overrides.set(type, this.rules.overrideFor(this.url, type));
		}
		return this.overrides.get(type);
	}

	private visit(
		requested: AnyTag,
		path: readonly AnyTag[],
		overridden: ReadonlySet<AnyTag>
	): Visit {
		let type = requested;
		let innerOverridden = overridden;
		if (!overridden.has(requested)) {
			const replacement = this.overrideFor(requested);
			if (replacement !== undefined) {
				type = replacement;
				// The replacement may itself depend on the type it replaces
				innerOverridden = new Set([...overridden, requested]);
			}
		}

		if (path.includes(type)) {
			throw new ProviderDependencyDeadlockError(
				[...path.slice(path.indexOf(type)), type].map((t) => Tag.name(t))
			);
		}
		if (this.steps.has(type)) {
			return { ok: true, key: type };
		}

		if (!isInjectable(type) && this.providers.isProvided(type)) {
			this.steps.set(type, { kind: 'provided', type });
			return { ok: true, key: type };
		}

		const nested = [...path, type];
		if (isInjectable(type)) {
			const inputs = new Map<string, AnyTag | null>();
			for (const [name, spec] of Object.entries(type.dependencies)) {
				const selected = this.select(spec, nested, innerOverridden);
				if (!selected.ok) {
					return {
						ok: false,
						reason: `${Tag.name(type)}.${name}: ${selected.reason}`,
					};
				}
				inputs.set(name, selected.key);
			}
			this.steps.set(type, { kind: 'page', type, source: requested, inputs });
			return { ok: true, key: type };
		}

		const page = this.rules.itemProviderFor(this.url, type);
		if (page !== undefined) {
			const selected = this.select(page, nested, innerOverridden);
			if (!selected.ok) {
				return selected;
			}
			this.steps.set(type, {
				kind: 'builder',
				type,
				inputs: new Map([['page', selected.key]]),
				build: ({ page: instance }) => {
					if (!hasToItem(instance)) {
						throw new InjectionError(
							`${Tag.name(page)} cannot return ${Tag.name(type)}: it has no toItem() method`
						);
					}
					return instance.toItem();
				},
			});
			return { ok: true, key: type };
		}

		if (type === DynamicDeps) {
			return this.visitDynamicDeps(nested, innerOverridden);
		}

		return {
			ok: false,
			reason: `no provider, page object or rule can build ${Tag.name(type)}`,
		};
	}

	private visitDynamicDeps(
		path: readonly AnyTag[],
		overridden: ReadonlySet<AnyTag>
	): Visit {
		const inputs = new Map<string, AnyTag | null>();
		for (const [index, type] of this.inject.entries()) {
			const selected = this.select(type, path, overridden);
			if (!selected.ok) {
				return { ok: false, reason: `DynamicDeps: ${selected.reason}` };
			}
			inputs.set(String(index), selected.key);
		}
		const injected = this.inject;
		this.steps.set(DynamicDeps, {
			kind: 'builder',
			type: DynamicDeps,
			inputs,
			build: (values) =>
				new Map(
					injected.map((type, index): [AnyTag, unknown] => [
						type,
						values[String(index)],
					])
				),
		});
		return { ok: true, key: DynamicDeps };
	}
}

/**
 * Builds dependency plans for callbacks.
 *
 * Each parameter is planned in declaration order. Every type is looked up
 * once for a URL override; a replacement's own dependencies are planned with
 * the overrides of the types replaced on the way there left out, so that a
 * replacement can depend on the type it replaces.
 *
 * @example
 * ```typescript
 * const planner = new Planner(providers, rules);
 * const plan = planner.buildPlan(parse.signature, 'https://books.toscrape.com/');
 * plan.steps.map((step) => Tag.name(step.type)); // ['HttpResponse', 'BookPage']
 * ```
 */
export class Planner {
	constructor(
		private readonly providers: ProviderRegistry,
		private readonly rules: RulesRegistry
	) {}

	/**
	 * @throws {ProviderDependencyDeadlockError} If page objects depend on each other
	 * @throws {InjectionError} If a parameter other than the leading one is untyped
	 */
	buildPlan(signature: CallbackSignature, target: PlanTarget): Plan {
		const url = typeof target === 'string' ? target : target.url;
		const inject = typeof target === 'string' ? [] : (target.inject ?? []);
		const builder = new PlanBuilder(this.providers, this.rules, url, inject);

		const params = new Map<string, AnyTag | null>();
		const missing = new Map<string, string>();
		let responseParam: string | undefined;

		for (const [index, [name, spec]] of signature.entries()) {
			if (index === 0 && isResponseSpec(spec)) {
				responseParam = name;
				continue;
			}
			if (spec === Untyped) {
				throw new InjectionError(
					`Parameter '${name}' has no type; only the leading parameter may be untyped`,
					{ detail: { parameter: name } }
				);
			}
			const selected = builder.select(spec, [], new Set());
			if (selected.ok) {
				params.set(name, selected.key);
			} else {
				missing.set(name, selected.reason);
			}
		}

		return {
			url,
			steps: [...builder.steps.values()],
			params,
			responseParam,
			missing,
		};
	}
}
