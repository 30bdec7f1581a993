import {
	InjectionError,
	ProviderDependencyDeadlockError,
} from './errors.js';
import { type Dependencies, isInjectable } from './page.js';
import { type AnyTag, Tag } from './tag.js';
import { expandSpec } from './type-spec.js';

/**
 * How the dependencies of a provider are built from the resolution context:
 * `order` lists every type to instantiate, dependencies first, and `params`
 * maps each dependency name to the alternative that was chosen.
 */
export type ProviderDepsPlan = {
	readonly order: readonly AnyTag[];
	readonly params: ReadonlyMap<string, AnyTag | null>;
};

/**
 * Plans a provider's own dependencies against the context types. Page objects
 * are allowed as long as they are built from context types only.
 *
 * @throws {InjectionError} If a required dependency cannot be built from the context
 * @throws {ProviderDependencyDeadlockError} If page objects depend on each other
 */
export function planProviderDependencies(
	providerName: string,
	dependencies: Dependencies,
	contextTypes: ReadonlySet<AnyTag>
): ProviderDepsPlan {
	const order: AnyTag[] = [];
	const seen = new Set<AnyTag>();

	const visit = (type: AnyTag, path: AnyTag[]): boolean => {
		if (seen.has(type) || contextTypes.has(type)) {
			if (!seen.has(type)) {
				seen.add(type);
				order.push(type);
			}
			return true;
		}
		if (!isInjectable(type)) {
			return false;
		}
		if (path.includes(type)) {
			throw new ProviderDependencyDeadlockError(
				[...path.slice(path.indexOf(type)), type].map((t) => Tag.name(t))
			);
		}
		const nested = [...path, type];
		// A page that cannot be built leaves none of its inputs behind
		const mark = order.length;
		for (const spec of Object.values(type.dependencies)) {
			const { alternatives, optional } = expandSpec(spec);
			const ok = alternatives.some((alt) => visit(alt, nested));
			if (!ok && !optional) {
				for (const added of order.splice(mark)) {
					seen.delete(added);
				}
				return false;
			}
		}
		seen.add(type);
		order.push(type);
		return true;
	};

	const params = new Map<string, AnyTag | null>();
	for (const [name, spec] of Object.entries(dependencies)) {
		const { alternatives, optional } = expandSpec(spec);
		const chosen = alternatives.find((alt) => visit(alt, [])) ?? null;
		if (chosen === null && !optional) {
			throw new InjectionError(
				`Provider ${providerName} depends on ${name}: ` +
					`${alternatives.map((alt) => Tag.name(alt)).join(' | ')}, ` +
					`which is not available to providers`,
				{ detail: { provider: providerName, dependency: name } }
			);
		}
		params.set(name, chosen);
	}
	return { order, params };
}

/**
 * Instantiates a planned set of provider dependencies from the context
 * instances.
 * @internal
 */
export function buildProviderDependencies(
	plan: ProviderDepsPlan,
	instances: ReadonlyMap<AnyTag, unknown>
): Record<string, unknown> {
	const built = new Map(instances);
	for (const type of plan.order) {
		if (built.has(type) || !isInjectable(type)) {
			continue;
		}
		const inputs: Record<string, unknown> = {};
		for (const [name, spec] of Object.entries(type.dependencies)) {
			const { alternatives } = expandSpec(spec);
			const alt = alternatives.find((a) => built.has(a));
			inputs[name] = alt === undefined ? null : built.get(alt);
		}
		built.set(type, new type(inputs));
	}
	const deps: Record<string, unknown> = {};
	for (const [name, type] of plan.params) {
		deps[name] = type === null ? null : built.get(type);
	}
	return deps;
}
