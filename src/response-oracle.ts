import { CrawlResponse } from './http.js';
import {
	type CallbackSignature,
	type Plan,
	type PlanTarget,
	providedTypes,
} from './plan.js';
import { Planner } from './planner.js';
import { ProviderRegistry } from './provider-registry.js';
import { Untyped } from './type-spec.js';

/**
 * Decides whether a request's download can be skipped.
 *
 * The response is needed when the callback takes it untyped or as a
 * `CrawlResponse`, or when any provider the plan calls depends on it.
 * Declaring the leading parameter as `DummyResponse` leaves the decision to
 * the providers.
 */
export class ResponseOracle {
	constructor(
		private readonly providers: ProviderRegistry,
		private readonly planner: Planner
	) {}

	isResponseRequired(
		signature: CallbackSignature,
		planOrTarget: Plan | PlanTarget
	): boolean {
		const leading = signature[0];
		if (leading !== undefined) {
			const [, spec] = leading;
			if (spec === Untyped || spec === CrawlResponse) {
				return true;
			}
		}
		const plan =
			typeof planOrTarget === 'string' || !('steps' in planOrTarget)
				? this.planner.buildPlan(signature, planOrTarget)
				: planOrTarget;
		const assigned = this.providers.providersFor(providedTypes(plan));
		for (const provider of assigned.keys()) {
			if (this.providers.requiresResponse(provider)) {
				return true;
			}
		}
		return false;
	}
}
