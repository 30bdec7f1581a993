import { z } from 'zod/v4';
import { InjectionError, RegistrySealedError } from './errors.js';
import defaultLogger, { type Logger } from './logger.js';
import { type AnyPageClass, isInjectable, pageReturns } from './page.js';
import { type AnyTag, Tag } from './tag.js';
import { Patterns, UrlMatcher } from './url-matcher.js';

const TagSchema = z.custom<AnyTag>((value) => Tag.isTag(value), {
	message: 'Expected a type descriptor',
});

const ApplyRuleSchema = z.object({
	forPatterns: z.union([
		z.string(),
		z.array(z.string()),
		z.instanceof(Patterns),
	]),
	use: z.custom<AnyPageClass>((value) => isInjectable(value), {
		message: 'Expected a page object class',
	}),
	insteadOf: TagSchema.optional(),
	toReturn: TagSchema.optional(),
	meta: z.record(z.string(), z.unknown()).optional(),
});

export type ApplyRuleInit = z.input<typeof ApplyRuleSchema>;

/**
 * Tells the injector to use a page object for the URLs matched by
 * `forPatterns`, either in place of another type (`insteadOf`) or whenever
 * an item type is requested (`toReturn`, defaulting to the type the page
 * declares it returns).
 *
 * @example
 * ```typescript
 * new ApplyRule({
 *   forPatterns: 'toscrape.com',
 *   use: ToscrapeBookPage,
 *   insteadOf: GenericBookPage,
 * });
 * ```
 */
export class ApplyRule {
	readonly forPatterns: Patterns;
	readonly use: AnyPageClass;
	readonly insteadOf: AnyTag | undefined;
	readonly toReturn: AnyTag | undefined;
	readonly meta: Readonly<Record<string, unknown>>;

	/**
	 * @throws {InjectionError} If the rule is malformed
	 */
	constructor(init: ApplyRuleInit) {
		let parsed: z.output<typeof ApplyRuleSchema>;
		try {
			parsed = ApplyRuleSchema.parse(init);
		} catch (err) {
			throw new InjectionError('Invalid override rule', {
				cause: err,
				detail: err instanceof z.ZodError ? { issues: err.issues } : {},
			});
		}
		const { forPatterns } = parsed;
		this.forPatterns =
			forPatterns instanceof Patterns
				? forPatterns
				: new Patterns(
						typeof forPatterns === 'string' ? [forPatterns] : forPatterns
					);
		this.use = parsed.use;
		this.insteadOf = parsed.insteadOf;
		this.toReturn = parsed.toReturn ?? pageReturns(parsed.use);
		this.meta = Object.freeze({ ...parsed.meta });
	}

	toString(): string {
		const parts = [`forPatterns=${this.forPatterns.toString()}`];
		parts.push(`use=${Tag.name(this.use)}`);
		if (this.insteadOf !== undefined) {
			parts.push(`insteadOf=${Tag.name(this.insteadOf)}`);
		}
		if (this.toReturn !== undefined) {
			parts.push(`toReturn=${Tag.name(this.toReturn)}`);
		}
		return `ApplyRule(${parts.join(', ')})`;
	}
}

export type RuleQuery = {
	forPatterns?: Patterns;
	use?: AnyPageClass;
	insteadOf?: AnyTag;
	toReturn?: AnyTag;
};

export type RulesRegistryOptions = {
	rules?: Iterable<ApplyRule | ApplyRuleInit>;
	logger?: Logger;
};

/**
 * Override rules, indexed by target type.
 *
 * Each `insteadOf` target and each `toReturn` target has its own URL matcher,
 * so looking up one type only evaluates the patterns of the rules aimed at it.
 */
export class RulesRegistry {
	private readonly rules: ApplyRule[] = [];
	private readonly overrideMatchers = new Map<AnyTag, UrlMatcher<number>>();
	private readonly itemMatchers = new Map<AnyTag, UrlMatcher<number>>();
	private readonly logger: Logger;
	private sealed = false;

	constructor(options: RulesRegistryOptions = {}) {
		this.logger = options.logger ?? defaultLogger;
		for (const rule of options.rules ?? []) {
			this.add(rule);
		}
	}

	/**
	 * @throws {RegistrySealedError} If the registry is already in use
	 */
	add(rule: ApplyRule | ApplyRuleInit): ApplyRule {
		if (this.sealed) {
			throw new RegistrySealedError(
				'Cannot add rules: the rules registry is sealed'
			);
		}
		const applyRule = rule instanceof ApplyRule ? rule : new ApplyRule(rule);
		const id = this.rules.length;
		this.rules.push(applyRule);
		if (applyRule.insteadOf !== undefined) {
			this.index(this.overrideMatchers, applyRule.insteadOf, id, applyRule);
		}
		if (applyRule.toReturn !== undefined) {
			this.index(this.itemMatchers, applyRule.toReturn, id, applyRule);
		}
		return applyRule;
	}

	/**
	 * Replacement page objects for the URL, keyed by the type they replace.
	 */
	overridesFor(url: string): Map<AnyTag, AnyPageClass> {
		return this.rulesForUrl(url, this.overrideMatchers);
	}

	overrideFor(url: string, source: AnyTag): AnyPageClass | undefined {
		return this.ruleFor(url, this.overrideMatchers.get(source))?.use;
	}

	/**
	 * The page object able to return the item type for the URL, if any rule
	 * declares one.
	 */
	itemProviderFor(url: string, itemType: AnyTag): AnyPageClass | undefined {
		return this.ruleFor(url, this.itemMatchers.get(itemType))?.use;
	}

	getRules(): readonly ApplyRule[] {
		return [...this.rules];
	}

	/**
	 * Rules whose attributes equal every attribute in the query. Patterns are
	 * compared by value, types by identity.
	 */
	search(query: RuleQuery): ApplyRule[] {
		return this.rules.filter(
			(rule) =>
				(query.forPatterns === undefined ||
					rule.forPatterns.equals(query.forPatterns)) &&
				(query.use === undefined || rule.use === query.use) &&
				(query.insteadOf === undefined || rule.insteadOf === query.insteadOf) &&
				(query.toReturn === undefined || rule.toReturn === query.toReturn)
		);
	}

	seal(): this {
		this.sealed = true;
		return this;
	}

	private index(
		matchers: Map<AnyTag, UrlMatcher<number>>,
		target: AnyTag,
		id: number,
		rule: ApplyRule
	): void {
		let matcher = matchers.get(target);
		if (matcher === undefined) {
			matcher = new UrlMatcher();
			matchers.set(target, matcher);
		}
		for (const [otherId, patterns] of matcher.patterns) {
			const other = this.rules[otherId];
			if (other !== undefined && patterns.equals(rule.forPatterns)) {
				this.logger.warn(
					{ target: Tag.name(target), rules: [other.toString(), rule.toString()] },
					`Rules ${other.toString()} and ${rule.toString()} declare the same ` +
						`URL patterns for ${Tag.name(target)}; the one added last is used. ` +
						`Consider giving them different priorities`
				);
			}
		}
		matcher.addOrUpdate(id, rule.forPatterns);
	}

	private ruleFor(
		url: string,
		matcher: UrlMatcher<number> | undefined
	): ApplyRule | undefined {
		const id = matcher?.match(url);
		return id === undefined ? undefined : this.rules[id];
	}

	private rulesForUrl(
		url: string,
		matchers: Map<AnyTag, UrlMatcher<number>>
	): Map<AnyTag, AnyPageClass> {
		const result = new Map<AnyTag, AnyPageClass>();
		for (const [target, matcher] of matchers) {
			const rule = this.ruleFor(url, matcher);
			if (rule !== undefined) {
				result.set(target, rule.use);
			}
		}
		return result;
	}
}
