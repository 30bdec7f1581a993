import { MemoryCacheStore } from '@/cache.js';
import { callback, type CallbackParams } from '@/callback.js';
import {
	InjectionError,
	ResolutionAbortedError,
	UndeclaredProvidedTypeError,
} from '@/errors.js';
import { silentLogger } from '@/logger.js';
import { HttpResponse } from '@/page-inputs.js';
import type { Plan } from '@/plan.js';
import { Planner } from '@/planner.js';
import { ProviderRegistry } from '@/provider-registry.js';
import {
	PageInputProvider,
	provide,
	type Provided,
	type ProvideOptions,
} from '@/provider.js';
import { type Resolution, Resolver } from '@/resolver.js';
import { RulesRegistry } from '@/rules.js';
import { InstanceScope } from '@/scope.js';
import { type AnyTag, Tag } from '@/tag.js';
import { describe, expect, it } from 'vitest';
import {
	BOOK_URL,
	BookPage,
	defaultRegistry,
	makeContext,
	RetryingPage,
	RetryItem,
	Unprovided,
} from './fixtures.js';

const Price = Tag.of('Price')<string>();
const Currency = Tag.of('Currency')<string>();

class PriceProvider extends PageInputProvider({}) {
	readonly name = 'price';
	readonly provides = new Set<AnyTag>([Price, Currency]);
	readonly calls: ReadonlySet<AnyTag>[] = [];

	provide(toProvide: ReadonlySet<AnyTag>): Provided[] {
		this.calls.push(toProvide);
		const results: Provided[] = [];
		if (toProvide.has(Price)) results.push(provide(Price, '10'));
		if (toProvide.has(Currency)) results.push(provide(Currency, 'EUR'));
		return results;
	}
}

class FallbackPriceProvider extends PageInputProvider({}) {
	readonly name = 'fallback_price';
	readonly provides = new Set<AnyTag>([Price]);

	provide(): Provided[] {
		return [provide(Price, '99')];
	}
}

function planFor(
	registry: ProviderRegistry,
	params: CallbackParams,
	rules = new RulesRegistry({ logger: silentLogger })
): Plan {
	return new Planner(registry, rules).buildPlan(
		callback(params, () => null).signature,
		BOOK_URL
	);
}

function kwargsOf(resolution: Resolution): Record<string, unknown> {
	if (resolution.kind !== 'ok') {
		throw new Error(`Unexpected retry: ${resolution.reason}`);
	}
	return resolution.value;
}

describe('Resolver', () => {
	it('should build page objects from provided inputs', async () => {
		const registry = defaultRegistry();
		const context = makeContext();
		const resolver = new Resolver({ providers: registry, logger: silentLogger });

		const kwargs = kwargsOf(
			await resolver.resolve(planFor(registry, { page: BookPage }), context)
		);

		const page = kwargs['page'];
		expect(page).toBeInstanceOf(BookPage);
		if (!(page instanceof BookPage)) return;
		expect(page.toItem()).toEqual({ title: 'Dune', price: '£12.50' });
		expect(context.stats.get('pagewright/injector/BookPage')).toBe(1);
	});

	it('should ask the provider with the highest precedence', async () => {
		const registry = new ProviderRegistry()
			.register(new FallbackPriceProvider(), 600)
			.register(new PriceProvider(), 200);
		const resolver = new Resolver({ providers: registry, logger: silentLogger });

		const kwargs = kwargsOf(
			await resolver.resolve(planFor(registry, { price: Price }), makeContext())
		);

		expect(kwargs).toEqual({ price: '10' });
	});

	it('should not depend on the order providers are registered in', async () => {
		const registry = new ProviderRegistry()
			.register(new PriceProvider(), 2)
			.register(new FallbackPriceProvider(), 1);
		const resolver = new Resolver({ providers: registry, logger: silentLogger });

		const kwargs = kwargsOf(
			await resolver.resolve(planFor(registry, { price: Price }), makeContext())
		);

		expect(kwargs).toEqual({ price: '99' });
	});

	it('should call each provider once with every type it is needed for', async () => {
		const provider = new PriceProvider();
		const registry = new ProviderRegistry().register(provider);
		const resolver = new Resolver({ providers: registry, logger: silentLogger });

		const kwargs = kwargsOf(
			await resolver.resolve(
				planFor(registry, { price: Price, currency: Currency }),
				makeContext()
			)
		);

		expect(kwargs).toEqual({ price: '10', currency: 'EUR' });
		expect(provider.calls).toEqual([new Set([Price, Currency])]);
	});

	it('should share an instance between annotations of the same type', async () => {
		class AnyPriceProvider extends PageInputProvider({}) {
			readonly name = 'any_price';
			readonly provides = (type: AnyTag) => Tag.base(type) === Price;
			calls = 0;

			provide(): Provided[] {
				this.calls += 1;
				return [provide(Price, '10')];
			}
		}
		const provider = new AnyPriceProvider();
		const registry = new ProviderRegistry().register(provider);
		const resolver = new Resolver({ providers: registry, logger: silentLogger });
		const plan = planFor(registry, {
			net: Tag.annotated(Price, 'net'),
			gross: Tag.annotated(Price, 'gross'),
		});

		const kwargs = kwargsOf(await resolver.resolve(plan, makeContext()));

		expect(kwargs).toEqual({ net: '10', gross: '10' });
		expect(provider.calls).toBe(1);
	});

	it('should share a plain instance with annotations requested beside it', async () => {
		class AnyPriceProvider extends PageInputProvider({}) {
			readonly name = 'any_price';
			readonly provides = (type: AnyTag) => Tag.base(type) === Price;

			provide(): Provided[] {
				return [provide(Price, '10')];
			}
		}
		const registry = new ProviderRegistry().register(new AnyPriceProvider());
		const resolver = new Resolver({ providers: registry, logger: silentLogger });
		const plan = planFor(registry, { plain: Price, net: Tag.annotated(Price, 'net') });

		const kwargs = kwargsOf(await resolver.resolve(plan, makeContext()));

		expect(kwargs).toEqual({ plain: '10', net: '10' });
	});

	it('should prefer annotated instances a provider returns itself', async () => {
		const Net = Tag.annotated(Price, 'net');
		class NetPriceProvider extends PageInputProvider({}) {
			readonly name = 'net_price';
			readonly provides = new Set<AnyTag>([Price, Net]);

			provide(): Provided[] {
				return [provide(Price, '10'), provide(Net, '8')];
			}
		}
		const registry = new ProviderRegistry().register(new NetPriceProvider());
		const resolver = new Resolver({ providers: registry, logger: silentLogger });
		const plan = planFor(registry, { gross: Price, net: Net });

		const kwargs = kwargsOf(await resolver.resolve(plan, makeContext()));

		expect(kwargs).toEqual({ gross: '10', net: '8' });
	});

	it('should reject instances of types that were not requested', async () => {
		class LeakyProvider extends PageInputProvider({}) {
			readonly name = 'leaky';
			readonly provides = new Set<AnyTag>([Price]);

			provide(): Provided[] {
				return [provide(Price, '10'), provide(Currency, 'EUR')];
			}
		}
		const registry = new ProviderRegistry().register(new LeakyProvider());
		const resolver = new Resolver({ providers: registry, logger: silentLogger });
		const plan = planFor(registry, { price: Price });

		await expect(resolver.resolve(plan, makeContext())).rejects.toThrow(
			UndeclaredProvidedTypeError
		);
		await expect(resolver.resolve(plan, makeContext())).rejects.toThrow(
			'LeakyProvider(leaky) has returned instances of types [Currency] that are not among the requested types: [Price]'
		);
	});

	it('should reject providers that leave a requested type out', async () => {
		class ForgetfulProvider extends PageInputProvider({}) {
			readonly name = 'forgetful';
			readonly provides = new Set<AnyTag>([Price]);

			provide(): Provided[] {
				return [];
			}
		}
		const registry = new ProviderRegistry().register(new ForgetfulProvider());
		const resolver = new Resolver({ providers: registry, logger: silentLogger });

		await expect(
			resolver.resolve(planFor(registry, { price: Price }), makeContext())
		).rejects.toThrow('ForgetfulProvider(forgetful) did not return instances of [Price]');
	});

	it('should refuse plans with parameters that cannot be built', async () => {
		const registry = defaultRegistry();
		const resolver = new Resolver({ providers: registry, logger: silentLogger });
		const plan = planFor(registry, { value: Unprovided });

		await expect(resolver.resolve(plan, makeContext())).rejects.toThrow(InjectionError);
		await expect(resolver.resolve(plan, makeContext())).rejects.toThrow(
			`Cannot build the arguments for ${BOOK_URL}: value (no provider, page object or rule can build Unprovided)`
		);
	});

	it('should propagate provider errors', async () => {
		const failure = new Error('upstream unavailable');
		class FailingProvider extends PageInputProvider({}) {
			readonly name = 'failing';
			readonly provides = new Set<AnyTag>([Price]);

			provide(): Provided[] {
				throw failure;
			}
		}
		const registry = new ProviderRegistry().register(new FailingProvider());
		const resolver = new Resolver({ providers: registry, logger: silentLogger });

		await expect(
			resolver.resolve(planFor(registry, { price: Price }), makeContext())
		).rejects.toBe(failure);
	});

	it('should return the retry a page object asks for', async () => {
		const registry = defaultRegistry();
		const rules = new RulesRegistry({ logger: silentLogger });
		rules.add({ forPatterns: 'toscrape.com', use: RetryingPage });
		const resolver = new Resolver({ providers: registry, logger: silentLogger });
		const plan = planFor(registry, { item: RetryItem }, rules);

		const empty = await resolver.resolve(plan, makeContext(BOOK_URL, ''));
		const filled = await resolver.resolve(plan, makeContext(BOOK_URL, 'Dune'));

		expect(empty).toEqual(expect.objectContaining({ kind: 'retry', reason: 'empty body' }));
		expect(kwargsOf(filled)).toEqual({ item: { title: 'Dune' } });
	});

	describe('scopes', () => {
		it('should reuse instances held by the scope', async () => {
			const registry = defaultRegistry();
			const resolver = new Resolver({ providers: registry, logger: silentLogger });
			const plan = planFor(registry, { response: HttpResponse });
			const scope = new InstanceScope();

			const first = kwargsOf(
				await resolver.resolve(plan, makeContext(BOOK_URL, 'first'), { scope })
			);
			const second = kwargsOf(
				await resolver.resolve(plan, makeContext(BOOK_URL, 'second'), { scope })
			);

			expect(scope.get(HttpResponse)?.body).toBe('first');
			expect(second['response']).toBe(first['response']);
		});
	});

	describe('cancellation', () => {
		it('should not call providers once the signal is aborted', async () => {
			const provider = new PriceProvider();
			const registry = new ProviderRegistry().register(provider);
			const resolver = new Resolver({ providers: registry, logger: silentLogger });
			const controller = new AbortController();
			controller.abort();

			await expect(
				resolver.resolve(planFor(registry, { price: Price }), makeContext(), {
					signal: controller.signal,
				})
			).rejects.toThrow(ResolutionAbortedError);
			expect(provider.calls).toEqual([]);
		});

		it('should discard results of a provider aborted while running', async () => {
			const controller = new AbortController();
			class SlowProvider extends PageInputProvider({}) {
				readonly name = 'slow';
				readonly provides = new Set<AnyTag>([Price]);

				async provide(
					_toProvide: ReadonlySet<AnyTag>,
					_deps: unknown,
					{ signal }: ProvideOptions
				): Promise<Provided[]> {
					controller.abort();
					expect(signal?.aborted).toBe(true);
					return [provide(Price, '10')];
				}
			}
			const registry = new ProviderRegistry().register(new SlowProvider());
			const cache = new MemoryCacheStore();
			const resolver = new Resolver({
				providers: registry,
				cache,
				logger: silentLogger,
			});

			await expect(
				resolver.resolve(planFor(registry, { price: Price }), makeContext(), {
					signal: controller.signal,
				})
			).rejects.toThrow(ResolutionAbortedError);
			expect(cache.size).toBe(0);
		});
	});
});
