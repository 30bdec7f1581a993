import { InjectionError, RegistrySealedError } from '@/errors.js';
import type { Logger } from '@/logger.js';
import { Page } from '@/page.js';
import { HttpResponse } from '@/page-inputs.js';
import { ApplyRule, RulesRegistry } from '@/rules.js';
import { Patterns } from '@/url-matcher.js';
import { describe, expect, it, vi } from 'vitest';
import { Book, BookPage, BookUrlPage } from './fixtures.js';

class ToscrapeBookPage extends BookPage {}
class OtherBookPage extends BookPage {}

function mockLogger(): Logger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

describe('ApplyRule', () => {
	it('should normalize patterns and default toReturn to the page item type', () => {
		const rule = new ApplyRule({ forPatterns: 'toscrape.com', use: BookPage });

		expect(rule.forPatterns.equals(new Patterns(['toscrape.com']))).toBe(true);
		expect(rule.toReturn).toBe(Book);
		expect(rule.insteadOf).toBeUndefined();
		expect(rule.meta).toEqual({});
	});

	it('should keep an explicit toReturn and meta', () => {
		const rule = new ApplyRule({
			forPatterns: ['a.com', 'b.com'],
			use: BookUrlPage,
			toReturn: HttpResponse,
			meta: { owner: 'books-team' },
		});

		expect(rule.forPatterns.include).toEqual(['a.com', 'b.com']);
		expect(rule.toReturn).toBe(HttpResponse);
		expect(rule.meta).toEqual({ owner: 'books-team' });
	});

	it('should reject a rule whose page is not a page object', () => {
		const init = Object.assign(
			{ forPatterns: 'toscrape.com', use: BookPage },
			{ use: HttpResponse }
		);

		expect(() => new ApplyRule(init)).toThrow(InjectionError);
		expect(() => new ApplyRule(init)).toThrow('Invalid override rule');
	});

	it('should describe itself', () => {
		const rule = new ApplyRule({
			forPatterns: 'toscrape.com',
			use: ToscrapeBookPage,
			insteadOf: BookPage,
		});

		expect(rule.toString()).toBe(
			'ApplyRule(forPatterns=Patterns(include=[toscrape.com], priority=500), use=ToscrapeBookPage, insteadOf=BookPage, toReturn=Book)'
		);
	});
});

describe('RulesRegistry', () => {
	const url = 'https://books.toscrape.com/catalogue/1';

	it('should return overrides for matching URLs only', () => {
		const registry = new RulesRegistry({
			rules: [
				{ forPatterns: 'toscrape.com', use: ToscrapeBookPage, insteadOf: BookPage },
			],
			logger: mockLogger(),
		});

		expect(registry.overrideFor(url, BookPage)).toBe(ToscrapeBookPage);
		expect(registry.overrideFor('https://example.com/', BookPage)).toBeUndefined();
		expect(registry.overridesFor(url)).toEqual(new Map([[BookPage, ToscrapeBookPage]]));
	});

	it('should find the page object returning an item type', () => {
		const registry = new RulesRegistry({ logger: mockLogger() });
		registry.add({ forPatterns: 'toscrape.com', use: BookPage });

		expect(registry.itemProviderFor(url, Book)).toBe(BookPage);
		expect(registry.itemProviderFor('https://example.com/', Book)).toBeUndefined();
	});

	it('should prefer higher priorities', () => {
		const registry = new RulesRegistry({ logger: mockLogger() });
		registry.add({
			forPatterns: new Patterns(['toscrape.com'], [], 600),
			use: ToscrapeBookPage,
			insteadOf: BookPage,
		});
		registry.add({
			forPatterns: new Patterns(['toscrape.com'], [], 500),
			use: OtherBookPage,
			insteadOf: BookPage,
		});

		expect(registry.overrideFor(url, BookPage)).toBe(ToscrapeBookPage);
	});

	it('should warn about identical patterns and use the rule added last', () => {
		const logger = mockLogger();
		const registry = new RulesRegistry({ logger });
		registry.add({ forPatterns: 'toscrape.com', use: ToscrapeBookPage });
		registry.add({ forPatterns: 'toscrape.com', use: OtherBookPage });

		expect(logger.warn).toHaveBeenCalledTimes(1);
		expect(logger.warn).toHaveBeenCalledWith(
			expect.objectContaining({ target: 'Book' }),
			expect.stringContaining('declare the same URL patterns for Book')
		);
		expect(registry.itemProviderFor(url, Book)).toBe(OtherBookPage);
	});

	it('should not warn when priorities differ', () => {
		const logger = mockLogger();
		const registry = new RulesRegistry({ logger });
		registry.add({ forPatterns: 'toscrape.com', use: ToscrapeBookPage });
		registry.add({
			forPatterns: new Patterns(['toscrape.com'], [], 400),
			use: OtherBookPage,
		});

		expect(logger.warn).not.toHaveBeenCalled();
	});

	it('should search rules by attributes', () => {
		const registry = new RulesRegistry({ logger: mockLogger() });
		const first = registry.add({
			forPatterns: 'toscrape.com',
			use: ToscrapeBookPage,
			insteadOf: BookPage,
		});
		registry.add({ forPatterns: 'example.com', use: OtherBookPage });

		expect(registry.search({ use: ToscrapeBookPage })).toEqual([first]);
		expect(registry.search({ forPatterns: new Patterns(['toscrape.com']) })).toEqual([
			first,
		]);
		expect(registry.search({ toReturn: Book })).toHaveLength(2);
		expect(registry.getRules()).toHaveLength(2);
	});

	it('should refuse rules once sealed', () => {
		const registry = new RulesRegistry().seal();

		expect(() =>
			registry.add({ forPatterns: 'toscrape.com', use: BookPage })
		).toThrow(RegistrySealedError);
	});

	it('should accept rules on types that are not page objects', () => {
		class Listing extends Page({}) {}
		const registry = new RulesRegistry({ logger: mockLogger() });
		registry.add({ forPatterns: 'toscrape.com', use: Listing, insteadOf: HttpResponse });

		expect(registry.overrideFor(url, HttpResponse)).toBe(Listing);
	});
});
