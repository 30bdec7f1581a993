import { Patterns, UrlMatcher } from '@/url-matcher.js';
import { describe, expect, it } from 'vitest';

describe('Patterns', () => {
	describe('matches', () => {
		it('should match a domain and its subdomains', () => {
			const patterns = new Patterns(['example.com']);

			expect(patterns.matches('https://example.com/')).toBe(true);
			expect(patterns.matches('https://shop.example.com/books')).toBe(true);
			expect(patterns.matches('https://notexample.com/')).toBe(false);
		});

		it('should accept a wildcard subdomain prefix', () => {
			const patterns = new Patterns(['*.example.com']);

			expect(patterns.matches('https://shop.example.com/')).toBe(true);
		});

		it('should match paths by prefix', () => {
			const patterns = new Patterns(['example.com/books']);

			expect(patterns.matches('https://example.com/books/1')).toBe(true);
			expect(patterns.matches('https://example.com/music')).toBe(false);
		});

		it('should expand wildcards in paths', () => {
			const patterns = new Patterns(['example.com/*/reviews']);

			expect(patterns.matches('https://example.com/books/1/reviews')).toBe(true);
			expect(patterns.matches('https://example.com/books/1')).toBe(false);
		});

		it('should require every query entry', () => {
			const patterns = new Patterns(['example.com?page=2']);

			expect(patterns.matches('https://example.com/list?sort=asc&page=2')).toBe(
				true
			);
			expect(patterns.matches('https://example.com/list?page=3')).toBe(false);
		});

		it('should compare schemes and ports when given', () => {
			expect(
				new Patterns(['https://example.com']).matches('http://example.com/')
			).toBe(false);
			expect(
				new Patterns(['example.com:8080']).matches('http://example.com:8080/')
			).toBe(true);
			expect(new Patterns(['example.com:443']).matches('https://example.com/')).toBe(
				true
			);
			expect(new Patterns(['example.com:8080']).matches('http://example.com/')).toBe(
				false
			);
		});

		it('should match everything without include patterns', () => {
			expect(new Patterns().matches('https://anything.org/x')).toBe(true);
			expect(new Patterns(['']).matches('https://anything.org/x')).toBe(true);
		});

		it('should let excludes win over includes', () => {
			const patterns = new Patterns(['example.com'], ['example.com/private']);

			expect(patterns.matches('https://example.com/public')).toBe(true);
			expect(patterns.matches('https://example.com/private/1')).toBe(false);
		});

		it('should never match URLs that cannot be parsed', () => {
			expect(new Patterns().matches('not a url')).toBe(false);
		});
	});

	it('should compare by value', () => {
		const a = new Patterns(['example.com'], ['example.com/x'], 600);

		expect(a.equals(new Patterns(['example.com'], ['example.com/x'], 600))).toBe(
			true
		);
		expect(a.equals(new Patterns(['example.com'], ['example.com/x']))).toBe(false);
		expect(a.equals(new Patterns(['example.org'], ['example.com/x'], 600))).toBe(
			false
		);
	});

	it('should describe itself', () => {
		expect(new Patterns(['a.com'], ['a.com/x'], 600).toString()).toBe(
			'Patterns(include=[a.com], exclude=[a.com/x], priority=600)'
		);
		expect(new Patterns(['a.com']).toString()).toBe(
			'Patterns(include=[a.com], priority=500)'
		);
	});
});

describe('UrlMatcher', () => {
	it('should pick the matching patterns with the highest priority', () => {
		const matcher = new UrlMatcher<string>();
		matcher.addOrUpdate('generic', new Patterns(['example.com'], [], 500));
		matcher.addOrUpdate('books', new Patterns(['example.com/books'], [], 600));

		expect(matcher.match('https://example.com/books/1')).toBe('books');
		expect(matcher.match('https://example.com/music')).toBe('generic');
		expect(matcher.match('https://other.org/')).toBeUndefined();
	});

	it('should prefer the entry added last on equal priority', () => {
		const matcher = new UrlMatcher<number>();
		matcher.addOrUpdate(1, new Patterns(['example.com']));
		matcher.addOrUpdate(2, new Patterns(['example.com']));

		expect(matcher.match('https://example.com/')).toBe(2);

		matcher.addOrUpdate(1, new Patterns(['example.com']));
		expect(matcher.match('https://example.com/')).toBe(1);
	});
});
