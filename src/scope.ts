import type { AnyTag, TagType } from './tag.js';

/**
 * Instances built for one request, handed from one resolution to the next.
 *
 * Providers only run for types the scope does not hold yet, so a callback and
 * the callbacks scheduled from it for the same request share page inputs.
 * The owner of the request creates the scope and drops it with the request.
 */
export class InstanceScope {
	private readonly instances = new Map<AnyTag, unknown>();

	has(tag: AnyTag): boolean {
		return this.instances.has(tag);
	}

	get<T extends AnyTag>(tag: T): TagType<T> | undefined;
	get(tag: AnyTag): unknown {
		return this.instances.get(tag);
	}

	set<T extends AnyTag>(tag: T, value: TagType<T>): void {
		this.instances.set(tag, value);
	}

	entries(): IterableIterator<[AnyTag, unknown]> {
		return this.instances.entries();
	}

	get size(): number {
		return this.instances.size;
	}

	clear(): void {
		this.instances.clear();
	}
}
