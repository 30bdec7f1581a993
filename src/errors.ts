export type ErrorProps = {
	cause?: unknown;
	detail?: Record<string, unknown>;
};

export type ErrorDump = {
	name: string;
	message: string;
	stack?: string;
	error: {
		name: string;
		message: string;
		detail: Record<string, unknown>;
		cause?: unknown;
	};
};

export class BaseError extends Error {
	detail: Record<string, unknown> | undefined;

	constructor(message: string, { cause, detail }: ErrorProps = {}) {
		super(message, { cause });
		this.name = this.constructor.name;
		this.detail = detail;
		// Use cause stack if available, otherwise fall back to the current error's stack
		if (cause instanceof Error && cause.stack !== undefined) {
			this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
		}
	}

	static ensure(error: unknown): BaseError {
		return error instanceof BaseError
			? error
			: new BaseError('An unknown error occurred', { cause: error });
	}

	dump(): ErrorDump {
		// Only show the stack trace of the top-level error
		const cause =
			this.cause instanceof BaseError
				? this.cause.dump().error
				: this.cause;

		const result: ErrorDump['error'] = {
			name: this.name,
			message: this.message,
			cause,
			detail: this.detail ?? {},
		};

		return {
			name: this.name,
			message: result.message,
			stack: this.stack,
			error: result,
		};
	}

	dumps(): string {
		return JSON.stringify(this.dump());
	}
}

/**
 * Base error class for every dependency injection failure.
 *
 * All injection errors are local to one plan or resolution; the crawl engine
 * decides whether that means dropping the item, retrying or failing the job.
 *
 * @example
 * ```typescript
 * try {
 *   await injector.resolve(plan, context);
 * } catch (error) {
 *   if (error instanceof InjectionError) {
 *     logger.error({ detail: error.detail }, error.message);
 *   }
 * }
 * ```
 */
export class InjectionError extends BaseError {}

/**
 * Thrown when a provider's `provides` declaration is neither a set of type
 * descriptors nor a predicate function.
 */
export class MalformedProviderDeclaration extends InjectionError {
	constructor(providerName: string, received: string) {
		super(
			`Unexpected declaration '${received}' for '${providerName}.provides'. ` +
				`Expected either a Set of types or a predicate function`,
			{ detail: { provider: providerName, received } }
		);
	}
}

/**
 * Thrown when a registered provider does not implement `provide()`.
 */
export class NonCallableProviderError extends InjectionError {
	constructor(providerName: string) {
		super(
			`The provider ${providerName} is not callable. It must implement a 'provide' method`,
			{ detail: { provider: providerName } }
		);
	}
}

/**
 * Thrown when a provider returns instances of types it was not asked for.
 *
 * @example
 * ```text
 * PriceProvider has returned instances of types [Name] that are not among
 * the requested types: [Price]
 * ```
 */
export class UndeclaredProvidedTypeError extends InjectionError {
	constructor(providerName: string, extra: string[], requested: string[]) {
		super(
			`${providerName} has returned instances of types [${extra.join(', ')}] ` +
				`that are not among the requested types: [${requested.join(', ')}]`,
			{ detail: { provider: providerName, extra, requested } }
		);
	}
}

/**
 * Thrown while planning when self-buildable types depend on each other.
 *
 * The message names the two representatives of the cycle (the type that
 * closed it and the one it was reached from) followed by the full chain.
 */
export class ProviderDependencyDeadlockError extends InjectionError {
	constructor(chain: string[]) {
		const first = chain[0] ?? '';
		const last = chain[chain.length - 2] ?? first;
		super(
			`Cyclic dependency between ${first} and ${last}: ${chain.join(' -> ')}`,
			{ detail: { chain } }
		);
	}
}

/**
 * Thrown when registering into a registry that an injector already uses.
 */
export class RegistrySealedError extends InjectionError {}

/**
 * Thrown when caching is enabled and a provided type has no serializer.
 */
export class MissingSerializerError extends InjectionError {
	constructor(typeName: string) {
		super(
			`No serializer registered for ${typeName}; cached providers can only provide serializable types`,
			{ detail: { type: typeName } }
		);
	}
}

/**
 * Thrown when a resolution is cancelled through its abort signal.
 */
export class ResolutionAbortedError extends InjectionError {
	constructor(reason: unknown) {
		super('Resolution aborted', { cause: reason });
	}
}

/**
 * Thrown when an injector is used after `close()`.
 */
export class InjectorClosedError extends InjectionError {
	constructor() {
		super('Cannot use the injector after it has been closed');
	}
}

/**
 * Thrown on a cache hit for a persisted provider failure whose error class has
 * no registered serializer. It carries the original class name, error name
 * and message.
 */
export class ReplayedProviderError extends BaseError {
	/** Constructor name of the error the provider threw. */
	readonly type: string;

	constructor(type: string, name: string, message: string, fingerprint: string) {
		super(message, { detail: { fingerprint, type, replayed: true } });
		this.type = type;
		this.name = name;
	}
}

/**
 * Thrown when settings fail validation.
 */
export class SettingsError extends BaseError {}
