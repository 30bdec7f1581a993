export { MemoryCacheStore, SqliteCacheStore } from './cache.js';
export type {
	CacheEntry,
	CacheStore,
	SqliteCacheStoreOptions,
} from './cache.js';
export { callback, callbackFor } from './callback.js';
export type {
	ArgsOf,
	CallbackParams,
	InjectableCallback,
} from './callback.js';
export { DEFAULT_CACHE_PATH, loadSettings } from './config.js';
export type { InjectionSettings, RawSettings } from './config.js';
export {
	CONTEXT_TYPES,
	MemoryStats,
	Settings,
	StatsCollector,
} from './context.js';
export type { ResolutionContext, StatsSink } from './context.js';
export {
	BaseError,
	InjectionError,
	InjectorClosedError,
	MalformedProviderDeclaration,
	MissingSerializerError,
	NonCallableProviderError,
	ProviderDependencyDeadlockError,
	RegistrySealedError,
	ReplayedProviderError,
	ResolutionAbortedError,
	SettingsError,
	UndeclaredProvidedTypeError,
} from './errors.js';
export { CrawlRequest, CrawlResponse, DummyResponse } from './http.js';
export type { CrawlRequestInit, CrawlResponseInit, Headers } from './http.js';
export { Injector } from './injector.js';
export type {
	AnyCallback,
	FromSettingsOptions,
	InjectorOptions,
	RunOptions,
} from './injector.js';
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { InjectionMiddleware } from './middleware.js';
export { isInjectable, ItemPage, Page } from './page.js';
export type { AnyPageClass, Dependencies, InputsOf } from './page.js';
export {
	DynamicDeps,
	HttpRequest,
	HttpResponse,
	PageParams,
	RequestUrl,
	ResponseUrl,
	Stats,
} from './page-inputs.js';
export type {
	CallbackSignature,
	Plan,
	PlanStep,
	PlanTarget,
} from './plan.js';
export { Planner } from './planner.js';
export { ProviderRegistry } from './provider-registry.js';
export type { ProviderRegistryOptions } from './provider-registry.js';
export { PageInputProvider, provide } from './provider.js';
export type {
	InputProvider,
	ProvideOptions,
	Provided,
	ProvidedTypes,
} from './provider.js';
export {
	DEFAULT_PROVIDERS,
	HttpRequestProvider,
	HttpResponseProvider,
	PageParamsProvider,
	RequestUrlProvider,
	ResponseUrlProvider,
	StatsProvider,
} from './providers.js';
export { ResponseOracle } from './response-oracle.js';
export { defaultFingerprint, Resolver } from './resolver.js';
export type { Resolution, ResolveOptions, ResolverOptions } from './resolver.js';
export { fail, isRetry, ok, Retry, retry } from './result.js';
export type { Fail, Ok, Outcome } from './result.js';
export { ApplyRule, RulesRegistry } from './rules.js';
export type { ApplyRuleInit, RuleQuery, RulesRegistryOptions } from './rules.js';
export { InstanceScope } from './scope.js';
export { SerializationRegistry } from './serialization.js';
export type { ErrorSerializer, Serializer } from './serialization.js';
export { Tag } from './tag.js';
export type { AnnotatedTag, AnyTag, ClassTag, TagType, ValueTag } from './tag.js';
export { Optional, Union, Untyped } from './type-spec.js';
export type { TypeSpec } from './type-spec.js';
export type { PromiseOrValue } from './types.js';
export { Patterns, UrlMatcher } from './url-matcher.js';
