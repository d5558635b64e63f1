/**
 * External collaborators: completion and search providers.
 */

export { ProviderError, errorMessage, type ProviderErrorOptions } from "./errors.js";
export type { CompletionProvider, CompletionOptions, Completion } from "./completion.js";
export type { SearchProvider, SearchProviders, SearchOptions } from "./search.js";
export {
  OpenAICompletionProvider,
  type CreateResponseFn,
  type ResponseRequest,
  type ResponseLike,
} from "./openai-completion.js";
export {
  VectorStoreSearchProvider,
  hitToSearchResult,
  type SearchVectorStoreFn,
  type VectorStoreHit,
} from "./vector-store-search.js";
export {
  WebSearchProvider,
  SERPER_ENDPOINT,
  type FetchFn,
  type WebSearchOptions,
} from "./web-search.js";
