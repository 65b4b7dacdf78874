// Core types
export * from './types/index.js'

// Errors
export {
  PatternError,
  ProviderError,
  type ProviderErrorKind,
  SearchError,
  toError,
  ToolSearchError,
  ValidationError,
} from './errors.js'

// Providers
export type { ListToolsOptions, ToolLister } from './provider/lister.js'
export { SUPPORTED_URL_SCHEMES, validateProvider, type ValidationResult } from './provider/validation.js'

// Search
export {
  buildCriteria,
  buildSearchOptions,
  DEFAULT_SEARCH_FIELDS,
  DEFAULT_SEARCH_OPTIONS,
  DEFAULT_TIMEOUT_MS,
  detectSearchMode,
  escapeRegExp,
  extractSchemaText,
  isJsonObject,
  resolveSearchOptions,
  SearchCriteria,
  simpleSearch,
  sortMatches,
  splitKeywords,
  toJsonObject,
  toJsonValue,
  toSearchOptions,
  ToolSearchOrchestrator,
} from './search/index.js'
export type { SearchRequest, SearchSettings, ToolSearchOrchestratorOptions } from './search/index.js'
