export {
  buildCriteria,
  buildSearchOptions,
  detectSearchMode,
  type SearchRequest,
  type SearchSettings,
  simpleSearch,
  splitKeywords,
  toSearchOptions,
} from './builder.js'
export { DEFAULT_SEARCH_FIELDS, escapeRegExp, SearchCriteria } from './criteria.js'
export {
  DEFAULT_SEARCH_OPTIONS,
  DEFAULT_TIMEOUT_MS,
  resolveSearchOptions,
  sortMatches,
  ToolSearchOrchestrator,
  type ToolSearchOrchestratorOptions,
} from './orchestrator.js'
export { extractSchemaText, isJsonObject, toJsonObject, toJsonValue } from './schema-text.js'
