import type { ProviderDescriptor, SearchMode, SearchOptions, ToolSearchResult } from '../types/index.js'
import type { ToolSearchOrchestrator } from './orchestrator.js'
import { SearchCriteria } from './criteria.js'
import { DEFAULT_SEARCH_OPTIONS, resolveSearchOptions } from './orchestrator.js'

/**
 * Characters that make a query look like a regular expression
 */
const REGEX_HINTS = ['^', '$', '*', '+', '?', '|', '[', '(']

/**
 * Free-form search request, before mode detection
 */
export interface SearchRequest {
  query?: string
  /** Explicit keywords force keyword mode and ignore `query` */
  keywords?: readonly string[]
}

/**
 * Convenience settings folded into `SearchOptions`
 */
export interface SearchSettings {
  limit?: number
  timeoutSeconds?: number | null
  sortBy?: 'server' | 'tool' | 'none'
  /** Abort on the first invalid or failing provider */
  failFast?: boolean
}

/**
 * Guess the search mode a free-form query asks for
 */
export function detectSearchMode(query: string): SearchMode {
  if (REGEX_HINTS.some(hint => query.includes(hint))) {
    return 'regex'
  }
  if (query.includes(',')) {
    return 'keywords'
  }
  return 'substring'
}

/**
 * Split a comma-separated query into trimmed, non-empty keywords
 */
export function splitKeywords(query: string): string[] {
  return query
    .split(',')
    .map(keyword => keyword.trim())
    .filter(keyword => keyword.length > 0)
}

/**
 * Build criteria from a free-form request.
 *
 * - explicit keywords: keyword mode
 * - query with `^ $ * + ? | [ (`: regex mode
 * - query with commas: keyword mode over the comma-separated parts
 * - any other query: substring mode
 * - nothing: match everything
 */
export function buildCriteria(request: SearchRequest = {}): SearchCriteria {
  if (request.keywords !== undefined) {
    return SearchCriteria.withKeywords(request.keywords)
  }

  const query = request.query
  if (query === undefined) {
    return SearchCriteria.matchAll()
  }

  switch (detectSearchMode(query)) {
    case 'regex':
      return SearchCriteria.withRegex(query)
    case 'keywords':
      return SearchCriteria.withKeywords(splitKeywords(query))
    default:
      return SearchCriteria.withQuery(query)
  }
}

/**
 * Translate convenience settings into search options, leaving unset ones out
 * so the orchestrator's own defaults still apply
 */
export function toSearchOptions(settings: SearchSettings = {}): Partial<SearchOptions> {
  const options: Partial<SearchOptions> = {}

  if (settings.limit !== undefined) {
    options.maxResults = settings.limit
  }
  if (settings.timeoutSeconds !== undefined) {
    options.timeoutMs = settings.timeoutSeconds === null ? null : settings.timeoutSeconds * 1000
  }
  if (settings.sortBy !== undefined) {
    options.sortOrder = settings.sortBy === 'tool'
      ? 'tool-then-server'
      : settings.sortBy === 'server' ? 'server-then-tool' : 'none'
  }
  if (settings.failFast !== undefined) {
    options.continueOnError = !settings.failFast
  }

  return options
}

/**
 * Fold convenience settings over the default search options
 */
export function buildSearchOptions(settings: SearchSettings = {}): SearchOptions {
  return resolveSearchOptions(toSearchOptions(settings), DEFAULT_SEARCH_OPTIONS)
}

/**
 * Search with a free-form query, detecting the mode automatically
 */
export async function simpleSearch(
  orchestrator: ToolSearchOrchestrator,
  providers: readonly ProviderDescriptor[],
  query: string,
  settings?: SearchSettings,
): Promise<ToolSearchResult> {
  return orchestrator.search(providers, buildCriteria({ query }), toSearchOptions(settings))
}
