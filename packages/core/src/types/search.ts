import type { ProviderError, ValidationError } from '../errors.js'
import type { ToolRecord } from './tool.js'

/**
 * Ordering applied to matches before truncation
 */
export type SortOrder = 'server-then-tool' | 'tool-then-server' | 'none'

/**
 * Options for a search across providers
 */
export interface SearchOptions {
  /** Deadline per provider query in milliseconds; `null` disables it */
  timeoutMs?: number | null
  sortOrder: SortOrder
  /** Skip invalid or failing providers instead of failing the whole search */
  continueOnError: boolean
  /** Cap applied after sorting */
  maxResults?: number
}

/**
 * A tool that matched, with the provider that listed it
 */
export interface ToolMatch {
  providerName: string
  tool: ToolRecord
}

/**
 * Search result
 */
export interface ToolSearchResult {
  matches: ToolMatch[]
  /** Provider queries that failed but did not abort the search */
  errors: ProviderError[]
  /** Descriptors skipped because they failed validation */
  warnings: ValidationError[]
  queriedProviders: number
  totalTools: number
  searchTimeMs: number
}

/**
 * Per-provider progress reported by the orchestrator
 */
export type ProviderStatus = 'skipped' | 'querying' | 'done' | 'error'
