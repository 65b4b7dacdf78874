import type { SearchFields, SearchSettings } from '@toolscout/core'
import type { OutputFormat } from './output.js'
import { buildCriteria, isSearchMode, SEARCH_MODES, SearchCriteria, splitKeywords } from '@toolscout/core'
import { isOutputFormat, OUTPUT_FORMATS } from './output.js'

/**
 * Options shared by the search and list commands, as commander hands them over
 */
export interface ListCommandOptions {
  config?: string
  format: string
  limit?: string
  sortByTool?: boolean
  timeout: string
  failFast?: boolean
}

export interface SearchCommandOptions extends ListCommandOptions {
  mode?: string
  caseSensitive?: boolean
  in?: string
  minDescriptionLength?: string
  exact?: boolean
}

const FIELD_NAMES: Record<string, keyof SearchFields> = {
  name: 'name',
  title: 'title',
  description: 'description',
  schema: 'inputSchema',
}

/**
 * Parse a comma-separated field list: name, title, description, schema
 */
export function parseFields(value: string): SearchFields {
  const fields: SearchFields = { name: false, title: false, description: false, inputSchema: false }
  const tokens = value.split(',').map(token => token.trim().toLowerCase()).filter(token => token.length > 0)

  if (tokens.length === 0) {
    throw new Error('No search fields given')
  }

  for (const token of tokens) {
    const field = FIELD_NAMES[token]
    if (field === undefined) {
      throw new Error(`Invalid field: "${token}". Valid options: ${Object.keys(FIELD_NAMES).join(', ')}`)
    }
    fields[field] = true
  }

  return fields
}

/**
 * Parse a non-negative integer option
 */
export function parseCount(value: string, label: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Invalid ${label}: "${value}"`)
  }
  return Number.parseInt(value, 10)
}

/**
 * Parse a timeout in seconds. Zero disables the deadline.
 */
export function parseTimeout(value: string): number | null {
  const seconds = Number(value)
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Invalid timeout: "${value}"`)
  }
  return seconds === 0 ? null : seconds
}

export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`Invalid format: "${value}". Valid options: ${OUTPUT_FORMATS.join(', ')}`)
  }
  return value
}

/**
 * Fold the shared command options into search settings
 */
export function settingsFromOptions(options: ListCommandOptions): SearchSettings {
  return {
    limit: options.limit === undefined ? undefined : parseCount(options.limit, 'limit'),
    timeoutSeconds: parseTimeout(options.timeout),
    sortBy: options.sortByTool ? 'tool' : 'server',
    failFast: options.failFast ?? false,
  }
}

/**
 * Build criteria for the search command.
 * `--exact` wins over `--mode`, and `--mode` over auto-detection.
 */
export function criteriaFromOptions(query: string, options: SearchCommandOptions): SearchCriteria {
  let criteria: SearchCriteria

  if (options.exact) {
    criteria = SearchCriteria.withName(query)
  }
  else if (options.mode !== undefined) {
    const mode = options.mode
    if (!isSearchMode(mode)) {
      throw new Error(`Invalid mode: "${mode}". Valid options: ${SEARCH_MODES.join(', ')}`)
    }
    criteria = mode === 'keywords'
      ? SearchCriteria.withKeywords(splitKeywords(query))
      : SearchCriteria.withQuery(query).withMode(mode)
  }
  else {
    criteria = buildCriteria({ query })
  }

  if (options.caseSensitive) {
    criteria = criteria.withCaseSensitive(true)
  }
  if (options.in !== undefined) {
    criteria = criteria.withFields(parseFields(options.in))
  }
  if (options.minDescriptionLength !== undefined) {
    criteria = criteria.withMinDescriptionLength(parseCount(options.minDescriptionLength, 'minimum description length'))
  }

  return criteria
}
