/**
 * JSON value tree used for tool schemas
 */
export type JsonValue
  = | null
    | boolean
    | number
    | string
    | JsonValue[]
    | JsonObject

/**
 * JSON object node
 */
export interface JsonObject {
  [key: string]: JsonValue
}

/**
 * Tool as listed by a provider, following the MCP tool shape
 */
export interface ToolRecord {
  readonly name: string
  readonly title?: string
  readonly description?: string
  readonly inputSchema: JsonObject
  readonly outputSchema?: JsonObject
  readonly annotations?: JsonObject
}

/**
 * Fields a query is matched against
 */
export interface SearchFields {
  name: boolean
  title: boolean
  description: boolean
  /** Property names and descriptive text of the input schema */
  inputSchema: boolean
}

/**
 * Available search modes
 */
export type SearchMode = 'substring' | 'regex' | 'keywords' | 'word-boundary'

export const SEARCH_MODES: readonly SearchMode[] = ['substring', 'regex', 'keywords', 'word-boundary']

/**
 * Check if a string is a valid search mode
 */
export function isSearchMode(value: string): value is SearchMode {
  return SEARCH_MODES.some(mode => mode === value)
}
