import type { SearchFields, SearchMode, ToolRecord } from '../types/index.js'
import { PatternError } from '../errors.js'
import { extractSchemaText } from './schema-text.js'

/**
 * Default fields: everything but the input schema, whose text is noisy
 */
export const DEFAULT_SEARCH_FIELDS: Readonly<SearchFields> = Object.freeze({
  name: true,
  title: true,
  description: true,
  inputSchema: false,
})

interface CriteriaInit {
  query?: string
  name?: string
  mode: SearchMode
  fields: SearchFields
  caseSensitive: boolean
  minDescriptionLength?: number
  keywords: readonly string[]
}

type CompiledPattern
  = | { ok: true, regex: RegExp }
    | { ok: false, error: PatternError }

/**
 * Escape regex metacharacters so the text matches literally
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function compilePattern(pattern: string, flags?: string): CompiledPattern {
  try {
    return { ok: true, regex: new RegExp(pattern, flags) }
  }
  catch (err) {
    return { ok: false, error: new PatternError(pattern, { cause: err }) }
  }
}

const WORD = '[\\p{L}\\p{N}]'

/**
 * Literal query surrounded by zero-width assertions that no letter or digit
 * touches it, so `_` and `-` separate words. An empty query matches at any
 * word edge, so any text holding a letter or digit matches.
 */
function compileWordPattern(query: string): CompiledPattern {
  if (query === '') {
    return compilePattern(`(?<!${WORD})(?=${WORD})|(?<=${WORD})(?!${WORD})`, 'u')
  }
  return compilePattern(`(?<!${WORD})${escapeRegExp(query)}(?!${WORD})`, 'u')
}

/**
 * Immutable description of which tools a search keeps.
 *
 * Instances are created through the static constructors and refined with the
 * `with*` methods, each of which returns a new instance. Regex patterns are
 * compiled once, when the instance is created.
 */
export class SearchCriteria {
  /** Free-form query, interpreted according to `mode` */
  readonly query?: string
  /** Exact tool name; takes precedence over everything else */
  readonly name?: string
  readonly mode: SearchMode
  readonly fields: Readonly<SearchFields>
  readonly caseSensitive: boolean
  readonly minDescriptionLength?: number
  /** All must be present in keywords mode */
  readonly keywords: readonly string[]

  private readonly compiled?: CompiledPattern

  private constructor(init: CriteriaInit) {
    this.query = init.query
    this.name = init.name
    this.mode = init.mode
    this.fields = Object.freeze({ ...init.fields })
    this.caseSensitive = init.caseSensitive
    this.minDescriptionLength = init.minDescriptionLength
    this.keywords = Object.freeze([...init.keywords])

    if (this.query !== undefined) {
      if (this.mode === 'regex') {
        this.compiled = compilePattern(this.query)
      }
      else if (this.mode === 'word-boundary') {
        this.compiled = compileWordPattern(this.caseSensitive ? this.query : this.query.toLowerCase())
      }
    }
  }

  private static create(init: Partial<CriteriaInit>): SearchCriteria {
    return new SearchCriteria({
      mode: 'substring',
      fields: DEFAULT_SEARCH_FIELDS,
      caseSensitive: false,
      keywords: [],
      ...init,
    })
  }

  /**
   * Substring search for a query
   */
  static withQuery(query: string): SearchCriteria {
    return SearchCriteria.create({ query })
  }

  /**
   * Exact tool name match
   */
  static withName(name: string): SearchCriteria {
    return SearchCriteria.create({ name })
  }

  /**
   * Regular expression search. An invalid pattern never matches.
   */
  static withRegex(pattern: string): SearchCriteria {
    return SearchCriteria.create({ query: pattern, mode: 'regex' })
  }

  /**
   * Every keyword must appear in the same field
   */
  static withKeywords(keywords: readonly string[]): SearchCriteria {
    return SearchCriteria.create({ mode: 'keywords', keywords })
  }

  /**
   * Criteria that match every tool
   */
  static matchAll(): SearchCriteria {
    return SearchCriteria.create({})
  }

  withMode(mode: SearchMode): SearchCriteria {
    return new SearchCriteria({ ...this.toInit(), mode })
  }

  withFields(fields: Partial<SearchFields>): SearchCriteria {
    return new SearchCriteria({ ...this.toInit(), fields: { ...this.fields, ...fields } })
  }

  withCaseSensitive(caseSensitive: boolean): SearchCriteria {
    return new SearchCriteria({ ...this.toInit(), caseSensitive })
  }

  withMinDescriptionLength(minDescriptionLength: number | undefined): SearchCriteria {
    return new SearchCriteria({ ...this.toInit(), minDescriptionLength })
  }

  /**
   * Compilation error of the regex query, if any
   */
  get patternError(): PatternError | undefined {
    const compiled = this.compiled
    if (this.mode !== 'regex' || compiled === undefined || compiled.ok) {
      return undefined
    }
    return compiled.error
  }

  /**
   * True when the criteria keep every tool, apart from the description length filter
   */
  get isMatchAll(): boolean {
    return this.name === undefined && this.query === undefined && this.keywords.length === 0
  }

  /**
   * Check if a tool matches
   */
  matches(tool: ToolRecord): boolean {
    if (this.name !== undefined) {
      return this.caseSensitive
        ? tool.name === this.name
        : tool.name.toLowerCase() === this.name.toLowerCase()
    }

    if (this.minDescriptionLength !== undefined) {
      if (tool.description === undefined || tool.description.length < this.minDescriptionLength) {
        return false
      }
    }

    if (this.query === undefined && this.keywords.length === 0) {
      return true
    }

    return this.collectFragments(tool).some(text => this.textMatches(text))
  }

  private collectFragments(tool: ToolRecord): string[] {
    const fragments: string[] = []

    if (this.fields.name) {
      fragments.push(tool.name)
    }
    if (this.fields.title && tool.title !== undefined) {
      fragments.push(tool.title)
    }
    if (this.fields.description && tool.description !== undefined) {
      fragments.push(tool.description)
    }
    if (this.fields.inputSchema) {
      const schemaText = extractSchemaText(tool.inputSchema)
      if (schemaText) {
        fragments.push(schemaText)
      }
    }

    return fragments
  }

  private textMatches(text: string): boolean {
    const fold = (value: string): string => this.caseSensitive ? value : value.toLowerCase()

    switch (this.mode) {
      case 'substring':
        return this.query !== undefined && fold(text).includes(fold(this.query))

      case 'regex': {
        // Pattern decides its own case handling
        const compiled = this.compiled
        return compiled !== undefined && compiled.ok && compiled.regex.test(text)
      }

      case 'keywords': {
        const haystack = fold(text)
        return this.keywords.every(keyword => haystack.includes(fold(keyword)))
      }

      case 'word-boundary': {
        const compiled = this.compiled
        if (this.query === undefined || compiled === undefined) {
          return false
        }
        return compiled.ok
          ? compiled.regex.test(fold(text))
          : fold(text).includes(fold(this.query))
      }
    }
  }

  private toInit(): CriteriaInit {
    return {
      query: this.query,
      name: this.name,
      mode: this.mode,
      fields: this.fields,
      caseSensitive: this.caseSensitive,
      minDescriptionLength: this.minDescriptionLength,
      keywords: this.keywords,
    }
  }
}
