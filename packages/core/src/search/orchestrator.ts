import type { ValidationError } from '../errors.js'
import type { ToolLister } from '../provider/lister.js'
import type {
  ProviderDescriptor,
  ProviderStatus,
  SearchOptions,
  SortOrder,
  ToolMatch,
  ToolRecord,
  ToolSearchResult,
} from '../types/index.js'
import { ProviderError, SearchError, toError } from '../errors.js'
import { validateProvider } from '../provider/validation.js'
import { SearchCriteria } from './criteria.js'

/**
 * Default deadline for each provider query
 */
export const DEFAULT_TIMEOUT_MS = 30_000

/**
 * Default search options
 */
export const DEFAULT_SEARCH_OPTIONS: Readonly<SearchOptions> = Object.freeze({
  timeoutMs: DEFAULT_TIMEOUT_MS,
  sortOrder: 'server-then-tool',
  continueOnError: true,
})

/**
 * Search orchestrator options
 */
export interface ToolSearchOrchestratorOptions {
  lister: ToolLister
  /** Overrides applied under every call's own options */
  defaultOptions?: Partial<SearchOptions>
  /** Callback for per-provider progress updates */
  onProgress?: (providerName: string, status: ProviderStatus, toolCount?: number) => void
}

/**
 * Settled query against one provider
 */
type ProviderOutcome
  = | { ok: true, provider: ProviderDescriptor, tools: ToolRecord[] }
    | { ok: false, provider: ProviderDescriptor, error: ProviderError }

/**
 * Fill unset options from defaults. An explicit `timeoutMs: null` disables the deadline.
 */
export function resolveSearchOptions(
  options: Partial<SearchOptions> = {},
  defaults: Readonly<SearchOptions> = DEFAULT_SEARCH_OPTIONS,
): SearchOptions {
  return {
    timeoutMs: options.timeoutMs !== undefined ? options.timeoutMs : defaults.timeoutMs,
    sortOrder: options.sortOrder ?? defaults.sortOrder,
    continueOnError: options.continueOnError ?? defaults.continueOnError,
    maxResults: options.maxResults ?? defaults.maxResults,
  }
}

/**
 * Order by Unicode code point, which is also UTF-8 byte order
 */
function compareStrings(a: string, b: string): number {
  const left = a[Symbol.iterator]()
  const right = b[Symbol.iterator]()

  for (;;) {
    const x = left.next()
    const y = right.next()
    if (x.done || y.done) {
      return x.done && y.done ? 0 : x.done ? -1 : 1
    }
    const diff = (x.value.codePointAt(0) ?? 0) - (y.value.codePointAt(0) ?? 0)
    if (diff !== 0) {
      return diff
    }
  }
}

/**
 * Sort matches by provider and tool name. Returns a new array; `none` keeps arrival order.
 */
export function sortMatches(matches: readonly ToolMatch[], order: SortOrder): ToolMatch[] {
  const sorted = [...matches]

  switch (order) {
    case 'server-then-tool':
      return sorted.sort((a, b) =>
        compareStrings(a.providerName, b.providerName) || compareStrings(a.tool.name, b.tool.name))
    case 'tool-then-server':
      return sorted.sort((a, b) =>
        compareStrings(a.tool.name, b.tool.name) || compareStrings(a.providerName, b.providerName))
    case 'none':
    default:
      return sorted
  }
}

function toProviderError(providerName: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) {
    return err
  }

  const cause = toError(err)
  return new ProviderError(
    providerName,
    'connection',
    `Error connecting to server ${providerName}: ${cause.message}`,
    { cause },
  )
}

/**
 * Queries every provider concurrently and filters the combined tool catalog
 */
export class ToolSearchOrchestrator {
  private lister: ToolLister
  private defaultOptions: SearchOptions
  private onProgress?: ToolSearchOrchestratorOptions['onProgress']

  constructor(options: ToolSearchOrchestratorOptions) {
    this.lister = options.lister
    this.defaultOptions = resolveSearchOptions(options.defaultOptions)
    this.onProgress = options.onProgress
  }

  /**
   * Search tools across providers.
   *
   * Each provider is queried once, concurrently, under its own deadline. With
   * `continueOnError` (the default) invalid descriptors and failing providers
   * are reported in `warnings` and `errors`; without it the first one, in
   * descriptor order, is thrown as a `SearchError` and nothing is returned.
   */
  async search(
    providers: readonly ProviderDescriptor[],
    criteria: SearchCriteria,
    options?: Partial<SearchOptions>,
  ): Promise<ToolSearchResult> {
    const resolved = resolveSearchOptions(options, this.defaultOptions)
    const startTime = performance.now()

    const warnings: ValidationError[] = []
    const queryable: ProviderDescriptor[] = []

    for (const provider of providers) {
      const validation = validateProvider(provider)
      if (validation.valid) {
        queryable.push(provider)
        continue
      }
      if (!resolved.continueOnError) {
        throw new SearchError(validation.error)
      }
      warnings.push(validation.error)
      this.onProgress?.(provider.name, 'skipped')
    }

    // Join barrier: every query settles before anything is aggregated
    const outcomes = await Promise.all(
      queryable.map(provider => this.queryProvider(provider, resolved.timeoutMs)),
    )

    const matches: ToolMatch[] = []
    const errors: ProviderError[] = []
    let totalTools = 0

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        if (!resolved.continueOnError) {
          throw new SearchError(outcome.error)
        }
        errors.push(outcome.error)
        continue
      }

      totalTools += outcome.tools.length
      for (const tool of outcome.tools) {
        if (criteria.matches(tool)) {
          matches.push({ providerName: outcome.provider.name, tool })
        }
      }
    }

    let sorted = sortMatches(matches, resolved.sortOrder)
    if (resolved.maxResults !== undefined) {
      sorted = sorted.slice(0, Math.max(0, resolved.maxResults))
    }

    return {
      matches: sorted,
      errors,
      warnings,
      queriedProviders: queryable.length,
      totalTools,
      searchTimeMs: Math.round(performance.now() - startTime),
    }
  }

  /**
   * List every tool from every provider
   */
  async listAll(providers: readonly ProviderDescriptor[], options?: Partial<SearchOptions>): Promise<ToolSearchResult> {
    return this.search(providers, SearchCriteria.matchAll(), options)
  }

  /**
   * Substring search with a query string
   */
  async searchWithQuery(
    providers: readonly ProviderDescriptor[],
    query: string,
    options?: Partial<SearchOptions>,
  ): Promise<ToolSearchResult> {
    return this.search(providers, SearchCriteria.withQuery(query), options)
  }

  /**
   * Search with a regular expression
   */
  async searchWithRegex(
    providers: readonly ProviderDescriptor[],
    pattern: string,
    options?: Partial<SearchOptions>,
  ): Promise<ToolSearchResult> {
    return this.search(providers, SearchCriteria.withRegex(pattern), options)
  }

  /**
   * Search with keywords that must all be present
   */
  async searchWithKeywords(
    providers: readonly ProviderDescriptor[],
    keywords: readonly string[],
    options?: Partial<SearchOptions>,
  ): Promise<ToolSearchResult> {
    return this.search(providers, SearchCriteria.withKeywords(keywords), options)
  }

  /**
   * Query one provider under its own deadline. Never rejects.
   */
  private async queryProvider(provider: ProviderDescriptor, timeoutMs: number | null | undefined): Promise<ProviderOutcome> {
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined

    this.onProgress?.(provider.name, 'querying')

    try {
      const listing = this.lister.listTools(provider, {
        timeoutMs: timeoutMs ?? undefined,
        signal: controller.signal,
      })

      const tools = timeoutMs === null || timeoutMs === undefined
        ? await listing
        : await Promise.race([
          listing,
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
              const timeoutError = new ProviderError(
                provider.name,
                'timeout',
                `Timed out after ${timeoutMs}ms listing tools from server: ${provider.name}`,
              )
              controller.abort(timeoutError)
              reject(timeoutError)
            }, timeoutMs)
          }),
        ])

      this.onProgress?.(provider.name, 'done', tools.length)
      return { ok: true, provider, tools }
    }
    catch (err) {
      this.onProgress?.(provider.name, 'error')
      return { ok: false, provider, error: toProviderError(provider.name, err) }
    }
    finally {
      clearTimeout(timer)
    }
  }
}
