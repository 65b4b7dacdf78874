/**
 * Base class for errors raised by tool search
 */
export class ToolSearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ToolSearchError'
  }
}

/**
 * Malformed provider descriptor, detected before any I/O
 */
export class ValidationError extends ToolSearchError {
  readonly providerName: string

  constructor(providerName: string, message: string) {
    super(message)
    this.name = 'ValidationError'
    this.providerName = providerName
  }
}

/**
 * Reasons a provider query can fail
 */
export type ProviderErrorKind = 'timeout' | 'connection' | 'protocol' | 'unsupported'

/**
 * Failure while talking to a single provider
 */
export class ProviderError extends ToolSearchError {
  readonly providerName: string
  readonly kind: ProviderErrorKind

  constructor(providerName: string, kind: ProviderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProviderError'
    this.providerName = providerName
    this.kind = kind
  }
}

/**
 * Invalid regular expression. Kept on the criteria, never thrown during a search.
 */
export class PatternError extends ToolSearchError {
  readonly pattern: string

  constructor(pattern: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(`Invalid pattern "${pattern}"${detail}`, options)
    this.name = 'PatternError'
    this.pattern = pattern
  }
}

/**
 * A whole search call failed. Only raised when `continueOnError` is off.
 */
export class SearchError extends ToolSearchError {
  declare readonly cause: ValidationError | ProviderError

  constructor(cause: ValidationError | ProviderError) {
    super(`Search failed: ${cause.message}`, { cause })
    this.name = 'SearchError'
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
