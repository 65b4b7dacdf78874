import type { ProviderDescriptor, ToolRecord } from '../types/index.js'

/**
 * Options passed to a single provider listing
 */
export interface ListToolsOptions {
  /** Deadline for the whole listing, across every page */
  timeoutMs?: number
  /** Aborted when the deadline passes */
  signal: AbortSignal
}

/**
 * Transport-level access to a provider's tool list.
 *
 * Implementations follow pagination until the provider reports no further
 * pages, and reject with a `ProviderError` when the provider cannot be reached.
 */
export interface ToolLister {
  listTools: (provider: ProviderDescriptor, options: ListToolsOptions) => Promise<ToolRecord[]>
}
