import type { ProviderDescriptor, ProviderStatus, SearchCriteria, SearchSettings, ToolLister, ToolSearchResult } from '@toolscout/core'
import type { Ora } from 'ora'
import { toSearchOptions, ToolSearchOrchestrator } from '@toolscout/core'
import { McpToolLister } from './mcp-client.js'
import { debug, warn } from './output.js'

export interface RunSearchOptions {
  providers: readonly ProviderDescriptor[]
  criteria: SearchCriteria
  settings: SearchSettings
  spinner?: Ora
  lister?: ToolLister
}

/**
 * Run a search against MCP servers, reporting progress on the spinner
 */
export async function runSearch(options: RunSearchOptions): Promise<ToolSearchResult> {
  const { providers, criteria, settings, spinner } = options
  let finished = 0

  const onProgress = (name: string, status: ProviderStatus, toolCount?: number): void => {
    debug(`${name}: ${status}${toolCount === undefined ? '' : ` (${toolCount} tools)`}`)
    if (status === 'done' || status === 'error') {
      finished++
    }
    if (spinner) {
      spinner.text = status === 'querying'
        ? `Querying ${name}...`
        : `Queried ${finished}/${providers.length} servers`
    }
  }

  const orchestrator = new ToolSearchOrchestrator({
    lister: options.lister ?? new McpToolLister(),
    onProgress,
  })

  return orchestrator.search(providers, criteria, toSearchOptions(settings))
}

/**
 * Print skipped servers and failed queries as warnings
 */
export function reportProblems(result: ToolSearchResult): void {
  for (const warning of result.warnings) {
    warn(`Skipped server: ${warning.message}`)
  }
  for (const failure of result.errors) {
    warn(`[${failure.kind}] ${failure.message}`)
  }
}
