// MCP transport
export { convertMcpTool, createTransport, McpToolLister } from './utils/mcp-client.js'
export type { McpToolListerOptions, TransportFactory } from './utils/mcp-client.js'

// Configuration
export {
  CONFIG_SCOPES,
  ConfigError,
  entryToDescriptor,
  getConfigPath,
  loadProviders,
  loadScopedProviders,
  parseProviderConfig,
  readConfigFile,
  resolveProviders,
} from './utils/config.js'
export type { ConfigScope, LoadProvidersOptions, McpServerEntry } from './utils/config.js'

// Output
export { formatMatches, isOutputFormat, OUTPUT_FORMATS } from './utils/output.js'
export type { OutputFormat } from './utils/output.js'

// Search
export { reportProblems, runSearch } from './utils/search-runner.js'
export type { RunSearchOptions } from './utils/search-runner.js'

// Re-export constants
export {
  CLI_NAME,
  CLI_VERSION,
  CONFIG_DIR,
  CONFIG_FILE,
  DEFAULT_TIMEOUT_SECONDS,
  LOCAL_CONFIG_FILE,
} from './constants.js'
