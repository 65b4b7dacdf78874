import type { OutputFormat } from './utils/output.js'

/**
 * CLI name
 */
export const CLI_NAME = 'toolscout'

/**
 * CLI version reported by --version and to MCP servers
 */
export const CLI_VERSION = '0.1.0'

/**
 * Directory holding configuration, relative to the project or home directory
 */
export const CONFIG_DIR = '.toolscout'

/**
 * Shared configuration file name (user and project scopes)
 */
export const CONFIG_FILE = 'mcp.json'

/**
 * Local override file name (gitignored)
 */
export const LOCAL_CONFIG_FILE = 'mcp.local.json'

/**
 * Default output format
 */
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'text'

/**
 * Default per-server timeout in seconds
 */
export const DEFAULT_TIMEOUT_SECONDS = 30

/**
 * Environment variable enabling debug output
 */
export const DEBUG_ENV = 'TOOLSCOUT_DEBUG'
