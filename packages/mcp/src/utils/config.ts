/**
 * MCP server configuration loader
 * Reads server lists from JSON or YAML files and the .toolscout/ scopes
 */

import type { ProviderDescriptor, TransportDescriptor } from '@toolscout/core'
import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { extname, join } from 'node:path'
import process from 'node:process'
import { toError, ToolSearchError, validateProvider } from '@toolscout/core'
import YAML from 'yaml'
import { z } from 'zod'
import { CONFIG_DIR, CONFIG_FILE, LOCAL_CONFIG_FILE } from '../constants.js'
import { debug } from './output.js'

/**
 * Unreadable or invalid configuration file
 */
export class ConfigError extends ToolSearchError {
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
    this.path = path
  }
}

const stringRecord = z.record(z.string())

const StdioTransportSchema = z.object({
  type: z.literal('stdio'),
  command: z.string(),
  args: z.array(z.string()).optional(),
  env: stringRecord.optional(),
  cwd: z.string().optional(),
})

const HttpTransportSchema = z.object({
  type: z.literal('http'),
  url: z.string(),
  headers: stringRecord.optional(),
})

const SseTransportSchema = z.object({
  type: z.literal('sse'),
  url: z.string(),
  headers: stringRecord.optional(),
})

export const ProviderDescriptorSchema = z.object({
  name: z.string(),
  transport: z.discriminatedUnion('type', [StdioTransportSchema, HttpTransportSchema, SseTransportSchema]),
})

/**
 * Entry of the `mcpServers` map, keyed by server name
 */
export const McpServerEntrySchema = z.object({
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: stringRecord.optional(),
  cwd: z.string().optional(),
  url: z.string().optional(),
  transport: z.enum(['stdio', 'http', 'sse']).optional(),
  headers: stringRecord.optional(),
})

export type McpServerEntry = z.infer<typeof McpServerEntrySchema>

export const ConfigFileSchema = z.union([
  z.array(ProviderDescriptorSchema),
  z.object({ mcpServers: z.record(McpServerEntrySchema) }),
])

export type ConfigScope = 'user' | 'project' | 'local'

/**
 * Scopes in merge order; later scopes override earlier ones by server name
 */
export const CONFIG_SCOPES: readonly ConfigScope[] = ['user', 'project', 'local']

/**
 * Get config file path based on scope
 */
export function getConfigPath(scope: ConfigScope, cwd: string = process.cwd(), home: string = homedir()): string {
  switch (scope) {
    case 'user':
      return join(home, CONFIG_DIR, CONFIG_FILE)
    case 'project':
      return join(cwd, CONFIG_DIR, CONFIG_FILE)
    case 'local':
    default:
      return join(cwd, CONFIG_DIR, LOCAL_CONFIG_FILE)
  }
}

/**
 * Read a JSON or YAML file. `.yaml` and `.yml` files are parsed as YAML.
 */
export function readConfigFile(path: string): unknown {
  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  }
  catch (err) {
    throw new ConfigError(path, `Failed to read config file ${path}: ${toError(err).message}`, { cause: err })
  }

  const ext = extname(path).toLowerCase()
  try {
    return ext === '.yaml' || ext === '.yml' ? YAML.parse(content) : JSON.parse(content)
  }
  catch (err) {
    throw new ConfigError(path, `Failed to parse config file ${path}: ${toError(err).message}`, { cause: err })
  }
}

/**
 * Convert an `mcpServers` entry to a descriptor.
 * The transport defaults to http when a url is given, stdio otherwise.
 */
export function entryToDescriptor(name: string, entry: McpServerEntry): ProviderDescriptor {
  const type = entry.transport ?? (entry.url !== undefined ? 'http' : 'stdio')

  let transport: TransportDescriptor
  if (type === 'stdio') {
    transport = { type, command: entry.command ?? '', args: entry.args, env: entry.env, cwd: entry.cwd }
  }
  else {
    transport = { type, url: entry.url ?? '', headers: entry.headers }
  }

  return { name, transport }
}

/**
 * Parse a decoded config document into provider descriptors
 */
export function parseProviderConfig(data: unknown, source: string): ProviderDescriptor[] {
  const parsed = ConfigFileSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ')
    throw new ConfigError(source, `Invalid config file ${source}: ${issues}`, { cause: parsed.error })
  }

  const config = parsed.data
  if (Array.isArray(config)) {
    return config
  }

  return Object.entries(config.mcpServers).map(([name, entry]) => entryToDescriptor(name, entry))
}

export interface LoadProvidersOptions {
  /** Reject the file when any descriptor fails validation (default: true) */
  strict?: boolean
}

/**
 * Load provider descriptors from a config file
 */
export function loadProviders(path: string, options: LoadProvidersOptions = {}): ProviderDescriptor[] {
  const providers = parseProviderConfig(readConfigFile(path), path)

  if (options.strict ?? true) {
    for (const provider of providers) {
      const result = validateProvider(provider)
      if (!result.valid) {
        throw new ConfigError(path, `Invalid server in ${path}: ${result.error.message}`, { cause: result.error })
      }
    }
  }

  return providers
}

/**
 * Load and merge providers from the user, project and local scopes.
 * Missing files are skipped. Validation is left to the search.
 */
export function loadScopedProviders(cwd: string = process.cwd(), home: string = homedir()): ProviderDescriptor[] {
  const providers = new Map<string, ProviderDescriptor>()

  for (const scope of CONFIG_SCOPES) {
    const path = getConfigPath(scope, cwd, home)
    if (!existsSync(path)) {
      continue
    }

    const scoped = loadProviders(path, { strict: false })
    debug(`Loaded ${scoped.length} servers from ${scope} config ${path}`)
    for (const provider of scoped) {
      providers.set(provider.name, provider)
    }
  }

  return [...providers.values()]
}

/**
 * Resolve providers for a command: an explicit file, or the merged scopes
 */
export function resolveProviders(configPath?: string): ProviderDescriptor[] {
  return configPath !== undefined
    ? loadProviders(configPath, { strict: false })
    : loadScopedProviders()
}
