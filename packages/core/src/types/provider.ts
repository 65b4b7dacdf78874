/**
 * Spawns a local process and talks MCP over its stdin/stdout
 */
export interface StdioTransportDescriptor {
  type: 'stdio'
  command: string
  args?: string[]
  env?: Record<string, string>
  cwd?: string
}

/**
 * Connects to a remote endpoint (Streamable HTTP or legacy SSE)
 */
export interface RemoteTransportDescriptor {
  type: 'http' | 'sse'
  url: string
  headers?: Record<string, string>
}

export type TransportDescriptor = StdioTransportDescriptor | RemoteTransportDescriptor

export type TransportType = TransportDescriptor['type']

/**
 * A named provider of tools. Names are not required to be unique.
 */
export interface ProviderDescriptor {
  name: string
  transport: TransportDescriptor
}
