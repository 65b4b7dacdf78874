/**
 * MCP client used to list tools from configured servers
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { ListToolsOptions, ProviderDescriptor, ProviderErrorKind, ToolLister, ToolRecord } from '@toolscout/core'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js'
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js'
import { ProviderError, toError, toJsonObject } from '@toolscout/core'
import { CLI_NAME, CLI_VERSION } from '../constants.js'
import { debug } from './output.js'

/**
 * Creates the transport for a provider
 */
export type TransportFactory = (provider: ProviderDescriptor) => Transport | Promise<Transport>

export interface McpToolListerOptions {
  createTransport?: TransportFactory
}

// Largest delay setTimeout accepts; used when the caller sets no deadline
const MAX_REQUEST_TIMEOUT_MS = 2_147_483_647

/**
 * Create the SDK transport described by a provider
 */
export function createTransport(provider: ProviderDescriptor): Transport {
  const transport = provider.transport

  switch (transport.type) {
    case 'stdio':
      return new StdioClientTransport({
        command: transport.command,
        args: transport.args,
        env: transport.env ? { ...getDefaultEnvironment(), ...transport.env } : undefined,
        cwd: transport.cwd,
        stderr: 'ignore',
      })

    case 'sse':
      return new SSEClientTransport(new URL(transport.url), {
        requestInit: transport.headers ? { headers: transport.headers } : undefined,
      })

    case 'http':
      return new StreamableHTTPClientTransport(new URL(transport.url), {
        requestInit: transport.headers ? { headers: transport.headers } : undefined,
      })
  }
}

/**
 * Lists tools over MCP, following `nextCursor` until the server stops paging
 */
export class McpToolLister implements ToolLister {
  private createTransport: TransportFactory

  constructor(options: McpToolListerOptions = {}) {
    this.createTransport = options.createTransport ?? createTransport
  }

  async listTools(provider: ProviderDescriptor, options: ListToolsOptions): Promise<ToolRecord[]> {
    const { signal, timeoutMs } = options
    const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs
    const remaining = () => deadline === undefined ? MAX_REQUEST_TIMEOUT_MS : Math.max(1, deadline - Date.now())

    const client = new Client(
      { name: `${CLI_NAME}-${provider.name}`, version: CLI_VERSION },
      { capabilities: {} },
    )

    let connected = false

    try {
      const transport = await this.createTransport(provider)
      await client.connect(transport, { signal, timeout: remaining() })
      connected = true

      if (!client.getServerCapabilities()?.tools) {
        throw new ProviderError(provider.name, 'unsupported', `Server ${provider.name} does not provide tools`)
      }

      const tools: ToolRecord[] = []
      let cursor: string | undefined

      do {
        const response = await client.listTools(cursor === undefined ? undefined : { cursor }, { signal, timeout: remaining() })
        for (const tool of response.tools) {
          tools.push(convertMcpTool(tool))
        }
        cursor = response.nextCursor
      } while (cursor !== undefined)

      debug(`Listed ${tools.length} tools from ${provider.name}`)
      return tools
    }
    catch (err) {
      throw toProviderError(provider.name, err, connected, signal)
    }
    finally {
      await client.close().catch((err: unknown) => {
        debug(`Failed to close client for ${provider.name}: ${toError(err).message}`)
      })
    }
  }
}

/**
 * Map a failure to a provider error kind
 */
function toProviderError(name: string, err: unknown, connected: boolean, signal: AbortSignal): ProviderError {
  if (err instanceof ProviderError) {
    return err
  }

  if (signal.aborted) {
    const reason: unknown = signal.reason
    if (reason instanceof ProviderError) {
      return reason
    }
    return new ProviderError(name, 'timeout', `Listing tools from server ${name} was aborted`, { cause: err })
  }

  const error = toError(err)

  if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) {
    return new ProviderError(name, 'timeout', `Timed out listing tools from server: ${name}`, { cause: error })
  }

  const kind: ProviderErrorKind = connected ? 'protocol' : 'connection'
  const message = connected
    ? `Error listing tools from server ${name}: ${error.message}`
    : `Error connecting to server ${name}: ${error.message}`

  return new ProviderError(name, kind, message, { cause: error })
}

/**
 * Convert an MCP SDK tool into a tool record
 */
export function convertMcpTool(tool: Tool): ToolRecord {
  return {
    name: tool.name,
    title: tool.title,
    description: tool.description,
    inputSchema: toJsonObject(tool.inputSchema) ?? { type: 'object' },
    outputSchema: toJsonObject(tool.outputSchema),
    annotations: toJsonObject(tool.annotations),
  }
}
