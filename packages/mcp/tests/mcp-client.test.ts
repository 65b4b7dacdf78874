import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import type { ServerCapabilities } from '@modelcontextprotocol/sdk/types.js'
import type { ProviderDescriptor } from '@toolscout/core'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js'
import { ProviderError } from '@toolscout/core'
import { describe, expect, test } from 'vitest'
import { convertMcpTool, McpToolLister } from '../src/utils/mcp-client.js'

const provider: ProviderDescriptor = { name: 'mem', transport: { type: 'stdio', command: 'unused' } }

/**
 * Start an in-process server and return the client end of the link
 */
async function linkServer(
  setup: (server: Server) => void,
  capabilities: ServerCapabilities = { tools: {} },
): Promise<Transport> {
  const server = new Server({ name: 'test-server', version: '1.0.0' }, { capabilities })
  setup(server)
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
  await server.connect(serverTransport)
  return clientTransport
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  }
  catch (err) {
    return err
  }
  throw new Error('Expected promise to reject')
}

describe('McpToolLister', () => {
  test('should follow pagination until no cursor is returned', async () => {
    const cursors: Array<string | undefined> = []
    const transport = await linkServer((server) => {
      server.setRequestHandler(ListToolsRequestSchema, async (request) => {
        const cursor = request.params?.cursor
        cursors.push(cursor)
        if (cursor === undefined) {
          return {
            tools: [
              { name: 'read_file', description: 'Read a file', inputSchema: { type: 'object', properties: { path: { type: 'string' } } } },
              { name: 'write_file', inputSchema: { type: 'object' } },
            ],
            nextCursor: 'page-2',
          }
        }
        return { tools: [{ name: 'list_dir', title: 'List directory', inputSchema: { type: 'object' } }] }
      })
    })
    const lister = new McpToolLister({ createTransport: () => transport })

    const tools = await lister.listTools(provider, { signal: new AbortController().signal, timeoutMs: 5000 })

    expect(cursors).toEqual([undefined, 'page-2'])
    expect(tools.map(tool => tool.name)).toEqual(['read_file', 'write_file', 'list_dir'])
    expect(tools[0]?.description).toBe('Read a file')
    expect(tools[0]?.inputSchema).toEqual({ type: 'object', properties: { path: { type: 'string' } } })
    expect(tools[2]?.title).toBe('List directory')
  })

  test('should report servers without tools as unsupported', async () => {
    const transport = await linkServer(() => {}, {})
    const lister = new McpToolLister({ createTransport: () => transport })

    const err = await captureError(lister.listTools(provider, { signal: new AbortController().signal }))

    expect(err).toBeInstanceOf(ProviderError)
    expect(err instanceof ProviderError ? err.kind : undefined).toBe('unsupported')
    expect(err instanceof ProviderError ? err.message : undefined).toBe('Server mem does not provide tools')
  })

  test('should report transport failures as connection errors', async () => {
    const lister = new McpToolLister({
      createTransport: () => {
        throw new Error('spawn failed')
      },
    })

    const err = await captureError(lister.listTools(provider, { signal: new AbortController().signal }))

    expect(err instanceof ProviderError ? err.kind : undefined).toBe('connection')
    expect(err instanceof ProviderError ? err.message : undefined).toBe('Error connecting to server mem: spawn failed')
  })

  test('should report server errors as protocol errors', async () => {
    const transport = await linkServer((server) => {
      server.setRequestHandler(ListToolsRequestSchema, async () => {
        throw new Error('listing exploded')
      })
    })
    const lister = new McpToolLister({ createTransport: () => transport })

    const err = await captureError(lister.listTools(provider, { signal: new AbortController().signal }))

    expect(err instanceof ProviderError ? err.kind : undefined).toBe('protocol')
    expect(err instanceof ProviderError ? err.message : '').toContain('listing exploded')
  })

  test('should time out a hanging listing', async () => {
    const transport = await linkServer((server) => {
      server.setRequestHandler(ListToolsRequestSchema, () => new Promise<never>(() => {}))
    })
    const lister = new McpToolLister({ createTransport: () => transport })

    const err = await captureError(lister.listTools(provider, { signal: new AbortController().signal, timeoutMs: 50 }))

    expect(err instanceof ProviderError ? err.kind : undefined).toBe('timeout')
  })

  test('should reject with the abort reason', async () => {
    const transport = await linkServer((server) => {
      server.setRequestHandler(ListToolsRequestSchema, () => new Promise<never>(() => {}))
    })
    const lister = new McpToolLister({ createTransport: () => transport })
    const controller = new AbortController()
    const reason = new ProviderError('mem', 'timeout', 'deadline passed')

    const listing = captureError(lister.listTools(provider, { signal: controller.signal }))
    setTimeout(() => controller.abort(reason), 20)

    expect(await listing).toBe(reason)
  })
})

describe('convertMcpTool', () => {
  test('should copy the optional fields', () => {
    const record = convertMcpTool({
      name: 'search',
      title: 'Search',
      description: 'Search documents',
      inputSchema: { type: 'object', required: ['query'] },
      annotations: { readOnlyHint: true },
    })

    expect(record).toEqual({
      name: 'search',
      title: 'Search',
      description: 'Search documents',
      inputSchema: { type: 'object', required: ['query'] },
      annotations: { readOnlyHint: true },
    })
    expect(record.outputSchema).toBeUndefined()
  })
})
