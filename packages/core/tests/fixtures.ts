import type { ListToolsOptions, ToolLister } from '../src/provider/lister.js'
import type { ProviderDescriptor, ToolRecord } from '../src/types/index.js'

/**
 * How a fake provider answers a listing
 */
export type FakeBehavior = ToolRecord[] | Error | 'hang'

/**
 * In-process lister keyed by provider name
 */
export class FakeLister implements ToolLister {
  readonly calls: string[] = []
  readonly signals = new Map<string, AbortSignal>()

  constructor(private behaviors: Record<string, FakeBehavior>) {}

  async listTools(provider: ProviderDescriptor, options: ListToolsOptions): Promise<ToolRecord[]> {
    this.calls.push(provider.name)
    this.signals.set(provider.name, options.signal)

    const behavior = this.behaviors[provider.name]
    if (behavior === undefined) {
      throw new Error(`No fake behavior for ${provider.name}`)
    }
    if (behavior instanceof Error) {
      throw behavior
    }
    if (behavior === 'hang') {
      return new Promise<ToolRecord[]>((_, reject) => {
        options.signal.addEventListener('abort', () => reject(options.signal.reason))
      })
    }
    return behavior
  }
}

export function stdioProvider(name: string): ProviderDescriptor {
  return { name, transport: { type: 'stdio', command: 'fake-mcp-server', args: [] } }
}

export function tool(name: string, description?: string): ToolRecord {
  return { name, description, inputSchema: { type: 'object' } }
}
