import type { ProviderDescriptor } from '@toolscout/core'
import { existsSync } from 'node:fs'
import process from 'node:process'
import { toError } from '@toolscout/core'
import chalk from 'chalk'
import { Command } from 'commander'
import { CONFIG_SCOPES, getConfigPath, loadProviders } from '../utils/config.js'
import { error, info, success } from '../utils/output.js'

/**
 * One line per provider: name and where it lives
 */
export function describeProvider(provider: ProviderDescriptor): string {
  const transport = provider.transport
  const target = transport.type === 'stdio'
    ? [transport.command, ...(transport.args ?? [])].join(' ')
    : transport.url
  return `  ${chalk.white(provider.name)} ${chalk.dim(`[${transport.type}]`)} ${target}`
}

/**
 * Create the validate command
 */
export function createValidateCommand(): Command {
  const cmd = new Command('validate')
    .description('Check a server config file; without a path, check every .toolscout scope')
    .argument('[path]', 'Config file (JSON or YAML)')
    .action((path: string | undefined) => {
      const paths = path !== undefined
        ? [path]
        : CONFIG_SCOPES.map(scope => getConfigPath(scope)).filter(scopePath => existsSync(scopePath))

      if (paths.length === 0) {
        info('No config files found')
        return
      }

      let failed = false
      for (const configPath of paths) {
        try {
          const providers = loadProviders(configPath)
          success(`${configPath}: ${providers.length} servers`)
          for (const provider of providers) {
            console.log(describeProvider(provider))
          }
        }
        catch (err) {
          error(toError(err).message)
          failed = true
        }
      }

      if (failed) {
        process.exit(1)
      }
    })

  return cmd
}
