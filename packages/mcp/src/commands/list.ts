import type { ListCommandOptions } from '../utils/search-options.js'
import process from 'node:process'
import { SearchCriteria, toError } from '@toolscout/core'
import { Command } from 'commander'
import ora from 'ora'
import { DEFAULT_OUTPUT_FORMAT, DEFAULT_TIMEOUT_SECONDS } from '../constants.js'
import { resolveProviders } from '../utils/config.js'
import { error, formatMatches, warn } from '../utils/output.js'
import { parseFormat, settingsFromOptions } from '../utils/search-options.js'
import { reportProblems, runSearch } from '../utils/search-runner.js'

/**
 * Create the list command
 */
export function createListCommand(): Command {
  const cmd = new Command('list')
    .description('List every tool on the configured MCP servers')
    .option('-c, --config <path>', 'Server config file (JSON or YAML); defaults to the .toolscout scopes')
    .option('-f, --format <format>', 'Output format: text | table | json | minimal', DEFAULT_OUTPUT_FORMAT)
    .option('-l, --limit <number>', 'Maximum number of results')
    .option('--sort-by-tool', 'Sort by tool name, then server name')
    .option('-t, --timeout <seconds>', 'Per-server timeout in seconds, 0 for none', String(DEFAULT_TIMEOUT_SECONDS))
    .option('--fail-fast', 'Abort on the first invalid or failing server')
    .action(async (options: ListCommandOptions) => {
      const spinner = ora('Loading server config...').start()

      try {
        const format = parseFormat(options.format)
        const settings = settingsFromOptions(options)
        const providers = resolveProviders(options.config)

        spinner.text = `Listing tools from ${providers.length} servers...`
        const result = await runSearch({ providers, criteria: SearchCriteria.matchAll(), settings, spinner })
        spinner.stop()

        if (providers.length === 0) {
          warn('No MCP servers configured')
        }
        reportProblems(result)

        console.log(formatMatches(result, format, `${result.totalTools} tools on ${result.queriedProviders} servers`))
      }
      catch (err) {
        spinner.fail('Listing failed')
        error(toError(err).message)
        process.exit(1)
      }
    })

  return cmd
}
