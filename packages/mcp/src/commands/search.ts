import type { SearchCommandOptions } from '../utils/search-options.js'
import process from 'node:process'
import { toError } from '@toolscout/core'
import { Command } from 'commander'
import ora from 'ora'
import { DEFAULT_OUTPUT_FORMAT, DEFAULT_TIMEOUT_SECONDS } from '../constants.js'
import { resolveProviders } from '../utils/config.js'
import { error, formatMatches, warn } from '../utils/output.js'
import { criteriaFromOptions, parseFormat, settingsFromOptions } from '../utils/search-options.js'
import { reportProblems, runSearch } from '../utils/search-runner.js'

/**
 * Create the search command
 */
export function createSearchCommand(): Command {
  const cmd = new Command('search')
    .description('Search tools across configured MCP servers')
    .argument('<query>', 'Query: text, a regex (contains ^ $ * + ? | [ or (), or comma-separated keywords')
    .option('-c, --config <path>', 'Server config file (JSON or YAML); defaults to the .toolscout scopes')
    .option('-f, --format <format>', 'Output format: text | table | json | minimal', DEFAULT_OUTPUT_FORMAT)
    .option('-l, --limit <number>', 'Maximum number of results')
    .option('--sort-by-tool', 'Sort by tool name, then server name')
    .option('-m, --mode <mode>', 'Search mode: substring | regex | keywords | word-boundary (default: auto-detect)')
    .option('--case-sensitive', 'Match case in substring, keyword and word-boundary modes')
    .option('--in <fields>', 'Fields to search: name,title,description,schema')
    .option('--min-description-length <number>', 'Only keep tools with at least this many description characters')
    .option('--exact', 'Treat the query as an exact tool name')
    .option('-t, --timeout <seconds>', 'Per-server timeout in seconds, 0 for none', String(DEFAULT_TIMEOUT_SECONDS))
    .option('--fail-fast', 'Abort on the first invalid or failing server')
    .action(async (query: string, options: SearchCommandOptions) => {
      const spinner = ora('Loading server config...').start()

      try {
        const format = parseFormat(options.format)
        const criteria = criteriaFromOptions(query, options)
        const settings = settingsFromOptions(options)
        const providers = resolveProviders(options.config)

        if (criteria.patternError) {
          spinner.stop()
          warn(`${criteria.patternError.message}; nothing will match`)
          spinner.start()
        }

        spinner.text = `Searching ${providers.length} servers...`
        const result = await runSearch({ providers, criteria, settings, spinner })
        spinner.stop()

        if (providers.length === 0) {
          warn('No MCP servers configured')
        }
        reportProblems(result)

        console.log(formatMatches(result, format, `Found ${result.matches.length} tools matching "${query}"`))
      }
      catch (err) {
        spinner.fail('Search failed')
        error(toError(err).message)
        process.exit(1)
      }
    })

  return cmd
}
