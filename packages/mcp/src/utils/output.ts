import type { ToolMatch, ToolSearchResult } from '@toolscout/core'
import process from 'node:process'
import chalk from 'chalk'
import Table from 'cli-table3'
import { DEBUG_ENV } from '../constants.js'

/**
 * Output format options
 */
export type OutputFormat = 'text' | 'table' | 'json' | 'minimal'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'table', 'json', 'minimal']

/**
 * Check if a string is a valid output format
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

/**
 * Format search matches based on output format
 */
export function formatMatches(result: ToolSearchResult, format: OutputFormat, header: string): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result.matches, null, 2)

    case 'minimal':
      return result.matches.map(match => `${match.providerName}__${match.tool.name}`).join('\n')

    case 'table':
      return formatTable(result, header)

    case 'text':
    default:
      return formatText(result, header)
  }
}

/**
 * Format matches as indented blocks, one per tool
 */
function formatText(result: ToolSearchResult, header: string): string {
  if (result.matches.length === 0) {
    return chalk.yellow('No results found')
  }

  const lines = [chalk.bold(header), '']

  for (const match of result.matches) {
    lines.push(`Server: ${match.providerName}`)
    lines.push(`  Name: ${match.tool.name}`)
    if (match.tool.description !== undefined) {
      lines.push(`  Description: ${match.tool.description}`)
    }
    if (match.tool.title !== undefined) {
      lines.push(`  Title: ${match.tool.title}`)
    }
    lines.push('')
  }

  return lines.join('\n')
}

/**
 * Format matches as a table
 */
function formatTable(result: ToolSearchResult, header: string): string {
  if (result.matches.length === 0) {
    return chalk.yellow('No results found')
  }

  const lines: string[] = []

  lines.push(chalk.bold(header))
  lines.push(chalk.dim(`Searched ${result.totalTools} tools on ${result.queriedProviders} servers in ${result.searchTimeMs}ms`))
  lines.push('')

  const table = new Table({
    head: [chalk.cyan('Server'), chalk.cyan('Tool'), chalk.cyan('Description')],
    colWidths: [24, 36, 56],
    wordWrap: true,
    style: { head: [], border: [] },
  })

  for (const match of result.matches) {
    table.push([
      chalk.dim(match.providerName),
      chalk.white(match.tool.name),
      formatDescription(match),
    ])
  }

  lines.push(table.toString())

  return lines.join('\n')
}

function formatDescription(match: ToolMatch): string {
  return match.tool.description === undefined ? chalk.dim('N/A') : truncate(match.tool.description, 50)
}

/**
 * Truncate text with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength)
    return text
  return `${text.substring(0, maxLength - 3)}...`
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`${chalk.green('✓')} ${message}`)
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(`${chalk.red('✗')} ${message}`)
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`${chalk.yellow('⚠')} ${message}`)
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`)
}

/**
 * Print debug message to stderr when TOOLSCOUT_DEBUG=true
 */
export function debug(message: string): void {
  if (process.env[DEBUG_ENV] === 'true') {
    console.error(chalk.dim(`[DEBUG] ${message}`))
  }
}
