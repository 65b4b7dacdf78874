#!/usr/bin/env node

import { Command } from 'commander'
import { createListCommand } from './commands/list.js'
import { createSearchCommand } from './commands/search.js'
import { createValidateCommand } from './commands/validate.js'
import { CLI_NAME, CLI_VERSION } from './constants.js'

const program = new Command()

program
  .name(CLI_NAME)
  .description('Search tools across MCP servers by name, description or schema')
  .version(CLI_VERSION)

program.addCommand(createSearchCommand())
program.addCommand(createListCommand())
program.addCommand(createValidateCommand())

await program.parseAsync()
