#!/usr/bin/env tsx
import cac from 'cac'
import { chatCommand, type ChatCommandOptions } from './commands/chat'
import { printError } from './output/console'

const VERSION = '0.1.0'
const cli = cac('tablewise')

cli
  .command('chat', 'Talk to the booking assistant')
  .option('-c, --config <path>', 'YAML config file')
  .option('-u, --user <contact>', 'Email or phone to sign in with')
  .option('-d, --data-dir <dir>', 'Persist reservations and profiles as JSON files here')
  .option('-e, --env-file <path>', 'Path to env file', { default: '.env' })
  .option('-v, --verbose', 'Log tool calls and state transitions')
  .action(async (options: ChatCommandOptions) => {
    try {
      await chatCommand(VERSION, options)
    } catch (error) {
      printError(error)
      process.exit(1)
    }
  })

cli.help()
cli.version(VERSION)
cli.parse()
