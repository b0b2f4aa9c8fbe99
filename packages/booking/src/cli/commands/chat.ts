import { randomUUID } from 'node:crypto'
import { resolve } from 'node:path'
import { createInterface } from 'node:readline'
import { createConsoleLogger } from '@tablewise/core'
import { loadBookingConfig } from '../../config/loader'
import { createBookingSystem } from '../../system'
import { formatReply, printBanner } from '../output/console'

export interface ChatCommandOptions {
  config?: string
  user?: string
  dataDir?: string
  envFile: string
  verbose?: boolean
}

const QUIT = '/quit'

export async function chatCommand(version: string, options: ChatCommandOptions): Promise<void> {
  const config = await loadBookingConfig({ path: options.config, envFile: options.envFile })
  if (options.dataDir) {
    config.storage.dataDir = resolve(options.dataDir)
  }

  const logger = createConsoleLogger({ level: options.verbose ? 'debug' : 'warn' })
  const system = await createBookingSystem(config, { logger })
  system.orchestrator.sessions.startSweeper()

  const sessionId = randomUUID()
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: Boolean(process.stdin.isTTY) })
  printBanner(version)
  rl.setPrompt('you: ')
  rl.prompt()

  try {
    for await (const line of rl) {
      const text = line.trim()
      if (text === QUIT) {
        break
      }
      if (text) {
        const reply = await system.orchestrator.handleMessage({ sessionId, text, identity: options.user })
        console.log(formatReply(reply))
      }
      rl.prompt()
    }
  } finally {
    rl.close()
    system.dispose()
  }
}
