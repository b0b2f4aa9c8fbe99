import { TablewiseError } from '@tablewise/core'
import type { OrchestratorReply } from '../../orchestrator/types'
import { c } from './colors'

export function printBanner(version: string): void {
  console.log(c('bold', `tablewise ${version}`) + c('dim', '  type /quit to leave'))
  console.log()
}

export function formatReply(reply: OrchestratorReply): string {
  const lines = [c('cyan', 'assistant: ') + reply.text]
  if (reply.renewed) {
    lines.unshift(c('yellow', '(previous conversation timed out; starting over)'))
  }
  if (reply.suggestions.length > 0) {
    lines.push(c('gray', `  try: ${reply.suggestions.join(' | ')}`))
  }
  return lines.join('\n')
}

export function printError(error: unknown): void {
  if (error instanceof TablewiseError) {
    console.error(c('red', `Error [${error.code}]: `) + error.message)
    return
  }
  console.error(c('red', 'Error: ') + (error instanceof Error ? error.message : String(error)))
}
