import { tool, type ModelMessage, type ToolSet } from 'ai'
import { ExecutionError, ExecutionErrorCode, type GenerationOptions, type Provider } from '@tablewise/core'
import type { UserProfile } from '../profiles/types'
import type { ToolSpec } from '../tools/registry'
import type { DecideRequest, IntentModel, ModelDecision } from './intent-model'
import type { ChatMessage } from './types'

export interface LlmIntentModelOptions {
  /** Model id; the provider's default when omitted. */
  model?: string
  /** Extra instructions appended to the system prompt. */
  instructions?: string
  generation?: GenerationOptions
}

const BASE_PROMPT = [
  'You are a restaurant booking assistant.',
  'Use the tools to search restaurants, check availability and manage reservations.',
  'Only book a slotId that check_availability returned in this conversation; never invent one.',
  'The user confirms bookings and cancellations separately, so call the tool directly when they ask.',
  'After a tool result, answer briefly and plainly.',
].join('\n')

export function buildSystemPrompt(today: string, profile?: UserProfile, instructions?: string): string {
  const lines = [BASE_PROMPT, `Today is ${today}.`]
  if (profile?.contact.name) {
    lines.push(`The user's name is ${profile.contact.name}.`)
  }
  if (profile?.dietaryPreferences.length) {
    lines.push(`Dietary preferences: ${profile.dietaryPreferences.join(', ')}.`)
  }
  if (instructions) {
    lines.push(instructions)
  }
  return lines.join('\n')
}

/**
 * Tool entries become the assistant's call followed by its result,
 * so a window cut anywhere still pairs them.
 */
export function toModelMessages(history: ChatMessage[]): ModelMessage[] {
  return history.flatMap((message): ModelMessage[] => {
    switch (message.role) {
      case 'user':
        return [{ role: 'user', content: message.content }]
      case 'assistant':
        return [{ role: 'assistant', content: message.content }]
      case 'tool':
        return [
          {
            role: 'assistant',
            content: [
              { type: 'tool-call', toolCallId: message.callId, toolName: message.tool, input: message.args },
            ],
          },
          {
            role: 'tool',
            content: [
              {
                type: 'tool-result',
                toolCallId: message.callId,
                toolName: message.tool,
                output: { type: 'text', value: JSON.stringify(message.result) },
              },
            ],
          },
        ]
    }
  })
}

/** Execute-less AI SDK tools: the model proposes, the orchestrator runs. */
export function toAiTools(specs: ToolSpec[]): ToolSet {
  const tools: ToolSet = {}
  for (const spec of specs) {
    tools[spec.name] = tool({ description: spec.description, inputSchema: spec.inputSchema })
  }
  return tools
}

/**
 * IntentModel backed by a provider's `generateText` with tool calling.
 */
export function createLlmIntentModel(provider: Provider, options: LlmIntentModelOptions = {}): IntentModel {
  return {
    async decide({ history, tools, profile, today, signal }: DecideRequest): Promise<ModelDecision> {
      const execution = provider.simpleExecution(
        async (session): Promise<ModelDecision> => {
          const result = await session.generateText({
            ...options.generation,
            model: options.model,
            system: buildSystemPrompt(today, profile, options.instructions),
            messages: toModelMessages(history),
            tools: toAiTools(tools),
            toolChoice: 'auto',
          })
          const [call] = result.toolCalls
          if (call) {
            return { type: 'tool_call', tool: call.toolName, arguments: call.input }
          }
          return { type: 'reply', text: result.text }
        },
        { signal }
      )

      const outcome = await execution.result()
      switch (outcome.status) {
        case 'succeeded':
          return outcome.value
        case 'canceled':
          throw new ExecutionError('Intent request cancelled', { code: ExecutionErrorCode.CANCELLED })
        case 'failed':
          throw outcome.error
      }
    },
  }
}
