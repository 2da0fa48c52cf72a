import type { AgentSession, Turn } from './session.js'

/** A tool call proposed by the responder; `name` is a tool or a raw client method. */
export type ProposedToolCall = {
  toolCallId: string
  name: string
  arguments: Record<string, unknown>
}

export type ToolResult =
  | { toolCallId: string; name: string; ok: true; output: unknown }
  | { toolCallId: string; name: string; ok: false; error: string }

export type TurnInput = {
  session: AgentSession
  promptText: string
  history: readonly Turn[]
  /** Results of the previous round's tool calls; empty on the first round. */
  toolResults: readonly ToolResult[]
}

export type TurnReply = {
  text: string
  toolCalls: ProposedToolCall[]
}

/**
 * Produces the agent's reply for one prompt turn. A model backend plugs in here;
 * the agent itself only drives the loop and streams what comes back.
 */
export interface TurnResponder {
  respond(input: TurnInput): Promise<TurnReply>
}

export function acknowledgePrompt(promptText: string): string {
  return promptText ? `Received your prompt:\n\n${promptText}` : 'Received an empty prompt.'
}

/** Offline responder: acknowledges the prompt and echoes it back. */
export class EchoResponder implements TurnResponder {
  async respond(input: TurnInput): Promise<TurnReply> {
    return { text: acknowledgePrompt(input.promptText), toolCalls: [] }
  }
}
