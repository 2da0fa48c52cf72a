import type { ContentBlock, ToolCallContent, ToolKind } from '@agentclientprotocol/sdk'
import { RequestError } from '@agentclientprotocol/sdk'
import { randomBytes } from 'node:crypto'
import type { Logger } from '../logger.js'
import { describeWriteError, type WriteResult } from '../json-rpc/writer.js'
import { ErrorCodes } from '../json-rpc/types.js'

export type StopReason = 'end_turn' | 'cancelled' | 'error'

export type ToolCallStatus = 'pending' | 'in_progress' | 'completed' | 'failed'

export type PlanEntry = {
  content: string
  priority: 'high' | 'medium' | 'low'
  status: 'pending' | 'in_progress' | 'completed'
}

export type SessionUpdate =
  | { sessionUpdate: 'agent_message_chunk'; content: ContentBlock }
  | { sessionUpdate: 'plan'; entries: PlanEntry[] }
  | { sessionUpdate: 'mode'; mode: string }
  | {
      sessionUpdate: 'tool_call'
      toolCallId: string
      title: string
      kind: ToolKind
      status: ToolCallStatus
      rawInput?: unknown
      content?: ToolCallContent[]
    }
  | {
      sessionUpdate: 'tool_call_update'
      toolCallId: string
      status?: ToolCallStatus
      content?: ToolCallContent[]
      rawOutput?: unknown
    }

/** Sends one `session/update` notification; resolves once the line is written. */
export type NotifyFn = (method: string, params: unknown) => Promise<WriteResult>

export type TurnRole = 'user' | 'agent'

export type Turn = {
  role: TurnRole
  // prompt blocks as received (objects only) or the agent's text block
  content: readonly unknown[]
}

export type McpServerList = unknown[]

export function newSessionId(): string {
  return `sess_${randomBytes(12).toString('hex')}`
}

export class SessionManager {
  private sessions = new Map<string, AgentSession>()

  constructor(
    private readonly notify: NotifyFn,
    private readonly logger: Logger
  ) {}

  /** Get a registered session if it exists (no throw). */
  maybeGet(sessionId: string): AgentSession | undefined {
    return this.sessions.get(sessionId)
  }

  create(params: { cwd: string; mcpServers: McpServerList }): AgentSession {
    let sessionId = newSessionId()
    while (this.sessions.has(sessionId)) sessionId = newSessionId()

    const session = new AgentSession({
      sessionId,
      cwd: params.cwd,
      mcpServers: params.mcpServers,
      notify: this.notify,
      logger: this.logger
    })

    this.sessions.set(sessionId, session)
    this.logger.info({ sessionId, cwd: params.cwd }, 'session created')
    return session
  }

  get(sessionId: unknown): AgentSession {
    if (typeof sessionId !== 'string') {
      throw new RequestError(ErrorCodes.InvalidParams, 'Invalid params', { detail: 'sessionId must be a string' })
    }
    const s = this.sessions.get(sessionId)
    if (!s) throw new RequestError(ErrorCodes.InvalidParams, 'Invalid params', { detail: 'Unknown sessionId', sessionId })
    return s
  }

  get size(): number {
    return this.sessions.size
  }
}

export class AgentSession {
  readonly sessionId: string
  readonly cwd: string
  readonly mcpServers: McpServerList
  readonly status = 'active' as const

  private currentMode: string | null = null
  private readonly turns: Turn[] = []
  private readonly notify: NotifyFn
  private readonly logger: Logger

  constructor(opts: { sessionId: string; cwd: string; mcpServers: McpServerList; notify: NotifyFn; logger: Logger }) {
    this.sessionId = opts.sessionId
    this.cwd = opts.cwd
    this.mcpServers = opts.mcpServers
    this.notify = opts.notify
    this.logger = opts.logger
  }

  get mode(): string | null {
    return this.currentMode
  }

  setMode(mode: string): void {
    this.currentMode = mode
  }

  /** Append-only conversation history. */
  get history(): readonly Turn[] {
    return this.turns
  }

  appendTurn(role: TurnRole, content: Turn['content']): void {
    this.turns.push({ role, content })
  }

  /**
   * Send a `session/update`. Resolves after the line has been handed to the writer,
   * so awaiting every emit before replying keeps updates ahead of the response.
   * A failed write is logged; the turn carries on.
   */
  async emit(update: SessionUpdate): Promise<void> {
    const sent = await this.notify('session/update', { sessionId: this.sessionId, update })
    if (!sent.ok) {
      this.logger.warn({ sessionId: this.sessionId, update: update.sessionUpdate, reason: describeWriteError(sent.error) }, 'session/update not delivered')
    }
  }

  async emitText(text: string): Promise<void> {
    await this.emit({ sessionUpdate: 'agent_message_chunk', content: { type: 'text', text } })
  }
}
