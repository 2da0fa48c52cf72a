import { RequestError } from '@agentclientprotocol/sdk'
import { isAbsolute } from 'node:path'
import { readPackageInfo, type AgentConfig, type PackageInfo } from '../config.js'
import type { Logger } from '../logger.js'
import type { CorrelationRouter } from '../json-rpc/router.js'
import { describeWriteError } from '../json-rpc/writer.js'
import { ErrorCodes } from '../json-rpc/types.js'
import { NO_CAPABILITIES, normalizeClientCapabilities, type NegotiatedCapabilities } from './capabilities.js'
import { HostClient } from './client.js'
import { EchoResponder, acknowledgePrompt, type ToolResult, type TurnReply, type TurnResponder } from './responder.js'
import { SessionManager, type AgentSession, type PlanEntry, type StopReason } from './session.js'
import { ToolRunner } from './tools.js'
import { renderPrompt } from './translate/prompt.js'

export const SUPPORTED_PROTOCOL_VERSIONS: readonly number[] = [1]
export const LATEST_PROTOCOL_VERSION = 1

/** Inbound requests the agent answers. Anything else is -32601. */
export const AGENT_METHODS = ['initialize', 'authenticate', 'session/new', 'session/set_mode', 'session/prompt'] as const
export type AgentMethod = (typeof AGENT_METHODS)[number]

const AGENT_METHOD_SET: ReadonlySet<string> = new Set(AGENT_METHODS)

function isAgentMethod(method: string): method is AgentMethod {
  return AGENT_METHOD_SET.has(method)
}

export const AGENT_CAPABILITIES = {
  loadSession: false,
  promptCapabilities: { image: false, audio: false, embeddedContext: true },
  mcpCapabilities: { http: false, sse: false }
} as const

const TURN_PLAN: PlanEntry[] = [
  { content: 'Understand the request', priority: 'high', status: 'completed' },
  { content: 'Prepare a response', priority: 'high', status: 'completed' },
  { content: 'Execute requested tools (if any) and respond', priority: 'high', status: 'completed' }
]

/** Everything a handler may touch, passed in explicitly. */
export type AgentContext = {
  router: CorrelationRouter
  config: AgentConfig
  logger: Logger
  responder?: TurnResponder
  agentInfo?: PackageInfo
}

type Params = Record<string, unknown>

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x)
}

function invalidParams(detail: string): RequestError {
  return new RequestError(ErrorCodes.InvalidParams, 'Invalid params', { detail })
}

function notInitialized(method: string): RequestError {
  return new RequestError(ErrorCodes.NotInitialized, 'Not initialized', { detail: `Call initialize before ${method}` })
}

export function methodNotFound(method: string): RequestError {
  return new RequestError(ErrorCodes.MethodNotFound, 'Method not found', { method })
}

/** Split reply text into `agent_message_chunk` payloads, by code point. */
export function chunkText(text: string, mode: AgentConfig['chunkMode'], size: number): string[] {
  const chars = Array.from(text)
  if (mode === 'char') return chars

  const chunks: string[] = []
  for (let i = 0; i < chars.length; i += size) {
    chunks.push(chars.slice(i, i + size).join(''))
  }
  return chunks
}

/**
 * Protocol state for one host connection: negotiation, sessions and prompt turns.
 *
 * Handlers throw `RequestError` for protocol errors; the connection turns them into
 * error responses. Every `session/update` a handler emits is written before it returns.
 */
export class CodingAgent {
  private protocolVersion: number | null = null
  private clientInfo: unknown = null
  private capabilities: NegotiatedCapabilities = NO_CAPABILITIES

  readonly sessions: SessionManager
  readonly client: HostClient
  private readonly tools: ToolRunner
  private readonly responder: TurnResponder
  private readonly config: AgentConfig
  private readonly logger: Logger
  private readonly router: CorrelationRouter
  private readonly agentInfo: PackageInfo

  constructor(ctx: AgentContext) {
    this.router = ctx.router
    this.config = ctx.config
    this.logger = ctx.logger
    this.responder = ctx.responder ?? new EchoResponder()
    this.agentInfo = ctx.agentInfo ?? readPackageInfo()

    this.sessions = new SessionManager((method, params) => this.router.notify(method, params), this.logger)
    this.client = new HostClient(this.router, () => this.capabilities)
    this.tools = new ToolRunner(this.client, this.logger)
  }

  get isInitialized(): boolean {
    return this.protocolVersion !== null
  }

  get negotiatedCapabilities(): NegotiatedCapabilities {
    return this.capabilities
  }

  get peerInfo(): unknown {
    return this.clientInfo
  }

  async handleRequest(method: string, rawParams: unknown): Promise<unknown> {
    if (!isAgentMethod(method)) throw methodNotFound(method)

    const params: Params = isRecord(rawParams) ? rawParams : {}
    switch (method) {
      case 'initialize':
        return this.initialize(params)
      case 'authenticate':
        // no auth methods are advertised
        return {}
      case 'session/new':
        return this.newSession(params)
      case 'session/set_mode':
        return this.setMode(params)
      case 'session/prompt':
        return this.prompt(params)
    }
  }

  async handleNotification(method: string, rawParams: unknown): Promise<void> {
    const params: Params = isRecord(rawParams) ? rawParams : {}
    switch (method) {
      case 'session/cancel':
        await this.cancel(params)
        return
      default:
        this.logger.debug({ method }, 'ignoring unknown notification')
    }
  }

  private initialize(params: Params) {
    const requested = params.protocolVersion
    if (typeof requested !== 'number' || !Number.isInteger(requested)) {
      throw invalidParams('protocolVersion must be an integer')
    }
    if (params.clientCapabilities !== undefined && !isRecord(params.clientCapabilities)) {
      throw invalidParams('clientCapabilities must be an object')
    }

    const protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.includes(requested) ? requested : LATEST_PROTOCOL_VERSION

    this.protocolVersion = protocolVersion
    this.capabilities = normalizeClientCapabilities(params.clientCapabilities)
    this.clientInfo = params.clientInfo ?? null

    this.logger.info({ requested, protocolVersion, capabilities: this.capabilities }, 'initialized')

    return {
      protocolVersion,
      agentCapabilities: AGENT_CAPABILITIES,
      agentInfo: {
        name: this.agentInfo.name,
        title: 'Stdio ACP Agent',
        version: this.agentInfo.version
      },
      authMethods: []
    }
  }

  private newSession(params: Params) {
    this.ensureInitialized('session/new')

    const cwd = params.cwd
    if (typeof cwd !== 'string') throw invalidParams('cwd must be a string')
    if (!isAbsolute(cwd)) throw invalidParams('cwd must be an absolute path')

    const mcpServers = params.mcpServers ?? []
    if (!Array.isArray(mcpServers)) throw invalidParams('mcpServers must be a list')

    const session = this.sessions.create({ cwd, mcpServers })
    return { sessionId: session.sessionId }
  }

  private async setMode(params: Params): Promise<null> {
    this.ensureInitialized('session/set_mode')

    const session = this.sessions.get(params.sessionId)
    const mode = params.mode
    if (typeof mode !== 'string') throw invalidParams('mode must be a string')

    session.setMode(mode)
    await session.emit({ sessionUpdate: 'mode', mode })
    return null
  }

  private async cancel(params: Params): Promise<void> {
    const sessionId = params.sessionId
    if (typeof sessionId !== 'string') {
      this.logger.warn({ sessionId }, 'session/cancel without a string sessionId, dropped')
      return
    }

    // Acknowledge only: turns run to completion.
    const sent = await this.router.notify('session/update', {
      sessionId,
      update: { sessionUpdate: 'agent_message_chunk', content: { type: 'text', text: 'Cancellation requested.' } }
    })
    if (!sent.ok) this.logger.warn({ sessionId, reason: describeWriteError(sent.error) }, 'cancel acknowledgement not delivered')
  }

  private async prompt(params: Params): Promise<{ stopReason: StopReason }> {
    this.ensureInitialized('session/prompt')

    const session = this.sessions.get(params.sessionId)
    const prompt = params.prompt
    if (!Array.isArray(prompt)) throw invalidParams('prompt must be a list')
    if (!prompt.every(isRecord)) throw invalidParams('prompt must be a list of objects')

    const promptText = renderPrompt(prompt)
    session.appendTurn('user', prompt)

    await session.emit({ sessionUpdate: 'plan', entries: TURN_PLAN })

    const text = await this.runTurn(session, promptText)

    for (const chunk of chunkText(text, this.config.chunkMode, this.config.chunkSize)) {
      await session.emitText(chunk)
    }

    session.appendTurn('agent', [{ type: 'text', text }])
    return { stopReason: 'end_turn' }
  }

  /**
   * Ask the responder for a reply, running proposed tool calls between rounds. After
   * `maxToolRounds` rounds of tools the last reply text is used as is. A blank reply
   * becomes the prompt acknowledgement, so every turn streams some text.
   */
  private async runTurn(session: AgentSession, promptText: string): Promise<string> {
    let toolResults: ToolResult[] = []

    try {
      let reply: TurnReply = await this.responder.respond({ session, promptText, history: session.history, toolResults })
      for (let round = 0; reply.toolCalls.length > 0 && round < this.config.maxToolRounds; round++) {
        toolResults = await this.tools.run(session, reply.toolCalls, { requestPermission: this.config.requestPermission })
        reply = await this.responder.respond({ session, promptText, history: session.history, toolResults })
      }
      return reply.text.trim() === '' ? acknowledgePrompt(promptText) : reply.text
    } catch (err) {
      this.logger.error({ err, sessionId: session.sessionId }, 'turn responder failed')
      const reason = err instanceof Error ? err.message : String(err)
      return [`The responder failed (${reason}).`, '', 'Your prompt (rendered):', promptText].join('\n')
    }
  }

  private ensureInitialized(method: string): void {
    if (this.protocolVersion === null) throw notInitialized(method)
  }
}
