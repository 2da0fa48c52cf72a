import { RequestError } from '@agentclientprotocol/sdk'
import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import { CodingAgent } from '../acp/agent.js'
import type { TurnResponder } from '../acp/responder.js'
import type { AgentConfig, PackageInfo } from '../config.js'
import { createChildLogger, type Logger } from '../logger.js'
import { decode, type DecodeError } from './codec.js'
import { CorrelationRouter } from './router.js'
import {
  ErrorCodes,
  errorResponse,
  response,
  type JsonRpcErrorResponse,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest
} from './types.js'
import { MessageWriter, describeWriteError } from './writer.js'

export type ConnectionOptions = {
  input: Readable
  output: Writable
  config: AgentConfig
  logger: Logger
  responder?: TurnResponder
  agentInfo?: PackageInfo
}

/**
 * The single dispatch point between stdio and the agent.
 *
 * Replies to agent-initiated requests go straight to the router from the read loop.
 * Requests and notifications run one at a time on a promise chain, so a handler
 * waiting on the client never stops the loop from reading that reply.
 */
export class AgentConnection {
  readonly writer: MessageWriter
  readonly router: CorrelationRouter
  readonly agent: CodingAgent

  private readonly input: Readable
  private readonly logger: Logger
  private inbound: Promise<void> = Promise.resolve()

  constructor(opts: ConnectionOptions) {
    this.input = opts.input
    this.logger = createChildLogger(opts.logger, 'connection')
    this.writer = new MessageWriter(opts.output, createChildLogger(opts.logger, 'writer'))
    this.router = new CorrelationRouter({
      send: message => this.writer.send(message),
      logger: createChildLogger(opts.logger, 'router'),
      defaultTimeoutMs: opts.config.requestTimeoutMs
    })
    this.agent = new CodingAgent({
      router: this.router,
      config: opts.config,
      logger: createChildLogger(opts.logger, 'agent'),
      responder: opts.responder,
      agentInfo: opts.agentInfo
    })
  }

  /** Read until the input ends, then fail outstanding client requests and drain. */
  async run(): Promise<void> {
    const lines = createInterface({ input: this.input, crlfDelay: Infinity })
    for await (const line of lines) {
      this.handleLine(line)
    }

    this.logger.info('input closed')
    this.router.stop('input closed')
    await this.inbound
    await this.writer.flush()
  }

  handleLine(line: string): void {
    const decoded = decode(line)
    if (!decoded.ok) {
      this.onDecodeError(decoded.error)
      return
    }

    const message = decoded.message
    switch (message.kind) {
      case 'response':
      case 'error':
        // the router logs replies it cannot match
        this.router.handleIncoming(message)
        return
      case 'request':
        this.logger.debug({ id: message.id, method: message.method }, 'client -> agent request')
        this.enqueue(() => this.dispatchRequest(message))
        return
      case 'notification':
        this.logger.debug({ method: message.method }, 'client -> agent notification')
        this.enqueue(() => this.dispatchNotification(message))
        return
    }
  }

  private enqueue(task: () => Promise<void>): void {
    this.inbound = this.inbound.then(task).catch(err => {
      this.logger.error({ err }, 'inbound task failed')
    })
  }

  private onDecodeError(error: DecodeError): void {
    if (error.tag === 'empty') {
      this.logger.debug('blank line skipped')
      return
    }

    this.logger.warn({ error }, 'undecodable line skipped')

    if (error.tag === 'invalid_shape' && error.id !== undefined) {
      const reply = errorResponse(error.id, ErrorCodes.InvalidRequest, 'Invalid Request', { detail: error.reason })
      this.enqueue(() => this.reply(reply))
    }
  }

  private async dispatchRequest(message: JsonRpcRequest): Promise<void> {
    let reply: JsonRpcMessage
    try {
      const result = await this.agent.handleRequest(message.method, message.params)
      reply = response(message.id, result)
    } catch (err) {
      reply = this.toErrorResponse(message, err)
    }
    await this.reply(reply)
  }

  private async dispatchNotification(message: JsonRpcNotification): Promise<void> {
    try {
      await this.agent.handleNotification(message.method, message.params)
    } catch (err) {
      this.logger.error({ err, method: message.method }, 'notification handler failed')
    }
  }

  private toErrorResponse(message: JsonRpcRequest, err: unknown): JsonRpcErrorResponse {
    if (err instanceof RequestError) {
      this.logger.debug({ id: message.id, method: message.method, code: err.code }, 'request rejected')
      return errorResponse(message.id, err.code, err.message, err.data)
    }

    this.logger.error({ err, id: message.id, method: message.method }, 'request handler failed')
    return errorResponse(message.id, ErrorCodes.InternalError, 'Internal error', { method: message.method })
  }

  private async reply(message: JsonRpcMessage): Promise<void> {
    const sent = await this.writer.send(message)
    if (sent.ok) return

    this.logger.error({ reason: describeWriteError(sent.error) }, 'reply not written')

    // A result that cannot be serialized still gets an answer.
    if (sent.error.kind === 'encode' && message.kind === 'response') {
      const fallback = errorResponse(message.id, ErrorCodes.InternalError, 'Internal error', { detail: 'result could not be encoded' })
      const retried = await this.writer.send(fallback)
      if (!retried.ok) this.logger.error({ reason: describeWriteError(retried.error) }, 'error reply not written')
    }
  }
}
