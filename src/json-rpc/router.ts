import type { Logger } from '../logger.js'
import { describeWriteError, type WriteError, type WriteResult } from './writer.js'
import { notification, request, type JsonRpcErrorObject, type JsonRpcMessage } from './types.js'

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

export type SendFn = (message: JsonRpcMessage) => Promise<WriteResult>

export type RequestFailure =
  | { kind: 'remote'; error: JsonRpcErrorObject }
  | { kind: 'timeout'; id: number }
  | { kind: 'send_failed'; reason: WriteError }
  | { kind: 'router_stopped' }

/** Outcome of an agent-initiated request. Never rejects; failures are values. */
export type RequestOutcome = { ok: true; result: unknown } | { ok: false; error: RequestFailure }

type PendingRequest = {
  id: number
  method: string
  createdAt: number
  deadline: number
  timer: NodeJS.Timeout
  resolve: (outcome: RequestOutcome) => void
}

export type RouterOptions = {
  send: SendFn
  logger: Logger
  /** First outbound id (positive integer). */
  idStart?: number
  defaultTimeoutMs?: number
}

/**
 * Correlates agent -> client requests with the client's replies.
 *
 * Replies travel on the same stream the dispatch loop reads, so `request()` only
 * suspends its own caller; the read loop keeps running and hands replies to
 * `handleIncoming()`, which resolves the waiting promise.
 */
export class CorrelationRouter {
  private nextId: number
  private readonly pending = new Map<number, PendingRequest>()
  private readonly send: SendFn
  private readonly logger: Logger
  private readonly defaultTimeoutMs: number
  private stopped = false

  constructor(opts: RouterOptions) {
    const idStart = opts.idStart ?? 1
    if (!Number.isSafeInteger(idStart) || idStart < 1) {
      throw new RangeError(`idStart must be a positive integer, got ${idStart}`)
    }
    this.nextId = idStart
    this.send = opts.send
    this.logger = opts.logger
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
  }

  get isStopped(): boolean {
    return this.stopped
  }

  pendingCount(): number {
    return this.pending.size
  }

  async request(method: string, params?: unknown, opts: { timeoutMs?: number } = {}): Promise<RequestOutcome> {
    if (this.stopped) return { ok: false, error: { kind: 'router_stopped' } }

    const id = this.nextId++
    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs

    // The entry exists before the line is written, so even an immediate reply finds it.
    const outcome = new Promise<RequestOutcome>(resolve => {
      const createdAt = Date.now()
      const timer = setTimeout(() => this.expire(id), timeoutMs)
      this.pending.set(id, { id, method, createdAt, deadline: createdAt + timeoutMs, timer, resolve })
    })

    this.logger.debug({ id, method, timeoutMs }, 'agent -> client request')

    let sent: WriteResult
    try {
      sent = await this.send(request(id, method, params))
    } catch (err) {
      sent = { ok: false, error: { kind: 'io', error: err instanceof Error ? err : new Error(String(err)) } }
    }

    if (!sent.ok) {
      this.logger.debug({ id, method, reason: describeWriteError(sent.error) }, 'agent -> client send failed')
      this.settle(id, { ok: false, error: { kind: 'send_failed', reason: sent.error } })
    }

    return outcome
  }

  notify(method: string, params?: unknown): Promise<WriteResult> {
    return this.send(notification(method, params))
  }

  /**
   * Offer an inbound message to the router. Returns true when it was the reply to a
   * pending request (and has been consumed); false means the caller still owns it.
   */
  handleIncoming(message: JsonRpcMessage): boolean {
    if (message.kind !== 'response' && message.kind !== 'error') return false
    if (typeof message.id !== 'number') return false

    const entry = this.pending.get(message.id)
    if (!entry) {
      this.logger.debug({ id: message.id, kind: message.kind }, 'client reply for unknown or expired id ignored')
      return false
    }

    this.logger.debug({ id: entry.id, method: entry.method, kind: message.kind, elapsedMs: Date.now() - entry.createdAt }, 'client -> agent reply')

    if (message.kind === 'response') this.settle(entry.id, { ok: true, result: message.result })
    else this.settle(entry.id, { ok: false, error: { kind: 'remote', error: message.error } })
    return true
  }

  /** Fail every pending request with `router_stopped` and refuse new ones. */
  stop(reason = 'stopped'): void {
    if (this.stopped) return
    this.stopped = true

    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer)
      this.logger.debug({ id: entry.id, method: entry.method, reason }, 'router stopping; failing pending request')
      entry.resolve({ ok: false, error: { kind: 'router_stopped' } })
    }
    this.pending.clear()
  }

  private expire(id: number): void {
    const entry = this.pending.get(id)
    if (!entry) return
    this.logger.debug({ id, method: entry.method, deadline: entry.deadline }, 'client request timed out')
    this.settle(id, { ok: false, error: { kind: 'timeout', id } })
  }

  private settle(id: number, outcome: RequestOutcome): void {
    const entry = this.pending.get(id)
    if (!entry) return
    clearTimeout(entry.timer)
    this.pending.delete(id)
    entry.resolve(outcome)
  }
}

export function describeRequestFailure(failure: RequestFailure): string {
  switch (failure.kind) {
    case 'remote':
      return `client error ${failure.error.code}: ${failure.error.message}`
    case 'timeout':
      return `timed out (id=${failure.id})`
    case 'send_failed':
      return `send failed: ${describeWriteError(failure.reason)}`
    case 'router_stopped':
      return 'router stopped'
  }
}
