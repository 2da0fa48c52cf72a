import type { Writable } from 'node:stream'
import { createSilentLogger, type Logger } from '../logger.js'
import { encode, type EncodeFault } from './codec.js'
import type { JsonRpcMessage } from './types.js'

export type WriteError =
  | { kind: 'encode'; fault: EncodeFault }
  | { kind: 'closed' }
  | { kind: 'io'; error: Error }

export type WriteResult = { ok: true } | { ok: false; error: WriteError }

/**
 * The only owner of the output stream.
 *
 * Each message becomes exactly one `write()` of `<json>\n`. Writes are chained so
 * a line is handed to the stream only after the previous one was accepted, and
 * the order of `send()` calls is the order of lines on the wire. A stream `'error'`
 * (EPIPE once the host has gone) marks the writer closed; it is never rethrown.
 */
export class MessageWriter {
  private tail: Promise<WriteResult> = Promise.resolve({ ok: true })
  private streamError: Error | null = null

  constructor(
    private readonly out: Writable,
    private readonly logger: Logger = createSilentLogger()
  ) {
    out.on('error', err => {
      if (this.streamError === null) this.logger.warn({ err }, 'output stream failed, further messages are dropped')
      this.streamError = err
    })
  }

  get isClosed(): boolean {
    return this.streamError !== null || this.out.destroyed || !this.out.writable
  }

  send(message: JsonRpcMessage): Promise<WriteResult> {
    // Encode eagerly: a bad message must not take a slot in the chain.
    const encoded = encode(message)
    if (!encoded.ok) return Promise.resolve({ ok: false, error: { kind: 'encode', fault: encoded.error } })

    const line = `${encoded.line}\n`
    const next = this.tail.then(() => this.writeLine(line))
    this.tail = next
    return next
  }

  /** Resolves once every line handed to `send()` so far has been written (or failed). */
  async flush(): Promise<void> {
    await this.tail
  }

  private writeLine(line: string): Promise<WriteResult> {
    return new Promise<WriteResult>(resolve => {
      if (this.isClosed) {
        resolve({ ok: false, error: { kind: 'closed' } })
        return
      }
      try {
        this.out.write(line, err => {
          if (err) resolve({ ok: false, error: { kind: 'io', error: err } })
          else resolve({ ok: true })
        })
      } catch (err) {
        resolve({ ok: false, error: { kind: 'io', error: err instanceof Error ? err : new Error(String(err)) } })
      }
    })
  }
}

export function describeWriteError(error: WriteError): string {
  switch (error.kind) {
    case 'encode':
      return `encode failed: ${error.fault.message}`
    case 'closed':
      return 'output stream closed'
    case 'io':
      return `write failed: ${error.error.message}`
  }
}
