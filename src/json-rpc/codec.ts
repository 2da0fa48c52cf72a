import { z } from 'zod'
import {
  JSONRPC_VERSION,
  errorResponse,
  notification,
  request,
  response,
  type JsonRpcId,
  type JsonRpcMessage
} from './types.js'

/**
 * Newline-delimited JSON-RPC 2.0 codec.
 *
 * One JSON object per line, UTF-8, no raw CR/LF inside an encoded line.
 * Decoding never throws: every failure comes back as a tagged `DecodeError`
 * so the read loop can log it and move on to the next line.
 */

const IdSchema = z.union([z.number().int(), z.string()])

const ErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
})

const RequestSchema = z.object({
  id: IdSchema,
  method: z.string(),
  params: z.unknown().optional()
})

const NotificationSchema = z.object({
  method: z.string(),
  params: z.unknown().optional()
})

const ResponseSchema = z.object({
  id: IdSchema,
  result: z.unknown()
})

const ErrorResponseSchema = z.object({
  id: IdSchema.nullable(),
  error: ErrorObjectSchema
})

export type DecodeError =
  | { tag: 'empty' }
  | { tag: 'invalid_json'; reason: string }
  | { tag: 'not_object'; value: unknown }
  | { tag: 'invalid_version'; version: unknown }
  // `id` is set when the line looked like a request, so the caller can answer it.
  | { tag: 'invalid_shape'; reason: string; id?: JsonRpcId }

export type DecodeResult = { ok: true; message: JsonRpcMessage } | { ok: false; error: DecodeError }

export class EncodeFault extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EncodeFault'
  }
}

export type EncodeResult = { ok: true; line: string } | { ok: false; error: EncodeFault }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ')
}

function requestIdOf(obj: Record<string, unknown>): JsonRpcId | undefined {
  if ('result' in obj || 'error' in obj) return undefined
  const parsed = IdSchema.safeParse(obj.id)
  return parsed.success ? parsed.data : undefined
}

function classify(obj: Record<string, unknown>): DecodeResult {
  const invalid = (err: z.ZodError): DecodeResult => {
    const id = requestIdOf(obj)
    const reason = describeIssues(err)
    return { ok: false, error: id === undefined ? { tag: 'invalid_shape', reason } : { tag: 'invalid_shape', reason, id } }
  }

  if ('method' in obj) {
    if ('id' in obj) {
      const parsed = RequestSchema.safeParse(obj)
      if (!parsed.success) return invalid(parsed.error)
      return { ok: true, message: request(parsed.data.id, parsed.data.method, parsed.data.params) }
    }
    const parsed = NotificationSchema.safeParse(obj)
    if (!parsed.success) return invalid(parsed.error)
    return { ok: true, message: notification(parsed.data.method, parsed.data.params) }
  }

  if ('error' in obj) {
    const parsed = ErrorResponseSchema.safeParse(obj)
    if (!parsed.success) return invalid(parsed.error)
    const { code, message, data } = parsed.data.error
    return { ok: true, message: errorResponse(parsed.data.id, code, message, data) }
  }

  // z.unknown() accepts a missing key, so presence is checked by hand.
  if ('result' in obj) {
    const parsed = ResponseSchema.safeParse(obj)
    if (!parsed.success) return invalid(parsed.error)
    return { ok: true, message: response(parsed.data.id, parsed.data.result) }
  }

  return { ok: false, error: { tag: 'invalid_shape', reason: 'expected method, result or error' } }
}

export function decode(line: string): DecodeResult {
  const text = line.replace(/[\r\n]+$/, '')
  if (text.trim() === '') return { ok: false, error: { tag: 'empty' } }

  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    return { ok: false, error: { tag: 'invalid_json', reason: err instanceof Error ? err.message : String(err) } }
  }

  if (!isRecord(value)) return { ok: false, error: { tag: 'not_object', value } }
  if (value.jsonrpc !== JSONRPC_VERSION) {
    return { ok: false, error: { tag: 'invalid_version', version: value.jsonrpc } }
  }

  return classify(value)
}

/** Wire representation of a message (drops the internal `kind` tag). */
export function toWire(message: JsonRpcMessage): Record<string, unknown> {
  switch (message.kind) {
    case 'request': {
      const wire: Record<string, unknown> = { jsonrpc: JSONRPC_VERSION, id: message.id, method: message.method }
      if (message.params !== undefined) wire.params = message.params
      return wire
    }
    case 'notification': {
      const wire: Record<string, unknown> = { jsonrpc: JSONRPC_VERSION, method: message.method }
      if (message.params !== undefined) wire.params = message.params
      return wire
    }
    case 'response':
      return { jsonrpc: JSONRPC_VERSION, id: message.id, result: message.result === undefined ? null : message.result }
    case 'error':
      return { jsonrpc: JSONRPC_VERSION, id: message.id, error: message.error }
  }
}

/**
 * Encode a message as a single line of compact JSON, without the trailing newline.
 */
export function encode(message: JsonRpcMessage): EncodeResult {
  let json: string
  try {
    json = JSON.stringify(toWire(message))
  } catch (err) {
    return { ok: false, error: new EncodeFault(`cannot serialize ${message.kind}`, { cause: err }) }
  }

  if (json.includes('\n') || json.includes('\r')) {
    return { ok: false, error: new EncodeFault('encoded message contains a raw newline') }
  }

  return { ok: true, line: json }
}
