export const JSONRPC_VERSION = '2.0'

export type JsonRpcId = number | string

export type JsonRpcErrorObject = {
  code: number
  message: string
  data?: unknown
}

export type JsonRpcRequest = {
  kind: 'request'
  id: JsonRpcId
  method: string
  params?: unknown
}

export type JsonRpcNotification = {
  kind: 'notification'
  method: string
  params?: unknown
}

export type JsonRpcResponse = {
  kind: 'response'
  id: JsonRpcId
  result: unknown
}

export type JsonRpcErrorResponse = {
  kind: 'error'
  // null only when the peer could not determine the id (parse errors)
  id: JsonRpcId | null
  error: JsonRpcErrorObject
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse | JsonRpcErrorResponse

export type JsonRpcReply = JsonRpcResponse | JsonRpcErrorResponse

// Standard JSON-RPC codes plus the one domain code this agent uses.
export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  NotInitialized: -32000
} as const

export function request(id: JsonRpcId, method: string, params?: unknown): JsonRpcRequest {
  return params === undefined ? { kind: 'request', id, method } : { kind: 'request', id, method, params }
}

export function notification(method: string, params?: unknown): JsonRpcNotification {
  return params === undefined ? { kind: 'notification', method } : { kind: 'notification', method, params }
}

export function response(id: JsonRpcId, result: unknown): JsonRpcResponse {
  // `result` must be present on the wire even when a handler returns nothing.
  return { kind: 'response', id, result: result === undefined ? null : result }
}

export function errorResponse(id: JsonRpcId | null, code: number, message: string, data?: unknown): JsonRpcErrorResponse {
  const error: JsonRpcErrorObject = data === undefined ? { code, message } : { code, message, data }
  return { kind: 'error', id, error }
}

export function isReply(msg: JsonRpcMessage): msg is JsonRpcReply {
  return msg.kind === 'response' || msg.kind === 'error'
}
