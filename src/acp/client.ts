import type {
  CreateTerminalRequest,
  EnvVariable,
  PermissionOption,
  ReadTextFileRequest,
  WriteTextFileRequest
} from '@agentclientprotocol/sdk'
import { isAbsolute } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { describeRequestFailure, type CorrelationRouter, type RequestFailure } from '../json-rpc/router.js'
import { hasCapability, type Capability, type NegotiatedCapabilities } from './capabilities.js'

export type HelperFailure =
  | RequestFailure
  | { kind: 'unsupported'; method: string }
  | { kind: 'invalid_path'; path: string }
  | { kind: 'invalid_params'; detail: string }

export type HelperOutcome = { ok: true; result: unknown } | { ok: false; error: HelperFailure }

/**
 * Environment for `terminal/create`: a record, a list of `[name, value]` pairs, or the
 * wire list of `{ name, value }` objects.
 */
export const EnvInputSchema = z.union([
  z.record(z.string()),
  z.array(z.tuple([z.string(), z.string()])),
  z.array(z.object({ name: z.string(), value: z.string() }))
])

export type EnvInput = z.infer<typeof EnvInputSchema>

export const PermissionOptionSchema = z.object({
  optionId: z.string(),
  name: z.string(),
  kind: z.enum(['allow_once', 'allow_always', 'reject_once', 'reject_always'])
})

export const DEFAULT_PERMISSION_OPTIONS: readonly PermissionOption[] = Object.freeze([
  { optionId: 'allow-once', name: 'Allow once', kind: 'allow_once' },
  { optionId: 'reject-once', name: 'Reject', kind: 'reject_once' }
])

/** Tool call reference sent with a permission request; extra fields pass through. */
export type PermissionToolCall = { toolCallId: string } & Record<string, unknown>

type CallOptions = { timeoutMs?: number }

export type ReadTextFileOptions = CallOptions & { line?: number; limit?: number }

export type CreateTerminalOptions = CallOptions & {
  args?: string[]
  cwd?: string
  env?: EnvInput
  outputByteLimit?: number
}

export function normalizeEnv(env: EnvInput | undefined): EnvVariable[] {
  if (env === undefined) return []
  if (!Array.isArray(env)) return Object.entries(env).map(([name, value]) => ({ name, value }))
  return env.map(entry => (Array.isArray(entry) ? { name: entry[0], value: entry[1] } : { name: entry.name, value: entry.value }))
}

export function describeHelperFailure(failure: HelperFailure): string {
  switch (failure.kind) {
    case 'unsupported':
      return `client does not support ${failure.method}`
    case 'invalid_path':
      return `path must be absolute: ${failure.path}`
    case 'invalid_params':
      return failure.detail
    default:
      return describeRequestFailure(failure)
  }
}

/** `file://` URIs become paths; anything else is returned as is for the path check. */
export function toFsPath(pathOrUri: string): string {
  if (!pathOrUri.startsWith('file://')) return pathOrUri
  try {
    return fileURLToPath(pathOrUri)
  } catch {
    // not a usable file URI; the path check reports it as relative
    return pathOrUri
  }
}

/** Params of raw client methods that name a file-system location. */
const PATH_PARAMS = ['path', 'cwd'] as const

function isNonNegativeInt(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0
}

function fail(error: HelperFailure): HelperOutcome {
  return { ok: false, error }
}

/**
 * Capability-gated wrappers for client-side ACP methods (fs, terminal, permission).
 *
 * Each call is: capability check -> validation -> `router.request`. Nothing is written to
 * the wire when the client did not advertise the capability or a path is relative.
 */
export class HostClient {
  constructor(
    private readonly router: CorrelationRouter,
    private readonly capabilities: () => NegotiatedCapabilities
  ) {}

  supports(capability: Capability): boolean {
    return hasCapability(this.capabilities(), capability)
  }

  async readTextFile(sessionId: string, path: string, opts: ReadTextFileOptions = {}): Promise<HelperOutcome> {
    const method = 'fs/read_text_file'
    if (!this.supports('fs.readTextFile')) return fail({ kind: 'unsupported', method })
    if (!isAbsolute(path)) return fail({ kind: 'invalid_path', path })
    if (opts.line !== undefined && !isNonNegativeInt(opts.line)) {
      return fail({ kind: 'invalid_params', detail: 'line must be an integer >= 0' })
    }
    if (opts.limit !== undefined && !isNonNegativeInt(opts.limit)) {
      return fail({ kind: 'invalid_params', detail: 'limit must be an integer >= 0' })
    }

    const params: ReadTextFileRequest = { sessionId, path }
    if (opts.line !== undefined) params.line = opts.line
    if (opts.limit !== undefined) params.limit = opts.limit

    return this.router.request(method, params, opts)
  }

  async writeTextFile(sessionId: string, path: string, content: string, opts: CallOptions = {}): Promise<HelperOutcome> {
    const method = 'fs/write_text_file'
    if (!this.supports('fs.writeTextFile')) return fail({ kind: 'unsupported', method })
    if (!isAbsolute(path)) return fail({ kind: 'invalid_path', path })

    return this.router.request(method, { sessionId, path, content } satisfies WriteTextFileRequest, opts)
  }

  async createTerminal(sessionId: string, command: string, opts: CreateTerminalOptions = {}): Promise<HelperOutcome> {
    const method = 'terminal/create'
    if (!this.supports('terminal')) return fail({ kind: 'unsupported', method })

    const args = opts.args ?? []
    if (!args.every(a => typeof a === 'string')) {
      return fail({ kind: 'invalid_params', detail: 'args must be a list of strings' })
    }
    if (opts.cwd !== undefined && !isAbsolute(opts.cwd)) return fail({ kind: 'invalid_path', path: opts.cwd })
    if (opts.outputByteLimit !== undefined && !isNonNegativeInt(opts.outputByteLimit)) {
      return fail({ kind: 'invalid_params', detail: 'outputByteLimit must be an integer >= 0' })
    }

    const params: CreateTerminalRequest = { sessionId, command, args, env: normalizeEnv(opts.env) }
    if (opts.cwd !== undefined) params.cwd = opts.cwd
    if (opts.outputByteLimit !== undefined) params.outputByteLimit = opts.outputByteLimit

    return this.router.request(method, params, opts)
  }

  terminalOutput(sessionId: string, terminalId: string, opts: CallOptions = {}): Promise<HelperOutcome> {
    return this.terminalCall('terminal/output', sessionId, terminalId, opts)
  }

  waitForTerminalExit(sessionId: string, terminalId: string, opts: CallOptions = {}): Promise<HelperOutcome> {
    return this.terminalCall('terminal/wait_for_exit', sessionId, terminalId, opts)
  }

  killTerminal(sessionId: string, terminalId: string, opts: CallOptions = {}): Promise<HelperOutcome> {
    return this.terminalCall('terminal/kill', sessionId, terminalId, opts)
  }

  releaseTerminal(sessionId: string, terminalId: string, opts: CallOptions = {}): Promise<HelperOutcome> {
    return this.terminalCall('terminal/release', sessionId, terminalId, opts)
  }

  /**
   * `session/request_permission` for a tool call. Not capability-gated: every client
   * must implement it. Pass `'default'` for the allow-once / reject-once pair.
   */
  async requestPermission(
    sessionId: string,
    toolCall: Record<string, unknown>,
    options: readonly unknown[] | 'default' = 'default',
    opts: CallOptions = {}
  ): Promise<HelperOutcome> {
    const toolCallId = toolCall.toolCallId
    if (typeof toolCallId !== 'string') {
      return fail({ kind: 'invalid_params', detail: 'toolCall must include a string toolCallId' })
    }

    let permissionOptions: PermissionOption[]
    if (options === 'default') {
      permissionOptions = [...DEFAULT_PERMISSION_OPTIONS]
    } else {
      const parsed = z.array(PermissionOptionSchema).safeParse(options)
      if (!parsed.success) {
        return fail({ kind: 'invalid_params', detail: 'options must be a list of { optionId, name, kind } objects' })
      }
      permissionOptions = parsed.data
    }

    const ref: PermissionToolCall = { ...toolCall, toolCallId }
    return this.router.request('session/request_permission', { sessionId, toolCall: ref, options: permissionOptions }, opts)
  }

  /**
   * Pass-through for a client method by name, with the capability check the method
   * needs. String `path` and `cwd` params must be absolute (`file://` URIs are
   * converted). `sessionId` is added to the params.
   */
  async call(method: string, capability: Capability | null, sessionId: string, params: Record<string, unknown>, opts: CallOptions = {}): Promise<HelperOutcome> {
    if (capability && !this.supports(capability)) return fail({ kind: 'unsupported', method })

    const checked: Record<string, unknown> = { ...params, sessionId }
    for (const key of PATH_PARAMS) {
      const value = checked[key]
      if (typeof value !== 'string') continue
      const path = toFsPath(value)
      if (!isAbsolute(path)) return fail({ kind: 'invalid_path', path })
      checked[key] = path
    }

    return this.router.request(method, checked, opts)
  }

  private async terminalCall(method: string, sessionId: string, terminalId: string, opts: CallOptions): Promise<HelperOutcome> {
    if (!this.supports('terminal')) return fail({ kind: 'unsupported', method })
    return this.router.request(method, { sessionId, terminalId }, opts)
  }
}
