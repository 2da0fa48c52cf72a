import type { ToolCallContent, ToolKind } from '@agentclientprotocol/sdk'
import { z } from 'zod'
import type { Logger } from '../logger.js'
import { capabilityForMethod } from './capabilities.js'
import { EnvInputSchema, describeHelperFailure, toFsPath, type HelperFailure, type HostClient } from './client.js'
import type { ProposedToolCall, ToolResult } from './responder.js'
import type { AgentSession } from './session.js'

export const DEFAULT_TERMINAL_OUTPUT_LIMIT = 1_048_576

export type ToolRunOptions = {
  /** Ask the client before edit/execute tool calls. */
  requestPermission: boolean
}

type Args = Record<string, unknown>

type DispatchResult =
  | { ok: true; output: unknown; rawOutput: unknown; content: ToolCallContent[] }
  | { ok: false; message: string; rawOutput: unknown }

type PermissionDecision = { kind: 'allowed' } | { kind: 'denied'; message: string }

const PermissionResultSchema = z.object({
  outcome: z.discriminatedUnion('outcome', [
    z.object({ outcome: z.literal('selected'), optionId: z.string() }),
    z.object({ outcome: z.literal('cancelled') })
  ])
})

const ALLOWING_OPTIONS = new Set(['allow-once', 'allow-always'])

const PERMISSION_KINDS = new Set<ToolKind>(['edit', 'delete', 'move', 'execute'])
const PERMISSION_NAMES = new Set(['write_file', 'run_command', 'fs/write_text_file', 'terminal/create'])

export function toolKind(name: string): ToolKind {
  switch (name) {
    case 'read_file':
    case 'fs/read_text_file':
      return 'read'
    case 'write_file':
    case 'fs/write_text_file':
      return 'edit'
    case 'run_command':
    case 'terminal/create':
      return 'execute'
    default:
      return 'other'
  }
}

function stringArg(args: Args, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const v = args[key]
    if (typeof v === 'string' && v !== '') return v
  }
  return undefined
}

export function toolTitle(name: string, args: Args): string {
  const path = stringArg(args, 'path')
  switch (name) {
    case 'read_file':
      return path ? `Reading file (${path})` : 'Reading file'
    case 'write_file':
      return path ? `Writing file (${path})` : 'Writing file'
    case 'run_command':
      return `Running ${stringArg(args, 'command', 'cmd') ?? 'command'}`
    default:
      return `Running ${name}`
  }
}

export function needsPermission(name: string): boolean {
  return PERMISSION_KINDS.has(toolKind(name)) || PERMISSION_NAMES.has(name)
}

export function stringifyToolOutput(output: unknown): string {
  if (typeof output === 'string') return output
  return JSON.stringify(output ?? null)
}

function text(value: string): ToolCallContent {
  return { type: 'content', content: { type: 'text', text: value } }
}

function failureMessage(method: string, failure: HelperFailure): string {
  if (failure.kind === 'timeout') return `Timeout calling ${method} (id=${failure.id})`
  return `Error: ${describeHelperFailure(failure)}`
}

function failed(method: string, failure: HelperFailure, rawOutput: Args = {}): DispatchResult {
  return { ok: false, message: failureMessage(method, failure), rawOutput: { method, ...rawOutput } }
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x)
}

/**
 * Runs tool calls proposed for a prompt turn against the client, reporting each one
 * as a `tool_call` followed by `tool_call_update`s.
 */
export class ToolRunner {
  constructor(
    private readonly client: HostClient,
    private readonly logger: Logger
  ) {}

  async run(session: AgentSession, toolCalls: readonly ProposedToolCall[], opts: ToolRunOptions): Promise<ToolResult[]> {
    const results: ToolResult[] = []
    for (const call of toolCalls) {
      results.push(await this.runOne(session, call, opts))
    }
    return results
  }

  private async runOne(session: AgentSession, call: ProposedToolCall, opts: ToolRunOptions): Promise<ToolResult> {
    const { toolCallId, name } = call
    const args = call.arguments
    const kind = toolKind(name)
    const title = toolTitle(name, args)

    await session.emit({
      sessionUpdate: 'tool_call',
      toolCallId,
      title,
      kind,
      status: 'pending',
      rawInput: { name, arguments: args }
    })

    if (opts.requestPermission && needsPermission(name)) {
      const decision = await this.askPermission(session, call, kind, title)
      if (decision.kind === 'denied') {
        await session.emit({ sessionUpdate: 'tool_call_update', toolCallId, status: 'failed', content: [text(decision.message)] })
        return { toolCallId, name, ok: false, error: decision.message }
      }
    }

    await session.emit({ sessionUpdate: 'tool_call_update', toolCallId, status: 'in_progress' })

    const result = await this.dispatch(session, call)
    if (result.ok) {
      await session.emit({
        sessionUpdate: 'tool_call_update',
        toolCallId,
        status: 'completed',
        content: result.content,
        rawOutput: result.rawOutput
      })
      return { toolCallId, name, ok: true, output: result.output }
    }

    this.logger.debug({ sessionId: session.sessionId, toolCallId, name, error: result.message }, 'tool call failed')
    await session.emit({
      sessionUpdate: 'tool_call_update',
      toolCallId,
      status: 'failed',
      content: [text(result.message)],
      rawOutput: result.rawOutput
    })
    return { toolCallId, name, ok: false, error: result.message }
  }

  private async askPermission(session: AgentSession, call: ProposedToolCall, kind: ToolKind, title: string): Promise<PermissionDecision> {
    const outcome = await this.client.requestPermission(session.sessionId, {
      toolCallId: call.toolCallId,
      title,
      kind,
      rawInput: { name: call.name, arguments: call.arguments }
    })

    if (!outcome.ok) {
      return { kind: 'denied', message: `Permission request failed: ${describeHelperFailure(outcome.error)}` }
    }

    const parsed = PermissionResultSchema.safeParse(outcome.result)
    if (!parsed.success) {
      return { kind: 'denied', message: `Permission request failed: unexpected response ${JSON.stringify(outcome.result ?? null)}` }
    }

    const selected = parsed.data.outcome
    if (selected.outcome === 'cancelled') return { kind: 'denied', message: 'Cancelled.' }
    if (ALLOWING_OPTIONS.has(selected.optionId)) return { kind: 'allowed' }
    return { kind: 'denied', message: 'Permission rejected by user.' }
  }

  private dispatch(session: AgentSession, call: ProposedToolCall): Promise<DispatchResult> {
    switch (call.name) {
      case 'read_file':
        return this.readFile(session, call.arguments)
      case 'write_file':
        return this.writeFile(session, call.arguments)
      case 'run_command':
        return this.runCommand(session, call)
      default:
        return this.passThrough(session, call)
    }
  }

  private async readFile(session: AgentSession, args: Args): Promise<DispatchResult> {
    const method = 'fs/read_text_file'
    const raw = stringArg(args, 'path', 'file', 'uri')
    if (!raw) return failed(method, { kind: 'invalid_params', detail: 'path must be a string' })

    const path = toFsPath(raw)
    const outcome = await this.client.readTextFile(session.sessionId, path, {
      line: typeof args.line === 'number' ? args.line : undefined,
      limit: typeof args.limit === 'number' ? args.limit : undefined
    })
    if (!outcome.ok) return failed(method, outcome.error, { path })

    const result = outcome.result
    if (!isRecord(result) || typeof result.content !== 'string') {
      return { ok: false, message: `Error: unexpected ${method} response`, rawOutput: { method, result } }
    }

    return {
      ok: true,
      output: { content: result.content },
      rawOutput: { contentBytes: Buffer.byteLength(result.content, 'utf-8') },
      content: [text(result.content)]
    }
  }

  private async writeFile(session: AgentSession, args: Args): Promise<DispatchResult> {
    const method = 'fs/write_text_file'
    const raw = stringArg(args, 'path', 'file', 'uri')
    if (!raw) return failed(method, { kind: 'invalid_params', detail: 'path must be a string' })

    const content = args.content ?? args.text ?? ''
    if (typeof content !== 'string') return failed(method, { kind: 'invalid_params', detail: 'content must be a string' })

    const path = toFsPath(raw)
    const oldText = await this.readExisting(session, path)

    const outcome = await this.client.writeTextFile(session.sessionId, path, content)
    if (!outcome.ok) return failed(method, outcome.error, { path })

    const diff: ToolCallContent =
      oldText === undefined ? { type: 'diff', path, newText: content } : { type: 'diff', path, oldText, newText: content }

    return {
      ok: true,
      output: { writtenPath: path, contentBytes: Buffer.byteLength(content, 'utf-8'), oldText: oldText ?? null, newText: content },
      rawOutput: {
        path,
        oldTextBytes: oldText === undefined ? null : Buffer.byteLength(oldText, 'utf-8'),
        newTextBytes: Buffer.byteLength(content, 'utf-8')
      },
      content: [diff, text(`Wrote ${path}.`)]
    }
  }

  /** Previous file text for the diff, when the client can read it. */
  private async readExisting(session: AgentSession, path: string): Promise<string | undefined> {
    if (!this.client.supports('fs.readTextFile')) return undefined
    const outcome = await this.client.readTextFile(session.sessionId, path)
    if (!outcome.ok) {
      this.logger.debug({ path, reason: describeHelperFailure(outcome.error) }, 'no previous text for diff')
      return undefined
    }
    const result = outcome.result
    return isRecord(result) && typeof result.content === 'string' ? result.content : undefined
  }

  private async runCommand(session: AgentSession, call: ProposedToolCall): Promise<DispatchResult> {
    const method = 'terminal/create'
    const args = call.arguments
    const command = stringArg(args, 'command', 'cmd')
    if (!command) return failed(method, { kind: 'invalid_params', detail: 'command must be a string' })

    const argv = z.array(z.string()).safeParse(args.args ?? [])
    if (!argv.success) return failed(method, { kind: 'invalid_params', detail: 'args must be a list of strings' })

    const env = EnvInputSchema.safeParse(args.env ?? [])
    if (!env.success) return failed(method, { kind: 'invalid_params', detail: 'env must be a map or a list of name/value pairs' })

    const cwd = typeof args.cwd === 'string' ? args.cwd : undefined

    const created = await this.client.createTerminal(session.sessionId, command, {
      args: argv.data,
      env: env.data,
      cwd,
      outputByteLimit: DEFAULT_TERMINAL_OUTPUT_LIMIT
    })
    if (!created.ok) return failed(method, created.error)

    const terminalId = isRecord(created.result) ? created.result.terminalId : undefined
    if (typeof terminalId !== 'string') {
      return { ok: false, message: `Error: unexpected ${method} response`, rawOutput: { method, result: created.result } }
    }

    const sessionId = session.sessionId
    await session.emit({
      sessionUpdate: 'tool_call_update',
      toolCallId: call.toolCallId,
      content: [{ type: 'terminal', terminalId }]
    })

    const exited = await this.client.waitForTerminalExit(sessionId, terminalId)
    if (!exited.ok) this.logger.debug({ terminalId, reason: describeHelperFailure(exited.error) }, 'terminal/wait_for_exit failed')

    const fetched = await this.client.terminalOutput(sessionId, terminalId)
    let output = ''
    let rawOutput: Args = { terminalId }
    if (fetched.ok) {
      if (isRecord(fetched.result)) {
        rawOutput = { ...fetched.result, terminalId }
        if (typeof fetched.result.output === 'string') output = fetched.result.output
      }
    } else {
      rawOutput = { terminalId, error: describeHelperFailure(fetched.error) }
    }

    const released = await this.client.releaseTerminal(sessionId, terminalId)
    if (!released.ok) this.logger.debug({ terminalId, reason: describeHelperFailure(released.error) }, 'terminal/release failed')

    return {
      ok: true,
      output: { terminalId, output },
      rawOutput,
      content: [{ type: 'terminal', terminalId }, text(output)]
    }
  }

  /** Raw client methods (`fs/...`, `terminal/...`) called by name. */
  private async passThrough(session: AgentSession, call: ProposedToolCall): Promise<DispatchResult> {
    const method = call.name
    if (!method.startsWith('fs/') && !method.startsWith('terminal/')) {
      return { ok: false, message: `Error: unknown tool ${method}`, rawOutput: { name: method } }
    }

    const outcome = await this.client.call(method, capabilityForMethod(method), session.sessionId, call.arguments)
    if (!outcome.ok) return failed(method, outcome.error)

    return {
      ok: true,
      output: outcome.result,
      rawOutput: { method },
      content: [text(stringifyToolOutput(outcome.result))]
    }
  }
}
