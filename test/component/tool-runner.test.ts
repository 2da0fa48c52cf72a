import test from 'node:test'
import assert from 'node:assert/strict'
import { normalizeClientCapabilities } from '../../src/acp/capabilities.js'
import { HostClient, toFsPath } from '../../src/acp/client.js'
import { ToolRunner, needsPermission, toolKind, toolTitle } from '../../src/acp/tools.js'
import { createSilentLogger } from '../../src/logger.js'
import { FakeHost, createLoopbackRouter, createRecordingSession } from '../helpers/fakes.js'

const ALL = { fs: { readTextFile: true, writeTextFile: true }, terminal: true }

function setup(capabilities: unknown = ALL, opts: { defaultTimeoutMs?: number } = {}) {
  const host = new FakeHost()
  const { router } = createLoopbackRouter(host, opts)
  const caps = normalizeClientCapabilities(capabilities)
  const runner = new ToolRunner(new HostClient(router, () => caps), createSilentLogger())
  const { session, updates } = createRecordingSession('s1')
  return { host, runner, session, updates }
}

function text(value: string) {
  return { type: 'content', content: { type: 'text', text: value } }
}

function selected(optionId: string) {
  return () => ({ result: { outcome: { outcome: 'selected', optionId } } })
}

const writeCall = { toolCallId: 'c1', name: 'write_file', arguments: { path: '/work/a.txt', content: 'new' } }

test('ToolRunner: write_file asks permission, then writes with a diff', async () => {
  const { host, runner, session, updates } = setup()
  host.on('session/request_permission', selected('allow-once'))
  host.on('fs/read_text_file', () => ({ result: { content: 'old' } }))
  host.on('fs/write_text_file', () => ({ result: null }))

  const results = await runner.run(session, [writeCall], { requestPermission: true })

  assert.deepEqual(host.methods(), ['session/request_permission', 'fs/read_text_file', 'fs/write_text_file'])
  assert.deepEqual(host.requests[0]?.params, {
    sessionId: 's1',
    toolCall: {
      toolCallId: 'c1',
      title: 'Writing file (/work/a.txt)',
      kind: 'edit',
      rawInput: { name: 'write_file', arguments: { path: '/work/a.txt', content: 'new' } }
    },
    options: [
      { optionId: 'allow-once', name: 'Allow once', kind: 'allow_once' },
      { optionId: 'reject-once', name: 'Reject', kind: 'reject_once' }
    ]
  })
  assert.deepEqual(host.requests[2]?.params, { sessionId: 's1', path: '/work/a.txt', content: 'new' })

  assert.deepEqual(updates, [
    {
      sessionUpdate: 'tool_call',
      toolCallId: 'c1',
      title: 'Writing file (/work/a.txt)',
      kind: 'edit',
      status: 'pending',
      rawInput: { name: 'write_file', arguments: { path: '/work/a.txt', content: 'new' } }
    },
    { sessionUpdate: 'tool_call_update', toolCallId: 'c1', status: 'in_progress' },
    {
      sessionUpdate: 'tool_call_update',
      toolCallId: 'c1',
      status: 'completed',
      content: [{ type: 'diff', path: '/work/a.txt', oldText: 'old', newText: 'new' }, text('Wrote /work/a.txt.')],
      rawOutput: { path: '/work/a.txt', oldTextBytes: 3, newTextBytes: 3 }
    }
  ])

  assert.deepEqual(results, [
    { toolCallId: 'c1', name: 'write_file', ok: true, output: { writtenPath: '/work/a.txt', contentBytes: 3, oldText: 'old', newText: 'new' } }
  ])
})

test('ToolRunner: a new file has no old text in its diff', async () => {
  const { host, runner, session, updates } = setup({ fs: { writeTextFile: true } })
  host.on('fs/write_text_file', () => ({ result: null }))

  await runner.run(session, [writeCall], { requestPermission: false })

  assert.deepEqual(host.methods(), ['fs/write_text_file'])
  assert.deepEqual(updates.at(-1), {
    sessionUpdate: 'tool_call_update',
    toolCallId: 'c1',
    status: 'completed',
    content: [{ type: 'diff', path: '/work/a.txt', newText: 'new' }, text('Wrote /work/a.txt.')],
    rawOutput: { path: '/work/a.txt', oldTextBytes: null, newTextBytes: 3 }
  })
})

test('ToolRunner: a rejected permission fails the call without touching files', async () => {
  const { host, runner, session, updates } = setup()
  host.on('session/request_permission', selected('reject-once'))

  const results = await runner.run(session, [writeCall], { requestPermission: true })

  assert.deepEqual(host.methods(), ['session/request_permission'])
  assert.deepEqual(updates.at(-1), {
    sessionUpdate: 'tool_call_update',
    toolCallId: 'c1',
    status: 'failed',
    content: [text('Permission rejected by user.')]
  })
  assert.deepEqual(results, [{ toolCallId: 'c1', name: 'write_file', ok: false, error: 'Permission rejected by user.' }])
})

test('ToolRunner: a cancelled or failed permission prompt fails the call', async () => {
  const cancelled = setup()
  cancelled.host.on('session/request_permission', () => ({ result: { outcome: { outcome: 'cancelled' } } }))
  const [c] = await cancelled.runner.run(cancelled.session, [writeCall], { requestPermission: true })
  assert.deepEqual(c, { toolCallId: 'c1', name: 'write_file', ok: false, error: 'Cancelled.' })

  const broken = setup()
  broken.host.on('session/request_permission', () => ({ error: { code: -32603, message: 'nope' } }))
  const [b] = await broken.runner.run(broken.session, [writeCall], { requestPermission: true })
  assert.deepEqual(b, { toolCallId: 'c1', name: 'write_file', ok: false, error: 'Permission request failed: client error -32603: nope' })
})

test('ToolRunner: run_command drives a client terminal', async () => {
  const { host, runner, session, updates } = setup()
  host.on('terminal/create', () => ({ result: { terminalId: 't1' } }))
  host.on('terminal/wait_for_exit', () => ({ result: { exitCode: 0, signal: null } }))
  host.on('terminal/output', () => ({ result: { output: 'ok\n', truncated: false } }))
  host.on('terminal/release', () => ({ result: null }))

  const results = await runner.run(
    session,
    [{ toolCallId: 'c2', name: 'run_command', arguments: { command: 'npm', args: ['test'] } }],
    { requestPermission: false }
  )

  assert.deepEqual(host.methods(), ['terminal/create', 'terminal/wait_for_exit', 'terminal/output', 'terminal/release'])
  assert.deepEqual(host.requests[0]?.params, { sessionId: 's1', command: 'npm', args: ['test'], env: [], outputByteLimit: 1_048_576 })

  assert.deepEqual(updates, [
    {
      sessionUpdate: 'tool_call',
      toolCallId: 'c2',
      title: 'Running npm',
      kind: 'execute',
      status: 'pending',
      rawInput: { name: 'run_command', arguments: { command: 'npm', args: ['test'] } }
    },
    { sessionUpdate: 'tool_call_update', toolCallId: 'c2', status: 'in_progress' },
    { sessionUpdate: 'tool_call_update', toolCallId: 'c2', content: [{ type: 'terminal', terminalId: 't1' }] },
    {
      sessionUpdate: 'tool_call_update',
      toolCallId: 'c2',
      status: 'completed',
      content: [{ type: 'terminal', terminalId: 't1' }, text('ok\n')],
      rawOutput: { output: 'ok\n', truncated: false, terminalId: 't1' }
    }
  ])
  assert.deepEqual(results, [{ toolCallId: 'c2', name: 'run_command', ok: true, output: { terminalId: 't1', output: 'ok\n' } }])
})

test('ToolRunner: timeouts name the method and id', async () => {
  const { host, runner, session, updates } = setup(ALL, { defaultTimeoutMs: 20 })
  host.on('fs/read_text_file', () => 'no-reply')

  const [r] = await runner.run(session, [{ toolCallId: 'c3', name: 'read_file', arguments: { path: '/work/a.txt' } }], { requestPermission: true })

  assert.deepEqual(r, { toolCallId: 'c3', name: 'read_file', ok: false, error: 'Timeout calling fs/read_text_file (id=1)' })
  assert.deepEqual(updates.at(-1), {
    sessionUpdate: 'tool_call_update',
    toolCallId: 'c3',
    status: 'failed',
    content: [text('Timeout calling fs/read_text_file (id=1)')],
    rawOutput: { method: 'fs/read_text_file', path: '/work/a.txt' }
  })
})

test('ToolRunner: missing capabilities fail locally', async () => {
  const { host, runner, session } = setup({})

  const [r] = await runner.run(session, [{ toolCallId: 'c4', name: 'read_file', arguments: { path: '/work/a.txt' } }], { requestPermission: true })

  assert.deepEqual(r, { toolCallId: 'c4', name: 'read_file', ok: false, error: 'Error: client does not support fs/read_text_file' })
  assert.deepEqual(host.requests, [])
})

test('ToolRunner: read_file accepts file URIs', async () => {
  const { host, runner, session } = setup()
  host.on('fs/read_text_file', () => ({ result: { content: 'b' } }))

  await runner.run(session, [{ toolCallId: 'c5', name: 'read_file', arguments: { uri: 'file:///work/b.txt', line: 2 } }], { requestPermission: true })

  assert.deepEqual(host.requests[0]?.params, { sessionId: 's1', path: '/work/b.txt', line: 2 })
})

test('ToolRunner: raw client methods pass through with the session id', async () => {
  const { host, runner, session, updates } = setup()
  host.on('terminal/kill', () => ({ result: null }))

  const [r] = await runner.run(session, [{ toolCallId: 'c6', name: 'terminal/kill', arguments: { terminalId: 't1' } }], { requestPermission: true })

  assert.deepEqual(host.requests, [{ method: 'terminal/kill', params: { terminalId: 't1', sessionId: 's1' } }])
  assert.deepEqual(r, { toolCallId: 'c6', name: 'terminal/kill', ok: true, output: null })
  assert.deepEqual(updates.at(-1), {
    sessionUpdate: 'tool_call_update',
    toolCallId: 'c6',
    status: 'completed',
    content: [text('null')],
    rawOutput: { method: 'terminal/kill' }
  })
})

test('ToolRunner: a raw fs call with a relative path never reaches the client', async () => {
  const { host, runner, session } = setup()

  const [r] = await runner.run(
    session,
    [{ toolCallId: 'c7', name: 'fs/read_text_file', arguments: { path: 'relative/a.txt' } }],
    { requestPermission: true }
  )

  assert.deepEqual(r, { toolCallId: 'c7', name: 'fs/read_text_file', ok: false, error: 'Error: path must be absolute: relative/a.txt' })
  assert.deepEqual(host.requests, [])
})

test('tool metadata: kinds, titles and permission rules', () => {
  assert.equal(toolKind('read_file'), 'read')
  assert.equal(toolKind('fs/write_text_file'), 'edit')
  assert.equal(toolKind('terminal/create'), 'execute')
  assert.equal(toolKind('search'), 'other')

  assert.equal(toolTitle('read_file', {}), 'Reading file')
  assert.equal(toolTitle('run_command', { cmd: 'ls' }), 'Running ls')
  assert.equal(toolTitle('terminal/kill', {}), 'Running terminal/kill')

  assert.equal(needsPermission('write_file'), true)
  assert.equal(needsPermission('terminal/create'), true)
  assert.equal(needsPermission('read_file'), false)

  assert.equal(toFsPath('file:///work/x%20y.txt'), '/work/x y.txt')
  assert.equal(toFsPath('/already/a/path'), '/already/a/path')
})
