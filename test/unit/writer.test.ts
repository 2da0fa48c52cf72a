import test from 'node:test'
import assert from 'node:assert/strict'
import { PassThrough, Writable } from 'node:stream'
import { MessageWriter, describeWriteError } from '../../src/json-rpc/writer.js'
import { notification, response } from '../../src/json-rpc/types.js'

function collect(stream: PassThrough): () => string {
  let data = ''
  stream.on('data', (chunk: Buffer) => {
    data += chunk.toString('utf-8')
  })
  return () => data
}

test('MessageWriter: one line per message, in send order', async () => {
  const out = new PassThrough()
  const text = collect(out)
  const writer = new MessageWriter(out)

  const results = await Promise.all([
    writer.send(notification('session/update', { n: 1 })),
    writer.send(notification('session/update', { n: 2 })),
    writer.send(response(1, { stopReason: 'end_turn' }))
  ])

  assert.deepEqual(results, [{ ok: true }, { ok: true }, { ok: true }])
  await new Promise(r => setImmediate(r))
  assert.equal(
    text(),
    '{"jsonrpc":"2.0","method":"session/update","params":{"n":1}}\n' +
      '{"jsonrpc":"2.0","method":"session/update","params":{"n":2}}\n' +
      '{"jsonrpc":"2.0","id":1,"result":{"stopReason":"end_turn"}}\n'
  )
})

test('MessageWriter: each line is a single write call', async () => {
  const chunks: string[] = []
  const out = new Writable({
    write(chunk: Buffer, _enc, cb) {
      chunks.push(chunk.toString('utf-8'))
      cb()
    }
  })
  const writer = new MessageWriter(out)

  await writer.send(notification('a'))
  await writer.send(notification('b'))

  assert.deepEqual(chunks, ['{"jsonrpc":"2.0","method":"a"}\n', '{"jsonrpc":"2.0","method":"b"}\n'])
})

test('MessageWriter: resolves closed when the stream is destroyed', async () => {
  const out = new PassThrough()
  out.destroy()
  const writer = new MessageWriter(out)

  const r = await writer.send(notification('session/update'))
  assert.deepEqual(r, { ok: false, error: { kind: 'closed' } })
  assert.equal(describeWriteError({ kind: 'closed' }), 'output stream closed')
})

test('MessageWriter: an unencodable message fails without blocking later lines', async () => {
  const out = new PassThrough()
  const text = collect(out)
  const writer = new MessageWriter(out)

  const cyclic: Record<string, unknown> = {}
  cyclic.self = cyclic

  const bad = await writer.send(response(1, cyclic))
  assert.equal(bad.ok, false)
  if (!bad.ok) assert.equal(bad.error.kind, 'encode')

  assert.deepEqual(await writer.send(response(2, null)), { ok: true })
  await writer.flush()
  await new Promise(r => setImmediate(r))
  assert.equal(text(), '{"jsonrpc":"2.0","id":2,"result":null}\n')
})

test('MessageWriter: a failing stream is reported to the caller, then treated as closed', async () => {
  const out = new Writable({
    write(_chunk, _enc, cb) {
      const err: NodeJS.ErrnoException = new Error('write EPIPE')
      err.code = 'EPIPE'
      cb(err)
    }
  })
  // no 'error' listener of our own: the writer must absorb the stream error
  const writer = new MessageWriter(out)
  assert.equal(out.listenerCount('error'), 1)

  const r = await writer.send(notification('x'))
  assert.equal(r.ok, false)
  if (!r.ok) {
    assert.equal(r.error.kind, 'io')
    assert.equal(describeWriteError(r.error), 'write failed: write EPIPE')
  }

  // the stream's 'error' event fires on a later tick
  await new Promise(resolve => setImmediate(resolve))
  assert.equal(writer.isClosed, true)
  assert.deepEqual(await writer.send(notification('y')), { ok: false, error: { kind: 'closed' } })
})
