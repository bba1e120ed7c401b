// Tests for the file-backed message cache: round trips, misses, the size
// threshold, the disabled mode and concurrent writers on one key.

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, expect, test } from 'vitest'
import { CacheCorruptError, CacheWriteError } from './errors.js'
import { MessageCache, sanitizePathComponent } from './message-cache.js'
import { createLogger } from './output.js'
import { Session } from './session.js'
import { FakeTransport, rfc822 } from './testing.js'

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'skim-cache-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

const SOURCE = rfc822({ subject: 'Cached' })
const SIZE = Buffer.byteLength(SOURCE)

async function sessionWith(source = SOURCE) {
  const transport = new FakeTransport({ INBOX: [{ uid: 7, source, flags: [] }] })
  const session = await Session.connect(
    { user: 'ann', password: 'test-secret' },
    { host: 'imap.example.com', port: 993, secure: true },
    { transportFactory: () => transport },
  )
  if (session instanceof Error) throw session
  const res = await session.selectMailbox('INBOX')
  if (res instanceof Error) throw res
  return { session, transport }
}

async function cachedFiles(account: string): Promise<string[]> {
  try {
    return await fs.readdir(path.join(dir, account))
  } catch {
    return []
  }
}

// ---------------------------------------------------------------------------
// save / load / has
// ---------------------------------------------------------------------------

test('save then load returns the same bytes and a parsed message', async () => {
  const cache = new MessageCache({ dir })
  expect(await cache.save('a', '7', Buffer.from(SOURCE))).toBeUndefined()
  expect(await cache.has('a', '7')).toBe(true)

  const loaded = await cache.load('a', '7')
  if (loaded === null || loaded instanceof Error) throw new Error('expected a cached message')
  expect(loaded.uid).toBe('7')
  expect(loaded.source.toString('utf8')).toBe(SOURCE)
  expect(loaded.parsed.subject).toBe('Cached')
  expect(await cachedFiles('a')).toEqual(['7.msg'])
})

test('loading an absent entry is a miss', async () => {
  const cache = new MessageCache({ dir })
  expect(await cache.load('a', '99')).toBeNull()
  expect(await cache.has('a', '99')).toBe(false)
})

test('an empty cache file is corrupt, not a miss', async () => {
  const cache = new MessageCache({ dir })
  await fs.mkdir(path.join(dir, 'a'), { recursive: true })
  await fs.writeFile(path.join(dir, 'a', '7.msg'), '')
  expect(await cache.load('a', '7')).toBeInstanceOf(CacheCorruptError)
})

test('latin1 file encoding round-trips ascii messages', async () => {
  const cache = new MessageCache({ dir, fileEncoding: 'latin1' })
  await cache.save('a', '7', Buffer.from(SOURCE))
  const loaded = await cache.load('a', '7')
  expect(loaded instanceof Error || loaded === null ? loaded : loaded.source.toString('utf8')).toBe(SOURCE)
})

test('a message the file encoding cannot hold is refused, not mangled', async () => {
  const cache = new MessageCache({ dir, fileEncoding: 'latin1' })
  const res = await cache.save('a', '7', Buffer.from(rfc822({ subject: '€ 5' })))
  expect(res).toBeInstanceOf(CacheWriteError)
  expect(res instanceof Error && res.message).toBe(
    `Could not save message to cache at ${cache.filePath('a', '7')}: message cannot be stored as latin1 without loss`,
  )
  expect(await cache.has('a', '7')).toBe(false)
})

test('path components cannot escape the cache root', () => {
  expect(sanitizePathComponent('..')).toBe('__')
  expect(sanitizePathComponent('../etc')).toBe('.._etc')
  expect(sanitizePathComponent('a/b\\c')).toBe('a_b_c')
  expect(sanitizePathComponent('')).toBe('_')
  expect(sanitizePathComponent('ann@example.com')).toBe('ann@example.com')

  const cache = new MessageCache({ dir })
  expect(cache.filePath('..', '../../x')).toBe(path.join(dir, '__', '.._.._x.msg'))
})

// ---------------------------------------------------------------------------
// fetchOrPopulate
// ---------------------------------------------------------------------------

test('a miss within the threshold fetches and stores', async () => {
  const { session } = await sessionWith()
  const cache = new MessageCache({ dir })
  const message = await cache.fetchOrPopulate(session, 'a', '7', SIZE)
  expect(message instanceof Error || message === null ? message : message.parsed.subject).toBe('Cached')
  expect(await cachedFiles('a')).toEqual(['7.msg'])
})

test('a message at or under the threshold is stored, one over it is not', async () => {
  const { session } = await sessionWith()

  const above = new MessageCache({ dir: path.join(dir, 'above') })
  await above.fetchOrPopulate(session, 'a', '7', SIZE + 1)
  expect(await above.has('a', '7')).toBe(true)

  const below = new MessageCache({ dir: path.join(dir, 'below') })
  const message = await below.fetchOrPopulate(session, 'a', '7', SIZE - 1)
  expect(message instanceof Error || message === null ? message : message.uid).toBe('7')
  expect(await below.has('a', '7')).toBe(false)
})

test('a hit does not touch the server', async () => {
  const { session, transport } = await sessionWith()
  const cache = new MessageCache({ dir })
  await cache.save('a', '7', Buffer.from(SOURCE))
  const before = transport.calls.length

  const message = await cache.fetchOrPopulate(session, 'a', '7', SIZE)
  expect(message instanceof Error || message === null ? message : message.parsed.subject).toBe('Cached')
  expect(transport.calls.length).toBe(before)
})

test('a disabled cache always fetches and never writes', async () => {
  const { session, transport } = await sessionWith()
  await new MessageCache({ dir }).save('a', '7', Buffer.from(rfc822({ subject: 'Stale' })))
  const cache = new MessageCache({ dir, enabled: false })

  const message = await cache.fetchOrPopulate(session, 'a', '7', SIZE)
  expect(message instanceof Error || message === null ? message : message.parsed.subject).toBe('Cached')
  expect(transport.calls.at(-1)).toBe('uidFetch 7 source')
  expect(await cache.load('a', '7')).toBeNull()
  expect(await cache.has('a', '7')).toBe(false)
})

test('a vanished message is null and nothing is stored', async () => {
  const { session } = await sessionWith()
  const cache = new MessageCache({ dir })
  expect(await cache.fetchOrPopulate(session, 'a', '99', SIZE)).toBeNull()
  expect(await cachedFiles('a')).toEqual([])
})

test('a failed save warns and still returns the message', async () => {
  const { session } = await sessionWith()
  const blocker = path.join(dir, 'not-a-dir')
  await fs.writeFile(blocker, 'x')
  const lines: string[] = []
  const logger = createLogger({ sink: { write: (s: string) => lines.push(s) } })
  const cache = new MessageCache({ dir: blocker, logger })

  const message = await cache.fetchOrPopulate(session, 'a', '7', SIZE)
  expect(message instanceof Error || message === null ? message : message.parsed.subject).toBe('Cached')
  expect(lines).toHaveLength(1)
  expect(lines[0]).toContain(`Could not save message to cache at ${path.join(blocker, 'a', '7.msg')}`)
})

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

test('concurrent saves and loads on one key never see a partial file', async () => {
  const cache = new MessageCache({ dir })
  const versions = [rfc822({ subject: 'Version A', body: 'a'.repeat(20000) }), rfc822({ subject: 'Version B', body: 'b'.repeat(30000) })]

  const ops: Promise<unknown>[] = []
  const loaded: string[] = []
  for (let i = 0; i < 20; i++) {
    ops.push(cache.save('a', '7', Buffer.from(versions[i % 2] ?? '')))
    ops.push(
      cache.load('a', '7').then((m) => {
        if (m instanceof Error) throw m
        if (m) loaded.push(m.source.toString('utf8'))
      }),
    )
  }
  await Promise.all(ops)

  for (const source of loaded) expect(versions).toContain(source)
  expect(await cachedFiles('a')).toEqual(['7.msg'])
})
