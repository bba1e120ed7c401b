// Tests for the check-mail workflow over a fake server and a temp cache.

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import yaml from 'js-yaml'
import { afterEach, beforeEach, expect, test } from 'vitest'
import { checkMail, printCheckResult, type CheckResult } from './check.js'
import { MissingHeaderError } from './errors.js'
import { MessageCache } from './message-cache.js'
import { createLogger, type TextSink } from './output.js'
import { query, type QueryBuilder } from './query.js'
import { Session } from './session.js'
import { FakeTransport, rfc822 } from './testing.js'

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'skim-check-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

const DISPLAY = {
  suppressSummary: false,
  normalize: { enabled: true, form: 'NFC' as const, ascii: false },
}

function inbox() {
  return [
    { uid: 12, source: rfc822({ subject: 'First' }), flags: [] },
    { uid: 13, source: rfc822({ subject: 'Read' }), flags: ['\\Seen'] },
    { uid: 14, source: rfc822({ subject: 'Starred' }), flags: ['\\Seen', '\\Flagged'] },
    { uid: 15, source: rfc822({ subject: 'Second' }), flags: ['\\Flagged'] },
    { uid: 20, source: rfc822({ subject: 'Third' }), flags: [] },
    { uid: 30, source: rfc822({ subject: 'Undated', date: null }), flags: [] },
  ]
}

async function setup({ enabled = true, limit }: { enabled?: boolean; limit?: number } = {}) {
  const transport = new FakeTransport({ INBOX: inbox() })
  const session = await Session.connect(
    { user: 'ann', password: 'test-secret' },
    { host: 'imap.example.com', port: 993, secure: true },
    { transportFactory: () => transport },
  )
  if (session instanceof Error) throw session
  const res = await session.selectMailbox('INBOX')
  if (res instanceof Error) throw res

  const cache = new MessageCache({ dir, enabled })
  const config = {
    cache: { dir, enabled, maxMessageBytes: 524288, fileEncoding: 'utf8' as const },
    display: { ...DISPLAY, limit },
  }
  const run = async (q: QueryBuilder) => {
    const result = await checkMail({ session, cache, account: 'ann', query: q, config })
    if (result instanceof Error) throw result
    return result
  }
  return { transport, session, cache, config, run }
}

function uids(result: CheckResult): (string | undefined)[] {
  return result.entries.map((e) => e.uid)
}

// ---------------------------------------------------------------------------
// Unread mode
// ---------------------------------------------------------------------------

test('empty query lists unread messages newest first', async () => {
  const { transport, run } = await setup()
  transport.mailboxes.INBOX = inbox().filter((m) => m.uid !== 30)
  const result = await run(query())
  expect(result.mode).toBe('unread')
  expect(result.total).toBe(3)
  expect(uids(result)).toEqual(['20', '15', '12'])
  expect(result.entries.map((e) => e.marker)).toEqual(['!', '!', '!'])
  expect(result.summary).toBe('3 new messages')
  expect(transport.calls.some((c) => c.endsWith(' flags'))).toBe(false)
})

test('unread messages are cached on the way through', async () => {
  const { transport, run } = await setup()
  transport.mailboxes.INBOX = inbox().filter((m) => m.uid !== 30)
  await run(query())
  expect((await fs.readdir(path.join(dir, 'ann'))).sort()).toEqual(['12.msg', '15.msg', '20.msg'])
})

test('display limit cuts the newest-first list', async () => {
  const { transport, run } = await setup({ limit: 2 })
  transport.mailboxes.INBOX = inbox().filter((m) => m.uid !== 30)
  const result = await run(query())
  expect(result.total).toBe(3)
  expect(uids(result)).toEqual(['20', '15'])
})

test('without the cache only headers are fetched', async () => {
  const { transport, run } = await setup({ enabled: false })
  transport.mailboxes.INBOX = inbox().filter((m) => m.uid !== 30)
  const result = await run(query())
  expect(result.entries.map((e) => e.subject)).toEqual(['Third', 'Second', 'First'])
  expect(transport.calls.filter((c) => c.startsWith('uidFetch'))).toEqual([
    'uidFetch 20 headers',
    'uidFetch 15 headers',
    'uidFetch 12 headers',
  ])
})

// ---------------------------------------------------------------------------
// Search mode
// ---------------------------------------------------------------------------

test('search mode fetches flags for the marker', async () => {
  const { transport, run } = await setup()
  transport.searches['FROM "ann@example.com"'] = [12, 13, 14]
  const result = await run(query().from('ann@example.com'))
  expect(result.mode).toBe('search')
  expect(result.summary).toBe('3 messages found')
  expect(result.entries.map((e) => [e.uid, e.marker])).toEqual([
    ['14', '*'],
    ['13', '.'],
    ['12', '!'],
  ])
})

test('search mode logs the query it sends', async () => {
  const { transport, session, cache, config } = await setup()
  transport.searches['FROM "ann@example.com" UNSEEN'] = [12]
  const err = sink()
  const q = query().from('ann@example.com').unseen()
  const result = await checkMail({ session, cache, account: 'ann', query: q, config, logger: createLogger({ sink: err }) })
  expect(result instanceof Error ? result : result.total).toBe(1)
  expect(err.text()).toBe('# QUERY: FROM "ann@example.com" UNSEEN\n')
})

test('vanished ids are skipped', async () => {
  const { transport, run } = await setup()
  transport.searches['SUBJECT "x"'] = [12, 99]
  const result = await run(query().subject('x'))
  expect(result.total).toBe(2)
  expect(result.summary).toBe('2 messages found')
  expect(uids(result)).toEqual(['12'])
})

test('a message without a Date header aborts the run', async () => {
  const { transport, session, cache, config } = await setup()
  transport.searches['SUBJECT "y"'] = [12, 30]
  const result = await checkMail({ session, cache, account: 'ann', query: query().subject('y'), config })
  expect(result).toBeInstanceOf(MissingHeaderError)
  expect(result instanceof Error && result.message).toBe('Missing required header Date in message 30')
})

test('singular summary', async () => {
  const { transport, run } = await setup()
  transport.mailboxes.INBOX = [{ uid: 5, source: rfc822(), flags: [] }]
  expect((await run(query())).summary).toBe('1 new message')
})

// ---------------------------------------------------------------------------
// Printing
// ---------------------------------------------------------------------------

function sink(): TextSink & { text: () => string } {
  const chunks: string[] = []
  return {
    write: (s: string) => chunks.push(s),
    text: () => chunks.join('').replace(/\x1b\[[0-9;]*m/g, ''),
  }
}

test('prints a YAML list to stdout and the summary to stderr', async () => {
  const { transport, run } = await setup({ limit: 1 })
  transport.mailboxes.INBOX = inbox().filter((m) => m.uid !== 30)
  const result = await run(query())

  const out = sink()
  const err = sink()
  const now = Date.UTC(2024, 2, 5, 10, 30)
  printCheckResult(result, { display: DISPLAY }, { out, logger: createLogger({ sink: err }), now })

  expect(yaml.load(out.text())).toEqual({
    items: [{ uid: '20', status: '!', from: 'Ann Lee <ann@example.com>', subject: 'Third', date: '1h ago' }],
  })
  expect(err.text()).toBe('# 3 new messages\n')
})

test('summary can be suppressed and an empty result prints nothing', async () => {
  const out = sink()
  const err = sink()
  const empty: CheckResult = { mode: 'unread', total: 0, entries: [], summary: '0 new messages' }
  printCheckResult(empty, { display: { ...DISPLAY, suppressSummary: true } }, { out, logger: createLogger({ sink: err }) })
  expect(out.text()).toBe('')
  expect(err.text()).toBe('')
})
