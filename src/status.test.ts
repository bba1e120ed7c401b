// Tests for status projection: sender, subject cleanup, date and marker.

import { simpleParser } from 'mailparser'
import { expect, test } from 'vitest'
import { MissingHeaderError } from './errors.js'
import { cleanSubject, projectStatus, rawHeader, statusMarker } from './status.js'
import { rfc822 } from './testing.js'

async function parse(...args: Parameters<typeof rfc822>) {
  return simpleParser(Buffer.from(rfc822(...args)))
}

test('projects sender, subject, date and marker', async () => {
  const projection = projectStatus(await parse(), { uid: '12' })
  expect(projection).toEqual({
    uid: '12',
    senderName: 'Ann Lee',
    senderAddress: 'ann@example.com',
    subject: 'Hello',
    date: new Date('2024-03-05T09:30:00Z'),
    marker: '!',
  })
})

test('sender name falls back to the address', async () => {
  const projection = projectStatus(await parse({ from: 'ann@example.com' }))
  expect(projection instanceof Error ? projection : projection.senderName).toBe('ann@example.com')
})

test('first member of a group is the sender', async () => {
  const projection = projectStatus(await parse({ from: 'Team: bob@example.com, ann@example.com;' }))
  expect(projection instanceof Error ? projection : projection.senderAddress).toBe('bob@example.com')
})

test('subject whitespace collapses and line breaks go', async () => {
  const projection = projectStatus(await parse({ subject: 'Weekly\r\n  report \t  now ' }))
  expect(projection instanceof Error ? projection : projection.subject).toBe('Weekly report now')
  expect(cleanSubject(undefined)).toBe('')
})

test('missing Date header is an error, not a default', async () => {
  const projection = projectStatus(await parse({ date: null }), { uid: '7' })
  expect(projection).toBeInstanceOf(MissingHeaderError)
  expect(projection instanceof MissingHeaderError && projection.header).toBe('Date')
  expect(projection instanceof Error && projection.message).toBe('Missing required header Date in message 7')
})

test('unparsable Date header is an error', async () => {
  const projection = projectStatus(await parse({ date: 'sometime last week' }))
  expect(projection instanceof MissingHeaderError && projection.header).toBe('Date')
})

test('missing From header is an error', async () => {
  const projection = projectStatus(await parse({ from: null }))
  expect(projection instanceof MissingHeaderError && projection.header).toBe('From')
})

test('rawHeader unfolds continuation lines', async () => {
  const parsed = await parse({ date: 'Tue, 05 Mar 2024\r\n 09:30:00 +0000' })
  expect(rawHeader(parsed.headerLines, 'Date')).toBe('Tue, 05 Mar 2024 09:30:00 +0000')
  expect(rawHeader(parsed.headerLines, 'X-Missing')).toBeUndefined()
})

test('marker reflects seen and flagged', () => {
  expect(statusMarker(undefined)).toBe('!')
  expect(statusMarker([])).toBe('!')
  expect(statusMarker(['\\Flagged'])).toBe('!')
  expect(statusMarker(['\\Seen'])).toBe('.')
  expect(statusMarker(['\\seen'])).toBe('.')
  expect(statusMarker(['\\Seen', '\\Flagged'])).toBe('*')
})
