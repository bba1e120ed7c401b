// In-process stand-in for an IMAP server, used by the tests.
// Implements MailTransport over an in-memory mailbox map. UNSEEN and the
// empty query are evaluated against stored flags; any other query answers
// from the `searches` table keyed by its wire form.

import type { FetchPart, FetchedPart, MailTransport } from './imap-transport.js'
import type { QueryBuilder } from './query.js'

export interface FakeMessage {
  uid: number
  source: string
  flags: string[]
}

export type FakeMethod = keyof MailTransport

/** Build a small RFC 822 message with CRLF line endings. Pass null to omit a header. */
export function rfc822({
  from = 'Ann Lee <ann@example.com>',
  subject = 'Hello',
  date = 'Tue, 05 Mar 2024 09:30:00 +0000',
  body = 'Just checking in.',
}: { from?: string | null; subject?: string | null; date?: string | null; body?: string } = {}): string {
  const headers = [
    from === null ? null : `From: ${from}`,
    'To: bob@example.com',
    subject === null ? null : `Subject: ${subject}`,
    date === null ? null : `Date: ${date}`,
    'Message-ID: <test@example.com>',
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset=utf-8',
  ].filter((h): h is string => h !== null)
  return `${headers.join('\r\n')}\r\n\r\n${body}\r\n`
}

export class FakeTransport implements MailTransport {
  readonly calls: string[] = []
  mailboxes: Record<string, FakeMessage[]>
  searches: Record<string, number[]> = {}
  failures: Partial<Record<FakeMethod, Error>> = {}
  selected: string | null = null
  readOnly = false

  constructor(mailboxes: Record<string, FakeMessage[]> = { INBOX: [] }) {
    this.mailboxes = mailboxes
  }

  private step(method: FakeMethod, detail = ''): void {
    this.calls.push(detail ? `${method} ${detail}` : method)
    const failure = this.failures[method]
    if (failure) throw failure
  }

  private messages(): FakeMessage[] {
    return this.selected ? (this.mailboxes[this.selected] ?? []) : []
  }

  async connect(): Promise<void> {
    this.step('connect')
  }

  /** A failed select leaves nothing selected, like a real server. */
  async select(mailbox: string, { readOnly }: { readOnly: boolean }): Promise<void> {
    this.selected = null
    this.readOnly = false
    this.step('select', mailbox)
    if (!(mailbox in this.mailboxes)) throw new Error(`Mailbox doesn't exist: ${mailbox}`)
    this.selected = mailbox
    this.readOnly = readOnly
  }

  async uidSearch(query: QueryBuilder): Promise<number[]> {
    const wire = query.toString()
    this.step('uidSearch', wire)
    if (wire === '') return this.messages().map((m) => m.uid)
    if (wire === 'UNSEEN') return this.messages().filter((m) => !m.flags.includes('\\Seen')).map((m) => m.uid)
    return this.searches[wire] ?? []
  }

  async uidFetch(uid: string, part: FetchPart): Promise<FetchedPart | null> {
    this.step('uidFetch', `${uid} ${part}`)
    const message = this.messages().find((m) => String(m.uid) === uid)
    if (!message) return null
    const source = Buffer.from(message.source, 'utf8')
    switch (part) {
      case 'source':
        return { source }
      case 'size':
        return { size: source.length }
      case 'headers': {
        const end = message.source.indexOf('\r\n\r\n')
        return { headers: Buffer.from(end === -1 ? message.source : message.source.slice(0, end + 4), 'utf8') }
      }
      case 'flags':
        return { flags: [...message.flags] }
    }
  }

  async uidStore(uids: string[], mode: 'add' | 'remove', flags: string[]): Promise<void> {
    this.step('uidStore', `${uids.join(',')} ${mode} ${flags.join(' ')}`)
    for (const message of this.messages()) {
      if (!uids.includes(String(message.uid))) continue
      message.flags =
        mode === 'add'
          ? [...new Set([...message.flags, ...flags])]
          : message.flags.filter((f) => !flags.includes(f))
    }
  }

  async unseenCount(mailbox: string): Promise<number> {
    this.step('unseenCount', mailbox)
    return (this.mailboxes[mailbox] ?? []).filter((m) => !m.flags.includes('\\Seen')).length
  }

  async close(): Promise<void> {
    this.step('close')
  }
}
