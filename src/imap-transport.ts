// Transport primitive for Session, backed by imapflow.
// MailTransport is the request/response contract Session is written against:
// connect+login, select, UID SEARCH, UID FETCH of one part, UID STORE, STATUS.
// createImapTransport() implements it over an imapflow connection (TLS only).
// Transport methods throw whatever imapflow throws; Session is the boundary
// that turns those into error values.
//
// imapflow takes a search *object*, not a search string, so the query tree is
// compiled a second time here. Every phrase becomes a single-key object and
// the phrases are merged into one object (imapflow ANDs its keys). Keys that
// collide are kept apart by double negation, NOT (NOT rest), and two NOT
// phrases merge into NOT (a OR b), both of which preserve the conjunction.
// imapflow drops LARGER/SMALLER 0 and keywords the mailbox does not list in
// PERMANENTFLAGS; those are compiled or refused here instead.
// imapflow resolves false when the server answers NO or BAD; that is thrown.

import { ImapFlow } from 'imapflow'
import {
  parseImapDate,
  type DateKey,
  type FlagKey,
  type QueryBuilder,
  type SearchTerm,
  type StringKey,
} from './query.js'

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export type FetchPart = 'source' | 'size' | 'headers' | 'flags'

export interface FetchedPart {
  source?: Buffer
  size?: number
  headers?: Buffer
  flags?: string[]
}

export interface MailTransport {
  /** Open the encrypted connection and authenticate. */
  connect(): Promise<void>
  select(mailbox: string, options: { readOnly: boolean }): Promise<void>
  /** UIDs matching the query in server order. An empty query matches everything. */
  uidSearch(query: QueryBuilder): Promise<number[]>
  /** One part of one message, or null when the UID no longer exists. */
  uidFetch(uid: string, part: FetchPart): Promise<FetchedPart | null>
  uidStore(uids: string[], mode: 'add' | 'remove', flags: string[]): Promise<void>
  unseenCount(mailbox: string): Promise<number>
  close(): Promise<void>
}

export interface ImapTransportOptions {
  host: string
  port: number
  user: string
  password: string
  /** Reject self-signed certificates. Default true. */
  rejectUnauthorized?: boolean
}

// ---------------------------------------------------------------------------
// imapflow surface used here
// ---------------------------------------------------------------------------

/** Search object in imapflow's format (see imapflow's search compiler). */
export type SearchObject = { [key: string]: unknown }

interface FetchMessageLike {
  uid?: number
  source?: Buffer
  size?: number
  headers?: Buffer
  flags?: Set<string>
}

/** The slice of ImapFlow this module calls, so tests can hand in a fake. */
export type ImapClientLike = {
  connect(): Promise<void>
  logout(): Promise<void>
  mailboxOpen(path: string, options?: { readOnly?: boolean }): Promise<{ permanentFlags?: Set<string> }>
  search(query: SearchObject, options?: { uid?: boolean }): Promise<number[] | false>
  fetchOne(
    range: string,
    query: Record<string, boolean>,
    options?: { uid?: boolean },
  ): Promise<FetchMessageLike | false>
  messageFlagsAdd(range: string, flags: string[], options?: { uid?: boolean }): Promise<boolean>
  messageFlagsRemove(range: string, flags: string[], options?: { uid?: boolean }): Promise<boolean>
  status(path: string, query: { unseen?: boolean }): Promise<{ unseen?: number }>
}

export type ImapClientFactory = (options: ImapTransportOptions) => ImapClientLike

function defaultClientFactory(options: ImapTransportOptions): ImapClientLike {
  return new ImapFlow({
    host: options.host,
    port: options.port,
    secure: true,
    auth: { user: options.user, pass: options.password },
    tls: { rejectUnauthorized: options.rejectUnauthorized ?? true },
    logger: false,
  }) as unknown as ImapClientLike
}

// ---------------------------------------------------------------------------
// Query tree -> imapflow search object
// ---------------------------------------------------------------------------

const FLAG_TOGGLES: Record<FlagKey, [key: string, value: boolean]> = {
  ALL: ['all', true],
  NEW: ['new', true],
  OLD: ['old', true],
  RECENT: ['recent', true],
  ANSWERED: ['answered', true],
  UNANSWERED: ['answered', false],
  DELETED: ['deleted', true],
  UNDELETED: ['deleted', false],
  DRAFT: ['draft', true],
  UNDRAFT: ['draft', false],
  FLAGGED: ['flagged', true],
  UNFLAGGED: ['flagged', false],
  SEEN: ['seen', true],
  UNSEEN: ['seen', false],
}

const STRING_KEYS: Record<StringKey, string> = {
  BCC: 'bcc',
  BODY: 'body',
  CC: 'cc',
  FROM: 'from',
  KEYWORD: 'keyword',
  SUBJECT: 'subject',
  TEXT: 'text',
  TO: 'to',
  UNKEYWORD: 'unKeyword',
  'X-GM-RAW': 'gmraw',
}

const DATE_KEYS: Record<DateKey, string> = {
  BEFORE: 'before',
  ON: 'on',
  SINCE: 'since',
  SENTBEFORE: 'sentBefore',
  SENTON: 'sentOn',
  SENTSINCE: 'sentSince',
}

/** Compile one phrase into a single-key imapflow search object. */
export function termToSearchObject(term: SearchTerm): SearchObject {
  switch (term.kind) {
    case 'flag': {
      const [key, value] = FLAG_TOGGLES[term.key]
      return { [key]: value }
    }
    case 'string':
      return { [STRING_KEYS[term.key]]: term.value }
    case 'header':
      return { header: { [term.field]: term.value } }
    case 'size':
      // imapflow skips a zero size; every message is larger than 0, none smaller
      if (term.bytes === 0) return term.key === 'LARGER' ? { all: true } : { not: { all: true } }
      return { [term.key === 'LARGER' ? 'larger' : 'smaller']: term.bytes }
    case 'date': {
      const parsed = parseImapDate(term.date)
      // imapflow adds a day to BEFORE dates that are not midnight UTC
      const date = parsed ? new Date(Date.UTC(parsed.year, parsed.month, parsed.day)) : new Date(term.date)
      return { [DATE_KEYS[term.key]]: date }
    }
    case 'uid':
      return { uid: term.set }
    case 'or':
      return { or: [termToSearchObject(term.left), termToSearchObject(term.right)] }
    case 'not':
      return { not: termToSearchObject(term.term) }
  }
}

/** Compile a whole query. Phrases are ANDed; an empty query matches ALL. */
export function toSearchObject(query: QueryBuilder): SearchObject {
  let merged: SearchObject = {}

  for (const phrase of query.phrases) {
    const single = termToSearchObject(phrase)
    for (const [key, value] of Object.entries(single)) {
      if (!(key in merged)) {
        merged[key] = value
      } else if (key === 'not') {
        // NOT a AND NOT b == NOT (a OR b)
        merged = { ...merged, not: { or: [merged.not, value] } }
      } else {
        merged = { not: { not: merged }, [key]: value }
      }
    }
  }

  return Object.keys(merged).length === 0 ? { all: true } : merged
}

/** KEYWORD and UNKEYWORD values anywhere in the query. */
export function searchedKeywords(query: QueryBuilder): string[] {
  const found: string[] = []
  const visit = (term: SearchTerm): void => {
    if (term.kind === 'string' && (term.key === 'KEYWORD' || term.key === 'UNKEYWORD')) found.push(term.value)
    else if (term.kind === 'or') {
      visit(term.left)
      visit(term.right)
    } else if (term.kind === 'not') visit(term.term)
  }
  query.phrases.forEach(visit)
  return found
}

// Same test imapflow applies before it emits a KEYWORD key
function canSearchKeyword(permanentFlags: Set<string> | undefined, keyword: string): boolean {
  return !permanentFlags || permanentFlags.has('\\*') || permanentFlags.has(keyword)
}

// ---------------------------------------------------------------------------
// imapflow-backed transport
// ---------------------------------------------------------------------------

const FETCH_QUERIES: Record<FetchPart, Record<string, boolean>> = {
  source: { uid: true, source: true },
  size: { uid: true, size: true },
  headers: { uid: true, headers: true },
  flags: { uid: true, flags: true },
}

export function createImapTransport(
  options: ImapTransportOptions,
  factory: ImapClientFactory = defaultClientFactory,
): MailTransport {
  const client = factory(options)
  let permanentFlags: Set<string> | undefined

  return {
    async connect() {
      await client.connect()
    },

    async select(mailbox, { readOnly }) {
      permanentFlags = undefined
      const opened = await client.mailboxOpen(mailbox, { readOnly })
      permanentFlags = opened.permanentFlags
    },

    async uidSearch(query) {
      const unsearchable = searchedKeywords(query).find((k) => !canSearchKeyword(permanentFlags, k))
      if (unsearchable !== undefined) {
        throw new Error(`keyword ${unsearchable} is not a permanent flag of this mailbox and cannot be searched`)
      }
      const uids = await client.search(toSearchObject(query), { uid: true })
      if (uids === false) throw new Error('server rejected the SEARCH command')
      return uids
    },

    async uidFetch(uid, part) {
      const msg = await client.fetchOne(uid, FETCH_QUERIES[part], { uid: true })
      if (!msg) return null
      return {
        source: msg.source,
        size: msg.size,
        headers: msg.headers,
        flags: msg.flags ? [...msg.flags] : undefined,
      }
    },

    async uidStore(uids, mode, flags) {
      const range = uids.join(',')
      const stored =
        mode === 'add'
          ? await client.messageFlagsAdd(range, flags, { uid: true })
          : await client.messageFlagsRemove(range, flags, { uid: true })
      if (!stored) throw new Error('server rejected the STORE command')
    },

    async unseenCount(mailbox) {
      const status = await client.status(mailbox, { unseen: true })
      return status.unseen ?? 0
    },

    async close() {
      await client.logout()
    },
  }
}
