// IMAP SEARCH query builder.
// An immutable list of phrases. Each phrase is one search term that compiles
// to a run of wire tokens; sequencing phrases means AND, since the server
// implicitly ANDs every key in a single SEARCH command. Every predicate method
// returns a new builder and leaves the receiver untouched, so partially built
// queries can be shared and extended from command-line flags without aliasing.

import { QueryArgumentError, QueryShapeError } from './errors.js'

// ---------------------------------------------------------------------------
// Search terms
// ---------------------------------------------------------------------------

export type FlagKey =
  | 'ALL'
  | 'ANSWERED'
  | 'DELETED'
  | 'DRAFT'
  | 'FLAGGED'
  | 'NEW'
  | 'OLD'
  | 'RECENT'
  | 'SEEN'
  | 'UNANSWERED'
  | 'UNDELETED'
  | 'UNDRAFT'
  | 'UNFLAGGED'
  | 'UNSEEN'

export type StringKey =
  | 'BCC'
  | 'BODY'
  | 'CC'
  | 'FROM'
  | 'KEYWORD'
  | 'SUBJECT'
  | 'TEXT'
  | 'TO'
  | 'UNKEYWORD'
  | 'X-GM-RAW'

export type DateKey = 'BEFORE' | 'ON' | 'SINCE' | 'SENTBEFORE' | 'SENTON' | 'SENTSINCE'

export type SizeKey = 'LARGER' | 'SMALLER'

export type SearchTerm =
  | { kind: 'flag'; key: FlagKey }
  | { kind: 'string'; key: StringKey; value: string }
  | { kind: 'header'; field: string; value: string }
  | { kind: 'size'; key: SizeKey; bytes: number }
  | { kind: 'date'; key: DateKey; date: string }
  | { kind: 'uid'; set: string }
  | { kind: 'or'; left: SearchTerm; right: SearchTerm }
  | { kind: 'not'; term: SearchTerm }

/** A date predicate argument: an IMAP date string (05-Mar-2024) or a Date. */
export type DateInput = string | Date

// ---------------------------------------------------------------------------
// Wire encoding
// ---------------------------------------------------------------------------

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const

const IMAP_DATE_RE = /^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/
const SEQUENCE_SET_RE = /^(\d+|\*)(:(\d+|\*))?(,(\d+|\*)(:(\d+|\*))?)*$/
// RFC 5322 field-name: printable ASCII except colon
const FIELD_NAME_RE = /^[!-9;-~]+$/

/** Format a Date as an IMAP search date using its local calendar fields. */
export function formatImapDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0')
  return `${day}-${MONTHS[date.getMonth()]}-${date.getFullYear()}`
}

/** Parse an IMAP date string into calendar fields (month is 0-based). */
export function parseImapDate(text: string): { year: number; month: number; day: number } | null {
  const match = IMAP_DATE_RE.exec(text.trim())
  if (!match) return null
  const [, dayStr = '', monthStr = '', yearStr = ''] = match
  const month = MONTHS.findIndex((m) => m.toLowerCase() === monthStr.toLowerCase())
  const day = Number(dayStr)
  if (month === -1 || day < 1 || day > 31) return null
  return { year: Number(yearStr), month, day }
}

/** Double-quote a string argument. Quoted strings cannot span lines, so CR/LF fold to spaces. */
export function quote(value: string): string {
  const escaped = value
    .replace(/\r\n|\r|\n/g, ' ')
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
  return `"${escaped}"`
}

/** The wire tokens of one phrase, in order. */
export function termTokens(term: SearchTerm): string[] {
  switch (term.kind) {
    case 'flag':
      return [term.key]
    case 'string':
      return [term.key, quote(term.value)]
    case 'header':
      return ['HEADER', term.field, quote(term.value)]
    case 'size':
      return [term.key, String(term.bytes)]
    case 'date':
      return [term.key, term.date]
    case 'uid':
      return ['UID', term.set]
    case 'or':
      return ['OR', ...termTokens(term.left), ...termTokens(term.right)]
    case 'not':
      return ['NOT', ...termTokens(term.term)]
  }
}

// ---------------------------------------------------------------------------
// QueryBuilder
// ---------------------------------------------------------------------------

export class QueryBuilder {
  readonly phrases: readonly SearchTerm[]

  constructor(phrases: readonly SearchTerm[] = []) {
    this.phrases = Object.freeze([...phrases])
  }

  /** True when no predicate was added. The builder never injects a default. */
  get isEmpty(): boolean {
    return this.phrases.length === 0
  }

  /** Space-joined tokens of every phrase, in insertion order. */
  toString(): string {
    return this.phrases.flatMap(termTokens).join(' ')
  }

  /** Return a new builder with the given phrase appended. */
  extend(term: SearchTerm): QueryBuilder {
    return new QueryBuilder([...this.phrases, term])
  }

  /** Return a new builder with every phrase of `query` appended. */
  concat(query: QueryBuilder): QueryBuilder {
    return new QueryBuilder([...this.phrases, ...query.phrases])
  }

  // =========================================================================
  // Connectives
  // =========================================================================

  /** Append `OR <a> <b>`. Each side must be exactly one phrase. */
  or(a: QueryBuilder, b: QueryBuilder): QueryBuilder | QueryShapeError {
    const [left] = a.phrases
    const [right] = b.phrases
    if (a.phrases.length !== 1 || b.phrases.length !== 1 || !left || !right) {
      return new QueryShapeError({
        reason: `OR takes exactly one phrase per side (got ${a.phrases.length} and ${b.phrases.length})`,
      })
    }
    return this.extend({ kind: 'or', left, right })
  }

  /** Append `NOT <phrase>` for each phrase of `query` independently. */
  not(query: QueryBuilder): QueryBuilder {
    return new QueryBuilder([
      ...this.phrases,
      ...query.phrases.map((term): SearchTerm => ({ kind: 'not', term })),
    ])
  }

  /** Subject or body contains the text: `OR SUBJECT "s" BODY "s"`. */
  contains(text: string): QueryBuilder {
    const single = (key: StringKey): SearchTerm => ({ kind: 'string', key, value: text })
    return this.extend({ kind: 'or', left: single('SUBJECT'), right: single('BODY') })
  }

  // =========================================================================
  // Flag predicates
  // =========================================================================

  all() { return this.flag('ALL') }
  answered() { return this.flag('ANSWERED') }
  deleted() { return this.flag('DELETED') }
  draft() { return this.flag('DRAFT') }
  flagged() { return this.flag('FLAGGED') }
  new() { return this.flag('NEW') }
  old() { return this.flag('OLD') }
  recent() { return this.flag('RECENT') }
  seen() { return this.flag('SEEN') }
  unanswered() { return this.flag('UNANSWERED') }
  undeleted() { return this.flag('UNDELETED') }
  undraft() { return this.flag('UNDRAFT') }
  unflagged() { return this.flag('UNFLAGGED') }
  unseen() { return this.flag('UNSEEN') }

  private flag(key: FlagKey): QueryBuilder {
    return this.extend({ kind: 'flag', key })
  }

  // =========================================================================
  // String predicates
  // =========================================================================

  bcc(address: string) { return this.string('BCC', address) }
  body(text: string) { return this.string('BODY', text) }
  cc(address: string) { return this.string('CC', address) }
  from(address: string) { return this.string('FROM', address) }
  keyword(flag: string) { return this.string('KEYWORD', flag) }
  subject(text: string) { return this.string('SUBJECT', text) }
  text(text: string) { return this.string('TEXT', text) }
  to(address: string) { return this.string('TO', address) }
  unkeyword(flag: string) { return this.string('UNKEYWORD', flag) }

  /** Gmail's X-GM-RAW extension: the full Gmail search syntax in one argument. */
  gmailSearch(query: string) { return this.string('X-GM-RAW', query) }

  private string(key: StringKey, value: string): QueryBuilder {
    return this.extend({ kind: 'string', key, value })
  }

  header(field: string, value: string): QueryBuilder | QueryArgumentError {
    if (!FIELD_NAME_RE.test(field)) {
      return new QueryArgumentError({ predicate: 'HEADER', reason: `"${field}" is not a header field name` })
    }
    return this.extend({ kind: 'header', field, value })
  }

  // =========================================================================
  // Size and UID predicates
  // =========================================================================

  larger(bytes: number) { return this.size('LARGER', bytes) }
  smaller(bytes: number) { return this.size('SMALLER', bytes) }

  private size(key: SizeKey, bytes: number): QueryBuilder | QueryArgumentError {
    if (!Number.isSafeInteger(bytes) || bytes < 0) {
      return new QueryArgumentError({ predicate: key, reason: `expected a byte count, got ${bytes}` })
    }
    return this.extend({ kind: 'size', key, bytes })
  }

  uid(set: string | number): QueryBuilder | QueryArgumentError {
    const text = String(set).trim()
    if (!SEQUENCE_SET_RE.test(text)) {
      return new QueryArgumentError({ predicate: 'UID', reason: `"${text}" is not a UID set` })
    }
    return this.extend({ kind: 'uid', set: text })
  }

  // =========================================================================
  // Date predicates
  // =========================================================================

  before(date?: DateInput) { return this.date('BEFORE', date) }
  on(date?: DateInput) { return this.date('ON', date) }
  since(date?: DateInput) { return this.date('SINCE', date) }
  sentBefore(date?: DateInput) { return this.date('SENTBEFORE', date) }
  sentOn(date?: DateInput) { return this.date('SENTON', date) }
  sentSince(date?: DateInput) { return this.date('SENTSINCE', date) }

  private date(key: DateKey, input: DateInput | undefined): QueryBuilder | QueryArgumentError {
    if (input === undefined) {
      return new QueryArgumentError({ predicate: key, reason: 'missing date string or Date value' })
    }
    if (input instanceof Date) {
      if (Number.isNaN(input.getTime())) {
        return new QueryArgumentError({ predicate: key, reason: 'invalid Date' })
      }
      return this.extend({ kind: 'date', key, date: formatImapDate(input) })
    }
    const parsed = parseImapDate(input)
    if (!parsed) {
      return new QueryArgumentError({ predicate: key, reason: `"${input}" is not a DD-Mon-YYYY date` })
    }
    return this.extend({ kind: 'date', key, date: input.trim() })
  }
}

/** Shorthand for an empty builder, the usual starting point. */
export function query(): QueryBuilder {
  return new QueryBuilder()
}
