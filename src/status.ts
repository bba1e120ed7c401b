// One-line status projection of a message: sender, subject, date, marker.
// Works from a parsed message or a header-only parse. From and Date are
// required; a message without them yields MissingHeaderError instead of a
// placeholder. The Date header is read from the raw header lines because the
// parser substitutes a default date when the header is absent.

import type { EmailAddress, HeaderLines, ParsedMail } from 'mailparser'
import { MissingHeaderError } from './errors.js'

export type StatusMarker = '!' | '*' | '.'

export interface StatusProjection {
  uid?: string
  senderName: string
  senderAddress: string
  subject: string
  date: Date
  marker: StatusMarker
}

/**
 * `!` unread, `*` flagged and read, `.` read.
 * No known flags (undefined) means unread.
 */
export function statusMarker(flags: readonly string[] | undefined): StatusMarker {
  if (!flags) return '!'
  const has = (flag: string) => flags.some((f) => f.toLowerCase() === flag.toLowerCase())
  if (!has('\\Seen')) return '!'
  if (has('\\Flagged')) return '*'
  return '.'
}

/** Collapse runs of whitespace, drop line breaks, trim. */
export function cleanSubject(subject: string | undefined): string {
  return (subject ?? '').replace(/\s+/g, ' ').trim()
}

function firstMailbox(addresses: EmailAddress[]): EmailAddress | undefined {
  const [first] = addresses
  if (first?.group) return first.group.find((member) => Boolean(member.address))
  return first
}

/** The unfolded value of the first raw header line named `name`. */
export function rawHeader(headerLines: HeaderLines, name: string): string | undefined {
  const key = name.toLowerCase()
  const entry = headerLines.find((h) => h.key === key)
  if (!entry) return undefined
  const colon = entry.line.indexOf(':')
  return entry.line.slice(colon + 1).replace(/\r?\n[ \t]+/g, ' ').trim()
}

export function projectStatus(
  parsed: ParsedMail,
  { uid, flags }: { uid?: string; flags?: readonly string[] } = {},
): StatusProjection | MissingHeaderError {
  const sender = parsed.from ? firstMailbox(parsed.from.value) : undefined
  if (!sender?.address) return new MissingHeaderError({ header: 'From', uid: uid ?? 'unknown' })

  const rawDate = rawHeader(parsed.headerLines, 'date')
  const date = rawDate ? new Date(rawDate) : undefined
  if (!date || Number.isNaN(date.getTime())) return new MissingHeaderError({ header: 'Date', uid: uid ?? 'unknown' })

  return {
    uid,
    senderName: sender.name.trim() || sender.address,
    senderAddress: sender.address,
    subject: cleanSubject(parsed.subject),
    date,
    marker: statusMarker(flags),
  }
}
