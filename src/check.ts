// Check-mail workflow: list the status of unread or matching messages.
// An empty query means "what's new" (UNSEEN). Ids arrive in server order
// (oldest first) and are shown newest first, cut to display.limit.
// With the cache enabled each message is resolved through the cache and
// projected from the full source; without it only the header block is
// fetched. Vanished ids are skipped; every other failure aborts the run.

import type { ParsedMail } from 'mailparser'
import type { SkimConfig } from './config.js'
import type { CacheCorruptError, MissingHeaderError } from './errors.js'
import type { MessageCache } from './message-cache.js'
import { formatDate, formatSender, normalizeText, printList, silentLogger, type Logger, type TextSink } from './output.js'
import type { QueryBuilder } from './query.js'
import type { Session, SessionError } from './session.js'
import { projectStatus, type StatusProjection } from './status.js'

export type CheckSession = Pick<
  Session,
  'fetchUnreadIds' | 'searchIds' | 'fetchMessage' | 'fetchMessageSize' | 'fetchMessageHeaders' | 'fetchMessageFlags'
>

export interface CheckOptions {
  session: CheckSession
  cache: MessageCache
  account: string
  query: QueryBuilder
  config: Pick<SkimConfig, 'cache' | 'display'>
  logger?: Logger
}

export interface CheckResult {
  mode: 'unread' | 'search'
  /** Matching ids before the display limit was applied. */
  total: number
  entries: StatusProjection[]
  summary: string
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`
}

export async function checkMail({
  session,
  cache,
  account,
  query,
  config,
  logger = silentLogger,
}: CheckOptions): Promise<CheckResult | SessionError | CacheCorruptError | MissingHeaderError> {
  const mode: CheckResult['mode'] = query.isEmpty ? 'unread' : 'search'
  if (mode === 'search') logger.hint(`QUERY: ${query.toString()}`)
  const ids = mode === 'unread' ? await session.fetchUnreadIds() : await session.searchIds(query)
  if (ids instanceof Error) return ids

  const summary = mode === 'unread' ? plural(ids.length, 'new message') : `${plural(ids.length, 'message')} found`
  const newestFirst = [...ids].reverse()
  const shown = config.display.limit === undefined ? newestFirst : newestFirst.slice(0, config.display.limit)
  logger.debug(`${summary}, showing ${shown.length}`)

  const entries: StatusProjection[] = []
  for (const uid of shown) {
    let parsed: ParsedMail | undefined
    if (cache.enabled) {
      const message = await cache.fetchOrPopulate(session, account, uid, config.cache.maxMessageBytes)
      if (message instanceof Error) return message
      parsed = message?.parsed
    } else {
      const headers = await session.fetchMessageHeaders(uid)
      if (headers instanceof Error) return headers
      parsed = headers ?? undefined
    }
    if (!parsed) {
      logger.debug(`message ${uid} vanished, skipping`)
      continue
    }

    // Everything in unread mode is unread by definition
    let flags: string[] | undefined
    if (mode === 'search') {
      const fetched = await session.fetchMessageFlags(uid)
      if (fetched instanceof Error) return fetched
      if (fetched === null) {
        logger.debug(`message ${uid} vanished, skipping`)
        continue
      }
      flags = fetched
    }

    const projection = projectStatus(parsed, { uid, flags })
    if (projection instanceof Error) return projection
    entries.push(projection)
  }

  return { mode, total: ids.length, entries, summary }
}

/** Print entries as a YAML list on `out`, the summary as a hint on the logger. */
export function printCheckResult(
  result: CheckResult,
  { display }: Pick<SkimConfig, 'display'>,
  { out = process.stdout, logger, now = Date.now() }: { out?: TextSink; logger: Logger; now?: number },
): void {
  const text = (s: string) => normalizeText(s, display.normalize)

  if (result.entries.length > 0) {
    printList(
      result.entries.map((entry) => ({
        uid: entry.uid ?? '',
        status: entry.marker,
        from: text(formatSender({ name: entry.senderName, address: entry.senderAddress })),
        subject: text(entry.subject),
        date: formatDate(entry.date, now),
      })),
      out,
    )
  }
  if (!display.suppressSummary) logger.hint(result.summary)
}
