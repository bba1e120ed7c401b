// Authenticated IMAP session over an encrypted connection.
// One logical conversation: each call awaits its response before the next is
// issued, nothing is pipelined or retried. Lifecycle:
//   unauthenticated -> connect -> authenticated -> selectMailbox -> selected
// and close() moves any state to closed. Message operations before a mailbox
// is selected return NoMailboxError; anything after close NotConnectedError.
// Message ids are UID strings as the server reports them, in server order.

import * as errore from 'errore'
import { simpleParser, type ParsedMail } from 'mailparser'
import {
  AuthError,
  MailboxError,
  NoMailboxError,
  NotConnectedError,
  TransportError,
  UnsupportedModeError,
  isAuthLikeError,
  remoteReason,
} from './errors.js'
import { createImapTransport, type FetchPart, type FetchedPart, type ImapTransportOptions, type MailTransport } from './imap-transport.js'
import { silentLogger, type Logger } from './output.js'
import { query, type QueryBuilder } from './query.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Credentials {
  user: string
  password: string
}

export interface ServerAddress {
  host: string
  port: number
  /** Only true is supported; plaintext IMAP is refused before connecting. */
  secure: boolean
}

export interface SessionDeps {
  transportFactory?: (options: ImapTransportOptions) => MailTransport
  logger?: Logger
}

/** Every failure a selected-mailbox operation can return. */
export type SessionError = NotConnectedError | NoMailboxError | AuthError | TransportError

export type SessionState = 'unauthenticated' | 'authenticated' | 'selected' | 'closed'

/** Raw RFC 822 bytes of a message plus its parsed form. */
export interface MailMessage {
  uid: string
  source: Buffer
  parsed: ParsedMail
}

const SYSTEM_FLAGS = ['Seen', 'Answered', 'Flagged', 'Deleted', 'Draft', 'Recent']

/**
 * Give a bare flag name the `\` system marker.
 * `seen` -> `\Seen`; already-marked flags and `$Keywords` pass unchanged.
 */
export function normalizeFlag(flag: string): string {
  if (flag.startsWith('\\') || flag.startsWith('$')) return flag
  const known = SYSTEM_FLAGS.find((f) => f.toLowerCase() === flag.toLowerCase())
  return `\\${known ?? flag}`
}

/** Boundary helper: wrap a transport call, converting rejected logins to AuthError
 *  and every other failure to TransportError. The original error stays as `cause`. */
function imapBoundary<T>(user: string, operation: string, fn: () => Promise<T>) {
  return errore.tryAsync({
    try: fn,
    catch: (err) => isAuthLikeError(err)
      ? new AuthError({ user, reason: remoteReason(err), cause: err })
      : new TransportError({ operation, reason: remoteReason(err), cause: err }),
  })
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class Session {
  private transport: MailTransport
  private logger: Logger
  private user: string
  private mailbox: string | null = null
  private readOnly = false
  private _state: SessionState = 'unauthenticated'

  private constructor({ transport, logger, user }: { transport: MailTransport; logger: Logger; user: string }) {
    this.transport = transport
    this.logger = logger
    this.user = user
  }

  /** Open a TLS connection and log in. Returns a session in the authenticated state. */
  static async connect(
    credentials: Credentials,
    server: ServerAddress,
    deps: SessionDeps = {},
  ): Promise<Session | AuthError | UnsupportedModeError | TransportError> {
    if (!server.secure) return new UnsupportedModeError({ mode: 'plaintext IMAP' })

    const logger = deps.logger ?? silentLogger
    const factory = deps.transportFactory ?? createImapTransport
    const transport = factory({
      host: server.host,
      port: server.port,
      user: credentials.user,
      password: credentials.password,
    })

    logger.debug(`connecting to ${server.host}:${server.port} as ${credentials.user}`)
    const connected = await imapBoundary(credentials.user, 'connect', () => transport.connect())
    if (connected instanceof Error) return connected

    const session = new Session({ transport, logger, user: credentials.user })
    session._state = 'authenticated'
    return session
  }

  get state(): SessionState {
    return this._state
  }

  /** Currently selected mailbox, or null before the first successful select. */
  get selectedMailbox(): string | null {
    return this.mailbox
  }

  // =========================================================================
  // Boundary helpers (private)
  // =========================================================================

  private boundary<T>(operation: string, fn: () => Promise<T>): Promise<T | AuthError | TransportError> {
    return imapBoundary(this.user, operation, fn)
  }

  private requireConnected(operation: string): NotConnectedError | null {
    if (this._state === 'unauthenticated' || this._state === 'closed') return new NotConnectedError({ operation })
    return null
  }

  private requireSelected(operation: string): NotConnectedError | NoMailboxError | null {
    const notConnected = this.requireConnected(operation)
    if (notConnected) return notConnected
    if (this._state !== 'selected') return new NoMailboxError({ operation })
    return null
  }

  private async fetchPart(
    operation: string,
    id: string,
    part: FetchPart,
  ): Promise<FetchedPart | null | SessionError> {
    const guard = this.requireSelected(operation)
    if (guard) return guard
    this.logger.debug(`UID FETCH ${id} (${part})`)
    return this.boundary(operation, () => this.transport.uidFetch(id, part))
  }

  // =========================================================================
  // Mailbox selection
  // =========================================================================

  /**
   * Select a mailbox, replacing any previous selection and its read-only mode.
   * A failed select leaves no mailbox selected, as the server does.
   */
  async selectMailbox(name: string, readOnly = false): Promise<void | NotConnectedError | MailboxError> {
    const guard = this.requireConnected('select mailbox')
    if (guard) return guard

    this.logger.debug(`${readOnly ? 'EXAMINE' : 'SELECT'} ${name}`)
    const selected = await errore.tryAsync({
      try: () => this.transport.select(name, { readOnly }),
      catch: (err) => new MailboxError({ mailbox: name, reason: remoteReason(err), cause: err }),
    })
    if (selected instanceof Error) {
      this.mailbox = null
      this.readOnly = false
      this._state = 'authenticated'
      return selected
    }
    this.mailbox = name
    this.readOnly = readOnly
    this._state = 'selected'
  }

  // =========================================================================
  // Search
  // =========================================================================

  /** UIDs matching the query, in server order. */
  async searchIds(q: QueryBuilder): Promise<string[] | SessionError> {
    const guard = this.requireSelected('search')
    if (guard) return guard

    this.logger.debug(`UID SEARCH ${q.isEmpty ? 'ALL' : q.toString()}`)
    const uids = await this.boundary('search', () => this.transport.uidSearch(q))
    if (uids instanceof Error) return uids
    return uids.map(String)
  }

  async fetchUnreadIds(): Promise<string[] | SessionError> {
    return this.searchIds(query().unseen())
  }

  /** Unread count from mailbox STATUS, no search involved. */
  async fetchUnreadCount(): Promise<number | SessionError> {
    const guard = this.requireSelected('count unread messages')
    if (guard) return guard
    const mailbox = this.mailbox ?? 'INBOX'

    this.logger.debug(`STATUS ${mailbox} (UNSEEN)`)
    return this.boundary('status', () => this.transport.unseenCount(mailbox))
  }

  // =========================================================================
  // Fetch
  // =========================================================================

  /** Raw RFC 822 bytes, or null if the UID no longer exists. */
  async fetchMessageBody(id: string): Promise<Buffer | null | SessionError> {
    const part = await this.fetchPart('fetch message', id, 'source')
    if (part === null || part instanceof Error) return part
    return part.source ?? null
  }

  async fetchMessage(id: string): Promise<MailMessage | null | SessionError> {
    const source = await this.fetchMessageBody(id)
    if (source === null || source instanceof Error) return source
    const parsed = await this.parse('parse message', source)
    if (parsed instanceof Error) return parsed
    const message: MailMessage = { uid: id, source, parsed }
    return message
  }

  async fetchMessageSize(id: string): Promise<number | null | SessionError> {
    const part = await this.fetchPart('fetch message size', id, 'size')
    if (part === null || part instanceof Error) return part
    return part.size ?? null
  }

  /** Header block only, parsed. The body is never transferred. */
  async fetchMessageHeaders(id: string): Promise<ParsedMail | null | SessionError> {
    const part = await this.fetchPart('fetch message headers', id, 'headers')
    if (part === null || part instanceof Error) return part
    if (!part.headers) return null
    return this.parse('parse message headers', part.headers)
  }

  async fetchMessageFlags(id: string): Promise<string[] | null | SessionError> {
    const part = await this.fetchPart('fetch message flags', id, 'flags')
    if (part === null || part instanceof Error) return part
    return part.flags ?? []
  }

  private parse(operation: string, source: Buffer): Promise<ParsedMail | TransportError> {
    return errore.tryAsync({
      try: () => simpleParser(source),
      catch: (err) => new TransportError({ operation, reason: remoteReason(err), cause: err }),
    })
  }

  // =========================================================================
  // Flag mutations
  // =========================================================================

  async setFlags(ids: string[], flag: string): Promise<void | SessionError | MailboxError> {
    return this.store('add', ids, flag)
  }

  async clearFlags(ids: string[], flag: string): Promise<void | SessionError | MailboxError> {
    return this.store('remove', ids, flag)
  }

  private async store(
    mode: 'add' | 'remove',
    ids: string[],
    flag: string,
  ): Promise<void | SessionError | MailboxError> {
    const operation = mode === 'add' ? 'set flags' : 'clear flags'
    const guard = this.requireSelected(operation)
    if (guard) return guard
    if (this.readOnly) {
      return new MailboxError({ mailbox: this.mailbox ?? '', reason: 'mailbox is selected read-only' })
    }
    if (ids.length === 0) return

    const normalized = normalizeFlag(flag)
    this.logger.debug(`UID STORE ${ids.join(',')} ${mode === 'add' ? '+' : '-'}FLAGS (${normalized})`)
    const res = await this.boundary(operation, () => this.transport.uidStore(ids, mode, [normalized]))
    if (res instanceof Error) return res
  }

  // =========================================================================
  // Teardown
  // =========================================================================

  /** Log out. Calling close on a closed session does nothing. */
  async close(): Promise<void | TransportError> {
    if (this._state === 'closed') return
    this._state = 'closed'
    this.mailbox = null
    this.logger.debug('LOGOUT')
    const closed = await errore.tryAsync({
      try: () => this.transport.close(),
      catch: (err) => new TransportError({ operation: 'logout', reason: remoteReason(err), cause: err }),
    })
    if (closed instanceof Error) return closed
  }
}
