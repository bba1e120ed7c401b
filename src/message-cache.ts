// File-backed cache of raw RFC 822 messages.
// Layout: <root>/<account>/<uid>.msg, one file per message, bytes exactly as
// the server sent them (re-encoded only when fileEncoding is not utf8).
// Entries are written once and never invalidated; UIDs are only stable within
// one mailbox, so callers that switch mailboxes should use separate accounts.
// Writes go to a uniquely named temp file in the same directory and are then
// renamed into place, so a concurrent reader sees either nothing or the
// whole file.

import crypto from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import * as errore from 'errore'
import { simpleParser } from 'mailparser'
import { CacheCorruptError, CacheWriteError } from './errors.js'
import { silentLogger, type Logger } from './output.js'
import type { MailMessage, Session, SessionError } from './session.js'

export type FileEncoding = 'utf8' | 'latin1' | 'ascii' | 'utf16le'

export interface MessageCacheOptions {
  /** Cache root directory; account subdirectories are created beneath it. */
  dir: string
  enabled?: boolean
  fileEncoding?: FileEncoding
  logger?: Logger
}

/** The session calls fetchOrPopulate depends on. */
export type MessageSource = Pick<Session, 'fetchMessage' | 'fetchMessageSize'>

/**
 * Make an account or UID safe to use as a single path component.
 * Separators, control characters and reserved punctuation become `_`;
 * `.` and `..` can never reach the filesystem as-is.
 */
export function sanitizePathComponent(name: string): string {
  const sanitized = name
    .replace(/[\x00-\x1f\x7f]/g, '')
    .replace(/[<>:"/\\|?*]/g, '_')
    .trim()
  if (sanitized === '') return '_'
  if (/^\.+$/.test(sanitized)) return sanitized.replace(/\./g, '_')
  return sanitized
}

export class MessageCache {
  readonly dir: string
  readonly enabled: boolean
  private fileEncoding: FileEncoding
  private logger: Logger

  constructor({ dir, enabled = true, fileEncoding = 'utf8', logger = silentLogger }: MessageCacheOptions) {
    this.dir = dir
    this.enabled = enabled
    this.fileEncoding = fileEncoding
    this.logger = logger
  }

  /** Path of the cache file for (account, id). */
  filePath(account: string, id: string): string {
    return path.join(this.dir, sanitizePathComponent(account), `${sanitizePathComponent(id)}.msg`)
  }

  async has(account: string, id: string): Promise<boolean> {
    if (!this.enabled) return false
    try {
      await fs.access(this.filePath(account, id))
      return true
    } catch {
      return false
    }
  }

  /** Cached message, null on a miss. A present but broken file is corrupt, never a miss. */
  async load(account: string, id: string): Promise<MailMessage | null | CacheCorruptError> {
    if (!this.enabled) return null
    const file = this.filePath(account, id)

    let stored: Buffer
    try {
      stored = await fs.readFile(file)
    } catch (err) {
      if (isNotFound(err)) return null
      return new CacheCorruptError({ file, reason: 'unreadable', cause: err })
    }
    if (stored.length === 0) return new CacheCorruptError({ file, reason: 'empty file' })

    const source = this.decode(stored)
    try {
      const parsed = await simpleParser(source)
      return { uid: id, source, parsed }
    } catch (err) {
      return new CacheCorruptError({ file, reason: 'not a parseable message', cause: err })
    }
  }

  /** Write a message through a temp file. A source the file encoding cannot hold is refused. */
  async save(account: string, id: string, source: Buffer): Promise<void | CacheWriteError> {
    const file = this.filePath(account, id)
    const stored = this.encode(source)
    if (!this.decode(stored).equals(source)) {
      return new CacheWriteError({ file, reason: `message cannot be stored as ${this.fileEncoding} without loss` })
    }

    const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`)
    const written = await errore.tryAsync({
      try: async () => {
        await fs.mkdir(path.dirname(file), { recursive: true })
        await fs.writeFile(tmp, stored)
        await fs.rename(tmp, file)
      },
      catch: (err) => new CacheWriteError({ file, reason: String(err), cause: err }),
    })
    if (written instanceof Error) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        this.logger.debug(`could not remove ${tmp}: ${String(rmErr)}`)
      })
      return written
    }
  }

  /**
   * Resolve a message from the cache, falling back to the server.
   * Messages larger than sizeThreshold bytes are fetched but not stored.
   * A failed save only logs a warning; the fetched message is still returned.
   */
  async fetchOrPopulate(
    session: MessageSource,
    account: string,
    id: string,
    sizeThreshold: number,
  ): Promise<MailMessage | null | CacheCorruptError | SessionError> {
    if (!this.enabled) return session.fetchMessage(id)

    const cached = await this.load(account, id)
    if (cached !== null) return cached

    const size = await session.fetchMessageSize(id)
    if (size === null || size instanceof Error) return size

    const message = await session.fetchMessage(id)
    if (message === null || message instanceof Error) return message

    if (size > sizeThreshold) {
      this.logger.debug(`message ${id} is ${size} bytes, over the ${sizeThreshold} byte cache limit`)
      return message
    }

    const saved = await this.save(account, id, message.source)
    if (saved instanceof Error) this.logger.warn(saved.message)
    return message
  }

  private encode(source: Buffer): Buffer {
    if (this.fileEncoding === 'utf8') return source
    return Buffer.from(source.toString('utf8'), this.fileEncoding)
  }

  private decode(stored: Buffer): Buffer {
    if (this.fileEncoding === 'utf8') return stored
    return Buffer.from(stored.toString(this.fileEncoding), 'utf8')
  }
}

// ENOTDIR: a path component is a file, so the entry cannot exist either
function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false
  const code: unknown = Reflect.get(err, 'code')
  return code === 'ENOENT' || code === 'ENOTDIR'
}
