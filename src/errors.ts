// Error values for skim (errore pattern: errors as values, not exceptions).
// Every fallible operation returns one of these instead of throwing:
// callers narrow with instanceof and TypeScript strips the error branch.
// Absence (a UID that vanished, a cache miss) is null, never an error.
// The underlying library error is kept as `cause`.

import * as errore from 'errore'

// ---------------------------------------------------------------------------
// Connection errors
// ---------------------------------------------------------------------------

/** Returned by any session operation before connect or after close. */
export class NotConnectedError extends errore.createTaggedError({
  name: 'NotConnectedError',
  message: 'Cannot $operation: not connected',
}) {}

/** Returned when the server rejects the credentials. */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $user: $reason',
}) {}

/** Returned for plaintext connection requests, which are not supported. */
export class UnsupportedModeError extends errore.createTaggedError({
  name: 'UnsupportedModeError',
  message: 'Unsupported transport mode: $mode',
}) {}

/** Any other remote failure. The remote text is kept verbatim in the message. */
export class TransportError extends errore.createTaggedError({
  name: 'TransportError',
  message: '$operation failed: $reason',
}) {}

// ---------------------------------------------------------------------------
// Mailbox errors
// ---------------------------------------------------------------------------

/** Returned by message operations issued before selectMailbox. */
export class NoMailboxError extends errore.createTaggedError({
  name: 'NoMailboxError',
  message: 'Cannot $operation: no mailbox selected',
}) {}

export class MailboxError extends errore.createTaggedError({
  name: 'MailboxError',
  message: 'Could not change mailboxes to "$mailbox": $reason',
}) {}

// ---------------------------------------------------------------------------
// Query construction errors (raised before anything reaches the wire)
// ---------------------------------------------------------------------------

export class QueryArgumentError extends errore.createTaggedError({
  name: 'QueryArgumentError',
  message: 'Invalid argument for $predicate: $reason',
}) {}

export class QueryShapeError extends errore.createTaggedError({
  name: 'QueryShapeError',
  message: 'Invalid query shape: $reason',
}) {}

// ---------------------------------------------------------------------------
// Cache errors
// ---------------------------------------------------------------------------

/** Non-fatal: the message stays usable in memory, it just isn't persisted. */
export class CacheWriteError extends errore.createTaggedError({
  name: 'CacheWriteError',
  message: 'Could not save message to cache at $file: $reason',
}) {}

/** Fatal: a corrupt cache file means local storage needs attention. */
export class CacheCorruptError extends errore.createTaggedError({
  name: 'CacheCorruptError',
  message: 'Corrupt cache file $file: $reason',
}) {}

// ---------------------------------------------------------------------------
// Message, config and display errors
// ---------------------------------------------------------------------------

export class MissingHeaderError extends errore.createTaggedError({
  name: 'MissingHeaderError',
  message: 'Missing required header $header in message $uid',
}) {}

export class ConfigError extends errore.createTaggedError({
  name: 'ConfigError',
  message: 'Invalid configuration in $source: $reason',
}) {}

export class NoViewerError extends errore.createTaggedError({
  name: 'NoViewerError',
  message: 'No viewer configured for $mimeType',
}) {}

// ---------------------------------------------------------------------------
// Boundary helpers
// ---------------------------------------------------------------------------

/** Pull the server's response text out of an imapflow error, falling back to the message. */
export function remoteReason(err: unknown): string {
  if (err instanceof Error) {
    const text: unknown = Reflect.get(err, 'responseText')
    if (typeof text === 'string' && text.length > 0) return text
    return err.message
  }
  return String(err)
}

/** imapflow marks rejected LOGIN/AUTHENTICATE with `authenticationFailed`. */
export function isAuthLikeError(err: unknown): boolean {
  if (!(err instanceof Error)) return false
  if (Reflect.get(err, 'authenticationFailed') === true) return true
  const msg = String(err)
  return msg.includes('AUTHENTICATIONFAILED') || msg.includes('Invalid credentials')
}
