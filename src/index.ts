// Public entry point for skim-mail.
// Re-exports the session, query builder, cache, status projection and the
// check workflow built on top of them.

export * from './errors.js'
export { QueryBuilder, query, formatImapDate, parseImapDate, quote, termTokens } from './query.js'
export type { DateInput, DateKey, FlagKey, SearchTerm, SizeKey, StringKey } from './query.js'
export { buildQueryFromFlags } from './query-flags.js'
export type { QueryFlag, QueryFlagName } from './query-flags.js'
export { Session, normalizeFlag } from './session.js'
export type { Credentials, MailMessage, ServerAddress, SessionDeps, SessionError, SessionState } from './session.js'
export { createImapTransport, searchedKeywords, toSearchObject } from './imap-transport.js'
export type { FetchPart, FetchedPart, ImapClientFactory, ImapClientLike, ImapTransportOptions, MailTransport } from './imap-transport.js'
export { MessageCache, sanitizePathComponent } from './message-cache.js'
export type { FileEncoding, MessageCacheOptions, MessageSource } from './message-cache.js'
export { projectStatus, statusMarker, cleanSubject } from './status.js'
export type { StatusMarker, StatusProjection } from './status.js'
export { loadConfig, requireCredentials, configSchema, expandHome } from './config.js'
export type { ConfigLayer, LoadConfigOptions, SkimConfig } from './config.js'
export { checkMail, printCheckResult } from './check.js'
export type { CheckOptions, CheckResult, CheckSession } from './check.js'
export { resolveViewer, viewerArgv } from './viewers.js'
export type { ViewerCommand, ViewerTable } from './viewers.js'
export { createLogger, silentLogger, printYaml, printList, formatDate, formatSender, normalizeText } from './output.js'
export type { Logger, NormalizeOptions, TextSink } from './output.js'
