// MIME type -> viewer command lookup.
// Exact type first (case-insensitive), then the `major/*` wildcard.
// Command templates may contain {file}, replaced with the attachment path;
// templates without it get the path appended as the last argument.

import { NoViewerError } from './errors.js'

export type ViewerTable = Readonly<Record<string, string>>

export interface ViewerCommand {
  /** The table key that matched, e.g. `image/*`. */
  pattern: string
  template: string
}

export function resolveViewer(table: ViewerTable, mimeType: string): ViewerCommand | NoViewerError {
  const wanted = mimeType.trim().toLowerCase()
  const major = wanted.split('/')[0] ?? wanted
  const entries = Object.entries(table).map(([pattern, template]) => ({ pattern, key: pattern.toLowerCase(), template }))

  const exact = entries.find((e) => e.key === wanted)
  if (exact) return { pattern: exact.pattern, template: exact.template }

  const wildcard = entries.find((e) => e.key === `${major}/*`)
  if (wildcard) return { pattern: wildcard.pattern, template: wildcard.template }

  return new NoViewerError({ mimeType })
}

/** Split a command template into argv, substituting {file}. Quotes group words. */
export function viewerArgv(command: ViewerCommand, file: string): string[] {
  const words = command.template.match(/"[^"]*"|'[^']*'|\S+/g) ?? []
  const unquoted = words.map((w) => (/^(["']).*\1$/.test(w) ? w.slice(1, -1) : w))
  if (!unquoted.some((w) => w.includes('{file}'))) return [...unquoted, file]
  return unquoted.map((w) => w.replaceAll('{file}', file))
}
