// Output formatting and logging for skim.
// Data goes to stdout as YAML (js-yaml); hints, warnings and debug lines go to
// stderr, colored with picocolors. In TTY mode YAML keys are dimmed and list
// dashes cyan; piped output stays plain, machine-parseable YAML.
// Line wrapping is disabled everywhere (lineWidth: Infinity).

import yaml from 'js-yaml'
import pc from 'picocolors'

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

/** Anything with a write(string), e.g. process.stdout or a test buffer. */
export interface TextSink {
  write(text: string): unknown
  isTTY?: boolean
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export interface Logger {
  /** Only printed when verbose > 0. */
  debug(msg: string): void
  hint(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export function createLogger({ verbose = 0, sink = process.stderr }: { verbose?: number; sink?: TextSink } = {}): Logger {
  const line = (text: string) => {
    sink.write(text + '\n')
  }
  return {
    debug: (msg) => {
      if (verbose > 0) line(pc.dim(`debug: ${msg}`))
    },
    hint: (msg) => line(pc.dim(`# ${msg}`)),
    warn: (msg) => line(pc.yellow(msg)),
    error: (msg) => line(pc.red(msg)),
  }
}

/** Discards everything. Default for library callers that don't pass a logger. */
export const silentLogger: Logger = {
  debug: () => {},
  hint: () => {},
  warn: () => {},
  error: () => {},
}

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

/**
 * Colorize a YAML string for TTY output.
 * List dashes are cyan, keys are dimmed, values stay at terminal default.
 */
function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })
}

/** Print any value as YAML. */
export function printYaml(data: unknown, sink: TextSink = process.stdout): void {
  const str = toYaml(data)
  sink.write(sink.isTTY ? colorizeYaml(str) : str)
}

/**
 * Print a list of items as YAML.
 * Output shape:
 *   items:
 *     - key: value
 */
export function printList(items: Record<string, unknown>[], sink: TextSink = process.stdout): void {
  printYaml({ items }, sink)
}

// ---------------------------------------------------------------------------
// Date formatting
// ---------------------------------------------------------------------------

export function formatDate(date: Date, now: number = Date.now()): string {
  if (isNaN(date.getTime())) return ''

  const diffMs = now - date.getTime()
  const diffMins = Math.floor(diffMs / 60000)
  const diffHours = Math.floor(diffMs / 3600000)
  const diffDays = Math.floor(diffMs / 86400000)

  if (diffMins < 1) return 'just now'
  if (diffMins < 60) return `${diffMins}m ago`
  if (diffHours < 24) return `${diffHours}h ago`
  if (diffDays < 7) return `${diffDays}d ago`
  if (diffDays < 365) {
    return date.toLocaleDateString(undefined, { month: 'short', day: 'numeric' })
  }
  return date.toLocaleDateString(undefined, { month: 'short', day: 'numeric', year: 'numeric' })
}

// ---------------------------------------------------------------------------
// Sender formatting
// ---------------------------------------------------------------------------

export function formatSender(sender: { name: string; address: string }): string {
  if (sender.name && sender.name !== sender.address) {
    return `${sender.name} <${sender.address}>`
  }
  return sender.address
}

// ---------------------------------------------------------------------------
// Terminal text normalization
// ---------------------------------------------------------------------------

export interface NormalizeOptions {
  enabled: boolean
  form: 'NFC' | 'NFD' | 'NFKC' | 'NFKD'
  /** Drop characters outside printable ASCII after normalizing (NFD + ascii strips accents). */
  ascii: boolean
}

export function normalizeText(text: string, opts: NormalizeOptions): string {
  if (!opts.enabled) return text
  const normalized = text.normalize(opts.form)
  return opts.ascii ? normalized.replace(/[^\x20-\x7e]/g, '') : normalized
}
