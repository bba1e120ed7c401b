// Per-invocation configuration.
// Layers, lowest precedence first: built-in defaults, optional system/user
// files (/etc/skim.yaml, ~/.skim.yaml), explicit files, SKIM_* environment
// variables, explicit overrides (command-line flags), then the named account
// section. Layers are deep-merged as raw objects and validated once with zod.
// The result is deep-frozen: nothing downstream can mutate it.

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import yaml from 'js-yaml'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import type { Credentials } from './session.js'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const imapSchema = z.object({
  host: z.string().min(1).default('imap.gmail.com'),
  port: z.coerce.number().int().min(1).max(65535).default(993),
  secure: z.boolean().default(true),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  mailbox: z.string().min(1).default('INBOX'),
})

const cacheSchema = z.object({
  dir: z.string().min(1).default('~/.skim/cache'),
  enabled: z.boolean().default(true),
  maxMessageBytes: z.coerce.number().int().nonnegative().default(524288),
  fileEncoding: z.enum(['utf8', 'latin1', 'ascii', 'utf16le']).default('utf8'),
})

const displaySchema = z.object({
  limit: z.number().int().positive().optional(),
  suppressSummary: z.boolean().default(false),
  normalize: z
    .object({
      enabled: z.boolean().default(true),
      form: z.enum(['NFC', 'NFD', 'NFKC', 'NFKD']).default('NFC'),
      ascii: z.boolean().default(false),
    })
    .default({}),
})

export const configSchema = z.object({
  imap: imapSchema.default({}),
  cache: cacheSchema.default({}),
  display: displaySchema.default({}),
  /** MIME type or `major/*` pattern -> viewer command template. */
  viewers: z.record(z.string(), z.string()).default({}),
  /** Named partial configs, applied last when selected. */
  accounts: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
  verbose: z.number().int().nonnegative().default(0),
})

export type SkimConfig = z.infer<typeof configSchema>

/** A raw, unvalidated layer: parsed YAML, flags or an account section. */
export type ConfigLayer = { [key: string]: unknown }

export const DEFAULT_OPTIONAL_FILES = ['/etc/skim.yaml', '~/.skim.yaml']

/** Environment variable -> config path. */
const ENV_KEYS: Record<string, [section: string, key: string]> = {
  SKIM_IMAP_HOST: ['imap', 'host'],
  SKIM_IMAP_PORT: ['imap', 'port'],
  SKIM_IMAP_USER: ['imap', 'user'],
  SKIM_IMAP_PASSWORD: ['imap', 'password'],
  SKIM_IMAP_MAILBOX: ['imap', 'mailbox'],
  SKIM_CACHE_DIR: ['cache', 'dir'],
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deep merge: objects merge key by key, anything else in `top` replaces. */
export function mergeLayers(base: ConfigLayer, top: ConfigLayer): ConfigLayer {
  const out: ConfigLayer = { ...base }
  for (const [key, value] of Object.entries(top)) {
    if (value === undefined) continue
    const current = out[key]
    out[key] = isLayer(current) && isLayer(value) ? mergeLayers(current, value) : value
  }
  return out
}

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === '~') return homeDir
  if (p.startsWith('~/')) return path.join(homeDir, p.slice(2))
  return p
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    const children: unknown[] = Object.values(value)
    for (const child of children) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  let layer: ConfigLayer = {}
  for (const [name, [section, key]] of Object.entries(ENV_KEYS)) {
    const value = env[name]
    if (value === undefined || value === '') continue
    layer = mergeLayers(layer, { [section]: { [key]: value } })
  }
  return layer
}

async function readLayer(file: string, { optional }: { optional: boolean }): Promise<ConfigLayer | null | ConfigError> {
  let text: string
  try {
    text = await fs.readFile(file, 'utf8')
  } catch (err) {
    if (optional && err instanceof Error && Reflect.get(err, 'code') === 'ENOENT') return null
    return new ConfigError({ source: file, reason: 'could not read file', cause: err })
  }

  let data: unknown
  try {
    data = yaml.load(text, { filename: file })
  } catch (err) {
    return new ConfigError({ source: file, reason: err instanceof Error ? err.message : String(err), cause: err })
  }
  if (data === undefined || data === null) return {}
  if (!isLayer(data)) return new ConfigError({ source: file, reason: 'top level must be a mapping' })
  return data
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit files; a missing one is an error. */
  files?: string[]
  /** Files read when present. Defaults to /etc/skim.yaml and ~/.skim.yaml. */
  optionalFiles?: string[]
  env?: NodeJS.ProcessEnv
  overrides?: ConfigLayer
  /** Name of an `accounts` section merged on top of everything else. */
  account?: string
  homeDir?: string
}

export async function loadConfig({
  files = [],
  optionalFiles = DEFAULT_OPTIONAL_FILES,
  env = process.env,
  overrides = {},
  account,
  homeDir = os.homedir(),
}: LoadConfigOptions = {}): Promise<SkimConfig | ConfigError> {
  let merged: ConfigLayer = {}

  const sources = [
    ...optionalFiles.map((file) => ({ file, optional: true })),
    ...files.map((file) => ({ file, optional: false })),
  ]
  for (const { file, optional } of sources) {
    const layer = await readLayer(expandHome(file, homeDir), { optional })
    if (layer instanceof Error) return layer
    if (layer) merged = mergeLayers(merged, layer)
  }

  merged = mergeLayers(merged, envLayer(env))
  merged = mergeLayers(merged, overrides)

  if (account !== undefined) {
    const accounts = merged.accounts
    const section = isLayer(accounts) ? accounts[account] : undefined
    if (!isLayer(section)) {
      return new ConfigError({ source: 'accounts', reason: `no account named "${account}"` })
    }
    merged = mergeLayers(merged, section)
  }

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    return new ConfigError({ source: 'configuration', reason: formatIssues(result.error), cause: result.error })
  }

  const config = result.data
  config.cache.dir = expandHome(config.cache.dir, homeDir)
  return deepFreeze(config)
}

/** Login credentials from a loaded config, or an error naming what is missing. */
export function requireCredentials(config: SkimConfig): Credentials | ConfigError {
  const { user, password } = config.imap
  if (!user) return new ConfigError({ source: 'imap.user', reason: 'no IMAP user configured (set SKIM_IMAP_USER)' })
  if (password === undefined) {
    return new ConfigError({ source: 'imap.password', reason: 'no IMAP password configured (set SKIM_IMAP_PASSWORD)' })
  }
  return { user, password }
}
