import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from './logger.js'

export type ChunkMode = 'whole' | 'char'

export type AgentConfig = Readonly<{
  logLevel: LogLevel
  /** Default deadline for agent -> client requests. */
  requestTimeoutMs: number
  /** How reply text is split into `agent_message_chunk` updates. */
  chunkMode: ChunkMode
  chunkSize: number
  maxToolRounds: number
  /** Ask the client before edit/execute tool calls. */
  requestPermission: boolean
}>

export const DEFAULT_CONFIG: AgentConfig = Object.freeze({
  logLevel: 'info',
  requestTimeoutMs: 30_000,
  chunkMode: 'whole',
  chunkSize: 600,
  maxToolRounds: 3,
  requestPermission: true
})

const LogLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform(v => (v === 'warning' ? 'warn' : v))
  .pipe(z.enum(LOG_LEVELS))

const PositiveIntSchema = z.coerce.number().int().positive()

const ChunkModeSchema = z.string().trim().toLowerCase().pipe(z.enum(['whole', 'char']))

const BooleanSchema = z.boolean()

type Overrides = { -readonly [K in keyof AgentConfig]?: AgentConfig[K] }

export type ResolveConfigOptions = {
  env?: NodeJS.ProcessEnv
  /** `--log-level` from the command line; wins over everything else. */
  cliLogLevel?: string
  /** Explicit settings file; defaults to `<agent dir>/settings.json`. */
  settingsPath?: string
}

export type ResolvedConfig = {
  config: AgentConfig
  /** Problems found while resolving (reported once a logger exists). */
  warnings: string[]
}

function isObject(x: unknown): x is Record<string, unknown> {
  return Boolean(x) && typeof x === 'object' && !Array.isArray(x)
}

function readJsonFile(path: string, warnings: string[]): Record<string, unknown> {
  if (!existsSync(path)) return {}
  try {
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'))
    if (isObject(data)) return data
    warnings.push(`${path}: expected a JSON object, ignoring`)
  } catch (err) {
    warnings.push(`${path}: ${err instanceof Error ? err.message : String(err)}`)
  }
  return {}
}

export function getAgentDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.ACP_AGENT_DIR ? resolve(env.ACP_AGENT_DIR) : join(homedir(), '.stdio-acp-agent')
}

/**
 * Resolve the effective configuration. Precedence (lowest first): built-in defaults,
 * settings file, environment, command line. Invalid values are reported and skipped.
 */
export function resolveConfig(opts: ResolveConfigOptions = {}): ResolvedConfig {
  const env = opts.env ?? process.env
  const warnings: string[] = []
  const settingsPath = opts.settingsPath ?? join(getAgentDir(env), 'settings.json')
  const settings = readJsonFile(settingsPath, warnings)

  const layers: Array<[source: string, values: Record<string, unknown>]> = [
    [settingsPath, settings],
    [
      'environment',
      {
        logLevel: env.ACP_AGENT_LOG_LEVEL,
        requestTimeoutMs: env.ACP_AGENT_REQUEST_TIMEOUT_MS,
        chunkMode: env.ACP_AGENT_CHUNK_MODE,
        chunkSize: env.ACP_AGENT_CHUNK_SIZE
      }
    ],
    ['--log-level', { logLevel: opts.cliLogLevel }]
  ]

  const merged: Overrides = {}
  for (const [source, values] of layers) {
    const pick = <T>(key: keyof AgentConfig, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined => {
      const raw = values[key]
      if (raw === undefined || raw === '') return undefined
      const parsed = schema.safeParse(raw)
      if (parsed.success) return parsed.data
      warnings.push(`${source}: invalid ${key} ${JSON.stringify(raw)} (${parsed.error.issues[0]?.message ?? 'invalid'})`)
      return undefined
    }

    const logLevel = pick('logLevel', LogLevelSchema)
    if (logLevel !== undefined) merged.logLevel = logLevel
    const requestTimeoutMs = pick('requestTimeoutMs', PositiveIntSchema)
    if (requestTimeoutMs !== undefined) merged.requestTimeoutMs = requestTimeoutMs
    const chunkMode = pick('chunkMode', ChunkModeSchema)
    if (chunkMode !== undefined) merged.chunkMode = chunkMode
    const chunkSize = pick('chunkSize', PositiveIntSchema)
    if (chunkSize !== undefined) merged.chunkSize = chunkSize
    const maxToolRounds = pick('maxToolRounds', PositiveIntSchema)
    if (maxToolRounds !== undefined) merged.maxToolRounds = maxToolRounds
    const requestPermission = pick('requestPermission', BooleanSchema)
    if (requestPermission !== undefined) merged.requestPermission = requestPermission
  }

  return { config: Object.freeze({ ...DEFAULT_CONFIG, ...merged }), warnings }
}

export type PackageInfo = { name: string; version: string }

/** Name and version from the nearest package.json above this module. */
export function readPackageInfo(metaUrl: string = import.meta.url): PackageInfo {
  const fallback: PackageInfo = { name: 'stdio-acp-agent', version: '0.0.0' }
  try {
    let dir = dirname(fileURLToPath(metaUrl))

    for (let i = 0; i < 6; i++) {
      const p = join(dir, 'package.json')
      if (existsSync(p)) {
        const json: unknown = JSON.parse(readFileSync(p, 'utf-8'))
        if (!isObject(json)) return fallback
        return {
          name: typeof json.name === 'string' ? json.name : fallback.name,
          version: typeof json.version === 'string' ? json.version : fallback.version
        }
      }
      dir = dirname(dir)
    }
  } catch {
    // unreadable package.json: report the fallback identity
  }
  return fallback
}
