import {join} from 'node:path'

import {LogLevelSchema, type LogLevel} from '@reality-reconciler/logging'
import {ListenProfileSchema, type ListenProfile} from '@reality-reconciler/proxy-config'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().nonnegative())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const csvFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
  return items.length === 0 ? undefined : items
}, z.array(z.string()).optional())

const INVALID_JSON = Symbol('invalid_json')

const optionalJson = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  try {
    const parsed: unknown = JSON.parse(trimmed)
    return parsed
  } catch {
    return INVALID_JSON
  }
}, z.unknown().optional())

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    RECONCILER_LOG_LEVEL: LogLevelSchema.default('info'),
    RECONCILER_LOG_REDACT_EXTRA_KEYS: csvFromEnv,
    RECONCILER_XRAY_BIN: z.string().trim().min(1).default('/usr/local/bin/xray'),
    RECONCILER_CONFIG_PATH: z.string().trim().min(1).default('/usr/local/etc/xray/config.json'),
    RECONCILER_STATE_DIR: z.string().trim().min(1).default('/var/lib/reality-reconciler'),
    RECONCILER_CREDENTIAL_STORE_PATH: z.string().trim().min(1).default('.env'),
    RECONCILER_SERVICE_UNIT: z.string().trim().min(1).default('xray'),
    RECONCILER_SYSTEMCTL_BIN: z.string().trim().min(1).default('systemctl'),
    RECONCILER_JOURNALCTL_BIN: z.string().trim().min(1).default('journalctl'),
    RECONCILER_SS_BIN: z.string().trim().min(1).default('ss'),
    RECONCILER_DESTINATION: z.string().trim().min(1).default('www.google.com:443'),
    RECONCILER_SERVER_NAMES: csvFromEnv,
    RECONCILER_LISTEN_PROFILES_JSON: optionalJson,
    RECONCILER_SERVER_ADDRESS: optionalString,
    RECONCILER_WILDCARD_SHORT_ID: booleanFromEnv.default(true),
    RECONCILER_COMMAND_TIMEOUT_MS: numberFromEnv.default(15_000),
    RECONCILER_HEALTH_TIMEOUT_SECONDS: numberFromEnv.default(30),
    RECONCILER_HEALTH_MAX_ATTEMPTS: numberFromEnv.default(3),
    RECONCILER_HEALTH_BACKOFF_MS: numberFromEnv.default(2_000),
    RECONCILER_LOCK_TIMEOUT_MS: numberFromEnv.default(2_000)
  })
  .strict()

export type ReconcilerConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  paths: {
    xrayBinary: string
    activeConfig: string
    stateDir: string
    ledger: string
    lock: string
    credentialStore: string
  }
  service: {
    unit: string
    systemctlBinary: string
    journalctlBinary: string
    ssBinary: string
  }
  identity: {
    destination: string
    serverNames: string[]
    listenProfiles: ListenProfile[]
    serverAddress?: string
    wildcardShortId: boolean
  }
  commandTimeoutMs: number
  health: {
    timeoutSeconds: number
    maxAttempts: number
    backoffMs: number
  }
  lockTimeoutMs: number
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  RECONCILER_LOG_LEVEL: env.RECONCILER_LOG_LEVEL,
  RECONCILER_LOG_REDACT_EXTRA_KEYS: env.RECONCILER_LOG_REDACT_EXTRA_KEYS,
  RECONCILER_XRAY_BIN: env.RECONCILER_XRAY_BIN,
  RECONCILER_CONFIG_PATH: env.RECONCILER_CONFIG_PATH,
  RECONCILER_STATE_DIR: env.RECONCILER_STATE_DIR,
  RECONCILER_CREDENTIAL_STORE_PATH: env.RECONCILER_CREDENTIAL_STORE_PATH,
  RECONCILER_SERVICE_UNIT: env.RECONCILER_SERVICE_UNIT,
  RECONCILER_SYSTEMCTL_BIN: env.RECONCILER_SYSTEMCTL_BIN,
  RECONCILER_JOURNALCTL_BIN: env.RECONCILER_JOURNALCTL_BIN,
  RECONCILER_SS_BIN: env.RECONCILER_SS_BIN,
  RECONCILER_DESTINATION: env.RECONCILER_DESTINATION,
  RECONCILER_SERVER_NAMES: env.RECONCILER_SERVER_NAMES,
  RECONCILER_LISTEN_PROFILES_JSON: env.RECONCILER_LISTEN_PROFILES_JSON,
  RECONCILER_SERVER_ADDRESS: env.RECONCILER_SERVER_ADDRESS,
  RECONCILER_WILDCARD_SHORT_ID: env.RECONCILER_WILDCARD_SHORT_ID,
  RECONCILER_COMMAND_TIMEOUT_MS: env.RECONCILER_COMMAND_TIMEOUT_MS,
  RECONCILER_HEALTH_TIMEOUT_SECONDS: env.RECONCILER_HEALTH_TIMEOUT_SECONDS,
  RECONCILER_HEALTH_MAX_ATTEMPTS: env.RECONCILER_HEALTH_MAX_ATTEMPTS,
  RECONCILER_HEALTH_BACKOFF_MS: env.RECONCILER_HEALTH_BACKOFF_MS,
  RECONCILER_LOCK_TIMEOUT_MS: env.RECONCILER_LOCK_TIMEOUT_MS
})

const DEFAULT_LISTEN_PROFILES: ListenProfile[] = [{port: 443, isPrimary: true}]

const parseListenProfiles = (raw: unknown): ListenProfile[] => {
  if (raw === undefined) {
    return DEFAULT_LISTEN_PROFILES
  }
  if (raw === INVALID_JSON) {
    throw new Error('RECONCILER_LISTEN_PROFILES_JSON must be valid JSON')
  }

  const parsed = z.array(ListenProfileSchema).min(1).safeParse(raw)
  if (!parsed.success) {
    throw new Error(
      `RECONCILER_LISTEN_PROFILES_JSON is invalid: ${parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    )
  }
  if (parsed.data.filter(profile => profile.isPrimary).length !== 1) {
    throw new Error('RECONCILER_LISTEN_PROFILES_JSON must mark exactly one profile as primary')
  }
  return parsed.data
}

const destinationHost = (destination: string) => {
  const separator = destination.lastIndexOf(':')
  return separator > 0 ? destination.slice(0, separator) : destination
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ReconcilerConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  if (parsed.RECONCILER_HEALTH_MAX_ATTEMPTS < 1) {
    throw new Error('RECONCILER_HEALTH_MAX_ATTEMPTS must be at least 1')
  }

  const stateDir = parsed.RECONCILER_STATE_DIR
  const serverAddress = parsed.RECONCILER_SERVER_ADDRESS

  return {
    nodeEnv: parsed.NODE_ENV,
    logging: {
      level: parsed.RECONCILER_LOG_LEVEL,
      redactExtraKeys: parsed.RECONCILER_LOG_REDACT_EXTRA_KEYS ?? []
    },
    paths: {
      xrayBinary: parsed.RECONCILER_XRAY_BIN,
      activeConfig: parsed.RECONCILER_CONFIG_PATH,
      stateDir,
      ledger: join(stateDir, 'revisions.json'),
      lock: join(stateDir, 'reconcile.lock'),
      credentialStore: parsed.RECONCILER_CREDENTIAL_STORE_PATH
    },
    service: {
      unit: parsed.RECONCILER_SERVICE_UNIT,
      systemctlBinary: parsed.RECONCILER_SYSTEMCTL_BIN,
      journalctlBinary: parsed.RECONCILER_JOURNALCTL_BIN,
      ssBinary: parsed.RECONCILER_SS_BIN
    },
    identity: {
      destination: parsed.RECONCILER_DESTINATION,
      serverNames: parsed.RECONCILER_SERVER_NAMES ?? [destinationHost(parsed.RECONCILER_DESTINATION)],
      listenProfiles: parseListenProfiles(parsed.RECONCILER_LISTEN_PROFILES_JSON),
      ...(serverAddress ? {serverAddress} : {}),
      wildcardShortId: parsed.RECONCILER_WILDCARD_SHORT_ID
    },
    commandTimeoutMs: parsed.RECONCILER_COMMAND_TIMEOUT_MS,
    health: {
      timeoutSeconds: parsed.RECONCILER_HEALTH_TIMEOUT_SECONDS,
      maxAttempts: parsed.RECONCILER_HEALTH_MAX_ATTEMPTS,
      backoffMs: parsed.RECONCILER_HEALTH_BACKOFF_MS
    },
    lockTimeoutMs: parsed.RECONCILER_LOCK_TIMEOUT_MS
  }
}
