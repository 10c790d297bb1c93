/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/camera-locator/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or CAMERA_LOCATOR_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { formatDate } from '../export/index'
import { DEFAULT_NOMINATIM_URL } from '../geocoder/index'
import { isRecord } from '../http'
import { DEFAULT_LOCALE } from '../locale/index'
import { VERSION } from '../index'
import { DEFAULT_MIN_INTERVAL_MS } from '../rate-limiter/index'

/** Config keys that accept string values */
const STRING_KEYS = [
  'nominatimUrl',
  'userAgent',
  'country',
  'googleSearchApiKey',
  'googleSearchCx',
  'batchTag',
  'cameraType'
] as const
/** Config keys that accept number values */
const NUMBER_KEYS = ['requestIntervalMs', 'requestTimeoutMs'] as const

type StringConfigKey = (typeof STRING_KEYS)[number]
type NumberConfigKey = (typeof NUMBER_KEYS)[number]

/** Valid config keys for type-safe access */
export type ConfigKey = StringConfigKey | NumberConfigKey

/**
 * All persistable CLI settings.
 */
export type Config = { [K in StringConfigKey]?: string | undefined } & {
  [K in NumberConfigKey]?: number | undefined
} & {
  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  nominatimUrl: `Geocoding service base URL (default: ${DEFAULT_NOMINATIM_URL})`,
  userAgent: 'User-Agent sent to the geocoder (default: camera-locator/<version>)',
  country: 'Country name or code restricting forward geocoding (default: US)',
  googleSearchApiKey: 'Google Programmable Search API key (enables the web search fallback)',
  googleSearchCx: 'Google Programmable Search engine id (enables the web search fallback)',
  batchTag: 'reported_by value for reverse imports (default: reverse_import_<date>)',
  cameraType: 'camera_type value for reverse imports (default: nopd)',
  requestIntervalMs: `Minimum ms between calls to one service (default and floor: ${DEFAULT_MIN_INTERVAL_MS})`,
  requestTimeoutMs: 'Per-request timeout in ms (default: 10000)'
}

function isStringKey(key: string): key is StringConfigKey {
  return STRING_KEYS.some((k) => k === key)
}

function isNumberKey(key: string): key is NumberConfigKey {
  return NUMBER_KEYS.some((k) => k === key)
}

/**
 * Get the type of a config key, for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  return isNumberKey(key) ? 'number' : 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isNumberKey(key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/**
 * Get XDG config directory path for camera-locator.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'camera-locator')
}

/**
 * Get the config file path.
 * Priority: configFile arg > CAMERA_LOCATOR_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.CAMERA_LOCATOR_CONFIG) {
    return process.env.CAMERA_LOCATOR_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep only known keys holding values of the right type.
 */
export function sanitizeConfig(raw: unknown): Config {
  const config: Config = {}
  if (!isRecord(raw)) {
    return config
  }
  for (const key of STRING_KEYS) {
    const value = raw[key]
    if (typeof value === 'string') config[key] = value
  }
  for (const key of NUMBER_KEYS) {
    const value = raw[key]
    if (typeof value === 'number' && Number.isFinite(value)) config[key] = value
  }
  if (typeof raw.updatedAt === 'string') {
    config.updatedAt = raw.updatedAt
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return sanitizeConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/** Smallest accepted value per number key */
const NUMBER_MINIMUMS: Record<NumberConfigKey, number> = {
  requestIntervalMs: DEFAULT_MIN_INTERVAL_MS,
  requestTimeoutMs: 1
}

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws Error when a number key gets a non-numeric value or one below its minimum
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  if (isNumberKey(key)) {
    const parsed = Number.parseInt(value, 10)
    if (Number.isNaN(parsed) || parsed < 0) {
      throw new Error(`${key} expects a non-negative number, got "${value}"`)
    }
    if (parsed < NUMBER_MINIMUMS[key]) {
      throw new Error(`${key} must be at least ${NUMBER_MINIMUMS[key]}, got "${value}"`)
    }
    return parsed
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Set a single config value (parsed for its key) and save.
 *
 * @returns the stored value
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string,
  configFile?: string
): Promise<string | number> {
  const config = (await loadConfig(configFile)) ?? {}
  const parsed = parseConfigValue(key, value)
  if (isNumberKey(key) && typeof parsed === 'number') {
    config[key] = parsed
  } else if (isStringKey(key) && typeof parsed === 'string') {
    config[key] = parsed
  }
  await saveConfig(config, configFile)
  return parsed
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Settings a batch command runs with, after defaults.
 */
export interface Settings {
  readonly nominatimUrl: string
  readonly userAgent: string
  readonly country: string
  readonly googleSearchApiKey: string | undefined
  readonly googleSearchCx: string | undefined
  readonly requestIntervalMs: number
  readonly requestTimeoutMs: number
  readonly batchTag: string
  readonly cameraType: string
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000
export const DEFAULT_CAMERA_TYPE = 'nopd'

/**
 * Default reported_by tag for a reverse import run on the given day.
 */
export function defaultBatchTag(now: Date = new Date()): string {
  return `reverse_import_${formatDate(now)}`
}

/**
 * Values given on the command line.
 */
export interface SettingsOverrides {
  readonly batchTag?: string | undefined
  readonly cameraType?: string | undefined
}

/**
 * Merge sources. Priority: CLI overrides > environment > config file > defaults.
 */
export function resolveSettings(
  config: Config | null,
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {}
): Settings {
  const file = config ?? {}
  return {
    nominatimUrl: (env.NOMINATIM_URL || file.nominatimUrl || DEFAULT_NOMINATIM_URL).replace(
      /\/+$/,
      ''
    ),
    userAgent: env.CAMERA_LOCATOR_USER_AGENT || file.userAgent || `camera-locator/${VERSION}`,
    country: file.country || DEFAULT_LOCALE.country,
    googleSearchApiKey: env.GOOGLE_SEARCH_API_KEY || file.googleSearchApiKey || undefined,
    googleSearchCx: env.GOOGLE_SEARCH_CX || file.googleSearchCx || undefined,
    // Hand-edited files can hold values `config set` refuses
    requestIntervalMs: Math.max(
      DEFAULT_MIN_INTERVAL_MS,
      file.requestIntervalMs ?? DEFAULT_MIN_INTERVAL_MS
    ),
    requestTimeoutMs:
      file.requestTimeoutMs !== undefined && file.requestTimeoutMs >= NUMBER_MINIMUMS.requestTimeoutMs
        ? file.requestTimeoutMs
        : DEFAULT_REQUEST_TIMEOUT_MS,
    batchTag: overrides.batchTag || file.batchTag || defaultBatchTag(),
    cameraType: overrides.cameraType || file.cameraType || DEFAULT_CAMERA_TYPE
  }
}
