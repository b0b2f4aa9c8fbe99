import { readFile } from 'node:fs/promises'
import { dirname, isAbsolute, resolve } from 'node:path'
import { parse as parseDotenv } from 'dotenv'
import merge from 'lodash/merge'
import set from 'lodash/set'
import { parse as parseYaml } from 'yaml'
import { ConfigurationError, ConfigurationErrorCode } from '@tablewise/core'
import { DEFAULT_CONFIG, validateConfig, type BookingConfig, type LlmProviderName } from './schema'

export const DEFAULT_CONFIG_FILE = 'tablewise.yaml'

export interface LoadConfigOptions {
  /** YAML config file. Without one, defaults and the environment apply. */
  path?: string
  /** Dotenv file; a missing file is skipped. */
  envFile?: string
  /** Environment to read. Defaults to process.env, which the dotenv file then fills in. */
  env?: NodeJS.ProcessEnv
  cwd?: string
}

const ENV_OVERRIDES: ReadonlyArray<readonly [string, string]> = [
  ['TABLEWISE_LLM_PROVIDER', 'llm.provider'],
  ['TABLEWISE_LLM_MODEL', 'llm.model'],
  ['TABLEWISE_DATA_DIR', 'storage.dataDir'],
  ['TABLEWISE_SEED_PATH', 'catalog.seedPath'],
  ['TABLEWISE_HOLD_TTL_SECONDS', 'holds.ttlSeconds'],
  ['TABLEWISE_SESSION_TIMEOUT_MINUTES', 'sessions.timeoutMinutes'],
  ['TABLEWISE_MAX_TOOL_STEPS', 'orchestrator.maxToolSteps'],
]

export const API_KEY_ENV: Record<LlmProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
}

/**
 * Resolves the booking configuration: YAML file, then `TABLEWISE_*`
 * variables, merged over the defaults and validated. The API key falls
 * back to the provider's usual variable.
 *
 * @throws ConfigurationError
 */
export async function loadBookingConfig(options: LoadConfigOptions = {}): Promise<BookingConfig> {
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ? { ...options.env } : process.env
  await loadEnvFile(resolve(cwd, options.envFile ?? '.env'), env)

  const filePath = options.path ? resolve(cwd, options.path) : undefined
  const fromFile = filePath ? await readConfigFile(filePath) : {}

  const fromEnv: Record<string, unknown> = {}
  for (const [name, path] of ENV_OVERRIDES) {
    const value = env[name]
    if (value !== undefined && value !== '') {
      set(fromEnv, path, value)
    }
  }

  const config = validateConfig(merge({}, DEFAULT_CONFIG, fromFile, fromEnv))

  if (filePath) {
    const base = dirname(filePath)
    const { dataDir } = config.storage
    const { seedPath } = config.catalog
    if (dataDir && !isAbsolute(dataDir) && !fromEnv.storage) {
      config.storage.dataDir = resolve(base, dataDir)
    }
    if (seedPath && !isAbsolute(seedPath) && !fromEnv.catalog) {
      config.catalog.seedPath = resolve(base, seedPath)
    }
  }

  const apiKey = config.llm.apiKey ?? env[API_KEY_ENV[config.llm.provider]]
  if (apiKey) {
    config.llm.apiKey = apiKey
  }
  return config
}

/** Fills in variables the environment does not already set. */
async function loadEnvFile(path: string, env: NodeJS.ProcessEnv): Promise<void> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      return
    }
    throw new ConfigurationError(`Failed to read env file: ${path}`, {
      code: ConfigurationErrorCode.CONFIG_ERROR,
      cause: error instanceof Error ? error : undefined,
      context: { path },
    })
  }

  for (const [key, value] of Object.entries(parseDotenv(content))) {
    if (env[key] === undefined) {
      env[key] = value
    }
  }
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    const message = isMissingFile(error) ? `Config file not found: ${path}` : `Failed to read config file: ${path}`
    throw new ConfigurationError(message, {
      code: ConfigurationErrorCode.CONFIG_ERROR,
      cause: error instanceof Error ? error : undefined,
      context: { path },
    })
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Failed to parse YAML: ${message}`, {
      code: ConfigurationErrorCode.INVALID_CONFIG,
      cause: error instanceof Error ? error : undefined,
      context: { path },
    })
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file must contain a mapping: ${path}`, {
      code: ConfigurationErrorCode.INVALID_CONFIG,
      context: { path },
    })
  }
  return parsed
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
