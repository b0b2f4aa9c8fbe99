import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { parse as parseYaml } from 'yaml'
import { ConfigurationError, ConfigurationErrorCode } from '@tablewise/core'
import { catalogSeedSchema, formatIssues, type Restaurant } from './schema'

export const DEFAULT_SEED_PATH = fileURLToPath(new URL('../../data/restaurants.json', import.meta.url))

/**
 * Reads and validates a catalog seed file (JSON, or YAML by extension).
 */
export async function loadCatalogSeed(path: string = DEFAULT_SEED_PATH): Promise<Restaurant[]> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw ConfigurationError.from(error, ConfigurationErrorCode.CONFIG_ERROR, { path })
  }

  let parsed: unknown
  try {
    parsed = /\.ya?ml$/i.test(path) ? parseYaml(content) : JSON.parse(content)
  } catch (error) {
    throw ConfigurationError.from(error, ConfigurationErrorCode.INVALID_CONFIG, { path })
  }

  const result = catalogSeedSchema.safeParse(parsed)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid catalog seed ${path}:\n  - ${formatIssues(result.error).join('\n  - ')}`,
      { code: ConfigurationErrorCode.INVALID_CONFIG, context: { path } }
    )
  }
  return result.data.restaurants
}
