import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { z } from 'zod'
import { UpstreamUnavailableError } from '../errors'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Reads and validates a JSON document. A missing file yields `fallback`.
 * @throws UpstreamUnavailableError on I/O failure or an unreadable document
 */
export async function readJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): Promise<T> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      return fallback
    }
    throw UpstreamUnavailableError.wrap(error, { path })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw UpstreamUnavailableError.wrap(error, { path })
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    throw new UpstreamUnavailableError(`Corrupt data file ${path}`, {
      cause: result.error,
      context: { path },
    })
  }
  return result.data
}

/**
 * Writes to a sibling temp file of its own, then renames over the target,
 * so readers never observe a half-written document.
 */
export async function writeJsonFileAtomic(path: string, data: unknown): Promise<void> {
  const temp = `${path}.${randomUUID()}.tmp`
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(temp, `${JSON.stringify(data, null, 2)}\n`, 'utf-8')
    await rename(temp, path)
  } catch (error) {
    throw UpstreamUnavailableError.wrap(error, { path })
  }
}
