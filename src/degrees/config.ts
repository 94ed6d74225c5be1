/**
 * Degrees Config
 *
 * Reads the list of degrees to scrape from a local JSON file.
 */

import { readFile } from 'node:fs/promises'
import { errorMessage, fail, ok, type DegreeEntry, type Result } from '../types'

/** Relative path at which the degrees list is kept */
export const DEFAULT_DEGREES_PATH = 'config/degrees.json'

function missingField(index: number, field: keyof DegreeEntry): Result<never> {
  return fail({ type: 'config', message: `Degree #${index} has no string "${field}"` })
}

/**
 * Validate one element of the degrees list.
 * Extra fields are ignored.
 */
function parseEntry(value: unknown, index: number): Result<DegreeEntry> {
  if (value === null || typeof value !== 'object') {
    return fail({ type: 'config', message: `Degree #${index} is not an object` })
  }
  const { id, name, code }: Record<string, unknown> = { ...value }
  if (typeof id !== 'string') return missingField(index, 'id')
  if (typeof name !== 'string') return missingField(index, 'name')
  if (typeof code !== 'string') return missingField(index, 'code')
  return ok({ id, name, code })
}

/**
 * Parse the contents of a degrees file.
 * Fails as a whole if any element is malformed.
 */
export function parseDegreeEntries(json: string): Result<DegreeEntry[]> {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (error) {
    return fail({ type: 'config', message: `Invalid degrees JSON: ${errorMessage(error)}` })
  }

  if (!Array.isArray(parsed)) {
    return fail({ type: 'config', message: 'Degrees file must contain a JSON array' })
  }

  const entries: DegreeEntry[] = []
  for (const [index, value] of parsed.entries()) {
    const entry = parseEntry(value, index)
    if (!entry.ok) return entry
    entries.push(entry.value)
  }
  return ok(entries)
}

/**
 * Read and parse the degrees file at `path`.
 */
export async function loadDegreeEntries(
  path: string = DEFAULT_DEGREES_PATH
): Promise<Result<DegreeEntry[]>> {
  let json: string
  try {
    json = await readFile(path, 'utf-8')
  } catch (error) {
    return fail({ type: 'config', message: `Cannot read ${path}: ${errorMessage(error)}` })
  }
  return parseDegreeEntries(json)
}
