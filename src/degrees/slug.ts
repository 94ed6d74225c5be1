/**
 * Degree Slugs
 *
 * Infers the level and slug the university website uses for a degree.
 */

import type { DegreeLevel } from '../types'

/** Connectives and level words that don't appear in website slugs */
const SLUG_NOISE = /( (e|per il|in) )|Magistrale|Master/g

/** Degree codes whose slug doesn't follow the lowercase-no-spaces rule */
const PASCAL_CASE_CODES = new Set(['9254/000'])
const KEBAB_CASE_CODES = new Set(['9063/000'])

/**
 * Infer the degree level from its human-readable name.
 */
export function nameToLevel(name: string): DegreeLevel {
  return name.includes('Magistrale') || name.includes('Master') ? 'magistrale' : 'laurea'
}

/**
 * Infer the website slug for a degree.
 */
export function nameAndCodeToSlug(name: string, code: string): string {
  const stripped = name.replace(SLUG_NOISE, '').trim()
  const cased = PASCAL_CASE_CODES.has(code) ? stripped : stripped.toLowerCase()
  return cased.replaceAll(' ', KEBAB_CASE_CODES.has(code) ? '-' : '')
}
