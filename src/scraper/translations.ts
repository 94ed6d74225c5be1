/**
 * Missing Translations
 *
 * Some English course pages keep Italian names, and their section labels
 * need to become AsciiDoc headings.
 */

/** Replacements applied in order, every occurrence */
export const MISSING_TRANSLATIONS: ReadonlyArray<readonly [find: string, replace: string]> = [
  ['BASI DI DATI', 'DATABASES'],
  ["INTRODUZIONE ALL'APPRENDIMENTO AUTOMATICO", 'Introduction to machine learning'],
  ['FONDAMENTI DI', ''],
  ['Learning outcomes', '=== Learning outcomes'],
  ['Teaching contents', '=== Teaching contents']
]

/**
 * Render a teaching section for the year document.
 */
export function renderDescription(section: string): string {
  return MISSING_TRANSLATIONS.reduce(
    (doc, [find, replace]) => doc.replaceAll(find, replace),
    `\n${section}`
  )
}
