/**
 * Turn a human-readable label into an internal property name:
 * drop everything but letters, digits, spaces and underscores, trim,
 * lowercase, then join words with underscores.
 *
 * normalize('Lead Source!! 2024') === 'lead_source_2024'
 */
export function normalize(originalName: string): string {
  return originalName
    .replace(/[^A-Za-z0-9 _]+/g, '')
    .trim()
    .toLowerCase()
    .replace(/ /g, '_');
}

/**
 * Option values keep punctuation; only case and spaces change.
 */
export function normalizeOptionValue(token: string): string {
  return token.toLowerCase().replace(/ /g, '_');
}
