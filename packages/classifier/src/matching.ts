/**
 * Term matching on word boundaries, case-insensitive
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a pattern matching the term as a whole word or phrase.
 * With `plurals`, a trailing "s" or "es" is accepted too.
 */
export function termPattern(term: string, plurals = false): RegExp {
  const body = escapeRegExp(term.trim().toLowerCase()).replace(/\s+/g, '\\s+');
  const suffix = plurals ? '(?:e?s)?' : '';
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}${suffix}(?![\\p{L}\\p{N}])`, 'iu');
}

/**
 * Position of the first match of the term in the text, or -1
 */
export function findTerm(text: string, pattern: RegExp): number {
  const match = pattern.exec(text);
  return match ? match.index : -1;
}
