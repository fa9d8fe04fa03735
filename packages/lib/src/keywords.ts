/**
 * Keyword Matching
 *
 * Case-insensitive phrase matching used by the heuristic analyzers.
 * A phrase that starts or ends with a letter or digit only matches on an
 * alphanumeric boundary, so "this week" does not match "this weekend".
 *
 * @module keywords
 */

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): RegExp {
  const normalized = phrase.toLowerCase();
  const cached = patternCache.get(normalized);
  if (cached) return cached;

  const leading = /^[a-z0-9]/.test(normalized) ? '(?<![a-z0-9])' : '';
  const trailing = /[a-z0-9]$/.test(normalized) ? '(?![a-z0-9])' : '';
  const pattern = new RegExp(`${leading}${escapeRegExp(normalized)}${trailing}`, 'i');

  patternCache.set(normalized, pattern);
  return pattern;
}

/**
 * Whether `text` contains `phrase`
 */
export function containsPhrase(text: string, phrase: string): boolean {
  return phrasePattern(phrase).test(text);
}

/**
 * Phrases found in `text`, in the order of `phrases`
 */
export function matchKeywords(text: string, phrases: readonly string[]): string[] {
  return phrases.filter((phrase) => containsPhrase(text, phrase));
}

/**
 * Whether `text` contains any of `phrases`
 */
export function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => containsPhrase(text, phrase));
}
