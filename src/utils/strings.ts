/**
 * String utilities for the intake engine
 */

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number, suffix: string = "..."): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Pluralize a word based on count
 */
export function pluralize(word: string, count: number, plural?: string): string {
  if (count === 1) return word;
  return plural ?? `${word}s`;
}

/**
 * Escape characters with special meaning in a regular expression
 */
export function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Check whether a phrase appears in text on word boundaries (case-insensitive)
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const pattern = new RegExp(`(?:^|[^\\w'])${escapeRegExp(phrase)}(?:$|[^\\w'])`, "i");
  return pattern.test(text);
}

/**
 * Return the items of a list that appear as substrings of text, in list order
 */
export function findSubstrings(text: string, candidates: readonly string[]): string[] {
  return candidates.filter((candidate) => text.includes(candidate));
}
