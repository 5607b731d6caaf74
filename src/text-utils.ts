/**
 * Small string helpers shared by the normalizer and the phrase locator
 */

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Whitespace runs in a needle match any whitespace run in the haystack
export function whitespaceTolerantPattern(phrase: string): string {
  return phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
}
