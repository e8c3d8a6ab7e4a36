/** Words of two or more word characters */
const TOKEN_PATTERN = /\b\w\w+\b/g;

/**
 * Lowercase word tokens
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Space-joined n-grams for every n in [min, max]
 */
export function ngrams(tokens: readonly string[], [min, max]: [number, number]): string[] {
  const terms: string[] = [];
  for (let n = min; n <= max; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      terms.push(tokens.slice(i, i + n).join(" "));
    }
  }
  return terms;
}
