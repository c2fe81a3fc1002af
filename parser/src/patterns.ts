const SPECIAL_CHARACTERS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegExp(text: string): string {
  return text.replace(SPECIAL_CHARACTERS, "\\$&");
}

// A pattern that can never match anything.
const NOTHING = "(?!)";

/**
 * Regular expression source matching any one of `words` literally. Longer
 * words come first so that, when searching through text, "NEW YORK CITY" is
 * found before "NEW YORK".
 */
export function alternation(words: readonly string[]): string {
  if (!words.length) return NOTHING;
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
}

/**
 * One letter (with any combining marks), digit or underscore. Unlike `\w`,
 * this includes letters outside ASCII, as in "PEÑA". Needs the `u` flag.
 */
export const WORD_CHARACTER = String.raw`[\p{L}\p{M}\p{N}_]`;

/** Compile a pattern that only matches a whole token. */
export function fullPattern(source: string, flags = ""): RegExp {
  return new RegExp(`^(?:${source})$`, flags);
}

/** The text of `token` if the whole of it matches `pattern`, otherwise null. */
export function fullMatch(token: string, pattern: RegExp): string | null {
  const result = pattern.exec(token);
  return result && result[0] === token ? result[0] : null;
}

/**
 * Make a predicate that is true for tokens that fully match any of the given
 * patterns.
 */
export function stopsOn(patterns: readonly RegExp[]): (token: string) => boolean {
  return (token) => patterns.some((pattern) => fullMatch(token, pattern) != null);
}
