const MULTIPLE_SPACE_PATTERN = /[\n\s]+/g;
const APOSTROPHE_PATTERN = /['’‘`]+/g;
const PUNCTUATION_PATTERN = /[.,;:!?"“”()[\]{}\\|*_=+<>~^$%@]+/g;
// Dashes are only meaningful between digits (ZIP+4 codes, "12-14 Main St").
const DASH_PATTERN = /(?<!\d)[-–—]+|[-–—]+(?!\d)/g;

/**
 * Remove punctuation from a string. Apostrophes are dropped so that words like
 * "O'Neil" stay in one piece; other punctuation becomes a space. The characters
 * `#`, `/` and `&` are kept because they carry meaning in addresses
 * ("Apt #4", "123 1/2 Main St").
 */
export function removePunctuation(text: string): string {
  return text
    .replace(APOSTROPHE_PATTERN, "")
    .replace(PUNCTUATION_PATTERN, " ")
    .replace(DASH_PATTERN, " ");
}

/** Collapse all runs of whitespace to a single space and trim the ends. */
export function normalizeWhitespace(text: string): string {
  return text.replace(MULTIPLE_SPACE_PATTERN, " ").trim();
}

/**
 * Capitalize the first letter of each word and lower-case the rest, e.g.
 * "SPRINGFIELD" → "Springfield", "8TH" → "8th". Underscores are treated as
 * word separators and become spaces.
 */
export function titleize(text: string): string {
  return normalizeWhitespace(text.replace(/_/g, " "))
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
