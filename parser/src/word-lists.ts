import fs from "node:fs";
import path from "node:path";
import { getWordListDirectory } from "./config";
import { ParserConfigError } from "./exceptions";

/**
 * Load a word list: a text file of whitespace-separated words. Words are
 * upper-cased; duplicates are dropped but the file's order is kept.
 */
export function loadWordList(
  name: string,
  directory: string = getWordListDirectory()
): string[] {
  const filePath = path.join(directory, name);
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ParserConfigError(
      `Could not read word list "${filePath}": ${
        error instanceof Error ? error.message : error
      }`
    );
  }

  const words = [...new Set(text.toUpperCase().split(/\s+/).filter(Boolean))];
  if (!words.length) {
    throw new ParserConfigError(`Word list "${filePath}" has no words in it`);
  }
  return words;
}

export const STREET_SUFFIXES: readonly string[] = loadWordList(
  "street_suffixes.txt"
);

export const US_STATES: readonly string[] = loadWordList("us_states.txt");

export const UNIT_TYPES: readonly string[] = loadWordList("unit_types.txt");

export const DIRECTIONALS: readonly string[] = [
  "NE",
  "NW",
  "SE",
  "SW",
  "N",
  "S",
  "E",
  "W",
];
