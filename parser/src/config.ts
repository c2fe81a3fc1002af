import fs from "node:fs";
import path from "node:path";

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";

const DEFAULT_WORD_LIST_DIRECTORY = path.resolve(__dirname, "../data");

/**
 * Whether log lines should start with a timestamp. Some environments already
 * add a timestamp to each line of output, so this can be turned off by setting
 * LOG_TIMESTAMPS to "false" or "0".
 */
export function shouldLogTimestamps(): boolean {
  const value = (process.env.LOG_TIMESTAMPS || "").trim().toLowerCase();
  return !(value === "false" || value === "0");
}

/**
 * Get the directory that street suffix, US state, and unit type word lists are
 * loaded from. Defaults to the `data` directory that ships with this package,
 * but can be overridden with the ADDRESS_WORD_LISTS environment variable.
 */
export function getWordListDirectory(): string {
  const directory = process.env.ADDRESS_WORD_LISTS;
  if (!directory) return DEFAULT_WORD_LIST_DIRECTORY;

  const resolved = path.resolve(directory);
  if (!fs.statSync(resolved, { throwIfNoEntry: false })?.isDirectory()) {
    throw new TypeError(
      `The ADDRESS_WORD_LISTS environment variable ("${directory}") is not a directory`
    );
  }
  return resolved;
}
