/**
 * Split a text document into lines, dropping blank lines and surrounding
 * whitespace. Handles both Unix and Windows line endings.
 */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Split a delimited row (tab-delimited by default) into cells. Cells are
 * trimmed, and empty cells are kept so column positions line up.
 */
export function splitCells(line: string, delimiter = "\t"): string[] {
  return line.split(delimiter).map((cell) => cell.trim());
}
