#!/usr/bin/env node
/**
 * Parse US addresses, one per line, into their component fields.
 * See CLI help at bottom for complete description and options.
 */

import fs from "node:fs/promises";
import { text as readStream } from "node:stream/consumers";
import yargs from "yargs";
import {
  formatAddress,
  RawAddress,
  splitCells,
  splitLines,
} from "streetwise-common";
import { smartBatch } from "../src/batch";
import { AddressParseError, ParserConfigError } from "../src/exceptions";
import { logger, logStackTrace } from "../src/logger";
import { Parser } from "../src/parser";
import { validateKnownCities } from "../src/validation";

export type OutputFormat = "json" | "text";

export interface ParseAddressesOptions {
  file?: string;
  city?: string[];
  citiesFile?: string;
  rows?: boolean;
  format?: OutputFormat;
}

/** Load a JSON file containing an array of city names. */
export async function loadKnownCities(filePath: string): Promise<string[]> {
  const text = await fs.readFile(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ParserConfigError(
      `Known cities file "${filePath}" is not valid JSON: ${
        error instanceof Error ? error.message : error
      }`
    );
  }
  return validateKnownCities(data, filePath);
}

export function formatResult(address: RawAddress, format: OutputFormat): string {
  return format === "text" ? formatAddress(address) : JSON.stringify(address);
}

function warnUnparseable(error: Error, address: string): void {
  logger.warn("Could not parse %j: %s", address, error.message);
}

/**
 * Parse lines of input. Plain lines are parsed as a batch, so that cities from
 * some lines help parse others. In `rows` mode, each line is a tab-delimited
 * row of cells that is parsed on its own.
 */
export function* parseAddressLines(
  lines: readonly string[],
  parser: Parser,
  { rows = false }: Pick<ParseAddressesOptions, "rows"> = {}
): Generator<RawAddress, void, undefined> {
  if (!rows) {
    yield* smartBatch(parser, lines, { reportError: warnUnparseable });
    return;
  }

  for (const line of lines) {
    let result: RawAddress;
    try {
      result = parser.parseRow(splitCells(line));
    } catch (error) {
      if (!(error instanceof AddressParseError)) throw error;
      warnUnparseable(error, line);
      continue;
    }
    yield result;
  }
}

export async function main({
  file,
  city = [],
  citiesFile,
  rows = false,
  format = "json",
}: ParseAddressesOptions): Promise<void> {
  const input = file
    ? await fs.readFile(file, "utf8")
    : await readStream(process.stdin);

  const knownCities = [...city];
  if (citiesFile) {
    knownCities.push(...(await loadKnownCities(citiesFile)));
  }

  const parser = new Parser(knownCities);
  for (const address of parseAddressLines(splitLines(input), parser, { rows })) {
    process.stdout.write(`${formatResult(address, format)}\n`);
  }
}

if (require.main === module) {
  yargs
    .scriptName("parse-addresses")
    .command({
      command: "$0 [file]",
      describe: `
        Parse US postal addresses into house number, street name, street
        suffix, directional, unit, city, state, and ZIP code.

        Reads one address per line from a file, or from standard input if no
        file is given, and writes one parsed address per line to standard
        output. Addresses that can't be parsed are logged as warnings.

        Addresses that don't clearly separate the street from the city (e.g.
        "123 Main Springfield OH") are retried using the cities of the other
        addresses in the input.
      `.trim(),
      builder: (yargs) =>
        yargs
          .positional("file", {
            type: "string",
            describe: "Text file with one address per line.",
          })
          .option("city", {
            type: "string",
            array: true,
            describe: `
              A city name to recognize even when nothing separates it from the
              street name. Repeat this option to list more than one, e.g.
              "--city Houston --city 'San Antonio'".
            `.trim(),
          })
          .option("cities-file", {
            type: "string",
            describe: "JSON file with an array of city names to recognize.",
          })
          .option("rows", {
            type: "boolean",
            describe: `
              Treat each line as a tab-delimited row of cells (e.g. street,
              city, state, ZIP) instead of a single address string.
            `.trim(),
          })
          .option("format", {
            choices: ["json", "text"] as const,
            default: "json" as const,
            describe: `
              Output format. "json" writes each address as a JSON object;
              "text" writes a formatted, single-line address.
            `.trim(),
          }),
      handler: (args) => main(args),
    })
    .help()
    .parseAsync()
    .catch((error: unknown) => {
      logStackTrace(logger, error);
      process.exitCode = 1;
    });
}
