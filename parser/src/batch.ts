import type { RawAddress } from "streetwise-common";
import { AddressParseError, EndOfInputError } from "./exceptions";
import { logger } from "./logger";
import { Parser } from "./parser";

export type BatchErrorReporter = (
  error: AddressParseError | EndOfInputError,
  address: string
) => void;

export interface BatchStats {
  /** Addresses parsed on the first try. */
  parsed: number;
  /** Addresses that failed at first, but parsed with the batch's cities. */
  repaired: number;
  /** Addresses that could not be parsed at all. */
  failed: number;
  /** Cities learned from the first pass. */
  cities: string[];
}

export interface BatchOptions {
  /**
   * Called for every address that can't be parsed, even with the cities
   * learned from the rest of the batch. By default, these are dropped.
   */
  reportError?: BatchErrorReporter;
  /** Called once the whole batch has been parsed. */
  onComplete?: (stats: BatchStats) => void;
}

function isParseFailure(
  error: unknown
): error is AddressParseError | EndOfInputError {
  return error instanceof AddressParseError || error instanceof EndOfInputError;
}

/**
 * Parse a batch of addresses, using the cities of addresses that parse cleanly
 * to repair the ones that don't.
 *
 * For example, "123 Main, Springfield OH 12123" has nothing to mark where the
 * street name ends and the city begins, so it can only be parsed if
 * "Springfield" is a known city. If another address in the batch, like
 * "50 Elm St Springfield OH 12123", parses cleanly, its city is learned and
 * used to parse the first one.
 *
 * Results are yielded as soon as they are available, so addresses that parse
 * on the first pass come out in order, followed by the repaired ones. Errors
 * other than parse errors (e.g. `ParserConfigError`) are never caught.
 */
export function* smartBatch(
  parser: Parser,
  addresses: Iterable<string>,
  { reportError = () => {}, onComplete }: BatchOptions = {}
): Generator<RawAddress, BatchStats, undefined> {
  const failures: string[] = [];
  const cities = new Set<string>();
  let parsed = 0;

  for (const address of addresses) {
    let result: RawAddress;
    try {
      result = parser.parse(address);
    } catch (error) {
      if (!isParseFailure(error)) throw error;
      failures.push(address);
      continue;
    }
    cities.add(result.city);
    parsed++;
    yield result;
  }
  logger.info(
    "Parsed %d addresses; retrying %d with %d known cities",
    parsed,
    failures.length,
    cities.size
  );

  let repaired = 0;
  let failed = 0;
  if (failures.length) {
    const repairParser = new Parser([...parser.knownCities, ...cities]);
    for (const address of failures) {
      let result: RawAddress;
      try {
        result = repairParser.parse(address);
      } catch (error) {
        if (!isParseFailure(error)) throw error;
        failed++;
        reportError(error, address);
        continue;
      }
      repaired++;
      yield result;
    }
    logger.info("Repaired %d of %d addresses", repaired, failures.length);
  }

  const stats = { parsed, repaired, failed, cities: [...cities] };
  onComplete?.(stats);
  return stats;
}
