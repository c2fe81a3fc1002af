import {
  AddressField,
  createRawAddress,
  HARD_COMPONENTS,
  mapFields,
  normalizeWhitespace,
  RawAddress,
  removePunctuation,
} from "streetwise-common";
import {
  COUNTRY,
  COUNTRY_PATTERN,
  DEFAULT_UNIT_TYPE,
  hasUnitType,
  HOUSE_NUMBER,
  HOUSE_NUMBER_FRACTION,
  makeCity,
  makeStreetName,
  ParseStep,
  ST_NESW,
  ST_SUFFIX,
  unitRule,
  US_STATE,
  ZIP_CODE,
  ZIP_CODE_PATTERN,
  AddressRule,
} from "./components";
import {
  AddressParseError,
  EndOfAddressError,
  EndOfInputError,
  FieldNotIdentifiedError,
  GrammarMismatchError,
  ParserConfigError,
} from "./exceptions";
import { logger } from "./logger";
import { alternation, fullMatch, WORD_CHARACTER } from "./patterns";
import { TokenView } from "./tokens";
import { pipeline, skip, Step, Steps, Zipper } from "./zipper";

type AddressStep = Step<string, ParseStep>;

export type FieldBuckets = Record<AddressField, string[]>;

export interface ParseOptions {
  /**
   * Require house_number, st_name, city, and us_state to all be present.
   * Defaults to true.
   */
  checked?: boolean;
}

// Most steps are optional, so a component that doesn't match just means the
// step is skipped. The city and state steps don't use this, so mismatches there
// fail the whole parse.
const SKIP_MISMATCH = { ignore: [GrammarMismatchError] };

const UNIT_MARKER_PATTERN = /#/g;
const REPEATED_UNIT_MARKER_PATTERN = new RegExp(
  `\\b${DEFAULT_UNIT_TYPE}(?:\\s+${DEFAULT_UNIT_TYPE}\\b)+`,
  "g"
);

/**
 * Collect parse steps into lists of values for each field. `junk` steps are
 * dropped.
 */
export function collectFields(steps: Iterable<ParseStep>): FieldBuckets {
  const fields = mapFields<string[]>(() => []);

  for (const step of steps) {
    if (step.label !== "junk") fields[step.label].push(step.value);
  }
  return fields;
}

/**
 * A callable address parser.
 *
 * Parser does not correct typos or infer missing street suffixes or
 * directionals. If an address's city is not one of `knownCities`, there needs
 * to be something between the street name and the city (a suffix, a
 * directional, or a unit) to tell where one ends and the other begins.
 *
 * @example
 * const parser = new Parser(["Houston", "Dallas"]);
 *
 * // These parse:
 * parser.parse("123 Straight Houston TX"); // no suffix, but a known city
 * parser.parse("123 8th Ave NE Ste A Dallas TX"); // a normal address
 * parser.parse("123 Dallas Rd Houston TX"); // "Rd" separates street and city
 *
 * // These don't:
 * parser.parse("123 Straight Houuston TX"); // typo
 * parser.parse("123 Straight Austin TX"); // unknown city, no suffix
 * parser.parse("123 Dallas Houston TX"); // the street looks like a city
 */
export class Parser {
  readonly knownCities: readonly string[];

  // Matches a known city's normalized words, separated by spaces or
  // underscores. Null if there are no known cities.
  private readonly knownCitiesSource: string | null;
  private readonly knownCitiesSearch: RegExp | null;
  private readonly streetName: AddressRule;
  private readonly city: AddressRule;
  // A parser with no known cities, tried before this one. Addresses with a
  // clear street/city boundary parse fine without city knowledge, and knowing
  // cities can get in the way (e.g. a street named after a city).
  private readonly blank: Parser | null;

  constructor(knownCities: Iterable<string> = []) {
    const cities = [...knownCities].filter((city) => city.trim());
    const normalized = [...new Set(cities.map(normalizeCityName))];

    this.knownCities = cities;
    this.blank = cities.length ? new Parser() : null;

    if (normalized.length) {
      this.knownCitiesSource = alternation(normalized).replace(
        / /g,
        "[\\s_]"
      );
      const word = WORD_CHARACTER;
      this.knownCitiesSearch = new RegExp(
        `(?<!${word})(?:${this.knownCitiesSource})(?!${word})`,
        "gu"
      );
    } else {
      this.knownCitiesSource = null;
      this.knownCitiesSearch = null;
    }

    this.streetName = makeStreetName(this.knownCitiesSource);
    this.city = makeCity(this.knownCitiesSource);
  }

  /**
   * Clean up address text so it can be split into tokens: upper-case it,
   * remove punctuation, turn "#" into a unit type, collapse whitespace, and
   * join the words of known cities with underscores so each is one token.
   */
  normalize(text: string): string {
    let result = normalizeAddressText(text);
    if (this.knownCitiesSearch) {
      result = normalizeWhitespace(
        result.replace(
          this.knownCitiesSearch,
          (city) => ` ${city.trim().replace(/\s+/g, "_")} `
        )
      );
    }
    return result;
  }

  /**
   * Parse an address string. Throws an `AddressParseError` if the address
   * can't be parsed.
   */
  parse(text: string, { checked = true }: ParseOptions = {}): RawAddress {
    if (this.blank) {
      try {
        return this.blank.parse(text, { checked });
      } catch (error) {
        if (!(error instanceof AddressParseError)) throw error;
        logger.debug(
          "Parsing %j with known cities (%s)",
          text,
          error.message
        );
      }
    }

    const tokens = TokenView.fromString(this.normalize(text));
    const results = this.run(text, tokens, this.grammar(tokens.items));
    return this.collect(text, results, checked);
  }

  /**
   * Parse a row of cells from a table, e.g. `["123 Main St", "Springfield",
   * "OH", "12123"]`. Fields never span two cells, and required fields are not
   * checked.
   */
  parseRow(cells: Iterable<string>): RawAddress {
    const row = [...cells];
    const tokens = TokenView.fromCells(
      row.map((cell) => this.normalize(cell).split(" ").filter(Boolean))
    );
    const orig = row.join("\t");
    const results = this.run(orig, tokens, this.grammar(tokens.items));
    return this.collect(orig, results, false);
  }

  /** Build the full grammar, tailored to the tokens that will be parsed. */
  private grammar(tokens: readonly string[]): AddressStep {
    let last = tokens.length - 1;
    const hasCountry = last > 0 && fullMatch(tokens[last], COUNTRY_PATTERN);
    if (hasCountry) last--;
    const hasZipCode = last >= 0 && fullMatch(tokens[last], ZIP_CODE_PATTERN);

    return pipeline([
      Steps.consumeWith(HOUSE_NUMBER, SKIP_MISMATCH),
      Steps.consumeWith(HOUSE_NUMBER_FRACTION, SKIP_MISMATCH),
      Steps.consumeWith(ST_NESW, SKIP_MISMATCH),
      Steps.takeWhile(this.streetName, SKIP_MISMATCH),
      Steps.takeWhile(ST_SUFFIX, SKIP_MISMATCH),
      Steps.consumeWith(ST_NESW, SKIP_MISMATCH),
      hasUnitType(tokens)
        ? Steps.consumeN(2, unitRule, SKIP_MISMATCH)
        : skip,
      Steps.takeWhile(this.city),
      Steps.consumeWith(US_STATE),
      hasZipCode ? Steps.consumeWith(ZIP_CODE, SKIP_MISMATCH) : skip,
      hasCountry ? Steps.consumeWith(COUNTRY, SKIP_MISMATCH) : skip,
    ]);
  }

  private run(
    orig: string,
    tokens: TokenView<string>,
    grammar: AddressStep
  ): ParseStep[] {
    try {
      return grammar(new Zipper(tokens)).toArray();
    } catch (error) {
      if (error instanceof EndOfInputError) {
        throw new EndOfAddressError(orig);
      } else if (error instanceof GrammarMismatchError) {
        throw error.withInput(orig);
      }
      throw error;
    }
  }

  private collect(
    orig: string,
    results: Iterable<ParseStep>,
    checked: boolean
  ): RawAddress {
    const fields = collectFields(results);

    if (checked) {
      for (const field of HARD_COMPONENTS) {
        if (!fields[field].length) {
          throw new FieldNotIdentifiedError(orig, field);
        }
      }
    }

    fields.unit = fields.unit.map((unit) =>
      unit.replace(UNIT_MARKER_PATTERN, "")
    );
    return createRawAddress(
      mapFields((field) => fields[field].join(" ")),
      orig
    );
  }
}

/**
 * The city-independent part of `Parser.normalize()`. Running it more than once
 * gives the same result as running it once.
 */
export function normalizeAddressText(text: string): string {
  const result = removePunctuation(text.toUpperCase()).replace(
    UNIT_MARKER_PATTERN,
    ` ${DEFAULT_UNIT_TYPE} `
  );
  return normalizeWhitespace(result).replace(
    REPEATED_UNIT_MARKER_PATTERN,
    DEFAULT_UNIT_TYPE
  );
}

function normalizeCityName(city: string): string {
  const normalized = normalizeAddressText(city);
  if (!normalized) {
    throw new ParserConfigError(
      `Known city "${city}" is empty after removing punctuation`
    );
  }
  if (/^\d+$/.test(normalized)) {
    throw new ParserConfigError(`Known city "${city}" is only a number`);
  }
  return normalized;
}
