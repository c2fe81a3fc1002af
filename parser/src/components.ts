import type { AddressField } from "streetwise-common";
import { GrammarMismatchError } from "./exceptions";
import {
  alternation,
  fullMatch,
  fullPattern,
  stopsOn,
  WORD_CHARACTER,
} from "./patterns";
import {
  DIRECTIONALS,
  STREET_SUFFIXES,
  UNIT_TYPES,
  US_STATES,
} from "./word-lists";
import { match, NO_MATCH, Rule, RuleResult } from "./zipper";

/** `junk` steps consume input but are dropped from the parsed address. */
export type StepLabel = AddressField | "junk";

/** One recognized piece of an address. */
export interface ParseStep {
  label: StepLabel;
  value: string;
}

export type AddressRule = Rule<string, ParseStep>;

export interface AddressComponentConfig {
  label: StepLabel;
  /** Must match an entire token. Use `fullPattern()` to build it. */
  pattern: RegExp;
  /** When true, a token that doesn't match is skipped instead of an error. */
  optional?: boolean;
  /**
   * Tokens this component should never match, even if `pattern` would match
   * them. This keeps greedy components like the street name from swallowing
   * tokens that belong to a later part of the address.
   */
  stopsOn?: (token: string) => boolean;
}

/** A labeled, single-token piece of the address grammar. */
export class AddressComponent {
  readonly label: StepLabel;
  readonly pattern: RegExp;
  readonly optional: boolean;
  readonly stopsOn: (token: string) => boolean;

  constructor({
    label,
    pattern,
    optional = false,
    stopsOn = () => false,
  }: AddressComponentConfig) {
    this.label = label;
    this.pattern = pattern;
    this.optional = optional;
    this.stopsOn = stopsOn;
  }

  /**
   * Parse a single token. A token the component stops on is never a match.
   * A token that doesn't match is `NO_MATCH` for optional components and a
   * `GrammarMismatchError` for required ones.
   */
  parse(token: string): RuleResult<ParseStep> {
    if (this.stopsOn(token)) return NO_MATCH;

    const value = fullMatch(token, this.pattern);
    if (value == null) {
      if (this.optional) return NO_MATCH;
      throw new GrammarMismatchError(this.label, token);
    }
    return match({ label: this.label, value });
  }

  toRule(): AddressRule {
    return (token) => this.parse(token);
  }
}

export const STREET_SUFFIX_PATTERN = fullPattern(alternation(STREET_SUFFIXES));
export const DIRECTIONAL_PATTERN = fullPattern(alternation(DIRECTIONALS));
export const US_STATE_PATTERN = fullPattern(alternation(US_STATES));
export const UNIT_TYPE_PATTERN = fullPattern(alternation(UNIT_TYPES));
export const UNIT_IDENTIFIER_PATTERN = fullPattern(String.raw`#?(\d+[A-Z]?|[A-Z]\d*)`);
export const ZIP_CODE_PATTERN = fullPattern(String.raw`\d{5}(-\d{4})?`);
export const COUNTRY_PATTERN = fullPattern("USA|US");
const NUMBER_PATTERN = fullPattern(String.raw`\d+`);

/** The unit type used for a bare "#", as in "Main St # 4". */
export const DEFAULT_UNIT_TYPE = "APT";

export const HOUSE_NUMBER = new AddressComponent({
  label: "house_number",
  // "12-14 Main St" covers a range of house numbers.
  pattern: fullPattern(String.raw`[\d/]+(-[\d/]+)*`),
}).toRule();

// The "1/2" in "123 1/2 Main St".
export const HOUSE_NUMBER_FRACTION = new AddressComponent({
  label: "house_number",
  pattern: fullPattern(String.raw`\d+/\d+`),
  optional: true,
}).toRule();

export const ST_NESW = new AddressComponent({
  label: "st_NESW",
  pattern: DIRECTIONAL_PATTERN,
}).toRule();

export const ST_SUFFIX = new AddressComponent({
  label: "st_suffix",
  pattern: STREET_SUFFIX_PATTERN,
}).toRule();

export const US_STATE = new AddressComponent({
  label: "us_state",
  pattern: US_STATE_PATTERN,
}).toRule();

export const ZIP_CODE = new AddressComponent({
  label: "zip_code",
  pattern: ZIP_CODE_PATTERN,
}).toRule();

export const COUNTRY = new AddressComponent({
  label: "junk",
  pattern: COUNTRY_PATTERN,
  optional: true,
}).toRule();

/**
 * Street name words. Stops at anything that could start the next part of the
 * address: a suffix, a directional, a unit, or (if given) a known city.
 */
export function makeStreetName(knownCities: string | null = null): AddressRule {
  const stops = [STREET_SUFFIX_PATTERN, DIRECTIONAL_PATTERN, UNIT_TYPE_PATTERN];
  if (knownCities) stops.push(fullPattern(knownCities, "u"));

  return new AddressComponent({
    label: "st_name",
    pattern: fullPattern(`${WORD_CHARACTER}+`, "u"),
    stopsOn: stopsOn(stops),
  }).toRule();
}

/**
 * City words. Known cities are single tokens with underscores for spaces
 * (see `Parser.normalize`); they're turned back into spaces here.
 */
export function makeCity(knownCities: string | null = null): AddressRule {
  const sources = [`${WORD_CHARACTER}+`];
  if (knownCities) sources.unshift(knownCities);

  const component = new AddressComponent({
    label: "city",
    pattern: fullPattern(sources.join("|"), "u"),
    stopsOn: stopsOn([US_STATE_PATTERN, NUMBER_PATTERN]),
  });

  return (token) => {
    const result = component.parse(token);
    if (!result.matched) return result;
    return match(
      ...result.results.map((step) => ({
        ...step,
        value: step.value.replace(/_/g, " "),
      }))
    );
  };
}

/**
 * Parse a two-token secondary unit, like "APT 4", "STE 200B" or "# 7". If the
 * tokens aren't a unit, this is not a match rather than an error, since units
 * are optional.
 */
export function unitRule(words: readonly string[]): RuleResult<ParseStep> {
  if (words.length !== 2) return NO_MATCH;

  const [marker, identifier] = words;
  // Parsed addresses never have a bare "#" here (normalization turns it into
  // APT), but callers may pass tokens straight to this rule.
  const unitType =
    marker === "#" ? DEFAULT_UNIT_TYPE : fullMatch(marker, UNIT_TYPE_PATTERN);
  const unitId = fullMatch(identifier, UNIT_IDENTIFIER_PATTERN);
  if (unitType == null || unitId == null) return NO_MATCH;

  return match({
    label: "unit",
    value: `${unitType} ${unitId}`.replace(/#/g, ""),
  });
}

/** Whether any token is a unit type, meaning the address might have a unit. */
export function hasUnitType(tokens: readonly string[]): boolean {
  return tokens.some((token) => fullMatch(token, UNIT_TYPE_PATTERN) != null);
}
