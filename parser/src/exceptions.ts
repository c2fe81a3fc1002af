import { BaseError, ParseError } from "streetwise-common";

/**
 * A consumption step tried to read past the end of its input. Inside an
 * address, this usually means a greedy field (the street name or the city)
 * consumed tokens that belonged to a later field.
 */
export class EndOfInputError extends BaseError {
  constructor(remaining = "") {
    super(
      `'${remaining}'... reached end of input. Maybe a parsing stage consumed all input? Street name? City?`
    );
  }
}

/** Base class for every error raised while parsing a single address. */
export class AddressParseError extends ParseError {}

/** A required grammar component did not match the token in front of it. */
export class GrammarMismatchError extends AddressParseError {
  label: string;
  token: string;

  constructor(label: string, token: string, orig: string = token) {
    super(orig, label);
    this.label = label;
    this.token = token;
  }

  /** Copy of this error that reports the full address text. */
  withInput(orig: string): GrammarMismatchError {
    return new GrammarMismatchError(this.label, this.token, orig);
  }
}

/**
 * The parser unexpectedly reached the end of the address. If you get this,
 * the address is probably missing both a street suffix and a directional, or
 * is missing a state.
 */
export class EndOfAddressError extends AddressParseError {
  constructor(orig: string, reason = "unknown") {
    super(orig, `${reason}: end of input`);
  }
}

/** The grammar ran to completion, but a required field came out empty. */
export class FieldNotIdentifiedError extends AddressParseError {
  field: string;

  constructor(orig: string, field: string) {
    super(orig, `Could not identify ${field}`);
    this.field = field;
  }
}

/**
 * Parser configuration (known cities, word lists) was unusable. Unlike parse
 * errors, these are never skipped over by batch parsing.
 */
export class ParserConfigError extends BaseError {}
