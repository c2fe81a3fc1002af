/** Base class for all exceptions in this project. */
export class BaseError extends Error {
  // Ensure subclasses get an appropriate name instead of "Error". Without this,
  // console logging and `errorInstance.toString()` may print different things
  // for the type of error.
  name = this.constructor.name || "Error";
}

/**
 * Indicates that a value being parsed was not formatted as expected.
 * `orig` is the complete text that was being parsed and `reason` is a short
 * description of what went wrong, e.g. the field that couldn't be read.
 */
export class ParseError extends BaseError {
  orig: string;
  reason: string;

  constructor(orig: string, reason: string) {
    super(`@ ${reason}: ${orig}`);
    this.orig = orig;
    this.reason = reason;
  }
}
