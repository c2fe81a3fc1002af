import Ajv, { JSONSchemaType } from "ajv";
import { ParserConfigError } from "./exceptions";

const ajv = new Ajv({ allErrors: true });

const knownCitiesSchema: JSONSchemaType<string[]> = {
  type: "array",
  items: { type: "string", minLength: 1 },
};

const validateCities = ajv.compile(knownCitiesSchema);

/**
 * Check that data loaded from a known cities file is a list of city names.
 * @param source Where the data came from, for error messages.
 */
export function validateKnownCities(data: unknown, source = "known cities"): string[] {
  if (!validateCities(data)) {
    const details = ajv.errorsText(validateCities.errors, { dataVar: source });
    throw new ParserConfigError(`Invalid known cities: ${details}`);
  }
  return data;
}
