import { titleize } from "./text";

/**
 * Every field of a parsed address, in the order they appear in a typical US
 * address line.
 */
export const ADDRESS_FIELDS = [
  "house_number",
  "st_name",
  "st_suffix",
  "st_NESW",
  "unit",
  "city",
  "us_state",
  "zip_code",
] as const;

export type AddressField = (typeof ADDRESS_FIELDS)[number];

/** Fields every complete address must have. */
export const HARD_COMPONENTS = [
  "house_number",
  "st_name",
  "city",
  "us_state",
] as const satisfies readonly AddressField[];

/** Fields that are frequently missing and are `null` when absent. */
export const SOFT_COMPONENTS = [
  "st_suffix",
  "st_NESW",
  "unit",
  "zip_code",
] as const satisfies readonly AddressField[];

export type HardComponent = (typeof HARD_COMPONENTS)[number];
export type SoftComponent = (typeof SOFT_COMPONENTS)[number];

export type AddressFields = { [K in HardComponent]: string } & {
  [K in SoftComponent]: string | null;
};

/**
 * An address as it came out of the parser, before any further cleanup.
 * `orig` is the exact text that was parsed.
 */
export interface RawAddress extends Readonly<AddressFields> {
  readonly is_raw: true;
  readonly orig: string;
}

/**
 * Build an object with a value for every address field.
 * @example
 * mapFields((field) => field.length); // { house_number: 12, st_name: 7, ... }
 */
export function mapFields<T>(
  value: (field: AddressField) => T
): Record<AddressField, T> {
  return {
    house_number: value("house_number"),
    st_name: value("st_name"),
    st_suffix: value("st_suffix"),
    st_NESW: value("st_NESW"),
    unit: value("unit"),
    city: value("city"),
    us_state: value("us_state"),
    zip_code: value("zip_code"),
  };
}

/**
 * Build a raw address from joined field values. Soft components that are
 * empty (or only whitespace) become `null`; hard components are kept as-is,
 * since unchecked parses may legitimately leave them empty.
 */
export function createRawAddress(
  values: Record<AddressField, string>,
  orig: string
): RawAddress {
  const soft = (field: SoftComponent) =>
    values[field].trim() ? values[field] : null;

  return {
    house_number: values.house_number,
    st_name: values.st_name,
    st_suffix: soft("st_suffix"),
    st_NESW: soft("st_NESW"),
    unit: soft("unit"),
    city: values.city,
    us_state: values.us_state,
    zip_code: soft("zip_code"),
    is_raw: true,
    orig,
  };
}

/**
 * Format an address as a single, human-readable line, e.g.
 * "123 8th Ave NE Ste A, Dallas, TX 75201".
 */
export function formatAddress(address: RawAddress): string {
  const street = [
    address.house_number,
    titleize(address.st_name),
    address.st_suffix && titleize(address.st_suffix),
    address.st_NESW,
    address.unit && titleize(address.unit),
  ]
    .filter(Boolean)
    .join(" ");

  const stateZip = [address.us_state, address.zip_code]
    .filter(Boolean)
    .join(" ");

  return [street, titleize(address.city), stateZip].filter(Boolean).join(", ");
}
