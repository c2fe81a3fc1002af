import { describe, it, expect } from "@jest/globals";
import {
  createRawAddress,
  formatAddress,
  HARD_COMPONENTS,
  mapFields,
  SOFT_COMPONENTS,
} from "../src/address";

describe("createRawAddress", () => {
  it("turns empty soft components into null", () => {
    const address = createRawAddress(
      {
        house_number: "123",
        st_name: "MAIN",
        st_suffix: "",
        st_NESW: " ",
        unit: "APT 4",
        city: "SPRINGFIELD",
        us_state: "OH",
        zip_code: "",
      },
      "123 Main Apt 4, Springfield OH"
    );
    expect(address).toEqual({
      house_number: "123",
      st_name: "MAIN",
      st_suffix: null,
      st_NESW: null,
      unit: "APT 4",
      city: "SPRINGFIELD",
      us_state: "OH",
      zip_code: null,
      is_raw: true,
      orig: "123 Main Apt 4, Springfield OH",
    });
  });

  it("keeps empty hard components as empty strings", () => {
    const address = createRawAddress(
      mapFields(() => ""),
      ""
    );
    for (const field of HARD_COMPONENTS) {
      expect(address[field]).toBe("");
    }
    for (const field of SOFT_COMPONENTS) {
      expect(address[field]).toBeNull();
    }
  });
});

describe("mapFields", () => {
  it("creates a value for every field", () => {
    expect(mapFields((field) => field.toUpperCase())).toEqual({
      house_number: "HOUSE_NUMBER",
      st_name: "ST_NAME",
      st_suffix: "ST_SUFFIX",
      st_NESW: "ST_NESW",
      unit: "UNIT",
      city: "CITY",
      us_state: "US_STATE",
      zip_code: "ZIP_CODE",
    });
  });
});

describe("formatAddress", () => {
  it("formats all the parts of an address", () => {
    const address = createRawAddress(
      {
        house_number: "123",
        st_name: "8TH",
        st_suffix: "AVE",
        st_NESW: "NE",
        unit: "STE A",
        city: "DALLAS",
        us_state: "TX",
        zip_code: "75201",
      },
      "123 8th Ave NE Ste A Dallas TX 75201"
    );
    expect(formatAddress(address)).toBe("123 8th Ave NE Ste A, Dallas, TX 75201");
  });

  it("leaves out missing parts", () => {
    const address = createRawAddress(
      {
        house_number: "50",
        st_name: "ELM",
        st_suffix: "",
        st_NESW: "",
        unit: "",
        city: "NEW YORK",
        us_state: "NY",
        zip_code: "",
      },
      "50 Elm New York NY"
    );
    expect(formatAddress(address)).toBe("50 Elm, New York, NY");
  });
});
