import { describe, it, expect } from "@jest/globals";
import {
  AddressParseError,
  EndOfAddressError,
  FieldNotIdentifiedError,
  GrammarMismatchError,
  ParserConfigError,
} from "../src/exceptions";
import { collectFields, normalizeAddressText, Parser } from "../src/parser";

describe("Parser", () => {
  it("parses a complete address", () => {
    const parser = new Parser();
    expect(parser.parse("123 8th Ave NE Ste A Dallas TX")).toEqual({
      house_number: "123",
      st_name: "8TH",
      st_suffix: "AVE",
      st_NESW: "NE",
      unit: "STE A",
      city: "DALLAS",
      us_state: "TX",
      zip_code: null,
      is_raw: true,
      orig: "123 8th Ave NE Ste A Dallas TX",
    });
  });

  it("uses a suffix to separate a street named after a known city", () => {
    const parser = new Parser(["Houston", "Dallas"]);
    expect(parser.parse("123 Dallas Rd Houston TX")).toEqual({
      house_number: "123",
      st_name: "DALLAS",
      st_suffix: "RD",
      st_NESW: null,
      unit: null,
      city: "HOUSTON",
      us_state: "TX",
      zip_code: null,
      is_raw: true,
      orig: "123 Dallas Rd Houston TX",
    });
  });

  it("uses known cities when nothing separates the street and city", () => {
    const parser = new Parser(["Houston", "Dallas"]);
    const address = parser.parse("123 Straight Houston TX");
    expect(address.st_name).toBe("STRAIGHT");
    expect(address.st_suffix).toBeNull();
    expect(address.city).toBe("HOUSTON");
  });

  it("fails when the city is unknown and nothing separates it", () => {
    expect(() => new Parser().parse("123 Straight Austin TX")).toThrow(
      AddressParseError
    );

    const parser = new Parser(["Houston", "Dallas"]);
    expect(() => parser.parse("123 Straight Austin TX")).toThrow(
      EndOfAddressError
    );
    expect(() => parser.parse("123 Straight Austin TX")).toThrow(
      new AddressParseError(
        "123 Straight Austin TX",
        "unknown: end of input"
      ).message
    );
  });

  it("fails when the street name is a known city", () => {
    const parser = new Parser(["Houston", "Dallas"]);
    expect(() => parser.parse("123 Dallas Houston TX")).toThrow(
      new FieldNotIdentifiedError("123 Dallas Houston TX", "st_name")
    );
  });

  it("can skip checking for required fields", () => {
    const parser = new Parser(["Houston", "Dallas"]);
    const address = parser.parse("123 Dallas Houston TX", { checked: false });
    expect(address.house_number).toBe("123");
    expect(address.st_name).toBe("");
    expect(address.city).toBe("DALLAS HOUSTON");
    expect(address.us_state).toBe("TX");
  });

  it("parses units that don't look like street suffixes", () => {
    const parser = new Parser();
    expect(parser.parse("0 Joy Rd Trlr 105 Red MI 48000")).toEqual({
      house_number: "0",
      st_name: "JOY",
      st_suffix: "RD",
      st_NESW: null,
      unit: "TRLR 105",
      city: "RED",
      us_state: "MI",
      zip_code: "48000",
      is_raw: true,
      orig: "0 Joy Rd Trlr 105 Red MI 48000",
    });
  });

  it("treats # as an apartment", () => {
    const parser = new Parser();
    expect(parser.parse("0 Stoepel St #0 Detroit MI 48000").unit).toBe("APT 0");

    const address = parser.parse("0 W Boston Blvd # 7 Detroit MI 48000");
    expect(address.st_NESW).toBe("W");
    expect(address.st_name).toBe("BOSTON");
    expect(address.st_suffix).toBe("BLVD");
    expect(address.unit).toBe("APT 7");
  });

  it("only counts one unit marker in 'Apt #4'", () => {
    const address = new Parser().parse("10 Elm St Apt #4 Springfield OH");
    expect(address.unit).toBe("APT 4");
    expect(address.city).toBe("SPRINGFIELD");
  });

  it("recognizes known cities with more than one word", () => {
    const parser = new Parser(["New York"]);
    expect(parser.normalize("12 Broadway, New York NY 10001")).toBe(
      "12 BROADWAY NEW_YORK NY 10001"
    );

    const address = parser.parse("12 Broadway New York NY 10001");
    expect(address.st_name).toBe("BROADWAY");
    expect(address.city).toBe("NEW YORK");
    expect(address.us_state).toBe("NY");
    expect(address.zip_code).toBe("10001");
  });

  it("ignores punctuation", () => {
    const parser = new Parser();
    const address = parser.parse("123 Main St., Springfield, OH 12123");
    expect(address).toEqual({
      ...parser.parse("123 Main St Springfield OH 12123"),
      orig: "123 Main St., Springfield, OH 12123",
    });
  });

  it("parses words with letters outside ASCII", () => {
    const parser = new Parser();
    const canon = parser.parse("10 Main St Cañon City CO 81212");
    expect(canon.st_name).toBe("MAIN");
    expect(canon.city).toBe("CAÑON CITY");
    expect(canon.us_state).toBe("CO");
    expect(canon.zip_code).toBe("81212");

    const pena = parser.parse("10 Calle Peña Rd Española NM");
    expect(pena.st_name).toBe("CALLE PEÑA");
    expect(pena.st_suffix).toBe("RD");
    expect(pena.city).toBe("ESPAÑOLA");
    expect(pena.us_state).toBe("NM");
  });

  it("recognizes known cities with letters outside ASCII", () => {
    const parser = new Parser(["Cañon City"]);
    expect(parser.normalize("10 Main Cañon City CO")).toBe(
      "10 MAIN CAÑON_CITY CO"
    );

    const address = parser.parse("10 Main Cañon City CO");
    expect(address.st_name).toBe("MAIN");
    expect(address.city).toBe("CAÑON CITY");
  });

  it("parses ranges of house numbers", () => {
    const address = new Parser().parse("12-14 Main St Springfield OH");
    expect(address.house_number).toBe("12-14");
    expect(address.st_name).toBe("MAIN");
    expect(address.st_suffix).toBe("ST");
    expect(address.city).toBe("SPRINGFIELD");
    expect(address.us_state).toBe("OH");
  });

  it("parses fractional house numbers", () => {
    const address = new Parser().parse("123 1/2 Main St Springfield OH");
    expect(address.house_number).toBe("123 1/2");
    expect(address.st_name).toBe("MAIN");
  });

  it("parses ZIP+4 codes and a trailing country", () => {
    const address = new Parser().parse(
      "123 Main St Springfield OH 12123-4567 USA"
    );
    expect(address.city).toBe("SPRINGFIELD");
    expect(address.us_state).toBe("OH");
    expect(address.zip_code).toBe("12123-4567");
  });

  it("reports which component did not match", () => {
    const parser = new Parser();
    let error: unknown;
    try {
      parser.parse("123 Main St Springfield 12345");
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(GrammarMismatchError);
    expect(error).toMatchObject({
      label: "us_state",
      token: "12345",
      orig: "123 Main St Springfield 12345",
    });
  });

  it("reports the first missing required field", () => {
    const parser = new Parser();
    expect(() => parser.parse("123 Main St TX")).toThrow(
      new FieldNotIdentifiedError("123 Main St TX", "city")
    );
    expect(() => parser.parse("Main St Springfield OH")).toThrow(
      new FieldNotIdentifiedError("Main St Springfield OH", "house_number")
    );
  });

  it("gives the same result every time", () => {
    const parser = new Parser(["Houston"]);
    const first = parser.parse("123 Straight Houston TX");
    expect(parser.parse("123 Straight Houston TX")).toEqual(first);
  });

  it("keeps the known cities it was given", () => {
    const parser = new Parser(["Houston", " ", "Dallas", "houston"]);
    expect(parser.knownCities).toEqual(["Houston", "Dallas", "houston"]);
  });

  it("rejects known cities that can't be matched", () => {
    expect(() => new Parser(["..."])).toThrow(ParserConfigError);
    expect(() => new Parser(["12345"])).toThrow(ParserConfigError);
  });

  describe("parseRow", () => {
    it("does not let fields span cells", () => {
      const parser = new Parser();
      expect(
        parser.parseRow(["123 Main", "Springfield", "OH", "12123"])
      ).toEqual({
        house_number: "123",
        st_name: "MAIN",
        st_suffix: null,
        st_NESW: null,
        unit: null,
        city: "SPRINGFIELD",
        us_state: "OH",
        zip_code: "12123",
        is_raw: true,
        orig: "123 Main\tSpringfield\tOH\t12123",
      });
    });

    it("throws if the row runs out early", () => {
      expect(() => new Parser().parseRow(["nonsense"])).toThrow(
        EndOfAddressError
      );
    });
  });

  describe("normalize", () => {
    it("gives the same result when run twice", () => {
      const parser = new Parser(["New York"]);
      const once = parser.normalize("12 Broadway Apt #4, new york NY");
      expect(once).toBe("12 BROADWAY APT 4 NEW_YORK NY");
      expect(parser.normalize(once)).toBe(once);
    });
  });
});

describe("normalizeAddressText", () => {
  it("cleans up address text", () => {
    expect(normalizeAddressText("10 Elm St.  Apt #4")).toBe("10 ELM ST APT 4");
    expect(normalizeAddressText("10 Elm St # 4")).toBe("10 ELM ST APT 4");
  });

  it("gives the same result when run twice", () => {
    const once = normalizeAddressText("O'Neil Ave, Apt ##4B");
    expect(normalizeAddressText(once)).toBe(once);
  });
});

describe("collectFields", () => {
  it("groups values by field and drops junk", () => {
    const fields = collectFields([
      { label: "house_number", value: "123" },
      { label: "st_name", value: "MAIN" },
      { label: "st_name", value: "HILL" },
      { label: "junk", value: "USA" },
    ]);
    expect(fields.house_number).toEqual(["123"]);
    expect(fields.st_name).toEqual(["MAIN", "HILL"]);
    expect(fields.city).toEqual([]);
  });
});
