import { describe, it, expect } from "vitest";
import {
  BEGINNING_OF_TIME,
  componentsOnDate,
  isInstalledOn,
  parseComponentDate,
  toEpochSeconds,
  toIsoDate,
} from "./dates";
import { StravaParseError, StravaValidationError } from "./errors";
import type { BikeComponent } from "./types";

function component(id: number, added: string | null, removed: string | null): BikeComponent {
  return {
    id,
    type: "Chain",
    brandName: "Acme",
    modelName: "C1",
    added,
    removed,
    distance: 0,
  };
}

describe("parseComponentDate", () => {
  it("should parse short month names", () => {
    expect(parseComponentDate("Mar 3, 2019")).toBe("2019-03-03");
    expect(parseComponentDate(" Dec 25, 2020 ")).toBe("2020-12-25");
  });

  it("should parse long month names", () => {
    expect(parseComponentDate("September 12, 2020")).toBe("2020-09-12");
  });

  it("should map Since Beginning to the epoch date", () => {
    expect(parseComponentDate("Since Beginning")).toBe(BEGINNING_OF_TIME);
    expect(parseComponentDate("since beginning")).toBe("1970-01-01");
  });

  it("should return null for blank cells", () => {
    expect(parseComponentDate("")).toBeNull();
    expect(parseComponentDate("  ")).toBeNull();
    expect(parseComponentDate(null)).toBeNull();
  });

  it("should reject dates it does not recognize", () => {
    expect(() => parseComponentDate("Present")).toThrow(StravaParseError);
    expect(() => parseComponentDate("2019-03-03")).toThrow(
      'Bike components: Invalid component date "2019-03-03"'
    );
  });
});

describe("toIsoDate", () => {
  it("should normalize dates and ISO strings", () => {
    expect(toIsoDate(new Date("2020-06-15T12:00:00Z"))).toBe("2020-06-15");
    expect(toIsoDate("2020-06-15")).toBe("2020-06-15");
  });

  it("should reject invalid dates", () => {
    expect(() => toIsoDate("nope")).toThrow(StravaValidationError);
    expect(() => toIsoDate("nope")).toThrow("Invalid date: nope");
  });
});

describe("componentsOnDate", () => {
  const chainA = component(1, "2020-01-01", "2021-01-01");
  const cassette = component(2, null, null);
  const chainB = component(3, "2021-01-01", null);
  const components = [chainA, cassette, chainB];

  it("should include the added date and exclude the removed date", () => {
    expect(isInstalledOn(chainA, "2020-01-01")).toBe(true);
    expect(isInstalledOn(chainA, "2020-12-31")).toBe(true);
    expect(isInstalledOn(chainA, "2021-01-01")).toBe(false);
  });

  it("should return the components installed on a date", () => {
    expect(componentsOnDate(components, "2021-01-01").map((c) => c.id)).toEqual([2, 3]);
    expect(componentsOnDate(components, new Date("2020-06-15T12:00:00Z")).map((c) => c.id)).toEqual([
      1, 2,
    ]);
    expect(componentsOnDate(components, "2019-12-31").map((c) => c.id)).toEqual([2]);
  });

  it("should return every component when no date is given", () => {
    expect(componentsOnDate(components)).toEqual(components);
    expect(componentsOnDate(components, null)).toEqual(components);
  });
});

describe("toEpochSeconds", () => {
  it("should convert timestamps with offsets", () => {
    expect(toEpochSeconds("2024-05-01T07:30:00+0000")).toBe(1714548600);
    expect(toEpochSeconds("2024-05-01T09:30:00+02:00")).toBe(1714548600);
  });

  it("should return null for invalid timestamps", () => {
    expect(toEpochSeconds("yesterday")).toBeNull();
  });
});
