import { describe, expect, it } from "vitest";
import { expandTwoDigitYear, monthFromName, parseYearToken, parseLocaleDate } from "./locale-date.js";

describe("monthFromName", () => {
  it("reads Spanish and English spellings, abbreviations and accents", () => {
    expect(monthFromName("Marzo")).toBe(3);
    expect(monthFromName("sept.")).toBe(9);
    expect(monthFromName("Setiembre")).toBe(9);
    expect(monthFromName("DIC")).toBe(12);
    expect(monthFromName("agósto")).toBe(8);
    expect(monthFromName("October")).toBe(10);
    expect(monthFromName("lunes")).toBeNull();
  });
});

describe("year tokens", () => {
  it("expands two-digit years around the pivot", () => {
    expect(expandTwoDigitYear(24)).toBe(2024);
    expect(expandTwoDigitYear(49)).toBe(2049);
    expect(expandTwoDigitYear(50)).toBe(1950);
    expect(expandTwoDigitYear(87)).toBe(1987);
  });

  it("accepts only two or four digits", () => {
    expect(parseYearToken("2024")).toBe(2024);
    expect(parseYearToken("24")).toBe(2024);
    expect(parseYearToken("124")).toBeNull();
  });
});

describe("parseLocaleDate", () => {
  it("formats a zone-less date-time", () => {
    expect(parseLocaleDate({ year: 2024, month: 3, day: 5 })).toBe("2024-03-05T00:00:00");
    expect(parseLocaleDate({ year: 2024, month: 3, day: 5, hour: 14, minute: 30 })).toBe(
      "2024-03-05T14:30:00",
    );
  });

  it("rejects impossible calendar values", () => {
    expect(parseLocaleDate({ year: 2024, month: 2, day: 29 })).toBe("2024-02-29T00:00:00");
    expect(parseLocaleDate({ year: 2023, month: 2, day: 29 })).toBeNull();
    expect(parseLocaleDate({ year: 2024, month: 13, day: 1 })).toBeNull();
    expect(parseLocaleDate({ year: 1899, month: 1, day: 1 })).toBeNull();
    expect(parseLocaleDate({ year: 2024, month: 1, day: 1, hour: 24, minute: 0 })).toBeNull();
  });
});
