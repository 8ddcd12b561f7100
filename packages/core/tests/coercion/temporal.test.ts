import { describe, it, expect } from "vitest";
import { isUtcMidnight, isValidDate, parseIsoDate, parseIsoDateTime } from "../../src/coercion/temporal";

describe("parseIsoDate", () => {
  it("should parse a calendar date at UTC midnight", () => {
    expect(parseIsoDate("2024-03-15")?.toISOString()).toBe("2024-03-15T00:00:00.000Z");
  });

  it("should accept leap days only in leap years", () => {
    expect(parseIsoDate("2000-02-29")).not.toBeNull();
    expect(parseIsoDate("1900-02-29")).toBeNull();
  });

  it("should reject out-of-range months and days", () => {
    expect(parseIsoDate("2024-13-01")).toBeNull();
    expect(parseIsoDate("2024-04-31")).toBeNull();
    expect(parseIsoDate("2024-00-10")).toBeNull();
  });

  it("should reject other layouts", () => {
    expect(parseIsoDate("15/03/2024")).toBeNull();
    expect(parseIsoDate("2024-3-15")).toBeNull();
    expect(parseIsoDate("2024-03-15T00:00:00Z")).toBeNull();
  });

  it("should keep years before 100 as written", () => {
    expect(parseIsoDate("0042-01-01")?.getUTCFullYear()).toBe(42);
  });
});

describe("parseIsoDateTime", () => {
  it("should treat a missing offset as UTC", () => {
    expect(parseIsoDateTime("2024-05-01T08:15:30")?.toISOString()).toBe("2024-05-01T08:15:30.000Z");
  });

  it("should apply offsets with and without a colon", () => {
    expect(parseIsoDateTime("2024-05-01T08:00:00-0130")?.toISOString()).toBe("2024-05-01T09:30:00.000Z");
    expect(parseIsoDateTime("2024-05-01T08:00+05:00")?.toISOString()).toBe("2024-05-01T03:00:00.000Z");
  });

  it("should truncate fractions to milliseconds", () => {
    expect(parseIsoDateTime("2024-05-01T00:00:00.987654Z")?.toISOString()).toBe("2024-05-01T00:00:00.987Z");
    expect(parseIsoDateTime("2024-05-01T00:00:00.5Z")?.toISOString()).toBe("2024-05-01T00:00:00.500Z");
  });

  it("should accept a space separator and a bare date", () => {
    expect(parseIsoDateTime("2024-05-01 23:59:59Z")?.toISOString()).toBe("2024-05-01T23:59:59.000Z");
    expect(parseIsoDateTime("2024-05-01")?.toISOString()).toBe("2024-05-01T00:00:00.000Z");
  });

  it("should reject impossible times and offsets", () => {
    expect(parseIsoDateTime("2024-05-01T24:00:00Z")).toBeNull();
    expect(parseIsoDateTime("2024-05-01T12:60:00Z")).toBeNull();
    expect(parseIsoDateTime("2024-05-01T12:00:00+25:00")).toBeNull();
    expect(parseIsoDateTime("2024-02-30T12:00:00Z")).toBeNull();
  });
});

describe("isValidDate / isUtcMidnight", () => {
  it("should reject invalid Date instances", () => {
    expect(isValidDate(new Date("nope"))).toBe(false);
    expect(isValidDate("2024-01-01")).toBe(false);
    expect(isValidDate(new Date(0))).toBe(true);
  });

  it("should detect UTC midnight", () => {
    expect(isUtcMidnight(new Date(Date.UTC(2024, 0, 1)))).toBe(true);
    expect(isUtcMidnight(new Date(Date.UTC(2024, 0, 1, 0, 0, 0, 1)))).toBe(false);
  });
});
