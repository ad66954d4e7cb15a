import { describe, expect, it } from "vitest";
import { InvalidUsageError } from "../../../src/errors/invalid-usage.error";
import { fromDateTime, isResetInteger, toDateTime } from "../../../src/model/timestamp";

const DATE = new Date(Date.UTC(2024, 0, 31, 9, 30, 0));

describe("timestamps", () => {
  describe("fromDateTime()", () => {
    it("should format generalized time", () => {
      expect(fromDateTime("ldap", DATE)).toBe("20240131093000Z");
      expect(fromDateTime("windows", DATE)).toBe("20240131093000.0Z");
    });

    it("should count 100-nanosecond intervals since 1601", () => {
      expect(fromDateTime("windows-int", DATE)).toBe("133511670000000000");
    });
  });

  describe("toDateTime()", () => {
    it("should parse generalized time", () => {
      expect(toDateTime("ldap", "20240131093000Z")).toEqual(DATE);
      expect(toDateTime("windows", "20240131093000.0Z")).toEqual(DATE);
    });

    it("should parse windows integers", () => {
      expect(toDateTime("windows-int", "133511670000000000")).toEqual(DATE);
    });

    it("should treat unset windows integers as no date", () => {
      expect(toDateTime("windows-int", "0")).toBeNull();
      expect(toDateTime("windows-int", "-1")).toBeNull();
      expect(toDateTime("windows-int", "9223372036854775807")).toBeNull();
    });

    it("should reject malformed values", () => {
      expect(() => toDateTime("windows-int", "soon")).toThrow(InvalidUsageError);
      expect(() => toDateTime("ldap", "2024-01-31")).toThrow(
        "Invalid ldap timestamp [2024-01-31].",
      );
    });
  });

  it("should recognize reset integers", () => {
    expect(isResetInteger(0)).toBe(true);
    expect(isResetInteger(-1)).toBe(true);
    expect(isResetInteger(1)).toBe(false);
    expect(isResetInteger("0")).toBe(false);
  });
});
