import { describe, it, expect } from "vitest";
import { humanizeCount, parseMagnitude } from "./magnitude.js";

describe("parseMagnitude", () => {
  it("should parse plain and comma-grouped numbers", () => {
    expect(parseMagnitude("42")).toBe(42);
    expect(parseMagnitude("12,345")).toBe(12345);
    expect(parseMagnitude("1,234,567")).toBe(1_234_567);
    expect(parseMagnitude("1,234.5k")).toBe(1_234_500);
    expect(parseMagnitude(" 7 ")).toBe(7);
  });

  it("should apply suffixes regardless of case", () => {
    expect(parseMagnitude("850K")).toBe(850_000);
    expect(parseMagnitude("850k")).toBe(850_000);
    expect(parseMagnitude("2.5M")).toBe(2_500_000);
    expect(parseMagnitude("2.5 m")).toBe(2_500_000);
    expect(parseMagnitude("1.96 g")).toBe(1_960_000_000);
    expect(parseMagnitude("1.96G")).toBe(1_960_000_000);
    expect(parseMagnitude("1.5B")).toBe(1_500_000_000);
    expect(parseMagnitude(".5k")).toBe(500);
  });

  it("should return undefined for unreadable text", () => {
    expect(parseMagnitude(undefined)).toBeUndefined();
    expect(parseMagnitude("")).toBeUndefined();
    expect(parseMagnitude("lots")).toBeUndefined();
    expect(parseMagnitude("12x")).toBeUndefined();
    expect(parseMagnitude("1.2.3k")).toBeUndefined();
  });

  it("should reject commas that do not group thousands", () => {
    expect(parseMagnitude("1,5 M")).toBeUndefined();
    expect(parseMagnitude("1,2k")).toBeUndefined();
    expect(parseMagnitude("1,23,4")).toBeUndefined();
    expect(parseMagnitude("1234,567")).toBeUndefined();
    expect(parseMagnitude(",5k")).toBeUndefined();
  });
});

describe("humanizeCount", () => {
  it("should keep small numbers as they are", () => {
    expect(humanizeCount(0)).toBe("0");
    expect(humanizeCount(999)).toBe("999");
  });

  it("should scale to the largest fitting unit with two decimals", () => {
    expect(humanizeCount(1234)).toBe("1.23 K");
    expect(humanizeCount(5_600_000)).toBe("5.6 M");
    expect(humanizeCount(2_150_000_000)).toBe("2.15 G");
    expect(humanizeCount(1_960_000_000)).toBe("1.96 G");
  });

  it("should carry into the next unit when rounding reaches 1000", () => {
    expect(humanizeCount(999_999)).toBe("1 M");
  });
});
