import { describe, it, expect } from "vitest";
import { MediaType, toMediaType } from "./MediaType.js";

describe("toMediaType", () => {
  it("should map known type names", () => {
    expect(toMediaType("GraphImage")).toBe(MediaType.PHOTO);
    expect(toMediaType("GraphVideo")).toBe(MediaType.VIDEO);
    expect(toMediaType("GraphSidecar", true)).toBe(MediaType.CAROUSEL);
  });

  it("should fall back to the video flag for unknown names", () => {
    expect(toMediaType(undefined)).toBe(MediaType.PHOTO);
    expect(toMediaType("GraphReel", true)).toBe(MediaType.VIDEO);
    expect(toMediaType("", false)).toBe(MediaType.PHOTO);
  });

  it("should not treat inherited object keys as type names", () => {
    expect(toMediaType("constructor")).toBe(MediaType.PHOTO);
    expect(toMediaType("toString", true)).toBe(MediaType.VIDEO);
    expect(toMediaType("__proto__")).toBe(MediaType.PHOTO);
  });
});
