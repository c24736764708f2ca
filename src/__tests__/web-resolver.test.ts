import { describe, expect, it } from "vitest";
import { WebResolver } from "../resolver/impl/web";
import { PlatformFamily } from "../resolver/types";
import { parseTimeZone } from "../utils/timezone";

describe("WebResolver", () => {
  it("prefers timeZoneName", () => {
    const resolver = new WebResolver(() => ({
      timeZoneName: "America/Denver",
      timeZone: "Asia/Tokyo",
    }));

    expect(resolver.family).toBe(PlatformFamily.Web);
    expect(resolver.resolve()).toBe("America/Denver");
  });

  it("falls back to timeZone when timeZoneName is not an identifier", () => {
    const resolver = new WebResolver(() => ({
      timeZoneName: "short",
      timeZone: " asia/tokyo ",
    }));

    expect(resolver.resolve()).toBe("Asia/Tokyo");
  });

  it("ignores non-string fields", () => {
    const resolver = new WebResolver(() => ({ timeZoneName: 42, timeZone: null }));

    expect(resolver.resolve()).toBeUndefined();
  });

  it("returns undefined when Intl throws", () => {
    const resolver = new WebResolver(() => {
      throw new Error("Intl error");
    });

    expect(resolver.resolve()).toBeUndefined();
  });

  it("reads the host's Intl implementation by default", () => {
    const expected = parseTimeZone(Intl.DateTimeFormat().resolvedOptions().timeZone);

    expect(new WebResolver().resolve()).toBe(expected);
  });
});
