import { describe, expect, it } from "vitest";

import { compactTimestamp, defaultRunId, getErrorCode, limitText } from "./utils.js";

describe("compactTimestamp", () => {
  const date = new Date("2024-03-01T07:05:09.042Z");

  it("formats UTC with milliseconds by default", () => {
    expect(compactTimestamp(date)).toBe("20240301-070509-042");
  });

  it("drops milliseconds on request", () => {
    expect(compactTimestamp(date, { millis: false })).toBe("20240301-070509");
    expect(defaultRunId(date)).toBe("20240301-070509");
  });
});

describe("limitText", () => {
  it("keeps the tail of long text", () => {
    expect(limitText("short", 10)).toBe("short");
    expect(limitText("0123456789", 5)).toBe("…6789");
  });
});

describe("getErrorCode", () => {
  it("reads string codes only", () => {
    expect(getErrorCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(getErrorCode({ code: 13 })).toBeUndefined();
    expect(getErrorCode(null)).toBeUndefined();
  });
});
