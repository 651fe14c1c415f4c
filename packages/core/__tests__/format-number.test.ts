import { describe, expect, it } from "vitest";
import { RenderError, formatNumber } from "../src/index.js";

describe("formatNumber", () => {
  it("rounds and drops trailing zeros", () => {
    expect(formatNumber(1.005, 1)).toBe("1");
    expect(formatNumber(2.5)).toBe("2.5");
    expect(formatNumber(0.1234567, 6)).toBe("0.123457");
  });

  it("writes a rounded negative zero as 0", () => {
    expect(formatNumber(-0.001)).toBe("0");
  });

  it("throws for NaN and infinities", () => {
    expect(() => formatNumber(Number.NaN)).toThrow(RenderError);
    expect(() => formatNumber(Number.NEGATIVE_INFINITY)).toThrow(
      "Cannot write non-finite number -Infinity",
    );
  });
});
