import { describe, it, expect } from "vitest";
import { formatSignificant } from "./number-format.js";

describe("formatSignificant", () => {
  it("drops trailing zeros", () => {
    expect(formatSignificant(2, 6)).toBe("2");
    expect(formatSignificant(2.5, 6)).toBe("2.5");
  });

  it("rounds to the requested significant digits", () => {
    expect(formatSignificant(5 / Math.sqrt(8), 6)).toBe("1.76777");
    expect(formatSignificant(Math.sqrt(32 / 7), 3)).toBe("2.14");
  });

  it("keeps exponent notation for very small charges", () => {
    expect(formatSignificant(1.60217663e-19, 4)).toBe("1.602e-19");
  });

  it("prints non-finite values as-is", () => {
    expect(formatSignificant(Number.NaN, 6)).toBe("NaN");
  });
});
