import { describe, it, expect } from "vitest";
import { parseFormula, rollFormula, roll, formulaBounds, formatFormula } from "./dice";
import { DiceFormulaError } from "./errors";
import { RNG } from "./rng";
import { FakeRng } from "./test-helpers/fakeRng";

describe("parseFormula", () => {
  it("parses dice, ranges and constants", () => {
    expect(parseFormula("3D4")).toEqual({ kind: "dice", count: 3, faces: 4, modifier: 0 });
    expect(parseFormula("d20")).toEqual({ kind: "dice", count: 1, faces: 20, modifier: 0 });
    expect(parseFormula("D%")).toEqual({ kind: "dice", count: 1, faces: 100, modifier: 0 });
    expect(parseFormula("2D2+3")).toEqual({ kind: "dice", count: 2, faces: 2, modifier: 3 });
    expect(parseFormula("3-9")).toEqual({ kind: "range", min: 3, max: 9 });
    expect(parseFormula("47")).toEqual({ kind: "constant", value: 47 });
    expect(parseFormula(47)).toEqual({ kind: "constant", value: 47 });
    expect(parseFormula("-3")).toEqual({ kind: "constant", value: -3 });
  });

  it.each(["2D", "D", "xDy", "4-2", "-", "3-", "x-y", "7to9", "0D6", "1D6+2+3", "3-3", ""])(
    "rejects malformed formula %j",
    (formula) => {
      expect(() => parseFormula(formula)).toThrow(DiceFormulaError);
    }
  );

  it("rejects non-integer numbers", () => {
    expect(() => parseFormula(2.5)).toThrow(DiceFormulaError);
  });

  it("reports the malformed-formula code", () => {
    try {
      parseFormula("xDy");
      expect.unreachable("parseFormula should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(DiceFormulaError);
      if (error instanceof DiceFormulaError) {
        expect(error.code).toBe("MALFORMED_FORMULA");
        expect(error.details).toEqual({ formula: "xDy" });
      }
    }
  });

  it("is idempotent: the same string always yields an equivalent formula", () => {
    expect(parseFormula("3D6+2")).toEqual(parseFormula("3D6+2"));

    const first = parseFormula("2D10");
    const second = parseFormula("2D10");
    const rngA = new RNG(99);
    const rngB = new RNG(99);
    const rollsA = Array.from({ length: 50 }, () => rollFormula(first, rngA));
    const rollsB = Array.from({ length: 50 }, () => rollFormula(second, rngB));
    expect(rollsA).toEqual(rollsB);
  });
});

describe("rollFormula", () => {
  it("sums each die then adds the modifier", () => {
    const rng = new FakeRng([1, 6, 3]);
    expect(rollFormula(parseFormula("3D6+2"), rng)).toBe(12);
    expect(rng.remaining).toBe(0);
  });

  it("draws once for a range and never for a constant", () => {
    const rng = new FakeRng([7]);
    expect(roll("3-9", rng)).toBe(7);
    expect(roll("-3", rng)).toBe(-3);
    expect(roll(5, rng)).toBe(5);
    expect(rng.remaining).toBe(0);
  });

  it.each(["3D4", "d20", "D%", "2D2+3", "3-9", "47", "-3", "4D6+10"])("stays within bounds for %s", (text) => {
    const formula = parseFormula(text);
    const { min, max } = formulaBounds(formula);
    const rng = new RNG(20240);
    for (let i = 0; i < 300; i++) {
      const value = rollFormula(formula, rng);
      expect(value).toBeGreaterThanOrEqual(min);
      expect(value).toBeLessThanOrEqual(max);
    }
  });

  it("has the documented bounds", () => {
    expect(formulaBounds(parseFormula("3D4"))).toEqual({ min: 3, max: 12 });
    expect(formulaBounds(parseFormula("2D2+3"))).toEqual({ min: 5, max: 7 });
    expect(formulaBounds(parseFormula("3-9"))).toEqual({ min: 3, max: 9 });
    expect(formulaBounds(parseFormula("47"))).toEqual({ min: 47, max: 47 });
  });
});

describe("formatFormula", () => {
  it("renders each formula kind", () => {
    expect(formatFormula(parseFormula("3D6+2"))).toBe("3D6+2");
    expect(formatFormula(parseFormula("d20"))).toBe("1D20");
    expect(formatFormula(parseFormula("D%"))).toBe("1D100");
    expect(formatFormula(parseFormula("4-12"))).toBe("4-12");
    expect(formatFormula(parseFormula(-3))).toBe("-3");
  });
});
