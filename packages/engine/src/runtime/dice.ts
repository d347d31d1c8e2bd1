import type { IRNG } from "./rng";
import { DiceFormulaError } from "./errors";

/**
 * A parsed dice formula:
 * - dice: "NdM+K" (N omitted means 1, M of "%" means 100)
 * - range: "A-B" with A < B
 * - constant: "K" or -K
 */
export type DiceFormula =
  | { kind: "dice"; count: number; faces: number; modifier: number }
  | { kind: "range"; min: number; max: number }
  | { kind: "constant"; value: number };

const INTEGER = /^-?\d+$/;

function malformed(expr: string, reason: string): DiceFormulaError {
  return new DiceFormulaError(`malformed formula "${expr}": ${reason}`, { formula: expr });
}

function toInteger(expr: string, text: string): number {
  if (!INTEGER.test(text)) {
    throw malformed(expr, `non-numeric value "${text}"`);
  }
  return parseInt(text, 10);
}

/**
 * Parses a formula string (or integer) into a DiceFormula
 */
export function parseFormula(expr: string | number): DiceFormula {
  if (typeof expr === "number") {
    if (!Number.isInteger(expr)) {
      throw new DiceFormulaError(`malformed formula: ${expr} is not an integer`, { formula: expr });
    }
    return { kind: "constant", value: expr };
  }
  if (typeof expr !== "string") {
    throw new DiceFormulaError("malformed formula: not a string", { formula: String(expr) });
  }

  if (INTEGER.test(expr)) {
    return { kind: "constant", value: parseInt(expr, 10) };
  }

  // Delimiter precedence: D, then d, then -
  const delimiter = expr.includes("D") ? "D" : expr.includes("d") ? "d" : expr.includes("-") ? "-" : null;
  if (delimiter === null) {
    throw malformed(expr, "no D, d or - delimiter");
  }

  const operands = expr.split(delimiter);
  if (operands.length !== 2) {
    throw malformed(expr, `expected 2 operands around "${delimiter}", got ${operands.length}`);
  }
  const [left, right] = operands;

  if (delimiter === "-") {
    const min = toInteger(expr, left);
    const max = toInteger(expr, right);
    if (min >= max) {
      throw malformed(expr, `range minimum ${min} is not below maximum ${max}`);
    }
    return { kind: "range", min, max };
  }

  const count = left === "" ? 1 : toInteger(expr, left);

  const plusParts = right.split("+");
  if (plusParts.length > 2) {
    throw malformed(expr, "more than one + modifier");
  }
  const [facesText, modifierText = "0"] = plusParts;
  const faces = facesText === "%" ? 100 : toInteger(expr, facesText);
  const modifier = toInteger(expr, modifierText);

  if (count < 1 || faces < 1) {
    throw malformed(expr, "dice count and faces must be positive");
  }

  return { kind: "dice", count, faces, modifier };
}

/**
 * Rolls a parsed formula
 */
export function rollFormula(formula: DiceFormula, rng: IRNG): number {
  switch (formula.kind) {
    case "dice": {
      let total = 0;
      for (let i = 0; i < formula.count; i++) {
        total += rng.nextInt(1, formula.faces);
      }
      return total + formula.modifier;
    }

    case "range":
      return rng.nextInt(formula.min, formula.max);

    case "constant":
      return formula.value;
  }
}

/**
 * Parses and rolls in one step
 */
export function roll(expr: string | number, rng: IRNG): number {
  return rollFormula(parseFormula(expr), rng);
}

/**
 * Lowest and highest values a formula can roll
 */
export function formulaBounds(formula: DiceFormula): { min: number; max: number } {
  switch (formula.kind) {
    case "dice":
      return {
        min: formula.count + formula.modifier,
        max: formula.count * formula.faces + formula.modifier,
      };
    case "range":
      return { min: formula.min, max: formula.max };
    case "constant":
      return { min: formula.value, max: formula.value };
  }
}

export function formatFormula(formula: DiceFormula): string {
  switch (formula.kind) {
    case "dice":
      return `${formula.count}D${formula.faces}${formula.modifier !== 0 ? `+${formula.modifier}` : ""}`;
    case "range":
      return `${formula.min}-${formula.max}`;
    case "constant":
      return String(formula.value);
  }
}
