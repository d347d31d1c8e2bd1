import { AttributeTypeError } from "./errors";

/**
 * Attribute value as stored: an integer, a dice formula (or any single
 * token), or a comma-separated list
 */
export type AttributeValue =
  | { kind: "integer"; value: number }
  | { kind: "formula"; value: string }
  | { kind: "list"; value: string[] };

/**
 * What callers hand to set(): classified into an AttributeValue
 */
export type RawAttribute = number | string;

const INTEGER = /^-?\d+$/;

/**
 * Classifies a raw value
 */
export function toAttributeValue(raw: RawAttribute): AttributeValue {
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) {
      throw new AttributeTypeError(`Attribute values must be integers, got ${raw}`, { value: raw });
    }
    return { kind: "integer", value: raw };
  }
  const text = raw.trim();
  if (INTEGER.test(text)) {
    return { kind: "integer", value: parseInt(text, 10) };
  }
  if (text.includes(",")) {
    return { kind: "list", value: text.split(",").map((item) => item.trim()) };
  }
  return { kind: "formula", value: text };
}

export function formatAttributeValue(value: AttributeValue): string {
  switch (value.kind) {
    case "integer":
      return String(value.value);
    case "formula":
      return value.value;
    case "list":
      return value.value.join(",");
  }
}

/**
 * Reads a value expected to be an integer
 */
export function readInteger(value: AttributeValue, name: string): number {
  if (value.kind === "integer") {
    return value.value;
  }
  throw new AttributeTypeError(`Attribute ${name} is not an integer: "${formatAttributeValue(value)}"`, {
    attribute: name,
  });
}

/**
 * Reads a value expected to be a single formula (integers are constant formulas)
 */
export function readFormula(value: AttributeValue, name: string): string {
  if (value.kind === "list") {
    throw new AttributeTypeError(`Attribute ${name} is a list, expected a formula: "${formatAttributeValue(value)}"`, {
      attribute: name,
    });
  }
  return String(value.value);
}

/**
 * Reads a value as a list; scalars become one-element lists
 */
export function readList(value: AttributeValue): string[] {
  return value.kind === "list" ? [...value.value] : [String(value.value)];
}

/**
 * Named container of attributes.
 * Keys are dot-segmented by convention ("RESISTANCE.ATTACK.slash"); no
 * structure is enforced here. set() always overwrites.
 */
export class AttributeStore {
  name: string;
  description?: string;
  protected readonly attributes = new Map<string, AttributeValue>();

  constructor(name: string, description?: string) {
    this.name = name;
    this.description = description;
  }

  get(name: string): AttributeValue | undefined {
    return this.attributes.get(name);
  }

  set(name: string, value: RawAttribute | AttributeValue): void {
    this.attributes.set(name, typeof value === "object" ? value : toAttributeValue(value));
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  getInteger(name: string): number | undefined {
    const value = this.get(name);
    return value === undefined ? undefined : readInteger(value, name);
  }

  getFormula(name: string): string | undefined {
    const value = this.get(name);
    return value === undefined ? undefined : readFormula(value, name);
  }

  getList(name: string): string[] | undefined {
    const value = this.get(name);
    return value === undefined ? undefined : readList(value);
  }

  /**
   * Value as originally written: integers as numbers, everything else as text
   */
  getRaw(name: string): RawAttribute | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value.kind === "integer" ? value.value : formatAttributeValue(value);
  }

  /**
   * Locally stored attributes only
   */
  entries(): Array<[string, AttributeValue]> {
    return [...this.attributes.entries()];
  }

  toString(): string {
    return this.description === undefined ? this.name : `${this.name}(${this.description})`;
  }
}
