import type { RawAttribute } from "../runtime/attributes";
import { GameObject } from "../runtime/entities";
import { DefinitionParseError } from "../runtime/errors";

/**
 * An entity as written in a definition file: name, description,
 * attributes and the objects it owns (one level deep)
 */
export type EntityDefinition = {
  name?: string;
  description?: string;
  attributes: Record<string, RawAttribute>;
  objects: EntityDefinition[];
};

export type DefinitionLine = {
  name: string;
  value: RawAttribute | null;
};

const INTEGER = /^[+-]?\d+$/;
const SPACE = /\s/;

/**
 * Lexes one line into a name and an optional (possibly quoted) value.
 * Returns null for blank and comment lines.
 */
export function lexLine(line: string): DefinitionLine | null {
  const eol = line.length;
  let start = 0;
  while (start < eol && SPACE.test(line[start])) start++;

  // blank or comment line
  if (start >= eol || line[start] === "#") {
    return null;
  }

  let end = start + 1;
  while (end < eol && !SPACE.test(line[end])) end++;
  const name = line.substring(start, end);

  start = end;
  while (start < eol && SPACE.test(line[start])) start++;
  if (start >= eol || line[start] === "#") {
    return { name, value: null };
  }

  const quote = line[start];
  if (quote === '"' || quote === "'") {
    // an unclosed quote runs to the end of the line
    const close = line.indexOf(quote, start + 1);
    return { name, value: line.substring(start + 1, close < 0 ? eol : close) };
  }

  end = start + 1;
  while (end < eol && !SPACE.test(line[end])) end++;
  const token = line.substring(start, end);

  // un-quoted numbers are integers
  return { name, value: INTEGER.test(token) ? parseInt(token, 10) : token };
}

/**
 * Parses definition text. NAME and DESCRIPTION set the current entity,
 * OBJECT starts a new owned object, anything else is an attribute.
 */
export function parseDefinition(text: string): EntityDefinition {
  const root: EntityDefinition = { attributes: {}, objects: [] };
  let current = root;

  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const lexed = lexLine(line);
    if (!lexed) return;

    const { name, value } = lexed;
    switch (name) {
      case "NAME":
      case "DESCRIPTION": {
        if (value === null) {
          throw new DefinitionParseError(`${name} without a value on line ${lineNumber}`, { line: lineNumber });
        }
        if (name === "NAME") {
          current.name = String(value);
        } else {
          current.description = String(value);
        }
        break;
      }

      case "OBJECT": {
        current = { attributes: {}, objects: [] };
        root.objects.push(current);
        break;
      }

      default:
        // a name with no value sets nothing
        if (value !== null) {
          current.attributes[name] = value;
        }
    }
  });

  return root;
}

function applyFields(entity: GameObject, definition: EntityDefinition): void {
  if (definition.name !== undefined) entity.name = definition.name;
  if (definition.description !== undefined) entity.description = definition.description;
  for (const [name, value] of Object.entries(definition.attributes)) {
    entity.set(name, value);
  }
}

/**
 * Populates an entity (and its owned objects) from a definition
 */
export function applyDefinition<T extends GameObject>(
  entity: T,
  definition: EntityDefinition,
  createObject: () => GameObject = () => new GameObject()
): T {
  applyFields(entity, definition);
  for (const objectDefinition of definition.objects) {
    const thing = createObject();
    applyFields(thing, objectDefinition);
    entity.addObject(thing);
  }
  return entity;
}

/**
 * Parses text and applies it to an entity in one step
 */
export function loadDefinition<T extends GameObject>(entity: T, text: string): T {
  return applyDefinition(entity, parseDefinition(text));
}
