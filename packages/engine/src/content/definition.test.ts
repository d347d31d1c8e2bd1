import { describe, it, expect } from "vitest";
import { lexLine, parseDefinition, applyDefinition, loadDefinition } from "./definition";
import { DefinitionParseError } from "../runtime/errors";
import { GameContext, GameActor } from "../runtime/entities";

const SQUARE = [
  "# the village square",
  'NAME "town square"',
  'DESCRIPTION "center of the village"',
  "ACTIONS SEARCH",
  "",
  "OBJECT",
  "NAME bench",
  "OBJECT",
  "NAME trap-door",
  "RESISTANCE.SEARCH 50   # well hidden",
  "DESCRIPTION 'hidden door'",
].join("\n");

describe("lexLine", () => {
  it("skips blank and comment lines", () => {
    expect(lexLine("")).toBeNull();
    expect(lexLine("    ")).toBeNull();
    expect(lexLine("  # note")).toBeNull();
  });

  it("splits a name from its first value token", () => {
    expect(lexLine("  DAMAGE.slash   D6+2   # comment")).toEqual({ name: "DAMAGE.slash", value: "D6+2" });
    expect(lexLine("ACTIONS ATTACK.slash,ATTACK.thrust")).toEqual({
      name: "ACTIONS",
      value: "ATTACK.slash,ATTACK.thrust",
    });
    expect(lexLine("NAME town square")).toEqual({ name: "NAME", value: "town" });
  });

  it("reads unquoted integers as numbers and quoted values as text", () => {
    expect(lexLine("POWER 25")).toEqual({ name: "POWER", value: 25 });
    expect(lexLine("EVASION -4")).toEqual({ name: "EVASION", value: -4 });
    expect(lexLine('CODE "12"')).toEqual({ name: "CODE", value: "12" });
    expect(lexLine("DESCRIPTION 'an old bench'")).toEqual({ name: "DESCRIPTION", value: "an old bench" });
  });

  it("returns a null value for a bare name", () => {
    expect(lexLine("OBJECT")).toEqual({ name: "OBJECT", value: null });
    expect(lexLine("NAME   # later")).toEqual({ name: "NAME", value: null });
  });

  it("runs an unclosed quote to the end of the line", () => {
    expect(lexLine('DESCRIPTION "no end # here')).toEqual({ name: "DESCRIPTION", value: "no end # here" });
  });
});

describe("parseDefinition", () => {
  it("builds the entity and its owned objects", () => {
    const definition = parseDefinition(SQUARE);

    expect(definition).toEqual({
      name: "town square",
      description: "center of the village",
      attributes: { ACTIONS: "SEARCH" },
      objects: [
        { name: "bench", attributes: {}, objects: [] },
        {
          name: "trap-door",
          description: "hidden door",
          attributes: { "RESISTANCE.SEARCH": 50 },
          objects: [],
        },
      ],
    });
  });

  it("rejects NAME without a value", () => {
    expect(() => parseDefinition("ACCURACY 10\nNAME")).toThrow(DefinitionParseError);
  });

  it("ignores attribute names without a value", () => {
    expect(parseDefinition("ACCURACY\nDAMAGE D4").attributes).toEqual({ DAMAGE: "D4" });
  });

  it("accepts Windows line endings", () => {
    expect(parseDefinition("NAME Hero\r\nLIFE 10\r\n")).toEqual({
      name: "Hero",
      attributes: { LIFE: 10 },
      objects: [],
    });
  });
});

describe("applyDefinition", () => {
  it("populates a context and its objects", () => {
    const local = loadDefinition(new GameContext(), SQUARE);

    expect(String(local)).toBe("town square(center of the village)");
    expect(local.getList("ACTIONS")).toEqual(["SEARCH"]);
    expect(local.objects.map((thing) => thing.name)).toEqual(["bench", "trap-door"]);
    expect(local.getObjects().map((thing) => thing.name)).toEqual(["bench"]);
    expect(local.getObjects(true).map((thing) => thing.name)).toEqual(["trap-door"]);
  });

  it("creates owned objects through the given factory", () => {
    const hero = applyDefinition(
      new GameActor(),
      parseDefinition("NAME Hero\nLIFE 10\nOBJECT\nNAME squire"),
      () => new GameActor()
    );

    expect(hero.getInteger("LIFE")).toBe(10);
    expect(hero.objects[0]).toBeInstanceOf(GameActor);
    expect(hero.objects[0].name).toBe("squire");
  });
});
