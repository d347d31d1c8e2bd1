import { describe, it, expect } from "vitest";
import { parseVerb, splitCompound, isAttackVerb, countVerbKinds } from "./verbs";

describe("parseVerb", () => {
  it("splits at the first dot only", () => {
    expect(parseVerb("SEARCH")).toEqual({ verb: "SEARCH", base: "SEARCH", subType: null });
    expect(parseVerb("ATTACK.slash")).toEqual({ verb: "ATTACK.slash", base: "ATTACK", subType: "slash" });
    expect(parseVerb("MENTAL.fear.deep")).toEqual({ verb: "MENTAL.fear.deep", base: "MENTAL", subType: "fear.deep" });
  });
});

describe("splitCompound", () => {
  it("keeps declaration order", () => {
    expect(splitCompound("ATTACK.one + MENTAL.two").map((verb) => verb.verb)).toEqual(["ATTACK.one", "MENTAL.two"]);
  });

  it("counts attacks by their base segment", () => {
    const verbs = splitCompound("ATTACK.one+SNEAKATTACK+MENTAL.ATTACK");
    expect(verbs.map(isAttackVerb)).toEqual([true, true, false]);
    expect(countVerbKinds(verbs)).toEqual({ attack: 2, condition: 1 });
  });
});
