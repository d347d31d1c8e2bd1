import type { ParsedVerb, VerbKind } from "./types";

/**
 * Splits a verb at its first dot
 */
export function parseVerb(verb: string): ParsedVerb {
  const dot = verb.indexOf(".");
  if (dot < 0) {
    return { verb, base: verb, subType: null };
  }
  return { verb, base: verb.substring(0, dot), subType: verb.substring(dot + 1) };
}

/**
 * Splits a compound verb ("ATTACK.one+MENTAL.two") into its sub-verbs, in order
 */
export function splitCompound(verb: string): ParsedVerb[] {
  return verb.split("+").map((part) => parseVerb(part.trim()));
}

/**
 * Attacks are any verb whose base segment contains ATTACK
 */
export function isAttackVerb(verb: ParsedVerb): boolean {
  return verb.base.includes("ATTACK");
}

export function verbKind(verb: ParsedVerb): VerbKind {
  return isAttackVerb(verb) ? "attack" : "condition";
}

/**
 * Number of attack and condition sub-verbs
 */
export function countVerbKinds(verbs: ParsedVerb[]): Record<VerbKind, number> {
  const counts: Record<VerbKind, number> = { attack: 0, condition: 0 };
  for (const verb of verbs) {
    counts[verbKind(verb)]++;
  }
  return counts;
}
