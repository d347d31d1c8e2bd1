import { readInteger, toAttributeValue, type AttributeStore } from "../attributes";
import { roll } from "../dice";
import type { GameActor, GameObject } from "../entities";
import { ArityMismatchError } from "../errors";
import { acceptAction } from "../defense/handlers";
import { countVerbKinds, isAttackVerb } from "../verbs";
import type { ActResult, Delivery, ParsedVerb, ResolveEnv } from "../types";
import type { IRNG } from "../rng";
import type { ActionDescriptor } from "./descriptor";

/** One list slot of a modifier; undefined when the descriptor has none */
export type ModifierSlot = string | undefined;

/**
 * Expands a descriptor modifier to one slot per sub-verb of its kind.
 * Absent => empty slots, scalar => broadcast, list => positional.
 * A list of any other length is rejected.
 */
export function expandModifier(descriptor: ActionDescriptor, name: string, size: number): ModifierSlot[] {
  const value = descriptor.get(name);
  if (value === undefined || size === 0) {
    return new Array<ModifierSlot>(size).fill(undefined);
  }
  if (value.kind !== "list") {
    return new Array<ModifierSlot>(size).fill(String(value.value));
  }
  if (value.value.length !== size) {
    throw new ArityMismatchError(
      `${name} of "${descriptor.verb}" has ${value.value.length} values for ${size} sub-verbs`,
      { attribute: name, verb: descriptor.verb, values: value.value.length, expected: size }
    );
  }
  return value.value.map((slot) => (slot === "" ? undefined : slot));
}

function slotInteger(slot: ModifierSlot, name: string): number {
  return slot === undefined ? 0 : readInteger(toAttributeValue(slot), name);
}

function rollAttribute(entity: AttributeStore, name: string, rng: IRNG): number {
  const formula = entity.getFormula(name);
  return formula === undefined ? 0 : roll(formula, rng);
}

/**
 * Accuracy of an attack: action base + initiator ACCURACY + ACCURACY.<subType>
 */
export function computeAccuracy(verb: ParsedVerb, base: ModifierSlot, initiator: AttributeStore): number {
  let accuracy = slotInteger(base, "ACCURACY");
  accuracy += initiator.getInteger("ACCURACY") ?? 0;
  if (verb.subType !== null) {
    accuracy += initiator.getInteger(`ACCURACY.${verb.subType}`) ?? 0;
  }
  return accuracy;
}

/**
 * Damage of an attack: rolled action base (0 if absent) + initiator DAMAGE
 * + DAMAGE.<subType>
 */
export function computeDamage(verb: ParsedVerb, base: ModifierSlot, initiator: AttributeStore, rng: IRNG): number {
  let damage = base === undefined ? 0 : roll(base, rng);
  damage += rollAttribute(initiator, "DAMAGE", rng);
  if (verb.subType !== null) {
    damage += rollAttribute(initiator, `DAMAGE.${verb.subType}`, rng);
  }
  return damage;
}

/**
 * Power of a condition: action base + POWER.<verb> + POWER.<verb>.<subType>
 */
export function computePower(verb: ParsedVerb, base: ModifierSlot, initiator: AttributeStore): number {
  let power = slotInteger(base, "POWER");
  power += initiator.getInteger(`POWER.${verb.base}`) ?? 0;
  if (verb.subType !== null) {
    power += initiator.getInteger(`POWER.${verb.base}.${verb.subType}`) ?? 0;
  }
  return power;
}

/**
 * Stacks of a condition: rolled action base (1 if absent, unlike damage)
 * + STACKS.<verb> + STACKS.<verb>.<subType>
 */
export function computeStacks(verb: ParsedVerb, base: ModifierSlot, initiator: AttributeStore, rng: IRNG): number {
  let stacks = roll(base ?? 1, rng);
  stacks += rollAttribute(initiator, `STACKS.${verb.base}`, rng);
  if (verb.subType !== null) {
    stacks += rollAttribute(initiator, `STACKS.${verb.base}.${verb.subType}`, rng);
  }
  return stacks;
}

/**
 * Delivers an action to a target, one sub-verb at a time in declaration
 * order. Stops at the first sub-verb the target does not accept; effects of
 * the earlier ones stay applied.
 */
export function act(
  descriptor: ActionDescriptor,
  initiator: AttributeStore,
  target: GameObject,
  context: AttributeStore,
  env: ResolveEnv
): ActResult {
  const verbs = descriptor.subVerbs();
  const counts = countVerbKinds(verbs);

  // lists are checked before the first delivery
  const accuracies = expandModifier(descriptor, "ACCURACY", counts.attack);
  const damages = expandModifier(descriptor, "DAMAGE", counts.attack);
  const powers = expandModifier(descriptor, "POWER", counts.condition);
  const stacks = expandModifier(descriptor, "STACKS", counts.condition);

  const deliveries: Delivery[] = [];
  const lines: string[] = [];
  const tags: string[] = [];
  let attacks = 0;
  let conditions = 0;

  for (const verb of verbs) {
    let delivery: Delivery;
    if (isAttackVerb(verb)) {
      delivery = {
        kind: "attack",
        source: descriptor.source,
        verb,
        toHit: env.rules.baseToHit + computeAccuracy(verb, accuracies[attacks], initiator),
        hitPoints: computeDamage(verb, damages[attacks], initiator, env.rng),
      };
      attacks++;
    } else {
      delivery = {
        kind: "condition",
        source: descriptor.source,
        verb,
        toHit: env.rules.baseToHit + computePower(verb, powers[conditions], initiator),
        total: computeStacks(verb, stacks[conditions], initiator, env.rng),
      };
      conditions++;
    }
    deliveries.push(delivery);

    const outcome = acceptAction({ delivery, target, initiator, context, env });
    lines.push(outcome.description);
    tags.push(...outcome.tags);
    if (!outcome.success) {
      return { success: false, description: lines.join("\n"), tags, deliveries };
    }
  }

  return { success: true, description: lines.join("\n"), tags, deliveries };
}

/**
 * An actor initiates an action in its own context
 */
export function takeAction(
  actor: GameActor,
  descriptor: ActionDescriptor,
  target: GameObject,
  env: ResolveEnv
): ActResult {
  return act(descriptor, actor, target, actor.context ?? actor, env);
}
