import type { AttributeStore } from "../attributes";
import { GameObject, type GameActor } from "../entities";
import { isAttackVerb, splitCompound } from "../verbs";
import { ActionDescriptor } from "./descriptor";

/**
 * Lists the actions a provider (weapon, spell, context ...) offers, one
 * descriptor per entry of its comma-separated ACTIONS attribute.
 *
 * For each sub-verb of a compound entry:
 * - attacks: ACCURACY = base + ACCURACY.<subType> (summed),
 *            DAMAGE = DAMAGE.<subType>, else base DAMAGE, else 0
 * - conditions: POWER = base + POWER.<verb> (summed),
 *               STACKS = STACKS.<verb>, else base STACKS, else 1
 * Dice formulas are not summed: the most specific one wins.
 */
export function possibleActions(
  provider: AttributeStore,
  _requester: AttributeStore | null,
  _context: AttributeStore | null
): ActionDescriptor[] {
  const verbs = provider.getList("ACTIONS");
  if (!verbs) {
    return [];
  }

  const baseAccuracy = provider.getInteger("ACCURACY") ?? 0;
  const baseDamage = provider.getFormula("DAMAGE");
  const basePower = provider.getInteger("POWER") ?? 0;
  const baseStacks = provider.getFormula("STACKS");

  const actions: ActionDescriptor[] = [];
  for (const compoundVerb of verbs) {
    if (compoundVerb === "") continue;

    const action = new ActionDescriptor(provider, compoundVerb);
    const accuracies: number[] = [];
    const damages: string[] = [];
    const powers: number[] = [];
    const stacks: string[] = [];

    for (const verb of splitCompound(compoundVerb)) {
      if (isAttackVerb(verb)) {
        const subAccuracy = verb.subType !== null ? provider.getInteger(`ACCURACY.${verb.subType}`) : undefined;
        const subDamage = verb.subType !== null ? provider.getFormula(`DAMAGE.${verb.subType}`) : undefined;
        accuracies.push(baseAccuracy + (subAccuracy ?? 0));
        damages.push(subDamage ?? baseDamage ?? "0");
      } else {
        powers.push(basePower + (provider.getInteger(`POWER.${verb.verb}`) ?? 0));
        stacks.push(provider.getFormula(`STACKS.${verb.verb}`) ?? baseStacks ?? "1");
      }
    }

    if (accuracies.length > 0) action.set("ACCURACY", accuracies.join(","));
    if (damages.length > 0) action.set("DAMAGE", damages.join(","));
    if (powers.length > 0) action.set("POWER", powers.join(","));
    if (stacks.length > 0) action.set("STACKS", stacks.join(","));

    actions.push(action);
  }

  return actions;
}

/**
 * Interactions another actor can have with this one: a transient object
 * whose ACTIONS are the actor's INTERACTIONS, each as a VERBAL.<verb>
 */
export function interact(actor: GameActor, requester: AttributeStore): GameObject {
  const interactions = new GameObject(`interactions w/${requester.name}`);
  const verbs = (actor.getList("INTERACTIONS") ?? []).filter((verb) => verb !== "");
  if (verbs.length > 0) {
    interactions.set("ACTIONS", verbs.map((verb) => `VERBAL.${verb}`).join(","));
  }
  return interactions;
}
