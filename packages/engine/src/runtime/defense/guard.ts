import { GameContext, GameObject, NpcGuard } from "../entities";
import { appendLine } from "../narration";
import type { ActionOutcome } from "../types";
import type { DefenseRequest } from "./types";

/**
 * Guard reaction after the actor response: a guard that survives an ATTACK
 * marks the attacker for its next turn and may call for reinforcements
 * (percentage in the reinforcements attribute) until help has arrived once
 */
export function reactAsGuard(request: DefenseRequest, outcome: ActionOutcome): ActionOutcome {
  const { delivery, target, initiator, context, env } = request;
  if (!(target instanceof NpcGuard)) {
    return outcome;
  }

  // remember where this is happening
  if (context instanceof GameContext) {
    target.setContext(context);
  }

  if (delivery.verb.base !== "ATTACK" || !target.hasLife(env.rules.lifeAttribute)) {
    return outcome;
  }
  // only an object can be counter-attacked
  if (!(initiator instanceof GameObject)) {
    return outcome;
  }
  target.target = initiator;

  const chance = target.getInteger(env.rules.reinforcementsAttribute) ?? 0;
  if (chance <= 0 || target.helpArrived) {
    return outcome;
  }

  const called = appendLine(outcome, `${target.name} calls for help`);
  const roll = env.rng.rollPercentile(env.rules.percentileFaces);
  const tags = [...called.tags, `guard:helpRoll=${roll}`];
  if (roll > chance || !(context instanceof GameContext)) {
    return { ...called, tags };
  }

  const helper = new NpcGuard(`${target.name} reinforcement`, "reinforcement", env.rules);
  helper.target = target.target;
  helper.setContext(context);
  context.addNpc(helper);
  target.helpArrived = true;

  return {
    ...called,
    description: `${called.description}, and ${helper.name} arrives`,
    tags: [...tags, `guard:reinforcement=${helper.name}`],
  };
}
