import { deliveryTags, describeDelivery } from "../narration";
import type { ActionOutcome } from "../types";
import type { DefenseRequest } from "./types";

/**
 * Sums base, verb and sub-type resistance ("RESISTANCE", "RESISTANCE.<verb>",
 * "RESISTANCE.<verb>.<subType>")
 */
export function getResistance(request: DefenseRequest): number {
  const { target, delivery } = request;
  const { base, subType } = delivery.verb;

  let resistance = target.getInteger("RESISTANCE") ?? 0;
  resistance += target.getInteger(`RESISTANCE.${base}`) ?? 0;
  if (subType !== null) {
    resistance += target.getInteger(`RESISTANCE.${base}.${subType}`) ?? 0;
  }
  return resistance;
}

/**
 * Generic handler, accepts any verb: each stack is resisted independently
 * and the ones that get through are added to the attribute named after the verb
 */
export function acceptGeneric(request: DefenseRequest): ActionOutcome {
  const { delivery, target, initiator, context, env } = request;
  const verb = delivery.verb.verb;

  const resistance = getResistance(request);
  const power = delivery.toHit - resistance;
  const tags = [...deliveryTags(delivery), `defense:resistance=${resistance}`, `defense:power=${power}`];

  if (power <= 0) {
    return {
      success: false,
      description: `${target.name} resists ${delivery.source.name} ${verb}`,
      tags: [...tags, "defense:resisted=1"],
    };
  }

  // attacks reaching this handler count as a single stack
  const total = delivery.kind === "condition" ? delivery.total : 1;
  const incoming = Math.abs(total);
  let received = 0;
  for (let i = 0; i < incoming; i++) {
    const roll = env.rng.rollPercentile(env.rules.percentileFaces);
    if (roll <= power) {
      received++;
    }
  }

  const sign = total > 0 ? 1 : -1;
  if (received > 0) {
    const have = target.getInteger(verb) ?? 0;
    let updated = have + sign * received;
    // the life attribute cannot be raised beyond its maximum
    if (verb === env.rules.lifeAttribute) {
      const max = target.getInteger(env.rules.maxLifeAttribute);
      if (max !== undefined && updated > max) {
        updated = max;
      }
    }
    target.set(verb, updated);
    tags.push(`defense:${verb}=${updated}`);
  }

  const label = sign > 0 ? describeDelivery(delivery) : `(negative) ${describeDelivery(delivery)}`;
  return {
    success: received > 0,
    description:
      `${target.name} resists ${incoming - received}/${incoming} stacks of ${label}` +
      ` from ${initiator.name} in ${context.name}`,
    tags: [...tags, `defense:stacks:incoming=${incoming}`, `defense:stacks:received=${received}`],
  };
}
