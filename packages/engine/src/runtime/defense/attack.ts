import { GameActor } from "../entities";
import { deliveryTags } from "../narration";
import type { ActionOutcome } from "../types";
import type { DefenseRequest } from "./types";

/**
 * Base plus sub-type value of a defensive attribute (EVASION, PROTECTION)
 */
function getDefense(target: GameActor, attribute: string, subType: string | null): number {
  let value = target.getInteger(attribute) ?? 0;
  if (subType !== null) {
    value += target.getInteger(`${attribute}.${subType}`) ?? 0;
  }
  return value;
}

/**
 * Attack mitigation for actors:
 *   1. evasion: a percentile roll above TO_HIT - EVASION misses
 *   2. protection: absorbs up to PROTECTION points of the damage
 *   3. the rest comes off the life attribute; at 0 the actor is killed
 * Everything that is not a base ATTACK is delegated.
 */
export function acceptAttack(request: DefenseRequest): ActionOutcome | null {
  const { delivery, target, initiator, context, env } = request;
  if (delivery.kind !== "attack" || delivery.verb.base !== "ATTACK" || !(target instanceof GameActor)) {
    return null;
  }

  const { subType, verb } = delivery.verb;
  const faces = env.rules.percentileFaces;
  const tags = deliveryTags(delivery);

  const evasion = getDefense(target, "EVASION", subType);
  const chance = delivery.toHit - evasion;
  tags.push(`attack:evasion=${evasion}`);
  if (chance < faces) {
    const roll = env.rng.rollPercentile(faces);
    tags.push(`attack:roll=${roll}`);
    if (roll > chance) {
      return {
        success: false,
        description: `${target.name} evades ${delivery.source.name} ${verb}`,
        tags: [...tags, "attack:evaded=1"],
      };
    }
  }

  const protection = getDefense(target, "PROTECTION", subType);
  tags.push(`attack:protection=${protection}`);
  if (protection >= delivery.hitPoints) {
    return {
      success: false,
      description: `${target.name}'s protection absorbs all damage from ${verb}`,
      tags: [...tags, "attack:absorbed=1"],
    };
  }

  const life = env.rules.lifeAttribute;
  const damage = delivery.hitPoints - protection;
  const lifeBefore = target.getInteger(life) ?? 0;
  const lifeAfter = lifeBefore - damage;
  target.set(life, lifeAfter);

  let description =
    `${target.name} hit by ${verb} from ${initiator.name} using ${delivery.source.name}` +
    ` for ${delivery.hitPoints}-${protection} life-points in ${context.name}` +
    `\n    ${target.name} life: ${lifeBefore} - ${damage} = ${lifeAfter}`;
  tags.push(`attack:damage=${damage}`, `attack:lifeBefore=${lifeBefore}`, `attack:lifeAfter=${lifeAfter}`);

  if (lifeAfter <= 0) {
    description += ", and is killed";
    target.alive = false;
    target.incapacitated = true;
    tags.push("attack:killed=1");
  }

  return { success: true, description, tags };
}
