import type { ActionOutcome, Delivery } from "./types";

/**
 * Verb label used in result text, e.g. "ATTACK.slash (TO_HIT=110, DAMAGE=4)"
 */
export function describeDelivery(delivery: Delivery): string {
  if (delivery.kind === "attack") {
    return `${delivery.verb.verb} (TO_HIT=${delivery.toHit}, DAMAGE=${delivery.hitPoints})`;
  }
  return `${delivery.verb.verb} (TO_HIT=${delivery.toHit}, STACKS=${delivery.total})`;
}

/**
 * Tags every defense outcome starts with
 */
export function deliveryTags(delivery: Delivery): string[] {
  const tags = [`action:verb=${delivery.verb.verb}`, `action:toHit=${delivery.toHit}`];
  if (delivery.kind === "attack") {
    tags.push(`action:hitPoints=${delivery.hitPoints}`);
  } else {
    tags.push(`action:total=${delivery.total}`);
  }
  return tags;
}

/**
 * Appends an indented follow-up line to an outcome (immutable)
 */
export function appendLine(outcome: ActionOutcome, line: string, tags: string[] = []): ActionOutcome {
  return {
    ...outcome,
    description: `${outcome.description}\n    ${line}`,
    tags: [...outcome.tags, ...tags],
  };
}
