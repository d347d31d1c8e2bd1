// Runtime types shared by the resolver, capability provider and defense chain

import type { AttributeStore } from "./attributes";
import type { IRNG } from "./rng";
import type { RulesConfig } from "./rules";

/* ---------------------------------- */
/* Verbs                               */
/* ---------------------------------- */

/**
 * One verb token split at its first dot:
 * "ATTACK.slash" => base "ATTACK", subType "slash"
 */
export type ParsedVerb = {
  verb: string;
  base: string;
  subType: string | null;
};

export type VerbKind = "attack" | "condition";

/* ---------------------------------- */
/* Entities                            */
/* ---------------------------------- */

/**
 * Selects the defense handler chain and turn behavior of an entity
 */
export type EntityKind = "object" | "context" | "actor" | "guard";

/* ---------------------------------- */
/* Deliveries and outcomes             */
/* ---------------------------------- */

type DeliveryBase = {
  /** Object, weapon or spell enabling the action */
  source: AttributeStore;
  verb: ParsedVerb;
  toHit: number;
};

/**
 * Immutable per-sub-verb view handed to the target
 */
export type Delivery =
  | (DeliveryBase & { kind: "attack"; hitPoints: number })
  | (DeliveryBase & { kind: "condition"; total: number });

/**
 * Result of every resolver operation.
 * Tags carry the computed values as "key=value" strings.
 */
export type ActionOutcome = {
  success: boolean;
  description: string;
  tags: string[];
};

export type ActResult = ActionOutcome & {
  /** Every sub-verb that was delivered, in order */
  deliveries: Delivery[];
};

/**
 * Random source and rules threaded through every resolution
 */
export type ResolveEnv = {
  rng: IRNG;
  rules: RulesConfig;
};
