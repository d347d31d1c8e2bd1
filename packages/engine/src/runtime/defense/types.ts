import type { AttributeStore } from "../attributes";
import type { GameObject } from "../entities";
import type { ActionOutcome, Delivery, EntityKind, ResolveEnv } from "../types";

/**
 * One delivery arriving at a target
 */
export type DefenseRequest = {
  delivery: Delivery;
  target: GameObject;
  initiator: AttributeStore;
  context: AttributeStore;
  env: ResolveEnv;
};

/**
 * Dispatches a request through the target's chain
 */
export type AcceptAction = (request: DefenseRequest) => ActionOutcome;

/**
 * Returns a final outcome, or null to delegate to the next handler
 */
export type DefenseHandler = (request: DefenseRequest, accept: AcceptAction) => ActionOutcome | null;

/**
 * Runs after the chain produced an outcome and may extend it
 */
export type DefenseReaction = (request: DefenseRequest, outcome: ActionOutcome) => ActionOutcome;

export type DefenseChain = {
  handlers: DefenseHandler[];
  reactions: DefenseReaction[];
};

export type DefenseChains = Record<EntityKind, DefenseChain>;
