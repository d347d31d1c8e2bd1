import { GameActor, NpcGuard, type GameObject } from "../entities";
import type { ActionOutcome, EntityKind, ResolveEnv } from "../types";
import { possibleActions } from "./capabilities";
import { takeAction } from "./resolver";
import { isAttackVerb } from "../verbs";

/**
 * Turn handler function type
 */
type TurnHandler = (entity: GameObject, env: ResolveEnv) => ActionOutcome;

const idleTurn: TurnHandler = (entity) => ({
  success: true,
  description: `${entity.name} takes no action`,
  tags: ["turn:idle=1"],
});

/**
 * A guard with a marked target attacks it with a random weapon attack
 */
const guardTurn: TurnHandler = (entity, env) => {
  if (!(entity instanceof NpcGuard)) {
    return idleTurn(entity, env);
  }
  if (entity.incapacitated || !entity.hasLife(env.rules.lifeAttribute)) {
    return { success: false, description: `${entity.name} is incapacitated`, tags: ["turn:incapacitated=1"] };
  }

  const target = entity.target;
  if (target === null) {
    return idleTurn(entity, env);
  }
  if (target instanceof GameActor && !target.alive) {
    // nothing left to fight
    entity.target = null;
    return idleTurn(entity, env);
  }

  const weapon = entity.weapon;
  const actions = possibleActions(weapon, target, entity.context).filter((action) =>
    action.subVerbs().some(isAttackVerb)
  );
  if (actions.length === 0) {
    return idleTurn(entity, env);
  }
  const attack = actions.length === 1 ? actions[0] : actions[env.rng.nextInt(0, actions.length - 1)];

  const result = takeAction(entity, attack, target, env);
  return {
    success: result.success,
    description: `${entity.name} uses ${weapon.name} to ${attack.verb} ${target.name}\n    ${result.description}`,
    tags: [`turn:action=${attack.verb}`, ...result.tags],
  };
};

/**
 * Registry of turn handlers by entity kind
 */
export const turnHandlers: Record<EntityKind, TurnHandler> = {
  object: idleTurn,
  context: idleTurn,
  actor: idleTurn,
  guard: guardTurn,
};

/**
 * Advances one entity's turn
 */
export function takeTurn(entity: GameObject, env: ResolveEnv): ActionOutcome {
  return turnHandlers[entity.kind](entity, env);
}
