import type { ActionOutcome } from "../types";
import type { DefenseChains, DefenseRequest } from "./types";
import { acceptGeneric } from "./generic";
import { acceptAttack } from "./attack";
import { acceptSearch } from "./search";
import { reactAsGuard } from "./guard";

/**
 * Registry of defense chains by entity kind, most specific handler first
 */
export const defenseChains: DefenseChains = {
  object: { handlers: [acceptGeneric], reactions: [] },
  context: { handlers: [acceptSearch, acceptGeneric], reactions: [] },
  actor: { handlers: [acceptAttack, acceptGeneric], reactions: [] },
  guard: { handlers: [acceptAttack, acceptGeneric], reactions: [reactAsGuard] },
};

/**
 * Routes a delivery through the target's chain: the first handler that
 * returns an outcome wins, then the chain's reactions run on it
 */
export function acceptAction(request: DefenseRequest): ActionOutcome {
  const chain = defenseChains[request.target.kind];

  let outcome: ActionOutcome | null = null;
  for (const handler of chain.handlers) {
    outcome = handler(request, acceptAction);
    if (outcome) break;
  }
  // Fallback to generic if every handler delegated
  let result = outcome ?? acceptGeneric(request);

  for (const reaction of chain.reactions) {
    result = reaction(request, result);
  }
  return result;
}
