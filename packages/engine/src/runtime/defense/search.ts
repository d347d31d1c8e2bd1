import { GameContext } from "../entities";
import type { ActionOutcome } from "../types";
import type { AcceptAction, DefenseRequest } from "./types";

/**
 * A context passes SEARCH on to every concealed object it owns
 * (RESISTANCE.SEARCH > 0); it succeeds when any of them is found
 */
export function acceptSearch(request: DefenseRequest, accept: AcceptAction): ActionOutcome | null {
  const { delivery, target } = request;
  if (delivery.verb.verb !== "SEARCH" || !(target instanceof GameContext)) {
    return null;
  }

  let found = false;
  const lines: string[] = [];
  const tags: string[] = [];
  for (const thing of target.objects) {
    if ((thing.getInteger("RESISTANCE.SEARCH") ?? 0) <= 0) continue;

    const outcome = accept({ ...request, target: thing });
    if (outcome.success) {
      found = true;
      tags.push(`search:found=${thing.name}`);
    }
    lines.push(outcome.description);
    tags.push(...outcome.tags);
  }

  if (lines.length === 0) {
    return { success: false, description: `${target.name} hides nothing`, tags: ["search:hidden=0"] };
  }
  return { success: found, description: lines.join("\n    "), tags };
}
