import { AttributeStore } from "../attributes";
import { splitCompound } from "../verbs";
import type { ParsedVerb } from "../types";

/**
 * A requested action: the enabling source, a verb (simple, sub-typed or
 * "+"-compound) and its modifiers (ACCURACY, DAMAGE, POWER, STACKS), each
 * either one value for every sub-verb or a comma list with one value per
 * sub-verb of its kind.
 *
 * The descriptor is not modified while it is resolved; the computed
 * TO_HIT / HIT_POINTS / TOTAL values travel in Delivery objects.
 */
export class ActionDescriptor extends AttributeStore {
  readonly source: AttributeStore;
  readonly verb: string;

  constructor(source: AttributeStore, verb: string) {
    super(verb);
    this.source = source;
    this.verb = verb;

    // non-attacks automatically have STACKS=1
    if (!verb.includes("ATTACK")) {
      this.set("STACKS", 1);
    }
  }

  subVerbs(): ParsedVerb[] {
    return splitCompound(this.verb);
  }

  override toString(): string {
    const show = (name: string) => String(this.getRaw(name) ?? "none");
    if (this.verb.includes("ATTACK")) {
      return `${this.verb} (ACCURACY=${show("ACCURACY")}%, DAMAGE=${show("DAMAGE")})`;
    }
    return `${this.verb} (POWER=${show("POWER")}%, STACKS=${show("STACKS")})`;
  }
}
