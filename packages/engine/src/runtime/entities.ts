import { AttributeStore, type AttributeValue } from "./attributes";
import { DEFAULT_RULES, type RulesConfig } from "./rules";
import type { EntityKind } from "./types";

/**
 * Base for all objects and actors: owns other objects, offers actions
 * (ACTIONS attribute) and receives them through its kind's defense chain
 */
export class GameObject extends AttributeStore {
  readonly kind: EntityKind = "object";
  readonly objects: GameObject[] = [];

  constructor(name: string = "object", description?: string) {
    super(name, description);
  }

  addObject(item: GameObject): void {
    if (!this.objects.includes(item)) {
      this.objects.push(item);
    }
  }

  /**
   * First owned object whose name contains the given text
   */
  getObject(name: string): GameObject | null {
    return this.objects.find((thing) => thing.name.includes(name)) ?? null;
  }

  /**
   * Owned objects, split by concealment:
   * concealed = RESISTANCE.SEARCH > 0, found = SEARCH > 0
   */
  getObjects(hidden: boolean = false): GameObject[] {
    return this.objects.filter((thing) => {
      const concealed = (thing.getInteger("RESISTANCE.SEARCH") ?? 0) > 0;
      const found = (thing.getInteger("SEARCH") ?? 0) > 0;
      return hidden ? concealed && !found : found || !concealed;
    });
  }
}

/**
 * A location (kingdom, village, room ...). Attribute lookups that miss
 * locally continue up the parent chain; writes stay local.
 * The parent chain must be acyclic.
 */
export class GameContext extends GameObject {
  override readonly kind: EntityKind = "context";
  parent: GameContext | null;
  private readonly party: GameActor[] = [];
  private readonly npcs: GameActor[] = [];

  constructor(name: string = "context", description?: string, parent: GameContext | null = null) {
    super(name, description);
    this.parent = parent;
  }

  override get(name: string): AttributeValue | undefined {
    return super.get(name) ?? this.parent?.get(name);
  }

  getParty(): GameActor[] {
    return this.party;
  }

  addMember(member: GameActor): void {
    if (!this.party.includes(member)) {
      this.party.push(member);
    }
  }

  getNpcs(): GameActor[] {
    return this.npcs;
  }

  addNpc(npc: GameActor): void {
    if (!this.npcs.includes(npc)) {
      this.npcs.push(npc);
    }
  }
}

/**
 * A PC or NPC: has a context and can initiate and receive actions
 */
export class GameActor extends GameObject {
  override readonly kind: EntityKind = "actor";
  context: GameContext | null = null;
  alive = true;
  incapacitated = false;

  constructor(name: string = "actor", description?: string) {
    super(name, description);
  }

  setContext(context: GameContext | null): void {
    this.context = context;
  }

  /**
   * Still standing: not killed and with life left
   */
  hasLife(lifeAttribute: string): boolean {
    return this.alive && (this.getInteger(lifeAttribute) ?? 0) > 0;
  }
}

/**
 * Low-level NPC fighter: counter-attacks whoever attacks it and can call
 * for reinforcements once
 */
export class NpcGuard extends GameActor {
  override readonly kind: EntityKind = "guard";
  readonly weapon: GameObject;
  /** Actor to counter-attack on the next turn */
  target: GameObject | null = null;
  helpArrived = false;

  constructor(name: string = "guard", description?: string, rules: RulesConfig = DEFAULT_RULES) {
    super(name, description);

    // defaults, easily changed after construction
    this.set(rules.maxLifeAttribute, 16);
    this.set(rules.lifeAttribute, 16);
    this.set("ACCURACY", 10);
    this.set("EVASION", 40);
    this.set("EVASION.slash", 20);
    this.set("PROTECTION", 2);
    this.set(rules.reinforcementsAttribute, 0);

    this.weapon = new GameObject("sword");
    this.weapon.set("ACTIONS", "ATTACK.slash");
    this.weapon.set("DAMAGE.slash", "D6");
  }
}
