import type { RawAttribute } from "../attributes";
import { GameActor, GameContext, GameObject } from "../entities";
import { createResolveEnv } from "../rules";
import type { IRNG } from "../rng";
import type { ResolveEnv } from "../types";
import { FakeRng } from "./fakeRng";

/**
 * Creates a test actor with the given attributes
 */
export function makeTestActor(name: string = "Test Actor", attributes: Record<string, RawAttribute> = {}): GameActor {
  const actor = new GameActor(name);
  for (const [key, value] of Object.entries(attributes)) {
    actor.set(key, value);
  }
  return actor;
}

export function makeTestObject(name: string = "test-object", attributes: Record<string, RawAttribute> = {}): GameObject {
  const thing = new GameObject(name);
  for (const [key, value] of Object.entries(attributes)) {
    thing.set(key, value);
  }
  return thing;
}

export function makeTestContext(name: string = "unit-test", parent: GameContext | null = null): GameContext {
  return new GameContext(name, undefined, parent);
}

/**
 * Resolve env over scripted rolls (or any IRNG)
 */
export function makeTestEnv(rolls: number[] | IRNG = []): ResolveEnv {
  return createResolveEnv({ rng: Array.isArray(rolls) ? new FakeRng(rolls) : rolls });
}
