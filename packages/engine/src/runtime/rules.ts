import { RNG, createRng, type IRNG } from "./rng";
import type { ResolveEnv } from "./types";

/**
 * Tunable constants of the resolution rules
 */
export type RulesConfig = {
  /** Attribute reduced by attacks */
  lifeAttribute: string;
  /** Upper bound for lifeAttribute when conditions raise it */
  maxLifeAttribute: string;
  /** Added to accuracy or power to form TO_HIT */
  baseToHit: number;
  /** Faces of the probability die */
  percentileFaces: number;
  /** NPC percentage chance of summoning help */
  reinforcementsAttribute: string;
};

export const DEFAULT_RULES: RulesConfig = {
  lifeAttribute: "LIFE",
  maxLifeAttribute: "HP",
  baseToHit: 100,
  percentileFaces: 100,
  reinforcementsAttribute: "reinforcements",
};

/**
 * Merges overrides over the defaults; overrides win
 */
export function resolveRulesConfig(overrides?: Partial<RulesConfig>): RulesConfig {
  const result: RulesConfig = { ...DEFAULT_RULES };
  if (overrides) {
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(result, { [key]: value });
      }
    }
  }
  return result;
}

export function createResolveEnv(options?: {
  seed?: number;
  rng?: IRNG;
  rules?: Partial<RulesConfig>;
}): ResolveEnv {
  const rng = options?.rng ?? (options?.seed !== undefined ? new RNG(options.seed) : createRng());
  return { rng, rules: resolveRulesConfig(options?.rules) };
}
