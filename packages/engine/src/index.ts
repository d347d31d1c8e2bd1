/**
 * Verbforge Engine
 * Action resolution for attacks and conditions between game entities
 * Pure library (no IO); every roll goes through an injected RNG
 */

// Main API
export { act, takeAction } from "./runtime/actions/resolver";
export { possibleActions, interact } from "./runtime/actions/capabilities";
export { takeTurn, turnHandlers } from "./runtime/actions/turns";
export { ActionDescriptor } from "./runtime/actions/descriptor";
export { acceptAction, defenseChains } from "./runtime/defense/handlers";

// Resolution steps
export {
  computeAccuracy,
  computeDamage,
  computePower,
  computeStacks,
  expandModifier,
} from "./runtime/actions/resolver";
export { acceptGeneric, getResistance } from "./runtime/defense/generic";
export { acceptAttack } from "./runtime/defense/attack";
export { acceptSearch } from "./runtime/defense/search";
export { reactAsGuard } from "./runtime/defense/guard";

// Entities and attributes
export { GameObject, GameContext, GameActor, NpcGuard } from "./runtime/entities";
export {
  AttributeStore,
  toAttributeValue,
  formatAttributeValue,
  readInteger,
  readFormula,
  readList,
} from "./runtime/attributes";
export { parseVerb, splitCompound, isAttackVerb, verbKind, countVerbKinds } from "./runtime/verbs";

// Dice and randomness
export { parseFormula, rollFormula, roll, formulaBounds, formatFormula } from "./runtime/dice";
export { RNG, createRng } from "./runtime/rng";

// Rules configuration
export { DEFAULT_RULES, resolveRulesConfig, createResolveEnv } from "./runtime/rules";

// Errors
export {
  RulesEngineError,
  DiceFormulaError,
  ArityMismatchError,
  AttributeTypeError,
  DefinitionParseError,
} from "./runtime/errors";

// Entity definitions
export { lexLine, parseDefinition, applyDefinition, loadDefinition } from "./content/definition";

// Types
export type { AttributeValue, RawAttribute } from "./runtime/attributes";
export type { DiceFormula } from "./runtime/dice";
export type { IRNG } from "./runtime/rng";
export type { RulesConfig } from "./runtime/rules";
export type { ModifierSlot } from "./runtime/actions/resolver";
export type {
  DefenseRequest,
  DefenseHandler,
  DefenseReaction,
  DefenseChain,
  DefenseChains,
  AcceptAction,
} from "./runtime/defense/types";
export type { EntityDefinition, DefinitionLine } from "./content/definition";
export type * from "./runtime/types";
