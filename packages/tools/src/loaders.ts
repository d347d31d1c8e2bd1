import { readFileSync } from 'fs';
import {
  RulesEngineError,
  applyDefinition,
  parseDefinition,
  resolveRulesConfig,
  type EntityDefinition,
  type GameObject,
  type RulesConfig,
} from '@verbforge/engine';
import { isRulesOverrides, validateRulesSchema } from './validateSchema.js';

/**
 * A configuration file that does not match its schema
 */
export class ConfigError extends RulesEngineError {
  code = 'INVALID_CONFIG';
}

/**
 * Reads and parses an entity definition file
 */
export function loadEntityFile(path: string): EntityDefinition {
  return parseDefinition(readFileSync(path, 'utf-8'));
}

/**
 * Reads a definition file into an existing entity (and its owned objects)
 */
export function loadEntityInto<T extends GameObject>(path: string, entity: T, createObject?: () => GameObject): T {
  return applyDefinition(entity, loadEntityFile(path), createObject);
}

/**
 * Reads rules overrides from a JSON file and merges them over the defaults
 */
export function loadRulesConfig(path: string): RulesConfig {
  const config: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isRulesOverrides(config)) {
    const { errors } = validateRulesSchema(config);
    throw new ConfigError(`Invalid rules configuration in ${path}`, { path, errors });
  }
  return resolveRulesConfig(config);
}
