export { loadEntityFile, loadEntityInto, loadRulesConfig, ConfigError } from './loaders.js';
export { validateEntityDefinition } from './validate.js';
export {
  validateEntitySchema,
  validateRulesSchema,
  isEntityDefinition,
  isRulesOverrides,
} from './validateSchema.js';
export { validateEntitySemantics } from './validateSemantics.js';

export type { ValidationReport } from './validate.js';
export type { SchemaResult } from './validateSchema.js';
export type { ValidationIssue } from './validateSemantics.js';
