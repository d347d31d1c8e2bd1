import { DEFAULT_RULES, type RulesConfig } from '@verbforge/engine';
import { isEntityDefinition, validateEntitySchema } from './validateSchema.js';
import { validateEntitySemantics, type ValidationIssue } from './validateSemantics.js';

export type ValidationReport = {
  valid: boolean;
  schemaErrors: string[];
  issues: ValidationIssue[];
};

/**
 * Schema validation, then semantic validation when the shape is sound.
 * Warnings do not make a definition invalid.
 */
export function validateEntityDefinition(definition: unknown, rules: RulesConfig = DEFAULT_RULES): ValidationReport {
  const schema = validateEntitySchema(definition);
  if (!isEntityDefinition(definition)) {
    return { valid: false, schemaErrors: schema.errors, issues: [] };
  }

  const issues = validateEntitySemantics(definition, rules);
  return {
    valid: !issues.some((issue) => issue.type === 'error'),
    schemaErrors: [],
    issues,
  };
}
