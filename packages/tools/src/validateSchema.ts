import { readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import Ajv, { type ErrorObject, type SchemaObject } from 'ajv';
import type { EntityDefinition, RulesConfig } from '@verbforge/engine';

export type SchemaResult = {
  valid: boolean;
  errors: string[];
};

// Schemas live at the workspace root (two levels up from packages/tools/src)
const workspaceRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

function loadSchema(file: string): SchemaObject {
  const schema: SchemaObject = JSON.parse(readFileSync(join(workspaceRoot, 'schemas', file), 'utf-8'));
  return schema;
}

const ajv = new Ajv({ allErrors: true, strict: false });
const entityValidator = ajv.compile<EntityDefinition>(loadSchema('entity.schema.json'));
const rulesValidator = ajv.compile<Partial<RulesConfig>>(loadSchema('rules.schema.json'));

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => `${error.instancePath || error.schemaPath}: ${error.message}`);
}

export function isEntityDefinition(value: unknown): value is EntityDefinition {
  return entityValidator(value);
}

export function isRulesOverrides(value: unknown): value is Partial<RulesConfig> {
  return rulesValidator(value);
}

/**
 * Validates a parsed entity definition against its JSON schema
 */
export function validateEntitySchema(definition: unknown): SchemaResult {
  const valid = entityValidator(definition);
  return { valid, errors: valid ? [] : formatErrors(entityValidator.errors) };
}

/**
 * Validates rules overrides against their JSON schema
 */
export function validateRulesSchema(config: unknown): SchemaResult {
  const valid = rulesValidator(config);
  return { valid, errors: valid ? [] : formatErrors(rulesValidator.errors) };
}
