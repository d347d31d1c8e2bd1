import {
  DEFAULT_RULES,
  DiceFormulaError,
  parseFormula,
  splitCompound,
  type EntityDefinition,
  type RawAttribute,
  type RulesConfig,
} from '@verbforge/engine';

export type ValidationIssue = {
  type: 'error' | 'warning';
  message: string;
  path?: string;
};

const DICE_ATTRIBUTE = /^(DAMAGE|STACKS)(\.|$)/;
const INTEGER_ATTRIBUTE = /^(ACCURACY|POWER|EVASION|PROTECTION|RESISTANCE)(\.|$)/;
const INTEGER = /^-?\d+$/;

function listItems(value: RawAttribute): string[] {
  return typeof value === 'number' ? [String(value)] : value.split(',').map((item) => item.trim());
}

function isIntegerAttribute(name: string, rules: RulesConfig): boolean {
  return (
    INTEGER_ATTRIBUTE.test(name) ||
    name === rules.lifeAttribute ||
    name === rules.maxLifeAttribute ||
    name === rules.reinforcementsAttribute
  );
}

function validateActions(name: string, value: RawAttribute, path: string, issues: ValidationIssue[]): void {
  for (const entry of listItems(value)) {
    if (entry === '') {
      issues.push({ type: 'warning', message: `Empty entry in ${name}`, path });
      continue;
    }
    if (name !== 'ACTIONS') continue;

    for (const verb of splitCompound(entry)) {
      if (verb.verb === '') {
        issues.push({ type: 'error', message: `Empty sub-verb in "${entry}"`, path });
      } else if (verb.subType === '') {
        issues.push({ type: 'error', message: `Empty sub-type in "${verb.verb}"`, path });
      }
    }
  }
}

function validateAttributes(
  entity: EntityDefinition,
  path: string,
  rules: RulesConfig,
  issues: ValidationIssue[]
): void {
  for (const [name, value] of Object.entries(entity.attributes)) {
    const at = `${path}.${name}`;

    if (name === 'ACTIONS' || name === 'INTERACTIONS') {
      validateActions(name, value, at, issues);
    } else if (DICE_ATTRIBUTE.test(name)) {
      for (const item of listItems(value)) {
        // an empty list slot means "no modifier"
        if (item === '') continue;
        try {
          parseFormula(item);
        } catch (error) {
          if (!(error instanceof DiceFormulaError)) throw error;
          issues.push({ type: 'error', message: error.message, path: at });
        }
      }
    } else if (isIntegerAttribute(name, rules)) {
      for (const item of listItems(value)) {
        if (item !== '' && !INTEGER.test(item)) {
          issues.push({ type: 'error', message: `${name} must be an integer, got "${item}"`, path: at });
        }
      }
    }
  }

  const life = entity.attributes[rules.lifeAttribute];
  const max = entity.attributes[rules.maxLifeAttribute];
  if (typeof life === 'number' && typeof max === 'number' && life > max) {
    issues.push({
      type: 'warning',
      message: `${rules.lifeAttribute} ${life} exceeds ${rules.maxLifeAttribute} ${max}`,
      path: `${path}.${rules.lifeAttribute}`,
    });
  }
}

/**
 * Performs semantic validation on an entity definition
 */
export function validateEntitySemantics(
  definition: EntityDefinition,
  rules: RulesConfig = DEFAULT_RULES
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (definition.name === undefined) {
    issues.push({ type: 'warning', message: 'Entity has no NAME', path: 'name' });
  }
  validateAttributes(definition, 'attributes', rules, issues);

  const names = new Set<string>();
  definition.objects.forEach((object, index) => {
    const path = `objects[${index}]`;
    if (object.name === undefined) {
      issues.push({ type: 'warning', message: 'Owned object has no NAME', path });
    } else if (names.has(object.name)) {
      issues.push({ type: 'warning', message: `Duplicate object name: "${object.name}"`, path });
    } else {
      names.add(object.name);
    }
    validateAttributes(object, `${path}.attributes`, rules, issues);
  });

  return issues;
}
