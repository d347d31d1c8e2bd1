import { DEFAULT_RULES, type RulesConfig } from '@verbforge/engine';
import { loadEntityFile, loadRulesConfig } from './loaders.js';
import { validateEntityDefinition } from './validate.js';

/**
 * Validates entity definition files (schema + semantics)
 *
 * usage: validate-entity [--rules rules.json] <file>...
 */
function parseArgs(argv: string[]): { files: string[]; rulesPath?: string } {
  const files: string[] = [];
  let rulesPath: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--rules') {
      rulesPath = argv[++i];
    } else {
      files.push(argv[i]);
    }
  }
  return { files, rulesPath };
}

function validateFile(path: string, rules: RulesConfig): { errors: number; warnings: number } {
  console.log(`\n📄 Validating entity: ${path}`);
  const definition = loadEntityFile(path);
  console.log(`   Name: ${definition.name ?? 'N/A'}`);
  console.log(`   Owned objects: ${definition.objects.length}`);

  const report = validateEntityDefinition(definition, rules);
  for (const error of report.schemaErrors) {
    console.error(`   ❌ ${error}`);
  }

  const errors = report.issues.filter((issue) => issue.type === 'error');
  const warnings = report.issues.filter((issue) => issue.type === 'warning');
  for (const error of errors) {
    const pathStr = error.path ? ` (${error.path})` : '';
    console.error(`   ❌ ${error.message}${pathStr}`);
  }
  for (const warning of warnings) {
    const pathStr = warning.path ? ` (${warning.path})` : '';
    console.warn(`   ⚠️  ${warning.message}${pathStr}`);
  }
  if (report.valid && warnings.length === 0) {
    console.log('   ✅ Passed');
  }

  return { errors: report.schemaErrors.length + errors.length, warnings: warnings.length };
}

function main(argv: string[]): number {
  const { files, rulesPath } = parseArgs(argv);
  if (files.length === 0) {
    console.error('usage: validate-entity [--rules rules.json] <file>...');
    return 1;
  }

  let errors = 0;
  let warnings = 0;
  try {
    const rules = rulesPath ? loadRulesConfig(rulesPath) : DEFAULT_RULES;
    if (rulesPath) {
      console.log(`Loaded rules from: ${rulesPath}`);
    }
    for (const file of files) {
      const result = validateFile(file, rules);
      errors += result.errors;
      warnings += result.warnings;
    }
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Validation error:', error.message);
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error('❌ Validation error:', error);
    }
    return 1;
  }

  console.log('');
  if (errors > 0) {
    console.error(`❌ Validation failed with ${errors} error(s)`);
    return 1;
  }
  if (warnings > 0) {
    console.warn(`⚠️  Validation passed with ${warnings} warning(s)`);
  } else {
    console.log('✅ All validations passed!');
  }
  return 0;
}

process.exitCode = main(process.argv.slice(2));
