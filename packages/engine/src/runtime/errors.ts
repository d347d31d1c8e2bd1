// Error types raised by the rules engine

export class RulesEngineError extends Error {
  code = "RULES_ENGINE_ERROR";
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/**
 * A dice formula that cannot be parsed
 */
export class DiceFormulaError extends RulesEngineError {
  code = "MALFORMED_FORMULA";
}

/**
 * A list-valued modifier whose length does not match its sub-verbs
 */
export class ArityMismatchError extends RulesEngineError {
  code = "ARITY_MISMATCH";
}

/**
 * An attribute read as an integer holds something else
 */
export class AttributeTypeError extends RulesEngineError {
  code = "ATTRIBUTE_TYPE";
}

export class DefinitionParseError extends RulesEngineError {
  code = "DEFINITION_PARSE";
}
