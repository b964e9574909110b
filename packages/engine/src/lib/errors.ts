export class TesseraError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'TesseraError';
  }
}

/**
 * Malformed directive arguments, widget references, expressions or template structure.
 */
export class TemplateSyntaxError extends TesseraError {
  constructor(message = 'Invalid template syntax', details?: unknown) {
    super(message, 'TEMPLATE_SYNTAX', details);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * A widget reference names an alias that no `load_widgets` directive has loaded.
 */
export class ConfigurationError extends TesseraError {
  constructor(message = 'Invalid widget configuration', details?: unknown) {
    super(message, 'CONFIGURATION', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * None of the candidate block names exist in the active registry.
 */
export class BlockLookupError extends TesseraError {
  constructor(message = 'Block not found', details?: unknown) {
    super(message, 'BLOCK_LOOKUP', details);
    this.name = 'LookupError';
  }
}

export class TemplateNotFoundError extends TesseraError {
  constructor(message = 'Template not found', details?: unknown) {
    super(message, 'TEMPLATE_NOT_FOUND', details);
    this.name = 'TemplateNotFoundError';
  }
}

export class VariableLookupError extends TesseraError {
  constructor(message = 'Variable not found', details?: unknown) {
    super(message, 'VARIABLE_LOOKUP', details);
    this.name = 'VariableLookupError';
  }
}

export class ScopeError extends TesseraError {
  constructor(message = 'Scope stack underflow', details?: unknown) {
    super(message, 'SCOPE', details);
    this.name = 'ScopeError';
  }
}
