export class DeclarationLoadError extends Error {
  readonly code = 'declaration_load_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'DeclarationLoadError';
    this.details = details;
  }
}

export class DeclarationValidationError extends Error {
  readonly code = 'declaration_schema_invalid';
  readonly ajvErrors: unknown[];

  constructor(message: string, ajvErrors: unknown[] = []) {
    super(message);
    this.name = 'DeclarationValidationError';
    this.ajvErrors = ajvErrors;
  }
}
