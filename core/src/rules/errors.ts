export class RuleDeclarationError extends Error {
  readonly code = 'rule_declaration_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'RuleDeclarationError';
    this.details = details;
  }
}
