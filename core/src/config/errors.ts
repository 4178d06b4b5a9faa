export class ConfigError extends Error {
  readonly code = 'config_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ConfigError';
    this.details = details;
  }
}
