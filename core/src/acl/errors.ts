export class AuthorizationError extends Error {
  readonly code: string = 'authorization_error';
  readonly details?: unknown;

  constructor(message = 'Authorization failed', details?: unknown) {
    super(message);
    this.name = 'AuthorizationError';
    this.details = details;
  }
}

export class NotAuthorizedError extends AuthorizationError {
  override readonly code = 'not_authorized';

  constructor(message = 'Not authorized', details?: unknown) {
    super(message, details);
    this.name = 'NotAuthorizedError';
  }
}

export function isAuthorizationError(e: unknown): e is AuthorizationError {
  return e instanceof AuthorizationError;
}
