import { isAuthorizationError, type AuthorizationError } from '../acl/errors.js';
import type { Decision } from './types.js';

export function allow(): Decision {
  return { allowed: true, reason: { type: 'allowed' } };
}

export function deny(cause: AuthorizationError): Decision {
  return { allowed: false, reason: { type: 'evaluation-denied', cause } };
}

export function noMatchingRule(): Decision {
  return { allowed: false, reason: { type: 'no-matching-rule' } };
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export function decisionFromError(e: unknown): Decision {
  if (isAuthorizationError(e)) return deny(e);
  return { allowed: false, reason: { type: 'evaluation-error', cause: toError(e) } };
}

export function describeDecision(decision: Decision): string {
  const { reason } = decision;
  switch (reason.type) {
    case 'allowed':
      return 'allowed';
    case 'no-matching-rule':
      return 'no matching rule';
    case 'evaluation-denied':
      return `denied: ${reason.cause.message}`;
    case 'evaluation-error':
      return `error: ${reason.cause.name}: ${reason.cause.message}`;
  }
}
