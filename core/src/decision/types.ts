import type { AuthorizationError } from '../acl/errors.js';

export type DeniedReason =
  | { type: 'no-matching-rule' }
  | { type: 'evaluation-denied'; cause: AuthorizationError }
  | { type: 'evaluation-error'; cause: Error };

export type DecisionReason = { type: 'allowed' } | DeniedReason;

export type Decision =
  | { allowed: true; reason: { type: 'allowed' } }
  | { allowed: false; reason: DeniedReason };
