import type { Actor } from '../actors/types.js';

export type PermitArgs = {
  identity: Actor;
  privilege: string;
  context: string;
  object: unknown;
  skipAttributeTest: boolean;
};

/**
 * Privilege evaluation backend consulted by privilege rules.
 *
 * Implementations either return `false` or throw an `AuthorizationError` to deny.
 */
export interface PrivilegeEngine {
  permit(args: PermitArgs): boolean | Promise<boolean>;
}

export type RoleGrants = Record<string, Record<string, string[]>>;

export type AttributeCheck = (args: { identity: Actor; object: unknown }) => boolean | Promise<boolean>;
