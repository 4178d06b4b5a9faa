import type { Actor } from '../actors/types.js';
import { NotAuthorizedError } from './errors.js';
import type { AttributeCheck, PermitArgs, PrivilegeEngine, RoleGrants } from './types.js';

function normalizeGrants(v: RoleGrants): RoleGrants {
  const out: RoleGrants = {};
  for (const [context, privileges] of Object.entries(v)) {
    const byPrivilege: Record<string, string[]> = {};
    for (const [privilege, roles] of Object.entries(privileges)) {
      byPrivilege[privilege] = roles.map((r) => String(r));
    }
    out[context] = byPrivilege;
  }
  return out;
}

function rolesAllow(allowed: readonly string[], actor: Actor): boolean {
  if (allowed.includes('*')) return true;
  const roles = new Set(actor.roles || []);
  for (const r of allowed) if (roles.has(r)) return true;
  return false;
}

/**
 * Table-driven engine: `grants[context][privilege]` lists the roles holding a privilege
 * (`*` for everyone). Attribute checks keyed `context.privilege` run unless the caller
 * asks to skip them.
 */
export class RolePrivilegeEngine implements PrivilegeEngine {
  private readonly grants: RoleGrants;
  private readonly attributeChecks: Record<string, AttributeCheck>;

  constructor(grants: RoleGrants, attributeChecks: Record<string, AttributeCheck> = {}) {
    this.grants = normalizeGrants(grants);
    this.attributeChecks = { ...attributeChecks };
  }

  async permit({ identity, privilege, context, object, skipAttributeTest }: PermitArgs): Promise<boolean> {
    const allowed = this.grants[context]?.[privilege] ?? [];
    if (!allowed.length || !rolesAllow(allowed, identity)) {
      throw new NotAuthorizedError(`No permission for ${context}.${privilege}`, { context, privilege });
    }
    if (skipAttributeTest) return true;

    const check = this.attributeChecks[`${context}.${privilege}`];
    if (check && !(await check({ identity, object }))) {
      throw new NotAuthorizedError(`Attribute check failed for ${context}.${privilege}`, { context, privilege });
    }
    return true;
  }
}
