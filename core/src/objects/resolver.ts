import type { ExecutionContext } from '../context/types.js';
import type { Rule } from '../rules/rule.js';
import { contextForResource, domainTypeForContext } from '../rules/naming.js';
import type { PrivilegeCheck } from '../rules/types.js';
import { ObjectLoadError } from './errors.js';
import type { Finder, RecordId } from './types.js';

function recordIdFrom(ctx: ExecutionContext): RecordId {
  const id = ctx.params.id;
  if (typeof id === 'number' && Number.isFinite(id)) return id;
  if (typeof id === 'string' && id.trim() !== '') return id;
  throw new ObjectLoadError(`Missing id parameter for ${ctx.resource}.${ctx.action}`, {
    resource: ctx.resource,
    action: ctx.action,
  });
}

export function domainTypeFor(check: PrivilegeCheck, ctx: ExecutionContext): string {
  if (check.model) return check.model;
  return domainTypeForContext(check.context ?? contextForResource(ctx.resource));
}

/**
 * Loads the object an attribute-checked rule is evaluated against.
 *
 * Objects found through the default finder are memoized in `ctx.objects` under their
 * domain type, so rules sharing a type (and the request handler) reuse one load.
 */
export class ObjectResolver {
  constructor(private readonly finder: Finder | null = null) {}

  async resolve(ctx: ExecutionContext, rule: Rule): Promise<unknown> {
    const check = rule.check;
    if (check.kind !== 'privilege') {
      throw new ObjectLoadError('Custom rules do not load objects', { actions: [...rule.actions] });
    }

    const load = check.load;
    if (load.kind === 'method') {
      if (!Object.prototype.hasOwnProperty.call(ctx.methods, load.name)) {
        throw new ObjectLoadError(`Unknown load method: ${load.name}`, { resource: ctx.resource, method: load.name });
      }
      const method = ctx.methods[load.name];
      return method(ctx);
    }
    if (load.kind === 'function') return load.load(ctx);

    return this.findMemoized(ctx, domainTypeFor(check, ctx));
  }

  private async findMemoized(ctx: ExecutionContext, domainType: string): Promise<unknown> {
    if (ctx.objects.has(domainType)) return ctx.objects.get(domainType);
    if (!this.finder) {
      throw new ObjectLoadError(`No finder configured to load ${domainType}`, { domainType });
    }
    const object = await this.finder.find(domainType, recordIdFrom(ctx));
    ctx.objects.set(domainType, object);
    return object;
  }
}
