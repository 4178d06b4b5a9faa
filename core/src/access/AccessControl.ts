import { isAuthorizationError } from '../acl/errors.js';
import type { PrivilegeEngine } from '../acl/types.js';
import type { Actor } from '../actors/types.js';
import { createExecutionContext } from '../context/create.js';
import type { ExecutionContext, LoadMethod, Params } from '../context/types.js';
import type { AccessDeclarations } from '../declarations/types.js';
import { DecisionProcedure } from '../decision/procedure.js';
import type { Decision } from '../decision/types.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { ObjectResolver } from '../objects/resolver.js';
import type { Finder } from '../objects/types.js';
import { RuleRegistry } from '../rules/registry.js';
import type { CustomPredicate, FilterOptions } from '../rules/types.js';
import { contextForResource } from '../rules/naming.js';

export type AccessControlOptions = {
  /** Resource (controller) name, e.g. `users`. */
  resource: string;
  engine: PrivilegeEngine;
  finder?: Finder;
  logger?: Logger;
  /** Named load methods usable as `loadMethod: '<name>'`. */
  methods?: Record<string, LoadMethod>;
};

/**
 * Access filters of one resource: a rule registry plus the procedure that decides
 * requests against it.
 *
 * @example
 * ```ts
 * const users = new AccessControl({ resource: 'users', engine, finder });
 * users.filterAccessTo(['index', 'show']);
 * users.filterAccessTo(['edit', 'update'], { attributeCheck: true });
 * users.filterAccessTo(['merge'], {}, async (ctx) => ctx.identity.roles.includes('admin'));
 *
 * const decision = await users.decide('edit', users.createContext({ identity, action: 'edit', params }));
 * ```
 */
export class AccessControl {
  readonly resource: string;
  readonly registry = new RuleRegistry();
  private readonly engine: PrivilegeEngine;
  private readonly resolver: ObjectResolver;
  private readonly procedure: DecisionProcedure;
  private readonly methods: Record<string, LoadMethod>;
  readonly logger: Logger;

  constructor(opts: AccessControlOptions) {
    this.resource = opts.resource;
    this.engine = opts.engine;
    this.logger = opts.logger ?? silentLogger;
    this.methods = { ...(opts.methods ?? {}) };
    this.resolver = new ObjectResolver(opts.finder ?? null);
    this.procedure = new DecisionProcedure({
      registry: this.registry,
      engine: this.engine,
      resolver: this.resolver,
      logger: this.logger,
    });
  }

  /**
   * Declares the privilege needed for `actions` (`all` for every action without a rule
   * of its own). Later declarations take overlapping actions away from earlier ones.
   * A predicate replaces the privilege check entirely.
   */
  filterAccessTo(actions: string | string[], options: FilterOptions = {}, predicate?: CustomPredicate): this {
    this.registry.register(typeof actions === 'string' ? [actions] : actions, options, predicate);
    return this;
  }

  applyDeclarations(declarations: AccessDeclarations): this {
    for (const d of declarations[this.resource] ?? []) {
      const { actions, ...options } = d;
      this.registry.register(actions, options);
    }
    return this;
  }

  createContext(args: { identity: Actor; action: string; params?: Params }): ExecutionContext {
    return createExecutionContext({
      identity: args.identity,
      action: args.action,
      resource: this.resource,
      ...(args.params ? { params: args.params } : {}),
      methods: this.methods,
    });
  }

  decide(actionName: string, ctx: ExecutionContext): Promise<Decision> {
    return this.procedure.decide(actionName, ctx);
  }

  /**
   * Ad-hoc check for handlers. A string target names the privilege context; any other
   * target is the object the attribute checks run against.
   */
  async permittedTo(ctx: ExecutionContext, privilege: string, target?: unknown): Promise<boolean> {
    const context = typeof target === 'string' ? target : contextForResource(this.resource);
    const object = typeof target === 'string' || target === undefined ? null : target;
    try {
      const res = await this.engine.permit({
        identity: ctx.identity,
        privilege,
        context,
        object,
        skipAttributeTest: object === null,
      });
      return res === true;
    } catch (e) {
      if (isAuthorizationError(e)) return false;
      throw e;
    }
  }
}
