import type { NotAuthorizedError } from '../acl/errors.js';
import type { PrivilegeEngine } from '../acl/types.js';
import type { ExecutionContext } from '../context/types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ObjectResolver } from '../objects/resolver.js';
import type { Rule } from '../rules/rule.js';
import { allow, decisionFromError, deny, noMatchingRule } from './decisions.js';
import type { Decision } from './types.js';

/** Read side of a rule registry. */
export type RuleSource = {
  rulesMatching(actionName: string): Rule[];
  wildcardRules(): Rule[];
};

export type DecisionProcedureDeps = {
  registry: RuleSource;
  engine: PrivilegeEngine;
  resolver: ObjectResolver;
  logger?: Logger;
};

export class DecisionProcedure {
  private readonly registry: RuleSource;
  private readonly engine: PrivilegeEngine;
  private readonly resolver: ObjectResolver;
  private readonly logger: Logger;

  constructor(deps: DecisionProcedureDeps) {
    this.registry = deps.registry;
    this.engine = deps.engine;
    this.resolver = deps.resolver;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Every applicable rule must allow. All of them are evaluated, in registration order,
   * unless one throws; the first thrown error ends evaluation and becomes the cause.
   */
  async decide(actionName: string, ctx: ExecutionContext): Promise<Decision> {
    const scoped: ExecutionContext = ctx.action === actionName ? ctx : { ...ctx, action: actionName };
    const matching = this.registry.rulesMatching(actionName);
    const rules = matching.length ? matching : this.registry.wildcardRules();
    if (!rules.length) return noMatchingRule();

    let denial: NotAuthorizedError | null = null;
    for (const rule of rules) {
      let ok: boolean;
      try {
        ok = await rule.permit(scoped, this.engine, this.resolver);
      } catch (e) {
        this.logger.debug(`[actiongate] ${scoped.resource}.${actionName} ${rule.describe()} threw`, e);
        return decisionFromError(e);
      }
      this.logger.debug(`[actiongate] ${scoped.resource}.${actionName} ${rule.describe()} -> ${ok ? 'allow' : 'deny'}`);
      if (!ok && !denial) denial = rule.denialFor(scoped);
    }
    return denial ? deny(denial) : allow();
  }
}
