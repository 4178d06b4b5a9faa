import { NotAuthorizedError } from '../acl/errors.js';
import type { PrivilegeEngine } from '../acl/types.js';
import type { ExecutionContext } from '../context/types.js';
import { allow, decisionFromError, deny } from '../decision/decisions.js';
import type { Decision } from '../decision/types.js';
import type { ObjectResolver } from '../objects/resolver.js';
import { RuleDeclarationError } from './errors.js';
import { contextForResource } from './naming.js';
import { ALL_ACTIONS, type CustomPredicate, type FilterOptions, type LoadStrategy, type RuleCheck } from './types.js';

function loadStrategyFor(options: FilterOptions): LoadStrategy {
  const { loadMethod } = options;
  if (typeof loadMethod === 'string') return { kind: 'method', name: loadMethod };
  if (typeof loadMethod === 'function') return { kind: 'function', load: loadMethod };
  return options.attributeCheck === true ? { kind: 'finder' } : { kind: 'none' };
}

export function buildRuleCheck(options: FilterOptions = {}, predicate?: CustomPredicate): RuleCheck {
  if (predicate) return { kind: 'custom', predicate };
  return {
    kind: 'privilege',
    privilege: options.require ?? null,
    context: options.context ?? null,
    attributeCheck: options.attributeCheck === true,
    model: options.model ?? null,
    load: loadStrategyFor(options),
  };
}

function normalizeActions(actions: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const a of actions) {
    if (typeof a !== 'string' || !a.trim()) {
      throw new RuleDeclarationError('Action names must be non-empty strings', { action: a });
    }
    out.add(a.trim());
  }
  return out;
}

export class Rule {
  readonly actions: ReadonlySet<string>;
  readonly check: RuleCheck;

  constructor(actions: Iterable<string>, check: RuleCheck) {
    this.actions = normalizeActions(actions);
    this.check = check;
  }

  matches(actionName: string): boolean {
    return this.actions.has(actionName);
  }

  isWildcard(): boolean {
    return this.actions.has(ALL_ACTIONS);
  }

  withoutActions(actions: Iterable<string>): Rule {
    const removed = new Set(actions);
    return new Rule(
      [...this.actions].filter((a) => !removed.has(a)),
      this.check,
    );
  }

  /**
   * Runs the rule. Resolves to the verdict; authorization errors from the engine or a
   * custom predicate, and any loader failure, are thrown to the caller.
   */
  async permit(ctx: ExecutionContext, engine: PrivilegeEngine, resolver: ObjectResolver): Promise<boolean> {
    const check = this.check;
    if (check.kind === 'custom') return (await check.predicate(ctx)) === true;

    const privilege = check.privilege ?? ctx.action;
    const context = check.context ?? contextForResource(ctx.resource);
    const object = check.attributeCheck ? await resolver.resolve(ctx, this) : null;

    const res = await engine.permit({
      identity: ctx.identity,
      privilege,
      context,
      object,
      skipAttributeTest: !check.attributeCheck,
    });
    return res === true;
  }

  async evaluate(ctx: ExecutionContext, engine: PrivilegeEngine, resolver: ObjectResolver): Promise<Decision> {
    try {
      return (await this.permit(ctx, engine, resolver)) ? allow() : deny(this.denialFor(ctx));
    } catch (e) {
      return decisionFromError(e);
    }
  }

  denialFor(ctx: ExecutionContext): NotAuthorizedError {
    const check = this.check;
    if (check.kind === 'custom') {
      return new NotAuthorizedError(`Custom filter denied ${ctx.resource}.${ctx.action}`, {
        resource: ctx.resource,
        action: ctx.action,
      });
    }
    const privilege = check.privilege ?? ctx.action;
    const context = check.context ?? contextForResource(ctx.resource);
    return new NotAuthorizedError(`Privilege ${privilege} denied on ${context}`, { privilege, context });
  }

  describe(): string {
    const actions = [...this.actions].join(',') || '-';
    const check = this.check;
    if (check.kind === 'custom') return `[${actions}] custom`;
    const parts = [`require=${check.privilege ?? '<action>'}`];
    if (check.context) parts.push(`context=${check.context}`);
    if (check.attributeCheck) parts.push(`attributeCheck load=${check.load.kind}`);
    return `[${actions}] ${parts.join(' ')}`;
  }
}
