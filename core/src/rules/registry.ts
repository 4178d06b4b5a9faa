import { RuleDeclarationError } from './errors.js';
import { buildRuleCheck, Rule } from './rule.js';
import { ALL_ACTIONS, type CustomPredicate, type FilterOptions } from './types.js';

/**
 * Ordered rules of one resource.
 *
 * Registering a rule takes its actions away from every earlier rule, so each action is
 * claimed by at most one specific rule. The `all` marker is never taken away: wildcard
 * rules stay in place and only apply when no specific rule claims an action.
 */
export class RuleRegistry {
  private rules: Rule[] = [];

  register(actions: Iterable<string>, options: FilterOptions = {}, predicate?: CustomPredicate): void {
    const list = [...actions];
    if (!list.length) throw new RuleDeclarationError('At least one action is required', { options });

    const rule = new Rule(list, buildRuleCheck(options, predicate));
    const claimed = [...rule.actions].filter((a) => a !== ALL_ACTIONS);
    if (claimed.length) this.rules = this.rules.map((r) => r.withoutActions(claimed));
    this.rules.push(rule);
  }

  rulesMatching(actionName: string): Rule[] {
    return this.rules.filter((r) => !r.isWildcard() && r.matches(actionName));
  }

  wildcardRules(): Rule[] {
    return this.rules.filter((r) => r.isWildcard());
  }

  list(): readonly Rule[] {
    return [...this.rules];
  }

  get size(): number {
    return this.rules.length;
  }
}
