import type { ExecutionContext, LoadMethod } from '../context/types.js';

export const ALL_ACTIONS = 'all';

export type LoadStrategy =
  | { kind: 'none' }
  | { kind: 'method'; name: string }
  | { kind: 'function'; load: LoadMethod }
  | { kind: 'finder' };

export type CustomPredicate = (ctx: ExecutionContext) => boolean | Promise<boolean>;

export type PrivilegeCheck = {
  kind: 'privilege';
  privilege: string | null;
  context: string | null;
  attributeCheck: boolean;
  model: string | null;
  load: LoadStrategy;
};

export type CustomCheck = {
  kind: 'custom';
  predicate: CustomPredicate;
};

export type RuleCheck = PrivilegeCheck | CustomCheck;

export type FilterOptions = {
  /** Privilege required; defaults to the action name. */
  require?: string;
  /** Privilege context; defaults to the resource name, pluralized. */
  context?: string;
  attributeCheck?: boolean;
  /** Domain type loaded by the default finder; defaults to the context, singularized. */
  model?: string;
  /** Name of a load method registered on the resource, or a loader function. */
  loadMethod?: string | LoadMethod;
};
