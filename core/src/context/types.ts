import type { Actor } from '../actors/types.js';

export type Params = Record<string, unknown>;

export type LoadMethod = (ctx: ExecutionContext) => unknown;

/**
 * Per-request view handed to rules. `objects` memoizes loaded domain objects by
 * domain type and is discarded with the request.
 */
export type ExecutionContext = {
  identity: Actor;
  action: string;
  resource: string;
  params: Params;
  objects: Map<string, unknown>;
  methods: Record<string, LoadMethod>;
};

export type CreateContextArgs = {
  identity: Actor;
  action: string;
  resource: string;
  params?: Params;
  methods?: Record<string, LoadMethod>;
};
