import type { CreateContextArgs, ExecutionContext } from './types.js';

export function createExecutionContext(args: CreateContextArgs): ExecutionContext {
  return {
    identity: args.identity,
    action: args.action,
    resource: args.resource,
    params: { ...(args.params ?? {}) },
    objects: new Map(),
    methods: { ...(args.methods ?? {}) },
  };
}
