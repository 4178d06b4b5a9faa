import type { Actor, ExecutionContext, Finder, PermitArgs, PrivilegeEngine, RecordId } from '../../src/index.js';
import { createExecutionContext } from '../../src/index.js';

export const editor: Actor = { isAuthenticated: true, subjects: {}, roles: ['editor'], claims: {} };

export class RecordingEngine implements PrivilegeEngine {
  readonly calls: PermitArgs[] = [];

  constructor(private readonly verdict: (args: PermitArgs) => boolean = () => true) {}

  permit(args: PermitArgs): boolean {
    this.calls.push(args);
    return this.verdict(args);
  }
}

export class CountingFinder implements Finder {
  readonly calls: Array<{ domainType: string; id: RecordId }> = [];

  async find(domainType: string, id: RecordId): Promise<unknown> {
    this.calls.push({ domainType, id });
    return { domainType, id };
  }
}

export function context(args: Partial<Omit<ExecutionContext, 'objects'>> = {}): ExecutionContext {
  return createExecutionContext({
    identity: args.identity ?? editor,
    action: args.action ?? 'show',
    resource: args.resource ?? 'users',
    params: args.params ?? {},
    methods: args.methods ?? {},
  });
}
