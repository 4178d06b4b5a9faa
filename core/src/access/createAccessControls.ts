import type { PrivilegeEngine } from '../acl/types.js';
import type { ResolvedAccessConfig } from '../config/types.js';
import type { LoadMethod } from '../context/types.js';
import { compileDeclarationsFromFs } from '../declarations/registry.js';
import type { AccessDeclarations } from '../declarations/types.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { Finder } from '../objects/types.js';
import { AccessControl } from './AccessControl.js';

export type AccessControlsDeps = {
  engine: PrivilegeEngine;
  finder?: Finder;
  logger?: Logger;
  /** Resources to create even when no declaration file mentions them. */
  resources?: string[];
  /** Named load methods per resource. */
  methods?: Record<string, Record<string, LoadMethod>>;
  declarations?: AccessDeclarations;
};

export function createAccessControls(
  config: ResolvedAccessConfig,
  deps: AccessControlsDeps,
): Record<string, AccessControl> {
  const logger = deps.logger ?? createLogger({ level: config.logging.level });
  let declarations: AccessDeclarations = deps.declarations ?? {};
  if (!deps.declarations && config.declarations) {
    const compiled = compileDeclarationsFromFs(config.declarations.dir);
    logger.debug(`[actiongate] loaded ${compiled.sources.length} declaration block(s) from ${config.declarations.dir}`);
    declarations = compiled.declarations;
  }

  const names = new Set([...Object.keys(declarations), ...(deps.resources ?? [])]);
  const out: Record<string, AccessControl> = {};
  for (const resource of [...names].sort((a, b) => a.localeCompare(b))) {
    const methods = deps.methods?.[resource];
    out[resource] = new AccessControl({
      resource,
      engine: deps.engine,
      logger,
      ...(deps.finder ? { finder: deps.finder } : {}),
      ...(methods ? { methods } : {}),
    }).applyDeclarations(declarations);
  }
  return out;
}
