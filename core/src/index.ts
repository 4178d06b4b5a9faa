export * from './access/AccessControl.js';
export * from './access/createAccessControls.js';

export * from './acl/engine.js';
export * from './acl/errors.js';
export type * from './acl/types.js';

export * from './actors/types.js';

export * from './config/errors.js';
export * from './config/load.js';
export type * from './config/types.js';

export * from './context/create.js';
export type * from './context/types.js';

export * from './decision/decisions.js';
export * from './decision/procedure.js';
export type * from './decision/types.js';

export * from './declarations/errors.js';
export * from './declarations/registry.js';
export * from './declarations/schema.js';
export type * from './declarations/types.js';

export * from './logging/logger.js';

export * from './objects/errors.js';
export * from './objects/resolver.js';
export type * from './objects/types.js';

export * from './orm/sequelizeFinder.js';

export * from './rules/errors.js';
export * from './rules/naming.js';
export * from './rules/registry.js';
export * from './rules/rule.js';
export * from './rules/types.js';
