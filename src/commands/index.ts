/**
 * Command exports
 */

export { planCommand, type PlanOptions } from './plan.js';
export { applyCommand, type ApplyOptions } from './apply.js';
export { typesCommand, type TypeListing } from './types.js';
export { createContext, parseGlobalOptions } from './context.js';
export { runDesiredState, type CommandDependencies } from './run.js';
