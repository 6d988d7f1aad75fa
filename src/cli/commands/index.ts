/**
 * CLI Commands - Public API
 */

export { executeStartCommand, type StartCommandDeps } from './start.js';
export { executePlanCommand, type PlanCommandDeps, type PlanCommandOptions } from './plan.js';
export { executeTargetsCommand } from './targets.js';
export { resolveCommandEnv } from './command-env.js';
