export { PROCESS_TYPE_ENV, PROCESS_TYPES, ProcessTypeSchema, parseProcessType } from './process-type.js';
export type { LaunchEnv, ProcessType } from './process-type.js';
export { LAUNCH_TARGETS, formatCommandLine } from './targets.js';
export type { LaunchTarget } from './targets.js';
export { resolveLaunchPlan, toCommandSpec } from './launch-plan.js';
export type { LaunchPlan } from './launch-plan.js';
export { launch, spawnFailureExitStatus } from './launcher.js';
export type { LauncherDeps } from './launcher.js';
export { mergeEnvFile } from './env-file.js';
export type { ReadTextFile } from './env-file.js';
