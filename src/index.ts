// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Launch API
export {
  PROCESS_TYPE_ENV,
  PROCESS_TYPES,
  LAUNCH_TARGETS,
  parseProcessType,
  resolveLaunchPlan,
  toCommandSpec,
  formatCommandLine,
  launch,
  mergeEnvFile,
} from './launch/index.js';
export type { LaunchEnv, LaunchPlan, LaunchTarget, LauncherDeps, ProcessType } from './launch/index.js';

// Runtime ports
export type { ChildExit, CommandSpec, ProcessRunner } from './runtime/ports/process-runner.js';
export type { ProcessTerminator } from './runtime/ports/process-terminator.js';
export type { ProcessSignals } from './runtime/ports/process-signals.js';
export { NodeProcessRunner } from './runtime/adapters/node-process-runner.js';

// Errors
export * from './errors/index.js';
