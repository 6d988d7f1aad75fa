export type {
  AppError,
  ConfigIssue,
  EnvFileUnreadableError,
  LaunchError,
  ProcessTypeMissingError,
  SpawnFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err, PROCESS_TYPE_MISSING_MESSAGE } from './factories.js';
export { formatAppError } from './formatter.js';
