/**
 * Central export point for modenv error types.
 */
export { ModEnvError, ErrorSeverity, getErrorMessage } from './ModEnvError';
export type { BaseErrorDetails, ModEnvErrorOptions } from './ModEnvError';
export {
  EnvironmentNotFoundError,
  EnvironmentExistsError,
  EnvironmentCorruptedError,
  ActiveEnvironmentConflictError,
  InvalidEnvironmentNameError
} from './EnvironmentErrors';
export {
  DependencyConflictError,
  IsolationTimeoutError,
  ExternalOperationError,
  IsolatedImportError
} from './IsolationErrors';
export type { IsolatedImportStage } from './IsolationErrors';
