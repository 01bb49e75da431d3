export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isConfigurationError,
  isCommandError,
  isReferenceError,
  isLifecycleError,
  isDependencyError,
} from './error-codes';
export { RunnerError } from './runner-error';
