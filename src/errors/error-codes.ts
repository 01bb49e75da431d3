/**
 * Error Codes for oprun
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  COMMAND = 'COMMAND',
  REFERENCE = 'REFERENCE',
  LIFECYCLE = 'LIFECYCLE',
  DEPENDENCY = 'DEPENDENCY',
}

/**
 * Error Codes
 * E1xx: Configuration and model file errors - prevent an operation from being built
 * E2xx: Command errors - raised before any run directory exists
 * E3xx: Operation reference errors - fatal to the parse call only
 * E4xx: Lifecycle and process errors - the run did not complete
 * E5xx: Dependency errors - the run is left incomplete, no process started
 */
export enum ErrorCode {
  // E1xx: Configuration and model file errors
  E101_CONFIG_FILE_INVALID = 'E101',
  E102_CONFIG_VALUE_INVALID = 'E102',
  E103_MODEL_FILE_NOT_FOUND = 'E103',
  E104_MODEL_FILE_INVALID = 'E104',
  E105_OPERATION_NOT_FOUND = 'E105',

  // E2xx: Command errors
  E201_EMPTY_COMMAND = 'E201',
  E202_UNSUPPORTED_COMMAND = 'E202',
  E203_COMMAND_SYNTAX_ERROR = 'E203',

  // E3xx: Operation reference errors
  E301_OPREF_MISSING = 'E301',
  E302_OPREF_MALFORMED = 'E302',
  E303_INVALID_REFERENCE = 'E303',

  // E4xx: Lifecycle and process errors
  E401_OPERATION_ALREADY_RUN = 'E401',
  E402_PROCESS_SPAWN_FAILURE = 'E402',
  E403_PROCESS_NOT_RUNNING = 'E403',
  E404_RUN_ALREADY_INITIALIZED = 'E404',
  E405_RUN_NOT_FOUND = 'E405',

  // E5xx: Dependency errors
  E501_DEPENDENCY_RESOLUTION_FAILURE = 'E501',
  E502_DEPENDENCY_SOURCE_NOT_FOUND = 'E502',
  E503_DEPENDENCY_INVALID = 'E503',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<string, string> = {
  // E1xx
  E101: 'Configuration file could not be parsed',
  E102: 'Configuration value is invalid',
  E103: 'Model file not found',
  E104: 'Model file is invalid',
  E105: 'Operation not found',

  // E2xx
  E201: 'Operation command is empty',
  E202: 'Operation command must be a string or a list of strings',
  E203: 'Operation command could not be tokenized',

  // E3xx
  E301: 'Run does not have an opref attribute',
  E302: 'Malformed opref attribute',
  E303: 'Invalid operation reference',

  // E4xx
  E401: 'Operation has already been run',
  E402: 'Failed to start operation process',
  E403: 'Operation process is not running',
  E404: 'Run directory has already been initialized',
  E405: 'Run not found',

  // E5xx
  E501: 'Dependency resolution failed',
  E502: 'Dependency source not found',
  E503: 'Invalid dependency declaration',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.COMMAND;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.REFERENCE;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.LIFECYCLE;
  }
  if (codeStr.startsWith('E5')) {
    return ErrorCategory.DEPENDENCY;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const codeStr = code.toString();
  return ERROR_MESSAGES[codeStr] || `Unknown error: ${code}`;
}

export function isConfigurationError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.CONFIGURATION;
}

export function isCommandError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.COMMAND;
}

export function isReferenceError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.REFERENCE;
}

export function isLifecycleError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.LIFECYCLE;
}

export function isDependencyError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.DEPENDENCY;
}
