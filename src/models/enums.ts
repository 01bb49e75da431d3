/**
 * Enumerations for oprun
 */

/**
 * Derived status of a run on disk
 */
export enum RunStatus {
  /** Lock present and its process alive */
  RUNNING = 'running',
  /** Exited with status 0 */
  COMPLETED = 'completed',
  /** Exited with a non-zero status */
  ERROR = 'error',
  /** Killed by a signal (negative exit status) */
  TERMINATED = 'terminated',
  /** Lock present but its process is gone */
  STALE = 'stale',
  /** No exit status and no lock: interrupted before or during execution */
  INCOMPLETE = 'incomplete',
}

/**
 * Lifecycle of an Operation object. An operation runs at most once.
 */
export enum OperationState {
  NOT_STARTED = 'NOT_STARTED',
  RUNNING = 'RUNNING',
  FINISHED = 'FINISHED',
}

/**
 * Lifecycle of one supervised process
 */
export enum ProcessState {
  NOT_STARTED = 'NOT_STARTED',
  RUNNING = 'RUNNING',
  TERMINATED = 'TERMINATED',
}
