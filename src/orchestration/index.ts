/**
 * Orchestration Module
 */

export {
  Operation,
  OperationStateError,
  createOperation,
  unixTime,
  RUNDIR_ARG,
  RUNDIR_ENV,
  type OperationOptions,
  type CreateOperationOptions,
  type OperationEvent,
  type OperationEventType,
  type OperationEventCallback,
} from './operation';
