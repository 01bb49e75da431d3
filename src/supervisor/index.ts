/**
 * Supervisor Module
 */

export {
  ProcessSupervisor,
  SupervisedProcess,
  ProcessSpawnError,
  exitStatusOf,
  type SpawnRequest,
  type ProcessSupervisorOptions,
} from './process-supervisor';
export {
  writeProcessLock,
  readProcessLock,
  removeProcessLock,
  isProcessRunning,
} from '../locks/process-lock';
