/**
 * Models Module Index
 */

export { RunStatus, OperationState, ProcessState } from './enums';
export {
  OpRef,
  OpRefError,
  UNKNOWN_FIELD,
  type ModelRef,
  type AttributeSource,
} from './op-ref';
export {
  ModelFile,
  ModelDef,
  OperationDef,
  ModelFileError,
  loadModelFile,
  parseModelFile,
  isFlagValue,
  DEFAULT_MODEL_FILE,
  MODEL_FILE_PKG_TYPE,
  type FlagValue,
  type FlagDef,
  type DependencyDef,
} from './model-file';
export {
  RunRecord,
  RunError,
  generateRunId,
  listRuns,
  RUN_META_DIR,
  ATTRS_DIR,
  LOCK_FILE,
  type AttributeValue,
} from './run';
