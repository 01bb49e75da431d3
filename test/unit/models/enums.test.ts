import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { OperationState, ProcessState, RunStatus } from '../../../src/models/enums';

describe('Enumerations', () => {
  it('RunStatus should define every derived status', () => {
    assert.deepEqual(Object.values(RunStatus).sort(), [
      'completed',
      'error',
      'incomplete',
      'running',
      'stale',
      'terminated',
    ]);
  });

  it('OperationState should be one-shot', () => {
    assert.deepEqual(Object.keys(OperationState), ['NOT_STARTED', 'RUNNING', 'FINISHED']);
  });

  it('ProcessState should end in TERMINATED', () => {
    assert.deepEqual(Object.keys(ProcessState), ['NOT_STARTED', 'RUNNING', 'TERMINATED']);
  });
});
