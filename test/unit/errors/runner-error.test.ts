import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { RunnerError } from '../../../src/errors/runner-error';
import { ErrorCategory, ErrorCode } from '../../../src/errors/error-codes';

describe('RunnerError', () => {
  it('should create error with code and message', () => {
    const error = new RunnerError(ErrorCode.E103_MODEL_FILE_NOT_FOUND, '/path/to/oprun.yml');
    assert.ok(error instanceof Error);
    assert.ok(error instanceof RunnerError);
    assert.equal(error.code, ErrorCode.E103_MODEL_FILE_NOT_FOUND);
    assert.equal(error.message, '[E103] /path/to/oprun.yml');
  });

  it('should fall back to the standard message for the code', () => {
    const error = new RunnerError(ErrorCode.E401_OPERATION_ALREADY_RUN);
    assert.equal(error.message, '[E401] Operation has already been run');
  });

  it('should keep details for programmatic handling', () => {
    const error = new RunnerError(ErrorCode.E502_DEPENDENCY_SOURCE_NOT_FOUND, 'missing data.csv', {
      file: 'data.csv',
    });
    assert.deepEqual(error.details, { file: 'data.csv' });
    assert.equal(error.category, ErrorCategory.DEPENDENCY);
  });

  it('should be throwable and catchable', () => {
    assert.throws(
      () => {
        throw new RunnerError(ErrorCode.E201_EMPTY_COMMAND);
      },
      (err: Error) => {
        return err instanceof RunnerError && err.code === 'E201';
      }
    );
  });

  it('should keep instanceof working for subclasses', () => {
    class CustomError extends RunnerError {}
    const error = new CustomError(ErrorCode.E303_INVALID_REFERENCE);
    assert.ok(error instanceof CustomError);
    assert.ok(error instanceof RunnerError);
  });

  it('should preserve stack trace', () => {
    const error = new RunnerError(ErrorCode.E501_DEPENDENCY_RESOLUTION_FAILURE);
    assert.ok(error.stack);
    assert.ok(error.stack.includes('runner-error.test.ts'));
  });
});
