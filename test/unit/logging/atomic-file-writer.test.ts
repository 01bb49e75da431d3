/**
 * Atomic File Writer Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  atomicWriteFileSync,
  writeFileAtomicOrThrow,
  DEFAULT_MAX_RETRIES,
} from '../../../src/logging/atomic-file-writer';

describe('Atomic File Writer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'atomic-writer-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should retry three times by default', () => {
    assert.equal(DEFAULT_MAX_RETRIES, 3);
  });

  describe('atomicWriteFileSync', () => {
    it('should write content to file', () => {
      const filePath = path.join(tempDir, 'test.txt');
      const result = atomicWriteFileSync(filePath, 'hello');

      assert.equal(result.success, true);
      assert.equal(result.retryCount, 0);
      assert.equal(fs.readFileSync(filePath, 'utf-8'), 'hello');
    });

    it('should create parent directories', () => {
      const filePath = path.join(tempDir, 'a', 'b', 'attr');
      atomicWriteFileSync(filePath, 'nested');
      assert.equal(fs.readFileSync(filePath, 'utf-8'), 'nested');
    });

    it('should replace existing content', () => {
      const filePath = path.join(tempDir, 'test.txt');
      atomicWriteFileSync(filePath, 'first');
      atomicWriteFileSync(filePath, 'second');
      assert.equal(fs.readFileSync(filePath, 'utf-8'), 'second');
    });

    it('should leave no temporary files behind', () => {
      const filePath = path.join(tempDir, 'test.txt');
      atomicWriteFileSync(filePath, 'content', { fsync: true });
      assert.deepEqual(fs.readdirSync(tempDir), ['test.txt']);
    });

    it('should report failure after exhausting retries', () => {
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');

      const result = atomicWriteFileSync(path.join(blocker, 'attr'), 'x', { maxRetries: 1 });

      assert.equal(result.success, false);
      assert.equal(result.retryCount, 1);
      assert.ok(result.error instanceof Error);
    });
  });

  describe('writeFileAtomicOrThrow', () => {
    it('should throw the underlying error on failure', () => {
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');

      assert.throws(() => writeFileAtomicOrThrow(path.join(blocker, 'attr'), 'x', { maxRetries: 0 }));
    });
  });
});
