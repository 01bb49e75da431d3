/**
 * Atomic File Writer
 *
 * Writes go to a temporary sibling file which is then renamed over the
 * target, so readers never observe a partially written attribute or lock.
 * Failed attempts are retried a bounded number of times.
 */

import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_MAX_RETRIES = 3;

export interface AtomicWriteOptions {
  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;
  /** fsync the temporary file before renaming it (default: false) */
  fsync?: boolean;
  /** File permissions (default: 0o644) */
  mode?: number;
}

export interface AtomicWriteResult {
  success: boolean;
  retryCount: number;
  error?: Error;
}

let tempCounter = 0;

function tempPathFor(filePath: string): string {
  tempCounter++;
  return path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${tempCounter}.tmp`
  );
}

/**
 * Synchronous atomic file write with retry
 */
export function atomicWriteFileSync(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): AtomicWriteResult {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const mode = options.mode ?? 0o644;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const tempPath = tempPathFor(filePath);
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(tempPath, content, { encoding: 'utf-8', mode });

      if (options.fsync) {
        const fd = fs.openSync(tempPath, 'r');
        try {
          fs.fsyncSync(fd);
        } finally {
          fs.closeSync(fd);
        }
      }

      fs.renameSync(tempPath, filePath);
      return { success: true, retryCount: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    }
  }

  return {
    success: false,
    retryCount: maxRetries,
    error: lastError,
  };
}

/**
 * Like atomicWriteFileSync, but throws the last error when every attempt failed
 */
export function writeFileAtomicOrThrow(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  const result = atomicWriteFileSync(filePath, content, options);
  if (!result.success) {
    throw result.error ?? new Error(`Failed to write ${filePath}`);
  }
}
