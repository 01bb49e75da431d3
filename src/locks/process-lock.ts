/**
 * Process Lock
 *
 * A plain text file holding the decimal pid of a supervised process. It is
 * present exactly while the process runs under supervision.
 */

import * as fs from 'fs';
import { writeFileAtomicOrThrow } from '../logging/atomic-file-writer';

export function writeProcessLock(lockPath: string, pid: number): void {
  writeFileAtomicOrThrow(lockPath, pid.toString());
}

/**
 * Read the pid from a lock file
 * Returns null if the file doesn't exist or contains invalid data
 */
export function readProcessLock(lockPath: string): number | null {
  let content: string;
  try {
    content = fs.readFileSync(lockPath, 'utf-8').trim();
  } catch {
    return null;
  }
  if (!/^\d+$/.test(content)) {
    return null;
  }
  const pid = parseInt(content, 10);
  return pid > 0 ? pid : null;
}

/**
 * Delete a lock file. A lock that is already gone is not an error.
 */
export function removeProcessLock(lockPath: string): void {
  try {
    fs.unlinkSync(lockPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }
}

/**
 * Check if a process is running
 * Uses kill(pid, 0) to check without sending signal
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return (error as NodeJS.ErrnoException).code === 'EPERM';
  }
}
