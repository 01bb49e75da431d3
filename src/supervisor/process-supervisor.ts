/**
 * Process Supervisor
 *
 * Starts one operation process, records its pid in a lock file for as long as
 * it runs, and waits for it to terminate.
 *
 *   NOT_STARTED -> RUNNING -> TERMINATED
 *
 * RUNNING is exactly the interval in which the lock file exists. If the
 * supervising process itself dies, the lock is left behind (see RunStatus.STALE).
 */

import { spawn, ChildProcess, StdioOptions } from 'child_process';
import { EventEmitter } from 'events';
import * as os from 'os';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { Logger, getLogger } from '../logging/logger';
import { removeProcessLock, writeProcessLock } from '../locks/process-lock';
import { ProcessState } from '../models/enums';

export class ProcessSpawnError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ProcessSpawnError';
  }
}

export interface SpawnRequest {
  args: readonly string[];
  env: Record<string, string>;
  cwd: string;
  /** Lock file to hold the child pid while it runs */
  lockPath: string;
}

export interface ProcessSupervisorOptions {
  /** stdio of operation processes (default: 'inherit') */
  stdio?: StdioOptions;
  logger?: Logger;
}

/**
 * Exit status as a signed integer: the exit code, or the negated signal
 * number when the process was killed by a signal
 */
export function exitStatusOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return -(os.constants.signals[signal] ?? 1);
  }
  return -1;
}

/**
 * Handle on a supervised process
 */
export class SupervisedProcess {
  readonly pid: number;
  readonly lockPath: string;
  private processState: ProcessState = ProcessState.RUNNING;
  private readonly child: ChildProcess;
  private readonly exited: Promise<number>;

  constructor(child: ChildProcess, pid: number, lockPath: string, exited: Promise<number>) {
    this.child = child;
    this.pid = pid;
    this.lockPath = lockPath;
    this.exited = exited;
  }

  get state(): ProcessState {
    return this.processState;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    return this.child.kill(signal);
  }

  /** @internal used by ProcessSupervisor.wait */
  async waitForExit(): Promise<number> {
    const status = await this.exited;
    this.processState = ProcessState.TERMINATED;
    return status;
  }
}

/**
 * Emits `process:started` (proc) and `process:exited` (proc, exitStatus)
 */
export class ProcessSupervisor extends EventEmitter {
  private readonly stdio: StdioOptions;
  private readonly logger: Logger;

  constructor(options: ProcessSupervisorOptions = {}) {
    super();
    this.stdio = options.stdio ?? 'inherit';
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Start a process and write its lock
   * @throws ProcessSpawnError with E402 when the process cannot be started
   */
  async spawn(request: SpawnRequest): Promise<SupervisedProcess> {
    const [command, ...args] = request.args;
    if (command === undefined) {
      throw new ProcessSpawnError(ErrorCode.E402_PROCESS_SPAWN_FAILURE, 'empty argument vector');
    }

    const child = spawn(command, args, {
      cwd: request.cwd,
      env: request.env,
      stdio: this.stdio,
    });

    const exited = new Promise<number>((resolve) => {
      child.once('exit', (code, signal) => resolve(exitStatusOf(code, signal)));
    });

    await new Promise<void>((resolve, reject) => {
      let spawned = false;
      child.once('spawn', () => {
        spawned = true;
        resolve();
      });
      child.on('error', (error) => {
        if (!spawned) {
          reject(
            new ProcessSpawnError(
              ErrorCode.E402_PROCESS_SPAWN_FAILURE,
              `cannot start ${command}: ${error.message}`,
              { command, cwd: request.cwd, cause: (error as NodeJS.ErrnoException).code }
            )
          );
          return;
        }
        this.logger.error('PROCESS', `operation process ${child.pid} error`, error);
      });
    });

    const pid = child.pid;
    if (pid === undefined) {
      throw new ProcessSpawnError(ErrorCode.E402_PROCESS_SPAWN_FAILURE, `no pid for ${command}`, {
        command,
      });
    }

    try {
      writeProcessLock(request.lockPath, pid);
    } catch (error) {
      child.kill('SIGKILL');
      throw new ProcessSpawnError(
        ErrorCode.E402_PROCESS_SPAWN_FAILURE,
        `cannot write process lock ${request.lockPath}: ${(error as Error).message}`,
        { lockPath: request.lockPath, pid }
      );
    }

    const proc = new SupervisedProcess(child, pid, request.lockPath, exited);
    this.logger.debug('PROCESS', `started process ${pid}`, { args: request.args, cwd: request.cwd });
    this.emit('process:started', proc);
    return proc;
  }

  /**
   * Wait for a process to terminate, then remove its lock
   * @returns exit status (0 on success, negative signal number when killed)
   */
  async wait(proc: SupervisedProcess): Promise<number> {
    if (proc.state !== ProcessState.RUNNING) {
      throw new RunnerError(ErrorCode.E403_PROCESS_NOT_RUNNING, `process ${proc.pid} is ${proc.state}`, {
        pid: proc.pid,
      });
    }

    const exitStatus = await proc.waitForExit();

    try {
      removeProcessLock(proc.lockPath);
    } catch (error) {
      this.logger.warn('PROCESS', `cannot remove process lock ${proc.lockPath}: ${(error as Error).message}`);
    }

    this.logger.debug('PROCESS', `process ${proc.pid} exited with status ${exitStatus}`);
    this.emit('process:exited', proc, exitStatus);
    return exitStatus;
  }
}
