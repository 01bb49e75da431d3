/**
 * Run Record
 *
 * One tracked execution of an operation. The run directory is the process
 * working directory; oprun's own files live under `<run>/.oprun/`:
 *
 *   .oprun/attrs/<name>   one YAML document per attribute
 *   .oprun/LOCK           pid of the supervised process while it runs
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { v1 as uuidv1 } from 'uuid';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { writeFileAtomicOrThrow } from '../logging/atomic-file-writer';
import { isProcessRunning, readProcessLock } from '../locks/process-lock';
import { RunStatus } from './enums';
import { AttributeSource } from './op-ref';

export const RUN_META_DIR = '.oprun';
export const ATTRS_DIR = 'attrs';
export const LOCK_FILE = 'LOCK';

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export class RunError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RunError';
  }
}

/**
 * Time-ordered unique run id (uuid v1 without dashes)
 */
export function generateRunId(): string {
  return uuidv1().replace(/-/g, '');
}

function assertAttributeName(name: string): void {
  if (!/^[A-Za-z0-9_.-]+$/.test(name) || name === '.' || name === '..') {
    throw new Error(`invalid attribute name: ${JSON.stringify(name)}`);
  }
}

export class RunRecord implements AttributeSource {
  readonly id: string;
  readonly path: string;

  constructor(id: string, runPath: string) {
    this.id = id;
    this.path = path.resolve(runPath);
  }

  /**
   * Allocate a new run under `runsDir`. Nothing is written yet.
   */
  static create(runsDir: string): RunRecord {
    const id = generateRunId();
    return new RunRecord(id, path.join(runsDir, id));
  }

  /**
   * Open an existing run
   * @throws RunError with E405 when `runsDir/id` is not an initialized run
   */
  static open(runsDir: string, id: string): RunRecord {
    const run = new RunRecord(id, path.join(runsDir, id));
    if (!run.isInitialized()) {
      throw new RunError(ErrorCode.E405_RUN_NOT_FOUND, `run ${id} not found in ${runsDir}`, {
        runsDir,
        id,
      });
    }
    return run;
  }

  /**
   * Path inside the run's meta directory
   */
  pathFor(...names: string[]): string {
    return path.join(this.path, RUN_META_DIR, ...names);
  }

  isInitialized(): boolean {
    return fs.existsSync(this.pathFor(ATTRS_DIR));
  }

  /**
   * Create the run directory scaffold. Valid once per run.
   * @throws RunError with E404 when the run is already initialized
   */
  initSkeleton(): void {
    if (this.isInitialized()) {
      throw new RunError(
        ErrorCode.E404_RUN_ALREADY_INITIALIZED,
        `run ${this.id} is already initialized at ${this.path}`,
        { runId: this.id, path: this.path }
      );
    }
    fs.mkdirSync(this.pathFor(ATTRS_DIR), { recursive: true });
  }

  /**
   * Persist one attribute, replacing any previous value
   */
  writeAttribute(name: string, value: AttributeValue): void {
    assertAttributeName(name);
    writeFileAtomicOrThrow(this.pathFor(ATTRS_DIR, name), yaml.dump(value));
  }

  /**
   * Read one attribute; undefined when it was never written
   */
  getAttribute(name: string): unknown {
    assertAttributeName(name);
    let content: string;
    try {
      content = fs.readFileSync(this.pathFor(ATTRS_DIR, name), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    return yaml.load(content);
  }

  attributeNames(): string[] {
    if (!this.isInitialized()) {
      return [];
    }
    return fs
      .readdirSync(this.pathFor(ATTRS_DIR))
      .filter((name) => !name.startsWith('.'))
      .sort();
  }

  attributes(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const name of this.attributeNames()) {
      result[name] = this.getAttribute(name);
    }
    return result;
  }

  /**
   * Pid recorded in the lock, or null when no process is supervised
   */
  lockedPid(): number | null {
    return readProcessLock(this.pathFor(LOCK_FILE));
  }

  status(): RunStatus {
    const pid = this.lockedPid();
    if (pid !== null) {
      return isProcessRunning(pid) ? RunStatus.RUNNING : RunStatus.STALE;
    }
    const exitStatus = this.getAttribute('exit_status');
    if (typeof exitStatus !== 'number') {
      return RunStatus.INCOMPLETE;
    }
    if (exitStatus === 0) {
      return RunStatus.COMPLETED;
    }
    return exitStatus < 0 ? RunStatus.TERMINATED : RunStatus.ERROR;
  }
}

/**
 * Initialized runs under `runsDir`, oldest first by their `started` attribute
 */
export function listRuns(runsDir: string): RunRecord[] {
  if (!fs.existsSync(runsDir)) {
    return [];
  }
  const runs = fs
    .readdirSync(runsDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => new RunRecord(entry.name, path.join(runsDir, entry.name)))
    .filter((run) => run.isInitialized());

  const startedOf = (run: RunRecord): number => {
    const started = run.getAttribute('started');
    return typeof started === 'number' ? started : Number.MAX_SAFE_INTEGER;
  };
  return runs
    .map((run) => ({ run, started: startedOf(run) }))
    .sort((a, b) => a.started - b.started || a.run.id.localeCompare(b.run.id))
    .map(({ run }) => run);
}
