/**
 * Operation - run lifecycle orchestrator
 *
 * Executes one operation definition exactly once as a tracked run:
 *
 *   1. allocate run id and directory, create the skeleton
 *   2. write opref, flags, cmd, env, started
 *   3. materialize dependencies into the run directory
 *   4. spawn `cmd --rundir <run>` with RUNDIR=<run>, cwd <run>
 *   5. wait, then write exit_status and stopped
 *
 * A failure before step 4 leaves the attributes written so far on disk and
 * no process is started. A spawn failure writes no exit attributes.
 */

import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { CommandBuilder, CommandInvocation } from '../command/command-builder';
import { Configuration } from '../config/configuration-manager';
import { ConfiguredStorageProvider, IStorageProvider } from '../config/storage-provider';
import { FileDependencyMaterializer, IDependencyMaterializer } from '../deps/dependency-materializer';
import { Logger, getLogger } from '../logging/logger';
import { OperationState } from '../models/enums';
import { OperationDef } from '../models/model-file';
import { OpRef } from '../models/op-ref';
import { LOCK_FILE, RunRecord } from '../models/run';
import { IPluginProvider, pluginProviderFromConfig } from '../plugins/plugin-provider';
import { ProcessSupervisor } from '../supervisor/process-supervisor';

export const RUNDIR_ARG = '--rundir';
export const RUNDIR_ENV = 'RUNDIR';

export type OperationEventType =
  | 'RUN_INITIALIZED'
  | 'ATTRIBUTES_WRITTEN'
  | 'DEPENDENCIES_RESOLVED'
  | 'PROCESS_STARTED'
  | 'PROCESS_EXITED'
  | 'RUN_FINISHED';

export interface OperationEvent {
  type: OperationEventType;
  runId: string;
  details: Record<string, unknown>;
}

export type OperationEventCallback = (event: OperationEvent) => void;

export interface OperationOptions {
  storage: IStorageProvider;
  commandBuilder: CommandBuilder;
  materializer: IDependencyMaterializer;
  supervisor?: ProcessSupervisor;
  logger?: Logger;
  /** Current unix time in seconds */
  clock?: () => number;
  onEvent?: OperationEventCallback;
}

export class OperationStateError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OperationStateError';
  }
}

export function unixTime(): number {
  return Math.floor(Date.now() / 1000);
}

export class Operation {
  readonly opdef: OperationDef;
  readonly cmdArgs: readonly string[];
  readonly cmdEnv: Readonly<Record<string, string>>;

  private readonly options: OperationOptions;
  private readonly logger: Logger;
  private readonly supervisor: ProcessSupervisor;
  private readonly clock: () => number;
  private currentState: OperationState = OperationState.NOT_STARTED;
  private currentRun: RunRecord | undefined;

  /**
   * @throws InvalidCommandError when the operation command is empty or malformed
   */
  constructor(opdef: OperationDef, options: OperationOptions) {
    this.opdef = opdef;
    this.options = options;
    this.logger = options.logger ?? getLogger();
    this.supervisor = options.supervisor ?? new ProcessSupervisor({ logger: this.logger });
    this.clock = options.clock ?? unixTime;

    const invocation: CommandInvocation = options.commandBuilder.build(opdef);
    this.cmdArgs = invocation.args;
    this.cmdEnv = invocation.env;
  }

  get state(): OperationState {
    return this.currentState;
  }

  /**
   * The run created by `run()`, once it has been allocated
   */
  get runRecord(): RunRecord | undefined {
    return this.currentRun;
  }

  /**
   * Execute the operation
   * @returns the process exit status
   * @throws OperationStateError with E401 when called a second time
   */
  async run(): Promise<number> {
    if (this.currentState !== OperationState.NOT_STARTED) {
      throw new OperationStateError(
        ErrorCode.E401_OPERATION_ALREADY_RUN,
        `operation '${this.opdef.name}' is ${this.currentState}`,
        { operation: this.opdef.name, state: this.currentState }
      );
    }
    this.currentState = OperationState.RUNNING;

    try {
      const started = this.clock();
      const run = this.initRun();
      this.initAttributes(run, started);
      await this.resolveDependencies(run);
      const exitStatus = await this.execute(run);
      const stopped = this.clock();
      this.finalizeAttributes(run, exitStatus, stopped);
      return exitStatus;
    } finally {
      this.currentState = OperationState.FINISHED;
    }
  }

  private initRun(): RunRecord {
    const run = RunRecord.create(this.options.storage.runsDir());
    this.currentRun = run;
    this.logger.debug('RUN', `initializing run in ${run.path}`);
    run.initSkeleton();
    this.emit('RUN_INITIALIZED', run, { path: run.path });
    return run;
  }

  private initAttributes(run: RunRecord, started: number): void {
    const opref = OpRef.fromOperation(this.opdef.name, this.opdef.modeldef.reference);
    run.writeAttribute('opref', opref.toString());
    run.writeAttribute('flags', this.opdef.flagValues());
    run.writeAttribute('cmd', [...this.cmdArgs]);
    run.writeAttribute('env', { ...this.cmdEnv });
    run.writeAttribute('started', started);
    this.emit('ATTRIBUTES_WRITTEN', run, { opref: opref.toString() });
  }

  private async resolveDependencies(run: RunRecord): Promise<void> {
    await this.options.materializer.resolve(this.opdef.dependencies, {
      targetDir: run.path,
      opdef: this.opdef,
    });
    this.emit('DEPENDENCIES_RESOLVED', run, { count: this.opdef.dependencies.length });
  }

  private async execute(run: RunRecord): Promise<number> {
    const args = [...this.cmdArgs, RUNDIR_ARG, run.path];
    const env = { ...this.cmdEnv, [RUNDIR_ENV]: run.path };

    this.logger.debug('RUN', `starting operation run ${run.id}`);
    this.logger.debug('RUN', `operation command: ${JSON.stringify(args)}`);
    this.logger.debug('RUN', `operation cwd: ${run.path}`);

    const proc = await this.supervisor.spawn({
      args,
      env,
      cwd: run.path,
      lockPath: run.pathFor(LOCK_FILE),
    });
    this.emit('PROCESS_STARTED', run, { pid: proc.pid });

    const exitStatus = await this.supervisor.wait(proc);
    this.emit('PROCESS_EXITED', run, { pid: proc.pid, exitStatus });
    return exitStatus;
  }

  private finalizeAttributes(run: RunRecord, exitStatus: number, stopped: number): void {
    run.writeAttribute('exit_status', exitStatus);
    run.writeAttribute('stopped', stopped);
    this.emit('RUN_FINISHED', run, { exitStatus });
  }

  private emit(type: OperationEventType, run: RunRecord, details: Record<string, unknown>): void {
    this.options.onEvent?.({ type, runId: run.id, details });
  }
}

export interface CreateOperationOptions {
  pluginProvider?: IPluginProvider;
  materializer?: IDependencyMaterializer;
  supervisor?: ProcessSupervisor;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  onEvent?: OperationEventCallback;
}

/**
 * Wire an Operation from loaded configuration
 */
export function createOperation(
  opdef: OperationDef,
  config: Configuration,
  options: CreateOperationOptions = {}
): Operation {
  const logger = options.logger ?? getLogger();
  const storage = new ConfiguredStorageProvider(config, options.env);
  const commandBuilder = new CommandBuilder({
    pluginProvider: options.pluginProvider ?? pluginProviderFromConfig(config.plugins),
    baseEnv: () => storage.safeEnvironment(),
    defaultRuntime: config.runtime,
    runtimeSearchPath: config.runtime_search_path,
    logger,
  });
  return new Operation(opdef, {
    storage,
    commandBuilder,
    materializer: options.materializer ?? new FileDependencyMaterializer({ logger }),
    supervisor: options.supervisor,
    logger,
    onEvent: options.onEvent,
  });
}
