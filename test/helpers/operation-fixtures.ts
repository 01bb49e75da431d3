/**
 * Shared fixtures for operation tests
 *
 * Operation processes run the current Node binary against
 * test/fixtures/op-main.js, so no external interpreter is needed.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandBuilder } from '../../src/command/command-builder';
import { RuntimeConfig } from '../../src/config/configuration-manager';
import { IStorageProvider } from '../../src/config/storage-provider';
import {
  DependencyError,
  IDependencyMaterializer,
  ResolutionContext,
} from '../../src/deps/dependency-materializer';
import { ErrorCode } from '../../src/errors/error-codes';
import { Logger } from '../../src/logging/logger';
import { DependencyDef, ModelFile, OperationDef, parseModelFile } from '../../src/models/model-file';
import { Operation, OperationOptions } from '../../src/orchestration/operation';
import { IPlugin, StaticPluginProvider } from '../../src/plugins/plugin-provider';
import { ProcessSupervisor } from '../../src/supervisor/process-supervisor';

export const FIXTURE_MAIN = path.resolve(__dirname, '..', 'fixtures', 'op-main.js');

export const NODE_RUNTIME: RuntimeConfig = {
  interpreter: process.execPath,
  args: [FIXTURE_MAIN],
};

export interface OpReport {
  argv: string[];
  cwd: string;
  pid: number;
  lockPid: number | null;
  env: Record<string, string | undefined>;
}

export function makeTempDir(prefix: string = 'oprun-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Logger that keeps entries in memory only
 */
export function quietLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'debug'): Logger {
  return new Logger({ level, console: false });
}

/**
 * Write a model file into `dir` and parse it
 */
export function writeModelFile(dir: string, content: string, name: string = 'oprun.yml'): ModelFile {
  const src = path.join(dir, name);
  fs.writeFileSync(src, content);
  return parseModelFile(src, content);
}

export function operationOf(modelfile: ModelFile, modelName: string, opName: string): OperationDef {
  const op = modelfile.getModel(modelName)?.getOperation(opName);
  if (!op) {
    throw new Error(`fixture model file has no ${modelName}:${opName}`);
  }
  return op;
}

export function readReport(runPath: string): OpReport | undefined {
  const reportPath = path.join(runPath, 'op-report.json');
  if (!fs.existsSync(reportPath)) {
    return undefined;
  }
  const report: OpReport = JSON.parse(fs.readFileSync(reportPath, 'utf-8'));
  return report;
}

export class FixedStorage implements IStorageProvider {
  constructor(private readonly root: string, private readonly env: Record<string, string> = {}) {}

  runsDir(): string {
    return this.root;
  }

  safeEnvironment(): Record<string, string> {
    return { ...this.env };
  }
}

export class RecordingMaterializer implements IDependencyMaterializer {
  readonly calls: Array<{ dependencies: readonly DependencyDef[]; ctx: ResolutionContext }> = [];

  async resolve(dependencies: readonly DependencyDef[], ctx: ResolutionContext): Promise<void> {
    this.calls.push({ dependencies, ctx });
  }
}

export class FailingMaterializer implements IDependencyMaterializer {
  async resolve(): Promise<void> {
    throw new DependencyError(ErrorCode.E502_DEPENDENCY_SOURCE_NOT_FOUND, 'cannot find source file data.csv');
  }
}

export class FakePlugin implements IPlugin {
  readonly queried: string[] = [];

  constructor(
    readonly name: string,
    private readonly enabled: boolean,
    private readonly reason?: string
  ) {}

  enabledForOperation(opdef: OperationDef): { enabled: boolean; reason?: string } {
    this.queried.push(opdef.name);
    return { enabled: this.enabled, reason: this.reason };
  }
}

export interface TestOperationOptions {
  runsDir: string;
  logger?: Logger;
  plugins?: IPlugin[];
  materializer?: IDependencyMaterializer;
  clock?: () => number;
  onEvent?: OperationOptions['onEvent'];
  runtime?: RuntimeConfig;
}

export function makeOperation(opdef: OperationDef, options: TestOperationOptions): Operation {
  const logger = options.logger ?? quietLogger();
  const storage = new FixedStorage(options.runsDir);
  return new Operation(opdef, {
    storage,
    commandBuilder: new CommandBuilder({
      pluginProvider: new StaticPluginProvider(options.plugins ?? []),
      baseEnv: () => storage.safeEnvironment(),
      defaultRuntime: options.runtime ?? NODE_RUNTIME,
      installRoot: '/opt/oprun',
      logger,
    }),
    materializer: options.materializer ?? new RecordingMaterializer(),
    supervisor: new ProcessSupervisor({ stdio: 'ignore', logger }),
    logger,
    clock: options.clock,
    onEvent: options.onEvent,
  });
}
