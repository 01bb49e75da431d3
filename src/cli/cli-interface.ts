/**
 * CLI Interface for oprun
 *
 *   oprun run <opref> [name=value ...] [--modelfile <path>] [--runs-dir <path>]
 *   oprun runs [--runs-dir <path>]
 *   oprun show <run-id> [--runs-dir <path>]
 */

import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { Configuration, ConfigurationManager } from '../config/configuration-manager';
import { Logger, getLogger } from '../logging/logger';
import { DEFAULT_MODEL_FILE, FlagValue, isFlagValue, loadModelFile } from '../models/model-file';
import { OpRef } from '../models/op-ref';
import { RunRecord, listRuns } from '../models/run';
import { createOperation, CreateOperationOptions } from '../orchestration/operation';

export class CLIError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CLIError';
  }
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command?: string;
  opref?: string;
  runId?: string;
  modelFile?: string;
  runsDir?: string;
  flags: Record<string, FlagValue>;
  help?: boolean;
  version?: boolean;
}

export const VALID_COMMANDS = ['run', 'runs', 'show'];

export const HELP_TEXT = `Usage: oprun <command> [options]

Commands:
  run <opref> [NAME=VALUE ...]   Run an operation as a tracked run
  runs                           List runs
  show <run-id>                  Show the attributes of a run

Options:
  --modelfile <path>   Model file defining operations (default: ${DEFAULT_MODEL_FILE})
  --runs-dir <path>    Runs directory (default: ~/.oprun/runs)
  --help, -h           Show this help message
  --version, -v        Show version

References:
  [[PACKAGE/]MODEL:]OPERATION, e.g. train, mnist:train
`;

/**
 * Parse a `name=value` flag argument. Values follow YAML scalar rules.
 */
export function parseFlagArg(arg: string): [string, FlagValue] {
  const eq = arg.indexOf('=');
  const name = arg.slice(0, eq);
  const raw = arg.slice(eq + 1);
  if (eq <= 0) {
    throw new CLIError(ErrorCode.E102_CONFIG_VALUE_INVALID, `invalid flag argument: ${arg}`);
  }
  if (raw === '') {
    return [name, null];
  }
  let value: unknown;
  try {
    value = yaml.load(raw);
  } catch {
    value = raw;
  }
  return [name, isFlagValue(value) ? value : raw];
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { flags: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--modelfile' || arg === '--runs-dir') {
      const value = args[i + 1];
      if (value === undefined) {
        throw new CLIError(ErrorCode.E102_CONFIG_VALUE_INVALID, `${arg} requires a value`);
      }
      i++;
      if (arg === '--modelfile') {
        result.modelFile = value;
      } else {
        result.runsDir = value;
      }
    } else if (arg.startsWith('-')) {
      throw new CLIError(ErrorCode.E102_CONFIG_VALUE_INVALID, `unknown option: ${arg}`);
    } else if (!result.command) {
      result.command = arg;
    } else if (result.command === 'run' && result.opref === undefined) {
      result.opref = arg;
    } else if (result.command === 'run' && arg.includes('=')) {
      const [name, value] = parseFlagArg(arg);
      result.flags[name] = value;
    } else if (result.command === 'show' && result.runId === undefined) {
      result.runId = arg;
    } else {
      throw new CLIError(ErrorCode.E102_CONFIG_VALUE_INVALID, `unexpected argument: ${arg}`);
    }
  }

  return result;
}

/**
 * Validate parsed arguments
 */
export function validateArgs(args: ParsedArgs): ParsedArgs {
  if (args.version || args.help) {
    return args;
  }
  if (!args.command) {
    throw new CLIError(
      ErrorCode.E102_CONFIG_VALUE_INVALID,
      'No command specified. Use --help for usage information.'
    );
  }
  if (!VALID_COMMANDS.includes(args.command)) {
    throw new CLIError(ErrorCode.E102_CONFIG_VALUE_INVALID, `Unknown command: ${args.command}`);
  }
  if (args.command === 'run' && !args.opref) {
    throw new CLIError(ErrorCode.E303_INVALID_REFERENCE, 'run command requires an operation');
  }
  if (args.command === 'show' && !args.runId) {
    throw new CLIError(ErrorCode.E405_RUN_NOT_FOUND, 'show command requires a run id');
  }
  return args;
}

export interface CLIOptions {
  version: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Passed through to the operation (plugins, materializer, supervisor) */
  operation?: Omit<CreateOperationOptions, 'logger' | 'env'>;
}

export class CLI {
  private readonly options: CLIOptions;
  private readonly logger: Logger;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: CLIOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger();
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  /**
   * Run a command line
   * @returns process exit code
   */
  async run(argv: string[]): Promise<number> {
    try {
      const args = validateArgs(parseArgs(argv));
      if (args.version) {
        this.out(this.options.version);
        return 0;
      }
      if (args.help) {
        this.out(HELP_TEXT);
        return 0;
      }

      const config = this.loadConfiguration(args);
      this.logger.setLevel(config.log_level);

      switch (args.command) {
        case 'run':
          return await this.runOperation(args, config);
        case 'runs':
          return this.listRuns(config);
        case 'show':
          return this.showRun(args, config);
        default:
          throw new CLIError(ErrorCode.E102_CONFIG_VALUE_INVALID, `Unknown command: ${args.command}`);
      }
    } catch (error) {
      this.err(`Error: ${(error as Error).message}`);
      return 1;
    }
  }

  private loadConfiguration(args: ParsedArgs): Configuration {
    const config = new ConfigurationManager(this.options.env).loadConfiguration();
    if (args.runsDir) {
      return { ...config, runs_dir: path.resolve(this.cwd(), args.runsDir) };
    }
    return config;
  }

  private async runOperation(args: ParsedArgs, config: Configuration): Promise<number> {
    const { opref, extra } = OpRef.fromString(args.opref ?? '');
    if (extra.length > 0) {
      throw new CLIError(
        ErrorCode.E303_INVALID_REFERENCE,
        `unexpected text after operation name: ${JSON.stringify(extra)}`
      );
    }
    const modelfile = loadModelFile(path.resolve(this.cwd(), args.modelFile ?? DEFAULT_MODEL_FILE));
    const opdef = modelfile.findOperation(opref).withFlagValues(args.flags);

    const operation = createOperation(opdef, config, {
      ...this.options.operation,
      logger: this.logger,
      env: this.options.env,
    });
    const exitStatus = await operation.run();
    this.logger.info('RUN', `run ${operation.runRecord?.id} exited with status ${exitStatus}`);
    return exitStatus;
  }

  private listRuns(config: Configuration): number {
    for (const run of listRuns(config.runs_dir)) {
      const opref = run.getAttribute('opref');
      this.out(`${run.id}  ${run.status()}  ${typeof opref === 'string' ? opref : '?'}`);
    }
    return 0;
  }

  private showRun(args: ParsedArgs, config: Configuration): number {
    const run = RunRecord.open(config.runs_dir, args.runId ?? '');
    this.out(`id: ${run.id}`);
    this.out(`path: ${run.path}`);
    this.out(`status: ${run.status()}`);
    this.out(yaml.dump(run.attributes()).trimEnd());
    return 0;
  }

  private cwd(): string {
    return this.options.cwd ?? process.cwd();
  }
}
