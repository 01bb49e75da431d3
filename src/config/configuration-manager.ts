/**
 * Configuration Manager
 *
 * Responsible for:
 * - Loading the optional user configuration file (<home>/config.yml)
 * - Applying environment overrides and default values
 * - Validating the result
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { LogLevelName, isLogLevelName } from '../logging/logger';

/**
 * Interpreter invocation used to start operation processes:
 * `[interpreter, ...args, <operation tokens>]`
 */
export interface RuntimeConfig {
  interpreter: string;
  args: string[];
}

/**
 * Full configuration structure
 */
export interface Configuration {
  home: string;
  runs_dir: string;
  log_level: LogLevelName;
  runtime: RuntimeConfig;
  /** Plugins enabled for every operation unless disabled by the model */
  plugins: string[];
  /** Directories searched for bundled runtime-support packages */
  runtime_search_path: string[];
}

/**
 * Raw settings from config.yml
 */
type RawSettings = Partial<Record<keyof Omit<Configuration, 'home'>, unknown>>;

export class ConfigurationError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

export const CONFIG_FILE_NAME = 'config.yml';

/**
 * Environment variables read by oprun itself
 */
export const ENV_HOME = 'OPRUN_HOME';
export const ENV_RUNS_DIR = 'OPRUN_RUNS_DIR';
export const ENV_LOG_LEVEL = 'OPRUN_LOG_LEVEL';

/**
 * Variable holding the interpreter search path passed to operations
 */
export const SEARCH_PATH_ENV = 'PYTHONPATH';

/**
 * Root of the oprun installation: the nearest directory above this module
 * holding a package.json
 */
export const INSTALL_ROOT = findInstallRoot(__dirname);

/**
 * Entry script of the default runtime. Runs the operation's main script
 * found on the search path.
 */
export const OP_MAIN = path.join(INSTALL_ROOT, 'runtime', 'op-main.js');

const DEFAULTS: Pick<Configuration, 'log_level' | 'runtime' | 'plugins'> = {
  log_level: 'info',
  runtime: {
    interpreter: process.execPath,
    args: [OP_MAIN],
  },
  plugins: [],
};

function findInstallRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      return path.resolve(start, '..', '..');
    }
    dir = parent;
  }
  return dir;
}

function isSettingsMapping(value: unknown): value is RawSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export class ConfigurationManager {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Resolve the oprun home directory
   */
  resolveHome(): string {
    const fromEnv = this.env[ENV_HOME];
    return path.resolve(fromEnv && fromEnv.length > 0 ? fromEnv : path.join(os.homedir(), '.oprun'));
  }

  /**
   * Load configuration
   * @throws ConfigurationError if configuration is invalid
   */
  loadConfiguration(home: string = this.resolveHome()): Configuration {
    const rawSettings = this.loadSettingsFile(path.join(home, CONFIG_FILE_NAME));
    return this.buildConfiguration(rawSettings, home);
  }

  private loadSettingsFile(settingsPath: string): RawSettings {
    if (!fs.existsSync(settingsPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(settingsPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        ErrorCode.E101_CONFIG_FILE_INVALID,
        `Failed to parse ${settingsPath}: ${(error as Error).message}`,
        { settingsPath }
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isSettingsMapping(parsed)) {
      throw new ConfigurationError(
        ErrorCode.E101_CONFIG_FILE_INVALID,
        `${settingsPath} must contain a mapping`,
        { settingsPath }
      );
    }
    return parsed;
  }

  private buildConfiguration(raw: RawSettings, home: string): Configuration {
    const runsDir = this.env[ENV_RUNS_DIR] || raw.runs_dir || path.join(home, 'runs');
    if (typeof runsDir !== 'string') {
      throw invalidValue('runs_dir', runsDir, 'a path');
    }

    const logLevel = this.env[ENV_LOG_LEVEL] || raw.log_level || DEFAULTS.log_level;
    if (!isLogLevelName(logLevel)) {
      throw invalidValue('log_level', logLevel, 'one of debug, info, warn, error');
    }

    const plugins = raw.plugins ?? DEFAULTS.plugins;
    if (!isStringList(plugins)) {
      throw invalidValue('plugins', plugins, 'a list of plugin names');
    }

    const searchPath = raw.runtime_search_path ?? this.ambientSearchPath();
    if (!isStringList(searchPath)) {
      throw invalidValue('runtime_search_path', searchPath, 'a list of directories');
    }

    return {
      home,
      runs_dir: path.resolve(home, runsDir),
      log_level: logLevel,
      runtime: parseRuntime(raw.runtime, 'runtime') ?? {
        interpreter: DEFAULTS.runtime.interpreter,
        args: [...DEFAULTS.runtime.args],
      },
      plugins: [...plugins],
      runtime_search_path: [...searchPath],
    };
  }

  private ambientSearchPath(): string[] {
    const value = this.env[SEARCH_PATH_ENV];
    if (!value) {
      return [];
    }
    return value.split(path.delimiter).filter((entry) => entry.length > 0);
  }
}

/**
 * Validate a `runtime` mapping from a configuration or model file
 * @returns undefined when the value is absent
 */
export function parseRuntime(value: unknown, field: string): RuntimeConfig | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw invalidValue(field, value, 'a mapping with interpreter and args');
  }
  const interpreter = 'interpreter' in value ? value.interpreter : undefined;
  const args = 'args' in value ? value.args : undefined;
  if (typeof interpreter !== 'string' || interpreter.length === 0) {
    throw invalidValue(`${field}.interpreter`, interpreter, 'a non-empty string');
  }
  if (args !== undefined && !isStringList(args)) {
    throw invalidValue(`${field}.args`, args, 'a list of strings');
  }
  return { interpreter, args: args ? [...args] : [] };
}

function invalidValue(field: string, value: unknown, expected: string): ConfigurationError {
  const reason = `${field} must be ${expected}, got ${JSON.stringify(value)}`;
  return new ConfigurationError(ErrorCode.E102_CONFIG_VALUE_INVALID, reason, { field, value, reason });
}
