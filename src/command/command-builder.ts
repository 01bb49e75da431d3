/**
 * Command Builder
 *
 * Computes the argument vector and environment of an operation process from
 * its definition. Runs before any run exists, so the run directory is not
 * part of the result; the orchestrator appends `--rundir <path>` at spawn.
 *
 *   [interpreter, ...runtimeArgs, ...operationTokens, ...flagTokens]
 */

import * as path from 'path';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { INSTALL_ROOT, RuntimeConfig, SEARCH_PATH_ENV } from '../config/configuration-manager';
import { Logger, getLogger } from '../logging/logger';
import { FlagValue, OperationDef } from '../models/model-file';
import { IPluginProvider, PluginDecision } from '../plugins/plugin-provider';
import { ShellSyntaxError, shellSplit } from './shell-split';

export const PLUGINS_ENV = 'GUILD_PLUGINS';
export const LOG_LEVEL_ENV = 'LOG_LEVEL';

/**
 * Directory names of runtime-support packages bundled with oprun. Matching
 * entries of the runtime search path are passed on to operations.
 */
export const BUNDLED_RUNTIME_PACKAGES: readonly string[] = ['org_psutil'];

export const DISABLED_BY_CONFIG_REASON = 'explicitly disabled by model or user config';

export type CommandTemplate =
  | { kind: 'tokens'; tokens: readonly string[] }
  | { kind: 'shell'; source: string };

export interface CommandInvocation {
  args: string[];
  env: Record<string, string>;
}

export class InvalidCommandError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InvalidCommandError';
  }
}

export interface CommandBuilderOptions {
  pluginProvider: IPluginProvider;
  /** Base environment, already sanitized */
  baseEnv: () => Record<string, string>;
  /** Runtime used when the operation declares none */
  defaultRuntime: RuntimeConfig;
  /** Directories searched for bundled runtime-support packages */
  runtimeSearchPath?: readonly string[];
  installRoot?: string;
  logger?: Logger;
}

/**
 * Resolve a declared command into its tagged form
 * @throws InvalidCommandError with E202 for any other shape
 */
export function resolveCommandTemplate(cmd: unknown): CommandTemplate {
  if (typeof cmd === 'string') {
    return { kind: 'shell', source: cmd };
  }
  if (Array.isArray(cmd)) {
    const tokens = cmd.map((token) => {
      if (typeof token === 'string') {
        return token;
      }
      if (typeof token === 'number' || typeof token === 'boolean') {
        return String(token);
      }
      throw new InvalidCommandError(
        ErrorCode.E202_UNSUPPORTED_COMMAND,
        `unsupported command token: ${JSON.stringify(token)}`,
        { cmd }
      );
    });
    return { kind: 'tokens', tokens };
  }
  throw new InvalidCommandError(
    ErrorCode.E202_UNSUPPORTED_COMMAND,
    `unsupported command: ${JSON.stringify(cmd) ?? String(cmd)}`,
    { cmd }
  );
}

/**
 * @throws InvalidCommandError when the template yields no tokens
 */
export function commandTokens(template: CommandTemplate): string[] {
  let tokens: string[];
  if (template.kind === 'tokens') {
    tokens = [...template.tokens];
  } else {
    try {
      tokens = shellSplit(template.source);
    } catch (error) {
      if (error instanceof ShellSyntaxError) {
        throw new InvalidCommandError(
          ErrorCode.E203_COMMAND_SYNTAX_ERROR,
          `${error.message} in command: ${template.source}`,
          { cmd: template.source }
        );
      }
      throw error;
    }
  }
  if (tokens.length === 0) {
    throw new InvalidCommandError(
      ErrorCode.E201_EMPTY_COMMAND,
      undefined,
      { cmd: template.kind === 'shell' ? template.source : [] }
    );
  }
  return tokens;
}

/**
 * Names of `--name` and `--name=value` options in a token list
 */
export function commandOptions(tokens: readonly string[]): Set<string> {
  const options = new Set<string>();
  for (const token of tokens) {
    const match = /^--([^=]+)/.exec(token);
    if (match) {
      options.add(match[1]);
    }
  }
  return options;
}

/**
 * Flag tokens in name order. Flags already given as options in the command
 * are dropped with a warning.
 *
 * Values are rendered from their parsed YAML form with `String`, not from the
 * model file text: `lr: 1.0` is passed as `--lr 1` and `lr: 1e-3` as
 * `--lr 0.001`. Quote a value in the model file to pass it verbatim.
 */
export function flagArgs(
  flags: Record<string, FlagValue>,
  cmdTokens: readonly string[],
  logger: Logger = getLogger()
): string[] {
  const args: string[] = [];
  const cmdOpts = commandOptions(cmdTokens);
  for (const name of Object.keys(flags).sort()) {
    const value = flags[name];
    if (cmdOpts.has(name)) {
      logger.warn(
        'COMMAND',
        `ignoring flag '${name} = ${String(value)}' because it's shadowed in the operation cmd`,
        { flag: name, value }
      );
      continue;
    }
    args.push(`--${name}`);
    if (value !== null) {
      args.push(String(value));
    }
  }
  return args;
}

export function isPluginDisabledByConfig(name: string, opdef: OperationDef): boolean {
  const disabled = [...opdef.disabledPlugins, ...opdef.modeldef.disabledPlugins];
  return disabled.some((disabledName) => disabledName === name || disabledName === 'all');
}

/**
 * Sorted names of the plugins enabled for an operation
 */
export function operationPlugins(
  opdef: OperationDef,
  provider: IPluginProvider,
  logger: Logger = getLogger()
): string[] {
  const enabled: string[] = [];
  for (const plugin of provider.listPlugins()) {
    let decision: PluginDecision;
    if (isPluginDisabledByConfig(plugin.name, opdef)) {
      decision = { enabled: false, reason: DISABLED_BY_CONFIG_REASON };
    } else {
      decision = plugin.enabledForOperation(opdef);
    }
    logger.debug(
      'PLUGIN',
      `plugin '${plugin.name}' ${decision.enabled ? 'enabled' : 'disabled'}` +
        (decision.reason ? ` (${decision.reason})` : '')
    );
    if (decision.enabled) {
      enabled.push(plugin.name);
    }
  }
  return enabled.sort();
}

/**
 * Model source directory, install root, then bundled runtime-support packages
 */
export function operationSearchPath(
  opdef: OperationDef,
  installRoot: string,
  runtimeSearchPath: readonly string[]
): string[] {
  const bundled = runtimeSearchPath
    .filter((entry) => BUNDLED_RUNTIME_PACKAGES.includes(path.basename(entry)))
    .map((entry) => path.resolve(entry));
  return [path.resolve(opdef.modelfile.dir), path.resolve(installRoot), ...bundled];
}

export class CommandBuilder {
  private readonly options: CommandBuilderOptions;
  private readonly logger: Logger;

  constructor(options: CommandBuilderOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * @throws InvalidCommandError when the operation command is empty or malformed
   */
  build(opdef: OperationDef): CommandInvocation {
    const runtime = opdef.runtime ?? this.options.defaultRuntime;
    const cmdTokens = commandTokens(resolveCommandTemplate(opdef.cmd));
    const args = [
      runtime.interpreter,
      ...runtime.args,
      ...cmdTokens,
      ...flagArgs(opdef.flagValues(), cmdTokens, this.logger),
    ];
    return { args, env: this.buildEnv(opdef) };
  }

  private buildEnv(opdef: OperationDef): Record<string, string> {
    const env: Record<string, string> = { ...this.options.baseEnv() };
    env[PLUGINS_ENV] = operationPlugins(opdef, this.options.pluginProvider, this.logger).join(',');
    env[LOG_LEVEL_ENV] = String(this.logger.getEffectiveLevel());
    env[SEARCH_PATH_ENV] = operationSearchPath(
      opdef,
      this.options.installRoot ?? INSTALL_ROOT,
      this.options.runtimeSearchPath ?? []
    ).join(path.delimiter);
    return env;
  }
}
