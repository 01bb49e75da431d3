/**
 * Model File
 *
 * A YAML document listing models and their operations:
 *
 *   - model: mnist
 *     disabled-plugins: [cpu]
 *     operations:
 *       train:
 *         cmd: train.py --epochs 3
 *         flags:
 *           lr: 0.1
 *           batch: { default: 32, description: batch size }
 *         requires: [data.csv]
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { RuntimeConfig, parseRuntime, ConfigurationError } from '../config/configuration-manager';
import { ModelRef, OpRef } from './op-ref';

export const DEFAULT_MODEL_FILE = 'oprun.yml';
export const MODEL_FILE_PKG_TYPE = 'modelfile';

export type FlagValue = string | number | boolean | null;

export interface FlagDef {
  name: string;
  default: FlagValue;
  description?: string;
}

/**
 * A file the operation requires, relative to the model file directory
 */
export interface DependencyDef {
  file: string;
}

export class ModelFileError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ModelFileError';
  }
}

export function isFlagValue(value: unknown): value is FlagValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class OperationDef {
  readonly name: string;
  /** Command template as declared: a shell string or a list of tokens */
  readonly cmd: unknown;
  readonly description?: string;
  readonly flags: ReadonlyMap<string, FlagDef>;
  readonly dependencies: readonly DependencyDef[];
  readonly disabledPlugins: readonly string[];
  readonly modeldef: ModelDef;
  private readonly ownRuntime?: RuntimeConfig;

  constructor(
    modeldef: ModelDef,
    init: {
      name: string;
      cmd: unknown;
      description?: string;
      flags?: Iterable<FlagDef>;
      dependencies?: DependencyDef[];
      disabledPlugins?: string[];
      runtime?: RuntimeConfig;
    }
  ) {
    this.modeldef = modeldef;
    this.name = init.name;
    this.cmd = init.cmd;
    this.description = init.description;
    const flags = new Map<string, FlagDef>();
    for (const flag of init.flags ?? []) {
      flags.set(flag.name, flag);
    }
    this.flags = flags;
    this.dependencies = [...(init.dependencies ?? [])];
    this.disabledPlugins = [...(init.disabledPlugins ?? [])];
    this.ownRuntime = init.runtime;
  }

  get modelfile(): ModelFile {
    return this.modeldef.modelfile;
  }

  /**
   * Runtime declared on the operation or its model, if any
   */
  get runtime(): RuntimeConfig | undefined {
    return this.ownRuntime ?? this.modeldef.runtime;
  }

  flagValues(): Record<string, FlagValue> {
    const values: Record<string, FlagValue> = {};
    for (const [name, flag] of this.flags) {
      values[name] = flag.default;
    }
    return values;
  }

  /**
   * Copy of this operation with some flag values replaced or added
   */
  withFlagValues(overrides: Record<string, FlagValue>): OperationDef {
    const flags = new Map(this.flags);
    for (const [name, value] of Object.entries(overrides)) {
      const existing = flags.get(name);
      flags.set(name, { name, default: value, description: existing?.description });
    }
    return new OperationDef(this.modeldef, {
      name: this.name,
      cmd: this.cmd,
      description: this.description,
      flags: flags.values(),
      dependencies: [...this.dependencies],
      disabledPlugins: [...this.disabledPlugins],
      runtime: this.ownRuntime,
    });
  }
}

export class ModelDef {
  readonly name: string;
  readonly description?: string;
  readonly disabledPlugins: readonly string[];
  readonly runtime?: RuntimeConfig;
  readonly modelfile: ModelFile;
  readonly operations: OperationDef[] = [];

  constructor(
    modelfile: ModelFile,
    init: { name: string; description?: string; disabledPlugins?: string[]; runtime?: RuntimeConfig }
  ) {
    this.modelfile = modelfile;
    this.name = init.name;
    this.description = init.description;
    this.disabledPlugins = [...(init.disabledPlugins ?? [])];
    this.runtime = init.runtime;
  }

  get reference(): ModelRef {
    return {
      pkgType: MODEL_FILE_PKG_TYPE,
      pkgName: this.modelfile.dir,
      pkgVersion: this.modelfile.version,
      modelName: this.name,
    };
  }

  getOperation(name: string): OperationDef | undefined {
    return this.operations.find((op) => op.name === name);
  }
}

export class ModelFile {
  /** Absolute path of the model file */
  readonly src: string;
  /** Short content hash, used as the package version */
  readonly version: string;
  readonly models: ModelDef[] = [];

  constructor(src: string, version: string) {
    this.src = path.resolve(src);
    this.version = version;
  }

  get dir(): string {
    return path.dirname(this.src);
  }

  getModel(name: string): ModelDef | undefined {
    return this.models.find((model) => model.name === name);
  }

  /**
   * Resolve a user-entered reference (see OpRef.fromString) to an operation
   * @throws ModelFileError with E105 when nothing or more than one operation matches
   */
  findOperation(opref: OpRef): OperationDef {
    const opName = opref.opName;
    if (opName === undefined) {
      throw notFound(`reference ${opref.toString()} does not name an operation`, opref);
    }
    if (
      opref.pkgName !== undefined &&
      opref.pkgName !== this.dir &&
      opref.pkgName !== path.basename(this.dir)
    ) {
      throw notFound(`package '${opref.pkgName}' is not defined by ${this.src}`, opref);
    }

    if (opref.modelName !== undefined) {
      const model = this.getModel(opref.modelName);
      if (!model) {
        throw notFound(`model '${opref.modelName}' is not defined in ${this.src}`, opref);
      }
      const op = model.getOperation(opName);
      if (!op) {
        throw notFound(`model '${model.name}' does not define operation '${opName}'`, opref);
      }
      return op;
    }

    const candidates = this.models
      .map((model) => model.getOperation(opName))
      .filter((op): op is OperationDef => op !== undefined);
    if (candidates.length === 0) {
      throw notFound(`no model in ${this.src} defines operation '${opName}'`, opref);
    }
    if (candidates.length > 1) {
      const names = candidates.map((op) => op.modeldef.name).join(', ');
      throw notFound(`operation '${opName}' is defined by several models (${names}); qualify it as MODEL:${opName}`, opref);
    }
    return candidates[0];
  }
}

function notFound(message: string, opref: OpRef): ModelFileError {
  return new ModelFileError(ErrorCode.E105_OPERATION_NOT_FOUND, message, { opref: opref.toString() });
}

/**
 * Read and parse a model file
 * @throws ModelFileError with E103 when the file does not exist
 */
export function loadModelFile(src: string): ModelFile {
  let content: string;
  try {
    content = fs.readFileSync(src, 'utf-8');
  } catch (error) {
    throw new ModelFileError(
      ErrorCode.E103_MODEL_FILE_NOT_FOUND,
      `cannot read model file ${src}: ${(error as Error).message}`,
      { src }
    );
  }
  return parseModelFile(src, content);
}

/**
 * Parse model file content. `src` locates the file; it need not exist.
 * @throws ModelFileError with E104 on any structural problem
 */
export function parseModelFile(src: string, content: string): ModelFile {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw invalid(src, `YAML error: ${(error as Error).message}`);
  }

  const version = crypto.createHash('sha256').update(content).digest('hex').slice(0, 8);
  const modelfile = new ModelFile(src, version);

  if (data === null || data === undefined) {
    return modelfile;
  }
  if (!Array.isArray(data)) {
    throw invalid(src, 'expected a list of models');
  }

  for (const [index, item] of data.entries()) {
    const model = parseModel(modelfile, item, `models[${index}]`);
    if (modelfile.getModel(model.name)) {
      throw invalid(src, `duplicate model '${model.name}'`);
    }
    modelfile.models.push(model);
  }
  return modelfile;
}

function parseModel(modelfile: ModelFile, data: unknown, where: string): ModelDef {
  const src = modelfile.src;
  if (!isMapping(data)) {
    throw invalid(src, `${where} must be a mapping`);
  }
  const name = data.model;
  if (typeof name !== 'string' || name.length === 0) {
    throw invalid(src, `${where} is missing 'model'`);
  }

  const model = new ModelDef(modelfile, {
    name,
    description: optionalString(src, data.description, `${name}.description`),
    disabledPlugins: stringList(src, data['disabled-plugins'], `${name}.disabled-plugins`),
    runtime: runtimeOf(src, data.runtime, `${name}.runtime`),
  });

  const operations = data.operations ?? {};
  if (!isMapping(operations)) {
    throw invalid(src, `${name}.operations must be a mapping`);
  }
  for (const [opName, opData] of Object.entries(operations)) {
    model.operations.push(parseOperation(model, opName, opData));
  }
  return model;
}

function parseOperation(model: ModelDef, name: string, data: unknown): OperationDef {
  const src = model.modelfile.src;
  const where = `${model.name}.operations.${name}`;
  // `train: train.py --epochs 3` is shorthand for a command-only operation
  const op: Record<string, unknown> = isMapping(data) ? data : { cmd: data };

  return new OperationDef(model, {
    name,
    cmd: op.cmd,
    description: optionalString(src, op.description, `${where}.description`),
    flags: parseFlags(src, op.flags, `${where}.flags`),
    dependencies: parseDependencies(src, op.requires, `${where}.requires`),
    disabledPlugins: stringList(src, op['disabled-plugins'], `${where}.disabled-plugins`),
    runtime: runtimeOf(src, op.runtime, `${where}.runtime`),
  });
}

function parseFlags(src: string, data: unknown, where: string): FlagDef[] {
  if (data === undefined || data === null) {
    return [];
  }
  if (!isMapping(data)) {
    throw invalid(src, `${where} must be a mapping`);
  }
  return Object.entries(data).map(([name, value]) => {
    if (isFlagValue(value)) {
      return { name, default: value };
    }
    if (isMapping(value)) {
      const defaultValue = value.default ?? null;
      if (!isFlagValue(defaultValue)) {
        throw invalid(src, `${where}.${name}.default must be a scalar`);
      }
      return {
        name,
        default: defaultValue,
        description: optionalString(src, value.description, `${where}.${name}.description`),
      };
    }
    throw invalid(src, `${where}.${name} must be a scalar or a mapping`);
  });
}

function parseDependencies(src: string, data: unknown, where: string): DependencyDef[] {
  if (data === undefined || data === null) {
    return [];
  }
  const items = Array.isArray(data) ? data : [data];
  return items.map((item, index) => {
    if (typeof item === 'string') {
      return { file: item };
    }
    if (isMapping(item) && typeof item.file === 'string') {
      return { file: item.file };
    }
    throw invalid(src, `${where}[${index}] must be a path or a mapping with 'file'`);
  });
}

function stringList(src: string, data: unknown, where: string): string[] {
  if (data === undefined || data === null) {
    return [];
  }
  if (typeof data === 'string') {
    return [data];
  }
  if (Array.isArray(data) && data.every((item) => typeof item === 'string')) {
    return data;
  }
  throw invalid(src, `${where} must be a list of names`);
}

function optionalString(src: string, data: unknown, where: string): string | undefined {
  if (data === undefined || data === null) {
    return undefined;
  }
  if (typeof data !== 'string') {
    throw invalid(src, `${where} must be a string`);
  }
  return data;
}

function runtimeOf(src: string, data: unknown, where: string): RuntimeConfig | undefined {
  try {
    return parseRuntime(data, where);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw invalid(src, String(error.details?.reason ?? error.message));
    }
    throw error;
  }
}

function invalid(src: string, message: string): ModelFileError {
  return new ModelFileError(ErrorCode.E104_MODEL_FILE_INVALID, `${src}: ${message}`, { src });
}
