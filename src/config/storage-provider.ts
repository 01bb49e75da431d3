/**
 * Storage Provider
 *
 * Supplies the root runs directory and the sanitized environment that
 * operation processes start from.
 */

import * as path from 'path';
import { Configuration } from './configuration-manager';

export interface IStorageProvider {
  runsDir(): string;
  safeEnvironment(): Record<string, string>;
}

/**
 * Variables never passed on to operation processes
 */
const UNSAFE_ENV_NAMES = new Set(['_', '__PYVENV_LAUNCHER__']);
const INTERNAL_ENV_PREFIX = 'OPRUN_';

/**
 * Copy an environment, dropping shell bookkeeping and oprun's own variables
 */
export function safeEnvironment(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || UNSAFE_ENV_NAMES.has(name) || name.startsWith(INTERNAL_ENV_PREFIX)) {
      continue;
    }
    result[name] = value;
  }
  return result;
}

export class ConfiguredStorageProvider implements IStorageProvider {
  private readonly root: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(config: Pick<Configuration, 'runs_dir'>, env: NodeJS.ProcessEnv = process.env) {
    this.root = path.resolve(config.runs_dir);
    this.env = env;
  }

  runsDir(): string {
    return this.root;
  }

  safeEnvironment(): Record<string, string> {
    return safeEnvironment(this.env);
  }
}
