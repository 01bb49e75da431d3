/**
 * Dependency Materializer
 *
 * Populates a run directory with the files an operation requires before its
 * process starts. Any failure is fatal to the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';
import { Logger, getLogger } from '../logging/logger';
import { DependencyDef, OperationDef } from '../models/model-file';

export interface ResolutionContext {
  /** Directory the dependencies are materialized into (the run directory) */
  targetDir: string;
  opdef: OperationDef;
}

export interface IDependencyMaterializer {
  resolve(dependencies: readonly DependencyDef[], ctx: ResolutionContext): Promise<void>;
}

export class DependencyError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DependencyError';
  }
}

/**
 * Links required files, resolved against the model file directory, into the
 * run directory under their base names
 */
export class FileDependencyMaterializer implements IDependencyMaterializer {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? getLogger();
  }

  async resolve(dependencies: readonly DependencyDef[], ctx: ResolutionContext): Promise<void> {
    for (const dep of dependencies) {
      await this.resolveOne(dep, ctx);
    }
  }

  private async resolveOne(dep: DependencyDef, ctx: ResolutionContext): Promise<void> {
    if (dep.file.length === 0) {
      throw new DependencyError(ErrorCode.E503_DEPENDENCY_INVALID, 'dependency file is empty', {
        operation: ctx.opdef.name,
      });
    }

    const source = path.resolve(ctx.opdef.modelfile.dir, dep.file);
    const link = path.join(ctx.targetDir, path.basename(source));

    try {
      await fs.promises.access(source);
    } catch {
      throw new DependencyError(
        ErrorCode.E502_DEPENDENCY_SOURCE_NOT_FOUND,
        `cannot find source file ${dep.file} (resolved to ${source})`,
        { operation: ctx.opdef.name, file: dep.file, source }
      );
    }

    try {
      this.logger.debug('DEPENDENCY', `linking ${link} to ${source}`);
      await fs.promises.symlink(source, link);
    } catch (error) {
      throw new DependencyError(
        ErrorCode.E501_DEPENDENCY_RESOLUTION_FAILURE,
        `cannot link ${link} to ${source}: ${(error as Error).message}`,
        { operation: ctx.opdef.name, file: dep.file, source, link }
      );
    }
  }
}
