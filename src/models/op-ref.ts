/**
 * Operation Reference (OpRef)
 *
 * Identifies which operation, of which model, from which package produced a
 * run. Two string forms exist:
 *
 * - canonical: `pkgType:pkgName pkgVersion modelName opName`, written to the
 *   run's `opref` attribute. Unknown fields render as `?`; spaces and `%`
 *   inside a field are percent-encoded.
 * - free: `[[pkgName/]modelName:]opName[extra]`, typed by users on the
 *   command line.
 *
 * The two grammars are not symmetric: `fromString` does not parse the
 * canonical form.
 */

import { ErrorCode } from '../errors/error-codes';
import { RunnerError } from '../errors/runner-error';

export const UNKNOWN_FIELD = '?';

/**
 * Provenance of a model: where its operations were defined
 */
export interface ModelRef {
  pkgType?: string;
  pkgName?: string;
  pkgVersion?: string;
  modelName?: string;
}

/**
 * Anything carrying a run id and readable attributes
 */
export interface AttributeSource {
  readonly id: string;
  getAttribute(name: string): unknown;
}

export class OpRefError extends RunnerError {
  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OpRefError';
  }
}

const CANONICAL_PATTERN =
  /^(?<pkgType>[^ :]+):(?<pkgName>[^ ]+) (?<pkgVersion>[^ ]+) (?<modelName>[^ ]+) (?<opName>[^ ]+)\s*$/;

const FREE_PATTERN =
  /^(?:(?:(?<pkgName>[^/]+)\/)?(?<modelName>[^:]+):)?(?<opName>[A-Za-z0-9_.-]+)(?<extra>.*)$/;

function encodeField(field: string): string {
  return field.replace(/%/g, '%25').replace(/ /g, '%20');
}

function decodeField(field: string): string {
  return field.replace(/%2[05]/g, (escape) => (escape === '%20' ? ' ' : '%'));
}

function known(field: string | undefined): string | undefined {
  return field === undefined || field === UNKNOWN_FIELD ? undefined : decodeField(field);
}

export class OpRef {
  readonly pkgType?: string;
  readonly pkgName?: string;
  readonly pkgVersion?: string;
  readonly modelName?: string;
  readonly opName?: string;

  constructor(fields: ModelRef & { opName?: string } = {}) {
    this.pkgType = fields.pkgType;
    this.pkgName = fields.pkgName;
    this.pkgVersion = fields.pkgVersion;
    this.modelName = fields.modelName;
    this.opName = fields.opName;
    Object.freeze(this);
  }

  /**
   * Combine an operation name with the reference of the model defining it
   */
  static fromOperation(opName: string, modelRef: ModelRef): OpRef {
    return new OpRef({ ...modelRef, opName });
  }

  /**
   * Parse the canonical `opref` attribute of a run
   * @throws OpRefError when the attribute is missing or malformed
   */
  static fromRun(run: AttributeSource): OpRef {
    const attr = run.getAttribute('opref');
    if (typeof attr !== 'string' || attr.length === 0) {
      throw new OpRefError(
        ErrorCode.E301_OPREF_MISSING,
        `run ${run.id} does not have attr 'opref'`,
        { runId: run.id }
      );
    }
    const groups = CANONICAL_PATTERN.exec(attr)?.groups;
    if (!groups) {
      throw new OpRefError(
        ErrorCode.E302_OPREF_MALFORMED,
        `bad opref attr for run ${run.id}: ${attr}`,
        { runId: run.id, opref: attr }
      );
    }
    return new OpRef({
      pkgType: known(groups.pkgType),
      pkgName: known(groups.pkgName),
      pkgVersion: known(groups.pkgVersion),
      modelName: known(groups.modelName),
      opName: known(groups.opName),
    });
  }

  /**
   * Parse a user-entered reference. Text following the operation name is
   * returned as `extra` and is not part of the reference.
   * @throws OpRefError when no operation name can be matched
   */
  static fromString(s: string): { opref: OpRef; extra: string } {
    const groups = FREE_PATTERN.exec(s)?.groups;
    if (!groups) {
      throw new OpRefError(
        ErrorCode.E303_INVALID_REFERENCE,
        `invalid reference: ${JSON.stringify(s)}`,
        { reference: s }
      );
    }
    return {
      opref: new OpRef({
        pkgName: groups.pkgName,
        modelName: groups.modelName,
        opName: groups.opName,
      }),
      extra: groups.extra ?? '',
    };
  }

  get modelRef(): ModelRef {
    return {
      pkgType: this.pkgType,
      pkgName: this.pkgName,
      pkgVersion: this.pkgVersion,
      modelName: this.modelName,
    };
  }

  isFullyKnown(): boolean {
    return [this.pkgType, this.pkgName, this.pkgVersion, this.modelName, this.opName].every(
      (field) => field !== undefined
    );
  }

  equals(other: OpRef): boolean {
    return (
      this.pkgType === other.pkgType &&
      this.pkgName === other.pkgName &&
      this.pkgVersion === other.pkgVersion &&
      this.modelName === other.modelName &&
      this.opName === other.opName
    );
  }

  toString(): string {
    const f = (field: string | undefined): string => (field ? encodeField(field) : UNKNOWN_FIELD);
    return `${f(this.pkgType)}:${f(this.pkgName)} ${f(this.pkgVersion)} ${f(this.modelName)} ${f(this.opName)}`;
  }
}
