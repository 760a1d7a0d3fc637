/**
 * Error taxonomy for the reader. Everything thrown on purpose extends
 * ThingsqlError, so library callers can catch the family in one place.
 */

export class ThingsqlError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

/** A parameter value outside its recognized domain. Raised before any query runs. */
export class ValidationError extends ThingsqlError {
  readonly parameter: string;
  readonly value: unknown;
  readonly validValues: readonly unknown[];

  constructor(parameter: string, value: unknown, validValues: readonly unknown[], message?: string) {
    super(
      message
        ?? `Unrecognized ${parameter} type: ${formatValue(value)}\n`
          + `Valid ${parameter} types are [${validValues.map(formatValue).join(', ')}]`,
    );
    this.parameter = parameter;
    this.value = value;
    this.validValues = validValues;
  }
}

/** A string that should have been a yyyy-MM-dd calendar date */
export class FormatError extends ValidationError {
  constructor(parameter: string, value: unknown) {
    super(
      parameter,
      value,
      ['yyyy-MM-dd'],
      `Invalid ${parameter}: ${formatValue(value)}\nExpected an ISO 8601 calendar date (yyyy-MM-dd).`,
    );
  }
}

export type EntityKind = 'task' | 'area';

/** A uuid-scoped lookup matched no rows */
export class NotFoundError extends ThingsqlError {
  readonly entity: EntityKind;
  readonly uuid: string;

  constructor(entity: EntityKind, uuid: string) {
    super(`No such ${entity} uuid found: '${uuid}'`);
    this.entity = entity;
    this.uuid = uuid;
  }
}

/** The database predates the supported schema */
export class SchemaTooOldError extends ThingsqlError {
  readonly version: number;
  readonly minimumVersion: number;

  constructor(version: number, minimumVersion: number) {
    super(
      `Your database is in an older format (version ${version}, need > ${minimumVersion}). `
        + 'Use an older release of this tool to read it.',
    );
    this.version = version;
    this.minimumVersion = minimumVersion;
  }
}

/** Opening or querying the database file failed (missing, locked, corrupt, ...) */
export class StorageIOError extends ThingsqlError {
  readonly filepath: string;

  constructor(filepath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read database at '${filepath}': ${detail}`, { cause });
    this.filepath = filepath;
  }
}
