/**
 * Result shaping: raw SQLite rows -> records keyed by column name.
 */

import { ThingsqlError } from './errors.js';
import type {
  SqlValue, ResultRow,
  TaskRecord, AreaRecord, TagRecord, ChecklistItemRecord,
} from './types/records.js';
import { TASK_TYPES } from './types/task-type.js';
import { TASK_STATUSES } from './types/task-status.js';
import { START_BUCKETS } from './types/start-bucket.js';

/** Dropped from the record when NULL, so optional relations are simply absent */
export const COLUMNS_TO_OMIT_IF_NULL: ReadonlySet<string> = new Set([
  'area',
  'area_title',
  'checklist',
  'heading',
  'heading_title',
  'project',
  'project_title',
  'trashed',
  'tags',
]);

/** Truthy SQL values in these columns become `true` */
export const COLUMNS_TO_TRANSFORM_TO_BOOL: ReadonlySet<string> = new Set([
  'checklist',
  'tags',
  'trashed',
]);

export function toSqlValue(value: unknown): SqlValue {
  if (
    value === null
    || typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'bigint'
    || Buffer.isBuffer(value)
  ) {
    return value;
  }
  throw new ThingsqlError(`Unexpected SQLite value: ${String(value)}`);
}

/** Map one raw row (values in column order) to a record */
export function shapeRow(columns: readonly string[], values: readonly unknown[]): ResultRow {
  const result: ResultRow = {};
  columns.forEach((key, i) => {
    const value = toSqlValue(values[i] ?? null);
    if (value === null && COLUMNS_TO_OMIT_IF_NULL.has(key)) return;
    result[key] = value && COLUMNS_TO_TRANSFORM_TO_BOOL.has(key) ? true : value;
  });
  return result;
}

// ---------------------------------------------------------------------------
// Record guards
// ---------------------------------------------------------------------------

function isRecord(row: unknown): row is Record<string, unknown> {
  return typeof row === 'object' && row !== null;
}

function isOneOf<T>(values: readonly T[], value: unknown): value is T {
  return values.some(v => v === value);
}

function isTextOrNull(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isOptionalFlag(value: unknown): value is true | undefined {
  return value === undefined || value === true;
}

export function isTaskRecord(row: unknown): row is TaskRecord {
  return isRecord(row)
    && typeof row['uuid'] === 'string'
    && isTextOrNull(row['title'])
    && isOneOf(TASK_TYPES, row['type'])
    && isOneOf(TASK_STATUSES, row['status'])
    && isOneOf(START_BUCKETS, row['start'])
    && isOptionalFlag(row['trashed'])
    && isOptionalFlag(row['tags'])
    && isOptionalFlag(row['checklist'])
    && isTextOrNull(row['start_date'])
    && isTextOrNull(row['deadline'])
    && typeof row['index'] === 'number';
}

export function isAreaRecord(row: unknown): row is AreaRecord {
  return isRecord(row)
    && typeof row['uuid'] === 'string'
    && row['type'] === 'area'
    && typeof row['title'] === 'string'
    && isOptionalFlag(row['tags']);
}

export function isTagRecord(row: unknown): row is TagRecord {
  return isRecord(row)
    && typeof row['uuid'] === 'string'
    && row['type'] === 'tag'
    && typeof row['title'] === 'string'
    && isTextOrNull(row['shortcut']);
}

export function isChecklistItemRecord(row: unknown): row is ChecklistItemRecord {
  return isRecord(row)
    && typeof row['uuid'] === 'string'
    && row['type'] === 'checklist-item'
    && typeof row['title'] === 'string'
    && isOneOf(TASK_STATUSES, row['status']);
}

/** Narrow shaped rows to a record type; a mismatch means the schema is not the one we target */
export function asRecords<T>(rows: readonly ResultRow[], guard: (row: unknown) => row is T, entity: string): T[] {
  return rows.map((row) => {
    if (!guard(row)) {
      throw new ThingsqlError(`Unexpected ${entity} row shape: ${JSON.stringify(Object.keys(row))}`);
    }
    return row;
  });
}
