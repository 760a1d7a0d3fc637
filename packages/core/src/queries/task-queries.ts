/**
 * Task reads: validate the filters, compose the WHERE, run the task query.
 */

import type { SQL } from 'drizzle-orm';
import type { ThingsDb } from '../db.js';
import { executeCount, executeQuery } from '../db.js';
import { NotFoundError } from '../errors.js';
import { asRecords, isTaskRecord } from '../rows.js';
import { validate, validateDateFilter, validateOffset } from '../validation.js';
import { TASK_TYPES } from '../types/task-type.js';
import { TASK_STATUSES } from '../types/task-status.js';
import { START_BUCKETS } from '../types/start-bucket.js';
import { TASK_INDICES } from '../types/filters.js';
import type { TaskFilters, TaskIndex, TaskRecord } from '../types/index.js';
import { makeCountSqlQuery } from './count-query.js';
import { makeTasksSqlQuery, makeTasksWhere, makeTaskByUuidSqlQuery } from './task-query.js';
import { validateTag } from './tag-queries.js';

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

interface PreparedTaskQuery {
  where: SQL;
  index: TaskIndex;
}

/** Validate every filter (tags against the live tag list), then compose the WHERE */
function prepareTaskQuery(db: ThingsDb, filters: TaskFilters): PreparedTaskQuery {
  const start = filters.start === undefined ? undefined : titleCase(filters.start);
  const index = filters.index ?? 'index';
  const { type, status, trashed, contextTrashed, deadlineSuppressed } = filters;

  validateDateFilter('deadline', filters.deadline);
  validate('deadlineSuppressed', deadlineSuppressed, [undefined, true, false]);
  validate('start', start, [undefined, ...START_BUCKETS]);
  validateDateFilter('startDate', filters.startDate);
  validateDateFilter('stopDate', filters.stopDate);
  validate('status', status, [undefined, ...TASK_STATUSES]);
  validate('trashed', trashed, [undefined, null, true, false]);
  validate('type', type, [undefined, ...TASK_TYPES]);
  validate('contextTrashed', contextTrashed, [undefined, null, true, false]);
  validate('index', index, TASK_INDICES);
  validateOffset('last', filters.last);
  validateTag(db, 'tag', filters.tag);

  return { where: makeTasksWhere({ ...filters, start }), index };
}

/** One task by uuid; zero rows is a NotFoundError */
export function getTaskByUuid(db: ThingsDb, uuid: string): TaskRecord {
  const rows = asRecords(executeQuery(db, makeTaskByUuidSqlQuery(uuid)), isTaskRecord, 'task');
  const [task] = rows;
  if (!task) throw new NotFoundError('task', uuid);
  return task;
}

export function countTaskByUuid(db: ThingsDb, uuid: string): number {
  return executeCount(db, makeCountSqlQuery(makeTaskByUuidSqlQuery(uuid)));
}

/**
 * Tasks matching the filters, ordered by `filters.index`. With a uuid this
 * is an exact lookup that ignores the other filters.
 */
export function getTasks(db: ThingsDb, filters: TaskFilters = {}): TaskRecord[] {
  if (filters.uuid) return [getTaskByUuid(db, filters.uuid)];

  const { where, index } = prepareTaskQuery(db, filters);
  return asRecords(executeQuery(db, makeTasksSqlQuery(where, index)), isTaskRecord, 'task');
}

/** Same filters as getTasks, counted over the very same query */
export function countTasks(db: ThingsDb, filters: TaskFilters = {}): number {
  if (filters.uuid) return countTaskByUuid(db, filters.uuid);

  const { where, index } = prepareTaskQuery(db, filters);
  return executeCount(db, makeCountSqlQuery(makeTasksSqlQuery(where, index)));
}
