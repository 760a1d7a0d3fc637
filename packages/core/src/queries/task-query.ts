/**
 * Task query assembly: one row per task, with parent project, heading,
 * heading's project, area, tags and checklist items left-joined in.
 */

import { sql, type SQL } from 'drizzle-orm';
import { tasks } from '../schema/tasks.js';
import { areas } from '../schema/areas.js';
import { tags, taskTags } from '../schema/tags.js';
import { checklistItems } from '../schema/checklist-items.js';
import { TaskType } from '../types/task-type.js';
import { TaskStatus } from '../types/task-status.js';
import { StartBucket } from '../types/start-bucket.js';
import type { TaskFilters, TaskIndex } from '../types/filters.js';
import { thingsDateToIsoDateSql } from '../parsers/things-date.js';
import {
  TASK, PROJECT, HEADING, PROJECT_OF_HEADING, AREA, TAG, TASK_TAG, CHECKLIST_ITEM,
  ref, col, table, caseOf,
} from './columns.js';
import {
  type Filter,
  andFilters, makeFilter, makeOrFilter, makeTruthyFilter, makeSearchFilter,
  makeThingsDateFilter, makeUnixTimeFilter, makeUnixTimeRangeFilter,
} from './filters.js';

const INDEX_COLUMNS = {
  index: tasks.index,
  todayIndex: tasks.todayIndex,
} as const;

/** `datetime(column, 'unixepoch', 'localtime')` */
function localDateTime(column: SQL): SQL {
  return sql`datetime(${column}, 'unixepoch', 'localtime')`;
}

/** `CASE WHEN ALIAS.uuid IS NOT NULL THEN value END` */
function whenJoined(alias: string, value: SQL): SQL {
  return sql`CASE WHEN ${col(alias, tasks.uuid)} IS NOT NULL THEN ${value} END`;
}

/**
 * The canonical task query. `where` is a composed condition (or a
 * `uuid = ?` lookup); ordering is by the manual or the Today index.
 */
export function makeTasksSqlQuery(where?: SQL, orderBy: TaskIndex = 'index'): SQL {
  return sql`
    SELECT DISTINCT
      ${col(TASK, tasks.uuid)} AS uuid,
      ${caseOf(ref(TASK, tasks.type), TaskType)} AS type,
      CASE WHEN ${col(TASK, tasks.trashed)} = 1 THEN 1 END AS trashed,
      ${col(TASK, tasks.title)} AS title,
      ${caseOf(ref(TASK, tasks.status), TaskStatus)} AS status,
      ${whenJoined(AREA, col(AREA, areas.uuid))} AS area,
      ${whenJoined(AREA, col(AREA, areas.title))} AS area_title,
      ${whenJoined(PROJECT, col(PROJECT, tasks.uuid))} AS project,
      ${whenJoined(PROJECT, col(PROJECT, tasks.title))} AS project_title,
      ${whenJoined(HEADING, col(HEADING, tasks.uuid))} AS heading,
      ${whenJoined(HEADING, col(HEADING, tasks.title))} AS heading_title,
      ${col(TASK, tasks.notes)} AS notes,
      CASE WHEN ${col(TAG, tags.uuid)} IS NOT NULL THEN 1 END AS tags,
      ${caseOf(ref(TASK, tasks.start), StartBucket)} AS start,
      CASE WHEN ${col(CHECKLIST_ITEM, checklistItems.uuid)} IS NOT NULL THEN 1 END AS checklist,
      date(${thingsDateToIsoDateSql(ref(TASK, tasks.startDate))}) AS start_date,
      date(${thingsDateToIsoDateSql(ref(TASK, tasks.deadline))}) AS deadline,
      ${localDateTime(col(TASK, tasks.stopDate))} AS stop_date,
      ${localDateTime(col(TASK, tasks.creationDate))} AS created,
      ${localDateTime(col(TASK, tasks.userModificationDate))} AS modified,
      ${col(TASK, tasks.index)} AS "index",
      ${col(TASK, tasks.todayIndex)} AS today_index
    FROM
      ${table(tasks)} AS ${sql.raw(TASK)}
    LEFT OUTER JOIN
      ${table(tasks)} ${sql.raw(PROJECT)} ON ${col(TASK, tasks.project)} = ${col(PROJECT, tasks.uuid)}
    LEFT OUTER JOIN
      ${table(areas)} ${sql.raw(AREA)} ON ${col(TASK, tasks.area)} = ${col(AREA, areas.uuid)}
    LEFT OUTER JOIN
      ${table(tasks)} ${sql.raw(HEADING)} ON ${col(TASK, tasks.heading)} = ${col(HEADING, tasks.uuid)}
    LEFT OUTER JOIN
      ${table(tasks)} ${sql.raw(PROJECT_OF_HEADING)}
      ON ${col(HEADING, tasks.project)} = ${col(PROJECT_OF_HEADING, tasks.uuid)}
    LEFT OUTER JOIN
      ${table(taskTags)} ${sql.raw(TASK_TAG)} ON ${col(TASK, tasks.uuid)} = ${col(TASK_TAG, taskTags.tasks)}
    LEFT OUTER JOIN
      ${table(tags)} ${sql.raw(TAG)} ON ${col(TASK_TAG, taskTags.tags)} = ${col(TAG, tags.uuid)}
    LEFT OUTER JOIN
      ${table(checklistItems)} ${sql.raw(CHECKLIST_ITEM)}
      ON ${col(TASK, tasks.uuid)} = ${col(CHECKLIST_ITEM, checklistItems.task)}
    WHERE
      ${where ?? sql.raw('TRUE')}
    ORDER BY
      ${col(TASK, INDEX_COLUMNS[orderBy])}
  `;
}

/** Exact uuid lookup, recurring templates included */
export function makeTaskByUuidSqlQuery(uuid: string): SQL {
  return makeTasksSqlQuery(sql`${col(TASK, tasks.uuid)} = ${uuid}`);
}

/**
 * A task can be untrashed yet hidden because its project, or the project
 * of its heading, is trashed. `false` excludes those tasks, `true` keeps
 * only them.
 */
export function makeContextTrashedFilter(value: boolean | null | undefined): Filter {
  const project = ref(PROJECT, tasks.trashed);
  const projectOfHeading = ref(PROJECT_OF_HEADING, tasks.trashed);
  if (value == null) return undefined;
  if (value) {
    return makeOrFilter(makeTruthyFilter(project, true), makeTruthyFilter(projectOfHeading, true));
  }
  return andFilters([makeTruthyFilter(project, false), makeTruthyFilter(projectOfHeading, false)]);
}

/**
 * Tasks under a heading carry no project of their own, so a project
 * filter also matches through the heading's project.
 */
export function makeProjectFilter(value: string | boolean | undefined): Filter {
  const direct = makeFilter(ref(TASK, tasks.project), value);
  const viaHeading = makeFilter(ref(PROJECT_OF_HEADING, tasks.uuid), value);
  if (value === false) return andFilters([direct, viaHeading]);
  return makeOrFilter(direct, viaHeading);
}

/** Task filters, already validated, with `start` already title-cased */
export type ResolvedTaskFilters = Omit<TaskFilters, 'start' | 'index'> & { start?: StartBucket };

/** Compose the WHERE condition for a filtered task listing */
export function makeTasksWhere(filters: ResolvedTaskFilters): SQL {
  const { type, status, start, trashed = false, contextTrashed = false } = filters;

  return andFilters([
    sql`${col(TASK, tasks.recurrenceRule)} IS NULL`,
    makeFilter(ref(TASK, tasks.trashed), trashed == null ? undefined : Number(trashed)),
    makeContextTrashedFilter(contextTrashed),
    makeFilter(ref(TASK, tasks.type), type && TaskType[type]),
    makeFilter(ref(TASK, tasks.start), start && StartBucket[start]),
    makeFilter(ref(TASK, tasks.status), status && TaskStatus[status]),
    makeFilter(ref(TASK, tasks.uuid), filters.uuid),
    makeFilter(ref(TASK, tasks.area), filters.area),
    makeProjectFilter(filters.project),
    makeFilter(ref(TASK, tasks.heading), filters.heading),
    makeFilter(ref(TASK, tasks.deadlineSuppressionDate), filters.deadlineSuppressed),
    makeFilter(ref(TAG, tags.title), filters.tag),
    makeThingsDateFilter(ref(TASK, tasks.startDate), filters.startDate),
    makeUnixTimeFilter(ref(TASK, tasks.stopDate), filters.stopDate, filters.exact),
    makeThingsDateFilter(ref(TASK, tasks.deadline), filters.deadline),
    makeUnixTimeRangeFilter(ref(TASK, tasks.creationDate), filters.last),
    makeSearchFilter(filters.searchQuery),
  ]);
}
