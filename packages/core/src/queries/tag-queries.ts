/**
 * Tag reads. Tags are user-defined, so tag parameters are checked against
 * the live title list on every call.
 */

import { sql, type SQL } from 'drizzle-orm';
import type { ThingsDb } from '../db.js';
import { executeList, executeQuery } from '../db.js';
import { ValidationError } from '../errors.js';
import { asRecords, isTagRecord } from '../rows.js';
import { tags, taskTags, areaTags } from '../schema/tags.js';
import type { TagFilters, TagRecord } from '../types/index.js';
import { TAG, TASK_TAG, AREA_TAG, ref, col, table } from './columns.js';
import { andFilters, makeFilter } from './filters.js';

function titlesOf(values: readonly unknown[]): string[] {
  return values.filter((v): v is string => typeof v === 'string');
}

/** All tag titles, in the app's tag order */
export function getTagTitles(db: ThingsDb): string[] {
  const query = sql`SELECT ${col(TAG, tags.title)} FROM ${table(tags)} AS ${sql.raw(TAG)} ORDER BY ${col(TAG, tags.index)}`;
  return titlesOf(executeList(db, query));
}

/**
 * Reject a tag parameter that names no existing tag. `undefined`/`null`
 * mean "no constraint"; `true`/`false` mean "has tags" / "has none".
 */
export function validateTag(db: ThingsDb, parameter: string, value: unknown): void {
  if (value == null || typeof value === 'boolean') return;
  const titles = getTagTitles(db);
  if (typeof value === 'string' && titles.includes(value)) return;
  throw new ValidationError(parameter, value, [null, true, false, ...titles]);
}

export function makeTagsSqlQuery(where?: SQL): SQL {
  return sql`
    SELECT
      ${col(TAG, tags.uuid)} AS uuid,
      'tag' AS type,
      ${col(TAG, tags.title)} AS title,
      ${col(TAG, tags.shortcut)} AS shortcut
    FROM
      ${table(tags)} AS ${sql.raw(TAG)}
    WHERE
      ${where ?? sql.raw('TRUE')}
    ORDER BY
      ${col(TAG, tags.index)}
  `;
}

/** All tags, or the one with the given title */
export function getTags(db: ThingsDb, filters: TagFilters = {}): TagRecord[] {
  validateTag(db, 'title', filters.title);
  const where = andFilters([makeFilter(ref(TAG, tags.title), filters.title)]);
  return asRecords(executeQuery(db, makeTagsSqlQuery(where)), isTagRecord, 'tag');
}

/** Titles of the tags on a task */
export function getTagsOfTask(db: ThingsDb, taskUuid: string): string[] {
  const query = sql`
    SELECT
      ${col(TAG, tags.title)}
    FROM
      ${table(taskTags)} AS ${sql.raw(TASK_TAG)}
    LEFT OUTER JOIN
      ${table(tags)} ${sql.raw(TAG)} ON ${col(TAG, tags.uuid)} = ${col(TASK_TAG, taskTags.tags)}
    WHERE
      ${col(TASK_TAG, taskTags.tasks)} = ${taskUuid}
    ORDER BY
      ${col(TAG, tags.index)}
  `;
  return titlesOf(executeList(db, query));
}

/** Titles of the tags on an area */
export function getTagsOfArea(db: ThingsDb, areaUuid: string): string[] {
  const query = sql`
    SELECT
      ${col(TAG, tags.title)}
    FROM
      ${table(areaTags)} AS ${sql.raw(AREA_TAG)}
    LEFT OUTER JOIN
      ${table(tags)} ${sql.raw(TAG)} ON ${col(TAG, tags.uuid)} = ${col(AREA_TAG, areaTags.tags)}
    WHERE
      ${col(AREA_TAG, areaTags.areas)} = ${areaUuid}
    ORDER BY
      ${col(TAG, tags.index)}
  `;
  return titlesOf(executeList(db, query));
}
