/**
 * Area reads.
 */

import { sql, type SQL } from 'drizzle-orm';
import type { ThingsDb } from '../db.js';
import { executeCount, executeQuery } from '../db.js';
import { NotFoundError } from '../errors.js';
import { asRecords, isAreaRecord } from '../rows.js';
import { areas } from '../schema/areas.js';
import { tags, areaTags } from '../schema/tags.js';
import type { AreaFilters, AreaRecord } from '../types/index.js';
import { AREA, AREA_TAG, TAG, ref, col, table } from './columns.js';
import { andFilters, makeFilter } from './filters.js';
import { makeCountSqlQuery } from './count-query.js';
import { validateTag } from './tag-queries.js';

/** One row per area, with a has-tags flag, in the app's area order */
export function makeAreasSqlQuery(where?: SQL): SQL {
  return sql`
    SELECT DISTINCT
      ${col(AREA, areas.uuid)} AS uuid,
      'area' AS type,
      ${col(AREA, areas.title)} AS title,
      CASE WHEN ${col(AREA_TAG, areaTags.areas)} IS NOT NULL THEN 1 END AS tags
    FROM
      ${table(areas)} AS ${sql.raw(AREA)}
    LEFT OUTER JOIN
      ${table(areaTags)} ${sql.raw(AREA_TAG)} ON ${col(AREA_TAG, areaTags.areas)} = ${col(AREA, areas.uuid)}
    LEFT OUTER JOIN
      ${table(tags)} ${sql.raw(TAG)} ON ${col(TAG, tags.uuid)} = ${col(AREA_TAG, areaTags.tags)}
    WHERE
      ${where ?? sql.raw('TRUE')}
    ORDER BY
      ${col(AREA, areas.index)}
  `;
}

function makeAreasWhere(filters: AreaFilters): SQL {
  return andFilters([
    makeFilter(ref(TAG, tags.title), filters.tag),
    makeFilter(ref(AREA, areas.uuid), filters.uuid),
  ]);
}

/** Number of areas matching the filters */
export function countAreas(db: ThingsDb, filters: AreaFilters = {}): number {
  validateTag(db, 'tag', filters.tag);
  return executeCount(db, makeCountSqlQuery(makeAreasSqlQuery(makeAreasWhere(filters))));
}

/** Areas matching the filters; an unknown uuid is a NotFoundError */
export function getAreas(db: ThingsDb, filters: AreaFilters = {}): AreaRecord[] {
  validateTag(db, 'tag', filters.tag);

  if (filters.uuid && countAreas(db, { uuid: filters.uuid }) === 0) {
    throw new NotFoundError('area', filters.uuid);
  }

  const rows = executeQuery(db, makeAreasSqlQuery(makeAreasWhere(filters)));
  return asRecords(rows, isAreaRecord, 'area');
}
