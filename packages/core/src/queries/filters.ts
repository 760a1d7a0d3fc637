/**
 * Predicate builders. Each turns one filter parameter into a condition, or
 * `undefined` for "no constraint". Values are bound as parameters; only the
 * column reference is spliced in as SQL.
 */

import { sql, type SQL } from 'drizzle-orm';
import { ValidationError } from '../errors.js';
import {
  encodeThingsDate, isIsoDate, todayAsThingsDateSql,
} from '../parsers/things-date.js';
import { parseOffset, offsetToModifier } from '../parsers/offset-parser.js';
import type { DateFilter } from '../types/filters.js';
import { TASK_SEARCH_COLUMNS } from './columns.js';

/** A condition, or undefined when the parameter is unset */
export type Filter = SQL | undefined;

export type FilterValue = string | number | boolean | null | undefined;

function isPresent(filter: Filter): filter is SQL {
  return filter !== undefined;
}

/**
 * `true` -> `column IS NOT NULL`, `false` -> `column IS NULL`,
 * any other value -> `column = ?`.
 */
export function makeFilter(column: string, value: FilterValue): Filter {
  if (value == null) return undefined;
  const c = sql.raw(column);
  if (value === true) return sql`${c} IS NOT NULL`;
  if (value === false) return sql`${c} IS NULL`;
  return sql`${c} = ${value}`;
}

/** Truthy in the loose sense: NULL and 0 both count as false */
export function makeTruthyFilter(column: string, value: boolean | null | undefined): Filter {
  if (value == null) return undefined;
  const c = sql.raw(column);
  return value ? c : sql`NOT IFNULL(${c}, 0)`;
}

/** OR together the present filters; none present -> no constraint */
export function makeOrFilter(...filters: Filter[]): Filter {
  const present = filters.filter(isPresent);
  if (present.length === 0) return undefined;
  return sql`(${sql.join(present, sql.raw(' OR '))})`;
}

/** AND together the present filters; none present -> TRUE */
export function andFilters(filters: readonly Filter[]): SQL {
  const present = filters.filter(isPresent);
  if (present.length === 0) return sql.raw('TRUE');
  return sql.join(present, sql.raw('\n  AND '));
}

function futureOrPast(value: string): 'future' | 'past' {
  if (value === 'future' || value === 'past') return value;
  throw new ValidationError('date', value, ['future', 'past', 'yyyy-MM-dd']);
}

/**
 * Filter on a packed-date column (startDate, deadline).
 * ISO dates compare `>=` (or `=` with `exact`); 'future'/'past' compare
 * against today's packed encoding with `>` / `<=`.
 */
export function makeThingsDateFilter(
  column: string,
  value: DateFilter | null | undefined,
  exact = false,
): Filter {
  if (value == null) return undefined;
  if (typeof value === 'boolean') return makeFilter(column, value);

  const c = sql.raw(column);
  if (isIsoDate(value)) {
    const threshold = encodeThingsDate(value);
    return exact ? sql`${c} = ${threshold}` : sql`${c} >= ${threshold}`;
  }

  const today = todayAsThingsDateSql();
  return futureOrPast(value) === 'future'
    ? sql`${c} > ${today}`
    : sql`${c} <= ${today}`;
}

/**
 * Filter on a unix-time column (stopDate, creationDate) by calendar day,
 * using SQLite's own date functions.
 */
export function makeUnixTimeFilter(
  column: string,
  value: DateFilter | null | undefined,
  exact = false,
): Filter {
  if (value == null) return undefined;
  if (typeof value === 'boolean') return makeFilter(column, value);

  const date = sql`date(${sql.raw(column)}, 'unixepoch')`;
  if (isIsoDate(value)) {
    return exact ? sql`${date} = date(${value})` : sql`${date} >= date(${value})`;
  }

  return futureOrPast(value) === 'future'
    ? sql`${date} > date('now', 'localtime')`
    : sql`${date} <= date('now', 'localtime')`;
}

/** Limit a unix-time column to the last N days/weeks/years (`'3d'`, `'2w'`, `'1y'`) */
export function makeUnixTimeRangeFilter(column: string, offset: string | null | undefined): Filter {
  if (offset == null) return undefined;
  const modifier = offsetToModifier(parseOffset(offset, 'offset'));
  return sql`datetime(${sql.raw(column)}, 'unixepoch') > datetime('now', ${modifier})`;
}

/**
 * Substring search across several text columns. An empty query is the same
 * as no query.
 */
export function makeSearchFilter(
  query: string | null | undefined,
  columns: readonly string[] = TASK_SEARCH_COLUMNS,
): Filter {
  if (!query) return undefined;
  const pattern = `%${query}%`;
  return makeOrFilter(...columns.map(column => sql`${sql.raw(column)} LIKE ${pattern}`));
}
