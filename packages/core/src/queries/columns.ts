/**
 * Structural SQL: table aliases and quoted column references, all derived
 * from the drizzle schema so table and column names live in one place.
 */

import { getTableName, sql, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn, SQLiteTable } from 'drizzle-orm/sqlite-core';
import { tasks } from '../schema/tasks.js';
import { areas } from '../schema/areas.js';

export const TASK = 'TASK';
export const PROJECT = 'PROJECT';
export const HEADING = 'HEADING';
export const PROJECT_OF_HEADING = 'PROJECT_OF_HEADING';
export const AREA = 'AREA';
export const TAG = 'TAG';
export const TASK_TAG = 'TASK_TAG';
export const AREA_TAG = 'AREA_TAG';
export const CHECKLIST_ITEM = 'CHECKLIST_ITEM';

/** `ALIAS."column"` */
export function ref(alias: string, column: AnySQLiteColumn): string {
  return `${alias}."${column.name}"`;
}

/** Same as ref(), as a raw SQL chunk */
export function col(alias: string, column: AnySQLiteColumn): SQL {
  return sql.raw(ref(alias, column));
}

/** `"TableName"` as a raw SQL chunk */
export function table(t: SQLiteTable): SQL {
  return sql.raw(`"${getTableName(t)}"`);
}

/** `CASE WHEN column = code THEN 'label' ... END` over a code map */
export function caseOf(column: string, codes: Readonly<Record<string, number>>): SQL {
  const whens = Object.entries(codes).map(([label, code]) => `WHEN ${column} = ${code} THEN '${label}'`);
  return sql.raw(`CASE ${whens.join(' ')} END`);
}

/** Columns the free-text task search looks in */
export const TASK_SEARCH_COLUMNS: readonly string[] = [
  ref(TASK, tasks.title),
  ref(TASK, tasks.notes),
  ref(AREA, areas.title),
];

/** `"column"`, unqualified, as a raw SQL chunk */
export function ident(column: AnySQLiteColumn): SQL {
  return sql.raw(`"${column.name}"`);
}
