import { sql, type SQL } from 'drizzle-orm';
import type { ThingsDb } from '../db.js';
import { executeQuery } from '../db.js';
import { asRecords, isChecklistItemRecord } from '../rows.js';
import { checklistItems } from '../schema/checklist-items.js';
import { TaskStatus } from '../types/task-status.js';
import type { ChecklistItemRecord } from '../types/index.js';
import { CHECKLIST_ITEM, ref, col, table, caseOf } from './columns.js';

export function makeChecklistItemsSqlQuery(taskUuid: string): SQL {
  return sql`
    SELECT
      ${col(CHECKLIST_ITEM, checklistItems.title)} AS title,
      ${caseOf(ref(CHECKLIST_ITEM, checklistItems.status), TaskStatus)} AS status,
      date(${col(CHECKLIST_ITEM, checklistItems.stopDate)}, 'unixepoch', 'localtime') AS stop_date,
      'checklist-item' AS type,
      ${col(CHECKLIST_ITEM, checklistItems.uuid)} AS uuid,
      datetime(${col(CHECKLIST_ITEM, checklistItems.creationDate)}, 'unixepoch', 'localtime') AS created,
      datetime(${col(CHECKLIST_ITEM, checklistItems.userModificationDate)}, 'unixepoch', 'localtime') AS modified
    FROM
      ${table(checklistItems)} AS ${sql.raw(CHECKLIST_ITEM)}
    WHERE
      ${col(CHECKLIST_ITEM, checklistItems.task)} = ${taskUuid}
    ORDER BY
      ${col(CHECKLIST_ITEM, checklistItems.index)}
  `;
}

/** Checklist items of a to-do, in checklist order */
export function getChecklistItems(db: ThingsDb, taskUuid: string): ChecklistItemRecord[] {
  const rows = executeQuery(db, makeChecklistItemsSqlQuery(taskUuid));
  return asRecords(rows, isChecklistItemRecord, 'checklist item');
}
