import type { TaskType } from './task-type.js';
import type { TaskStatus } from './task-status.js';
import type { StartBucket } from './start-bucket.js';

/** A value as better-sqlite3 hands it back */
export type SqlValue = string | number | bigint | Buffer | null;

/** A shaped row: SQL column order, nullable relations dropped, flags as booleans */
export type ResultRow = Record<string, SqlValue | boolean>;

export interface TaskRecord {
  uuid: string;
  type: TaskType;
  /** Present (and true) only for trashed tasks */
  trashed?: true;
  title: string | null;
  status: TaskStatus;
  area?: string;
  area_title?: string;
  project?: string;
  project_title?: string;
  heading?: string;
  heading_title?: string;
  notes: string | null;
  /** Present (and true) only when the task has at least one tag */
  tags?: true;
  start: StartBucket;
  /** Present (and true) only when the task has checklist items */
  checklist?: true;
  /** yyyy-MM-dd */
  start_date: string | null;
  /** yyyy-MM-dd */
  deadline: string | null;
  /** yyyy-MM-dd HH:mm:ss, local time */
  stop_date: string | null;
  created: string | null;
  modified: string | null;
  index: number;
  today_index: number | null;
}

export interface AreaRecord {
  uuid: string;
  type: 'area';
  title: string;
  tags?: true;
}

export interface TagRecord {
  uuid: string;
  type: 'tag';
  title: string;
  shortcut: string | null;
}

export interface ChecklistItemRecord {
  title: string;
  status: TaskStatus;
  /** yyyy-MM-dd, local time */
  stop_date: string | null;
  type: 'checklist-item';
  uuid: string;
  created: string | null;
  modified: string | null;
}
