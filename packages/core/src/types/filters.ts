import type { TaskType } from './task-type.js';
import type { TaskStatus } from './task-status.js';
import type { StartBucket } from './start-bucket.js';

/**
 * Date filter value.
 * `true`/`false`: a date is set / not set.
 * `'future'`/`'past'`: relative to today (local time).
 * `yyyy-MM-dd`: on or after that day (on that day with `exact`).
 */
export type DateFilter = boolean | 'future' | 'past' | string;

/**
 * Relation filter value: a uuid (or title for tags) to match, or
 * `true`/`false` for "has one" / "has none".
 */
export type RelationFilter = string | boolean;

/** Column a task listing is ordered by */
export type TaskIndex = 'index' | 'todayIndex';

export const TASK_INDICES: readonly TaskIndex[] = ['index', 'todayIndex'];

export interface TaskFilters {
  uuid?: string;
  type?: TaskType;
  status?: TaskStatus;
  /** Case-insensitive; `'inbox'` matches `'Inbox'` */
  start?: StartBucket | Lowercase<StartBucket>;
  area?: RelationFilter;
  /** Matches direct project members and tasks under the project's headings */
  project?: RelationFilter;
  heading?: RelationFilter;
  /** Tag title, validated against the live tag list */
  tag?: RelationFilter;
  startDate?: DateFilter;
  stopDate?: DateFilter;
  /** Match `stopDate` on that exact day instead of on-or-after */
  exact?: boolean;
  deadline?: DateFilter;
  deadlineSuppressed?: boolean;
  /** Default `false`; `null` disables the filter */
  trashed?: boolean | null;
  /**
   * Whether the containing project (or the heading's project) is trashed.
   * Default `false`; `null` disables the filter.
   */
  contextTrashed?: boolean | null;
  /** Created within the last N days/weeks/years: `'3d'`, `'2w'`, `'1y'` */
  last?: string;
  searchQuery?: string;
  index?: TaskIndex;
}

export interface AreaFilters {
  uuid?: string;
  tag?: RelationFilter;
}

export interface TagFilters {
  /** Tag title, validated against the live tag list */
  title?: string;
}
