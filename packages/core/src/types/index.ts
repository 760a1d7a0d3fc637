export { TaskStatus, TASK_STATUSES } from './task-status.js';
export { TaskType, TASK_TYPES } from './task-type.js';
export { StartBucket, START_BUCKETS } from './start-bucket.js';
export { TASK_INDICES } from './filters.js';
export type {
  DateFilter, RelationFilter, TaskIndex,
  TaskFilters, AreaFilters, TagFilters,
} from './filters.js';
export type {
  SqlValue, ResultRow,
  TaskRecord, AreaRecord, TagRecord, ChecklistItemRecord,
} from './records.js';
