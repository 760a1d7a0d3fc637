// Query building blocks
export {
  TASK, PROJECT, HEADING, PROJECT_OF_HEADING, AREA, TAG, TASK_TAG, AREA_TAG, CHECKLIST_ITEM,
  TASK_SEARCH_COLUMNS,
  ref, col, table, caseOf, ident,
} from './columns.js';
export {
  makeFilter,
  makeTruthyFilter,
  makeOrFilter,
  andFilters,
  makeThingsDateFilter,
  makeUnixTimeFilter,
  makeUnixTimeRangeFilter,
  makeSearchFilter,
} from './filters.js';
export type { Filter, FilterValue } from './filters.js';
export { makeCountSqlQuery } from './count-query.js';

// Task queries
export {
  makeTasksSqlQuery,
  makeTaskByUuidSqlQuery,
  makeTasksWhere,
  makeContextTrashedFilter,
  makeProjectFilter,
} from './task-query.js';
export type { ResolvedTaskFilters } from './task-query.js';
export {
  getTasks,
  countTasks,
  getTaskByUuid,
  countTaskByUuid,
} from './task-queries.js';

// Area queries
export { makeAreasSqlQuery, getAreas, countAreas } from './area-queries.js';

// Tag queries
export {
  makeTagsSqlQuery,
  getTags,
  getTagTitles,
  getTagsOfTask,
  getTagsOfArea,
  validateTag,
} from './tag-queries.js';

// Checklist queries
export { makeChecklistItemsSqlQuery, getChecklistItems } from './checklist-queries.js';

// Meta queries
export { getVersion, getUrlSchemeAuthToken } from './meta-queries.js';
