export * from './types/index.js';
export * from './schema/index.js';
export * from './parsers/index.js';
export * from './queries/index.js';

export {
  ThingsqlError,
  ValidationError,
  FormatError,
  NotFoundError,
  SchemaTooOldError,
  StorageIOError,
} from './errors.js';
export type { EntityKind } from './errors.js';

export { validate, validateOffset, validateDateFilter } from './validation.js';

export {
  COLUMNS_TO_OMIT_IF_NULL,
  COLUMNS_TO_TRANSFORM_TO_BOOL,
  shapeRow,
  asRecords,
  isTaskRecord,
  isAreaRecord,
  isTagRecord,
  isChecklistItemRecord,
} from './rows.js';

export {
  createDb,
  renderQuery,
  prettifySql,
  withConnection,
  executeQuery,
  executeList,
  executeCount,
} from './db.js';
export type { DbOptions, ThingsDb, RenderedQuery } from './db.js';

export { ThingsDatabase, MINIMUM_DATABASE_VERSION } from './database.js';

export {
  DATABASE_PATH_ENV,
  DEFAULT_FILE_ROOT,
  getDefaultDbPath,
  isMovedMarker,
  resolveDatabasePath,
} from './paths.js';
export type { ResolveDbPathOptions } from './paths.js';
