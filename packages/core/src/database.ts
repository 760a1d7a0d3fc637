import type { DbOptions, ThingsDb } from './db.js';
import { createDb } from './db.js';
import { SchemaTooOldError } from './errors.js';
import { getTasks, countTasks, getTaskByUuid, countTaskByUuid } from './queries/task-queries.js';
import { getAreas, countAreas } from './queries/area-queries.js';
import { getTags, getTagTitles, getTagsOfTask, getTagsOfArea } from './queries/tag-queries.js';
import { getChecklistItems } from './queries/checklist-queries.js';
import { getVersion, getUrlSchemeAuthToken } from './queries/meta-queries.js';
import type {
  TaskFilters, AreaFilters, TagFilters,
  TaskRecord, AreaRecord, TagRecord, ChecklistItemRecord,
} from './types/index.js';

/** Databases at or below this version predate the current schema */
export const MINIMUM_DATABASE_VERSION = 21;

/**
 * Read-only access to a Things database file.
 *
 * Every method re-reads the file through a fresh connection, so two calls
 * may see different data if the app wrote in between.
 *
 * @throws SchemaTooOldError from the constructor when the file uses the old schema
 */
export class ThingsDatabase {
  readonly db: ThingsDb;

  constructor(filepath: string, options: DbOptions = {}) {
    this.db = createDb(filepath, options);

    const version = this.getVersion();
    if (version <= MINIMUM_DATABASE_VERSION) {
      throw new SchemaTooOldError(version, MINIMUM_DATABASE_VERSION);
    }
  }

  get filepath(): string {
    return this.db.filepath;
  }

  getTasks(filters: TaskFilters = {}): TaskRecord[] {
    return getTasks(this.db, filters);
  }

  countTasks(filters: TaskFilters = {}): number {
    return countTasks(this.db, filters);
  }

  getTaskByUuid(uuid: string): TaskRecord {
    return getTaskByUuid(this.db, uuid);
  }

  countTaskByUuid(uuid: string): number {
    return countTaskByUuid(this.db, uuid);
  }

  getAreas(filters: AreaFilters = {}): AreaRecord[] {
    return getAreas(this.db, filters);
  }

  countAreas(filters: AreaFilters = {}): number {
    return countAreas(this.db, filters);
  }

  getTags(filters: TagFilters = {}): TagRecord[] {
    return getTags(this.db, filters);
  }

  getTagTitles(): string[] {
    return getTagTitles(this.db);
  }

  getTagsOfTask(taskUuid: string): string[] {
    return getTagsOfTask(this.db, taskUuid);
  }

  getTagsOfArea(areaUuid: string): string[] {
    return getTagsOfArea(this.db, areaUuid);
  }

  getChecklistItems(taskUuid: string): ChecklistItemRecord[] {
    return getChecklistItems(this.db, taskUuid);
  }

  getVersion(): number {
    return getVersion(this.db);
  }

  getUrlSchemeAuthToken(): string | null {
    return getUrlSchemeAuthToken(this.db);
  }
}
