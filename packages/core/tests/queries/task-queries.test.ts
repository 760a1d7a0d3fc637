import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDb, type ThingsDb } from '../../src/db.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { eq } from 'drizzle-orm';
import { tags, taskTags } from '../../src/schema/tags.js';
import { tasks } from '../../src/schema/tasks.js';
import { getTasks, countTasks, getTaskByUuid, countTaskByUuid } from '../../src/queries/task-queries.js';
import type { TaskFilters } from '../../src/types/index.js';
import { createFixtureDb, localDateTime, type FixtureDb } from '../helpers/fixture-db.js';
import { seedSampleData, CREATED_AT, MODIFIED_AT, COMPLETED_AT } from '../helpers/sample-data.js';

let fixture: FixtureDb;
let db: ThingsDb;

beforeEach(() => {
  fixture = createFixtureDb();
  seedSampleData(fixture.orm);
  db = createDb(fixture.filepath);
});

afterEach(() => {
  fixture.cleanup();
});

function uuids(filters: TaskFilters = {}): string[] {
  return getTasks(db, filters).map(t => t.uuid);
}

describe('getTaskByUuid', () => {
  it('returns the full record', () => {
    expect(getTaskByUuid(db, 'task-draft')).toEqual({
      uuid: 'task-draft',
      type: 'to-do',
      title: 'Draft plan',
      status: 'incomplete',
      heading: 'heading-prep',
      heading_title: 'Prep',
      notes: 'outline first',
      tags: true,
      start: 'Anytime',
      checklist: true,
      start_date: '2001-05-02',
      deadline: '2040-01-15',
      stop_date: null,
      created: localDateTime(CREATED_AT),
      modified: localDateTime(MODIFIED_AT),
      index: 2,
      today_index: 1,
    });
  });

  it('includes area and completion details', () => {
    const task = getTaskByUuid(db, 'task-milk');
    expect(task.area).toBe('area-home');
    expect(task.area_title).toBe('Home');
    expect(task.status).toBe('completed');
    expect(task.start).toBe('Inbox');
    expect(task.stop_date).toBe(localDateTime(COMPLETED_AT));
    expect(task).not.toHaveProperty('project');
    expect(task).not.toHaveProperty('checklist');
  });

  it('returns trashed tasks and repeating templates', () => {
    expect(getTaskByUuid(db, 'task-bank').trashed).toBe(true);
    expect(getTaskByUuid(db, 'task-weekly').title).toBe('Weekly review');
  });

  it('throws NotFoundError for an unknown uuid', () => {
    expect(() => getTaskByUuid(db, 'nope')).toThrow(NotFoundError);
    expect(() => getTaskByUuid(db, 'nope')).toThrow("No such task uuid found: 'nope'");
  });

  it('throws NotFoundError on an empty database', () => {
    const empty = createFixtureDb();
    try {
      expect(() => getTaskByUuid(createDb(empty.filepath), 'task-draft')).toThrow(NotFoundError);
    } finally {
      empty.cleanup();
    }
  });

  it('counts one or zero', () => {
    expect(countTaskByUuid(db, 'task-draft')).toBe(1);
    expect(countTaskByUuid(db, 'nope')).toBe(0);
  });
});

describe('getTasks', () => {
  it('lists untrashed, non-repeating tasks in index order by default', () => {
    expect(uuids()).toEqual(['project-launch', 'heading-prep', 'task-draft', 'task-milk', 'task-ship']);
  });

  it('orders by the Today index when asked', () => {
    expect(uuids({ index: 'todayIndex' })).toEqual([
      'task-ship', 'task-draft', 'task-milk', 'project-launch', 'heading-prep',
    ]);
  });

  it('is an exact lookup with a uuid', () => {
    expect(uuids({ uuid: 'task-bank', status: 'completed' })).toEqual(['task-bank']);
  });

  it('returns one row per task despite several tags and checklist items', () => {
    expect(uuids({ tag: true })).toEqual(['task-draft', 'task-milk']);
  });

  describe('trash', () => {
    it('lists trashed items that are not inside a trashed project', () => {
      expect(uuids({ trashed: true })).toEqual(['task-bank', 'project-old']);
    });

    it('lists tasks hidden by a trashed project', () => {
      expect(uuids({ contextTrashed: true })).toEqual(['task-archived']);
    });

    it('null disables both trash filters', () => {
      expect(uuids({ trashed: null, contextTrashed: null })).toEqual([
        'project-launch', 'heading-prep', 'task-draft', 'task-milk',
        'task-bank', 'project-old', 'task-archived', 'task-ship',
      ]);
    });

    describe('under a heading of a trashed project', () => {
      beforeEach(() => {
        const row = { notes: '', status: 0, start: 1, trashed: 0, creationDate: CREATED_AT };
        fixture.orm.insert(tasks).values([
          { ...row, uuid: 'heading-old', title: 'Leftovers', type: 2, project: 'project-old', index: 9 },
          { ...row, uuid: 'task-under', title: 'Stale item', type: 0, heading: 'heading-old', index: 10 },
        ]).run();
      });

      it('is hidden by default', () => {
        expect(uuids()).not.toContain('task-under');
        expect(uuids()).not.toContain('heading-old');
      });

      it('is listed with the tasks hidden by a trashed project', () => {
        expect(uuids({ contextTrashed: true })).toEqual(['task-archived', 'heading-old', 'task-under']);
      });

      it('is listed when the context filter is off', () => {
        expect(uuids({ contextTrashed: null })).toEqual([
          'project-launch', 'heading-prep', 'task-draft', 'task-milk',
          'task-archived', 'task-ship', 'heading-old', 'task-under',
        ]);
      });
    });
  });

  describe('untitled tasks', () => {
    beforeEach(() => {
      fixture.orm.insert(tasks).values({
        uuid: 'task-untitled', title: null, notes: '', type: 0, status: 0, start: 1, trashed: 0, index: 11,
      }).run();
    });

    it('come back with a null title', () => {
      expect(getTaskByUuid(db, 'task-untitled').title).toBeNull();
    });

    it('are counted and listed alike', () => {
      expect(uuids()).toContain('task-untitled');
      expect(countTasks(db)).toBe(getTasks(db).length);
      expect(countTasks(db)).toBe(6);
    });
  });

  describe('relations', () => {
    it('matches a project directly or through a heading', () => {
      expect(uuids({ project: 'project-launch', type: 'to-do' })).toEqual(['task-draft', 'task-ship']);
    });

    it('project false excludes tasks under a heading', () => {
      expect(uuids({ project: false, type: 'to-do' })).toEqual(['task-milk']);
    });

    it('filters by area', () => {
      expect(uuids({ area: 'area-home' })).toEqual(['task-milk']);
      expect(uuids({ area: true })).toEqual(['project-launch', 'task-milk']);
    });

    it('filters by heading', () => {
      expect(uuids({ heading: 'heading-prep' })).toEqual(['task-draft']);
    });

    it('filters by tag title', () => {
      expect(uuids({ tag: 'Urgent' })).toEqual(['task-milk']);
    });

    it('rejects an unknown tag', () => {
      expect(() => getTasks(db, { tag: 'Nope' })).toThrow(ValidationError);
    });

    it('sees tags created after an earlier call', () => {
      expect(() => getTasks(db, { tag: 'Fresh' })).toThrow(ValidationError);
      fixture.orm.insert(tags).values({ uuid: 'tag-fresh', title: 'Fresh', index: 2 }).run();
      expect(uuids({ tag: 'Fresh' })).toEqual([]);
    });

    it('rejects a tag deleted after an earlier call', () => {
      expect(uuids({ tag: 'Urgent' })).toEqual(['task-milk']);
      fixture.orm.delete(taskTags).where(eq(taskTags.tags, 'tag-urgent')).run();
      fixture.orm.delete(tags).where(eq(tags.uuid, 'tag-urgent')).run();
      expect(() => getTasks(db, { tag: 'Urgent' })).toThrow(ValidationError);
    });
  });

  describe('codes', () => {
    it('filters by status', () => {
      expect(uuids({ status: 'completed' })).toEqual(['task-milk']);
    });

    it('filters by type', () => {
      expect(uuids({ type: 'project' })).toEqual(['project-launch']);
      expect(uuids({ type: 'heading' })).toEqual(['heading-prep']);
    });

    it('takes the start bucket in any case', () => {
      expect(uuids({ start: 'inbox' })).toEqual(['task-milk']);
      expect(uuids({ start: 'Anytime', type: 'to-do' })).toEqual(['task-draft', 'task-ship']);
    });
  });

  describe('dates', () => {
    it('filters packed dates against today', () => {
      expect(uuids({ deadline: 'future' })).toEqual(['task-draft']);
      expect(uuids({ deadline: 'past' })).toEqual([]);
      expect(uuids({ startDate: 'past' })).toEqual(['task-draft']);
    });

    it('filters packed dates on or after an ISO date', () => {
      expect(uuids({ startDate: '2001-05-02' })).toEqual(['task-draft']);
      expect(uuids({ startDate: '2001-05-03' })).toEqual([]);
    });

    it('filters on a date being set', () => {
      expect(uuids({ deadline: true })).toEqual(['task-draft']);
    });

    it('matches a completion day exactly', () => {
      expect(uuids({ stopDate: '2024-01-10', exact: true })).toEqual(['task-milk']);
      expect(uuids({ stopDate: '2024-01-09', exact: true })).toEqual([]);
      expect(uuids({ stopDate: '2024-01-09' })).toEqual(['task-milk']);
    });

    it('rejects an impossible date', () => {
      expect(() => getTasks(db, { deadline: '2021-02-30' })).toThrow(ValidationError);
    });

    it('limits to recently created tasks', () => {
      expect(uuids({ last: '1d' })).toEqual(['task-ship']);
      expect(uuids({ last: '2w' })).toEqual(['task-ship']);
    });

    it('rejects a malformed offset', () => {
      expect(() => getTasks(db, { last: 'yesterday' })).toThrow(
        "Invalid last argument: 'yesterday'",
      );
    });
  });

  describe('search', () => {
    it('searches titles, notes and area titles', () => {
      expect(uuids({ searchQuery: 'milk' })).toEqual(['task-milk']);
      expect(uuids({ searchQuery: 'outline' })).toEqual(['task-draft']);
      expect(uuids({ searchQuery: 'Home' })).toEqual(['task-milk']);
    });
  });
});

describe('countTasks', () => {
  it.each<TaskFilters>([
    {},
    { trashed: true },
    { contextTrashed: true },
    { project: 'project-launch' },
    { tag: 'Errand' },
    { status: 'completed' },
    { searchQuery: 'a' },
  ])('agrees with getTasks for %j', (filters) => {
    expect(countTasks(db, filters)).toBe(getTasks(db, filters).length);
  });

  it('counts a uuid lookup', () => {
    expect(countTasks(db, { uuid: 'task-draft' })).toBe(1);
  });
});
