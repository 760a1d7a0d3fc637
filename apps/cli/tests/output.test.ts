import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import type { TaskRecord } from '@thingsql/core';
import { formatTask, formatContext, formatDates, formatTag, truncate } from '../src/output.js';

beforeAll(() => {
  chalk.level = 0;
});

const task: TaskRecord = {
  uuid: 'task-1',
  type: 'to-do',
  title: 'Draft plan',
  status: 'incomplete',
  area_title: 'Work',
  project: 'project-1',
  project_title: 'Launch',
  notes: null,
  start: 'Anytime',
  start_date: null,
  deadline: '2099-01-15',
  stop_date: null,
  created: null,
  modified: null,
  index: 0,
  today_index: null,
};

describe('formatTask', () => {
  it('renders uuid, checkbox, title, dates and context on one line', () => {
    expect(formatTask(task)).toBe('(task-1) [ ] Draft plan  due 2099-01-15  Work › Launch');
  });

  it('marks projects and completed tasks', () => {
    expect(formatTask({ ...task, type: 'project', deadline: null, area_title: undefined, project_title: undefined }))
      .toBe('(task-1) ◆ Draft plan');
    expect(formatTask({ ...task, status: 'completed', deadline: null, stop_date: '2024-01-10 12:00:00' }))
      .toBe('(task-1) [x] Draft plan  done 2024-01-10 12:00:00  Work › Launch');
  });

  it('renders an untitled task with an empty title', () => {
    expect(formatTask({ ...task, title: null, deadline: null })).toBe('(task-1) [ ]   Work › Launch');
  });
});

describe('formatContext / formatDates', () => {
  it('is empty without any parents or dates', () => {
    const bare = { ...task, area_title: undefined, project_title: undefined, deadline: null };
    expect(formatContext(bare)).toBe('');
    expect(formatDates(bare)).toBe('');
  });
});

describe('formatTag', () => {
  it('shows the shortcut when there is one', () => {
    expect(formatTag({ uuid: 'tag-1', type: 'tag', title: 'Errand', shortcut: 'e' })).toBe('(tag-1) #Errand  [e]');
    expect(formatTag({ uuid: 'tag-2', type: 'tag', title: 'Urgent', shortcut: null })).toBe('(tag-2) #Urgent');
  });
});

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('cuts long strings with an ellipsis', () => {
    expect(truncate('abcdefghij', 5)).toBe('abcd…');
  });
});
