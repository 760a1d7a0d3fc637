import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';

/**
 * TMTask holds to-dos, projects and headings alike; `type` tells them apart.
 * Parent links (`area`, `project`, `heading`) point back into TMArea/TMTask.
 */
export const tasks = sqliteTable('TMTask', {
  uuid: text('uuid').primaryKey(),
  title: text('title'),
  notes: text('notes'),
  type: integer('type'),
  status: integer('status'),
  start: integer('start'),
  trashed: integer('trashed'),
  /** REAL: unix seconds, UTC */
  creationDate: real('creationDate'),
  userModificationDate: real('userModificationDate'),
  stopDate: real('stopDate'),
  /** INTEGER: packed date, see parsers/things-date.ts */
  startDate: integer('startDate'),
  deadline: integer('deadline'),
  deadlineSuppressionDate: integer('deadlineSuppressionDate'),
  area: text('area'),
  project: text('project'),
  heading: text('heading'),
  index: integer('index'),
  todayIndex: integer('todayIndex'),
  /** Set only on repeating templates; their generated instances leave it NULL */
  recurrenceRule: text('rt1_recurrenceRule'),
});
