import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';

export const checklistItems = sqliteTable('TMChecklistItem', {
  uuid: text('uuid').primaryKey(),
  title: text('title'),
  status: integer('status'),
  stopDate: real('stopDate'),
  creationDate: real('creationDate'),
  userModificationDate: real('userModificationDate'),
  task: text('task'),
  index: integer('index'),
});
