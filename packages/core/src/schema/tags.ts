import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const tags = sqliteTable('TMTag', {
  uuid: text('uuid').primaryKey(),
  title: text('title'),
  shortcut: text('shortcut'),
  parent: text('parent'),
  index: integer('index'),
});

/** Join table: one row per (task, tag) pair */
export const taskTags = sqliteTable('TMTaskTag', {
  tasks: text('tasks').notNull(),
  tags: text('tags').notNull(),
});

/** Join table: one row per (area, tag) pair */
export const areaTags = sqliteTable('TMAreaTag', {
  areas: text('areas').notNull(),
  tags: text('tags').notNull(),
});
