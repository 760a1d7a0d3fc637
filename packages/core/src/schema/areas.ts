import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const areas = sqliteTable('TMArea', {
  uuid: text('uuid').primaryKey(),
  title: text('title'),
  visible: integer('visible'),
  index: integer('index'),
});
