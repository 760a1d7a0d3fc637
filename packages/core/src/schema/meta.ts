import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** Values are XML property lists, e.g. the schema version as <integer> */
export const meta = sqliteTable('Meta', {
  key: text('key').primaryKey(),
  value: text('value'),
});

export const settings = sqliteTable('TMSettings', {
  uuid: text('uuid').primaryKey(),
  uriSchemeAuthenticationToken: text('uriSchemeAuthenticationToken'),
});
