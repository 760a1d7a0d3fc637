/**
 * Database meta and settings reads.
 */

import { sql } from 'drizzle-orm';
import plist from 'plist';
import type { ThingsDb } from '../db.js';
import { executeList } from '../db.js';
import { ThingsqlError } from '../errors.js';
import { meta, settings } from '../schema/meta.js';
import { ident, table } from './columns.js';

const DATABASE_VERSION_KEY = 'databaseVersion';
/** Fixed uuid of the single settings row */
const SETTINGS_UUID = 'RhAzEf6qDxCD5PmnZVtBZR';

/** Schema version: the `databaseVersion` meta value, an XML plist <integer> */
export function getVersion(db: ThingsDb): number {
  const query = sql`SELECT ${ident(meta.value)} FROM ${table(meta)} WHERE ${ident(meta.key)} = ${DATABASE_VERSION_KEY}`;
  const [value] = executeList(db, query);
  if (typeof value !== 'string') {
    throw new ThingsqlError('Database has no databaseVersion meta entry');
  }

  const version = plist.parse(value);
  if (typeof version !== 'number' || !Number.isInteger(version)) {
    throw new ThingsqlError(`Unexpected databaseVersion value: ${value}`);
  }
  return version;
}

/** The token the app's URL scheme wants for write commands, if one is set */
export function getUrlSchemeAuthToken(db: ThingsDb): string | null {
  const query = sql`
    SELECT ${ident(settings.uriSchemeAuthenticationToken)}
    FROM ${table(settings)}
    WHERE ${ident(settings.uuid)} = ${SETTINGS_UUID}
  `;
  const [token] = executeList(db, query);
  return typeof token === 'string' ? token : null;
}
