import { sql, type SQL } from 'drizzle-orm';

/**
 * Wrap a query so it returns only its row count. Counting the full query
 * keeps count and listing on the same WHERE.
 */
export function makeCountSqlQuery(query: SQL): SQL {
  return sql`SELECT COUNT(uuid) FROM (\n${query}\n)`;
}
