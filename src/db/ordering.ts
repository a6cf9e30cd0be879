import { type AnyColumn, asc, type SQL, sql } from "drizzle-orm";

/**
 * Ascending by code point (COLLATE "C"), whatever the database default
 * collation is. The memory repositories sort the same way.
 */
export function ascByCodePoint(column: AnyColumn): SQL {
  return asc(sql`${column} collate "C"`);
}
