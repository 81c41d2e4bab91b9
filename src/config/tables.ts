/**
 * Tables the tool layer is allowed to describe and sample.
 * Anything else is reported as not found, even if SQLite knows it.
 */
export const KNOWN_TABLES = [
  'clickstream',
  'user_sessions',
  'product_analytics',
  'country_analytics',
  'sqlite_sequence',
] as const;

export type KnownTable = (typeof KNOWN_TABLES)[number];

export const TABLE_DESCRIPTIONS: Record<KnownTable, string> = {
  clickstream: 'Raw page-view events, one row per click',
  user_sessions: 'Per-session summary aggregated from clickstream',
  product_analytics: 'Per-product rollup refreshed on import',
  country_analytics: 'Per-country rollup refreshed on import',
  sqlite_sequence: 'Internal AUTOINCREMENT sequence table',
};

/**
 * Check if a name is one of the known tables
 * @param name The table name to check (case-sensitive, as stored)
 */
export function isKnownTable(name: string): name is KnownTable {
  return KNOWN_TABLES.some((table) => table === name);
}
