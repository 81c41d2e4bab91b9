import { createAppConfig, type AppConfig } from '@/config/app-config.js';
import { parseEnvironment } from '@/config/environment.js';
import { SqliteConnection, type SqlParam } from '@/database/sqlite/connection.js';
import { CLICKS } from './fixtures.js';
import { ALL_SCHEMAS } from './schemas.js';

// The server only reads; writes go straight to the sqlite3 handle
function exec(connection: SqliteConnection, sql: string): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.getClient().exec(sql, (error: Error | null) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

function run(connection: SqliteConnection, sql: string, params: SqlParam[]): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.getClient().run(sql, params, (error: Error | null) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

/**
 * Configuration built from the environment defaults, pointed at an
 * in-memory store
 */
export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  const parsed = parseEnvironment({
    NODE_ENV: 'test',
    DATABASE_PATH: ':memory:',
    DATABASE_READONLY: 'false',
    ...overrides,
  });
  if (!parsed.success) {
    throw new Error(`Invalid test environment: ${parsed.error.message}`);
  }
  return createAppConfig(parsed.data);
}

/**
 * Opens an in-memory store with every table created and the fixture
 * clickstream loaded. The session and rollup tables are derived from it.
 */
export async function createTestDatabase(
  config: AppConfig = createTestConfig(),
  options: { seed?: boolean } = {}
): Promise<SqliteConnection> {
  const connection = new SqliteConnection(config.database);
  await connection.connect();
  await exec(connection, ALL_SCHEMAS);

  if (options.seed === false) {
    return connection;
  }

  for (const [index, row] of CLICKS.entries()) {
    const [year, month, day] = row.day.split('-').map(Number);
    await run(
      connection,
      `INSERT INTO clickstream
         (year, month, day, order_sequence, country, session_id,
          page_1_main_category, page_2_clothing_model, price, page)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        year ?? 2008,
        month ?? 1,
        day ?? 1,
        index + 1,
        row.country,
        row.session_id,
        row.category,
        row.model,
        row.price,
        '1',
      ]
    );
  }

  await exec(
    connection,
    `
    INSERT INTO user_sessions
      (session_id, country, start_date, total_clicks, unique_products_viewed, unique_categories_viewed)
    SELECT session_id, country,
           MIN(printf('%04d-%02d-%02d', year, month, day)),
           COUNT(*),
           COUNT(DISTINCT page_2_clothing_model),
           COUNT(DISTINCT page_1_main_category)
    FROM clickstream
    GROUP BY session_id, country;

    INSERT INTO product_analytics (product_code, category, total_views, unique_sessions)
    SELECT page_2_clothing_model, MIN(page_1_main_category), COUNT(*), COUNT(DISTINCT session_id)
    FROM clickstream
    WHERE page_2_clothing_model IS NOT NULL
    GROUP BY page_2_clothing_model;

    INSERT INTO country_analytics (country, total_sessions, total_clicks)
    SELECT country, COUNT(DISTINCT session_id), COUNT(*)
    FROM clickstream
    GROUP BY country;
  `
  );

  return connection;
}
