/**
 * Database tools against an in-memory store seeded with the fixture clickstream
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServices, type AppServices } from '@/bootstrap.js';
import type { SqliteConnection } from '@/database/sqlite/connection.js';
import { expectToolError, textOf } from '@/test-utils/assertions.js';
import { createTestConfig, createTestDatabase } from '@/test-utils/test-database.js';
import { DatabaseToolsService } from './database-tools.js';

describe('DatabaseToolsService', () => {
  const config = createTestConfig();
  let connection: SqliteConnection;
  let service: DatabaseToolsService;
  let services: AppServices;

  beforeEach(async () => {
    connection = await createTestDatabase(config);
    service = new DatabaseToolsService(connection, config.database);
    services = createServices(config, connection);
  });

  afterEach(async () => {
    await connection.disconnect();
  });

  describe('queryDatabase', () => {
    it('should return columns and rows in statement order', async () => {
      const result = await service.queryDatabase({
        query: `SELECT country, COUNT(DISTINCT session_id) AS sessions
                FROM clickstream GROUP BY country ORDER BY sessions DESC`,
      });

      expect(result.data).toMatchObject({
        columns: ['country', 'sessions'],
        rows: [
          ['Poland', 5],
          ['Germany', 3],
          ['France', 1],
        ],
        row_count: 3,
        truncated: false,
      });
      expect(textOf(result)).toMatch(/^Query Results \(3 rows, \d+ms\):/);
    });

    it('should append the requested limit when the statement has none', async () => {
      const result = await service.queryDatabase({
        query: 'SELECT id FROM clickstream ORDER BY id',
        limit: 2,
      });

      expect(result.data?.rows).toEqual([[1], [2]]);
      expect(result.data?.truncated).toBe(false);
    });

    it('should truncate to the requested limit when the statement has its own', async () => {
      const result = await service.queryDatabase({
        query: 'SELECT id FROM clickstream ORDER BY id LIMIT 5',
        limit: 2,
      });

      expect(result.data?.rows).toEqual([[1], [2]]);
      expect(result.data?.truncated).toBe(true);
      expect(textOf(result).split('\n').at(-1)).toBe('Results truncated to 2 rows');
    });

    it('should report empty results as success', async () => {
      const result = await service.queryDatabase({
        query: "SELECT * FROM clickstream WHERE country = 'Nowhere'",
      });

      expect(result.isError).toBeUndefined();
      expect(result.data?.row_count).toBe(0);
      expect(textOf(result)).toMatch(/^Query executed successfully but returned no rows \(\d+ms\)$/);
    });

    it('should reject write statements and leave the store unchanged', async () => {
      const result = await services.registry.call('query_database', {
        query: "update clickstream SET country = 'X'",
      });

      expectToolError(result, 'ValidationError', 'Statement contains disallowed keyword: UPDATE');
      const [row] = await connection.query(
        "SELECT COUNT(*) AS n FROM clickstream WHERE country = 'X'"
      );
      expect(row?.n).toBe(0);
    });

    it('should map store errors to QueryError', async () => {
      const result = await services.registry.call('query_database', {
        query: 'SELECT missing_column FROM clickstream',
      });

      const block = expectToolError(result, 'QueryError');
      expect(block.message).toContain('no such column: missing_column');
    });

    it('should interrupt statements that exceed the timeout', async () => {
      const slowConfig = createTestConfig({ QUERY_TIMEOUT_MS: '50' });
      const slowService = new DatabaseToolsService(connection, slowConfig.database);

      await expect(
        slowService.queryDatabase({
          query: `WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n)
                  SELECT COUNT(*) FROM n`,
        })
      ).rejects.toMatchObject({
        kind: 'TimeoutError',
        message: 'Statement exceeded the 50ms timeout',
      });
    });

    it('should return a TimeoutError block from the registry', async () => {
      const slowServices = createServices(createTestConfig({ QUERY_TIMEOUT_MS: '50' }), connection);

      const result = await slowServices.registry.call('query_database', {
        query: `WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n)
                SELECT COUNT(*) FROM n`,
      });

      expect(result.isError).toBe(true);
      expectToolError(result, 'TimeoutError', 'Statement exceeded the 50ms timeout');
    });

    it('should apply the default cap when the only LIMIT is inside a CTE', async () => {
      const result = await service.queryDatabase({
        query: `WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n LIMIT 5000)
                SELECT x FROM n`,
      });

      expect(result.data?.row_count).toBe(config.database.defaultQueryLimit);
      expect(result.data?.truncated).toBe(false);
    });

    it('should reject limits above the configured maximum', async () => {
      const result = await services.registry.call('query_database', {
        query: 'SELECT 1',
        limit: config.database.maxQueryResults + 1,
      });

      expectToolError(result, 'ValidationError');
    });
  });

  describe('getTableSchema', () => {
    it('should list every known table with row counts when no name is given', async () => {
      const result = await service.getTableSchema({});

      expect(result.data).toEqual({
        tables: [
          expect.objectContaining({ table_name: 'clickstream', row_count: 19 }),
          expect.objectContaining({ table_name: 'user_sessions', row_count: 9 }),
          expect.objectContaining({ table_name: 'product_analytics', row_count: 7 }),
          expect.objectContaining({ table_name: 'country_analytics', row_count: 3 }),
          expect.objectContaining({ table_name: 'sqlite_sequence', row_count: 1 }),
        ],
      });
      expect(textOf(result).split('\n')[0]).toBe('Available Tables:');
    });

    it('should describe columns, keys and indexes of a table', async () => {
      const result = await service.getTableSchema({ table_name: 'user_sessions' });

      expect(result.data).toMatchObject({
        table_name: 'user_sessions',
        row_count: 9,
        indexes: [
          'idx_user_sessions_converted',
          'idx_user_sessions_country',
          'idx_user_sessions_date',
        ],
      });

      const data = result.data;
      const columns = data && 'columns' in data ? data.columns : [];
      expect(columns[0]).toEqual({
        name: 'session_id',
        type: 'INTEGER',
        nullable: false,
        primary_key: true,
        default_value: null,
      });
      expect(columns.find((column) => column.name === 'converted')).toMatchObject({
        nullable: true,
        default_value: 'FALSE',
      });
      expect(textOf(result)).toContain('  - country: TEXT (NOT NULL)');
    });

    it('should return NotFoundError for unknown tables', async () => {
      const result = await services.registry.call('get_table_schema', { table_name: 'orders' });

      expectToolError(
        result,
        'NotFoundError',
        "Table 'orders' not found. Known tables: clickstream, user_sessions, product_analytics, country_analytics, sqlite_sequence"
      );
    });
  });

  describe('getSampleData', () => {
    it('should return the first rows in storage order', async () => {
      const result = await service.getSampleData({ table_name: 'clickstream', n: 2 });

      expect(result.data?.row_count).toBe(2);
      expect(result.data?.columns[0]).toBe('id');
      expect(result.data?.rows.map((row) => row[0])).toEqual([1, 2]);
    });

    it('should apply the configured default row count', async () => {
      const result = await services.registry.call('get_sample_data', {
        table_name: 'clickstream',
      });

      expect(result.isError).toBeUndefined();
      expect(result.data).toMatchObject({ row_count: config.database.sampleDefaultRows });
    });

    it('should reject a row count above the maximum', async () => {
      const result = await services.registry.call('get_sample_data', {
        table_name: 'clickstream',
        n: 101,
      });

      expectToolError(result, 'ValidationError');
    });
  });

  describe('analyzeUserBehavior', () => {
    it('should summarize the dataset for the overview', async () => {
      const result = await service.analyzeUserBehavior({ dimension: 'overview' });

      expect(result.data?.rows).toEqual([
        ['Total Clicks', 19],
        ['Unique Sessions', 9],
        ['Countries', 3],
        ['Product Categories', 3],
        ['Unique Products', 7],
      ]);
      expect(textOf(result).split('\n')[0]).toBe('E-commerce Dataset Overview');
    });

    it('should rank countries by sessions', async () => {
      const result = await service.analyzeUserBehavior({ dimension: 'country' });

      expect(result.data?.columns).toEqual(['country', 'sessions', 'avg_clicks_per_session']);
      expect(result.data?.rows).toEqual([
        ['Poland', 5, 1.8],
        ['Germany', 3, 3],
        ['France', 1, 1],
      ]);
    });

    it('should bucket sessions by length', async () => {
      const result = await service.analyzeUserBehavior({ dimension: 'session_length' });

      expect(result.data?.rows).toEqual([
        ['1 click', 4],
        ['2-5 clicks', 4],
        ['6-10 clicks', 1],
      ]);
      expect(textOf(result).split('\n')[0]).toBe('User Behavior Analysis: Session Length');
    });

    it('should reject unknown dimensions', async () => {
      const result = await services.registry.call('analyze_user_behavior', {
        dimension: 'weather',
      });

      expectToolError(result, 'ValidationError');
    });
  });
});
