import sqlite3 from 'sqlite3';
import type { DatabaseConfig } from '@/config/app-config.js';
import logger from '@/config/logger.js';
import { QueryError, TimeoutError } from '@/middleware/error.js';
import type { CellValue, Row } from '@/types/tools.js';

export type SqlParam = string | number | null;

export interface QueryOptions {
  /** Overrides the configured statement timeout */
  timeoutMs?: number;
}

function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`;
  return String(value);
}

function normalizeRow(raw: unknown): Row {
  const row: Row = {};
  if (typeof raw === 'object' && raw !== null) {
    for (const [column, value] of Object.entries(raw)) {
      row[column] = normalizeCell(value);
    }
  }
  return row;
}

function isInterrupt(error: Error): boolean {
  return 'code' in error && error.code === 'SQLITE_INTERRUPT';
}

function preview(sql: string): string {
  const compact = sql.replace(/\s+/g, ' ').trim();
  return compact.substring(0, 100) + (compact.length > 100 ? '...' : '');
}

export class SqliteConnection {
  private client: sqlite3.Database | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  async connect(): Promise<sqlite3.Database> {
    if (this.client) {
      return this.client;
    }

    const mode = this.config.readOnly
      ? sqlite3.OPEN_READONLY
      : sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;

    try {
      this.client = await new Promise<sqlite3.Database>((resolve, reject) => {
        const database = new sqlite3.Database(this.config.path, mode, (error: Error | null) => {
          if (error) reject(error);
          else resolve(database);
        });
      });
    } catch (error) {
      logger.error('Failed to open SQLite database', {
        path: this.config.path,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new Error(
        `SQLite connection failed for ${this.config.path}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    logger.info('SQLite connection established', {
      path: this.config.path,
      readOnly: this.config.readOnly,
      statementTimeoutMs: this.config.statementTimeoutMs,
    });

    return this.client;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;

    this.client = null;
    await new Promise<void>((resolve, reject) => {
      client.close((error: Error | null) => {
        if (error) reject(error);
        else resolve();
      });
    });
    logger.info('SQLite connection closed', { path: this.config.path });
  }

  isConnected(): boolean {
    return this.client !== null;
  }

  getClient(): sqlite3.Database {
    if (!this.client) {
      throw new Error('SQLite client not connected. Call connect() first.');
    }
    return this.client;
  }

  /**
   * Runs one statement and returns every row. The statement is interrupted
   * once the timeout elapses and the call rejects with TimeoutError; store
   * errors reject with QueryError.
   */
  async query(sql: string, params: SqlParam[] = [], options: QueryOptions = {}): Promise<Row[]> {
    const client = this.getClient();
    const timeoutMs = options.timeoutMs ?? this.config.statementTimeoutMs;

    logger.debug('Executing SQLite query', {
      queryPreview: preview(sql),
      paramCount: params.length,
      timeoutMs,
    });

    return new Promise<Row[]>((resolve, reject) => {
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        client.interrupt();
      }, timeoutMs);

      client.all(sql, params, (error: Error | null, rows: unknown[]) => {
        clearTimeout(timer);

        if (error) {
          if (timedOut || isInterrupt(error)) {
            logger.warn('SQLite query timed out', { queryPreview: preview(sql), timeoutMs });
            reject(new TimeoutError(timeoutMs));
            return;
          }

          logger.error('SQLite query failed:', { queryPreview: preview(sql), error: error.message });
          reject(new QueryError(`Database error: ${error.message}`, error));
          return;
        }

        resolve(rows.map(normalizeRow));
      });
    });
  }
}
