import type { DatabaseConfig } from '@/config/app-config.js';
import logger from '@/config/logger.js';
import { OVERVIEW_QUERY, QUERY_TEMPLATES } from '@/config/query-templates.js';
import {
  KNOWN_TABLES,
  TABLE_DESCRIPTIONS,
  isKnownTable,
  type KnownTable,
} from '@/config/tables.js';
import type { SqliteConnection } from '@/database/sqlite/connection.js';
import { NotFoundError } from '@/middleware/error.js';
import {
  createDatabaseToolSchemas,
  DIMENSION_TEMPLATES,
  type AnalyzeUserBehaviorArgs,
  type BehaviorData,
  type ColumnInfo,
  type GetSampleDataArgs,
  type GetTableSchemaArgs,
  type QueryDatabaseArgs,
  type QueryResultData,
  type SampleData,
  type TableListData,
  type TableSchemaData,
} from '@/types/database-tools.js';
import { textBlock, type RegisteredTool, type ToolResult } from '@/types/tools.js';
import { applyRowLimit, assertReadOnlyStatement } from '@/utils/sql-guard.js';
import { toNumber, toTabular } from '@/utils/tabular.js';
import { formatHeading, formatTable, toTitle } from '@/utils/table-format.js';
import { defineTool } from './tool-registry.js';

// Table names are checked against KNOWN_TABLES before they reach these
const quoteIdentifier = (name: string) => `"${name.replace(/"/g, '""')}"`;

export class DatabaseToolsService {
  constructor(
    private readonly connection: SqliteConnection,
    private readonly config: DatabaseConfig
  ) {}

  /**
   * Runs a caller-supplied read-only statement
   */
  async queryDatabase(args: QueryDatabaseArgs): Promise<ToolResult<QueryResultData>> {
    const startTime = Date.now();
    const statement = assertReadOnlyStatement(args.query);
    const rowCap = Math.min(args.limit ?? this.config.maxQueryResults, this.config.maxQueryResults);

    const rows = await this.connection.query(
      applyRowLimit(statement, args.limit ?? this.config.defaultQueryLimit),
      [],
      { timeoutMs: this.config.statementTimeoutMs }
    );

    const truncated = rows.length > rowCap;
    const { columns, rows: values } = toTabular(truncated ? rows.slice(0, rowCap) : rows);
    const executionTimeMs = Date.now() - startTime;

    if (truncated) {
      logger.warn('Query result truncated', { returned: rows.length, kept: rowCap });
    }

    const lines =
      values.length === 0
        ? [`Query executed successfully but returned no rows (${executionTimeMs}ms)`]
        : [
            `Query Results (${values.length} rows, ${executionTimeMs}ms):`,
            '',
            formatTable(columns, values),
          ];
    if (truncated) {
      lines.push('', `Results truncated to ${rowCap} rows`);
    }

    return {
      content: [textBlock(lines.join('\n'))],
      data: {
        columns,
        rows: values,
        row_count: values.length,
        execution_time_ms: executionTimeMs,
        truncated,
      },
    };
  }

  /**
   * Describes one known table, or lists them all when no name is given
   */
  async getTableSchema(
    args: GetTableSchemaArgs
  ): Promise<ToolResult<TableSchemaData | TableListData>> {
    if (!args.table_name) {
      return this.listTables();
    }

    const tableName = args.table_name;
    if (!isKnownTable(tableName)) {
      throw new NotFoundError(
        `Table '${tableName}' not found. Known tables: ${KNOWN_TABLES.join(', ')}`
      );
    }

    const schema = await this.describeTable(tableName);
    const { columns, indexes } = schema;

    const lines = [
      `Table: ${tableName}`,
      `Description: ${TABLE_DESCRIPTIONS[tableName]}`,
      `Rows: ${schema.row_count}`,
      '',
      'Columns:',
      ...columns.map((column) => {
        const flags = [
          column.primary_key ? 'PK' : '',
          column.nullable ? '' : 'NOT NULL',
          column.default_value !== null ? `DEFAULT ${column.default_value}` : '',
        ].filter(Boolean);
        return `  - ${column.name}: ${column.type || 'ANY'}${flags.length > 0 ? ` (${flags.join(', ')})` : ''}`;
      }),
    ];
    if (indexes.length > 0) {
      lines.push('', 'Indexes:', ...indexes.map((index) => `  - ${index}`));
    }

    return { content: [textBlock(lines.join('\n'))], data: schema };
  }

  async getSampleData(args: GetSampleDataArgs): Promise<ToolResult<SampleData>> {
    const tableName = args.table_name;
    if (!isKnownTable(tableName)) {
      throw new NotFoundError(
        `Table '${tableName}' not found. Known tables: ${KNOWN_TABLES.join(', ')}`
      );
    }

    const rows = await this.connection.query(
      `SELECT * FROM ${quoteIdentifier(tableName)} ORDER BY rowid LIMIT ?`,
      [args.n]
    );
    const { columns, rows: values } = toTabular(rows);

    const text =
      values.length === 0
        ? `Table '${tableName}' contains no rows`
        : `Sample data from '${tableName}' (showing ${values.length} rows):\n\n${formatTable(columns, values, args.n)}`;

    return {
      content: [textBlock(text)],
      data: { table_name: tableName, columns, rows: values, row_count: values.length },
    };
  }

  /**
   * Runs the pre-written aggregation for a dimension
   */
  async analyzeUserBehavior(args: AnalyzeUserBehaviorArgs): Promise<ToolResult<BehaviorData>> {
    const startTime = Date.now();
    const { dimension } = args;
    const sql =
      dimension === 'overview' ? OVERVIEW_QUERY : QUERY_TEMPLATES[DIMENSION_TEMPLATES[dimension]];
    const title =
      dimension === 'overview'
        ? 'E-commerce Dataset Overview'
        : `User Behavior Analysis: ${toTitle(dimension)}`;

    const rows = await this.connection.query(sql);
    const { columns, rows: values } = toTabular(rows);
    const executionTimeMs = Date.now() - startTime;

    const body =
      values.length === 0
        ? 'No data found for this analysis.'
        : formatTable(columns, values, values.length);

    return {
      content: [
        textBlock(`${formatHeading(title)}\nGenerated in ${executionTimeMs}ms\n\n${body}`),
      ],
      data: { dimension, columns, rows: values, execution_time_ms: executionTimeMs },
    };
  }

  /**
   * Columns, row count and index names of a known table
   *
   * @throws {NotFoundError} If the table is missing from the store
   */
  async describeTable(tableName: KnownTable): Promise<TableSchemaData> {
    const columnRows = await this.connection.query(
      `PRAGMA table_info(${quoteIdentifier(tableName)})`
    );
    if (columnRows.length === 0) {
      throw new NotFoundError(`Table '${tableName}' does not exist in the database`);
    }

    const columns: ColumnInfo[] = columnRows.map((row) => {
      const primaryKey = (toNumber(row.pk) ?? 0) > 0;
      return {
        name: String(row.name),
        type: String(row.type ?? ''),
        nullable: toNumber(row.notnull) === 0 && !primaryKey,
        primary_key: primaryKey,
        default_value: row.dflt_value ?? null,
      };
    });

    const indexRows = await this.connection.query(
      `PRAGMA index_list(${quoteIdentifier(tableName)})`
    );

    return {
      table_name: tableName,
      description: TABLE_DESCRIPTIONS[tableName],
      columns,
      row_count: await this.countRows(tableName),
      indexes: indexRows.map((row) => String(row.name)).sort(),
    };
  }

  /**
   * Known tables that exist in the store, in KNOWN_TABLES order
   */
  async existingTables(): Promise<KnownTable[]> {
    const rows = await this.connection.query(
      "SELECT name FROM sqlite_master WHERE type = 'table'"
    );
    const present = new Set(rows.map((row) => String(row.name)));
    return KNOWN_TABLES.filter((tableName) => present.has(tableName));
  }

  private async listTables(): Promise<ToolResult<TableListData>> {
    const tables: TableListData['tables'] = [];
    for (const tableName of await this.existingTables()) {
      tables.push({
        table_name: tableName,
        description: TABLE_DESCRIPTIONS[tableName],
        row_count: await this.countRows(tableName),
      });
    }

    const lines = [
      'Available Tables:',
      ...tables.map(
        (table) => `  - ${table.table_name} (${table.row_count} rows): ${table.description}`
      ),
    ];

    return { content: [textBlock(lines.join('\n'))], data: { tables } };
  }

  private async countRows(tableName: string): Promise<number> {
    const [row] = await this.connection.query(
      `SELECT COUNT(*) AS row_count FROM ${quoteIdentifier(tableName)}`
    );
    return toNumber(row?.row_count) ?? 0;
  }
}

export function createDatabaseTools(
  service: DatabaseToolsService,
  config: DatabaseConfig
): RegisteredTool[] {
  const schemas = createDatabaseToolSchemas(config);

  return [
    defineTool({
      name: 'query_database',
      title: 'Query Database',
      description:
        'Execute a read-only SQL query (SELECT, WITH or EXPLAIN) against the clickstream database.',
      category: 'database',
      schema: schemas.query_database,
      handler: (args) => service.queryDatabase(args),
    }),
    defineTool({
      name: 'get_table_schema',
      title: 'Get Table Schema',
      description: 'Describe the columns, row count and indexes of a table, or list all tables.',
      category: 'database',
      schema: schemas.get_table_schema,
      handler: (args) => service.getTableSchema(args),
    }),
    defineTool({
      name: 'get_sample_data',
      title: 'Get Sample Data',
      description: 'Preview the first rows of a table in storage order.',
      category: 'database',
      schema: schemas.get_sample_data,
      handler: (args) => service.getSampleData(args),
    }),
    defineTool({
      name: 'analyze_user_behavior',
      title: 'Analyze User Behavior',
      description:
        'Run a pre-built aggregation: overview, country, category, product, session_length or daily.',
      category: 'database',
      schema: schemas.analyze_user_behavior,
      handler: (args) => service.analyzeUserBehavior(args),
    }),
  ];
}
