import { z } from 'zod';
import type { DatabaseConfig } from '@/config/app-config.js';
import { MAX_SAMPLE_ROWS } from '@/config/limits.js';
import type { QueryTemplateName } from '@/config/query-templates.js';
import type { CellValue } from './tools.js';

export const BEHAVIOR_DIMENSIONS = [
  'overview',
  'country',
  'category',
  'product',
  'session_length',
  'daily',
] as const;

export type BehaviorDimension = (typeof BEHAVIOR_DIMENSIONS)[number];

/** Template run for every dimension except the overview */
export const DIMENSION_TEMPLATES: Record<Exclude<BehaviorDimension, 'overview'>, QueryTemplateName> =
  {
    country: 'countries_by_sessions',
    category: 'category_performance',
    product: 'top_products',
    session_length: 'session_length_distribution',
    daily: 'daily_activity',
  };

const tableNameSchema = z.string().trim().min(1, 'Table name is required');

// Limits come from configuration, so the schemas are built per config
export function createDatabaseToolSchemas(config: DatabaseConfig) {
  return {
    query_database: z.object({
      query: z
        .string()
        .min(1, 'Query is required')
        .describe('Read-only SQL statement starting with SELECT, WITH or EXPLAIN'),
      limit: z
        .number()
        .int()
        .min(1)
        .max(config.maxQueryResults)
        .optional()
        .describe(`Maximum rows to return (default ${config.defaultQueryLimit})`),
    }),
    get_table_schema: z.object({
      table_name: z
        .string()
        .trim()
        .optional()
        .describe('Table to describe; omit to list all tables'),
    }),
    get_sample_data: z.object({
      table_name: tableNameSchema.describe('Table to sample'),
      n: z
        .number()
        .int()
        .min(1)
        .max(MAX_SAMPLE_ROWS)
        .default(config.sampleDefaultRows)
        .describe('Number of rows to return'),
    }),
    analyze_user_behavior: z.object({
      dimension: z
        .enum(BEHAVIOR_DIMENSIONS)
        .default('overview')
        .describe('Which pre-built aggregation to run'),
    }),
  };
}

export type DatabaseToolSchemas = ReturnType<typeof createDatabaseToolSchemas>;
export type QueryDatabaseArgs = z.infer<DatabaseToolSchemas['query_database']>;
export type GetTableSchemaArgs = z.infer<DatabaseToolSchemas['get_table_schema']>;
export type GetSampleDataArgs = z.infer<DatabaseToolSchemas['get_sample_data']>;
export type AnalyzeUserBehaviorArgs = z.infer<DatabaseToolSchemas['analyze_user_behavior']>;

// Result payloads
export interface QueryResultData {
  columns: string[];
  rows: CellValue[][];
  row_count: number;
  execution_time_ms: number;
  truncated: boolean;
}

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  primary_key: boolean;
  default_value: CellValue;
}

export interface TableSchemaData {
  table_name: string;
  description: string;
  columns: ColumnInfo[];
  row_count: number;
  indexes: string[];
}

export interface TableListData {
  tables: Array<{ table_name: string; description: string; row_count: number }>;
}

export interface SampleData {
  table_name: string;
  columns: string[];
  rows: CellValue[][];
  row_count: number;
}

export interface BehaviorData {
  dimension: BehaviorDimension;
  columns: string[];
  rows: CellValue[][];
  execution_time_ms: number;
}
