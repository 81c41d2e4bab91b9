import type { z } from 'zod';
import type { ErrorKind } from '@/middleware/error.js';

// Content blocks returned by every tool
export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ImageBlock {
  type: 'image';
  mimeType: 'image/png';
  /** base64-encoded image bytes */
  data: string;
}

export interface ErrorBlock {
  type: 'error';
  kind: ErrorKind;
  message: string;
}

export type ContentBlock = TextBlock | ImageBlock | ErrorBlock;

export interface ToolResult<TData = unknown> {
  content: ContentBlock[];
  data?: TData;
  isError?: true;
}

// Tabular values as returned by SQLite (blobs are summarized)
export type CellValue = string | number | null;

export type Row = Record<string, CellValue>;

export interface TabularData {
  columns: string[];
  rows: CellValue[][];
}

export const DATABASE_TOOL_NAMES = [
  'query_database',
  'get_table_schema',
  'get_sample_data',
  'analyze_user_behavior',
] as const;

export const ANALYTICS_TOOL_NAMES = [
  'user_segmentation',
  'conversion_funnel',
  'geographic_analysis',
  'product_performance',
] as const;

export const VISUALIZATION_TOOL_NAMES = [
  'create_chart',
  'create_heatmap',
  'create_funnel_chart',
  'create_time_series',
] as const;

export type DatabaseToolName = (typeof DATABASE_TOOL_NAMES)[number];
export type AnalyticsToolName = (typeof ANALYTICS_TOOL_NAMES)[number];
export type VisualizationToolName = (typeof VISUALIZATION_TOOL_NAMES)[number];
export type ToolName = DatabaseToolName | AnalyticsToolName | VisualizationToolName;

export type ToolCategory = 'database' | 'analytics' | 'visualization';

export interface ToolDescriptor {
  name: ToolName;
  title: string;
  description: string;
  category: ToolCategory;
}

/**
 * A tool as the registry stores it: arguments arrive untyped and are parsed
 * against `schema` before the handler runs.
 */
export interface RegisteredTool extends ToolDescriptor {
  schema: z.AnyZodObject;
  invoke(rawArguments: unknown): Promise<ToolResult>;
}

export function textBlock(text: string): TextBlock {
  return { type: 'text', text };
}

export function imageBlock(data: string): ImageBlock {
  return { type: 'image', mimeType: 'image/png', data };
}
