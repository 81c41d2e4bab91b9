import { z } from 'zod';
import type { ChartConfig } from '@/config/app-config.js';
import { MAX_CHART_POINTS } from '@/config/limits.js';
import { AGGREGATIONS } from '@/utils/aggregation.js';
import type { CellValue } from './tools.js';

export const CHART_TYPES = ['bar', 'horizontal_bar', 'line', 'pie', 'scatter'] as const;
export const TIME_GRANULARITIES = ['day', 'month'] as const;
export const SERIES_AGGREGATIONS = ['sum', 'avg', 'count'] as const;

export type ChartType = (typeof CHART_TYPES)[number];

const fieldSchema = z.string().trim().min(1);

// Exactly one of these must be given; checked when the data is resolved
const dataSourceShape = {
  data_query: z
    .string()
    .min(1)
    .optional()
    .describe('Read-only SQL whose result is plotted'),
  data: z
    .string()
    .min(1)
    .optional()
    .describe('JSON text of an array of flat row objects'),
};

export function createVisualizationToolSchemas(config: ChartConfig) {
  return {
    create_chart: z.object({
      chart_type: z.enum(CHART_TYPES).default('bar'),
      ...dataSourceShape,
      x_field: fieldSchema.optional().describe('Category or x-axis field'),
      y_field: fieldSchema.optional().describe('Numeric value field'),
      title: z.string().optional(),
      aggregation: z
        .enum(AGGREGATIONS)
        .default('none')
        .describe('How y values sharing an x value are combined'),
      limit: z
        .number()
        .int()
        .min(1)
        .max(MAX_CHART_POINTS)
        .default(config.maxPoints)
        .describe('Maximum number of points or bars'),
    }),
    create_heatmap: z.object({
      ...dataSourceShape,
      row_field: fieldSchema,
      col_field: fieldSchema,
      value_field: fieldSchema,
      aggregation: z.enum(SERIES_AGGREGATIONS).default('sum'),
      title: z.string().optional(),
    }),
    create_funnel_chart: z.object({
      steps: z
        .array(
          z.object({
            label: z.string().min(1),
            count: z.number().min(0),
          })
        )
        .min(1)
        .optional()
        .describe('Funnel steps in display order'),
      ...dataSourceShape,
      stage_field: fieldSchema.optional().describe('Step label field when reading rows'),
      value_field: fieldSchema.optional().describe('Step count field when reading rows'),
      title: z.string().optional(),
    }),
    create_time_series: z.object({
      ...dataSourceShape,
      time_field: fieldSchema,
      value_field: fieldSchema,
      granularity: z.enum(TIME_GRANULARITIES).default('day'),
      aggregation: z.enum(SERIES_AGGREGATIONS).default('sum'),
      group_field: fieldSchema.optional().describe('Draw one line per value of this field'),
      title: z.string().optional(),
    }),
  };
}

export type VisualizationToolSchemas = ReturnType<typeof createVisualizationToolSchemas>;
export type CreateChartArgs = z.infer<VisualizationToolSchemas['create_chart']>;
export type CreateHeatmapArgs = z.infer<VisualizationToolSchemas['create_heatmap']>;
export type CreateFunnelChartArgs = z.infer<VisualizationToolSchemas['create_funnel_chart']>;
export type CreateTimeSeriesArgs = z.infer<VisualizationToolSchemas['create_time_series']>;

export interface DataSourceArgs {
  data_query?: string;
  data?: string;
}

export interface ChartData {
  chart_type: string;
  title: string;
  columns: string[];
  rows: CellValue[][];
}
