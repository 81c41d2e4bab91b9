import { z } from 'zod';
import type { AnalyticsConfig } from '@/config/app-config.js';
import { MAX_TOP_N } from '@/config/limits.js';
import type { Row } from './tools.js';

export const SEGMENTATION_TYPES = ['engagement', 'value', 'exploration', 'geographic'] as const;
export const FUNNEL_TYPES = ['standard', 'product', 'price', 'category'] as const;
export const GEOGRAPHIC_ANALYSIS_TYPES = [
  'overview',
  'preferences',
  'behavior',
  'market_size',
] as const;
export const PRODUCT_ANALYSIS_TYPES = [
  'products',
  'categories',
  'pricing',
  'engagement',
  'cross_category',
] as const;

export type SegmentationType = (typeof SEGMENTATION_TYPES)[number];
export type FunnelType = (typeof FUNNEL_TYPES)[number];
export type GeographicAnalysisType = (typeof GEOGRAPHIC_ANALYSIS_TYPES)[number];
export type ProductAnalysisType = (typeof PRODUCT_ANALYSIS_TYPES)[number];

export const MAX_COUNTRY_FILTER = 50;

export const countriesSchema = z
  .array(z.string().trim().min(1, 'Country names must not be empty'))
  .min(1, 'Provide at least one country or omit the filter')
  .max(MAX_COUNTRY_FILTER)
  .optional()
  .describe('Only include sessions from these countries');

const topNSchema = (defaultValue: number) =>
  z.number().int().min(1).max(MAX_TOP_N).default(defaultValue).describe('Number of rows to return');

export function createAnalyticsToolSchemas(config: AnalyticsConfig) {
  return {
    user_segmentation: z.object({
      segmentation_type: z
        .enum(SEGMENTATION_TYPES)
        .default('engagement')
        .describe('How sessions are bucketed'),
      countries: countriesSchema,
    }),
    conversion_funnel: z.object({
      funnel_type: z
        .enum(FUNNEL_TYPES)
        .default('standard')
        .describe('standard: cumulative step funnel; product, price, category: per-group breakdowns'),
      countries: countriesSchema,
    }),
    geographic_analysis: z.object({
      analysis_type: z.enum(GEOGRAPHIC_ANALYSIS_TYPES).default('overview'),
      top_n: topNSchema(config.topN),
      min_sessions: z
        .number()
        .int()
        .min(1)
        .default(config.geographicMinSessions)
        .describe('Skip countries with fewer sessions'),
      countries: countriesSchema,
    }),
    product_performance: z.object({
      analysis_type: z.enum(PRODUCT_ANALYSIS_TYPES).default('products'),
      top_n: topNSchema(config.topN),
      countries: countriesSchema,
    }),
  };
}

export type AnalyticsToolSchemas = ReturnType<typeof createAnalyticsToolSchemas>;
export type UserSegmentationArgs = z.infer<AnalyticsToolSchemas['user_segmentation']>;
export type ConversionFunnelArgs = z.infer<AnalyticsToolSchemas['conversion_funnel']>;
export type GeographicAnalysisArgs = z.infer<AnalyticsToolSchemas['geographic_analysis']>;
export type ProductPerformanceArgs = z.infer<AnalyticsToolSchemas['product_performance']>;

/**
 * Shared result shape of every analytics tool
 */
export interface AnalyticsReport<TRow = Row> {
  analysis_type: string;
  rows: TRow[];
  insights: string[];
  execution_time_ms: number;
  metadata: Record<string, string | number | string[]>;
}

// A type alias so steps stay assignable to Row
export type FunnelStepResult = {
  step: string;
  sessions: number;
  step_conversion_rate: number | null;
  overall_conversion_rate: number | null;
  drop_off: number;
};
