/**
 * Keyword routing for free-text questions.
 *
 * Rules are evaluated in order and the first match wins. The last rule
 * always matches, so every question maps to exactly one tool call.
 */

import { KNOWN_TABLES } from '@/config/tables.js';
import type { ToolName } from '@/types/tools.js';

export type ToolArguments = Record<string, unknown>;

export interface RouteRule {
  name: string;
  tool: ToolName;
  matches(text: string): boolean;
  buildArguments(text: string): ToolArguments;
}

export interface RoutedCall {
  rule: string;
  tool: ToolName;
  arguments: ToolArguments;
}

export const COUNTRY_SESSIONS_QUERY = `SELECT country, COUNT(DISTINCT session_id) AS sessions
FROM clickstream
GROUP BY country
ORDER BY sessions DESC`;

export const CATEGORY_VIEWS_QUERY = `SELECT page_1_main_category AS category, COUNT(*) AS views
FROM clickstream
WHERE page_1_main_category IS NOT NULL
GROUP BY page_1_main_category
ORDER BY views DESC`;

export const DAILY_ACTIVITY_QUERY = `SELECT printf('%04d-%02d-%02d', year, month, day) AS date, COUNT(*) AS clicks
FROM clickstream
GROUP BY year, month, day
ORDER BY date`;

export const COUNTRY_CATEGORY_QUERY = `SELECT country, page_1_main_category AS category, COUNT(*) AS interactions
FROM clickstream
WHERE page_1_main_category IS NOT NULL
GROUP BY country, page_1_main_category`;

export const ENGAGEMENT_FUNNEL_QUERY = `SELECT stage, sessions FROM (
  SELECT 1 AS position, 'All Sessions' AS stage, COUNT(DISTINCT session_id) AS sessions FROM clickstream
  UNION ALL
  SELECT 2, 'Browsed a Category', COUNT(DISTINCT session_id) FROM clickstream
  WHERE page_1_main_category IS NOT NULL
  UNION ALL
  SELECT 3, 'Multiple Clicks', COUNT(*) FROM (
    SELECT session_id FROM clickstream GROUP BY session_id HAVING COUNT(*) > 1
  )
)
ORDER BY position`;

const DEFAULT_CHART_ROWS = 10;
const DEFAULT_SAMPLE_ROWS = 5;

const has = (text: string, pattern: RegExp): boolean => pattern.test(text);

const CHART_INTENT = /\b(chart|graph|plot|visuali[sz]e|heatmap|draw)\b/i;

/**
 * Reads "top 5" style phrases, clamped to 1..100.
 */
export function extractTopN(text: string): number | undefined {
  const match = /\btop\s+(\d+)\b/i.exec(text);
  if (!match?.[1]) return undefined;
  return Math.min(Math.max(Number(match[1]), 1), 100);
}

export function mentionedTable(text: string): string | undefined {
  const lower = text.toLowerCase();
  return KNOWN_TABLES.find((table) => new RegExp(`\\b${table}\\b`).test(lower));
}

function chartType(text: string): string {
  if (has(text, /\bpie\b/i)) return 'pie';
  if (has(text, /\bscatter\b/i)) return 'scatter';
  if (has(text, /\bline\b/i)) return 'line';
  if (has(text, /\bhorizontal\b/i)) return 'horizontal_bar';
  return 'bar';
}

function withLimit(sql: string, limit: number): string {
  return `${sql}\nLIMIT ${limit}`;
}

function chartArguments(text: string): ToolArguments {
  const limit = extractTopN(text) ?? DEFAULT_CHART_ROWS;
  const chart_type = chartType(text);

  if (has(text, /\bcategor(y|ies)\b/i)) {
    return {
      chart_type,
      data_query: withLimit(CATEGORY_VIEWS_QUERY, limit),
      title: 'Views by Product Category',
    };
  }
  if (has(text, /\b(daily|day|days)\b/i)) {
    return { chart_type, data_query: DAILY_ACTIVITY_QUERY, title: 'Daily User Activity' };
  }
  return {
    chart_type,
    data_query: withLimit(COUNTRY_SESSIONS_QUERY, limit),
    title: `Top ${limit} Countries by Sessions`,
  };
}

export const ROUTE_RULES: readonly RouteRule[] = [
  {
    name: 'direct_sql',
    tool: 'query_database',
    matches: (text) => has(text.trim(), /^(select|with)\b/i),
    buildArguments: (text) => ({ query: text.trim() }),
  },
  {
    name: 'heatmap',
    tool: 'create_heatmap',
    matches: (text) => has(text, /\bheatmap\b/i),
    buildArguments: () => ({
      data_query: COUNTRY_CATEGORY_QUERY,
      row_field: 'country',
      col_field: 'category',
      value_field: 'interactions',
      title: 'User Interactions by Country and Category',
    }),
  },
  {
    name: 'funnel_chart',
    tool: 'create_funnel_chart',
    matches: (text) => has(text, CHART_INTENT) && has(text, /\bfunnel\b/i),
    buildArguments: () => ({
      data_query: ENGAGEMENT_FUNNEL_QUERY,
      stage_field: 'stage',
      value_field: 'sessions',
      title: 'User Engagement Funnel',
    }),
  },
  {
    name: 'time_series_chart',
    tool: 'create_time_series',
    matches: (text) => has(text, CHART_INTENT) && has(text, /\b(time|daily|trends?|monthly)\b/i),
    buildArguments: (text) => ({
      data_query: DAILY_ACTIVITY_QUERY,
      time_field: 'date',
      value_field: 'clicks',
      granularity: has(text, /\b(month|monthly)\b/i) ? 'month' : 'day',
      title: 'Activity Trends',
    }),
  },
  {
    name: 'chart',
    tool: 'create_chart',
    matches: (text) => has(text, CHART_INTENT),
    buildArguments: chartArguments,
  },
  {
    name: 'schema',
    tool: 'get_table_schema',
    matches: (text) => has(text, /\b(schema|tables?|structure|columns?)\b/i),
    buildArguments: (text) => {
      const table = mentionedTable(text);
      return table ? { table_name: table } : {};
    },
  },
  {
    name: 'sample',
    tool: 'get_sample_data',
    matches: (text) => has(text, /\b(sample|preview|example)/i),
    buildArguments: (text) => ({
      table_name: mentionedTable(text) ?? 'clickstream',
      n: extractTopN(text) ?? DEFAULT_SAMPLE_ROWS,
    }),
  },
  {
    name: 'segmentation',
    tool: 'user_segmentation',
    matches: (text) => has(text, /\bsegment/i),
    buildArguments: (text) => ({
      segmentation_type: has(text, /\b(value|price|spend)/i)
        ? 'value'
        : has(text, /\bexplor/i)
          ? 'exploration'
          : has(text, /\b(countr|geograph|region)/i)
            ? 'geographic'
            : 'engagement',
    }),
  },
  {
    name: 'conversion',
    tool: 'conversion_funnel',
    matches: (text) => has(text, /\b(conversion|convert|funnel)/i),
    buildArguments: (text) => {
      if (has(text, /\bpric/i)) return { funnel_type: 'price' };
      if (has(text, /\bproduct/i)) return { funnel_type: 'product' };
      if (has(text, /\b(categor|journey)/i)) return { funnel_type: 'category' };
      return {};
    },
  },
  {
    name: 'geography',
    tool: 'geographic_analysis',
    matches: (text) => has(text, /\b(geograph|countr|region)/i),
    buildArguments: (text) => {
      const topN = extractTopN(text);
      return {
        analysis_type: has(text, /\bbehavio/i)
          ? 'behavior'
          : has(text, /\bmarket/i)
            ? 'market_size'
            : has(text, /\b(prefer|categor)/i)
              ? 'preferences'
              : 'overview',
        ...(topN === undefined ? {} : { top_n: topN }),
      };
    },
  },
  {
    name: 'products',
    tool: 'product_performance',
    matches: (text) => has(text, /\b(product|categor|pric)/i),
    buildArguments: (text) => {
      const topN = extractTopN(text);
      return {
        analysis_type: has(text, /\b(cross[- ]?categor|bundl|together)/i)
          ? 'cross_category'
          : has(text, /\bcategor/i)
            ? 'categories'
            : has(text, /\bpric/i)
              ? 'pricing'
              : has(text, /\bengag/i)
                ? 'engagement'
                : 'products',
        ...(topN === undefined ? {} : { top_n: topN }),
      };
    },
  },
  {
    name: 'behavior',
    tool: 'analyze_user_behavior',
    matches: (text) =>
      has(text, /\b(analy[sz]e|analysis|overview|summary|session length|duration|daily)\b/i),
    buildArguments: (text) => ({
      dimension: has(text, /\b(session length|duration)\b/i)
        ? 'session_length'
        : has(text, /\bdaily\b/i)
          ? 'daily'
          : 'overview',
    }),
  },
  {
    name: 'fallback',
    tool: 'analyze_user_behavior',
    matches: () => true,
    buildArguments: () => ({ dimension: 'overview' }),
  },
];

export function routeQuery(text: string, rules: readonly RouteRule[] = ROUTE_RULES): RoutedCall {
  const rule = rules.find((candidate) => candidate.matches(text));
  if (!rule) {
    throw new Error(`No route matched: ${text}`);
  }
  return { rule: rule.name, tool: rule.tool, arguments: rule.buildArguments(text) };
}
