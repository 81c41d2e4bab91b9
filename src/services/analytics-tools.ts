/**
 * Canned analytics over the clickstream store.
 *
 * Every report is one statement. Country filters are bound as parameters
 * and every `country` reference is qualified when tables are joined.
 */

import type { AnalyticsConfig, SegmentTier } from '@/config/app-config.js';
import logger from '@/config/logger.js';
import type { SqlParam, SqliteConnection } from '@/database/sqlite/connection.js';
import {
  createAnalyticsToolSchemas,
  type AnalyticsReport,
  type ConversionFunnelArgs,
  type FunnelStepResult,
  type FunnelType,
  type GeographicAnalysisArgs,
  type ProductPerformanceArgs,
  type SegmentationType,
  type UserSegmentationArgs,
} from '@/types/analytics.js';
import { textBlock, type RegisteredTool, type Row, type ToolResult } from '@/types/tools.js';
import { computeFunnelRates, formatRate } from '@/utils/funnel-helpers.js';
import { toNumber, toTabular } from '@/utils/tabular.js';
import { formatHeading, formatTable, toTitle } from '@/utils/table-format.js';
import { defineTool } from './tool-registry.js';

interface SqlFragment {
  clause: string;
  params: SqlParam[];
}

export const FUNNEL_STEPS = ['All Sessions', 'Viewed Category', 'Viewed Product', 'Viewed Price'];

/**
 * `column IN (?, ...)` for a country allow-list, or an always-true clause
 */
export function countryFilter(column: string, countries?: string[]): SqlFragment {
  if (!countries || countries.length === 0) {
    return { clause: '1 = 1', params: [] };
  }
  return {
    clause: `${column} IN (${countries.map(() => '?').join(', ')})`,
    params: countries,
  };
}

/**
 * CASE expression mapping `column` onto the configured tiers
 */
export function tierCaseExpression(column: string, tiers: SegmentTier[]): SqlFragment {
  const params: SqlParam[] = [];
  const branches = tiers.map((tier) => {
    if (tier.maxClicks === null) {
      params.push(tier.minClicks, tier.name);
      return `WHEN ${column} >= ? THEN ?`;
    }
    params.push(tier.minClicks, tier.maxClicks, tier.name);
    return `WHEN ${column} BETWEEN ? AND ? THEN ?`;
  });
  return { clause: `CASE ${branches.join(' ')} END`, params };
}

const NOT_UNKNOWN = (column: string) => `${column} IS NOT NULL AND ${column} != 'Unknown'`;

const SEGMENT_INSIGHTS: Record<SegmentationType, string[]> = {
  engagement: [
    'Single-click sessions are bounces',
    'Higher tiers browse more products per session',
  ],
  value: ['Price views signal purchase intent', 'Sessions without price views are browsing only'],
  exploration: [
    'Focused sessions stay within one category',
    'Explorers move across three or more categories',
  ],
  geographic: ['Market share is the share of all sessions in the selection'],
};

const PRICE_TIER_CASE = `CASE
    WHEN price <= 50 THEN 'Budget (up to 50)'
    WHEN price <= 100 THEN 'Mid-range (50-100)'
    WHEN price <= 150 THEN 'Premium (100-150)'
    ELSE 'Luxury (over 150)'
  END`;

export class AnalyticsToolsService {
  constructor(
    private readonly connection: SqliteConnection,
    private readonly config: AnalyticsConfig
  ) {}

  async userSegmentation(args: UserSegmentationArgs): Promise<ToolResult<AnalyticsReport>> {
    const { segmentation_type: segmentationType, countries } = args;
    const { sql, params, source } = this.segmentationQuery(segmentationType, countries);

    return this.runReport(`User Segmentation: ${toTitle(segmentationType)}`, sql, params, {
      insights: SEGMENT_INSIGHTS[segmentationType],
      metadata: {
        segmentation_type: segmentationType,
        data_source: source,
        ...(countries && { countries }),
      },
    });
  }

  async conversionFunnel(args: ConversionFunnelArgs): Promise<ToolResult<AnalyticsReport>> {
    if (args.funnel_type === 'standard') {
      return this.standardFunnel(args.countries);
    }
    return this.breakdownFunnel(args.funnel_type, args.countries);
  }

  /**
   * Counts sessions reaching each step. A session counts for a step only if
   * it also reached every earlier one, so counts never increase.
   */
  async standardFunnel(
    countries?: string[]
  ): Promise<ToolResult<AnalyticsReport<FunnelStepResult>>> {
    const startTime = Date.now();
    const filter = countryFilter('country', countries);

    const [totals] = await this.connection.query(
      `WITH session_steps AS (
         SELECT session_id,
                MAX(CASE WHEN ${NOT_UNKNOWN('page_1_main_category')} THEN 1 ELSE 0 END) AS viewed_category,
                MAX(CASE WHEN ${NOT_UNKNOWN('page_2_clothing_model')} THEN 1 ELSE 0 END) AS viewed_product,
                MAX(CASE WHEN price > 0 THEN 1 ELSE 0 END) AS viewed_price
         FROM clickstream
         WHERE ${filter.clause}
         GROUP BY session_id
       )
       SELECT COUNT(*) AS all_sessions,
              COALESCE(SUM(viewed_category), 0) AS viewed_category,
              COALESCE(SUM(viewed_category * viewed_product), 0) AS viewed_product,
              COALESCE(SUM(viewed_category * viewed_product * viewed_price), 0) AS viewed_price
       FROM session_steps`,
      filter.params
    );

    const counts = [
      totals?.all_sessions,
      totals?.viewed_category,
      totals?.viewed_product,
      totals?.viewed_price,
    ].map((value) => toNumber(value) ?? 0);

    const steps: FunnelStepResult[] = computeFunnelRates(
      FUNNEL_STEPS.map((label, index) => ({ label, count: counts[index] ?? 0 }))
    ).map((step) => ({
      step: step.label,
      sessions: step.count,
      step_conversion_rate: step.step_conversion_rate,
      overall_conversion_rate: step.overall_conversion_rate,
      drop_off: step.drop_off,
    }));

    const executionTimeMs = Date.now() - startTime;
    const report: AnalyticsReport<FunnelStepResult> = {
      analysis_type: 'Conversion Funnel',
      rows: steps,
      insights: ['Each step keeps only sessions that completed the previous one'],
      execution_time_ms: executionTimeMs,
      metadata: {
        funnel_type: 'standard',
        steps: steps.length,
        data_source: 'clickstream',
        ...(countries && { countries }),
      },
    };

    const table = formatTable(
      ['step', 'sessions', 'step_rate', 'overall_rate', 'drop_off'],
      steps.map((step) => [
        step.step,
        step.sessions,
        formatRate(step.step_conversion_rate),
        formatRate(step.overall_conversion_rate),
        step.drop_off,
      ])
    );

    logger.info('Conversion funnel computed', {
      sessions: steps[0]?.sessions ?? 0,
      elapsed_ms: executionTimeMs,
    });

    return { content: [textBlock(this.renderReport(report, table))], data: report };
  }

  /**
   * Step reach broken down by category, price tier or category journey
   */
  private breakdownFunnel(
    funnelType: Exclude<FunnelType, 'standard'>,
    countries?: string[]
  ): Promise<ToolResult<AnalyticsReport>> {
    const filter = countryFilter('country', countries);
    const title = `Conversion Funnel: ${toTitle(funnelType)}`;
    const metadata = {
      funnel_type: funnelType,
      data_source: 'clickstream',
      ...(countries && { countries }),
    };

    if (funnelType === 'product') {
      return this.runReport(
        title,
        `WITH category_funnel AS (
           SELECT page_1_main_category AS category,
                  COUNT(DISTINCT session_id) AS total_sessions,
                  COUNT(DISTINCT CASE WHEN ${NOT_UNKNOWN('page_2_clothing_model')} THEN session_id END) AS product_viewers,
                  COUNT(DISTINCT CASE WHEN price > 0 THEN session_id END) AS price_viewers,
                  COUNT(DISTINCT CASE WHEN ${NOT_UNKNOWN('colour')} THEN session_id END) AS detail_viewers
           FROM clickstream
           WHERE ${NOT_UNKNOWN('page_1_main_category')} AND ${filter.clause}
           GROUP BY page_1_main_category
         )
         SELECT category, total_sessions, product_viewers, price_viewers, detail_viewers,
                ROUND(product_viewers * 100.0 / total_sessions, 2) AS product_conversion,
                ROUND(price_viewers * 100.0 / total_sessions, 2) AS price_conversion,
                ROUND(detail_viewers * 100.0 / total_sessions, 2) AS detail_conversion
         FROM category_funnel
         ORDER BY total_sessions DESC, category ASC`,
        filter.params,
        { insights: ['Conversion is relative to sessions that browsed the category'], metadata }
      );
    }

    if (funnelType === 'price') {
      return this.runReport(
        title,
        `WITH price_funnel AS (
           SELECT ${PRICE_TIER_CASE} AS price_tier,
                  COUNT(DISTINCT session_id) AS sessions_with_price,
                  COUNT(*) AS total_price_views,
                  COUNT(DISTINCT CASE WHEN ${NOT_UNKNOWN('colour')} THEN session_id END) AS detail_viewers,
                  AVG(price) AS avg_price_in_tier
           FROM clickstream
           WHERE price > 0 AND ${filter.clause}
           GROUP BY price_tier
         )
         SELECT price_tier, sessions_with_price, total_price_views, detail_viewers,
                ROUND(avg_price_in_tier, 2) AS avg_price,
                ROUND(detail_viewers * 100.0 / sessions_with_price, 2) AS detail_conversion_rate,
                ROUND(total_price_views * 1.0 / sessions_with_price, 2) AS avg_price_views_per_session
         FROM price_funnel
         ORDER BY avg_price ASC`,
        filter.params,
        { insights: ['Only page views with a known price are counted'], metadata }
      );
    }

    return this.runReport(
      title,
      `WITH category_journey AS (
         SELECT session_id,
                COUNT(DISTINCT page_1_main_category) AS categories_visited,
                COUNT(*) AS total_clicks,
                MAX(CASE WHEN price > 0 THEN 1 ELSE 0 END) AS viewed_any_price
         FROM clickstream
         WHERE ${NOT_UNKNOWN('page_1_main_category')} AND ${filter.clause}
         GROUP BY session_id
       )
       SELECT CASE
                WHEN categories_visited = 1 THEN 'Single Category'
                WHEN categories_visited = 2 THEN 'Two Categories'
                ELSE 'Multi-Category'
              END AS journey_type,
              COUNT(*) AS sessions,
              ROUND(AVG(total_clicks), 2) AS avg_clicks,
              SUM(viewed_any_price) AS price_viewers,
              ROUND(SUM(viewed_any_price) * 100.0 / COUNT(*), 2) AS price_view_rate
       FROM category_journey
       GROUP BY journey_type
       ORDER BY sessions DESC, MIN(categories_visited) ASC`,
      filter.params,
      { insights: ['Multi-category journeys show cross-category interest'], metadata }
    );
  }

  async geographicAnalysis(args: GeographicAnalysisArgs): Promise<ToolResult<AnalyticsReport>> {
    const { analysis_type: analysisType, top_n: topN, min_sessions: minSessions } = args;
    const metadata = {
      analysis_type: analysisType,
      min_sessions: minSessions,
      top_n: topN,
      ...(args.countries && { countries: args.countries }),
    };
    const title = `Geographic Analysis: ${toTitle(analysisType)}`;

    if (analysisType === 'overview') {
      const filter = countryFilter('cs.country', args.countries);
      return this.runReport(
        title,
        `SELECT cs.country AS country,
                COUNT(DISTINCT cs.session_id) AS unique_sessions,
                COUNT(*) AS total_clicks,
                ROUND(AVG(us.total_clicks), 2) AS avg_clicks_per_session,
                ROUND(COUNT(*) * 100.0 / SUM(COUNT(*)) OVER (), 2) AS click_share,
                ROUND(COUNT(DISTINCT cs.session_id) * 100.0
                      / SUM(COUNT(DISTINCT cs.session_id)) OVER (), 2) AS session_share
         FROM clickstream cs
         JOIN user_sessions us ON cs.session_id = us.session_id
         WHERE ${filter.clause}
         GROUP BY cs.country
         HAVING COUNT(DISTINCT cs.session_id) >= ?
         ORDER BY unique_sessions DESC, cs.country ASC
         LIMIT ?`,
        [...filter.params, minSessions, topN],
        {
          insights: ['Click share against session share shows engagement depth per market'],
          metadata: { ...metadata, data_source: 'clickstream + user_sessions' },
        }
      );
    }

    if (analysisType === 'preferences') {
      const filter = countryFilter('cs.country', args.countries);
      return this.runReport(
        title,
        `WITH country_categories AS (
           SELECT cs.country AS country,
                  cs.page_1_main_category AS category,
                  COUNT(*) AS category_clicks,
                  COUNT(DISTINCT cs.session_id) AS unique_sessions
           FROM clickstream cs
           WHERE ${NOT_UNKNOWN('cs.page_1_main_category')} AND ${filter.clause}
           GROUP BY cs.country, cs.page_1_main_category
         ),
         country_totals AS (
           SELECT country, SUM(category_clicks) AS total_clicks
           FROM country_categories
           GROUP BY country
         )
         SELECT cc.country AS country,
                cc.category AS category,
                cc.category_clicks AS category_clicks,
                cc.unique_sessions AS unique_sessions,
                ROUND(cc.category_clicks * 100.0 / ct.total_clicks, 2) AS category_preference_pct
         FROM country_categories cc
         JOIN country_totals ct ON cc.country = ct.country
         WHERE cc.unique_sessions >= ?
         ORDER BY cc.country ASC, cc.category_clicks DESC, cc.category ASC
         LIMIT ?`,
        [...filter.params, minSessions, topN],
        {
          insights: ['Preference is the category share of a country\'s categorized clicks'],
          metadata: { ...metadata, data_source: 'clickstream' },
        }
      );
    }

    if (analysisType === 'behavior') {
      const filter = countryFilter('country', args.countries);
      return this.runReport(
        title,
        `SELECT country,
                COUNT(*) AS sessions,
                ROUND(AVG(total_clicks), 2) AS avg_session_length,
                ROUND(AVG(unique_products_viewed), 2) AS avg_products_per_session,
                ROUND(AVG(unique_categories_viewed), 2) AS avg_categories_per_session,
                ROUND(SUM(CASE WHEN total_clicks = 1 THEN 1 ELSE 0 END) * 100.0 / COUNT(*), 2) AS bounce_rate
         FROM user_sessions
         WHERE ${filter.clause}
         GROUP BY country
         HAVING COUNT(*) >= ?
         ORDER BY sessions DESC, country ASC
         LIMIT ?`,
        [...filter.params, minSessions, topN],
        {
          insights: ['Bounce rate is the share of single-click sessions'],
          metadata: { ...metadata, data_source: 'user_sessions' },
        }
      );
    }

    const filter = countryFilter('country', args.countries);
    return this.runReport(
      title,
      `WITH market AS (
         SELECT country,
                COUNT(DISTINCT session_id) AS total_sessions,
                COUNT(*) AS total_interactions,
                COUNT(CASE WHEN price > 0 THEN 1 END) AS price_interactions,
                ROUND(AVG(CASE WHEN price > 0 THEN price END), 2) AS avg_price_viewed,
                COUNT(DISTINCT page_1_main_category) AS categories_explored
         FROM clickstream
         WHERE ${filter.clause}
         GROUP BY country
         HAVING COUNT(DISTINCT session_id) >= ?
       )
       SELECT country, total_sessions, total_interactions, price_interactions,
              avg_price_viewed, categories_explored,
              ROUND(price_interactions * 100.0 / total_interactions, 2) AS commercial_intent_pct,
              CASE
                WHEN total_sessions >= 1000 THEN 'Large Market'
                WHEN total_sessions >= 100 THEN 'Medium Market'
                ELSE 'Small Market'
              END AS market_size
       FROM market
       ORDER BY total_sessions DESC, country ASC
       LIMIT ?`,
      [...filter.params, minSessions, topN],
      {
        insights: ['Markets are sized by session volume: 1000+ large, 100+ medium'],
        metadata: { ...metadata, data_source: 'clickstream' },
      }
    );
  }

  async productPerformance(args: ProductPerformanceArgs): Promise<ToolResult<AnalyticsReport>> {
    const { analysis_type: analysisType, top_n: topN } = args;
    const filter = countryFilter('country', args.countries);
    const title = `Product Performance: ${toTitle(analysisType)}`;
    const metadata = {
      analysis_type: analysisType,
      top_n: topN,
      data_source: 'clickstream',
      ...(args.countries && { countries: args.countries }),
    };

    if (analysisType === 'products') {
      return this.runReport(
        title,
        `SELECT page_2_clothing_model AS product_code,
                MIN(page_1_main_category) AS category,
                COUNT(*) AS total_views,
                COUNT(DISTINCT session_id) AS unique_sessions,
                COUNT(DISTINCT country) AS countries,
                ROUND(AVG(CASE WHEN price > 0 THEN price END), 2) AS avg_price
         FROM clickstream
         WHERE ${NOT_UNKNOWN('page_2_clothing_model')} AND ${filter.clause}
         GROUP BY page_2_clothing_model
         ORDER BY total_views DESC, product_code ASC
         LIMIT ?`,
        [...filter.params, topN],
        { insights: ['Ranked by total page views'], metadata }
      );
    }

    if (analysisType === 'categories') {
      return this.runReport(
        title,
        `SELECT page_1_main_category AS category,
                COUNT(*) AS total_views,
                COUNT(DISTINCT session_id) AS unique_sessions,
                COUNT(DISTINCT page_2_clothing_model) AS unique_products,
                ROUND(COUNT(*) * 1.0 / COUNT(DISTINCT session_id), 2) AS views_per_session,
                ROUND(COUNT(*) * 100.0 / SUM(COUNT(*)) OVER (), 2) AS view_share
         FROM clickstream
         WHERE ${NOT_UNKNOWN('page_1_main_category')} AND ${filter.clause}
         GROUP BY page_1_main_category
         ORDER BY total_views DESC, category ASC
         LIMIT ?`,
        [...filter.params, topN],
        { insights: ['View share is relative to all categorized views'], metadata }
      );
    }

    if (analysisType === 'engagement') {
      return this.runReport(
        title,
        `WITH product_metrics AS (
           SELECT page_2_clothing_model AS product,
                  page_1_main_category AS category,
                  COUNT(*) AS total_views,
                  COUNT(DISTINCT session_id) AS unique_sessions,
                  AVG(CASE WHEN price > 0 THEN price END) AS avg_price
           FROM clickstream
           WHERE ${NOT_UNKNOWN('page_2_clothing_model')} AND ${filter.clause}
           GROUP BY page_2_clothing_model, page_1_main_category
         )
         SELECT product, category, total_views, unique_sessions,
                ROUND(total_views * 1.0 / unique_sessions, 2) AS views_per_session,
                ROUND(avg_price, 2) AS avg_price,
                CASE
                  WHEN total_views > 20 THEN 'High Traffic'
                  WHEN total_views > 10 THEN 'Medium Traffic'
                  ELSE 'Low Traffic'
                END AS traffic_level
         FROM product_metrics
         ORDER BY views_per_session DESC, total_views DESC, product ASC
         LIMIT ?`,
        [...filter.params, topN],
        { insights: ['Views per session shows how often a product is revisited'], metadata }
      );
    }

    if (analysisType === 'cross_category') {
      const joinedFilter = countryFilter('c1.country', args.countries);
      return this.runReport(
        title,
        `WITH category_pairs AS (
           SELECT c1.session_id AS session_id,
                  c1.page_1_main_category AS primary_category,
                  c2.page_1_main_category AS secondary_category,
                  COUNT(*) AS co_occurrence
           FROM clickstream c1
           JOIN clickstream c2 ON c1.session_id = c2.session_id
           WHERE c1.page_1_main_category < c2.page_1_main_category
             AND ${NOT_UNKNOWN('c1.page_1_main_category')}
             AND ${NOT_UNKNOWN('c2.page_1_main_category')}
             AND ${joinedFilter.clause}
           GROUP BY c1.session_id, c1.page_1_main_category, c2.page_1_main_category
         )
         SELECT primary_category, secondary_category,
                COUNT(DISTINCT session_id) AS sessions_with_both,
                SUM(co_occurrence) AS total_cross_views,
                ROUND(AVG(co_occurrence), 2) AS avg_cross_views_per_session
         FROM category_pairs
         GROUP BY primary_category, secondary_category
         ORDER BY sessions_with_both DESC, primary_category ASC, secondary_category ASC
         LIMIT ?`,
        [...joinedFilter.params, topN],
        { insights: ['Each category pair is listed once, in alphabetical order'], metadata }
      );
    }

    return this.runReport(
      title,
      `SELECT ${PRICE_TIER_CASE} AS price_tier,
              COUNT(*) AS views,
              COUNT(DISTINCT session_id) AS unique_sessions,
              COUNT(DISTINCT page_2_clothing_model) AS unique_products,
              ROUND(AVG(price), 2) AS avg_price
       FROM clickstream
       WHERE price > 0 AND ${filter.clause}
       GROUP BY price_tier
       ORDER BY MIN(price) ASC
       LIMIT ?`,
      [...filter.params, topN],
      { insights: ['Only page views with a known price are counted'], metadata }
    );
  }

  private segmentationQuery(
    segmentationType: SegmentationType,
    countries?: string[]
  ): { sql: string; params: SqlParam[]; source: string } {
    const filter = countryFilter('country', countries);

    if (segmentationType === 'engagement') {
      const tiers = tierCaseExpression('total_clicks', this.config.segmentTiers);
      return {
        sql: `SELECT ${tiers.clause} AS segment,
                     COUNT(*) AS session_count,
                     ROUND(AVG(total_clicks), 2) AS avg_clicks_per_session,
                     ROUND(AVG(unique_products_viewed), 2) AS avg_products_viewed,
                     ROUND(COUNT(*) * 100.0 / SUM(COUNT(*)) OVER (), 2) AS percentage
              FROM user_sessions
              WHERE total_clicks >= 1 AND ${filter.clause}
              GROUP BY segment
              ORDER BY session_count DESC, MIN(total_clicks) ASC`,
        params: [...tiers.params, ...filter.params],
        source: 'user_sessions',
      };
    }

    if (segmentationType === 'value') {
      return {
        sql: `WITH session_value AS (
                SELECT session_id,
                       COUNT(CASE WHEN price > 0 THEN 1 END) AS price_views,
                       MAX(price) AS max_price_viewed,
                       COUNT(DISTINCT page_1_main_category) AS categories_explored
                FROM clickstream
                WHERE ${filter.clause}
                GROUP BY session_id
              )
              SELECT CASE
                       WHEN price_views = 0 THEN 'Non-Commercial'
                       WHEN price_views <= 2 THEN 'Price Curious'
                       WHEN price_views <= 10 THEN 'Price Conscious'
                       ELSE 'High Intent'
                     END AS segment,
                     COUNT(*) AS session_count,
                     ROUND(AVG(price_views), 2) AS avg_price_views,
                     ROUND(AVG(max_price_viewed), 2) AS avg_max_price,
                     ROUND(AVG(categories_explored), 2) AS avg_categories,
                     ROUND(COUNT(*) * 100.0 / SUM(COUNT(*)) OVER (), 2) AS percentage
              FROM session_value
              GROUP BY segment
              ORDER BY session_count DESC, MIN(price_views) ASC`,
        params: filter.params,
        source: 'clickstream',
      };
    }

    if (segmentationType === 'geographic') {
      return {
        sql: `WITH selected AS (
                SELECT * FROM user_sessions WHERE ${filter.clause}
              )
              SELECT country AS segment,
                     COUNT(*) AS session_count,
                     ROUND(AVG(total_clicks), 2) AS avg_clicks_per_session,
                     ROUND(AVG(unique_products_viewed), 2) AS avg_products_viewed,
                     ROUND(COUNT(*) * 100.0 / (SELECT COUNT(*) FROM selected), 2) AS percentage
              FROM selected
              GROUP BY country
              HAVING COUNT(*) >= ?
              ORDER BY session_count DESC, country ASC
              LIMIT ?`,
        params: [...filter.params, this.config.geographicMinSessions, this.config.topN],
        source: 'user_sessions',
      };
    }

    return {
      sql: `SELECT CASE
                     WHEN unique_categories_viewed = 1 THEN 'Category Focused'
                     WHEN unique_categories_viewed = 2 THEN 'Comparison Shoppers'
                     ELSE 'Explorers'
                   END AS segment,
                   COUNT(*) AS session_count,
                   ROUND(AVG(unique_categories_viewed), 2) AS avg_categories,
                   ROUND(AVG(unique_products_viewed), 2) AS avg_products,
                   ROUND(AVG(total_clicks), 2) AS avg_clicks_per_session,
                   ROUND(COUNT(*) * 100.0 / SUM(COUNT(*)) OVER (), 2) AS percentage
            FROM user_sessions
            WHERE unique_categories_viewed > 0 AND ${filter.clause}
            GROUP BY segment
            ORDER BY session_count DESC, MIN(unique_categories_viewed) ASC`,
      params: filter.params,
      source: 'user_sessions',
    };
  }

  private async runReport(
    title: string,
    sql: string,
    params: SqlParam[],
    extras: Pick<AnalyticsReport, 'insights' | 'metadata'>
  ): Promise<ToolResult<AnalyticsReport>> {
    const startTime = Date.now();
    const rows: Row[] = await this.connection.query(sql, params);
    const executionTimeMs = Date.now() - startTime;

    const report: AnalyticsReport = {
      analysis_type: title,
      rows,
      insights: extras.insights,
      execution_time_ms: executionTimeMs,
      metadata: { ...extras.metadata, rows_returned: rows.length },
    };

    logger.info('Analytics report generated', {
      analysis: title,
      rows: rows.length,
      elapsed_ms: executionTimeMs,
    });

    const { columns, rows: values } = toTabular(rows);
    const table = values.length > 0 ? formatTable(columns, values) : 'No data found for this analysis.';

    return { content: [textBlock(this.renderReport(report, table))], data: report };
  }

  private renderReport(report: AnalyticsReport<unknown>, table: string): string {
    const lines = [formatHeading(report.analysis_type), `Execution time: ${report.execution_time_ms}ms`];

    if (report.insights.length > 0) {
      lines.push('', 'Key Insights:', ...report.insights.map((insight) => `  - ${insight}`));
    }

    lines.push('', table, '', 'Metadata:');
    for (const [key, value] of Object.entries(report.metadata)) {
      lines.push(`  ${key}: ${Array.isArray(value) ? value.join(', ') : value}`);
    }

    return lines.join('\n');
  }
}

export function createAnalyticsTools(
  service: AnalyticsToolsService,
  config: AnalyticsConfig
): RegisteredTool[] {
  const schemas = createAnalyticsToolSchemas(config);

  return [
    defineTool({
      name: 'user_segmentation',
      title: 'User Segmentation',
      description: 'Bucket sessions by engagement, price-view value, category exploration or country.',
      category: 'analytics',
      schema: schemas.user_segmentation,
      handler: (args) => service.userSegmentation(args),
    }),
    defineTool({
      name: 'conversion_funnel',
      title: 'Conversion Funnel',
      description:
        'Sessions reaching each step (all, category, product, price) with step and overall conversion rates, or funnel reach by category, price tier or category journey.',
      category: 'analytics',
      schema: schemas.conversion_funnel,
      handler: (args) => service.conversionFunnel(args),
    }),
    defineTool({
      name: 'geographic_analysis',
      title: 'Geographic Analysis',
      description: 'Per-country traffic overview, category preferences, session behavior or market sizing.',
      category: 'analytics',
      schema: schemas.geographic_analysis,
      handler: (args) => service.geographicAnalysis(args),
    }),
    defineTool({
      name: 'product_performance',
      title: 'Product Performance',
      description: 'Top products by views, category performance, price tiers, product engagement or cross-category browsing.',
      category: 'analytics',
      schema: schemas.product_performance,
      handler: (args) => service.productPerformance(args),
    }),
  ];
}
