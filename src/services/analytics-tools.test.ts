/**
 * Unit Tests for the analytics tools
 *
 * Expected values are counted by hand from the fixture clickstream.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServices, type AppServices } from '@/bootstrap.js';
import type { SqliteConnection } from '@/database/sqlite/connection.js';
import { expectToolError, textOf } from '@/test-utils/assertions.js';
import { createTestConfig, createTestDatabase } from '@/test-utils/test-database.js';
import type { Row } from '@/types/tools.js';
import { AnalyticsToolsService, countryFilter, tierCaseExpression } from './analytics-tools.js';

const pick = (rows: Row[] | undefined, ...columns: string[]) =>
  (rows ?? []).map((row) => columns.map((column) => row[column]));

describe('analytics tools', () => {
  const config = createTestConfig();
  let connection: SqliteConnection;
  let service: AnalyticsToolsService;
  let services: AppServices;

  beforeAll(async () => {
    connection = await createTestDatabase(config);
    service = new AnalyticsToolsService(connection, config.analytics);
    services = createServices(config, connection);
  });

  afterAll(async () => {
    await connection.disconnect();
  });

  describe('countryFilter', () => {
    it('should be always true without countries', () => {
      expect(countryFilter('country')).toEqual({ clause: '1 = 1', params: [] });
      expect(countryFilter('country', [])).toEqual({ clause: '1 = 1', params: [] });
    });

    it('should bind each country as a parameter', () => {
      expect(countryFilter('cs.country', ['Poland', "O'Land"])).toEqual({
        clause: 'cs.country IN (?, ?)',
        params: ['Poland', "O'Land"],
      });
    });
  });

  describe('tierCaseExpression', () => {
    it('should bind bounds and names for each tier', () => {
      const result = tierCaseExpression('total_clicks', [
        { name: 'Low', minClicks: 1, maxClicks: 2 },
        { name: 'High', minClicks: 3, maxClicks: null },
      ]);

      expect(result.clause).toBe(
        'CASE WHEN total_clicks BETWEEN ? AND ? THEN ? WHEN total_clicks >= ? THEN ? END'
      );
      expect(result.params).toEqual([1, 2, 'Low', 3, 'High']);
    });
  });

  describe('userSegmentation', () => {
    it('should bucket sessions into the configured engagement tiers', async () => {
      const result = await service.userSegmentation({ segmentation_type: 'engagement' });

      expect(pick(result.data?.rows, 'segment', 'session_count', 'percentage')).toEqual([
        ['Bouncers', 4, 44.44],
        ['Browsers', 4, 44.44],
        ['Engaged Users', 1, 11.11],
      ]);
      expect(textOf(result).split('\n')[0]).toBe('User Segmentation: Engagement');
    });

    it('should segment by price views', async () => {
      const result = await service.userSegmentation({ segmentation_type: 'value' });

      expect(pick(result.data?.rows, 'segment', 'session_count')).toEqual([
        ['Price Curious', 5],
        ['Non-Commercial', 2],
        ['Price Conscious', 2],
      ]);
    });

    it('should segment by categories explored', async () => {
      const result = await service.userSegmentation({ segmentation_type: 'exploration' });

      expect(pick(result.data?.rows, 'segment', 'session_count')).toEqual([
        ['Category Focused', 4],
        ['Comparison Shoppers', 3],
        ['Explorers', 1],
      ]);
    });

    it('should segment by country above the session threshold', async () => {
      const result = await service.userSegmentation({ segmentation_type: 'geographic' });

      // GEOGRAPHIC_MIN_SESSIONS defaults to 5, so only Poland qualifies
      expect(result.data?.rows).toEqual([
        {
          segment: 'Poland',
          session_count: 5,
          avg_clicks_per_session: 1.8,
          avg_products_viewed: 1.4,
          percentage: 55.56,
        },
      ]);
    });

    it('should restrict to the given countries', async () => {
      const result = await service.userSegmentation({
        segmentation_type: 'engagement',
        countries: ['Germany'],
      });

      expect(pick(result.data?.rows, 'segment', 'session_count')).toEqual([
        ['Bouncers', 1],
        ['Browsers', 1],
        ['Engaged Users', 1],
      ]);
      expect(result.data?.metadata.countries).toEqual(['Germany']);
    });
  });

  describe('standardFunnel', () => {
    it('should count sessions that completed every earlier step', async () => {
      const result = await service.standardFunnel();

      expect(result.data?.rows).toEqual([
        {
          step: 'All Sessions',
          sessions: 9,
          step_conversion_rate: 100,
          overall_conversion_rate: 100,
          drop_off: 0,
        },
        {
          step: 'Viewed Category',
          sessions: 8,
          step_conversion_rate: 88.89,
          overall_conversion_rate: 88.89,
          drop_off: 1,
        },
        {
          step: 'Viewed Product',
          sessions: 8,
          step_conversion_rate: 100,
          overall_conversion_rate: 88.89,
          drop_off: 0,
        },
        {
          step: 'Viewed Price',
          sessions: 7,
          step_conversion_rate: 87.5,
          overall_conversion_rate: 77.78,
          drop_off: 1,
        },
      ]);
    });

    it('should report null rates when no session matches', async () => {
      const result = await service.standardFunnel(['Nowhere']);

      expect(result.data?.rows.map((step) => step.sessions)).toEqual([0, 0, 0, 0]);
      expect(result.data?.rows[0]?.step_conversion_rate).toBeNull();
      expect(textOf(result)).toContain('n/a');
    });
  });

  describe('conversionFunnel', () => {
    it('should dispatch the standard funnel by default through the registry', async () => {
      const result = await services.registry.call('conversion_funnel', {});

      expect(result.isError).toBeUndefined();
      expect(result.data).toMatchObject({
        analysis_type: 'Conversion Funnel',
        metadata: { funnel_type: 'standard', steps: 4 },
      });
    });

    it('should break conversion down by category', async () => {
      const result = await service.conversionFunnel({ funnel_type: 'product' });

      expect(
        pick(
          result.data?.rows,
          'category',
          'total_sessions',
          'product_viewers',
          'price_viewers',
          'detail_viewers',
          'product_conversion',
          'price_conversion',
          'detail_conversion'
        )
      ).toEqual([
        ['skirts', 5, 5, 5, 0, 100, 100, 0],
        ['trousers', 5, 5, 5, 0, 100, 100, 0],
        ['blouses', 3, 3, 2, 0, 100, 66.67, 0],
      ]);
      expect(textOf(result).split('\n')[0]).toBe('Conversion Funnel: Product');
    });

    it('should break conversion down by price tier in price order', async () => {
      const result = await service.conversionFunnel({ funnel_type: 'price' });

      expect(
        pick(
          result.data?.rows,
          'price_tier',
          'sessions_with_price',
          'total_price_views',
          'avg_price',
          'avg_price_views_per_session',
          'detail_conversion_rate'
        )
      ).toEqual([
        ['Budget (up to 50)', 6, 10, 32, 1.67, 0],
        ['Mid-range (50-100)', 3, 4, 57.75, 1.33, 0],
        ['Premium (100-150)', 2, 2, 110, 1, 0],
        ['Luxury (over 150)', 1, 1, 160, 1, 0],
      ]);
    });

    it('should group sessions by category journey', async () => {
      const result = await service.conversionFunnel({ funnel_type: 'category' });

      expect(
        pick(result.data?.rows, 'journey_type', 'sessions', 'avg_clicks', 'price_viewers', 'price_view_rate')
      ).toEqual([
        ['Single Category', 4, 1.25, 3, 75],
        ['Two Categories', 3, 2.33, 3, 100],
        ['Multi-Category', 1, 6, 1, 100],
      ]);
      expect(result.data?.metadata).toMatchObject({ funnel_type: 'category' });
    });
  });

  describe('geographicAnalysis', () => {
    it('should rank countries above the session threshold', async () => {
      const result = await service.geographicAnalysis({
        analysis_type: 'overview',
        top_n: 20,
        min_sessions: 2,
      });

      expect(
        pick(result.data?.rows, 'country', 'unique_sessions', 'total_clicks', 'click_share', 'session_share')
      ).toEqual([
        ['Poland', 5, 9, 50, 62.5],
        ['Germany', 3, 9, 50, 37.5],
      ]);
      expect(result.data?.rows[0]?.avg_clicks_per_session).toBe(2.11);
    });

    it('should honor the country filter and top_n', async () => {
      const result = await service.geographicAnalysis({
        analysis_type: 'overview',
        top_n: 1,
        min_sessions: 1,
        countries: ['Germany', 'France'],
      });

      expect(pick(result.data?.rows, 'country', 'unique_sessions')).toEqual([['Germany', 3]]);
    });

    it('should report bounce rates per country', async () => {
      const result = await service.geographicAnalysis({
        analysis_type: 'behavior',
        top_n: 20,
        min_sessions: 1,
      });

      expect(pick(result.data?.rows, 'country', 'sessions', 'avg_session_length', 'bounce_rate')).toEqual([
        ['Poland', 5, 1.8, 40],
        ['Germany', 3, 3, 33.33],
        ['France', 1, 1, 100],
      ]);
    });

    it('should size markets by session volume', async () => {
      const result = await service.geographicAnalysis({
        analysis_type: 'market_size',
        top_n: 20,
        min_sessions: 5,
      });

      expect(result.data?.rows).toHaveLength(1);
      expect(result.data?.rows[0]).toMatchObject({
        country: 'Poland',
        total_sessions: 5,
        total_interactions: 9,
        price_interactions: 7,
        commercial_intent_pct: 77.78,
        market_size: 'Small Market',
      });
    });

    it('should share each country\'s clicks across categories', async () => {
      const result = await service.geographicAnalysis({
        analysis_type: 'preferences',
        top_n: 20,
        min_sessions: 1,
        countries: ['Germany'],
      });

      expect(
        pick(result.data?.rows, 'country', 'category', 'category_clicks', 'unique_sessions', 'category_preference_pct')
      ).toEqual([
        ['Germany', 'blouses', 3, 1, 33.33],
        ['Germany', 'skirts', 3, 3, 33.33],
        ['Germany', 'trousers', 3, 2, 33.33],
      ]);
    });

    it('should drop category preferences below the session threshold', async () => {
      const result = await service.geographicAnalysis({
        analysis_type: 'preferences',
        top_n: 20,
        min_sessions: 3,
        countries: ['Germany'],
      });

      expect(pick(result.data?.rows, 'category', 'unique_sessions')).toEqual([['skirts', 3]]);
    });

    it('should apply the configured defaults through the registry', async () => {
      const result = await services.registry.call('geographic_analysis', {});

      // GEOGRAPHIC_MIN_SESSIONS defaults to 5
      expect(result.isError).toBeUndefined();
      expect(result.data).toMatchObject({
        metadata: { min_sessions: 5, top_n: 20, rows_returned: 1 },
      });
    });

    it('should reject an empty country list', async () => {
      const result = await services.registry.call('geographic_analysis', { countries: [] });

      expectToolError(result, 'ValidationError');
    });
  });

  describe('productPerformance', () => {
    it('should rank products by views', async () => {
      const result = await service.productPerformance({ analysis_type: 'products', top_n: 3 });

      expect(pick(result.data?.rows, 'product_code', 'total_views')).toEqual([
        ['A1', 5],
        ['C1', 4],
        ['B1', 3],
      ]);
      expect(result.data?.rows[0]).toMatchObject({
        category: 'trousers',
        unique_sessions: 4,
        countries: 3,
        avg_price: 28,
      });
    });

    it('should rank categories with their share of views', async () => {
      const result = await service.productPerformance({ analysis_type: 'categories', top_n: 10 });

      expect(pick(result.data?.rows, 'category', 'total_views', 'view_share')).toEqual([
        ['trousers', 8, 44.44],
        ['blouses', 5, 27.78],
        ['skirts', 5, 27.78],
      ]);
    });

    it('should group priced views into tiers in price order', async () => {
      const result = await service.productPerformance({ analysis_type: 'pricing', top_n: 10 });

      expect(pick(result.data?.rows, 'price_tier', 'views')).toEqual([
        ['Budget (up to 50)', 10],
        ['Mid-range (50-100)', 4],
        ['Premium (100-150)', 2],
        ['Luxury (over 150)', 1],
      ]);
    });

    it('should rank products by views per session', async () => {
      const result = await service.productPerformance({ analysis_type: 'engagement', top_n: 3 });

      expect(
        pick(result.data?.rows, 'product', 'views_per_session', 'total_views', 'traffic_level')
      ).toEqual([
        ['C1', 1.33, 4, 'Low Traffic'],
        ['A1', 1.25, 5, 'Low Traffic'],
        ['B1', 1, 3, 'Low Traffic'],
      ]);
    });

    it('should list category pairs browsed in the same session once', async () => {
      const result = await service.productPerformance({ analysis_type: 'cross_category', top_n: 10 });

      expect(
        pick(
          result.data?.rows,
          'primary_category',
          'secondary_category',
          'sessions_with_both',
          'total_cross_views',
          'avg_cross_views_per_session'
        )
      ).toEqual([
        ['skirts', 'trousers', 3, 5, 1.67],
        ['blouses', 'skirts', 2, 4, 2],
        ['blouses', 'trousers', 1, 6, 6],
      ]);
    });
  });
});
