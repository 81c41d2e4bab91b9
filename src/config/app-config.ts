/**
 * Application configuration.
 *
 * Built once at process start from the validated environment and handed to
 * every component constructor. Nothing reads `env` after this point.
 */

import path from 'node:path';
import type { Environment } from './environment.js';

export interface SegmentTier {
  name: string;
  minClicks: number;
  /** Inclusive upper bound; null for the open-ended top tier */
  maxClicks: number | null;
}

export interface DatabaseConfig {
  path: string;
  readOnly: boolean;
  statementTimeoutMs: number;
  maxQueryResults: number;
  defaultQueryLimit: number;
  sampleDefaultRows: number;
}

export interface AnalyticsConfig {
  topN: number;
  geographicMinSessions: number;
  segmentTiers: SegmentTier[];
}

export interface ChartConfig {
  width: number;
  height: number;
  scale: number;
  maxPoints: number;
}

export interface ServerConfig {
  name: string;
  version: string;
  port: number;
  corsOrigins: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  analytics: AnalyticsConfig;
  charts: ChartConfig;
}

export const SERVER_NAME = 'clickstream-analytics';
export const SERVER_VERSION = '1.0.0';

const ENGAGEMENT_TIER_NAMES = [
  'Bouncers',
  'Browsers',
  'Engaged Users',
  'Active Users',
  'Power Users',
] as const;

/**
 * Turns ascending click thresholds into contiguous tiers.
 * `[1, 5]` yields 1, 2-5 and 6+.
 */
export function buildSegmentTiers(thresholds: number[]): SegmentTier[] {
  if (thresholds.length === 0) {
    throw new Error('At least one segment threshold is required');
  }

  thresholds.forEach((value, index) => {
    const previous = index === 0 ? 0 : (thresholds[index - 1] ?? 0);
    if (!Number.isInteger(value) || value <= previous) {
      throw new Error('Segment thresholds must be ascending positive integers');
    }
  });

  const useNamedTiers = thresholds.length + 1 === ENGAGEMENT_TIER_NAMES.length;
  const tiers: SegmentTier[] = [];
  let minClicks = 1;

  thresholds.forEach((maxClicks, index) => {
    const label =
      minClicks === maxClicks
        ? `${maxClicks} click${maxClicks === 1 ? '' : 's'}`
        : `${minClicks}-${maxClicks} clicks`;
    tiers.push({
      name: (useNamedTiers && ENGAGEMENT_TIER_NAMES[index]) || label,
      minClicks,
      maxClicks,
    });
    minClicks = maxClicks + 1;
  });

  tiers.push({
    name: (useNamedTiers && ENGAGEMENT_TIER_NAMES[thresholds.length]) || `${minClicks}+ clicks`,
    minClicks,
    maxClicks: null,
  });

  return tiers;
}

export function createAppConfig(environment: Environment): AppConfig {
  return {
    server: {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      port: environment.PORT,
      corsOrigins: environment.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
      rateLimitWindowMs: environment.RATE_LIMIT_WINDOW_MS,
      rateLimitMaxRequests: environment.RATE_LIMIT_MAX_REQUESTS,
    },
    database: {
      path:
        environment.DATABASE_PATH === ':memory:'
          ? environment.DATABASE_PATH
          : path.resolve(environment.DATABASE_PATH),
      readOnly: environment.DATABASE_READONLY,
      statementTimeoutMs: environment.QUERY_TIMEOUT_MS,
      maxQueryResults: environment.MAX_QUERY_RESULTS,
      defaultQueryLimit: Math.min(environment.DEFAULT_QUERY_LIMIT, environment.MAX_QUERY_RESULTS),
      sampleDefaultRows: environment.SAMPLE_DEFAULT_ROWS,
    },
    analytics: {
      topN: environment.ANALYTICS_TOP_N,
      geographicMinSessions: environment.GEOGRAPHIC_MIN_SESSIONS,
      segmentTiers: buildSegmentTiers(environment.SEGMENT_THRESHOLDS.split(',').map(Number)),
    },
    charts: {
      width: environment.CHART_WIDTH,
      height: environment.CHART_HEIGHT,
      scale: environment.CHART_SCALE,
      maxPoints: environment.CHART_MAX_POINTS,
    },
  };
}
