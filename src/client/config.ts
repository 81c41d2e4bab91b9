import path from 'node:path';
import type { Environment } from '@/config/environment.js';

export interface ClientConfig {
  name: string;
  version: string;
  /** Command that starts the MCP server over stdio */
  serverCommand: string;
  serverArgs: string[];
  chartDir: string;
  timeoutMs: number;
}

export const CLIENT_NAME = 'clickstream-analytics-chat';
export const CLIENT_VERSION = '1.0.0';

export const SAMPLE_QUERIES = [
  'Show me the top 5 countries by user sessions',
  'Create a chart of daily user activity trends',
  'Analyze the conversion funnel',
  'What are the most popular product categories?',
  'Show user segmentation by engagement',
  'Create a heatmap of activity by country and category',
  'Analyze geographic market size',
  'Show the session length distribution',
  'Plot a pie chart of views by category',
  'Create a funnel chart of the user journey',
] as const;

export function createClientConfig(environment: Environment): ClientConfig {
  return {
    name: CLIENT_NAME,
    version: CLIENT_VERSION,
    serverCommand: environment.ANALYTICS_SERVER_COMMAND,
    serverArgs: environment.ANALYTICS_SERVER_ARGS.split(/\s+/).filter(Boolean),
    chartDir: path.resolve(environment.CHART_SAVE_DIR),
    timeoutMs: environment.CLIENT_TIMEOUT_MS,
  };
}
