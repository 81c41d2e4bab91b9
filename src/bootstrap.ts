import type { AppConfig } from '@/config/app-config.js';
import { SqliteConnection } from '@/database/sqlite/connection.js';
import { AnalyticsToolsService, createAnalyticsTools } from '@/services/analytics-tools.js';
import { ChartRenderer } from '@/services/chart-renderer.js';
import { DatabaseToolsService, createDatabaseTools } from '@/services/database-tools.js';
import { ResourceService } from '@/services/resources.js';
import { ToolRegistry } from '@/services/tool-registry.js';
import {
  VisualizationToolsService,
  createVisualizationTools,
} from '@/services/visualization-tools.js';

export interface AppServices {
  connection: SqliteConnection;
  registry: ToolRegistry;
  resources: ResourceService;
}

/**
 * Wires every service from one configuration object. The connection is
 * created here but opened by the caller.
 */
export function createServices(
  config: AppConfig,
  connection: SqliteConnection = new SqliteConnection(config.database)
): AppServices {
  const databaseTools = new DatabaseToolsService(connection, config.database);
  const analyticsTools = new AnalyticsToolsService(connection, config.analytics);
  const visualizationTools = new VisualizationToolsService(
    connection,
    new ChartRenderer(config.charts),
    config.database
  );

  const registry = new ToolRegistry([
    ...createDatabaseTools(databaseTools, config.database),
    ...createAnalyticsTools(analyticsTools, config.analytics),
    ...createVisualizationTools(visualizationTools, config.charts),
  ]);

  return {
    connection,
    registry,
    resources: new ResourceService(databaseTools),
  };
}
