import logger from '@/config/logger.js';
import { QUERY_TEMPLATES } from '@/config/query-templates.js';
import { NotFoundError } from '@/middleware/error.js';
import type { ResourceContent, ResourceDescriptor, ResourceName } from '@/types/resources.js';
import type { DatabaseToolsService } from './database-tools.js';

export const RESOURCES: readonly ResourceDescriptor[] = [
  {
    name: 'database_schema',
    uri: 'schema://database',
    title: 'Database Schema',
    description: 'Every table with its columns and types',
    mimeType: 'application/json',
  },
  {
    name: 'tables',
    uri: 'schema://tables',
    title: 'Tables',
    description: 'Names of the tables available for querying',
    mimeType: 'application/json',
  },
  {
    name: 'query_templates',
    uri: 'config://query_templates',
    title: 'Query Templates',
    description: 'Pre-written analytics queries by name',
    mimeType: 'application/json',
  },
];

/**
 * Read-only documents describing the store. Contents are rebuilt on every read.
 */
export class ResourceService {
  constructor(private readonly databaseTools: DatabaseToolsService) {}

  list(): ResourceDescriptor[] {
    return [...RESOURCES];
  }

  find(nameOrUri: string): ResourceDescriptor | undefined {
    return RESOURCES.find((resource) => resource.name === nameOrUri || resource.uri === nameOrUri);
  }

  /**
   * @param nameOrUri - Resource name such as `tables`, or its URI
   * @throws {NotFoundError} For unknown resources
   */
  async read(nameOrUri: string): Promise<ResourceContent> {
    const resource = this.find(nameOrUri);
    if (!resource) {
      throw new NotFoundError(`Unknown resource: ${nameOrUri}`);
    }

    const body = await this.build(resource.name);
    logger.debug('Resource read', { resource: resource.name });

    return {
      uri: resource.uri,
      mimeType: resource.mimeType,
      text: JSON.stringify(body, null, 2),
    };
  }

  private async build(name: ResourceName): Promise<unknown> {
    switch (name) {
      case 'database_schema': {
        const tables = [];
        for (const tableName of await this.databaseTools.existingTables()) {
          const schema = await this.databaseTools.describeTable(tableName);
          tables.push({
            name: schema.table_name,
            description: schema.description,
            columns: schema.columns.map(({ name: column, type, nullable, primary_key }) => ({
              name: column,
              type,
              nullable,
              primary_key,
            })),
          });
        }
        return { tables };
      }
      case 'tables':
        return { tables: await this.databaseTools.existingTables() };
      case 'query_templates':
        return Object.fromEntries(
          Object.entries(QUERY_TEMPLATES).map(([templateName, sql]) => [
            templateName,
            sql.replace(/\s+/g, ' ').trim(),
          ])
        );
    }
  }
}
