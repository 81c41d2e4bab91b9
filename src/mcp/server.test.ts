/**
 * MCP round trips over the SDK's in-memory transport
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServices } from '@/bootstrap.js';
import type { SqliteConnection } from '@/database/sqlite/connection.js';
import { expectPng } from '@/test-utils/assertions.js';
import { createTestConfig, createTestDatabase } from '@/test-utils/test-database.js';
import { createMcpServer, toMcpContent, toMcpResult } from './server.js';

describe('toMcpContent', () => {
  it('should turn error blocks into prefixed text', () => {
    expect(
      toMcpContent({ type: 'error', kind: 'TimeoutError', message: 'Statement exceeded the 5ms timeout' })
    ).toEqual({ type: 'text', text: 'TimeoutError: Statement exceeded the 5ms timeout' });
  });

  it('should carry the error flag only for failures', () => {
    expect(toMcpResult({ content: [{ type: 'text', text: 'ok' }] })).toEqual({
      content: [{ type: 'text', text: 'ok' }],
    });
    expect(
      toMcpResult({
        content: [{ type: 'error', kind: 'NotFoundError', message: 'gone' }],
        isError: true,
      })
    ).toEqual({ content: [{ type: 'text', text: 'NotFoundError: gone' }], isError: true });
  });
});

describe('MCP server', () => {
  const config = createTestConfig();
  let connection: SqliteConnection;
  let server: McpServer;
  let client: Client;

  const callTool = (name: string, args: Record<string, unknown>) =>
    client.request({ method: 'tools/call', params: { name, arguments: args } }, CallToolResultSchema);

  beforeAll(async () => {
    connection = await createTestDatabase(config);
    server = createMcpServer(createServices(config, connection), config.server);
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
    await connection.disconnect();
  });

  it('should identify itself with the configured name', () => {
    expect(client.getServerVersion()).toEqual({ name: 'clickstream-analytics', version: '1.0.0' });
  });

  it('should list all twelve tools with their input schemas', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'query_database',
      'get_table_schema',
      'get_sample_data',
      'analyze_user_behavior',
      'user_segmentation',
      'conversion_funnel',
      'geographic_analysis',
      'product_performance',
      'create_chart',
      'create_heatmap',
      'create_funnel_chart',
      'create_time_series',
    ]);
    expect(tools[0]?.inputSchema).toMatchObject({
      type: 'object',
      properties: { query: { type: 'string' } },
      required: ['query'],
    });
  });

  it('should return tool text as text content', async () => {
    const result = await callTool('analyze_user_behavior', { dimension: 'overview' });

    expect(result.isError).toBeFalsy();
    expect(result.content).toHaveLength(1);
    expect(result.content[0]).toMatchObject({ type: 'text' });
  });

  it('should flag tool errors and prefix the kind', async () => {
    const result = await callTool('get_sample_data', { table_name: 'orders' });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: "NotFoundError: Table 'orders' not found. Known tables: clickstream, user_sessions, product_analytics, country_analytics, sqlite_sequence",
      },
    ]);
  });

  it('should return charts as PNG image content', async () => {
    const result = await callTool('create_funnel_chart', {
      steps: [
        { label: 'Visit', count: 10 },
        { label: 'Buy', count: 4 },
      ],
    });

    expect(result.content.map((item) => item.type)).toEqual(['text', 'image']);
    const image = result.content[1];
    if (image?.type === 'image') {
      expect(image.mimeType).toBe('image/png');
      expectPng(image.data);
    }
  });

  it('should list and read resources', async () => {
    const { resources } = await client.listResources();
    expect(resources.map((resource) => resource.uri)).toEqual([
      'schema://database',
      'schema://tables',
      'config://query_templates',
    ]);

    const { contents } = await client.readResource({ uri: 'schema://tables' });
    expect(contents).toHaveLength(1);
    expect(contents[0]).toMatchObject({ uri: 'schema://tables', mimeType: 'application/json' });
  });
});
