import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolResultSchema,
  type CallToolResult,
  type Resource,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import logger from '@/config/logger.js';
import type { ClientConfig } from './config.js';
import { formatToolResponse, type FormattedResponse } from './response-formatter.js';
import { routeQuery, type RoutedCall, type ToolArguments } from './router.js';

export type TransportFactory = () => Transport;

export interface Answer {
  route: RoutedCall;
  response: FormattedResponse;
  elapsedMs: number;
}

export function stdioTransportFactory(config: ClientConfig): TransportFactory {
  return () =>
    new StdioClientTransport({
      command: config.serverCommand,
      args: config.serverArgs,
      stderr: 'inherit',
    });
}

/**
 * One long-lived MCP session with the analytics server.
 */
export class AnalyticsClient {
  private readonly client: Client;
  private connected = false;

  constructor(
    private readonly config: ClientConfig,
    private readonly createTransport: TransportFactory = stdioTransportFactory(config)
  ) {
    this.client = new Client({ name: config.name, version: config.version });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    await this.client.connect(this.createTransport(), { timeout: this.config.timeoutMs });
    this.connected = true;

    const server = this.client.getServerVersion();
    logger.info('Connected to analytics server', {
      server: server?.name,
      version: server?.version,
    });
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;

    await this.client.close();
    this.connected = false;
    logger.info('Disconnected from analytics server');
  }

  async listTools(): Promise<Tool[]> {
    this.assertConnected();
    const { tools } = await this.client.listTools(undefined, { timeout: this.config.timeoutMs });
    return tools;
  }

  async listResources(): Promise<Resource[]> {
    this.assertConnected();
    const { resources } = await this.client.listResources(undefined, {
      timeout: this.config.timeoutMs,
    });
    return resources;
  }

  /**
   * Text of the first content entry of a resource
   */
  async readResource(uri: string): Promise<string> {
    this.assertConnected();
    const { contents } = await this.client.readResource({ uri }, { timeout: this.config.timeoutMs });
    const first = contents[0];

    if (!first) {
      throw new Error(`Resource ${uri} returned no content`);
    }
    if ('text' in first && typeof first.text === 'string') {
      return first.text;
    }
    throw new Error(`Resource ${uri} is not text`);
  }

  async callTool(name: string, args: ToolArguments = {}): Promise<CallToolResult> {
    this.assertConnected();
    return this.client.request(
      { method: 'tools/call', params: { name, arguments: args } },
      CallToolResultSchema,
      { timeout: this.config.timeoutMs }
    );
  }

  /**
   * Routes free text to one tool call and formats what comes back.
   */
  async ask(text: string): Promise<Answer> {
    const startTime = Date.now();
    const route = routeQuery(text);

    logger.debug('Routed question', { rule: route.rule, tool: route.tool });

    const result = await this.callTool(route.tool, route.arguments);
    return {
      route,
      response: formatToolResponse(result),
      elapsedMs: Date.now() - startTime,
    };
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new Error('Not connected to the analytics server. Call connect() first.');
    }
  }
}
