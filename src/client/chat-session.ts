import type { Answer } from './analytics-client.js';
import { SAMPLE_QUERIES } from './config.js';
import type { ChartImage } from './response-formatter.js';

/** What the session needs from the client; AnalyticsClient satisfies it */
export interface QuestionAnswerer {
  ask(text: string): Promise<Answer>;
  listTools(): Promise<Array<{ name: string; description?: string }>>;
}

/** ChartStore satisfies it */
export interface ChartSaver {
  save(chart: ChartImage, label: string): Promise<string>;
}

export interface SessionStats {
  startedAt: Date;
  questions: number;
  succeeded: number;
  failed: number;
  chartsSaved: number;
  toolUsage: Record<string, number>;
}

export type Output = (line: string) => void;

export const COMMANDS = ['help', 'suggestions', 'tools', 'stats', 'exit'] as const;

export const HELP_TEXT = [
  'Ask a question about the clickstream data in plain English, or type a SQL SELECT.',
  '',
  'Commands:',
  '  help         Show this message',
  '  suggestions  List example questions',
  '  tools        List the tools the server offers',
  '  stats        Show statistics for this session',
  '  exit         Leave the chat (also: quit)',
].join('\n');

/**
 * Interactive chat state. Input arrives one line at a time; output goes
 * through `write` so the session runs the same under a terminal or a test.
 */
export class ChatSession {
  private readonly stats: SessionStats;

  constructor(
    private readonly client: QuestionAnswerer,
    private readonly charts: ChartSaver,
    private readonly write: Output,
    now: Date = new Date()
  ) {
    this.stats = {
      startedAt: now,
      questions: 0,
      succeeded: 0,
      failed: 0,
      chartsSaved: 0,
      toolUsage: {},
    };
  }

  getStats(): SessionStats {
    return { ...this.stats, toolUsage: { ...this.stats.toolUsage } };
  }

  /**
   * @returns false once the user asked to leave
   */
  async handleInput(line: string): Promise<boolean> {
    const input = line.trim();
    if (!input) return true;

    switch (input.toLowerCase()) {
      case 'exit':
      case 'quit':
        this.write('Goodbye!');
        return false;
      case 'help':
        this.write(HELP_TEXT);
        return true;
      case 'suggestions':
        SAMPLE_QUERIES.forEach((query, index) => this.write(`${index + 1}. ${query}`));
        return true;
      case 'tools':
        await this.showTools();
        return true;
      case 'stats':
        this.write(this.formatStats());
        return true;
      default:
        await this.answer(input);
        return true;
    }
  }

  formatStats(): string {
    const usage = Object.entries(this.stats.toolUsage)
      .sort(([, a], [, b]) => b - a)
      .map(([tool, count]) => `  ${tool}: ${count}`);

    return [
      `Session started: ${this.stats.startedAt.toISOString()}`,
      `Questions: ${this.stats.questions} (${this.stats.succeeded} succeeded, ${this.stats.failed} failed)`,
      `Charts saved: ${this.stats.chartsSaved}`,
      ...(usage.length > 0 ? ['Tools used:', ...usage] : []),
    ].join('\n');
  }

  private async showTools(): Promise<void> {
    const tools = await this.client.listTools();
    tools.forEach((tool) => this.write(`- ${tool.name}: ${tool.description ?? ''}`.trimEnd()));
  }

  private async answer(question: string): Promise<void> {
    this.stats.questions += 1;

    try {
      const { route, response, elapsedMs } = await this.client.ask(question);
      this.stats.toolUsage[route.tool] = (this.stats.toolUsage[route.tool] ?? 0) + 1;

      if (response.isError) {
        this.stats.failed += 1;
        this.write(`Error from ${route.tool}: ${response.text}`);
        return;
      }

      this.write(response.text);

      for (const chart of response.charts) {
        const filePath = await this.charts.save(chart, route.tool);
        this.stats.chartsSaved += 1;
        this.write(`Chart saved to ${filePath}`);
      }

      // Counted only once every chart is on disk
      this.stats.succeeded += 1;
      this.write(`(${route.tool}, ${elapsedMs}ms)`);
    } catch (error) {
      this.stats.failed += 1;
      this.write(`Request failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
