import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Answer } from './analytics-client.js';
import { ChatSession, HELP_TEXT, type ChartSaver, type QuestionAnswerer } from './chat-session.js';
import { SAMPLE_QUERIES } from './config.js';

function answer(
  overrides: Partial<Answer['response']> = {},
  tool: Answer['route']['tool'] = 'create_chart'
): Answer {
  return {
    route: { rule: 'chart', tool, arguments: {} },
    response: { text: 'Created bar chart', charts: [], isError: false, ...overrides },
    elapsedMs: 12,
  };
}

describe('ChatSession', () => {
  let lines: string[];
  let ask: Mock<QuestionAnswerer['ask']>;
  let save: Mock<ChartSaver['save']>;
  let session: ChatSession;

  beforeEach(() => {
    lines = [];
    ask = vi.fn<QuestionAnswerer['ask']>();
    save = vi.fn<ChartSaver['save']>();

    const client: QuestionAnswerer = {
      ask,
      listTools: async () => [
        { name: 'query_database', description: 'Run SQL' },
        { name: 'create_chart' },
      ],
    };
    session = new ChatSession(
      client,
      { save },
      (line) => lines.push(line),
      new Date('2024-01-01T00:00:00Z')
    );
  });

  it('should print help', async () => {
    expect(await session.handleInput('HELP')).toBe(true);
    expect(lines).toEqual([HELP_TEXT]);
  });

  it('should number the suggestions', async () => {
    await session.handleInput('suggestions');

    expect(lines).toHaveLength(SAMPLE_QUERIES.length);
    expect(lines[0]).toBe(`1. ${SAMPLE_QUERIES[0]}`);
  });

  it('should list the server tools', async () => {
    await session.handleInput('tools');

    expect(lines).toEqual(['- query_database: Run SQL', '- create_chart:']);
  });

  it('should stop on exit and quit', async () => {
    expect(await session.handleInput('exit')).toBe(false);
    expect(await session.handleInput(' quit ')).toBe(false);
    expect(ask).not.toHaveBeenCalled();
  });

  it('should ignore blank lines', async () => {
    expect(await session.handleInput('   ')).toBe(true);
    expect(lines).toEqual([]);
  });

  it('should print answers and save their charts', async () => {
    ask.mockResolvedValue(answer({ charts: [{ data: 'aGk=', mimeType: 'image/png' }] }));
    save.mockResolvedValue('/tmp/charts/chart.png');

    await session.handleInput('plot sessions by country');

    expect(ask).toHaveBeenCalledWith('plot sessions by country');
    expect(save).toHaveBeenCalledWith({ data: 'aGk=', mimeType: 'image/png' }, 'create_chart');
    expect(lines).toEqual([
      'Created bar chart',
      'Chart saved to /tmp/charts/chart.png',
      '(create_chart, 12ms)',
    ]);
    expect(session.getStats()).toMatchObject({ questions: 1, succeeded: 1, chartsSaved: 1 });
  });

  it('should count tool errors and request failures', async () => {
    ask
      .mockResolvedValueOnce(answer({ text: 'NotFoundError: gone', isError: true }, 'get_sample_data'))
      .mockRejectedValueOnce(new Error('connection closed'));

    await session.handleInput('sample of orders');
    await session.handleInput('anything');

    expect(lines).toEqual([
      'Error from get_sample_data: NotFoundError: gone',
      'Request failed: connection closed',
    ]);
    expect(session.getStats()).toMatchObject({
      questions: 2,
      succeeded: 0,
      failed: 2,
      toolUsage: { get_sample_data: 1 },
    });
  });

  it('should count a question as failed when its chart cannot be saved', async () => {
    ask.mockResolvedValue(answer({ charts: [{ data: 'aGk=', mimeType: 'image/png' }] }));
    save.mockRejectedValue(new Error('EACCES: permission denied'));

    await session.handleInput('plot sessions by country');

    expect(lines).toEqual([
      'Created bar chart',
      'Request failed: EACCES: permission denied',
    ]);
    expect(session.getStats()).toMatchObject({
      questions: 1,
      succeeded: 0,
      failed: 1,
      chartsSaved: 0,
    });
  });

  it('should format session statistics', async () => {
    ask.mockResolvedValue(answer());
    await session.handleInput('chart one');
    await session.handleInput('chart two');
    lines.length = 0;

    await session.handleInput('stats');

    expect(lines).toEqual([
      [
        'Session started: 2024-01-01T00:00:00.000Z',
        'Questions: 2 (2 succeeded, 0 failed)',
        'Charts saved: 0',
        'Tools used:',
        '  create_chart: 2',
      ].join('\n'),
    ]);
  });
});
