#!/usr/bin/env node
import readline from 'node:readline/promises';
import { Command } from 'commander';
import { env } from '@/config/environment.js';
import logger from '@/config/logger.js';
import { AnalyticsClient } from './analytics-client.js';
import { ChartStore } from './chart-store.js';
import { ChatSession } from './chat-session.js';
import { CLIENT_VERSION, createClientConfig } from './config.js';

interface ChatOptions {
  query?: string;
  chartDir?: string;
}

const write = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

async function runChat(options: ChatOptions): Promise<void> {
  const base = createClientConfig(env);
  const config = options.chartDir ? { ...base, chartDir: options.chartDir } : base;

  const client = new AnalyticsClient(config);
  await client.connect();

  const session = new ChatSession(client, new ChartStore(config.chartDir), write);

  try {
    if (options.query) {
      await session.handleInput(options.query);
      return;
    }

    write('📊 Clickstream analytics chat. Type "help" for commands.');
    const prompt = readline.createInterface({ input: process.stdin, output: process.stdout });
    prompt.setPrompt('> ');
    prompt.prompt();

    try {
      // Ends on EOF as well as on `exit`
      for await (const line of prompt) {
        if (!(await session.handleInput(line))) break;
        prompt.prompt();
      }
    } finally {
      prompt.close();
    }
  } finally {
    await client.disconnect();
  }
}

const program = new Command()
  .name('clickstream-analytics-chat')
  .description('Ask questions about the clickstream dataset')
  .version(CLIENT_VERSION)
  .option('-q, --query <text>', 'answer one question and exit')
  .option('--chart-dir <path>', 'directory for saved charts')
  .action(async (options: ChatOptions) => {
    await runChat(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Chat client failed:', error);
  process.exit(1);
});
