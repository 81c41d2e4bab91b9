import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ChartStore, slugify } from './chart-store.js';

describe('slugify', () => {
  it('should keep lowercase words joined by dashes', () => {
    expect(slugify('Top 5 Countries: Sessions!')).toBe('top-5-countries-sessions');
    expect(slugify('***')).toBe('chart');
  });
});

describe('ChartStore', () => {
  let directory: string;
  const fixedNow = () => new Date('2024-03-15T10:20:30Z');

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'chart-store-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should name files by time, label and sequence', () => {
    const store = new ChartStore(directory, fixedNow);

    expect(store.fileNameFor({ data: '', mimeType: 'image/png' }, 'create_chart')).toBe(
      '20240315-102030-create-chart-1.png'
    );
  });

  it('should decode and write the image bytes', async () => {
    const store = new ChartStore(path.join(directory, 'nested'), fixedNow);

    const first = await store.save({ data: 'aGVsbG8=', mimeType: 'image/png' }, 'funnel');
    const second = await store.save({ data: 'aGVsbG8=', mimeType: 'image/svg+xml' }, 'funnel');

    expect(path.basename(first)).toBe('20240315-102030-funnel-1.png');
    expect(path.basename(second)).toBe('20240315-102030-funnel-2.svg');
    expect(await readFile(first, 'utf8')).toBe('hello');
    expect(store.savedCount).toBe(2);
  });
});
