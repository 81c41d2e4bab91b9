import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import moment from 'moment-timezone';
import type { ChartImage } from './response-formatter.js';

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/svg+xml': 'svg',
};

export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.substring(0, 40) || 'chart';
}

/**
 * Writes chart images returned by the server to a local directory.
 */
export class ChartStore {
  private saved = 0;

  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  get savedCount(): number {
    return this.saved;
  }

  fileNameFor(chart: ChartImage, label: string): string {
    const stamp = moment.utc(this.now()).format('YYYYMMDD-HHmmss');
    const extension = EXTENSIONS[chart.mimeType] ?? 'bin';
    return `${stamp}-${slugify(label)}-${this.saved + 1}.${extension}`;
  }

  async save(chart: ChartImage, label: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });

    const filePath = path.join(this.directory, this.fileNameFor(chart, label));
    await writeFile(filePath, Buffer.from(chart.data, 'base64'));
    this.saved += 1;

    return filePath;
  }
}
