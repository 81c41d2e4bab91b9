import type { CellValue } from '@/types/tools.js';

const MAX_COLUMN_WIDTH = 30;

export function formatCell(value: CellValue): string {
  if (value === null) return 'NULL';
  return String(value);
}

function fit(text: string, width: number): string {
  const clipped = text.length > width ? `${text.slice(0, width - 3)}...` : text;
  return clipped.padEnd(width);
}

/**
 * Renders rows as an aligned plain-text table.
 * Only the first `maxRows` rows are printed; the rest are counted.
 */
export function formatTable(columns: string[], rows: CellValue[][], maxRows = 20): string {
  if (columns.length === 0) {
    return '(no columns)';
  }

  const shown = rows.slice(0, maxRows);
  const widths = columns.map((column, index) =>
    Math.min(
      MAX_COLUMN_WIDTH,
      Math.max(column.length, ...shown.map((row) => formatCell(row[index] ?? null).length))
    )
  );

  const renderLine = (cells: string[]) =>
    cells
      .map((cell, index) => fit(cell, widths[index] ?? cell.length))
      .join(' | ')
      .trimEnd();

  const header = renderLine(columns);
  const lines = [
    header,
    '-'.repeat(header.length),
    ...shown.map((row) => renderLine(columns.map((_, index) => formatCell(row[index] ?? null)))),
  ];

  if (rows.length > maxRows) {
    lines.push(`... (${rows.length - maxRows} more rows)`);
  }

  return lines.join('\n');
}

/**
 * Title line followed by an underline of the same length
 */
export function formatHeading(title: string): string {
  return `${title}\n${'='.repeat(title.length)}`;
}

/**
 * `session_length` becomes `Session Length`
 */
export function toTitle(value: string): string {
  return value
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
