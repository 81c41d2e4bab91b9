/**
 * Tabular data helpers
 *
 * Rows reach the chart tools either from a read-only query or as inline JSON.
 * Both end up as `Row[]` and are inspected with the helpers below.
 */

import { z } from 'zod';
import { ValidationError } from '@/middleware/error.js';
import type { CellValue, Row, TabularData } from '@/types/tools.js';
import { parseOrThrow } from './validation-helpers.js';

const inlineCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const inlineDataSchema = z.array(z.record(inlineCellSchema), {
  invalid_type_error: 'data must be a JSON array of flat row objects',
});

/**
 * Parses the `data` argument: JSON text of an array of flat objects.
 * Booleans are stored as 1 and 0, matching SQLite.
 */
export function parseInlineData(json: string): Row[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(
      `data is not valid JSON: ${error instanceof Error ? error.message : 'parse error'}`
    );
  }

  const rows = parseOrThrow(inlineDataSchema, parsed, 'data');
  return rows.map((row) =>
    Object.fromEntries(
      Object.entries(row).map(([column, value]) => [
        column,
        typeof value === 'boolean' ? (value ? 1 : 0) : value,
      ])
    )
  );
}

/**
 * Column names across all rows in first-seen order
 */
export function columnsOf(rows: Row[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      columns.add(column);
    }
  }
  return [...columns];
}

export function toTabular(rows: Row[]): TabularData {
  const columns = columnsOf(rows);
  return {
    columns,
    rows: rows.map((row) => columns.map((column) => row[column] ?? null)),
  };
}

/**
 * Reads a cell as a number. Numeric strings count; blank strings do not.
 */
export function toNumber(value: CellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * True when every non-null value of the field is numeric and at least one exists
 */
export function isNumericField(rows: Row[], field: string): boolean {
  let seen = false;
  for (const row of rows) {
    const value = row[field];
    if (value === null || value === undefined) continue;
    if (toNumber(value) === null) return false;
    seen = true;
  }
  return seen;
}

/**
 * Label used when a cell becomes a category, row key or column key
 */
export function cellKey(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '(null)';
  return String(value);
}

/**
 * Reads a numeric cell, rejecting anything that is present but not a number
 */
export function requireNumber(row: Row, field: string): number | null {
  const value = row[field];
  if (value === null || value === undefined) return null;

  const parsed = toNumber(value);
  if (parsed === null) {
    throw new ValidationError(`Field '${field}' must be numeric, got '${String(value)}'`);
  }
  return parsed;
}

/**
 * @throws {ValidationError} Naming the first field absent from every row
 */
export function assertFieldsExist(rows: Row[], fields: string[]): void {
  const columns = columnsOf(rows);
  const missing = fields.find((field) => !columns.includes(field));
  if (missing !== undefined) {
    throw new ValidationError(
      `Field '${missing}' not found in data. Available fields: ${columns.join(', ') || 'none'}`
    );
  }
}

/**
 * First field that is not numeric, used to pick a default category axis
 */
export function firstTextField(rows: Row[], exclude: string[] = []): string | undefined {
  return columnsOf(rows).find((field) => !exclude.includes(field) && !isNumericField(rows, field));
}

export function firstNumericField(rows: Row[], exclude: string[] = []): string | undefined {
  return columnsOf(rows).find((field) => !exclude.includes(field) && isNumericField(rows, field));
}
