import type { Row } from '@/types/tools.js';
import { cellKey, requireNumber } from './tabular.js';

export const AGGREGATIONS = ['none', 'sum', 'avg', 'count', 'min', 'max'] as const;
export type Aggregation = (typeof AGGREGATIONS)[number];
export type GroupAggregation = Exclude<Aggregation, 'none'>;

/**
 * Running totals for one group. Null values count as rows but are skipped
 * by the numeric aggregations.
 */
export class Accumulator {
  private rows = 0;
  private numeric = 0;
  private sum = 0;
  private min = Number.POSITIVE_INFINITY;
  private max = Number.NEGATIVE_INFINITY;

  add(value: number | null): void {
    this.rows += 1;
    if (value === null) return;

    this.numeric += 1;
    this.sum += value;
    this.min = Math.min(this.min, value);
    this.max = Math.max(this.max, value);
  }

  result(aggregation: GroupAggregation): number {
    switch (aggregation) {
      case 'count':
        return this.rows;
      case 'sum':
        return this.sum;
      case 'avg':
        return this.numeric > 0 ? this.sum / this.numeric : 0;
      case 'min':
        return this.numeric > 0 ? this.min : 0;
      case 'max':
        return this.numeric > 0 ? this.max : 0;
    }
  }
}

export interface KeyedValue {
  key: string;
  value: number;
}

/**
 * Groups rows by `keyField` in first-seen order and reduces `valueField`.
 * With `none` every row becomes its own point.
 */
export function groupAndAggregate(
  rows: Row[],
  keyField: string,
  valueField: string,
  aggregation: Aggregation
): KeyedValue[] {
  if (aggregation === 'none') {
    return rows.map((row) => ({
      key: cellKey(row[keyField]),
      value: requireNumber(row, valueField) ?? 0,
    }));
  }

  const groups = new Map<string, Accumulator>();
  for (const row of rows) {
    const key = cellKey(row[keyField]);
    const accumulator = groups.get(key) ?? new Accumulator();
    accumulator.add(aggregation === 'count' ? null : requireNumber(row, valueField));
    groups.set(key, accumulator);
  }

  return [...groups.entries()].map(([key, accumulator]) => ({
    key,
    value: accumulator.result(aggregation),
  }));
}
