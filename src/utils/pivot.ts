import type { Row } from '@/types/tools.js';
import { Accumulator, type GroupAggregation } from './aggregation.js';
import { cellKey, requireNumber } from './tabular.js';

export type PivotAggregation = Extract<GroupAggregation, 'sum' | 'avg' | 'count'>;

export interface PivotGrid {
  rowKeys: string[];
  colKeys: string[];
  /** values[r][c] for rowKeys[r] and colKeys[c] */
  values: number[][];
}

export interface PivotFields {
  rowField: string;
  colField: string;
  valueField: string;
}

/**
 * Pivots rows into a dense grid. Keys keep first-seen order and every
 * combination without data is 0.
 */
export function pivotRows(
  rows: Row[],
  { rowField, colField, valueField }: PivotFields,
  aggregation: PivotAggregation
): PivotGrid {
  const rowKeys: string[] = [];
  const colKeys: string[] = [];
  const cells = new Map<string, Accumulator>();

  for (const row of rows) {
    const rowKey = cellKey(row[rowField]);
    const colKey = cellKey(row[colField]);
    if (!rowKeys.includes(rowKey)) rowKeys.push(rowKey);
    if (!colKeys.includes(colKey)) colKeys.push(colKey);

    const cellId = JSON.stringify([rowKey, colKey]);
    const accumulator = cells.get(cellId) ?? new Accumulator();
    accumulator.add(aggregation === 'count' ? null : requireNumber(row, valueField));
    cells.set(cellId, accumulator);
  }

  const values = rowKeys.map((rowKey) =>
    colKeys.map((colKey) => cells.get(JSON.stringify([rowKey, colKey]))?.result(aggregation) ?? 0)
  );

  return { rowKeys, colKeys, values };
}
