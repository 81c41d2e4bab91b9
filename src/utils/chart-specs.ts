/**
 * Vega-Lite specifications for each chart kind. Builders take already
 * aggregated points; rendering happens in ChartRenderer.
 */

import type { TopLevelSpec } from 'vega-lite';
import type { ChartType } from '@/types/visualization.js';

// Tableau 10
export const CHART_PALETTE = [
  '#4e79a7',
  '#f28e2c',
  '#e15759',
  '#76b7b2',
  '#59a14f',
  '#edc949',
  '#af7aa1',
  '#ff9da7',
  '#9c755f',
  '#bab0ab',
];

export interface ChartFrame {
  title: string;
  width: number;
  height: number;
}

export interface CategoryPoint {
  label: string;
  value: number;
}

export interface ScatterPoint {
  x: number;
  value: number;
}

export interface HeatmapCell {
  row: string;
  col: string;
  value: number;
}

export interface SeriesPoint {
  bucket: string;
  series: string;
  value: number;
}

function frame({ title, width, height }: ChartFrame) {
  return {
    title,
    width,
    height,
    background: 'white',
    config: {
      range: { category: CHART_PALETTE },
      axis: { labelLimit: 160 },
    },
  };
}

export function categorySpec(
  chartType: Exclude<ChartType, 'scatter'>,
  points: CategoryPoint[],
  axes: { x: string; y: string },
  chartFrame: ChartFrame
): TopLevelSpec {
  const values = points.map((point) => ({ label: point.label, value: point.value }));

  if (chartType === 'pie') {
    return {
      ...frame(chartFrame),
      data: { values },
      mark: { type: 'arc' },
      encoding: {
        theta: { field: 'value', type: 'quantitative', title: axes.y },
        color: { field: 'label', type: 'nominal', sort: null, title: axes.x },
      },
    };
  }

  if (chartType === 'horizontal_bar') {
    return {
      ...frame(chartFrame),
      data: { values },
      mark: { type: 'bar', color: CHART_PALETTE[0] },
      encoding: {
        y: { field: 'label', type: 'nominal', sort: null, title: axes.x },
        x: { field: 'value', type: 'quantitative', title: axes.y },
      },
    };
  }

  if (chartType === 'line') {
    return {
      ...frame(chartFrame),
      data: { values },
      mark: { type: 'line', point: true, color: CHART_PALETTE[0] },
      encoding: {
        x: { field: 'label', type: 'ordinal', sort: null, title: axes.x },
        y: { field: 'value', type: 'quantitative', title: axes.y },
      },
    };
  }

  return {
    ...frame(chartFrame),
    data: { values },
    mark: { type: 'bar', color: CHART_PALETTE[0] },
    encoding: {
      x: { field: 'label', type: 'nominal', sort: null, title: axes.x },
      y: { field: 'value', type: 'quantitative', title: axes.y },
    },
  };
}

export function scatterSpec(
  points: ScatterPoint[],
  axes: { x: string; y: string },
  chartFrame: ChartFrame
): TopLevelSpec {
  return {
    ...frame(chartFrame),
    data: { values: points.map((point) => ({ x: point.x, value: point.value })) },
    mark: { type: 'point', filled: true, color: CHART_PALETTE[0] },
    encoding: {
      x: { field: 'x', type: 'quantitative', title: axes.x },
      y: { field: 'value', type: 'quantitative', title: axes.y },
    },
  };
}

export function heatmapSpec(
  cells: HeatmapCell[],
  keys: { rows: string[]; cols: string[] },
  axes: { row: string; col: string; value: string },
  chartFrame: ChartFrame
): TopLevelSpec {
  return {
    ...frame(chartFrame),
    data: { values: cells.map((cell) => ({ row: cell.row, col: cell.col, value: cell.value })) },
    mark: { type: 'rect' },
    encoding: {
      x: { field: 'col', type: 'ordinal', sort: keys.cols, title: axes.col },
      y: { field: 'row', type: 'ordinal', sort: keys.rows, title: axes.row },
      color: { field: 'value', type: 'quantitative', title: axes.value },
    },
  };
}

export function funnelSpec(points: CategoryPoint[], chartFrame: ChartFrame): TopLevelSpec {
  return {
    ...frame(chartFrame),
    data: { values: points.map((point) => ({ label: point.label, value: point.value })) },
    mark: { type: 'bar', color: CHART_PALETTE[0] },
    encoding: {
      y: { field: 'label', type: 'nominal', sort: points.map((point) => point.label), title: null },
      x: { field: 'value', type: 'quantitative', title: 'Count' },
    },
  };
}

export function timeSeriesSpec(
  points: SeriesPoint[],
  axes: { time: string; value: string; series?: string },
  chartFrame: ChartFrame
): TopLevelSpec {
  const values = points.map((point) => ({
    bucket: point.bucket,
    series: point.series,
    value: point.value,
  }));

  if (axes.series) {
    return {
      ...frame(chartFrame),
      data: { values },
      mark: { type: 'line', point: true },
      encoding: {
        x: { field: 'bucket', type: 'ordinal', sort: 'ascending', title: axes.time },
        y: { field: 'value', type: 'quantitative', title: axes.value },
        color: { field: 'series', type: 'nominal', title: axes.series },
      },
    };
  }

  return {
    ...frame(chartFrame),
    data: { values },
    mark: { type: 'line', point: true, color: CHART_PALETTE[0] },
    encoding: {
      x: { field: 'bucket', type: 'ordinal', sort: 'ascending', title: axes.time },
      y: { field: 'value', type: 'quantitative', title: axes.value },
    },
  };
}
