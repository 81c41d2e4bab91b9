import type { ChartConfig, DatabaseConfig } from '@/config/app-config.js';
import type { SqliteConnection } from '@/database/sqlite/connection.js';
import { ValidationError } from '@/middleware/error.js';
import {
  createVisualizationToolSchemas,
  type ChartData,
  type CreateChartArgs,
  type CreateFunnelChartArgs,
  type CreateHeatmapArgs,
  type CreateTimeSeriesArgs,
  type DataSourceArgs,
} from '@/types/visualization.js';
import {
  imageBlock,
  textBlock,
  type RegisteredTool,
  type Row,
  type ToolResult,
} from '@/types/tools.js';
import { Accumulator, groupAndAggregate } from '@/utils/aggregation.js';
import {
  categorySpec,
  funnelSpec,
  heatmapSpec,
  scatterSpec,
  timeSeriesSpec,
  type ChartFrame,
  type HeatmapCell,
  type ScatterPoint,
  type SeriesPoint,
} from '@/utils/chart-specs.js';
import { toTimeBucket } from '@/utils/date-helpers.js';
import { computeFunnelRates, formatRate, type FunnelStepCount } from '@/utils/funnel-helpers.js';
import { pivotRows } from '@/utils/pivot.js';
import { applyRowLimit, assertReadOnlyStatement } from '@/utils/sql-guard.js';
import {
  assertFieldsExist,
  cellKey,
  columnsOf,
  firstNumericField,
  firstTextField,
  parseInlineData,
  requireNumber,
} from '@/utils/tabular.js';
import { toTitle } from '@/utils/table-format.js';
import type { ChartRenderer } from './chart-renderer.js';
import { defineTool } from './tool-registry.js';

export class VisualizationToolsService {
  constructor(
    private readonly connection: SqliteConnection,
    private readonly renderer: ChartRenderer,
    private readonly databaseConfig: DatabaseConfig
  ) {}

  async createChart(args: CreateChartArgs): Promise<ToolResult<ChartData>> {
    const rows = await this.resolveRows(args);
    assertFieldsExist(
      rows,
      [args.x_field, args.y_field].filter((field): field is string => field !== undefined)
    );

    const isScatter = args.chart_type === 'scatter';
    const xField =
      args.x_field ??
      (isScatter ? firstNumericField(rows) : (firstTextField(rows) ?? columnsOf(rows)[0]));
    if (xField === undefined) {
      throw new ValidationError('Could not determine x_field; pass it explicitly');
    }

    const yField =
      args.y_field ??
      firstNumericField(rows, [xField]) ??
      (args.aggregation === 'count' ? xField : undefined);
    if (yField === undefined) {
      throw new ValidationError('No numeric field found for y_field; pass it explicitly');
    }

    const yLabel = args.aggregation === 'count' ? 'Count' : toTitle(yField);
    const title = args.title ?? `${yLabel} by ${toTitle(xField)}`;
    const frame = this.frame(title);
    const axes = { x: toTitle(xField), y: yLabel };

    let tableRows: Array<[string | number, number]>;
    let png: string;

    if (args.chart_type === 'scatter') {
      const points: ScatterPoint[] = [];
      for (const row of rows) {
        const x = requireNumber(row, xField);
        const value = requireNumber(row, yField);
        if (x !== null && value !== null) points.push({ x, value });
      }
      const kept = points.slice(0, args.limit);
      tableRows = kept.map((point) => [point.x, point.value]);
      png = await this.renderer.renderPng(scatterSpec(kept, axes, frame));
    } else {
      const points = groupAndAggregate(rows, xField, yField, args.aggregation)
        .slice(0, args.limit)
        .map(({ key, value }) => ({ label: key, value }));
      tableRows = points.map((point) => [point.label, point.value]);
      png = await this.renderer.renderPng(categorySpec(args.chart_type, points, axes, frame));
    }

    const summary = [
      `Created ${args.chart_type.replace('_', ' ')} chart "${title}"`,
      `Points: ${tableRows.length} (from ${rows.length} rows)`,
      `x: ${xField}, y: ${yField}, aggregation: ${args.aggregation}`,
    ];

    return {
      content: [textBlock(summary.join('\n')), imageBlock(png)],
      data: {
        chart_type: args.chart_type,
        title,
        columns: [xField, args.aggregation === 'count' ? 'count' : yField],
        rows: tableRows,
      },
    };
  }

  /**
   * Pivots rows into a dense grid; combinations without rows are 0
   */
  async createHeatmap(args: CreateHeatmapArgs): Promise<ToolResult<ChartData>> {
    const rows = await this.resolveRows(args);
    const fields = { rowField: args.row_field, colField: args.col_field, valueField: args.value_field };
    assertFieldsExist(rows, [fields.rowField, fields.colField, fields.valueField]);

    const grid = pivotRows(rows, fields, args.aggregation);
    const cells: HeatmapCell[] = grid.rowKeys.flatMap((row, rowIndex) =>
      grid.colKeys.map((col, colIndex) => ({
        row,
        col,
        value: grid.values[rowIndex]?.[colIndex] ?? 0,
      }))
    );

    const title =
      args.title ??
      `${toTitle(args.value_field)} by ${toTitle(args.row_field)} and ${toTitle(args.col_field)}`;
    const png = await this.renderer.renderPng(
      heatmapSpec(
        cells,
        { rows: grid.rowKeys, cols: grid.colKeys },
        {
          row: toTitle(args.row_field),
          col: toTitle(args.col_field),
          value: `${toTitle(args.aggregation)} of ${toTitle(args.value_field)}`,
        },
        this.frame(title)
      )
    );

    const summary = [
      `Created heatmap "${title}"`,
      `Grid: ${grid.rowKeys.length} rows x ${grid.colKeys.length} columns (${cells.length} cells)`,
      `Values: ${args.aggregation} of ${args.value_field}`,
    ];

    return {
      content: [textBlock(summary.join('\n')), imageBlock(png)],
      data: {
        chart_type: 'heatmap',
        title,
        columns: [args.row_field, args.col_field, args.value_field],
        rows: cells.map((cell) => [cell.row, cell.col, cell.value]),
      },
    };
  }

  /**
   * Bars are drawn in the given order; counts are not required to decrease
   */
  async createFunnelChart(args: CreateFunnelChartArgs): Promise<ToolResult<ChartData>> {
    const sources = [args.steps, args.data_query, args.data].filter(
      (source) => source !== undefined
    );
    if (sources.length !== 1) {
      throw new ValidationError('Provide exactly one of steps, data_query or data');
    }

    const steps = args.steps ?? this.stepsFromRows(await this.resolveRows(args), args);
    const rates = computeFunnelRates(steps);
    const title = args.title ?? 'Conversion Funnel';

    const png = await this.renderer.renderPng(
      funnelSpec(
        steps.map((step) => ({ label: step.label, value: step.count })),
        this.frame(title)
      )
    );

    const summary = [
      `Created funnel chart "${title}" with ${steps.length} steps`,
      ...rates.map(
        (step) =>
          `  ${step.label}: ${step.count} (step ${formatRate(step.step_conversion_rate)}, overall ${formatRate(step.overall_conversion_rate)}, drop-off ${step.drop_off})`
      ),
    ];

    return {
      content: [textBlock(summary.join('\n')), imageBlock(png)],
      data: {
        chart_type: 'funnel',
        title,
        columns: ['step', 'count', 'step_conversion_rate', 'overall_conversion_rate', 'drop_off'],
        rows: rates.map((step) => [
          step.label,
          step.count,
          step.step_conversion_rate,
          step.overall_conversion_rate,
          step.drop_off,
        ]),
      },
    };
  }

  /**
   * Buckets `time_field` by day or month and aggregates per series
   */
  async createTimeSeries(args: CreateTimeSeriesArgs): Promise<ToolResult<ChartData>> {
    const rows = await this.resolveRows(args);
    const groupField = args.group_field;
    assertFieldsExist(
      rows,
      [args.time_field, args.value_field, groupField].filter(
        (field): field is string => field !== undefined
      )
    );

    const buckets = new Map<string, Map<string, Accumulator>>();
    for (const row of rows) {
      const raw = row[args.time_field] ?? null;
      const bucket = toTimeBucket(raw, args.granularity);
      if (bucket === null) {
        throw new ValidationError(
          `Field '${args.time_field}' has a value that is not a date or time: '${cellKey(raw)}'`
        );
      }

      const series = groupField ? cellKey(row[groupField]) : args.value_field;
      const bySeries = buckets.get(bucket) ?? new Map<string, Accumulator>();
      const accumulator = bySeries.get(series) ?? new Accumulator();
      accumulator.add(args.aggregation === 'count' ? null : requireNumber(row, args.value_field));
      bySeries.set(series, accumulator);
      buckets.set(bucket, bySeries);
    }

    const orderedBuckets = [...buckets.keys()].sort();
    const points: SeriesPoint[] = orderedBuckets.flatMap((bucket) =>
      [...(buckets.get(bucket)?.entries() ?? [])].map(([series, accumulator]) => ({
        bucket,
        series,
        value: accumulator.result(args.aggregation),
      }))
    );
    const seriesCount = new Set(points.map((point) => point.series)).size;

    const valueLabel = `${toTitle(args.aggregation)} of ${toTitle(args.value_field)}`;
    const title = args.title ?? `${valueLabel} per ${args.granularity}`;
    const png = await this.renderer.renderPng(
      timeSeriesSpec(
        points,
        {
          time: toTitle(args.time_field),
          value: valueLabel,
          ...(groupField ? { series: toTitle(groupField) } : {}),
        },
        this.frame(title)
      )
    );

    const summary = [
      `Created time series "${title}"`,
      `Buckets: ${orderedBuckets.length} (${args.granularity}) from ${orderedBuckets[0] ?? '-'} to ${orderedBuckets[orderedBuckets.length - 1] ?? '-'}`,
      `Series: ${seriesCount}`,
    ];

    return {
      content: [textBlock(summary.join('\n')), imageBlock(png)],
      data: {
        chart_type: 'time_series',
        title,
        columns: groupField
          ? ['bucket', groupField, args.value_field]
          : ['bucket', args.value_field],
        rows: points.map((point) =>
          groupField ? [point.bucket, point.series, point.value] : [point.bucket, point.value]
        ),
      },
    };
  }

  /**
   * Loads rows from exactly one of `data_query` or `data`
   */
  async resolveRows(args: DataSourceArgs): Promise<Row[]> {
    const { data_query: dataQuery, data } = args;
    if ((dataQuery === undefined) === (data === undefined)) {
      throw new ValidationError('Provide exactly one of data_query or data');
    }

    let rows: Row[];
    if (dataQuery !== undefined) {
      const statement = assertReadOnlyStatement(dataQuery);
      rows = await this.connection.query(
        applyRowLimit(statement, this.databaseConfig.defaultQueryLimit)
      );
      rows = rows.slice(0, this.databaseConfig.maxQueryResults);
    } else {
      rows = parseInlineData(data ?? '[]');
    }

    if (rows.length === 0) {
      throw new ValidationError('The data source returned no rows to plot');
    }
    return rows;
  }

  private stepsFromRows(rows: Row[], args: CreateFunnelChartArgs): FunnelStepCount[] {
    const stageField = args.stage_field ?? firstTextField(rows);
    const valueField = args.value_field ?? firstNumericField(rows, stageField ? [stageField] : []);
    if (stageField === undefined || valueField === undefined) {
      throw new ValidationError('Could not determine stage_field and value_field; pass them explicitly');
    }
    assertFieldsExist(rows, [stageField, valueField]);

    return rows.map((row) => ({
      label: cellKey(row[stageField]),
      count: requireNumber(row, valueField) ?? 0,
    }));
  }

  private frame(title: string): ChartFrame {
    return { title, width: this.renderer.width, height: this.renderer.height };
  }
}

export function createVisualizationTools(
  service: VisualizationToolsService,
  config: ChartConfig
): RegisteredTool[] {
  const schemas = createVisualizationToolSchemas(config);

  return [
    defineTool({
      name: 'create_chart',
      title: 'Create Chart',
      description:
        'Render a bar, horizontal bar, line, pie or scatter chart from a query or inline JSON rows.',
      category: 'visualization',
      schema: schemas.create_chart,
      handler: (args) => service.createChart(args),
    }),
    defineTool({
      name: 'create_heatmap',
      title: 'Create Heatmap',
      description: 'Pivot rows into a row x column grid and render it as a heatmap.',
      category: 'visualization',
      schema: schemas.create_heatmap,
      handler: (args) => service.createHeatmap(args),
    }),
    defineTool({
      name: 'create_funnel_chart',
      title: 'Create Funnel Chart',
      description: 'Render funnel steps in order with drop-offs and conversion rates.',
      category: 'visualization',
      schema: schemas.create_funnel_chart,
      handler: (args) => service.createFunnelChart(args),
    }),
    defineTool({
      name: 'create_time_series',
      title: 'Create Time Series',
      description: 'Group rows by day or month and plot one line per series.',
      category: 'visualization',
      schema: schemas.create_time_series,
      handler: (args) => service.createTimeSeries(args),
    }),
  ];
}
