import { Resvg } from '@resvg/resvg-js';
import { parse, View } from 'vega';
import { compile, type TopLevelSpec } from 'vega-lite';
import type { ChartConfig } from '@/config/app-config.js';
import logger from '@/config/logger.js';

/**
 * Renders Vega-Lite specifications to PNG: compiled to Vega, drawn to SVG
 * headlessly, then rasterized.
 */
export class ChartRenderer {
  constructor(private readonly config: ChartConfig) {}

  get width(): number {
    return this.config.width;
  }

  get height(): number {
    return this.config.height;
  }

  async toSvg(spec: TopLevelSpec): Promise<string> {
    const { spec: vegaSpec } = compile(spec);
    const view = new View(parse(vegaSpec), { renderer: 'none' });

    try {
      return await view.toSVG();
    } finally {
      view.finalize();
    }
  }

  /**
   * @returns base64-encoded PNG bytes
   */
  async renderPng(spec: TopLevelSpec): Promise<string> {
    const startTime = Date.now();
    const svg = await this.toSvg(spec);

    const png = new Resvg(svg, {
      background: 'white',
      fitTo: { mode: 'zoom', value: this.config.scale },
      font: { loadSystemFonts: true, defaultFontFamily: 'sans-serif' },
    })
      .render()
      .asPng();

    logger.debug('Chart rendered', {
      bytes: png.length,
      scale: this.config.scale,
      elapsed_ms: Date.now() - startTime,
    });

    return png.toString('base64');
  }
}
