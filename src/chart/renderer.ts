import { writeFile } from "node:fs/promises";
import sharp from "sharp";
import { parse, View } from "vega";
import { compile, type TopLevelSpec } from "vega-lite";
import type { Logger } from "../logging/logger.js";
import { buildChartSpec, toChartPoints, type ChartPoint } from "./spec.js";

export interface ChartRendererOptions {
  readonly width?: number;
  readonly panelHeight?: number;
}

export interface RenderedChart {
  readonly bucketName: string;
  readonly path: string;
  readonly points: ChartPoint[];
}

const DEFAULT_WIDTH = 800;
const DEFAULT_PANEL_HEIGHT = 240;

/** Renders a bucket's usage and object-count history to a PNG file. */
export class ChartRenderer {
  private readonly width: number;
  private readonly panelHeight: number;
  private readonly logger: Logger;

  constructor(logger: Logger, options: ChartRendererOptions = {}) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.panelHeight = options.panelHeight ?? DEFAULT_PANEL_HEIGHT;
    this.logger = logger.child({ component: "chart" });
  }

  async render(
    bucketName: string,
    dates: string[],
    usages: number[],
    counts: number[],
    windowStart: string,
    windowEnd: string,
    outputPath: string,
  ): Promise<RenderedChart> {
    const points = toChartPoints(dates, usages, counts);
    const spec = buildChartSpec({
      bucketName,
      points,
      windowStart,
      windowEnd,
      width: this.width,
      panelHeight: this.panelHeight,
    });

    const png = await rasterize(spec);
    await writeFile(outputPath, png);
    this.logger.debug({ bucket: bucketName, path: outputPath, points: points.length }, "Rendered chart");

    return { bucketName, path: outputPath, points };
  }
}

/** Compiles a Vega-Lite spec and renders it headlessly to an SVG string. */
export async function renderChartSvg(spec: TopLevelSpec): Promise<string> {
  const view = new View(parse(compile(spec).spec), { renderer: "none" });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

async function rasterize(spec: TopLevelSpec): Promise<Buffer> {
  const svg = await renderChartSvg(spec);
  return sharp(Buffer.from(svg)).png().toBuffer();
}
