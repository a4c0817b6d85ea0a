import type { TopLevelSpec } from "vega-lite";
import { parseDay } from "../report/dates.js";
import { FormatError } from "../report/errors.js";

export interface ChartPoint {
  readonly date: string;
  /** UTC midnight of `date` in epoch milliseconds */
  readonly time: number;
  readonly usage: number;
  readonly objects: number;
}

export interface ChartInput {
  readonly bucketName: string;
  readonly points: ChartPoint[];
  readonly windowStart: string;
  readonly windowEnd: string;
  readonly width: number;
  readonly panelHeight: number;
}

export const USAGE_COLOR = "#1f77b4";
export const OBJECTS_COLOR = "#d62728";

export function toChartPoints(
  dates: string[],
  usages: number[],
  counts: number[],
): ChartPoint[] {
  if (dates.length !== usages.length || dates.length !== counts.length) {
    throw new FormatError(
      `Series length mismatch: ${dates.length} dates, ${usages.length} usages, ${counts.length} counts`,
    );
  }
  return dates.map((date, i) => ({
    date,
    time: parseDay(date),
    usage: usages[i] ?? 0,
    objects: counts[i] ?? 0,
  }));
}

/**
 * Two stacked line panels over the same daily UTC axis: usage on top,
 * titled with the bucket, object count below. Points dated before
 * `windowStart` stay in the data but are clipped out of the plot.
 */
export function buildChartSpec(input: ChartInput): TopLevelSpec {
  const start = parseDay(input.windowStart);
  const end = parseDay(input.windowEnd);

  return {
    $schema: "https://vega.github.io/schema/vega-lite/v5.json",
    background: "white",
    padding: 10,
    data: { values: input.points.map((p) => ({ ...p })) },
    vconcat: [
      {
        title: input.bucketName,
        width: input.width,
        height: input.panelHeight,
        mark: { type: "line", point: true, clip: true, color: USAGE_COLOR },
        encoding: {
          x: {
            field: "time",
            type: "temporal",
            title: null,
            scale: { type: "utc", domain: [start, end] },
            axis: {
              format: "%Y-%m-%d",
              tickCount: { interval: "day", step: 1 },
              labelAngle: -45,
              grid: true,
            },
          },
          y: { field: "usage", type: "quantitative", title: "Usage (GB)" },
        },
      },
      {
        width: input.width,
        height: input.panelHeight,
        mark: { type: "line", point: true, clip: true, color: OBJECTS_COLOR },
        encoding: {
          x: {
            field: "time",
            type: "temporal",
            title: "Date",
            scale: { type: "utc", domain: [start, end] },
            axis: {
              format: "%Y-%m-%d",
              tickCount: { interval: "day", step: 1 },
              labelAngle: -45,
              grid: true,
            },
          },
          y: { field: "objects", type: "quantitative", title: "Objects" },
        },
      },
    ],
  };
}
