import type { TopLevelSpec } from "vega-lite";
import { RenderError, type AccuracySeries } from "accuracy-core";
import type { RenderOptions } from "./options";

export const X_AXIS_TITLE = "Algorithm Step";
export const Y_AXIS_TITLE = "Upper Bound on Machine Accuracy";

export interface ChartPoint {
  x: number;
  y: number;
}

export interface AccuracyChart {
  steps: readonly number[];
  empirical: readonly ChartPoint[];
  reference: readonly ChartPoint[];
  theoreticalValue: number;
}

/** Pair each observed bound with its 1-based step and lay the reference constant over the same steps. */
export function buildAccuracyChart(series: AccuracySeries, theoreticalValue: number): AccuracyChart {
  if (series.length === 0) {
    throw new RenderError("accuracy chart", "series is empty");
  }
  if (!series.every(Number.isFinite)) {
    throw new RenderError("accuracy chart", "series contains non-finite values");
  }
  if (!(Number.isFinite(theoreticalValue) && theoreticalValue > 0)) {
    throw new RenderError("accuracy chart", `theoretical value ${theoreticalValue} is not a positive number`);
  }

  const steps = series.map((_, i) => i + 1);
  return Object.freeze({
    steps: Object.freeze(steps),
    empirical: Object.freeze(series.map((y, i) => ({ x: steps[i], y }))),
    reference: Object.freeze(steps.map(x => ({ x, y: theoreticalValue }))),
    theoreticalValue,
  });
}

export function buildVegaLiteSpec(chart: AccuracyChart, options: RenderOptions): TopLevelSpec {
  const { typography } = options;
  const n = chart.steps.length;
  // a lone step still needs a visible x-range around it
  const xDomain = n === 1 ? [0, 2] : [1, n];

  const values = chart.steps.map((step, i) => ({
    step,
    empirical: chart.empirical[i].y,
    reference: chart.reference[i].y,
  }));

  return {
    $schema: "https://vega.github.io/schema/vega-lite/v5.json",
    width: options.width,
    height: options.height,
    background: options.background,
    data: { values },
    encoding: {
      x: {
        field: "step",
        type: "quantitative",
        title: X_AXIS_TITLE,
        scale: { domain: xDomain, nice: false, zero: false },
        axis: { tickMinStep: 1, format: "d" },
      },
    },
    layer: [
      {
        mark: {
          type: "line",
          color: options.empiricalColor,
          strokeWidth: 1.5,
          point: { shape: "cross", angle: 45, size: 80, filled: true, color: options.empiricalColor },
        },
        encoding: {
          y: {
            field: "empirical",
            type: "quantitative",
            title: Y_AXIS_TITLE,
            scale: { zero: false },
            axis: { format: ".1e" },
          },
        },
      },
      {
        mark: {
          type: "line",
          color: options.referenceColor,
          strokeWidth: 1.5,
          strokeDash: [6, 4],
          point: n === 1 ? { shape: "circle", size: 40, filled: true, color: options.referenceColor } : false,
        },
        encoding: {
          y: {
            field: "reference",
            type: "quantitative",
            title: Y_AXIS_TITLE,
            scale: { zero: false },
            axis: { format: ".1e" },
          },
        },
      },
    ],
    config: {
      font: typography.fontFamily,
      axis: {
        grid: options.grid,
        titleFontSize: typography.axisTitleFontSize,
        titleFontWeight: "normal",
        labelFontSize: typography.tickLabelFontSize,
      },
      view: { stroke: "black" },
    },
  };
}
