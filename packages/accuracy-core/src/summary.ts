import { PRECISION_LABEL, THEORETICAL_REFERENCE, type PrecisionClass } from "./precision";
import type { AccuracySeries, AccuracySummary } from "./types";

export function summarizeSeries(precision: PrecisionClass, series: AccuracySeries): AccuracySummary {
  if (series.length === 0) throw new Error(`Empty ${precision} series`);

  const finalBound = series[series.length - 1];
  const theoreticalValue = THEORETICAL_REFERENCE[precision];
  return {
    precision,
    steps: series.length,
    finalBound,
    theoreticalValue,
    ratio: finalBound / theoreticalValue,
  };
}

/** One-line console report, e.g. "Single precision accuracy upper bound: 1.2e-7, compared with ..." */
export function formatSummary(s: AccuracySummary): string {
  return (
    `${PRECISION_LABEL[s.precision]} accuracy upper bound: ${s.finalBound.toPrecision(6)}, ` +
    `compared with a theoretical value of ${s.theoreticalValue.toPrecision(6)}.`
  );
}
