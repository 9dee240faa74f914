import type { PrecisionClass } from "./precision";

/** Observed accuracy upper bounds in step order; element 0 is step 1. */
export type AccuracySeries = readonly number[];

export type AccuracyTriple = Readonly<Record<PrecisionClass, AccuracySeries>>;

export interface AccuracySummary {
  precision: PrecisionClass;
  steps: number;
  finalBound: number;
  theoreticalValue: number;
  ratio: number; // finalBound / theoreticalValue
}
