export * from "./errors";
export * from "./precision";
export * from "./loader";
export * from "./summary";
export type { AccuracySeries, AccuracySummary, AccuracyTriple } from "./types";
