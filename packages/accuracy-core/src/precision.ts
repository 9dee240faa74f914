export const PRECISION_CLASSES = ["single", "double", "extended"] as const;

export type PrecisionClass = typeof PRECISION_CLASSES[number];

// Unit roundoff per class. Single and double follow IEEE 754-2008 binary32 and
// binary64; extended is the x87 80-bit long double (64-bit significand).
export const THEORETICAL_REFERENCE: Readonly<Record<PrecisionClass, number>> = Object.freeze({
  single: 2 ** -24,
  double: 2 ** -53,
  extended: 2 ** -64,
});

export const PRECISION_LABEL: Readonly<Record<PrecisionClass, string>> = Object.freeze({
  single: "Single precision",
  double: "Double precision",
  extended: "Extended precision",
});

export function outputFileName(precision: PrecisionClass): string {
  return `${precision}_accuracy.png`;
}
