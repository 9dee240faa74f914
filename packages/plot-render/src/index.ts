export { PlotRenderer, applyTextRendering, toPng, toSvg } from "./render";
export type { PlotArtifact, RenderMeta } from "./render";
export { X_AXIS_TITLE, Y_AXIS_TITLE, buildAccuracyChart, buildVegaLiteSpec } from "./chart";
export type { AccuracyChart, ChartPoint } from "./chart";
export { RenderOptionsSchema, TypographySchema, resolveRenderOptions } from "./options";
export type { RenderOptions, RenderOptionsInput, Typography } from "./options";
