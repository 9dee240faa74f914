import { z } from "zod";

// SVG `text-rendering` values; geometricPrecision keeps glyph outlines exact when rasterised.
export const TextRenderingSchema = z.enum(["auto", "optimizeSpeed", "optimizeLegibility", "geometricPrecision"]);

export const TypographySchema = z.object({
  textRendering: TextRenderingSchema.default("geometricPrecision"),
  fontFamily: z.string().min(1).default("'CMU Sans Serif', 'Latin Modern Sans', 'DejaVu Sans', sans-serif"),
  axisTitleFontSize: z.number().positive().default(16),
  tickLabelFontSize: z.number().positive().default(10),
});

export const RenderOptionsSchema = z
  .object({
    typography: TypographySchema.default({}),
    width: z.number().int().positive().default(600),
    height: z.number().int().positive().default(600),
    grid: z.boolean().default(true),
    background: z.string().default("white"),
    empiricalColor: z.string().default("blue"),
    referenceColor: z.string().default("red"),
    // pixels per SVG unit in PNG output
    scale: z.number().positive().max(8).default(1),
  })
  .refine(o => o.typography.axisTitleFontSize > o.typography.tickLabelFontSize, {
    message: "axis title font must be larger than the tick label font",
    path: ["typography", "axisTitleFontSize"],
  })
  .refine(o => o.empiricalColor !== o.referenceColor, {
    message: "empirical and reference curves need different colours",
    path: ["referenceColor"],
  });

export type Typography = z.infer<typeof TypographySchema>;
export type RenderOptions = z.infer<typeof RenderOptionsSchema>;
export type RenderOptionsInput = z.input<typeof RenderOptionsSchema>;

export function resolveRenderOptions(input: RenderOptionsInput = {}): RenderOptions {
  return RenderOptionsSchema.parse(input);
}
