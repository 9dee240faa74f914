import { z } from "zod";
import { RenderOptionsSchema } from "plot-render";

export const IoSchema = z.object({
  input: z.string().min(1).default("output.txt"),
  outputDir: z.string().min(1).default("."),
});

export const DisplaySchema = z.object({
  enabled: z.boolean().default(true),
  // argv prefix; the image path is appended
  command: z.array(z.string()).min(1).optional(),
});

export const AppConfigSchema = z.object({
  io: IoSchema.default({}),
  render: RenderOptionsSchema.default({}),
  display: DisplaySchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
