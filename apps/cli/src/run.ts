import path from "path";
import { loadAccuracyFile } from "accuracy-core";
import { PlotRenderer } from "plot-render";
import type { AppConfig } from "./config/schema";
import { FileArtifactSink } from "./pipeline/fileSink";
import { AccuracyPlotPipeline, type ArtifactSink, type PipelineResult } from "./pipeline/orchestrator";

export function createPipeline(cfg: AppConfig, sink?: ArtifactSink): AccuracyPlotPipeline {
  const input = path.resolve(cfg.io.input);
  return new AccuracyPlotPipeline({
    load: () => loadAccuracyFile(input),
    renderer: new PlotRenderer(cfg.render),
    sink: sink ?? new FileArtifactSink(cfg.display.command),
    outputDir: path.resolve(cfg.io.outputDir),
    display: cfg.display.enabled,
  });
}

export function run(cfg: AppConfig, sink?: ArtifactSink): Promise<PipelineResult> {
  return createPipeline(cfg, sink).run();
}
