import path from "path";
import {
  PRECISION_CLASSES,
  THEORETICAL_REFERENCE,
  formatSummary,
  outputFileName,
  summarizeSeries,
  type AccuracySummary,
  type AccuracyTriple,
  type PrecisionClass,
} from "accuracy-core";
import type { PlotArtifact, PlotRenderer } from "plot-render";

export type PipelineState =
  | { kind: "Unloaded" }
  | { kind: "Loaded" }
  | { kind: "Rendered"; index: number; precision: PrecisionClass }
  | { kind: "Persisted"; index: number; precision: PrecisionClass; target: string }
  | { kind: "Displayed" }
  | { kind: "Aborted"; error: Error };

export interface ArtifactSink {
  persist(artifact: PlotArtifact, target: string): Promise<void>;
  /** Blocks until every viewer has been dismissed. */
  display(targets: readonly string[]): Promise<void>;
}

export interface PipelineDeps {
  load: () => AccuracyTriple;
  renderer: Pick<PlotRenderer, "render">;
  sink: ArtifactSink;
  outputDir: string;
  display: boolean;
}

export interface PipelineResult {
  series: AccuracyTriple;
  artifacts: PlotArtifact[];
  targets: string[];
  summaries: AccuracySummary[];
}

/**
 * Load once, then render and persist one chart per precision class in fixed
 * order, then hand every persisted file to a single display step.
 *
 * The first failure moves the pipeline to `Aborted` and is rethrown; files
 * already written stay on disk.
 */
export class AccuracyPlotPipeline {
  private current: PipelineState = { kind: "Unloaded" };
  private readonly trail: PipelineState[] = [this.current];

  constructor(private readonly deps: PipelineDeps) {}

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly PipelineState[] {
    return this.trail;
  }

  private transition(next: PipelineState) {
    this.current = next;
    this.trail.push(next);
  }

  async run(): Promise<PipelineResult> {
    if (this.current.kind !== "Unloaded") {
      throw new Error(`pipeline cannot run from state ${this.current.kind}`);
    }

    try {
      return await this.execute();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.transition({ kind: "Aborted", error });
      throw error;
    }
  }

  private async execute(): Promise<PipelineResult> {
    const { load, renderer, sink, outputDir } = this.deps;

    const series = load();
    this.transition({ kind: "Loaded" });
    console.log(
      `[accuracy] loaded ${PRECISION_CLASSES.map(p => `${p}=${series[p].length}`).join(" ")} steps`
    );

    const artifacts: PlotArtifact[] = [];
    const targets: string[] = [];
    const summaries: AccuracySummary[] = [];

    for (const [i, precision] of PRECISION_CLASSES.entries()) {
      const index = i + 1;
      const target = path.join(outputDir, outputFileName(precision));

      const artifact = renderer.render(series[precision], THEORETICAL_REFERENCE[precision], {
        fileName: outputFileName(precision),
      });
      this.transition({ kind: "Rendered", index, precision });

      await sink.persist(artifact, target);
      this.transition({ kind: "Persisted", index, precision, target });
      console.log(`[accuracy] wrote ${target}`);

      const summary = summarizeSeries(precision, series[precision]);
      console.log(`[accuracy] ${formatSummary(summary)}`);

      artifacts.push(artifact);
      targets.push(target);
      summaries.push(summary);
    }

    if (this.deps.display) {
      await sink.display(targets);
      this.transition({ kind: "Displayed" });
    } else {
      console.log("[accuracy] display disabled; skipping viewer");
    }

    return { series, artifacts, targets, summaries };
  }
}
