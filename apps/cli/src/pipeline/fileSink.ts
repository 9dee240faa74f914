import { promises as fs } from "fs";
import path from "path";
import { RenderError, describeError } from "accuracy-core";
import { toPng, type PlotArtifact } from "plot-render";
import type { ArtifactSink } from "./orchestrator";
import { openViewer, viewerCommand } from "./viewer";

export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly viewer: readonly string[] = viewerCommand()) {}

  async persist(artifact: PlotArtifact, target: string): Promise<void> {
    const png = await toPng(artifact);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, png);
    } catch (err) {
      throw new RenderError(target, describeError(err));
    }
  }

  async display(targets: readonly string[]): Promise<void> {
    console.log(`[accuracy] showing ${targets.length} charts; close the viewers to finish`);
    await Promise.all(targets.map(t => openViewer(t, this.viewer)));
  }
}
