import sharp from "sharp";
import { parse, View } from "vega";
import { compile, type TopLevelSpec } from "vega-lite";
import { RenderError, describeError, type AccuracySeries } from "accuracy-core";
import { buildAccuracyChart, buildVegaLiteSpec, type AccuracyChart } from "./chart";
import { resolveRenderOptions, type RenderOptions, type RenderOptionsInput, type Typography } from "./options";

export interface PlotArtifact {
  fileName: string;
  chart: AccuracyChart;
  spec: TopLevelSpec;
  typography: Typography;
  scale: number;
}

export interface RenderMeta {
  fileName?: string;
}

export class PlotRenderer {
  readonly options: RenderOptions;

  constructor(options: RenderOptionsInput = {}) {
    this.options = resolveRenderOptions(options);
  }

  render(series: AccuracySeries, theoreticalValue: number, meta: RenderMeta = {}): PlotArtifact {
    const chart = buildAccuracyChart(series, theoreticalValue);
    return Object.freeze({
      fileName: meta.fileName ?? "accuracy.png",
      chart,
      spec: buildVegaLiteSpec(chart, this.options),
      typography: this.options.typography,
      scale: this.options.scale,
    });
  }
}

export function applyTextRendering(svg: string, mode: Typography["textRendering"]): string {
  return svg.replace(/<svg\b/, `<svg text-rendering="${mode}"`);
}

export async function toSvg(artifact: PlotArtifact): Promise<string> {
  let view: View | undefined;
  try {
    const { spec } = compile(artifact.spec);
    view = new View(parse(spec), { renderer: "none" });
    const svg = await view.toSVG();
    return applyTextRendering(svg, artifact.typography.textRendering);
  } catch (err) {
    throw new RenderError(artifact.fileName, describeError(err));
  } finally {
    view?.finalize();
  }
}

export async function toPng(artifact: PlotArtifact): Promise<Buffer> {
  const svg = await toSvg(artifact);
  try {
    return await sharp(Buffer.from(svg), { density: 72 * artifact.scale }).png().toBuffer();
  } catch (err) {
    throw new RenderError(artifact.fileName, describeError(err));
  }
}
