export type AccuracyErrorCode = "SOURCE_NOT_FOUND" | "FORMAT" | "PARSE" | "RENDER";

export class AccuracyPlotError extends Error {
  constructor(message: string, public readonly code: AccuracyErrorCode) {
    super(message);
    this.name = "AccuracyPlotError";
  }
}

export class SourceNotFoundError extends AccuracyPlotError {
  constructor(public readonly source: string, public readonly reason?: string) {
    super(`input source '${source}' could not be read${reason ? ` (${reason})` : ""}`, "SOURCE_NOT_FOUND");
    this.name = "SourceNotFoundError";
  }
}

export class FormatError extends AccuracyPlotError {
  constructor(public readonly lineCount: number, public readonly expected: number) {
    super(`expected at least ${expected} lines of measurements, found ${lineCount}`, "FORMAT");
    this.name = "FormatError";
  }
}

/** `line` and `position` are 1-based; `position` is 0 when the line holds no tokens at all. */
export class ParseError extends AccuracyPlotError {
  constructor(
    public readonly line: number,
    public readonly position: number,
    public readonly token: string
  ) {
    super(
      position === 0
        ? `line ${line}: no numeric values`
        : `line ${line}, value ${position}: '${token}' is not a finite floating-point literal`,
      "PARSE"
    );
    this.name = "ParseError";
  }
}

export class RenderError extends AccuracyPlotError {
  constructor(public readonly target: string, public readonly reason: string) {
    super(`could not render '${target}': ${reason}`, "RENDER");
    this.name = "RenderError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
