import fs from "fs";
import { FormatError, ParseError, SourceNotFoundError, describeError } from "./errors";
import { PRECISION_CLASSES } from "./precision";
import type { AccuracySeries, AccuracyTriple } from "./types";

const FLOAT_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Split into lines the way a line reader would: a final newline does not open an empty line. */
export function splitLines(text: string): string[] {
  const lines = text.replace(/^\uFEFF/, "").split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map(line => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Parse one comma-separated row of float literals. `lineNo` is 1-based and
 * only used for error reporting.
 */
export function parseSeriesLine(line: string, lineNo: number): AccuracySeries {
  const tokens = line.split(",").map(t => t.trim());
  if (tokens.length > 1 && tokens[tokens.length - 1] === "") tokens.pop();

  if (tokens.length === 1 && tokens[0] === "") {
    throw new ParseError(lineNo, 0, "");
  }

  const values = tokens.map((token, idx) => {
    const value = FLOAT_LITERAL.test(token) ? Number(token) : NaN;
    if (!Number.isFinite(value)) {
      throw new ParseError(lineNo, idx + 1, token);
    }
    return value;
  });

  return Object.freeze(values);
}

export function parseAccuracySource(text: string): AccuracyTriple {
  const lines = splitLines(text);
  if (lines.length < PRECISION_CLASSES.length) {
    throw new FormatError(lines.length, PRECISION_CLASSES.length);
  }

  const [single, double, extended] = PRECISION_CLASSES.map((_, i) => parseSeriesLine(lines[i], i + 1));
  return Object.freeze({ single, double, extended });
}

export function readSource(file: string): string {
  let fd: number;
  try {
    fd = fs.openSync(file, "r");
  } catch (err) {
    throw new SourceNotFoundError(file, describeError(err));
  }

  try {
    return fs.readFileSync(fd, "utf-8");
  } catch (err) {
    throw new SourceNotFoundError(file, describeError(err));
  } finally {
    fs.closeSync(fd);
  }
}

export function loadAccuracyFile(file: string): AccuracyTriple {
  return parseAccuracySource(readSource(file));
}
