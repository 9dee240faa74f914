import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FormatError, ParseError, SourceNotFoundError } from '../src/errors';
import { loadAccuracyFile, parseAccuracySource, parseSeriesLine, splitLines } from '../src/loader';

describe('parseAccuracySource', () => {
  it('maps the first three lines to single, double and extended', () => {
    const out = parseAccuracySource('1e-1,2e-2,3e-3\n4,5,6\n7,8,9');
    expect(out.single).toEqual([0.1, 0.02, 0.003]);
    expect(out.double).toEqual([4.0, 5.0, 6.0]);
    expect(out.extended).toEqual([7.0, 8.0, 9.0]);
  });

  it('tolerates whitespace, trailing commas and CRLF', () => {
    const out = parseAccuracySource(' 0.5 , 0.25,\r\n1E+2,\t-3.5e-1 ,\r\n.5,2.,\r\n');
    expect(out.single).toEqual([0.5, 0.25]);
    expect(out.double).toEqual([100, -0.35]);
    expect(out.extended).toEqual([0.5, 2]);
  });

  it('ignores lines after the third', () => {
    const out = parseAccuracySource('1\n2\n3\nnot,numbers,at,all');
    expect(out.extended).toEqual([3]);
  });

  it('returns frozen series', () => {
    const out = parseAccuracySource('1,2\n3\n4');
    expect(Object.isFrozen(out)).toBe(true);
    expect(Object.isFrozen(out.single)).toBe(true);
  });

  it('is deterministic', () => {
    const text = '0.1,0.05,0.025\n0.2,0.1,0.05\n0.3,0.15,0.075\n';
    expect(parseAccuracySource(text)).toEqual(parseAccuracySource(text));
  });

  it.each(['', '1,2,3', '1,2,3\n4,5,6', '1,2,3\n4,5,6\n', 'abc\nxyz'])(
    'fails with FormatError for fewer than three lines (%j)',
    text => {
      expect(() => parseAccuracySource(text)).toThrow(FormatError);
    }
  );

  it('reports the line count in FormatError', () => {
    try {
      parseAccuracySource('1\n2\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatError);
      if (err instanceof FormatError) {
        expect(err.lineCount).toBe(2);
        expect(err.code).toBe('FORMAT');
      }
    }
  });

  it('fails with ParseError on a bad token in the third line', () => {
    try {
      parseAccuracySource('1,2,3\n4,5,6\n1,2,abc');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.line).toBe(3);
        expect(err.position).toBe(3);
        expect(err.token).toBe('abc');
        expect(err.message).toBe("line 3, value 3: 'abc' is not a finite floating-point literal");
      }
    }
  });
});

describe('parseSeriesLine', () => {
  it.each(['1,,2', 'nan', 'inf', '1e400', '0x10', '1_000', '1.2.3', '--1'])('rejects %j', line => {
    expect(() => parseSeriesLine(line, 1)).toThrow(ParseError);
  });

  it('rejects an empty line', () => {
    expect(() => parseSeriesLine('   ', 2)).toThrow('line 2: no numeric values');
  });

  it('keeps a single value', () => {
    expect(parseSeriesLine('5.960464477539063e-08', 1)).toEqual([2 ** -24]);
  });
});

describe('splitLines', () => {
  it('does not open a line after the final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });
});

describe('loadAccuracyFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'accuracy-core-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads and parses a file', () => {
    const file = path.join(dir, 'output.txt');
    fs.writeFileSync(file, '0.1,0.05\n0.2,0.1\n0.3,0.15\n');
    const out = loadAccuracyFile(file);
    expect(out.double).toEqual([0.2, 0.1]);
  });

  it('fails with SourceNotFoundError for a missing file', () => {
    expect(() => loadAccuracyFile(path.join(dir, 'missing.txt'))).toThrow(SourceNotFoundError);
  });

  it('fails with SourceNotFoundError for a directory', () => {
    expect(() => loadAccuracyFile(dir)).toThrow(SourceNotFoundError);
  });

  it('propagates ParseError from file content', () => {
    const file = path.join(dir, 'bad.txt');
    fs.writeFileSync(file, '1\n2\nx\n');
    expect(() => loadAccuracyFile(file)).toThrow(ParseError);
  });
});
