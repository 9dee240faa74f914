import { describe, it, expect } from 'vitest';
import { PRECISION_CLASSES, THEORETICAL_REFERENCE, outputFileName } from '../src/precision';
import { formatSummary, summarizeSeries } from '../src/summary';

describe('precision classes', () => {
  it('are fixed in single, double, extended order', () => {
    expect(PRECISION_CLASSES).toEqual(['single', 'double', 'extended']);
  });

  it('carry the unit roundoff of each format', () => {
    expect(THEORETICAL_REFERENCE.single).toBe(5.9604644775390625e-8);
    expect(THEORETICAL_REFERENCE.double).toBe(Number.EPSILON / 2);
    expect(THEORETICAL_REFERENCE.extended).toBe(2 ** -64);
    expect(Object.isFrozen(THEORETICAL_REFERENCE)).toBe(true);
  });

  it('names output files per class', () => {
    expect(PRECISION_CLASSES.map(outputFileName)).toEqual([
      'single_accuracy.png',
      'double_accuracy.png',
      'extended_accuracy.png',
    ]);
  });
});

describe('summarizeSeries', () => {
  it('compares the last step with the theoretical value', () => {
    const s = summarizeSeries('single', [2 ** -20, 2 ** -22, 2 ** -23]);
    expect(s.steps).toBe(3);
    expect(s.finalBound).toBe(2 ** -23);
    expect(s.ratio).toBe(2);
  });

  it('formats the console report', () => {
    const s = summarizeSeries('double', [0.5, 2 ** -52]);
    expect(formatSummary(s)).toBe(
      'Double precision accuracy upper bound: 2.22045e-16, compared with a theoretical value of 1.11022e-16.'
    );
  });

  it('rejects an empty series', () => {
    expect(() => summarizeSeries('extended', [])).toThrow('Empty extended series');
  });
});
