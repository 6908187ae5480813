import { describe, expect, it } from 'vitest';

import { paletteFor } from '../src/lib/colors';
import { COMPLETED } from '../src/lib/outcome';
import {
  createPrettyReporter,
  formatPrettyResult,
  formatPrettySummary,
} from '../src/lib/reporters/pretty';
import type { TestReport } from '../src/lib/reporters/types';

const plain = paletteFor(false);

const fast: TestReport = {
  number: 1,
  name: 'fast',
  classification: 'Success',
  completion: COMPLETED,
  expectedToFail: false,
  elapsedMs: 12.4,
};

const wrong: TestReport = {
  number: 2,
  name: 'wrong',
  classification: 'Failure',
  completion: { tag: 'AssertionRaised', diagnostic: 'at a.ts:1\n\tcheck' },
  expectedToFail: false,
  elapsedMs: 1,
  diagnostic: 'at a.ts:1\n\tcheck',
};

describe('formatPrettyResult', () => {
  it('shows a pass with its elapsed time', () => {
    expect(formatPrettyResult(fast, plain)).toBe('  ✓ fast (12ms)');
    expect(formatPrettyResult({ ...fast, expectedToFail: true }, plain)).toBe(
      '  ✓ fast (12ms) [expected to fail]',
    );
  });

  it('indents the diagnostic under a failure', () => {
    expect(formatPrettyResult(wrong, plain)).toBe('  × wrong\n      at a.ts:1\n      check');
  });

  it('falls back to ascii glyphs', () => {
    expect(formatPrettyResult(wrong, plain, { pass: '+', fail: 'x', error: '!' })).toBe(
      '  x wrong\n      at a.ts:1\n      check',
    );
  });
});

describe('formatPrettySummary', () => {
  it('lists only the non-empty buckets beyond passing', () => {
    expect(
      formatPrettySummary(
        { run: 4, succeeded: 2, failed: 1, errored: 1, failedTestNames: ['a', 'b'] },
        plain,
      ),
    ).toBe('Tests  2 passing | 1 failing | 1 errors (4)');
    expect(
      formatPrettySummary({ run: 3, succeeded: 3, failed: 0, errored: 0, failedTestNames: [] }, plain),
    ).toBe('Tests  3 passing (3)');
  });
});

describe('createPrettyReporter', () => {
  it('writes plain lines when color is off', () => {
    const written: string[] = [];
    const reporter = createPrettyReporter({
      write: (text) => written.push(text),
      palette: plain,
      unicode: false,
    });

    reporter.onPlan({ total: 1 });
    reporter.onWarning('careful');
    reporter.onTestResult(fast);
    reporter.onSummary({ run: 1, succeeded: 1, failed: 0, errored: 0, failedTestNames: [] });

    expect(written).toEqual([
      'RUN 1 tests\n',
      'Warning: careful\n',
      '  + fast (12ms)\n',
      '\n',
      'Tests  1 passing (1)\n',
    ]);
  });
});
