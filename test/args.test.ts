import { describe, expect, it } from 'vitest';

import { ActionBuilders, deriveArgs, parseActionsFromTokens } from '../src/lib/args';

describe('parseActionsFromTokens', () => {
  it('reads flags with an inline value or the following token', () => {
    expect(parseActionsFromTokens(['--reporter=pretty', '--suite', 'a.suite.ts'])).toEqual([
      ActionBuilders.reporter('pretty'),
      ActionBuilders.suite('a.suite.ts'),
    ]);
  });

  it('treats anything that is not a flag as a selection token', () => {
    expect(parseActionsFromTokens(['smallTest', '--diagnostics-last', 'sT'])).toEqual([
      ActionBuilders.selection('smallTest'),
      ActionBuilders.diagnosticsFirst(false),
      ActionBuilders.selection('sT'),
    ]);
  });

  it('collects flags it does not know', () => {
    expect(parseActionsFromTokens(['--bogus', '-x', '-'])).toEqual([
      ActionBuilders.unknownFlag('--bogus'),
      ActionBuilders.unknownFlag('-x'),
      ActionBuilders.selection('-'),
    ]);
  });

  it('consumes the value of a time limit even when it is not a number', () => {
    expect(parseActionsFromTokens(['--time-limit', 'soon', 'fast'])).toEqual([
      ActionBuilders.selection('fast'),
    ]);
  });
});

describe('deriveArgs', () => {
  it('starts from nothing', () => {
    expect(deriveArgs([])).toEqual({ suites: [], help: false, selection: [], unknownFlags: [] });
  });

  it('accumulates lists and lets later single values win', () => {
    expect(
      deriveArgs([
        '--suite=a.ts',
        '--reporter',
        'pretty',
        '--time-limit=250',
        'alpha',
        '--suite=b.ts',
        '--reporter=tap',
        '--time-limit',
        '0',
        'beta',
      ]),
    ).toEqual({
      suites: ['a.ts', 'b.ts'],
      reporter: 'tap',
      timeLimitMs: 0,
      help: false,
      selection: ['alpha', 'beta'],
      unknownFlags: [],
    });
  });

  it('reads debugger and help switches', () => {
    const parsed = deriveArgs(['--ignore-debugger=false', '-h', '--ignore-debugger']);
    expect(parsed.ignoreDebugger).toBe(true);
    expect(parsed.help).toBe(true);
    expect(deriveArgs(['--ignore-debugger=0']).ignoreDebugger).toBe(false);
  });

  it('falls back to tap for an unknown reporter name', () => {
    expect(deriveArgs(['--reporter=fancy']).reporter).toBe('tap');
  });
});
