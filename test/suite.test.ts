import { EventEmitter } from 'node:events';

import { describe, expect, it } from 'vitest';

import { assertEqual, assertThat } from '../src/lib/assertion';
import type { ConfigurationError } from '../src/lib/errors';
import { createFaultContainment } from '../src/lib/fault-containment';
import { hasItem } from '../src/lib/matchers';
import { createTapReporter } from '../src/lib/reporters/tap';
import { createSuite, DEFAULT_TIME_LIMIT_MS } from '../src/lib/suite';

const quietRun = () => {
  const written: string[] = [];
  return {
    written,
    options: {
      reporter: createTapReporter({ write: (text) => written.push(text) }),
      probe: () => false,
      containment: createFaultContainment({ host: new EventEmitter() }),
    },
  };
};

describe('createSuite', () => {
  it('registers tests with the default limit unless one is given', () => {
    const suite = createSuite({ report: () => undefined });
    suite.test('plain', () => undefined);
    suite.test('patient', 2000, () => undefined);

    expect(suite.registry.get('plain')?.timeLimitMs).toBe(DEFAULT_TIME_LIMIT_MS);
    expect(suite.registry.get('patient')?.timeLimitMs).toBe(2000);
  });

  it('applies its own default limit', () => {
    const suite = createSuite({ timeLimitMs: 50, report: () => undefined });
    suite.test('quick', () => undefined);
    expect(suite.registry.get('quick')?.timeLimitMs).toBe(50);
  });

  it('reports registration problems', () => {
    const reported: ConfigurationError[] = [];
    const suite = createSuite({ report: (error) => reported.push(error) });
    suite.test('twice', () => undefined);
    suite.test('twice', () => undefined);

    expect(reported.map((error) => error.message)).toEqual([
      'Test twice is already registered; the later registration is ignored',
    ]);
  });

  it('runs its tests through the given reporter', async () => {
    const suite = createSuite({ report: () => undefined });
    suite.test('addsUp', () => {
      assertEqual(1 + 1, 2);
    });
    suite.test('missingWord', () => {
      assertThat(['a', 'b'], hasItem('c'));
    });
    const { written, options } = quietRun();

    const summary = await suite.run(['aU'], options);

    expect(summary.succeeded).toBe(1);
    expect(written).toEqual([
      '1..1\n',
      'ok 1 - addsUp\n',
      '# testbound: passed 1 out of 1 tests, for a success rate of 100.0%\n',
    ]);
  });

  it('logs stub calls for tests to inspect', async () => {
    const suite = createSuite({ report: () => undefined });
    const save = (key: string, value: number) => suite.logCall('save', key, value);
    suite.test('savesOnce', () => {
      suite.clearCallLog();
      save('answer', 42);
      assertThat(suite.calls, hasItem('save\t"answer"\t42'));
    });
    const { options } = quietRun();

    const summary = await suite.run([], options);

    expect(summary.succeeded).toBe(1);
    expect(suite.calls.entries()).toEqual(['save\t"answer"\t42']);
  });

  it('ignores a run started from inside one of its tests', async () => {
    const reported: ConfigurationError[] = [];
    const suite = createSuite({ report: (error) => reported.push(error) });
    const { options } = quietRun();
    suite.test('reentrant', async () => {
      const nested = await suite.run([], options);
      assertEqual(nested.run, 0);
    });

    const summary = await suite.run([], options);

    expect(summary.succeeded).toBe(1);
    expect(reported.map((error) => error.message)).toEqual([
      'A run is already in progress; nested runs are ignored',
    ]);
  });
});
