import { AsyncLocalStorage } from 'node:async_hooks';

import { ConfigurationError, type DiagnosticsSink, warnToProcess } from './errors';
import type { Completion } from './outcome';

/**
 * Where one run of one test body reports back to its supervisor.
 *
 * A slot settles once; the first completion wins and later ones are dropped.
 * Once abandoned (the supervisor stopped waiting), every write through it is
 * dropped too, so a body that outlives its time limit cannot touch the state
 * of whichever test runs next.
 */
export type ExecutionSlot = {
  readonly testName: string;
  readonly settled: Promise<Completion>;
  readonly settle: (completion: Completion) => boolean;
  readonly abandon: () => void;
  readonly isLive: () => boolean;
  readonly markExpectedToFail: () => void;
  readonly noteAssertion: () => void;
  readonly assertionCount: () => number;
};

export type ExecutionSlotHooks = {
  readonly onExpectToFail?: () => void;
  readonly report?: DiagnosticsSink;
};

export const createExecutionSlot = (
  testName: string,
  hooks: ExecutionSlotHooks = {},
): ExecutionSlot => {
  let state: 'running' | 'settled' | 'abandoned' = 'running';
  let assertions = 0;
  let resolveSettled: (completion: Completion) => void = () => undefined;
  const settled = new Promise<Completion>((resolve) => {
    resolveSettled = resolve;
  });

  return {
    testName,
    settled,
    settle: (completion) => {
      if (state !== 'running') {
        return false;
      }
      state = 'settled';
      resolveSettled(completion);
      return true;
    },
    abandon: () => {
      state = 'abandoned';
    },
    isLive: () => state === 'running',
    markExpectedToFail: () => {
      if (state !== 'running') {
        return;
      }
      if (assertions > 0) {
        (hooks.report ?? warnToProcess)(
          new ConfigurationError(
            `expectedToFail() called in ${testName} after ${assertions} assertion(s); ` +
              'it should come before the first assertion',
          ),
        );
      }
      hooks.onExpectToFail?.();
    },
    noteAssertion: () => {
      if (state === 'running') {
        assertions += 1;
      }
    },
    assertionCount: () => assertions,
  };
};

const activeSlot = new AsyncLocalStorage<ExecutionSlot>();

export const runInSlot = <T>(slot: ExecutionSlot, run: () => T): T => activeSlot.run(slot, run);

export const currentSlot = (): ExecutionSlot | undefined => activeSlot.getStore();

export const noteAssertion = (): void => {
  currentSlot()?.noteAssertion();
};

/**
 * Reverses the expectation for the calling test: a failure, fault, timeout or
 * unexpected error counts as success, and a clean pass counts as a failure.
 * Call it before the first assertion.
 */
export const expectedToFail = (): void => {
  const slot = currentSlot();
  if (!slot) {
    warnToProcess(new ConfigurationError('expectedToFail() called outside of a running test'));
    return;
  }
  slot.markExpectedToFail();
};
