import type { Classification } from './outcome';

/** Bookkeeping for one run. Only the runner writes to it, after a slot settles. */
export type RunState = {
  currentTestName: string | undefined;
  expectToFail: boolean;
  successCount: number;
  failureCount: number;
  errorCount: number;
  readonly failedTestNames: string[];
};

export type RunSummary = {
  readonly run: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly errored: number;
  readonly failedTestNames: readonly string[];
};

export const createRunState = (): RunState => ({
  currentTestName: undefined,
  expectToFail: false,
  successCount: 0,
  failureCount: 0,
  errorCount: 0,
  failedTestNames: [],
});

export const beginTest = (state: RunState, name: string): void => {
  state.currentTestName = name;
  state.expectToFail = false;
};

export const recordClassification = (
  state: RunState,
  name: string,
  classification: Classification,
): void => {
  switch (classification) {
    case 'Success':
      state.successCount += 1;
      break;
    case 'Failure':
      state.failureCount += 1;
      state.failedTestNames.push(name);
      break;
    case 'Error':
      state.errorCount += 1;
      state.failedTestNames.push(name);
      break;
    default: {
      const neverGuard: never = classification;
      throw new Error(`unknown classification ${String(neverGuard)}`);
    }
  }
};

export const summarize = (state: RunState): RunSummary => ({
  run: state.successCount + state.failureCount + state.errorCount,
  succeeded: state.successCount,
  failed: state.failureCount,
  errored: state.errorCount,
  failedTestNames: [...state.failedTestNames],
});

/** Percentage of the run that succeeded, 0 when nothing ran. */
export const successRate = (summary: RunSummary): number =>
  summary.run === 0 ? 0 : (100 * summary.succeeded) / summary.run;
