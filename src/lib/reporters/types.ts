import type { Classification, Completion, TestIdentity } from '../outcome';
import type { RunSummary } from '../run-state';

export type RunPlan = {
  readonly total: number;
};

export type TestReport = TestIdentity & {
  readonly classification: Classification;
  readonly completion: Completion;
  readonly expectedToFail: boolean;
  readonly elapsedMs: number;
  /** Present only when the body ran under a limit. */
  readonly timeLimitMs?: number;
  /** Present only when the classification is not Success. */
  readonly diagnostic?: string;
};

/** Receives the events of one run, in order. */
export type Reporter = {
  readonly onPlan: (plan: RunPlan) => void;
  readonly onTestStart: (test: TestIdentity) => void;
  readonly onNote: (message: string) => void;
  /** Configuration problems found during the run, such as an unmatched token. */
  readonly onWarning: (message: string) => void;
  readonly onTestResult: (report: TestReport) => void;
  readonly onSummary: (summary: RunSummary) => void;
};

export type Write = (text: string) => void;

export const writeToStdout: Write = (text) => {
  process.stdout.write(text);
};
