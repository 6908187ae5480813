import { type DebuggerProbe, detectDebugger } from './debugger-probe';
import { ConfigurationError, type DiagnosticsSink } from './errors';
import { createExecutionSlot } from './execution';
import {
  createFaultContainment,
  type FaultContainment,
  type StrayFault,
} from './fault-containment';
import { classify, describeOutcome } from './outcome';
import type { Registry, TestDescriptor } from './registry';
import type { Reporter, TestReport } from './reporters/types';
import { getStringRepr } from './repr';
import {
  beginTest,
  createRunState,
  recordClassification,
  type RunState,
  type RunSummary,
  summarize,
} from './run-state';
import { superviseBody } from './supervisor';

export type RunnerOptions = {
  readonly registry: Registry;
  readonly reporter: Reporter;
  readonly probe?: DebuggerProbe;
  readonly containment?: FaultContainment;
  readonly report?: DiagnosticsSink;
  readonly now?: () => number;
};

export type Runner = {
  readonly run: (tokens?: readonly string[]) => Promise<RunSummary>;
  readonly isRunning: () => boolean;
};

const describeStray = ({ event, thrown }: StrayFault): string => {
  const detail =
    thrown instanceof Error ? `${thrown.name}: ${thrown.message}` : getStringRepr(thrown);
  return `${event} outside of a running test (ignored): ${detail}`;
};

export const createRunner = ({
  registry,
  reporter,
  probe = detectDebugger,
  containment,
  report = (error) => reporter.onWarning(error.message),
  now = () => performance.now(),
}: RunnerOptions): Runner => {
  const faults =
    containment ??
    createFaultContainment({ onStray: (fault) => reporter.onNote(describeStray(fault)) });
  let running = false;

  const runOne = async (
    state: RunState,
    number: number,
    test: TestDescriptor,
    onDebugger: () => void,
  ): Promise<void> => {
    beginTest(state, test.name);
    reporter.onTestStart({ number, name: test.name });

    let expectToFail = false;
    const slot = createExecutionSlot(test.name, {
      onExpectToFail: () => {
        expectToFail = true;
      },
      report,
    });
    const debuggerAttached = test.timeLimitMs > 0 && probe();
    if (debuggerAttached) {
      onDebugger();
    }
    const bounded = test.timeLimitMs > 0 && !debuggerAttached;

    faults.arm(slot);
    const startedAt = now();
    const completion = await superviseBody(test.body, slot, {
      timeLimitMs: bounded ? test.timeLimitMs : undefined,
    });
    const elapsedMs = now() - startedAt;

    state.expectToFail = expectToFail;
    const classification = classify(completion, state.expectToFail);
    recordClassification(state, test.name, classification);

    const identity = { number, name: test.name };
    const diagnostic = describeOutcome(identity, completion, state.expectToFail);
    const result: TestReport = {
      ...identity,
      classification,
      completion,
      expectedToFail: state.expectToFail,
      elapsedMs,
      ...(bounded ? { timeLimitMs: test.timeLimitMs } : {}),
      ...(diagnostic === undefined ? {} : { diagnostic }),
    };
    reporter.onTestResult(result);
  };

  return {
    isRunning: () => running,
    run: async (tokens = []) => {
      if (running) {
        report(new ConfigurationError('A run is already in progress; nested runs are ignored'));
        return summarize(createRunState());
      }
      running = true;
      const state = createRunState();
      try {
        const selection = registry.select(tokens);
        reporter.onPlan({ total: selection.names.length });
        for (const token of selection.unmatched) {
          report(new ConfigurationError(`No matching test found for input specification ${token}`));
        }

        let debuggerNoted = false;
        const noteDebugger = () => {
          if (!debuggerNoted) {
            debuggerNoted = true;
            reporter.onNote('Debugger detected: time limits are not enforced');
          }
        };

        let number = 0;
        for (const name of selection.names) {
          const test = registry.get(name);
          if (test) {
            number += 1;
            await runOne(state, number, test, noteDebugger);
          }
        }
      } finally {
        faults.disarm();
        running = false;
      }
      const summary = summarize(state);
      reporter.onSummary(summary);
      return summary;
    },
  };
};
