import { type CallLog, createCallLog } from './call-log';
import type { DebuggerProbe } from './debugger-probe';
import { ConfigurationError, type DiagnosticsSink, warnToConsole } from './errors';
import type { FaultContainment } from './fault-containment';
import { createRegistry, type Registration, type Registry, type TestBody } from './registry';
import { createTapReporter } from './reporters/tap';
import type { Reporter } from './reporters/types';
import { createRunner } from './runner';
import { createRunState, type RunSummary, summarize } from './run-state';

export const DEFAULT_TIME_LIMIT_MS = 500;

export type SuiteOptions = {
  /** Limit for tests registered without one. */
  readonly timeLimitMs?: number;
  /** Where registration problems go. */
  readonly report?: DiagnosticsSink;
};

export type RunOptions = {
  readonly reporter?: Reporter;
  readonly probe?: DebuggerProbe;
  readonly containment?: FaultContainment;
};

export type Suite = {
  readonly test: {
    (name: string, body: TestBody): Registration;
    (name: string, timeLimitMs: number, body: TestBody): Registration;
  };
  readonly run: (tokens?: readonly string[], options?: RunOptions) => Promise<RunSummary>;
  readonly logCall: (functionName: string, ...args: readonly unknown[]) => void;
  readonly clearCallLog: () => void;
  readonly calls: CallLog;
  readonly registry: Registry;
};

/** What a suite file exports by default: registers its tests on the suite it is given. */
export type SuiteModule = (suite: Suite) => void | Promise<void>;

export const defineSuite = (define: SuiteModule): SuiteModule => define;

export const createSuite = ({
  timeLimitMs = DEFAULT_TIME_LIMIT_MS,
  report = warnToConsole,
}: SuiteOptions = {}): Suite => {
  const registry = createRegistry(report);
  const calls = createCallLog();
  let running = false;

  const test = (
    name: string,
    limitOrBody: number | TestBody,
    maybeBody?: TestBody,
  ): Registration => {
    if (typeof limitOrBody !== 'number') {
      return registry.register(name, timeLimitMs, limitOrBody);
    }
    if (maybeBody === undefined) {
      const error = new ConfigurationError(`Test ${name} was registered without a body`);
      report(error);
      return { tag: 'Rejected', error };
    }
    return registry.register(name, limitOrBody, maybeBody);
  };

  const run = async (
    tokens: readonly string[] = [],
    { reporter = createTapReporter(), probe, containment }: RunOptions = {},
  ): Promise<RunSummary> => {
    if (running) {
      report(new ConfigurationError('A run is already in progress; nested runs are ignored'));
      return summarize(createRunState());
    }
    running = true;
    try {
      return await createRunner({ registry, reporter, probe, containment }).run(tokens);
    } finally {
      running = false;
    }
  };

  return {
    test,
    run,
    logCall: calls.log,
    clearCallLog: calls.clear,
    calls,
    registry,
  };
};
