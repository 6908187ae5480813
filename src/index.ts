export {
  assertEqual,
  assertFalse,
  AssertionFailure,
  type AssertionResult,
  assertionResult,
  assertNotEqual,
  assertNotNull,
  assertNull,
  assertThat,
  assertTrue,
  checkTest,
  fail,
  type Matcher,
  succeed,
} from './lib/assertion';
export { type CallLog, createCallLog } from './lib/call-log';
export { type DebuggerProbe, detectDebugger, noDebugger } from './lib/debugger-probe';
export { ConfigurationError, type DiagnosticsSink } from './lib/errors';
export { expectedToFail } from './lib/execution';
export * from './lib/matchers';
export type { Classification, Completion } from './lib/outcome';
export {
  acronymOf,
  createRegistry,
  type Registration,
  type Registry,
  type TestBody,
  type TestDescriptor,
} from './lib/registry';
export { createPrettyReporter } from './lib/reporters/pretty';
export { createTapReporter, formatComment, formatFailed } from './lib/reporters/tap';
export type { Reporter, RunPlan, TestReport } from './lib/reporters/types';
export { getStringRepr, registerRenderer, tuple, type Tuple } from './lib/repr';
export { createRunner, type Runner, type RunnerOptions } from './lib/runner';
export type { RunSummary } from './lib/run-state';
export {
  createSuite,
  DEFAULT_TIME_LIMIT_MS,
  defineSuite,
  type RunOptions,
  type Suite,
  type SuiteModule,
  type SuiteOptions,
} from './lib/suite';
