import { AssertionFailure } from './assertion';

/** How a test body stopped, before expectation inversion is applied. */
export type Completion =
  | { readonly tag: 'Completed' }
  | { readonly tag: 'AssertionRaised'; readonly diagnostic: string }
  | { readonly tag: 'Faulted'; readonly condition: string; readonly diagnostic: string }
  | { readonly tag: 'TimedOut'; readonly limitMs: number }
  | { readonly tag: 'UncaughtOther'; readonly description?: string };

export type Classification = 'Success' | 'Failure' | 'Error';

export const COMPLETED: Completion = { tag: 'Completed' };

/**
 * Errors the runtime raises for what native code would see as an illegal
 * memory access or illegal arithmetic: dereferencing null or undefined,
 * unbounded recursion, BigInt division by zero, invalid lengths.
 */
const FAULT_TYPES = [TypeError, RangeError, ReferenceError] as const;

export const isRuntimeFault = (error: unknown): error is Error =>
  FAULT_TYPES.some((faultType) => error instanceof faultType);

const describeThrown = (thrown: unknown): string | undefined => {
  if (thrown instanceof Error) {
    return thrown.message || undefined;
  }
  if (typeof thrown === 'string') {
    return thrown || undefined;
  }
  return undefined;
};

export const faultCompletion = (condition: string, thrown: unknown): Completion => {
  const detail = describeThrown(thrown);
  return {
    tag: 'Faulted',
    condition,
    diagnostic: detail ? `runtime error ${condition}: ${detail}` : `runtime error ${condition}`,
  };
};

export const completionFromError = (thrown: unknown): Completion => {
  if (thrown instanceof AssertionFailure) {
    return { tag: 'AssertionRaised', diagnostic: thrown.message };
  }
  if (isRuntimeFault(thrown)) {
    return faultCompletion(thrown.name, thrown);
  }
  const description = describeThrown(thrown);
  return description === undefined
    ? { tag: 'UncaughtOther' }
    : { tag: 'UncaughtOther', description };
};

export const classify = (completion: Completion, expectToFail: boolean): Classification => {
  if (expectToFail) {
    return completion.tag === 'Completed' ? 'Failure' : 'Success';
  }
  switch (completion.tag) {
    case 'Completed':
      return 'Success';
    case 'AssertionRaised':
      return 'Failure';
    case 'Faulted':
    case 'TimedOut':
    case 'UncaughtOther':
      return 'Error';
    default: {
      const neverGuard: never = completion;
      return neverGuard;
    }
  }
};

export type TestIdentity = { readonly number: number; readonly name: string };

/**
 * The diagnostic carried by a non-Success classification. Inverted successes
 * have none.
 */
export const describeOutcome = (
  test: TestIdentity,
  completion: Completion,
  expectToFail: boolean,
): string | undefined => {
  if (classify(completion, expectToFail) === 'Success') {
    return undefined;
  }
  switch (completion.tag) {
    case 'Completed':
      return `Test ${test.number} - ${test.name} passed but was expected to fail.`;
    case 'AssertionRaised':
    case 'Faulted':
      return completion.diagnostic;
    case 'TimedOut':
      return (
        `Test ${test.number} - ${test.name} still running after ${completion.limitMs}` +
        ' milliseconds - possible infinite loop?'
      );
    case 'UncaughtOther':
      return completion.description
        ? `Unexpected error in ${test.name}: ${completion.description}`
        : `Unexpected error in ${test.name}`;
    default: {
      const neverGuard: never = completion;
      return neverGuard;
    }
  }
};
