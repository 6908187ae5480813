import { Script } from 'node:vm';

import { withTimeout, TimeoutError } from 'es-toolkit';

import { type ExecutionSlot, runInSlot } from './execution';
import { COMPLETED, type Completion, completionFromError } from './outcome';
import type { TestBody } from './registry';

/** `undefined` runs the body with no limit at all. */
export type SupervisionPlan = {
  readonly timeLimitMs: number | undefined;
};

const INVOKE = new Script('invoke()', { filename: 'testbound-supervisor.vm' });

const isScriptTimeout = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'then' in value &&
  typeof value.then === 'function';

type SyncPhase =
  | { readonly tag: 'Returned'; readonly value: unknown }
  | { readonly tag: 'Threw'; readonly thrown: unknown }
  | { readonly tag: 'Interrupted' };

/**
 * Runs the synchronous part of the body. Under a limit it goes through a vm
 * script so V8 can terminate a spin that never yields.
 */
const runSyncPhase = (body: TestBody, slot: ExecutionSlot, limitMs?: number): SyncPhase => {
  const invoke = () => runInSlot(slot, body);
  try {
    const value: unknown =
      limitMs === undefined
        ? invoke()
        : INVOKE.runInNewContext({ invoke }, { timeout: Math.max(1, Math.ceil(limitMs)) });
    return { tag: 'Returned', value };
  } catch (thrown) {
    return limitMs !== undefined && isScriptTimeout(thrown)
      ? { tag: 'Interrupted' }
      : { tag: 'Threw', thrown };
  }
};

const timedOut = (limitMs: number): Completion => ({ tag: 'TimedOut', limitMs });

/** Settles as TimedOut unless something got there first, then stops listening. */
const expire = async (slot: ExecutionSlot, limitMs: number): Promise<Completion> => {
  const won = slot.settle(timedOut(limitMs));
  slot.abandon();
  return won ? timedOut(limitMs) : slot.settled;
};

/**
 * Runs one body to a Completion. The slot settles once: whichever of the body,
 * the fault listeners or the clock gets there first decides the outcome. An
 * asynchronous body still running at the deadline is left behind and its slot
 * abandoned, so nothing it does later is recorded.
 */
export const superviseBody = async (
  body: TestBody,
  slot: ExecutionSlot,
  { timeLimitMs }: SupervisionPlan,
): Promise<Completion> => {
  const startedAt = performance.now();
  const phase = runSyncPhase(body, slot, timeLimitMs);

  switch (phase.tag) {
    case 'Interrupted':
      return expire(slot, timeLimitMs ?? 0);
    case 'Threw':
      slot.settle(completionFromError(phase.thrown));
      break;
    case 'Returned':
      if (isPromiseLike(phase.value)) {
        void phase.value.then(
          () => slot.settle(COMPLETED),
          (reason: unknown) => slot.settle(completionFromError(reason)),
        );
      } else {
        slot.settle(COMPLETED);
      }
      break;
    default: {
      const neverGuard: never = phase;
      return neverGuard;
    }
  }

  if (timeLimitMs === undefined) {
    return slot.settled;
  }
  const remaining = timeLimitMs - (performance.now() - startedAt);
  if (remaining <= 0) {
    return expire(slot, timeLimitMs);
  }
  try {
    return await withTimeout(() => slot.settled, remaining);
  } catch (caughtError) {
    if (caughtError instanceof TimeoutError) {
      return expire(slot, timeLimitMs);
    }
    throw caughtError;
  }
};
