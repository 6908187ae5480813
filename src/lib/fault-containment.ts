import type { EventEmitter } from 'node:events';

import { AssertionFailure } from './assertion';
import { currentSlot, type ExecutionSlot } from './execution';
import { completionFromError, faultCompletion } from './outcome';

export type FaultHost = Pick<EventEmitter, 'on' | 'off'>;

type FaultEvent = 'uncaughtException' | 'unhandledRejection';

export type StrayFault = {
  readonly event: FaultEvent;
  readonly thrown: unknown;
};

export type FaultContainment = {
  /** (Re-)installs the listeners and points them at `slot`. */
  readonly arm: (slot: ExecutionSlot) => void;
  /** Removes the listeners. */
  readonly disarm: () => void;
};

export type FaultContainmentOptions = {
  readonly host?: FaultHost;
  /** Called for faults that arrive while no test is live. */
  readonly onStray?: (fault: StrayFault) => void;
};

const settleFrom = (slot: ExecutionSlot, event: FaultEvent, thrown: unknown): void => {
  if (thrown instanceof AssertionFailure) {
    slot.settle(completionFromError(thrown));
    return;
  }
  const condition = thrown instanceof Error ? thrown.name : event;
  slot.settle(faultCompletion(condition, thrown));
};

/**
 * Process-wide listeners that turn a crash escaping a test body (a throw from
 * a timer callback, a rejected promise nobody awaited) into a Faulted
 * completion for the live test.
 */
export const createFaultContainment = ({
  host = process,
  onStray = () => undefined,
}: FaultContainmentOptions = {}): FaultContainment => {
  let target: ExecutionSlot | undefined;

  // The listener runs in the async context of the code that threw, so a fault
  // raised by an earlier test's leftover timer or promise names that test's
  // slot and never lands on the live one.
  const route = (event: FaultEvent) => (thrown: unknown) => {
    const origin = currentSlot();
    if (target?.isLive() && (origin === undefined || origin === target)) {
      settleFrom(target, event, thrown);
      return;
    }
    onStray({ event, thrown });
  };
  const onException = route('uncaughtException');
  const onRejection = route('unhandledRejection');

  const remove = () => {
    host.off('uncaughtException', onException);
    host.off('unhandledRejection', onRejection);
  };

  return {
    arm: (slot) => {
      remove();
      target = slot;
      host.on('uncaughtException', onException);
      host.on('unhandledRejection', onRejection);
    },
    disarm: () => {
      remove();
      target = undefined;
    },
  };
};
