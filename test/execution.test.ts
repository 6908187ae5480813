import { describe, expect, it, vi } from 'vitest';

import type { ConfigurationError } from '../src/lib/errors';
import {
  createExecutionSlot,
  currentSlot,
  expectedToFail,
  noteAssertion,
  runInSlot,
} from '../src/lib/execution';
import { COMPLETED } from '../src/lib/outcome';

describe('createExecutionSlot', () => {
  it('settles once; the first completion wins', async () => {
    const slot = createExecutionSlot('once');
    expect(slot.settle(COMPLETED)).toBe(true);
    expect(slot.settle({ tag: 'TimedOut', limitMs: 5 })).toBe(false);
    await expect(slot.settled).resolves.toEqual(COMPLETED);
    expect(slot.isLive()).toBe(false);
  });

  it('drops every write once abandoned', () => {
    const onExpectToFail = vi.fn();
    const slot = createExecutionSlot('left behind', { onExpectToFail });
    slot.abandon();
    expect(slot.settle(COMPLETED)).toBe(false);
    slot.markExpectedToFail();
    slot.noteAssertion();
    expect(onExpectToFail).not.toHaveBeenCalled();
    expect(slot.assertionCount()).toBe(0);
  });

  it('warns when expectedToFail follows an assertion but still applies it', () => {
    const reported: ConfigurationError[] = [];
    const onExpectToFail = vi.fn();
    const slot = createExecutionSlot('late', {
      onExpectToFail,
      report: (error) => reported.push(error),
    });
    slot.noteAssertion();
    slot.markExpectedToFail();
    expect(onExpectToFail).toHaveBeenCalledTimes(1);
    expect(reported.map((error) => error.message)).toEqual([
      'expectedToFail() called in late after 1 assertion(s); it should come before the first assertion',
    ]);
  });
});

describe('active slot', () => {
  it('routes expectedToFail and assertion counts to the running slot', async () => {
    const onExpectToFail = vi.fn();
    const slot = createExecutionSlot('bound', { onExpectToFail });
    await runInSlot(slot, async () => {
      expectedToFail();
      await Promise.resolve();
      noteAssertion();
      expect(currentSlot()).toBe(slot);
    });
    expect(onExpectToFail).toHaveBeenCalledTimes(1);
    expect(slot.assertionCount()).toBe(1);
    expect(currentSlot()).toBeUndefined();
  });

  it('warns through the process when no test is running', () => {
    const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    try {
      expectedToFail();
      expect(emitWarning).toHaveBeenCalledWith(
        'expectedToFail() called outside of a running test',
        { type: 'ConfigurationError' },
      );
    } finally {
      emitWarning.mockRestore();
    }
  });
});
