import { getStringRepr } from './repr';

/**
 * Record of calls made to stubs, oldest first. Each entry is the function name
 * followed by its rendered arguments, tab separated.
 */
export type CallLog = Iterable<string> & {
  readonly log: (functionName: string, ...args: readonly unknown[]) => void;
  readonly clear: () => void;
  readonly entries: () => readonly string[];
};

export const formatCall = (functionName: string, args: readonly unknown[]): string =>
  [functionName, ...args.map(getStringRepr)].join('\t');

export const createCallLog = (): CallLog => {
  const calls: string[] = [];
  return {
    log: (functionName, ...args) => {
      calls.push(formatCall(functionName, args));
    },
    clear: () => {
      calls.length = 0;
    },
    entries: () => [...calls],
    [Symbol.iterator]: () => calls[Symbol.iterator](),
  };
};
