import { uniq } from 'es-toolkit';

import { ConfigurationError, type DiagnosticsSink, warnToConsole } from './errors';

export type TestBody = () => void | Promise<void>;

/** `timeLimitMs <= 0` runs the body unbounded. */
export type TestDescriptor = {
  readonly name: string;
  readonly timeLimitMs: number;
  readonly body: TestBody;
};

export type Registration =
  | { readonly tag: 'Registered'; readonly test: TestDescriptor }
  | { readonly tag: 'Rejected'; readonly error: ConfigurationError };

export type Selection = {
  readonly names: readonly string[];
  readonly unmatched: readonly string[];
};

export type Registry = {
  readonly register: (name: string, timeLimitMs: number, body: TestBody) => Registration;
  readonly get: (name: string) => TestDescriptor | undefined;
  readonly names: () => readonly string[];
  readonly select: (tokens: readonly string[]) => Selection;
  readonly size: () => number;
};

/** First character plus every later capital: `smallTest` -> `sT`. */
export const acronymOf = (name: string): string => {
  const [first = '', ...rest] = [...name];
  return first + rest.filter((ch) => ch >= 'A' && ch <= 'Z').join('');
};

const byCodeUnit = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

const matchToken = (names: readonly string[], token: string): readonly string[] => {
  const bySubstring = names.filter((name) => name.includes(token));
  return bySubstring.length > 0 ? bySubstring : names.filter((name) => acronymOf(name) === token);
};

export const createRegistry = (report: DiagnosticsSink = warnToConsole): Registry => {
  const tests = new Map<string, TestDescriptor>();
  const sortedNames = () => [...tests.keys()].sort(byCodeUnit);

  return {
    register: (name, timeLimitMs, body) => {
      if (tests.has(name)) {
        const error = new ConfigurationError(
          `Test ${name} is already registered; the later registration is ignored`,
        );
        report(error);
        return { tag: 'Rejected', error };
      }
      const test: TestDescriptor = { name, timeLimitMs, body };
      tests.set(name, test);
      return { tag: 'Registered', test };
    },
    get: (name) => tests.get(name),
    names: sortedNames,
    select: (tokens) => {
      const names = sortedNames();
      const picked: string[] = [];
      const unmatched: string[] = [];
      for (const token of tokens) {
        const hits = matchToken(names, token);
        if (hits.length === 0) {
          unmatched.push(token);
        }
        picked.push(...hits);
      }
      return {
        names: picked.length === 0 ? names : uniq(picked).sort(byCodeUnit),
        unmatched,
      };
    },
    size: () => tests.size,
  };
};
