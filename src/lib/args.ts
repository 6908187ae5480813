export type ReporterName = 'tap' | 'pretty';

export type Action =
  | { readonly type: 'reporter'; readonly value: ReporterName }
  | { readonly type: 'suite'; readonly value: string }
  | { readonly type: 'timeLimit'; readonly value: number }
  | { readonly type: 'diagnosticsFirst'; readonly value: boolean }
  | { readonly type: 'ignoreDebugger'; readonly value: boolean }
  | { readonly type: 'help' }
  | { readonly type: 'selection'; readonly value: string }
  | { readonly type: 'unknownFlag'; readonly value: string };

export const ActionBuilders = {
  reporter: (value: ReporterName): Action => ({ type: 'reporter', value }),
  suite: (value: string): Action => ({ type: 'suite', value }),
  timeLimit: (value: number): Action => ({ type: 'timeLimit', value }),
  diagnosticsFirst: (value: boolean): Action => ({ type: 'diagnosticsFirst', value }),
  ignoreDebugger: (value: boolean): Action => ({ type: 'ignoreDebugger', value }),
  help: (): Action => ({ type: 'help' }),
  selection: (value: string): Action => ({ type: 'selection', value }),
  unknownFlag: (value: string): Action => ({ type: 'unknownFlag', value }),
} as const;

type State = { readonly actions: readonly Action[]; readonly skipNext: boolean };
export type Step = readonly [readonly Action[], boolean];
export type RuleEnv = { readonly lookahead?: string };
type Opt<T> = { readonly _tag: 'some'; readonly value: T } | { readonly _tag: 'none' };
const Some = <T>(value: T): Opt<T> => ({ _tag: 'some', value });
const None: Opt<never> = { _tag: 'none' } as const;
const isSome = <T>(opt: Opt<T>): opt is { readonly _tag: 'some'; readonly value: T } =>
  opt._tag === 'some';

const step = (actions: readonly Action[], skipNext = false): Step => [actions, skipNext] as const;

export type Rule = (value: string, env: RuleEnv) => Opt<Step>;
export const rule = {
  when:
    (
      predicate: (value: string, env: RuleEnv) => boolean,
      build: (value: string, env: RuleEnv) => Step,
    ): Rule =>
    (value, env) =>
      predicate(value, env) ? Some(build(value, env)) : None,
  eq: (flag: string, build: () => Step): Rule =>
    rule.when(
      (value) => value === flag,
      () => build(),
    ),
  startsWith: (prefix: string, build: (value: string) => Step): Rule =>
    rule.when(
      (value) => value.startsWith(prefix),
      (value) => build(value),
    ),
  withLookahead:
    (lookaheadFlag: string, build: (flagToken: string, lookahead: string) => Step): Rule =>
    (value, env) =>
      value === lookaheadFlag && env.lookahead !== undefined && env.lookahead.length > 0
        ? Some(build(value, env.lookahead))
        : None,
} as const;

const valueAfterEquals = (token: string): string => token.slice(token.indexOf('=') + 1).trim();

export const isTruthy = (value: string): boolean =>
  value === 'true' || value === '1' || value === '';

const parseReporter = (raw: string): ReporterName =>
  raw.trim().toLowerCase() === 'pretty' ? 'pretty' : 'tap';

const timeLimitStep = (raw: string, skipNext: boolean): Step => {
  const limit = Number(raw);
  return step(Number.isFinite(limit) ? [ActionBuilders.timeLimit(limit)] : [], skipNext);
};

const RULES: readonly Rule[] = [
  rule.when(
    (value) => value === '--help' || value === '-h',
    () => step([ActionBuilders.help()]),
  ),
  rule.startsWith('--reporter=', (value) =>
    step([ActionBuilders.reporter(parseReporter(valueAfterEquals(value)))]),
  ),
  rule.withLookahead('--reporter', (_flag, lookahead) =>
    step([ActionBuilders.reporter(parseReporter(lookahead))], true),
  ),
  rule.startsWith('--suite=', (value) => step([ActionBuilders.suite(valueAfterEquals(value))])),
  rule.withLookahead('--suite', (_flag, lookahead) =>
    step([ActionBuilders.suite(lookahead)], true),
  ),
  rule.startsWith('--time-limit=', (value) => timeLimitStep(valueAfterEquals(value), false)),
  rule.withLookahead('--time-limit', (_flag, lookahead) => timeLimitStep(lookahead, true)),
  rule.eq('--diagnostics-first', () => step([ActionBuilders.diagnosticsFirst(true)])),
  rule.eq('--diagnostics-last', () => step([ActionBuilders.diagnosticsFirst(false)])),
  rule.eq('--ignore-debugger', () => step([ActionBuilders.ignoreDebugger(true)])),
  rule.startsWith('--ignore-debugger=', (value) =>
    step([ActionBuilders.ignoreDebugger(isTruthy(valueAfterEquals(value).toLowerCase()))]),
  ),
  rule.when(
    (value) => value.startsWith('-') && value.length > 1,
    (value) => step([ActionBuilders.unknownFlag(value)]),
  ),
];

const firstMatch = (rules: readonly Rule[], value: string, env: RuleEnv): Opt<Step> => {
  for (const ruleFn of rules) {
    const match = ruleFn(value, env);
    if (isSome(match)) {
      return match;
    }
  }
  return None;
};

export const parseActionsFromTokens = (tokens: readonly string[]): readonly Action[] => {
  const init: State = { actions: [], skipNext: false };
  const final = tokens.reduce<State>((state, token, index) => {
    if (state.skipNext) {
      return { actions: state.actions, skipNext: false };
    }
    const nextToken = tokens[index + 1];
    const env: RuleEnv =
      typeof nextToken === 'string' && nextToken.length > 0 ? { lookahead: nextToken } : {};
    const matched = firstMatch(RULES, token, env);
    const [actions, skipNext] = isSome(matched)
      ? matched.value
      : step([ActionBuilders.selection(token)]);
    return { actions: [...state.actions, ...actions], skipNext };
  }, init);
  return final.actions;
};

export type ParsedArgs = {
  readonly reporter?: ReporterName;
  readonly suites: readonly string[];
  readonly timeLimitMs?: number;
  readonly diagnosticsFirst?: boolean;
  readonly ignoreDebugger?: boolean;
  readonly help: boolean;
  /** Positional tokens handed to test selection. */
  readonly selection: readonly string[];
  readonly unknownFlags: readonly string[];
};

const emptyArgs: ParsedArgs = { suites: [], help: false, selection: [], unknownFlags: [] };

const toContrib = (action: Action): Partial<ParsedArgs> => {
  switch (action.type) {
    case 'reporter':
      return { reporter: action.value };
    case 'suite':
      return { suites: [action.value] };
    case 'timeLimit':
      return { timeLimitMs: action.value };
    case 'diagnosticsFirst':
      return { diagnosticsFirst: action.value };
    case 'ignoreDebugger':
      return { ignoreDebugger: action.value };
    case 'help':
      return { help: true };
    case 'selection':
      return { selection: [action.value] };
    case 'unknownFlag':
      return { unknownFlags: [action.value] };
    default: {
      const neverGuard: never = action;
      return neverGuard;
    }
  }
};

/** Lists accumulate; for single values the later token wins. */
export const combineContrib = (left: ParsedArgs, right: Partial<ParsedArgs>): ParsedArgs => ({
  ...left,
  ...(right.reporter !== undefined ? { reporter: right.reporter } : {}),
  ...(right.timeLimitMs !== undefined ? { timeLimitMs: right.timeLimitMs } : {}),
  ...(right.diagnosticsFirst !== undefined ? { diagnosticsFirst: right.diagnosticsFirst } : {}),
  ...(right.ignoreDebugger !== undefined ? { ignoreDebugger: right.ignoreDebugger } : {}),
  help: left.help || Boolean(right.help),
  suites: [...left.suites, ...(right.suites ?? [])],
  selection: [...left.selection, ...(right.selection ?? [])],
  unknownFlags: [...left.unknownFlags, ...(right.unknownFlags ?? [])],
});

export const deriveArgs = (argv: readonly string[]): ParsedArgs =>
  parseActionsFromTokens(argv).map(toContrib).reduce(combineContrib, emptyArgs);
