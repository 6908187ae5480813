import * as path from 'node:path';

import { deriveArgs, type ParsedArgs, type ReporterName } from './args';
import { Colors } from './colors';
import { loadTestboundConfig, type ResolvedConfig } from './config';
import { detectDebugger, noDebugger } from './debugger-probe';
import { ConfigurationError, type DiagnosticsSink, warnToConsole } from './errors';
import { createPrettyReporter } from './reporters/pretty';
import { createTapReporter } from './reporters/tap';
import { type Reporter, type Write, writeToStdout } from './reporters/types';
import type { RunSummary } from './run-state';
import { createSuite, type Suite, type SuiteModule } from './suite';

export const EXIT_OK = 0;
export const EXIT_TESTS_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  'Usage: testbound [options] [selection...]',
  '',
  'Runs every test whose name contains a selection token, or whose acronym',
  'equals it. With no selection, runs every registered test.',
  '',
  'Options:',
  '  --suite=<file>         suite module to load (repeatable)',
  '  --reporter=tap|pretty  output format (default tap)',
  '  --time-limit=<ms>      limit for tests registered without one (default 500)',
  '  --diagnostics-last     print failure diagnostics after the result line',
  '  --ignore-debugger      enforce time limits even under a debugger',
  '  -h, --help             show this message',
].join('\n');

export const registerSignalHandlersOnce = () => {
  let handled = false;
  const on = (sig: NodeJS.Signals) => {
    if (handled) {
      return;
    }
    handled = true;
    process.stdout.write(`\nReceived ${sig}, exiting...\n`);
    process.exit(130);
  };
  process.once('SIGINT', on);
  process.once('SIGTERM', on);
};

/** Config values as flag tokens, placed ahead of argv so real flags override them. */
export const configTokens = (config: ResolvedConfig): string[] => {
  const tokens: string[] = [];
  const pushIf = (cond: boolean, token: string) => {
    if (cond) {
      tokens.push(token);
    }
  };
  const pushKV = (flag: string, value: string | number) => {
    tokens.push(`${flag}=${String(value)}`);
  };
  for (const suite of config.suites) {
    pushKV('--suite', suite);
  }
  pushKV('--reporter', config.reporter);
  pushKV('--time-limit', config.timeLimitMs);
  pushIf(!config.diagnosticsFirst, '--diagnostics-last');
  pushIf(config.ignoreDebugger, '--ignore-debugger');
  return tokens;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export type SuiteLoader = (absolutePath: string) => Promise<unknown>;

const importSuite: SuiteLoader = (absolutePath) => import(absolutePath);

const toSuiteModule = (loaded: unknown): SuiteModule | undefined => {
  if (!isRecord(loaded)) {
    return undefined;
  }
  const define = loaded.default;
  if (typeof define !== 'function') {
    return undefined;
  }
  return async (suite) => {
    const registered: unknown = define(suite);
    await registered;
  };
};

const makeReporter = (name: ReporterName, args: ParsedArgs, write: Write): Reporter => {
  switch (name) {
    case 'tap':
      return createTapReporter({ write, diagnosticsFirst: args.diagnosticsFirst ?? true });
    case 'pretty':
      return createPrettyReporter({ write });
    default: {
      const neverGuard: never = name;
      return neverGuard;
    }
  }
};

export const exitCodeFor = (summary: RunSummary): number =>
  summary.failed + summary.errored > 0 ? EXIT_TESTS_FAILED : EXIT_OK;

export type ProgramEnv = {
  readonly cwd: string;
  readonly config: ResolvedConfig;
  readonly write?: Write;
  readonly report?: DiagnosticsSink;
  readonly loadSuite?: SuiteLoader;
};

const registerSuites = async (
  suite: Suite,
  files: readonly string[],
  { cwd, loadSuite = importSuite, report = warnToConsole }: ProgramEnv,
): Promise<boolean> => {
  for (const file of files) {
    const absolutePath = path.resolve(cwd, file);
    const define = toSuiteModule(await loadSuite(absolutePath));
    if (!define) {
      report(
        new ConfigurationError(
          `${file} does not export a suite; expected a default export function`,
        ),
      );
      return false;
    }
    await define(suite);
  }
  return true;
};

/** Everything the CLI does short of exiting the process. Resolves to the exit code. */
export const runProgram = async (argv: readonly string[], env: ProgramEnv): Promise<number> => {
  const { config, write = writeToStdout, report = warnToConsole } = env;
  const args = deriveArgs([...configTokens(config), ...argv]);
  if (args.help) {
    write(`${USAGE}\n`);
    return EXIT_OK;
  }
  for (const flag of args.unknownFlags) {
    report(new ConfigurationError(`Unknown option ${flag}`));
  }
  if (args.suites.length === 0) {
    write(
      `${Colors.Failure('No suites to run.')} ` +
        'Pass --suite=<file> or list them in testbound.config.\n',
    );
    return EXIT_USAGE;
  }

  const suite = createSuite({ timeLimitMs: args.timeLimitMs ?? config.timeLimitMs, report });
  if (!(await registerSuites(suite, args.suites, env))) {
    return EXIT_USAGE;
  }
  const summary = await suite.run(args.selection, {
    reporter: makeReporter(args.reporter ?? config.reporter, args, write),
    probe: args.ignoreDebugger ? noDebugger : detectDebugger,
  });
  return exitCodeFor(summary);
};

export const program = async (): Promise<void> => {
  registerSignalHandlersOnce();
  const cwd = process.cwd();
  const config = await loadTestboundConfig(cwd);
  const code = await runProgram(process.argv.slice(2), { cwd, config });
  // Bodies abandoned after their time limit may still hold the event loop open.
  process.exit(code);
};
