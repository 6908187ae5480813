import { loadConfig } from 'c12';

import type { ReporterName } from './args';
import { DEFAULT_TIME_LIMIT_MS } from './suite';

/** Shape of `testbound.config.*` / `.testboundrc` as written by users. */
export type TestboundConfig = {
  readonly suites?: readonly string[];
  readonly timeLimitMs?: number;
  readonly reporter?: ReporterName;
  readonly diagnosticsFirst?: boolean;
  readonly ignoreDebugger?: boolean;
};

export type ResolvedConfig = {
  readonly suites: readonly string[];
  readonly timeLimitMs: number;
  readonly reporter: ReporterName;
  readonly diagnosticsFirst: boolean;
  readonly ignoreDebugger: boolean;
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  suites: [],
  timeLimitMs: DEFAULT_TIME_LIMIT_MS,
  reporter: 'tap',
  diagnosticsFirst: true,
  ignoreDebugger: false,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringList = (value: unknown): readonly string[] | undefined => {
  if (typeof value === 'string') {
    return [value];
  }
  return Array.isArray(value)
    ? value.filter((entry): entry is string => typeof entry === 'string')
    : undefined;
};

/**
 * Fills in defaults and drops values of the wrong type; a loaded config file
 * is untyped until it passes through here.
 */
export const normalizeConfig = (raw: unknown): ResolvedConfig => {
  if (!isRecord(raw)) {
    return DEFAULT_CONFIG;
  }
  const { suites, timeLimitMs, reporter, diagnosticsFirst, ignoreDebugger } = raw;
  return {
    suites: stringList(suites) ?? DEFAULT_CONFIG.suites,
    timeLimitMs:
      typeof timeLimitMs === 'number' && Number.isFinite(timeLimitMs)
        ? timeLimitMs
        : DEFAULT_CONFIG.timeLimitMs,
    reporter: reporter === 'tap' || reporter === 'pretty' ? reporter : DEFAULT_CONFIG.reporter,
    diagnosticsFirst:
      typeof diagnosticsFirst === 'boolean' ? diagnosticsFirst : DEFAULT_CONFIG.diagnosticsFirst,
    ignoreDebugger:
      typeof ignoreDebugger === 'boolean' ? ignoreDebugger : DEFAULT_CONFIG.ignoreDebugger,
  };
};

export const loadTestboundConfig = async (cwd = process.cwd()): Promise<ResolvedConfig> => {
  const { config } = await loadConfig<TestboundConfig>({
    name: 'testbound',
    cwd,
    defaults: {},
  });
  return normalizeConfig(config);
};
