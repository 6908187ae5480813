import { type RunSummary, successRate } from '../run-state';
import type { Reporter, TestReport, Write } from './types';
import { writeToStdout } from './types';

const COMMENT_PREFIX = '# ';

/** Prefixes every line that is not already a TAP comment. */
export const formatComment = (commentary: string): string =>
  commentary
    .split('\n')
    .map((line) => (line.startsWith(COMMENT_PREFIX) ? line : COMMENT_PREFIX + line))
    .join('\n');

const withDiagnostics = (resultLine: string, diagnostics: string, diagnosticsFirst: boolean) => {
  const comment = formatComment(diagnostics);
  return diagnosticsFirst ? `${comment}\n${resultLine}` : `${resultLine}\n${comment}`;
};

export const formatPassed = (number: number, name: string): string => `ok ${number} - ${name}`;

export const formatFailed = (
  number: number,
  name: string,
  diagnostics: string,
  diagnosticsFirst = true,
): string => withDiagnostics(`not ok ${number} - ${name}`, diagnostics, diagnosticsFirst);

export const formatTestReport = (report: TestReport, diagnosticsFirst = true): string => {
  const { number, name, classification, expectedToFail, diagnostic = '' } = report;
  switch (classification) {
    case 'Success':
      return expectedToFail
        ? withDiagnostics(
            formatPassed(number, name),
            `Test ${number} failed but was expected to fail.`,
            diagnosticsFirst,
          )
        : formatPassed(number, name);
    case 'Failure':
      return formatFailed(number, name, diagnostic, diagnosticsFirst);
    case 'Error':
      return formatFailed(number, name, `ERROR - ${diagnostic}`, diagnosticsFirst);
    default: {
      const neverGuard: never = classification;
      return neverGuard;
    }
  }
};

export const formatSummary = (summary: RunSummary): string => {
  const rate = successRate(summary).toFixed(1);
  const lines = [
    `# testbound: passed ${summary.succeeded} out of ${summary.run} tests, ` +
      `for a success rate of ${rate}%`,
  ];
  if (summary.failedTestNames.length > 0) {
    lines.push(`# Failed tests: ${summary.failedTestNames.join(', ')}`);
  }
  return lines.join('\n');
};

export type TapReporterOptions = {
  readonly write?: Write;
  /** Put a failing test's diagnostics before its result line (the default). */
  readonly diagnosticsFirst?: boolean;
};

/** TAP on stdout: plan line first, then one result per test, then a summary comment. */
export const createTapReporter = ({
  write = writeToStdout,
  diagnosticsFirst = true,
}: TapReporterOptions = {}): Reporter => {
  const line = (text: string) => write(text.endsWith('\n') ? text : `${text}\n`);
  return {
    onPlan: ({ total }) => line(`1..${total}`),
    onTestStart: () => undefined,
    onNote: (message) => line(formatComment(message)),
    onWarning: (message) => line(`# Warning: ${message}`),
    onTestResult: (report) => line(formatTestReport(report, diagnosticsFirst)),
    onSummary: (summary) => line(formatSummary(summary)),
  };
};
