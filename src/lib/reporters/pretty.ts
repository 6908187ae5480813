import { Colors, type Palette, supportsUnicode } from '../colors';
import type { RunSummary } from '../run-state';
import type { Reporter, TestReport, Write } from './types';
import { writeToStdout } from './types';

type Glyphs = { readonly pass: string; readonly fail: string; readonly error: string };

const unicodeGlyphs: Glyphs = { pass: '✓', fail: '×', error: '!' };
const asciiGlyphs: Glyphs = { pass: '+', fail: 'x', error: '!' };

const indent = (text: string, pad: string): string =>
  text
    .split('\n')
    .map((line) => pad + line.replace(/^\t/, ''))
    .join('\n');

const formatElapsed = (ms: number): string => `${Math.round(ms)}ms`;

export const formatPrettyResult = (
  report: TestReport,
  palette: Palette,
  glyphs: Glyphs = unicodeGlyphs,
): string => {
  const title = `${report.name} ${palette.dim(`(${formatElapsed(report.elapsedMs)})`)}`;
  const inverted = report.expectedToFail ? ` ${palette.dim('[expected to fail]')}` : '';
  switch (report.classification) {
    case 'Success':
      return `  ${palette.Success(glyphs.pass)} ${title}${inverted}`;
    case 'Failure':
      return [
        `  ${palette.Failure(glyphs.fail)} ${palette.bold(report.name)}${inverted}`,
        palette.Failure(indent(report.diagnostic ?? '', '      ')),
      ].join('\n');
    case 'Error':
      return [
        `  ${palette.Error(glyphs.error)} ${palette.bold(report.name)}${inverted}`,
        palette.Error(indent(report.diagnostic ?? '', '      ')),
      ].join('\n');
    default: {
      const neverGuard: never = report.classification;
      return neverGuard;
    }
  }
};

export const formatPrettySummary = (summary: RunSummary, palette: Palette): string => {
  const parts = [
    palette.Success(`${summary.succeeded} passing`),
    ...(summary.failed > 0 ? [palette.Failure(`${summary.failed} failing`)] : []),
    ...(summary.errored > 0 ? [palette.Error(`${summary.errored} errors`)] : []),
  ];
  const total = palette.dim(`(${summary.run})`);
  return `${palette.bold('Tests')}  ${parts.join(palette.dim(' | '))} ${total}`;
};

export type PrettyReporterOptions = {
  readonly write?: Write;
  readonly palette?: Palette;
  readonly unicode?: boolean;
};

/** Human-oriented output: one line per test, diagnostics indented under failures. */
export const createPrettyReporter = ({
  write = writeToStdout,
  palette = Colors,
  unicode = supportsUnicode(),
}: PrettyReporterOptions = {}): Reporter => {
  const glyphs = unicode ? unicodeGlyphs : asciiGlyphs;
  const line = (text: string) => write(`${text}\n`);
  return {
    onPlan: ({ total }) => line(`${palette.bold('RUN')} ${palette.dim(`${total} tests`)}`),
    onTestStart: () => undefined,
    onNote: (message) => line(palette.Note(message)),
    onWarning: (message) => line(palette.Warn(`Warning: ${message}`)),
    onTestResult: (report) => line(formatPrettyResult(report, palette, glyphs)),
    onSummary: (summary) => {
      line('');
      line(formatPrettySummary(summary, palette));
    },
  };
};
