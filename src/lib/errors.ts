import { Colors } from './colors';

/**
 * A problem with how tests were registered or selected. Reported, never
 * thrown into a run.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

export type DiagnosticsSink = (error: ConfigurationError) => void;

export const warnToConsole: DiagnosticsSink = (error) => {
  // eslint-disable-next-line no-console
  console.warn(Colors.Warn(`Warning: ${error.message}`));
};

/** Sink for reports raised where no runner is listening. */
export const warnToProcess: DiagnosticsSink = (error) => {
  process.emitWarning(error.message, { type: error.name });
};
