import type { DiagnosticEnvelope, DiagnosticSummary } from '@varimodel/core';

export const LOG_PREFIX = '[varimodel]';

export interface Logger {
  readonly verbose: boolean;
  /** Always written */
  warn(message: string): void;
  /** Written only under --verbose */
  debug(message: string): void;
}

export function createLogger(
  verbose: boolean,
  write: (text: string) => unknown = (text) => process.stderr.write(text)
): Logger {
  return {
    verbose,
    warn(message) {
      write(`${LOG_PREFIX} ${message}\n`);
    },
    debug(message) {
      if (verbose) write(`${LOG_PREFIX} ${message}\n`);
    },
  };
}

export function formatDiagnostic(diagnostic: DiagnosticEnvelope): string {
  const details = diagnostic.details === undefined ? '' : ` ${JSON.stringify(diagnostic.details)}`;
  return `${diagnostic.phase} ${diagnostic.code} @ ${diagnostic.canonPath}${details}`;
}

/** Each diagnostic under --verbose; the per-code summary always, when non-empty */
export function logDiagnostics(
  logger: Logger,
  diagnostics: readonly DiagnosticEnvelope[],
  summary: DiagnosticSummary
): void {
  diagnostics.forEach((d) => logger.debug(formatDiagnostic(d)));
  if (Object.keys(summary).length > 0) {
    logger.warn(`diagnostics: ${JSON.stringify(summary)}`);
  }
}
