import { describe, expect, it } from 'vitest';

import { createLogger, logDiagnostics } from './log.js';

function collect(verbose: boolean): { lines: string[]; logger: ReturnType<typeof createLogger> } {
  const lines: string[] = [];
  return { lines, logger: createLogger(verbose, (text) => lines.push(text)) };
}

describe('logger', () => {
  it('prefixes lines and hides debug output unless verbose', () => {
    const quiet = collect(false);
    quiet.logger.debug('hidden');
    quiet.logger.warn('shown');
    expect(quiet.lines).toEqual(['[varimodel] shown\n']);

    const loud = collect(true);
    loud.logger.debug('visible');
    expect(loud.lines).toEqual(['[varimodel] visible\n']);
  });

  it('logs each diagnostic under verbose and always the summary', () => {
    const { lines, logger } = collect(true);
    logDiagnostics(
      logger,
      [
        { code: 'KIND_MERGED', canonPath: 'PodAlias', phase: 'assemble', details: { into: 'Pod' } },
        { code: 'RECURSION_CUT', canonPath: 'Node.child', phase: 'synthesize' },
      ],
      { KIND_MERGED: 1, RECURSION_CUT: 1 }
    );
    expect(lines).toEqual([
      '[varimodel] assemble KIND_MERGED @ PodAlias {"into":"Pod"}\n',
      '[varimodel] synthesize RECURSION_CUT @ Node.child\n',
      '[varimodel] diagnostics: {"KIND_MERGED":1,"RECURSION_CUT":1}\n',
    ]);
  });

  it('stays silent without diagnostics', () => {
    const { lines, logger } = collect(false);
    logDiagnostics(logger, [], {});
    expect(lines).toEqual([]);
  });
});
