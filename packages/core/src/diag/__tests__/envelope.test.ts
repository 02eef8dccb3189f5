import { describe, expect, it } from 'vitest';
import {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  getAllowedDiagnosticPhases,
  isKnownDiagnosticCode,
} from '../codes.js';
import { makeDiagnostic, mergeSummaries, summarizeDiagnostics } from '../envelope.js';

describe('diagnostic codes', () => {
  it('every code has at least one allowed phase', () => {
    for (const code of Object.values(DIAGNOSTIC_CODES)) {
      expect(getAllowedDiagnosticPhases(code).length).toBeGreaterThan(0);
    }
  });

  it('recognises known codes only', () => {
    expect(isKnownDiagnosticCode('UNMAPPED_KEY')).toBe(true);
    expect(isKnownDiagnosticCode('NOT_A_CODE')).toBe(false);
  });
});

describe('makeDiagnostic', () => {
  it('builds an envelope, omitting absent details', () => {
    expect(
      makeDiagnostic(DIAGNOSTIC_CODES.UNMAPPED_KEY, DIAGNOSTIC_PHASES.TRANSLATE, 'foo.bar')
    ).toEqual({ code: 'UNMAPPED_KEY', canonPath: 'foo.bar', phase: 'translate' });
    const withDetails = makeDiagnostic(
      DIAGNOSTIC_CODES.KIND_MERGED,
      DIAGNOSTIC_PHASES.ASSEMBLE,
      'Pod',
      { gvks: ['v1 Pod'] }
    );
    expect(withDetails.details).toEqual({ gvks: ['v1 Pod'] });
  });

  it('rejects a code emitted from the wrong phase', () => {
    expect(() =>
      makeDiagnostic(DIAGNOSTIC_CODES.UNMAPPED_KEY, DIAGNOSTIC_PHASES.RESOLVE, 'x')
    ).toThrow('Diagnostic UNMAPPED_KEY is not allowed in phase resolve');
  });
});

describe('summaries', () => {
  it('counts per code with sorted keys', () => {
    const summary = summarizeDiagnostics([
      makeDiagnostic(DIAGNOSTIC_CODES.UNMAPPED_KEY, DIAGNOSTIC_PHASES.TRANSLATE, 'a'),
      makeDiagnostic(DIAGNOSTIC_CODES.DOCUMENT_SKIPPED, DIAGNOSTIC_PHASES.BATCH, 'b'),
      makeDiagnostic(DIAGNOSTIC_CODES.UNMAPPED_KEY, DIAGNOSTIC_PHASES.TRANSLATE, 'c'),
    ]);
    expect(Object.keys(summary)).toEqual(['DOCUMENT_SKIPPED', 'UNMAPPED_KEY']);
    expect(summary.UNMAPPED_KEY).toBe(2);
  });

  it('merges summaries', () => {
    expect(
      mergeSummaries({ UNMAPPED_KEY: 2 }, { UNMAPPED_KEY: 1, RECURSION_CUT: 4 })
    ).toEqual({ RECURSION_CUT: 4, UNMAPPED_KEY: 3 });
  });
});
