/**
 * Diagnostic codes for recoverable conditions.
 *
 * Every code is tied to the phases allowed to emit it; envelopes built with
 * a code outside its phases are rejected by `makeDiagnostic`.
 */

export const DIAGNOSTIC_PHASES = {
  RESOLVE: 'resolve',
  SYNTHESIZE: 'synthesize',
  DERIVE: 'derive',
  ASSEMBLE: 'assemble',
  MAPPING: 'mapping',
  TRANSLATE: 'translate',
  BATCH: 'batch',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  UNRESOLVED_REFERENCE: 'UNRESOLVED_REFERENCE',
  UNSUPPORTED_CONSTRUCT: 'UNSUPPORTED_CONSTRUCT',
  FEATURE_ALIASED: 'FEATURE_ALIASED',
  FEATURE_ID_COLLISION: 'FEATURE_ID_COLLISION',
  RESERVED_NAME_ESCAPED: 'RESERVED_NAME_ESCAPED',
  RECURSION_CUT: 'RECURSION_CUT',
  FEATURE_SHARED: 'FEATURE_SHARED',
  KIND_MERGED: 'KIND_MERGED',
  CONSTRAINT_CONFLICT: 'CONSTRAINT_CONFLICT',
  CONSTRAINT_TARGET_MISSING: 'CONSTRAINT_TARGET_MISSING',
  CONSTRAINT_DANGLING_REFERENCE: 'CONSTRAINT_DANGLING_REFERENCE',
  AMBIGUOUS_KEY_PATH: 'AMBIGUOUS_KEY_PATH',
  UNMAPPED_KEY: 'UNMAPPED_KEY',
  DOCUMENT_SKIPPED: 'DOCUMENT_SKIPPED',
  DOCUMENT_PARSE_FAILED: 'DOCUMENT_PARSE_FAILED',
  TRANSLATION_TIMEOUT: 'TRANSLATION_TIMEOUT',
  CHECKPOINT_STALE: 'CHECKPOINT_STALE',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

const PHASES_BY_CODE: Record<DiagnosticCode, readonly DiagnosticPhase[]> = {
  UNRESOLVED_REFERENCE: ['resolve'],
  UNSUPPORTED_CONSTRUCT: ['resolve'],
  FEATURE_ALIASED: ['synthesize'],
  FEATURE_ID_COLLISION: ['synthesize'],
  RESERVED_NAME_ESCAPED: ['synthesize'],
  RECURSION_CUT: ['synthesize'],
  FEATURE_SHARED: ['synthesize'],
  KIND_MERGED: ['assemble'],
  CONSTRAINT_CONFLICT: ['derive'],
  CONSTRAINT_TARGET_MISSING: ['derive'],
  CONSTRAINT_DANGLING_REFERENCE: ['assemble'],
  AMBIGUOUS_KEY_PATH: ['mapping'],
  UNMAPPED_KEY: ['translate'],
  DOCUMENT_SKIPPED: ['batch'],
  DOCUMENT_PARSE_FAILED: ['batch', 'translate'],
  TRANSLATION_TIMEOUT: ['translate', 'batch'],
  CHECKPOINT_STALE: ['batch'],
};

export function getAllowedDiagnosticPhases(
  code: DiagnosticCode
): readonly DiagnosticPhase[] {
  return PHASES_BY_CODE[code];
}

export function isKnownDiagnosticCode(value: string): value is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(PHASES_BY_CODE, value);
}
