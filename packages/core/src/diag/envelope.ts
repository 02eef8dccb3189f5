import {
  type DiagnosticCode,
  type DiagnosticPhase,
  getAllowedDiagnosticPhases,
} from './codes.js';

export interface DiagnosticEnvelope<Details = Record<string, unknown>> {
  code: DiagnosticCode;
  /** Definition-qualified schema path, feature id or document key path */
  canonPath: string;
  phase: DiagnosticPhase;
  details?: Details;
}

export type DiagnosticSummary = Partial<Record<DiagnosticCode, number>>;

export function makeDiagnostic(
  code: DiagnosticCode,
  phase: DiagnosticPhase,
  canonPath: string,
  details?: Record<string, unknown>
): DiagnosticEnvelope {
  if (!getAllowedDiagnosticPhases(code).includes(phase)) {
    throw new Error(`Diagnostic ${code} is not allowed in phase ${phase}`);
  }
  return details === undefined
    ? { code, canonPath, phase }
    : { code, canonPath, phase, details };
}

/**
 * Count diagnostics per code. Keys come out sorted so the summary renders
 * the same way on every run.
 */
export function summarizeDiagnostics(
  diagnostics: readonly DiagnosticEnvelope[]
): DiagnosticSummary {
  const counts = new Map<DiagnosticCode, number>();
  for (const d of diagnostics) {
    counts.set(d.code, (counts.get(d.code) ?? 0) + 1);
  }
  const summary: DiagnosticSummary = {};
  for (const code of [...counts.keys()].sort()) {
    summary[code] = counts.get(code);
  }
  return summary;
}

export function mergeSummaries(
  ...summaries: DiagnosticSummary[]
): DiagnosticSummary {
  const merged = new Map<DiagnosticCode, number>();
  for (const summary of summaries) {
    for (const [code, count] of Object.entries(summary)) {
      if (!isCode(code, summary)) continue;
      merged.set(code, (merged.get(code) ?? 0) + (count ?? 0));
    }
  }
  const out: DiagnosticSummary = {};
  for (const code of [...merged.keys()].sort()) {
    out[code] = merged.get(code);
  }
  return out;
}

function isCode(
  key: string,
  summary: DiagnosticSummary
): key is DiagnosticCode {
  return key in summary;
}
