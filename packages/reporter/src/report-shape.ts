import Ajv, { type ErrorObject } from 'ajv';

import type { BatchReport } from './model/report.js';
import batchReportSchema from './schemas/batch-report.schema.json';

const ajv = new Ajv({ allErrors: true, strict: false });
const validateShape = ajv.compile<BatchReport>(batchReportSchema);

function formatError(error: ErrorObject): string {
  return `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`;
}

/** Problems with a parsed report file; empty when it matches the v1 schema */
export function checkReportShape(value: unknown): string[] {
  if (validateShape(value)) return [];
  return (validateShape.errors ?? []).map(formatError);
}

export function isBatchReport(value: unknown): value is BatchReport {
  return validateShape(value);
}
