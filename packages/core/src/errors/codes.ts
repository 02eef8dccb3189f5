/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema Errors (E001–E099)
  UNRESOLVED_REFERENCE = 'E001',
  UNSUPPORTED_CONSTRUCT = 'E002',
  INVALID_SCHEMA_DOCUMENT = 'E010',
  SCHEMA_LOAD_FAILED = 'E011',

  // Model Errors (E100–E199)
  MODEL_PARSE_FAILED = 'E100',
  DUPLICATE_FEATURE_ID = 'E101',

  // Mapping Errors (E200–E299)
  AMBIGUOUS_KEY_PATH = 'E200',
  UNMAPPED_KEY = 'E201',
  MAPPING_TABLE_INVALID = 'E202',

  // Validation Errors (E300–E399)
  CONSTRAINT_VIOLATION = 'E300',

  // Document Errors (E400–E499)
  DOCUMENT_PARSE_FAILED = 'E400',
  DOCUMENT_UNREADABLE = 'E401',
  TRANSLATION_TIMEOUT = 'E402',

  // Configuration Errors (E500–E599)
  CONFIGURATION_ERROR = 'E500',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.UNRESOLVED_REFERENCE]: 10,
  [ErrorCode.UNSUPPORTED_CONSTRUCT]: 11,
  [ErrorCode.INVALID_SCHEMA_DOCUMENT]: 20,
  [ErrorCode.SCHEMA_LOAD_FAILED]: 21,
  [ErrorCode.MODEL_PARSE_FAILED]: 30,
  [ErrorCode.DUPLICATE_FEATURE_ID]: 31,
  [ErrorCode.AMBIGUOUS_KEY_PATH]: 40,
  [ErrorCode.UNMAPPED_KEY]: 41,
  [ErrorCode.MAPPING_TABLE_INVALID]: 42,
  [ErrorCode.CONSTRAINT_VIOLATION]: 50,
  [ErrorCode.DOCUMENT_PARSE_FAILED]: 60,
  [ErrorCode.DOCUMENT_UNREADABLE]: 61,
  [ErrorCode.TRANSLATION_TIMEOUT]: 62,
  [ErrorCode.CONFIGURATION_ERROR]: 70,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
