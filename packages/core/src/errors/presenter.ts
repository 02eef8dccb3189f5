/**
 * ErrorPresenter - pure presentation layer for VarimodelError instances
 * - No business logic; formats into environment-specific view objects
 */

import { ErrorCode } from './codes.js';
import type { ErrorContext, SerializedError, VarimodelError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  workaround?: string;
  colors: boolean;
}

const HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_SCHEMA_DOCUMENT]:
    'Pass a document with a top-level "definitions" object, or name the kinds with --root',
  [ErrorCode.SCHEMA_LOAD_FAILED]: 'Check that the schema file exists and is valid JSON or YAML',
  [ErrorCode.MODEL_PARSE_FAILED]: 'Regenerate the model with `varimodel build`',
  [ErrorCode.AMBIGUOUS_KEY_PATH]:
    'Drop one of the conflicting rows, or make one pattern more specific',
  [ErrorCode.MAPPING_TABLE_INVALID]:
    'Rows are key-path, feature-id, value-kind separated by a tab or comma',
  [ErrorCode.TRANSLATION_TIMEOUT]: 'Raise the budget with --time-budget',
  [ErrorCode.CONSTRAINT_VIOLATION]: 'Run without --fail-fast for the full report',
  [ErrorCode.UNRESOLVED_REFERENCE]: 'Run without --strict to drop the unresolved branch',
  [ErrorCode.UNSUPPORTED_CONSTRUCT]: 'Run without --strict to model the construct as opaque',
  [ErrorCode.CONFIGURATION_ERROR]: 'Run with --help to see accepted values',
};

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: VarimodelError): CLIErrorView {
    const location = this.#formatLocation(error.context);
    const workaround = error.suggestions?.[0] ?? HINTS[error.errorCode];
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      ...(location !== undefined ? { location } : {}),
      ...(workaround !== undefined ? { workaround } : {}),
      colors: this.#shouldUseColors(this.options.colors),
    };
  }

  formatForProduction(error: VarimodelError): SerializedError {
    return error.toJSON(this.env);
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.file ?? ctx.schemaPath ?? ctx.keyPath ?? ctx.featureId;
    if (loc === undefined) return undefined;
    const line = typeof ctx.line === 'number' ? `:${ctx.line}` : '';
    return `Location: ${loc}${line}`;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}

/** Plain multi-line rendering of a CLI view */
export function renderCLIErrorView(view: CLIErrorView): string {
  const red = (s: string): string => (view.colors ? `\u001b[31m${s}\u001b[39m` : s);
  const lines = [red(view.title)];
  if (view.location) lines.push(`  ${view.location}`);
  if (view.workaround) lines.push(`  Hint: ${view.workaround}`);
  return lines.join('\n');
}
