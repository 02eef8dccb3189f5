import type { DiagnosticEnvelope } from '../diag/envelope.js';
import { summarizeDiagnostics } from '../diag/envelope.js';
import { ErrorCode } from '../errors/codes.js';
import {
  type SchemaDocument,
  detectRoots,
  extractDefinitions,
} from '../graph/document.js';
import { loadSchemaDocument } from '../graph/loader.js';
import { resolveGraph } from '../graph/schema-graph.js';
import { assembleModel } from '../model/assembler.js';
import { serializeDescriptions, serializeModel } from '../serialize/uvl-writer.js';
import { FatalError, SchemaError } from '../types/errors.js';
import {
  type ResolvedOptions,
  type VarimodelOptions,
  resolveOptions,
} from '../types/options.js';
import { type Result, err, ok } from '../types/result.js';
import { MetricsCollector } from '../util/metrics.js';
import type { BuildModelResult, PipelineStageName } from './types.js';

export interface BuildModelDeps {
  metrics?: MetricsCollector;
}

function isSchemaDocument(value: unknown): value is SchemaDocument {
  return (
    typeof value === 'object' &&
    value !== null &&
    'envelope' in value &&
    'definitions' in value &&
    typeof value.envelope === 'string'
  );
}

function stageFailure(stage: PipelineStageName, error: unknown): FatalError {
  if (error instanceof FatalError) return error;
  const cause = error instanceof Error ? error : new Error(String(error));
  return new FatalError({
    message: `${stage} stage failed: ${cause.message}`,
    errorCode: ErrorCode.INTERNAL_ERROR,
    context: { stage },
    cause,
  });
}

function runStages(
  document: SchemaDocument,
  resolved: ResolvedOptions,
  metrics: MetricsCollector
): BuildModelResult {
  const { namespace } = resolved.build;
  const roots =
    resolved.build.roots.length > 0
      ? resolved.build.roots
      : detectRoots(document.definitions);
  if (roots.length === 0) {
    throw new FatalError({
      message: 'Schema document declares no kinds and no roots were given',
      errorCode: ErrorCode.INVALID_SCHEMA_DOCUMENT,
    });
  }

  const { graph, diagnostics: resolveDiagnostics } = metrics.measure('RESOLVE', () =>
    resolveGraph(document.definitions, roots)
  );
  metrics.addCount('definitionsResolved', graph.size);

  const model = assembleModel(graph, { namespace, metrics });
  const { text, descriptions } = metrics.measure('SERIALIZE', () => ({
    text: serializeModel(model),
    descriptions: serializeDescriptions(model),
  }));

  const diagnostics: DiagnosticEnvelope[] = [...resolveDiagnostics, ...model.warnings];
  return {
    model,
    roots: [...roots],
    text,
    descriptions,
    diagnostics,
    summary: summarizeDiagnostics(diagnostics),
    metrics: metrics.snapshotMetrics(),
  };
}

/**
 * Schema document (any supported envelope, or a bare definition map) →
 * serialized feature model. Recoverable problems end up in `diagnostics`;
 * only an unusable document is an error.
 *
 * @throws {ConfigError} When `options` are out of range
 */
export function buildModel(
  document: unknown,
  options: VarimodelOptions = {},
  deps: BuildModelDeps = {}
): Result<BuildModelResult, FatalError> {
  const resolved = resolveOptions(options);
  const metrics = deps.metrics ?? new MetricsCollector();
  let schema: SchemaDocument;
  if (isSchemaDocument(document)) {
    schema = document;
  } else {
    const extracted = extractDefinitions(document);
    if (extracted.isErr()) return err(extracted.error);
    schema = extracted.value;
  }
  try {
    return ok(runStages(schema, resolved, metrics));
  } catch (error) {
    return err(stageFailure('build', error));
  }
}

export async function buildModelFromFile(
  path: string,
  options: VarimodelOptions = {},
  deps: BuildModelDeps = {}
): Promise<Result<BuildModelResult, FatalError>> {
  const metrics = deps.metrics ?? new MetricsCollector();
  metrics.begin('LOAD');
  const loaded = await loadSchemaDocument(path).finally(() => metrics.end('LOAD'));
  if (loaded.isErr()) return err(loaded.error);
  return buildModel(loaded.value, options, { metrics });
}

function describeSchemaWarning(d: DiagnosticEnvelope): string {
  if (d.code === 'UNRESOLVED_REFERENCE') {
    return `Unresolved reference ${String(d.details?.ref)} from ${d.canonPath}`;
  }
  const keywords = d.details?.keywords;
  const listed = Array.isArray(keywords) ? keywords.join(', ') : String(keywords);
  return `Unsupported keyword(s) ${listed} in ${d.canonPath}`;
}

/**
 * The first schema warning of a build as a `SchemaError`, for callers that
 * refuse a degraded model. Undefined when every reference resolved and every
 * construct was supported.
 */
export function schemaErrorOf(
  diagnostics: readonly DiagnosticEnvelope[]
): SchemaError | undefined {
  const warnings = diagnostics.filter(
    (d) => d.code === 'UNRESOLVED_REFERENCE' || d.code === 'UNSUPPORTED_CONSTRUCT'
  );
  const [first] = warnings;
  if (first === undefined) return undefined;
  const more = warnings.length - 1;
  return new SchemaError({
    message:
      more > 0
        ? `${describeSchemaWarning(first)} (and ${more} more schema warning(s))`
        : describeSchemaWarning(first),
    errorCode:
      first.code === 'UNRESOLVED_REFERENCE'
        ? ErrorCode.UNRESOLVED_REFERENCE
        : ErrorCode.UNSUPPORTED_CONSTRUCT,
    context: { schemaPath: first.canonPath, value: first.details },
    severity: 'error',
  });
}
