// @varimodel/core entry point
//
// Schema document → feature model: loadSchemaDocument / buildModel
// (resolve, synthesize, derive, assemble, serialize).
// Configuration documents → selections → validation reports:
// deriveKeyMappings / loadMappingTable, translateDocument, validateSelection,
// and runValidationBatch for whole corpora.

// Errors
export { ErrorCode, type Severity, EXIT_CODES, getExitCode } from './errors/codes.js';
export {
  VarimodelError,
  SchemaError,
  MappingError,
  ValidationError,
  FatalError,
  ConfigError,
  isVarimodelError,
  toError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { type Result, Ok, Err, ok, err, isOk, isErr } from './types/result.js';
export {
  ErrorPresenter,
  renderCLIErrorView,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Options
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type BuildOptions,
  type BatchOptions,
  type VarimodelOptions,
  type ResolvedOptions,
} from './types/options.js';

// Diagnostics and metrics
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  type DiagnosticCode,
  type DiagnosticPhase,
  getAllowedDiagnosticPhases,
  isKnownDiagnosticCode,
} from './diag/codes.js';
export {
  makeDiagnostic,
  summarizeDiagnostics,
  mergeSummaries,
  type DiagnosticEnvelope,
  type DiagnosticSummary,
} from './diag/envelope.js';
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
} from './util/metrics.js';

// Schema graph
export type {
  Definition,
  DefinitionKind,
  Literal,
  ScalarType,
} from './graph/definition.js';
export {
  extractDefinitions,
  detectRoots,
  type DefinitionMap,
  type SchemaDocument,
} from './graph/document.js';
export { checkSchemaDocument, loadSchemaDocument } from './graph/loader.js';
export { SchemaGraph, resolveGraph, type ResolveResult } from './graph/schema-graph.js';

// Synthesis, constraints, assembly
export { synthesizeKind, type KindTree, type Binding } from './synth/synthesizer.js';
export {
  type Expr,
  type Constraint,
  type ConstraintKind,
  type DerivationTrace,
  evaluate,
  renderExpr,
  variables,
} from './constraints/expression.js';
export { DERIVATION_RULES, type DerivationRule } from './constraints/rules.js';
export { deriveConstraints, findConflicts } from './constraints/deriver.js';
export { assembleModel, planKinds } from './model/assembler.js';
export {
  type FeatureModel,
  type FeatureNode,
  type FeatureAttributes,
  type GroupType,
  type Cardinality,
  type ValueType,
  type ModelIndex,
  indexModel,
  walkFeatures,
  countFeatures,
} from './model/feature-model.js';

// Serialization
export {
  serializeModel,
  serializeDescriptions,
  renderConstraint,
} from './serialize/uvl-writer.js';
export { parseModel, parseExpr, loadModel } from './serialize/uvl-parser.js';

// Key mapping
export {
  type KeyPattern,
  type PathSegment,
  type PatternSegment,
  formatPath,
  formatPattern,
  parsePattern,
  matches,
  KeyPathSyntaxError,
} from './mapping/key-path.js';
export {
  KeyMapper,
  type KeyMappingEntry,
  type KeyMappingConflict,
  type ValueKind,
  describeConflict,
} from './mapping/key-mapper.js';
export { deriveKeyMappings, valueKindOf, type DerivedMapping } from './mapping/derive.js';
export {
  parseMappingTable,
  formatMappingTable,
  loadMappingTable,
} from './mapping/table-format.js';

// Translation and validation
export {
  loadDocuments,
  readDocumentFile,
  type LoadedDocument,
  type DocumentStatus,
} from './translate/document-loader.js';
export {
  translateDocument,
  findKindFeature,
  markerId,
  parseMarkerId,
  type ConfigurationSelection,
  type TranslateOptions,
} from './translate/translator.js';
export {
  validateSelection,
  type ValidationResult,
  type Violation,
  type ViolationRule,
} from './validate/model-validator.js';

// Pipeline
export { buildModel, buildModelFromFile, schemaErrorOf } from './pipeline/orchestrator.js';
export {
  runValidationBatch,
  discoverDocumentFiles,
  summarizeReports,
  toSummaryRows,
  type ValidationBatchOptions,
} from './pipeline/batch-harness.js';
export { WorkPool } from './pipeline/work-pool.js';
export { Checkpoint } from './pipeline/checkpoint.js';
export type {
  BuildModelResult,
  BatchRunResult,
  BatchSummary,
  DocumentReport,
  SummaryRow,
} from './pipeline/types.js';

// Model evolution
export { diffModels, isEmptyDiff, type ModelDiff, type FeatureChange } from './diff/model-diff.js';
