/**
 * swagger-sync — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { loadConfig, runSync } from 'swagger-sync';
 *
 * const report = runSync({ config: loadConfig() });
 * if (report.operations.changed) console.log(report.operations.notes.join('\n'));
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeConfig, mergePartial, normalizeCoverageThreshold, DEFAULT_CONFIG, ConfigFileSchema } from './config/SyncConfig.js';
export type {
    SyncConfig, SyncMode, ColorMode, MarkerConfig,
    IgnoreConfig, SyncOptions, OutputConfig, PartialConfig,
} from './config/SyncConfig.js';
export { loadConfig, applyCliOverrides, findConfigFile, parseConfigFile, CONFIG_FILENAMES } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';

// ── Errors & Observability ───────────────────────────────
export { OpenApiBlockError, MethodMismatchError, ConfigError, SwaggerFileError } from './errors.js';
export { createSyncObserver, colorizeDiff } from './observability/SyncObserver.js';
export type { SyncEvent, SyncObserverFn, ConsoleObserverOptions } from './observability/SyncObserver.js';

// ── Scanning ─────────────────────────────────────────────
export { ScanSession } from './ScanSession.js';
export type { ScanSessionOptions } from './ScanSession.js';
export { scanEndpoints } from './scanner/EndpointScanner.js';
export { scanModels } from './scanner/ModelScanner.js';
export { extractOpenApiBlock, findOpenApiBlocks, DEFAULT_MARKERS } from './scanner/OpenApiBlock.js';
export type { BlockMarkers } from './scanner/OpenApiBlock.js';
export type {
    Endpoint, IgnoredEndpoint, EndpointScanResult, ModelScanResult,
    ComponentMap, SchemaObject, SwaggerDocument, OpenApiMap,
} from './types.js';

// ── Type Inference ───────────────────────────────────────
export {
    buildSchemaFromAnnotation, unwrapOptional, flattenNestedUnions,
    extractUnionSchema, extractLiteralSchema,
} from './schema/TypeAnnotations.js';
export { inferPropertySchema, resolveHintSchema } from './schema/PropertySchema.js';
export { TypeAliasRegistry, expandTypeAliases } from './schema/TypeAliasRegistry.js';
export type { TypeAliasRecord, AliasMap } from './schema/TypeAliasRegistry.js';

// ── Merge & Diff ─────────────────────────────────────────
export { mergeEndpointMetadata, deepMerge } from './merge/MetadataMerge.js';
export type { MergeResult } from './merge/MetadataMerge.js';
export { mergeEndpoints, detectOrphans, syncComponents } from './merge/SwaggerMerge.js';
export type { EndpointMergeResult, ComponentSyncResult, OperationDiff } from './merge/SwaggerMerge.js';
export { unifiedDiff, dumpYamlLines } from './merge/UnifiedDiff.js';
export { toOpenApiOperation, resolveEndpointMetadata, describeEndpoint } from './endpoint/Endpoint.js';

// ── Validation & Coverage ────────────────────────────────
export { validateEndpointMetadata, formatValidationReport, ValidationSeverity } from './validation/Validator.js';
export type { ValidationIssue, ValidationContext } from './validation/Validator.js';
export { computeCoverage } from './coverage/Coverage.js';
export type { CoverageResult, CoverageSummary, EndpointCoverage } from './coverage/Coverage.js';
export { formatCoverageSummary, renderCoverageJson, renderCoverageText } from './coverage/CoverageReport.js';

// ── Runner ───────────────────────────────────────────────
export { loadSwagger, saveSwagger, dumpSwagger } from './swagger/SwaggerFile.js';
export { runSync, listEndpoints, exitCodeFor, hasDrift } from './SyncRunner.js';
export type { SyncReport, SyncRunOptions } from './SyncRunner.js';
