/**
 * SyncRunner — One Complete Sync Pass
 *
 * Scan handlers and models, reconcile them with the swagger document,
 * validate, measure coverage, and (in fix mode) write the document back.
 * Returns everything the CLI needs to report; prints nothing itself.
 *
 * @module
 */
import { resolve } from 'node:path';
import { normalizeCoverageThreshold, type SyncConfig } from './config/SyncConfig.js';
import { computeCoverage, type CoverageResult } from './coverage/Coverage.js';
import { writeCoverageReport } from './coverage/CoverageReport.js';
import { resolveEndpointMetadata } from './endpoint/Endpoint.js';
import {
    detectOrphans,
    documentSchemas,
    mergeEndpoints,
    syncComponents,
    type ComponentSyncResult,
    type EndpointMergeResult,
} from './merge/SwaggerMerge.js';
import type { SyncObserverFn } from './observability/SyncObserver.js';
import { scanEndpoints } from './scanner/EndpointScanner.js';
import { scanModels } from './scanner/ModelScanner.js';
import { ScanSession } from './ScanSession.js';
import { loadSwagger, saveSwagger } from './swagger/SwaggerFile.js';
import { isRecord, type ComponentMap, type EndpointScanResult, type SwaggerDocument } from './types.js';
import { validateEndpointMetadata, ValidationSeverity, type ValidationIssue } from './validation/Validator.js';

export interface SyncRunOptions {
    readonly config: SyncConfig;
    /** Base for relative paths in the config (default: process.cwd()) */
    readonly cwd?: string;
    readonly observer?: SyncObserverFn;
}

export interface SyncReport {
    readonly scan: EndpointScanResult;
    readonly components: ComponentMap;
    readonly excluded: ReadonlySet<string>;
    /** The document after merging (written to disk only in fix mode) */
    readonly swagger: SwaggerDocument;
    readonly operations: EndpointMergeResult;
    readonly componentSync: ComponentSyncResult;
    readonly orphans: readonly string[];
    readonly validation: readonly ValidationIssue[];
    readonly coverage: CoverageResult;
    /** Documentation rate is below `failOnCoverageBelow` */
    readonly coverageFailed: boolean;
    /** The swagger file was rewritten */
    readonly written: boolean;
    /** Absolute path of the coverage report, when one was written */
    readonly coverageReportPath?: string;
}

function createSession(config: SyncConfig, cwd: string, observer?: SyncObserverFn): ScanSession {
    return new ScanSession({
        markers: config.markers,
        projectRoot: resolve(cwd, config.projectRoot ?? '.'),
        strict: config.options.strict,
        ignoreFiles: config.ignore.files,
        ...(observer !== undefined ? { observer } : {}),
    });
}

/** Scan handlers only (the `list` command) */
export function listEndpoints(options: SyncRunOptions): EndpointScanResult {
    const cwd = options.cwd ?? process.cwd();
    const session = createSession(options.config, cwd, options.observer);
    return scanEndpoints(resolve(cwd, options.config.handlersRoot), session);
}

function securitySchemeNames(swagger: SwaggerDocument): ReadonlySet<string> {
    const components = swagger.components;
    if (!isRecord(components) || !isRecord(components.securitySchemes)) return new Set();
    return new Set(Object.keys(components.securitySchemes));
}

function validateEndpoints(scan: EndpointScanResult, swagger: SwaggerDocument): ValidationIssue[] {
    const context = {
        availableSchemas: new Set(Object.keys(documentSchemas(swagger))),
        availableSecuritySchemes: securitySchemeNames(swagger),
    };
    const issues: ValidationIssue[] = [];
    for (const endpoint of scan.endpoints) {
        const { merged } = resolveEndpointMetadata(endpoint);
        if (Object.keys(merged).length === 0) continue;
        issues.push(...validateEndpointMetadata(merged, `${endpoint.method.toUpperCase()} ${endpoint.path}`, context));
    }
    return issues;
}

/**
 * Run a sync pass.
 *
 * @throws {MethodMismatchError} strict mode and an undeclared method-rooted key
 * @throws {OpenApiBlockError} a handler block is not a YAML mapping
 * @throws {SwaggerFileError} the swagger file is missing or malformed
 */
export function runSync(options: SyncRunOptions): SyncReport {
    const { config } = options;
    const cwd = options.cwd ?? process.cwd();
    const session = createSession(config, cwd, options.observer);

    const scan = scanEndpoints(resolve(cwd, config.handlersRoot), session);
    const swaggerPath = resolve(cwd, config.swaggerFile);
    const swagger = loadSwagger(swaggerPath);
    const loaded = structuredClone(swagger);

    let components: ComponentMap = {};
    let excluded: ReadonlySet<string> = new Set();
    let componentSync: ComponentSyncResult = { changed: false, updated: [], removed: [] };
    if (config.options.modelComponents) {
        ({ components, excluded } = scanModels(resolve(cwd, config.modelsRoot), session));
        componentSync = syncComponents(swagger, components, excluded, session.observer);
    }

    const operations = mergeEndpoints(swagger, scan.endpoints, session.observer);
    const validation = config.options.validate ? validateEndpoints(scan, swagger) : [];
    const modelComponents = config.options.modelComponents ? components : undefined;
    const orphans = detectOrphans(swagger, scan.endpoints, modelComponents);
    const coverage = computeCoverage(scan.endpoints, scan.ignored, loaded, modelComponents);

    const threshold = config.options.failOnCoverageBelow;
    const coverageFailed = threshold !== undefined
        && coverage.summary.documentationRate + 1e-12 < normalizeCoverageThreshold(threshold);

    const written = config.mode === 'fix' && (operations.changed || componentSync.changed);
    if (written) saveSwagger(swaggerPath, swagger);

    let coverageReportPath: string | undefined;
    if (config.output.coverageReport) {
        coverageReportPath = resolve(cwd, config.output.coverageReport);
        writeCoverageReport(coverageReportPath, coverage, config.output.coverageFormat);
    }

    return {
        scan,
        components,
        excluded,
        swagger,
        operations,
        componentSync,
        orphans,
        validation,
        coverage,
        coverageFailed,
        written,
        ...(coverageReportPath !== undefined ? { coverageReportPath } : {}),
    };
}

/** Drift in operations or component schemas */
export function hasDrift(report: SyncReport): boolean {
    return report.operations.changed || report.componentSync.changed;
}

/**
 * Process exit code for a finished run: 1 on validation errors when they
 * are fatal; in check mode also on drift or a missed coverage threshold.
 */
export function exitCodeFor(report: SyncReport, config: SyncConfig): number {
    const validationErrors = report.validation.filter((i) => i.severity === ValidationSeverity.ERROR).length;
    if (config.options.failOnValidationErrors && validationErrors > 0) return 1;
    if (config.mode === 'check' && (hasDrift(report) || report.coverageFailed)) return 1;
    return 0;
}
