/**
 * SyncConfig — Full Configuration for a Sync Run
 *
 * Where to look (swagger file, handler and model trees), how blocks are
 * delimited, which files to skip, and how strict the run is. Loaded from
 * `swagger-sync.yaml` or built programmatically; every field has a default.
 *
 * @module
 */
import { z } from 'zod';
import { DEFAULT_OPENAPI_END, DEFAULT_OPENAPI_START } from '../constants.js';

// ── Sections ─────────────────────────────────────────────

export type SyncMode = 'check' | 'fix';
export type ColorMode = 'auto' | 'always' | 'never';

export interface MarkerConfig {
    readonly start: string;
    readonly end: string;
}

export interface IgnoreConfig {
    /** fnmatch-style globs, matched against root-relative paths and bare file names */
    readonly files: readonly string[];
}

export interface SyncOptions {
    /** Undeclared method-rooted block keys are fatal */
    readonly strict: boolean;
    /** List swagger paths and components with no code behind them */
    readonly showOrphans: boolean;
    readonly showIgnored: boolean;
    /** Generate `components.schemas` from model classes */
    readonly modelComponents: boolean;
    readonly validate: boolean;
    readonly failOnValidationErrors: boolean;
    /** Minimum documentation rate, as 0..1 or a percentage (0..100) */
    readonly failOnCoverageBelow?: number;
    readonly color: ColorMode;
}

export interface OutputConfig {
    /** Coverage report file; none is written when unset */
    readonly coverageReport?: string;
    readonly coverageFormat: 'json' | 'text';
}

// ── Full Config ──────────────────────────────────────────

export interface SyncConfig {
    readonly swaggerFile: string;
    readonly handlersRoot: string;
    readonly modelsRoot: string;
    /** Root for absolute imports when following type aliases (default: cwd) */
    readonly projectRoot?: string;
    readonly mode: SyncMode;
    readonly markers: MarkerConfig;
    readonly ignore: IgnoreConfig;
    readonly options: SyncOptions;
    readonly output: OutputConfig;
}

export const DEFAULT_CONFIG: SyncConfig = {
    swaggerFile: '.swagger.v1.yaml',
    handlersRoot: 'bot/lib/http/handlers',
    modelsRoot: 'bot/lib/models',
    mode: 'check',
    markers: {
        start: DEFAULT_OPENAPI_START,
        end: DEFAULT_OPENAPI_END,
    },
    ignore: {
        files: [],
    },
    options: {
        strict: false,
        showOrphans: false,
        showIgnored: false,
        modelComponents: true,
        validate: false,
        failOnValidationErrors: false,
        color: 'auto',
    },
    output: {
        coverageFormat: 'json',
    },
};

// ── File Schema ──────────────────────────────────────────

const sectionFields = {
    swaggerFile: z.string().min(1).optional(),
    handlersRoot: z.string().min(1).optional(),
    modelsRoot: z.string().min(1).optional(),
    projectRoot: z.string().min(1).optional(),
    mode: z.enum(['check', 'fix']).optional(),
    markers: z.object({
        start: z.string().min(1).optional(),
        end: z.string().min(1).optional(),
    }).strict().optional(),
    ignore: z.object({
        files: z.array(z.string()).optional(),
    }).strict().optional(),
    options: z.object({
        strict: z.boolean().optional(),
        showOrphans: z.boolean().optional(),
        showIgnored: z.boolean().optional(),
        modelComponents: z.boolean().optional(),
        validate: z.boolean().optional(),
        failOnValidationErrors: z.boolean().optional(),
        failOnCoverageBelow: z.number().min(0).max(100).optional(),
        color: z.enum(['auto', 'always', 'never']).optional(),
    }).strict().optional(),
    output: z.object({
        coverageReport: z.string().min(1).optional(),
        coverageFormat: z.enum(['json', 'text']).optional(),
    }).strict().optional(),
};

/** One environment profile: the same sections, all optional */
export const EnvironmentSchema = z.object(sectionFields).strict();

/** Shape of `swagger-sync.yaml` */
export const ConfigFileSchema = z.object({
    ...sectionFields,
    environments: z.record(EnvironmentSchema).optional(),
}).strict();

export type PartialConfig = z.infer<typeof EnvironmentSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ── Merge Helpers ────────────────────────────────────────

/** Overlay one partial config on another, section by section */
export function mergePartial(base: PartialConfig, overlay: PartialConfig): PartialConfig {
    return {
        ...base,
        ...overlay,
        markers: { ...base.markers, ...overlay.markers },
        ignore: { ...base.ignore, ...overlay.ignore },
        options: { ...base.options, ...overlay.options },
        output: { ...base.output, ...overlay.output },
    };
}

/** Fill a partial config from {@link DEFAULT_CONFIG} at every level */
export function mergeConfig(partial: PartialConfig): SyncConfig {
    const options = partial.options ?? {};
    const output = partial.output ?? {};
    const failOnCoverageBelow = options.failOnCoverageBelow ?? DEFAULT_CONFIG.options.failOnCoverageBelow;
    const coverageReport = output.coverageReport ?? DEFAULT_CONFIG.output.coverageReport;

    return {
        swaggerFile: partial.swaggerFile ?? DEFAULT_CONFIG.swaggerFile,
        handlersRoot: partial.handlersRoot ?? DEFAULT_CONFIG.handlersRoot,
        modelsRoot: partial.modelsRoot ?? DEFAULT_CONFIG.modelsRoot,
        ...(partial.projectRoot !== undefined ? { projectRoot: partial.projectRoot } : {}),
        mode: partial.mode ?? DEFAULT_CONFIG.mode,
        markers: {
            start: partial.markers?.start ?? DEFAULT_CONFIG.markers.start,
            end: partial.markers?.end ?? DEFAULT_CONFIG.markers.end,
        },
        ignore: {
            files: partial.ignore?.files ?? DEFAULT_CONFIG.ignore.files,
        },
        options: {
            strict: options.strict ?? DEFAULT_CONFIG.options.strict,
            showOrphans: options.showOrphans ?? DEFAULT_CONFIG.options.showOrphans,
            showIgnored: options.showIgnored ?? DEFAULT_CONFIG.options.showIgnored,
            modelComponents: options.modelComponents ?? DEFAULT_CONFIG.options.modelComponents,
            validate: options.validate ?? DEFAULT_CONFIG.options.validate,
            failOnValidationErrors: options.failOnValidationErrors ?? DEFAULT_CONFIG.options.failOnValidationErrors,
            ...(failOnCoverageBelow !== undefined ? { failOnCoverageBelow } : {}),
            color: options.color ?? DEFAULT_CONFIG.options.color,
        },
        output: {
            ...(coverageReport !== undefined ? { coverageReport } : {}),
            coverageFormat: output.coverageFormat ?? DEFAULT_CONFIG.output.coverageFormat,
        },
    };
}

/** Threshold as a 0..1 rate; values above 1 are read as percentages */
export function normalizeCoverageThreshold(threshold: number): number {
    return threshold > 1 ? threshold / 100 : threshold;
}
