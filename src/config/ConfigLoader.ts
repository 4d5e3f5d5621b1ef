/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `swagger-sync.yaml` from cwd or a specified path, validates it,
 * applies an optional environment profile, and merges with defaults.
 * CLI args override file values.
 *
 * @module
 */
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../errors.js';
import {
    ConfigFileSchema,
    mergeConfig,
    mergePartial,
    type ColorMode,
    type ConfigFile,
    type SyncConfig,
    type SyncMode,
} from './SyncConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'swagger-sync.yaml',
    'swagger-sync.yml',
    '.swagger-sync.yaml',
    '.swagger-sync.yml',
];

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `swagger-sync.yaml` (and variants) in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @param environment - Name of a profile under `environments` to overlay
 * @throws {ConfigError} unreadable, invalid, or missing the requested environment
 */
export function loadConfig(configPath?: string, cwd?: string, environment?: string): SyncConfig {
    const filePath = findConfigFile(configPath, cwd ?? process.cwd());
    if (!filePath) {
        if (environment !== undefined) {
            throw new ConfigError(`Environment "${environment}" requested but no configuration file was found`);
        }
        return mergeConfig({});
    }
    return resolveEnvironment(parseConfigFile(filePath), filePath, environment);
}

/** Path of the config file that {@link loadConfig} would read, if any */
export function findConfigFile(configPath: string | undefined, cwd: string): string | undefined {
    if (configPath) {
        const absPath = resolve(cwd, configPath);
        if (!existsSync(absPath)) {
            throw new ConfigError(`Config file not found: "${absPath}"`, absPath);
        }
        return absPath;
    }
    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(cwd, filename);
        if (existsSync(candidate)) return candidate;
    }
    return undefined;
}

/**
 * Parse and validate a config file without merging defaults.
 *
 * @throws {ConfigError} on YAML syntax errors or schema violations
 */
export function parseConfigFile(filePath: string): ConfigFile {
    let raw: unknown;
    try {
        raw = parseYaml(readFileSync(filePath, 'utf-8'));
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Failed to read config file "${filePath}": ${detail}`, filePath, [], err);
    }

    const parsed = ConfigFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid config file "${filePath}": ${details}`, filePath, parsed.error.issues);
    }
    return parsed.data;
}

function resolveEnvironment(file: ConfigFile, filePath: string, environment?: string): SyncConfig {
    const { environments, ...base } = file;
    if (environment === undefined) return mergeConfig(base);

    const profile = environments?.[environment];
    if (!profile) {
        throw new ConfigError(`Environment "${environment}" not found in config file "${filePath}"`, filePath);
    }
    return mergeConfig(mergePartial(base, profile));
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: SyncConfig, cli: CliOverrides): SyncConfig {
    return {
        ...config,
        ...(cli.swaggerFile !== undefined ? { swaggerFile: cli.swaggerFile } : {}),
        ...(cli.handlersRoot !== undefined ? { handlersRoot: cli.handlersRoot } : {}),
        ...(cli.modelsRoot !== undefined ? { modelsRoot: cli.modelsRoot } : {}),
        ...(cli.projectRoot !== undefined ? { projectRoot: cli.projectRoot } : {}),
        ...(cli.mode !== undefined ? { mode: cli.mode } : {}),
        markers: {
            ...config.markers,
            ...(cli.markerStart !== undefined ? { start: cli.markerStart } : {}),
            ...(cli.markerEnd !== undefined ? { end: cli.markerEnd } : {}),
        },
        ignore: {
            ...config.ignore,
            ...(cli.ignoreFiles !== undefined ? { files: cli.ignoreFiles } : {}),
        },
        options: {
            ...config.options,
            ...(cli.strict !== undefined ? { strict: cli.strict } : {}),
            ...(cli.showOrphans !== undefined ? { showOrphans: cli.showOrphans } : {}),
            ...(cli.showIgnored !== undefined ? { showIgnored: cli.showIgnored } : {}),
            ...(cli.modelComponents !== undefined ? { modelComponents: cli.modelComponents } : {}),
            ...(cli.validate !== undefined ? { validate: cli.validate } : {}),
            ...(cli.failOnValidationErrors !== undefined ? { failOnValidationErrors: cli.failOnValidationErrors } : {}),
            ...(cli.failOnCoverageBelow !== undefined ? { failOnCoverageBelow: cli.failOnCoverageBelow } : {}),
            ...(cli.color !== undefined ? { color: cli.color } : {}),
        },
        output: {
            ...config.output,
            ...(cli.coverageReport !== undefined ? { coverageReport: cli.coverageReport } : {}),
            ...(cli.coverageFormat !== undefined ? { coverageFormat: cli.coverageFormat } : {}),
        },
    };
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly swaggerFile?: string;
    readonly handlersRoot?: string;
    readonly modelsRoot?: string;
    readonly projectRoot?: string;
    readonly mode?: SyncMode;
    readonly markerStart?: string;
    readonly markerEnd?: string;
    readonly ignoreFiles?: readonly string[];
    readonly strict?: boolean;
    readonly showOrphans?: boolean;
    readonly showIgnored?: boolean;
    readonly modelComponents?: boolean;
    readonly validate?: boolean;
    readonly failOnValidationErrors?: boolean;
    readonly failOnCoverageBelow?: number;
    readonly color?: ColorMode;
    readonly coverageReport?: string;
    readonly coverageFormat?: 'json' | 'text';
}
