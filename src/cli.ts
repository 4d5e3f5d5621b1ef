#!/usr/bin/env node
/**
 * CLI Entry Point — swagger-sync
 *
 * Usage:
 *   swagger-sync [check|fix|list|validate-config] [--config <file>] [--env <name>] [options]
 *
 * @module
 */
import { relative } from 'node:path';
import pc from 'picocolors';
import { CliUsageError, parseArgs, type RawCliArgs } from './CliArgs.js';
import { applyCliOverrides, findConfigFile, loadConfig } from './config/ConfigLoader.js';
import { normalizeCoverageThreshold, type ColorMode, type SyncConfig } from './config/SyncConfig.js';
import { formatCoverageSummary, formatPercent } from './coverage/CoverageReport.js';
import { ConfigError, MethodMismatchError, OpenApiBlockError, SwaggerFileError } from './errors.js';
import { colorizeDiff, createSyncObserver, shouldColor } from './observability/SyncObserver.js';
import { exitCodeFor, hasDrift, listEndpoints, runSync, type SyncReport } from './SyncRunner.js';
import type { IgnoredEndpoint } from './types.js';
import { formatValidationReport, ValidationSeverity } from './validation/Validator.js';

type Colors = ReturnType<typeof pc.createColors>;

interface StreamColors {
    readonly err: Colors;
    readonly out: Colors;
}

/** Diagnostics go to stderr, diffs to stdout; each stream decides its own color */
function streamColors(mode: ColorMode): StreamColors {
    return {
        err: pc.createColors(shouldColor(mode, process.stderr)),
        out: pc.createColors(shouldColor(mode, process.stdout)),
    };
}

function resolveConfig(rawArgs: RawCliArgs): SyncConfig {
    return applyCliOverrides(loadConfig(rawArgs.config, undefined, rawArgs.env), rawArgs.overrides);
}

function printIgnored(ignored: readonly IgnoredEndpoint[]): void {
    console.log('Ignored endpoints (@openapi.ignore() or @openapi: ignore):');
    for (const entry of ignored) {
        console.log(` - ${entry.method.toUpperCase()} ${entry.path} (${relative(process.cwd(), entry.file)}:${entry.function})`);
    }
}

// ── Commands ─────────────────────────────────────────────

function runList(rawArgs: RawCliArgs): number {
    const config = resolveConfig(rawArgs);
    const color = shouldColor(config.options.color, process.stderr);
    const { endpoints, ignored } = listEndpoints({ config, observer: createSyncObserver(undefined, { color }) });

    console.log('Collected endpoints:');
    for (const endpoint of endpoints) {
        const block = Object.keys(endpoint.meta).length > 0 ? 'yes' : 'no';
        console.log(` - ${endpoint.method.toUpperCase()} ${endpoint.path} (${relative(process.cwd(), endpoint.file)}:${endpoint.function}) block=${block}`);
    }
    if (ignored.length > 0) printIgnored(ignored);
    return 0;
}

function runValidateConfig(rawArgs: RawCliArgs): number {
    const filePath = findConfigFile(rawArgs.config, process.cwd());
    const config = resolveConfig(rawArgs);
    console.log(filePath ? `✅ Config valid: ${filePath}` : '✅ No config file found; using defaults.');
    console.log(`   Swagger file:  ${config.swaggerFile}`);
    console.log(`   Handlers root: ${config.handlersRoot}`);
    console.log(`   Models root:   ${config.modelsRoot}`);
    console.log(`   Mode:          ${config.mode}`);
    return 0;
}

function printValidation(report: SyncReport, config: SyncConfig): void {
    if (!config.options.validate) return;
    if (report.validation.length === 0) {
        console.log('✅ No validation errors found.');
        return;
    }
    console.log(`\n${formatValidationReport(report.validation)}`);
    const errors = report.validation.filter((i) => i.severity === ValidationSeverity.ERROR).length;
    if (config.options.failOnValidationErrors && errors > 0) {
        console.error(`Validation failed with ${errors} error(s). Fix errors and re-run.`);
    }
}

function printOrphans(report: SyncReport, config: SyncConfig): void {
    if (report.orphans.length === 0) return;
    if (config.options.showOrphans) {
        console.log('\nOrphans:');
        for (const orphan of report.orphans) console.log(` - ${orphan}`);
    } else {
        console.log('\n(Info) Potential swagger-only paths and components (use --show-orphans for list)');
    }
}

function printFixResult(report: SyncReport): void {
    const { operations, componentSync } = report;
    if (!report.written) {
        console.log('No endpoint or component schema changes needed.');
        return;
    }
    if (operations.changed && componentSync.changed) {
        console.log('Swagger updated (endpoint operations + component schemas).');
    } else if (operations.changed) {
        console.log('Swagger updated (endpoint operations).');
    } else {
        console.log('Swagger updated (component schemas only, no endpoint operation changes).');
    }
    for (const note of operations.notes) console.log(` - ${note}`);
}

function printCheckResult(report: SyncReport, config: SyncConfig, colors: StreamColors): void {
    if (hasDrift(report)) {
        console.error(colors.err.red('Drift detected between handlers and swagger. Run: swagger-sync fix'));
        for (const note of report.operations.notes) console.log(` - ${note}`);
        for (const name of report.componentSync.updated) console.log(` - Component schema out of date: ${name}`);
        for (const name of report.componentSync.removed) console.log(` - Excluded component still present: ${name}`);
        if (report.operations.diffs.length > 0) {
            console.log('\nProposed changes:');
            for (const diff of report.operations.diffs) {
                console.log(`${diff.method.toUpperCase()} ${diff.path}`);
                for (const line of colorizeDiff(diff.lines, colors.out)) console.log(line);
            }
        }
    } else if (report.coverageFailed) {
        console.error(colors.err.red('Documentation coverage threshold not met.'));
    } else {
        console.log('Swagger paths are in sync with handlers.');
    }

    const threshold = config.options.failOnCoverageBelow;
    if (report.coverageFailed && threshold !== undefined) {
        const actual = formatPercent(report.coverage.summary.documentationRate, 2);
        const wanted = formatPercent(normalizeCoverageThreshold(threshold), 2);
        console.error(colors.err.red(`Coverage threshold not met: ${actual} < ${wanted}`));
    }
}

function runSyncCommand(rawArgs: RawCliArgs): number {
    const config = resolveConfig(rawArgs);
    const colors = streamColors(config.options.color);
    const observer = createSyncObserver(undefined, { color: colors.err.isColorSupported });

    const report = runSync({ config, observer });

    printValidation(report, config);
    if (config.mode === 'fix') printFixResult(report);
    else printCheckResult(report, config, colors);

    printOrphans(report, config);
    if (config.options.showIgnored && report.scan.ignored.length > 0) {
        console.log('');
        printIgnored(report.scan.ignored);
    }
    console.log('');
    for (const line of formatCoverageSummary(report.coverage.summary)) console.log(line);
    if (report.coverageReportPath) console.log(`\n📄 Coverage report: ${report.coverageReportPath}`);

    return exitCodeFor(report, config);
}

function printHelp(): void {
    console.log(`
swagger-sync — Keep a hand-written swagger file in sync with handler and model code

USAGE:
  swagger-sync [command] [options]

COMMANDS:
  check               Report drift without writing (default)
  fix                 Write operation and component changes to the swagger file
  list                List discovered endpoints and ignored handlers
  validate-config     Validate the configuration file and print the resolved paths
  help                Show this help message

OPTIONS:
  -c, --config <file>              Config file (default: auto-detect swagger-sync.yaml)
  --env <name>                     Apply a profile from the config's environments section
  --swagger-file <file>            Swagger YAML file (default: .swagger.v1.yaml)
  --handlers-root <dir>            Handler source tree
  --models-root <dir>              Model source tree
  --project-root <dir>             Root for absolute imports when following type aliases
  --openapi-start <marker>         Block start marker (default: >>>openapi)
  --openapi-end <marker>           Block end marker (default: <<<openapi)
  --ignore-file <glob>             Skip matching handler files (repeatable)
  --strict                         Undeclared method-rooted block keys are fatal
  --show-orphans                   List swagger entries with no handler or model
  --show-ignored                   List ignored handlers
  --no-model-components            Do not generate components.schemas from models
  --validate                       Validate merged operation metadata
  --fail-on-validation-errors      Exit 1 when validation finds errors
  --fail-on-coverage-below <n>     Minimum documentation rate (0-1 or 0-100)
  --coverage-report <file>         Write a coverage report
  --coverage-format <json|text>    Coverage report format (default: json)
  --color <auto|always|never>      Colored output (default: auto)
  -h, --help                       Show this help message

CONFIG FILE (swagger-sync.yaml):
  swaggerFile: .swagger.v1.yaml
  handlersRoot: bot/lib/http/handlers
  modelsRoot: bot/lib/models
  mode: check                      # check | fix
  markers:
    start: '>>>openapi'
    end: '<<<openapi'
  ignore:
    files: ['**/test_*.py']
  options:
    strict: false
    showOrphans: true
    validate: true
    failOnCoverageBelow: 80
    color: auto
  output:
    coverageReport: reports/openapi/coverage.json
    coverageFormat: json
  environments:
    ci:
      options:
        strict: true
        color: never

EXAMPLES:
  swagger-sync check --show-orphans
  swagger-sync fix --env ci
  swagger-sync list --handlers-root src/handlers
`);
}

// ── Main ─────────────────────────────────────────────────

function main(argv: readonly string[]): number {
    const errorColors = pc.createColors(Boolean(process.stderr.isTTY));
    try {
        const cliArgs = parseArgs(argv);
        switch (cliArgs.command) {
            case 'help':
                printHelp();
                return 0;
            case 'list':
                return runList(cliArgs);
            case 'validate-config':
                return runValidateConfig(cliArgs);
            default:
                return runSyncCommand(cliArgs);
        }
    } catch (err) {
        if (
            err instanceof CliUsageError
            || err instanceof ConfigError
            || err instanceof SwaggerFileError
            || err instanceof MethodMismatchError
            || err instanceof OpenApiBlockError
        ) {
            console.error(errorColors.red(`ERROR: ${err.message}`));
            return 1;
        }
        throw err;
    }
}

process.exitCode = main(process.argv);
