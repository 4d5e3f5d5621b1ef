/**
 * CoverageReport — Rendering Coverage Results
 *
 * Console summary lines for every run, plus a report file in JSON (for
 * CI tooling) or plain text (for humans).
 *
 * @module
 */
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CoverageResult, CoverageSummary, EndpointCoverage } from './Coverage.js';

export type CoverageFormat = 'json' | 'text';

export const COVERAGE_REPORT_FORMAT = 'swagger-sync-coverage-v1';

/** `0.6667` → `66.7%` */
export function formatPercent(rate: number, digits = 1): string {
    return `${(rate * 100).toFixed(digits)}%`;
}

// ── Console Summary ──────────────────────────────────────

/**
 * ```
 * OpenAPI Documentation Coverage Summary:
 *   Handlers considered:        3
 *   ...
 * ```
 */
export function formatCoverageSummary(summary: CoverageSummary): string[] {
    const lines = [
        'OpenAPI Documentation Coverage Summary:',
        `  Handlers considered:        ${summary.handlersTotal}`,
        `  Ignored handlers:           ${summary.ignoredTotal}`,
        `  With documentation:         ${summary.documented} (${formatPercent(summary.documentationRate)})`,
        `  With docstring blocks:      ${summary.withBlock}`,
        `  With @openapi decorators:   ${summary.withDecorators}`,
        `  In swagger (handlers):      ${summary.handlersInSwagger} (${formatPercent(summary.swaggerRate)})`,
        `  Definition matches:         ${summary.definitionMatches} / ${summary.documented} (${formatPercent(summary.definitionMatchRate)})`,
        `  Swagger only operations:    ${summary.swaggerOnlyOperations}`,
        `  Model components generated: ${summary.componentsGenerated}`,
        `  Schemas not generated:      ${summary.orphanedComponents}`,
    ];

    const suggestions: string[] = [];
    if (summary.undocumented > 0) {
        suggestions.push('Add an OpenAPI docstring block or @openapi decorators to undocumented handlers.');
    }
    if (summary.swaggerOnlyOperations > 0) {
        suggestions.push('Remove or implement swagger-only paths, or mark the related handlers ignored if intentional.');
    }
    if (suggestions.length > 0) {
        lines.push('  Suggestions:', ...suggestions.map((s) => `    - ${s}`));
    }
    return lines;
}

function endpointFlags(record: EndpointCoverage): string {
    const flags: string[] = [];
    if (record.hasBlock) flags.push('BLOCK');
    if (record.hasDecorators) flags.push('DECORATORS');
    flags.push(record.inSwagger ? 'SWAGGER' : 'MISSING_SWAGGER');
    if (record.definitionMatches) flags.push('MATCH');
    return flags.join('|');
}

// ── Report Files ─────────────────────────────────────────

export function renderCoverageJson(result: CoverageResult, generatedAt = Math.floor(Date.now() / 1000)): string {
    return `${JSON.stringify({
        format: COVERAGE_REPORT_FORMAT,
        generatedAt,
        summary: result.summary,
        endpoints: result.endpoints,
        swaggerOnly: result.swaggerOnly,
        orphanedComponents: result.orphanedComponents,
    }, null, 2)}\n`;
}

export function renderCoverageText(result: CoverageResult): string {
    const { summary } = result;
    const lines = [...formatCoverageSummary(summary), ''];

    const methods = Object.keys(summary.methods).sort();
    if (methods.length > 0) {
        lines.push('Methods:');
        for (const method of methods) {
            const stats = summary.methods[method];
            if (!stats) continue;
            lines.push(`  ${method.padEnd(7)} total=${stats.total} documented=${stats.documented} inSwagger=${stats.inSwagger}`);
        }
        lines.push('');
    }

    const tags = Object.keys(summary.tags).sort();
    if (tags.length > 0) {
        lines.push(`Tags (unique: ${tags.length}):`);
        for (const tag of tags) lines.push(`  ${tag}: ${summary.tags[tag] ?? 0}`);
        lines.push('');
    }

    if (result.endpoints.length > 0) {
        lines.push('Endpoints:');
        for (const record of result.endpoints) {
            lines.push(`  ${record.method.toUpperCase()} ${record.path} :: ${endpointFlags(record)}`);
        }
        lines.push('');
    }

    if (result.swaggerOnly.length > 0) {
        lines.push('Swagger-only operations:');
        for (const op of result.swaggerOnly) lines.push(`  ${op.method.toUpperCase()} ${op.path}`);
        lines.push('');
    }

    if (result.orphanedComponents.length > 0) {
        lines.push('Components without a model class:');
        for (const name of result.orphanedComponents) lines.push(`  ${name}`);
        lines.push('');
    }

    return `${lines.join('\n').trimEnd()}\n`;
}

/** Write a report, creating its directory */
export function writeCoverageReport(filePath: string, result: CoverageResult, format: CoverageFormat): void {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, format === 'json' ? renderCoverageJson(result) : renderCoverageText(result), 'utf-8');
}
