/**
 * Validator — Structural Checks on Merged Operation Metadata
 *
 * Catches mistakes the YAML parser cannot: references to schemas or
 * security schemes the document does not define, unusual status codes,
 * malformed parameters and responses without descriptions.
 *
 * ```
 * [ERROR] GET /api/v1/users in field 'responses.200.content.application/json.schema': Unknown schema reference: User
 * ```
 *
 * @module
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { SCHEMA_REF_PREFIX } from '../constants.js';
import { isRecord, type OpenApiMap } from '../types.js';

// ── Issue Model ──────────────────────────────────────────

export enum ValidationSeverity {
    /** Must be fixed */
    ERROR = 'ERROR',
    /** Allowed, but worth a look */
    WARNING = 'WARNING',
    INFO = 'INFO',
}

export interface ValidationIssue {
    readonly severity: ValidationSeverity;
    readonly message: string;
    /** `GET /api/v1/users` */
    readonly endpoint: string;
    readonly field?: string;
}

export function formatIssue(issue: ValidationIssue): string {
    const field = issue.field ? ` in field '${issue.field}'` : '';
    return `[${issue.severity}] ${issue.endpoint}${field}: ${issue.message}`;
}

function issue(severity: ValidationSeverity, message: string, endpoint: string, field?: string): ValidationIssue {
    return { severity, message, endpoint, ...(field !== undefined ? { field } : {}) };
}

// ── Status Code Table ────────────────────────────────────

const StatusTableSchema = z.record(z.array(z.number().int()));

let standardCodes: ReadonlySet<number> | undefined;

/** Registered HTTP status codes, grouped by class in `data/http-status-codes.json` */
export function standardStatusCodes(): ReadonlySet<number> {
    if (!standardCodes) {
        const raw: unknown = JSON.parse(readFileSync(new URL('../../data/http-status-codes.json', import.meta.url), 'utf-8'));
        standardCodes = new Set(Object.values(StatusTableSchema.parse(raw)).flat());
    }
    return standardCodes;
}

// ── Helpers ──────────────────────────────────────────────

const VALID_PARAMETER_LOCATIONS: ReadonlySet<unknown> = new Set(['path', 'query', 'header', 'cookie']);

function recordOf(value: unknown): OpenApiMap {
    return isRecord(value) ? value : {};
}

function listOf(value: unknown): readonly unknown[] {
    return Array.isArray(value) ? value : [];
}

/** Name of the component a `#/components/schemas/...` reference points at */
function referencedSchema(schema: unknown): string | undefined {
    if (!isRecord(schema)) return undefined;
    const ref = schema.$ref;
    if (typeof ref !== 'string' || !ref.startsWith(SCHEMA_REF_PREFIX)) return undefined;
    return ref.split('/').pop();
}

function typeName(value: unknown): string {
    if (value === null || value === undefined) return 'NoneType';
    if (Array.isArray(value)) return 'list';
    switch (typeof value) {
        case 'string': return 'str';
        case 'boolean': return 'bool';
        case 'number': return Number.isInteger(value) ? 'int' : 'float';
        default: return typeof value;
    }
}

function parameterName(parameter: OpenApiMap, index: number): string {
    return 'name' in parameter ? String(parameter.name) : `parameter[${index}]`;
}

// ── Checks ───────────────────────────────────────────────

/** `$ref`s in responses, request body and parameters must name a known schema */
export function validateSchemaReferences(
    metadata: OpenApiMap,
    availableSchemas: ReadonlySet<string>,
    endpoint: string,
): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const unknown = (name: string | undefined): name is string => name !== undefined && !availableSchemas.has(name);

    for (const [status, response] of Object.entries(recordOf(metadata.responses))) {
        if (!isRecord(response)) continue;
        for (const [mediaType, media] of Object.entries(recordOf(response.content))) {
            if (!isRecord(media)) continue;
            const name = referencedSchema(media.schema);
            if (unknown(name)) {
                issues.push(issue(ValidationSeverity.ERROR, `Unknown schema reference: ${name}`, endpoint,
                    `responses.${status}.content.${mediaType}.schema`));
            }
        }
    }

    const requestBody = recordOf(metadata.requestBody);
    for (const [mediaType, media] of Object.entries(recordOf(requestBody.content))) {
        if (!isRecord(media)) continue;
        const name = referencedSchema(media.schema);
        if (unknown(name)) {
            issues.push(issue(ValidationSeverity.ERROR, `Unknown schema reference: ${name}`, endpoint,
                `requestBody.content.${mediaType}.schema`));
        }
    }

    listOf(metadata.parameters).forEach((parameter, index) => {
        if (!isRecord(parameter)) return;
        const name = referencedSchema(parameter.schema);
        if (unknown(name)) {
            issues.push(issue(ValidationSeverity.ERROR,
                `Unknown schema reference in parameter '${parameterName(parameter, index)}': ${name}`,
                endpoint, `parameters[${index}].schema`));
        }
    });

    return issues;
}

/** Non-standard numeric codes and non-numeric keys other than `default` warn */
export function validateStatusCodes(metadata: OpenApiMap, endpoint: string): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const codes = standardStatusCodes();
    for (const key of Object.keys(recordOf(metadata.responses))) {
        if (/^\s*[+-]?\d+\s*$/.test(key)) {
            const code = Number.parseInt(key, 10);
            if (!codes.has(code)) {
                issues.push(issue(ValidationSeverity.WARNING, `Non-standard HTTP status code: ${code}`, endpoint, `responses.${key}`));
            }
        } else if (key !== 'default' && key !== 'xx') {
            issues.push(issue(ValidationSeverity.WARNING, `Invalid status code format: ${key}`, endpoint, `responses.${key}`));
        }
    }
    return issues;
}

export function validateParameters(metadata: OpenApiMap, endpoint: string): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    listOf(metadata.parameters).forEach((parameter, index) => {
        const field = `parameters[${index}]`;
        if (!isRecord(parameter)) {
            issues.push(issue(ValidationSeverity.ERROR, `Parameter must be an object, got ${typeName(parameter)}`, endpoint, field));
            return;
        }
        const name = parameterName(parameter, index);

        if (!('name' in parameter)) {
            issues.push(issue(ValidationSeverity.ERROR, "Parameter missing required field 'name'", endpoint, field));
        }
        if (!('in' in parameter)) {
            issues.push(issue(ValidationSeverity.ERROR, `Parameter '${name}' missing required field 'in'`, endpoint, `${field}.in`));
        } else {
            const location = parameter.in;
            if (!VALID_PARAMETER_LOCATIONS.has(location)) {
                issues.push(issue(ValidationSeverity.ERROR,
                    `Parameter '${name}' has invalid 'in' value: ${String(location)}. Must be one of path, query, header, cookie`,
                    endpoint, `${field}.in`));
            }
            if (location === 'path' && !parameter.required) {
                issues.push(issue(ValidationSeverity.ERROR, `Path parameter '${name}' must have required=true`, endpoint, `${field}.required`));
            }
        }
        if (!('schema' in parameter) && !('content' in parameter)) {
            issues.push(issue(ValidationSeverity.ERROR, `Parameter '${name}' must have either 'schema' or 'content'`, endpoint, field));
        }
    });

    return issues;
}

export function validateResponses(metadata: OpenApiMap, endpoint: string): ValidationIssue[] {
    const responses = recordOf(metadata.responses);
    if (Object.keys(responses).length === 0) {
        return [issue(ValidationSeverity.WARNING, 'No responses defined for endpoint', endpoint, 'responses')];
    }

    const issues: ValidationIssue[] = [];
    for (const [status, response] of Object.entries(responses)) {
        if (!isRecord(response)) {
            issues.push(issue(ValidationSeverity.ERROR, `Response for status ${status} must be an object`, endpoint, `responses.${status}`));
        } else if (!('description' in response)) {
            issues.push(issue(ValidationSeverity.ERROR, `Response ${status} missing required 'description' field`, endpoint,
                `responses.${status}.description`));
        }
    }
    return issues;
}

export function validateSecuritySchemes(
    metadata: OpenApiMap,
    availableSchemes: ReadonlySet<string>,
    endpoint: string,
): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    listOf(metadata.security).forEach((requirement, index) => {
        if (!isRecord(requirement)) return;
        for (const scheme of Object.keys(requirement)) {
            if (!availableSchemes.has(scheme)) {
                issues.push(issue(ValidationSeverity.ERROR, `Unknown security scheme: ${scheme}`, endpoint, `security[${index}].${scheme}`));
            }
        }
    });
    return issues;
}

export interface ValidationContext {
    /** Names under `components.schemas`; reference checks are skipped when absent */
    readonly availableSchemas?: ReadonlySet<string>;
    /** Names under `components.securitySchemes`; security checks are skipped when absent */
    readonly availableSecuritySchemes?: ReadonlySet<string>;
}

/** Run every check on one endpoint's merged metadata */
export function validateEndpointMetadata(
    metadata: OpenApiMap,
    endpoint: string,
    context: ValidationContext = {},
): ValidationIssue[] {
    return [
        ...(context.availableSchemas ? validateSchemaReferences(metadata, context.availableSchemas, endpoint) : []),
        ...validateStatusCodes(metadata, endpoint),
        ...validateParameters(metadata, endpoint),
        ...validateResponses(metadata, endpoint),
        ...(context.availableSecuritySchemes
            ? validateSecuritySchemes(metadata, context.availableSecuritySchemes, endpoint)
            : []),
    ];
}

// ── Report ───────────────────────────────────────────────

const RULE = '='.repeat(60);

/** Issues grouped by severity, errors first, with a summary line */
export function formatValidationReport(issues: readonly ValidationIssue[], showInfo = false): string {
    if (issues.length === 0) return '✅ No validation errors found.';

    const errors = issues.filter((i) => i.severity === ValidationSeverity.ERROR);
    const warnings = issues.filter((i) => i.severity === ValidationSeverity.WARNING);
    const infos = issues.filter((i) => i.severity === ValidationSeverity.INFO);

    const lines: string[] = [];
    const section = (title: string, group: readonly ValidationIssue[]): void => {
        if (group.length === 0) return;
        lines.push(`${title} (${group.length})`, RULE, ...group.map((i) => `  ${formatIssue(i)}`), '');
    };

    section('❌ ERRORS', errors);
    section('⚠️  WARNINGS', warnings);
    if (showInfo) section('ℹ️  INFO', infos);

    lines.push(`Summary: ${errors.length} error(s), ${warnings.length} warning(s)`);
    return lines.join('\n');
}
