/**
 * MetadataMerge — Docstring Block + `@openapi.*` Decorators
 *
 * Combines the two metadata sources of one endpoint into a single
 * operation mapping. Decorators take precedence; the block fills in
 * whatever the decorators leave out. Pure: neither input is mutated.
 *
 * @module
 */
import { isDeepStrictEqual } from 'node:util';
import { isRecord, type OpenApiMap } from '../types.js';

export interface MergeResult {
    readonly merged: OpenApiMap;
    /** Human-readable conflict descriptions (both sides set, values differ) */
    readonly conflicts: readonly string[];
}

function clone<T>(value: T): T {
    return structuredClone(value);
}

// ── Building Blocks ──────────────────────────────────────

/** Recursive merge; `override` wins on scalar and list collisions */
export function deepMerge(base: OpenApiMap, override: OpenApiMap): OpenApiMap {
    const result = clone(base);
    for (const [key, value] of Object.entries(override)) {
        const current = result[key];
        result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : clone(value);
    }
    return result;
}

/**
 * Merge two lists. With `uniqueBy`, decorator items replace block items
 * sharing the same key; without it the decorator list replaces the block list.
 */
export function mergeListFields(blockList: unknown, decoratorList: unknown, uniqueBy?: string): unknown[] {
    const fromBlock = Array.isArray(blockList) ? blockList : [];
    const fromDecorator = Array.isArray(decoratorList) ? decoratorList : [];
    if (fromDecorator.length === 0) return clone(fromBlock);
    if (fromBlock.length === 0) return clone(fromDecorator);
    if (!uniqueBy) return clone(fromDecorator);

    const overridden = new Set(fromDecorator.filter(isRecord).map((item) => item[uniqueBy]));
    const kept = fromBlock.filter((item) => isRecord(item) && !overridden.has(item[uniqueBy]));
    return clone([...kept, ...fromDecorator]);
}

function appliesTo(entry: OpenApiMap, method: string): boolean {
    if (!method || !('methods' in entry)) return true;
    const methods = entry.methods;
    return Array.isArray(methods) && methods.includes(method);
}

function withoutMethods(entry: OpenApiMap): OpenApiMap {
    const { methods: _methods, ...rest } = clone(entry);
    return rest;
}

/**
 * Merge response maps by status code. Decorator responses carrying a
 * `methods` list only apply to those methods; the list itself is dropped.
 */
export function mergeResponses(blockResponses: unknown, decoratorResponses: unknown, method = ''): OpenApiMap {
    const result: OpenApiMap = isRecord(blockResponses) ? clone(blockResponses) : {};
    if (!isRecord(decoratorResponses)) return result;

    for (const [status, response] of Object.entries(decoratorResponses)) {
        if (!isRecord(response) || !appliesTo(response, method)) continue;
        const incoming = withoutMethods(response);
        const existing = result[status];
        result[status] = isRecord(existing) ? deepMerge(existing, incoming) : incoming;
    }
    return result;
}

// ── Examples ─────────────────────────────────────────────

function ensureMap(target: OpenApiMap, key: string): OpenApiMap {
    const current = target[key];
    if (isRecord(current)) return current;
    const created: OpenApiMap = {};
    target[key] = created;
    return created;
}

function exampleObject(example: OpenApiMap): OpenApiMap {
    const result: OpenApiMap = {};
    if ('value' in example) result.value = example.value;
    else if ('externalValue' in example) result.externalValue = example.externalValue;
    else if ('$ref' in example) result.$ref = example.$ref;
    if ('summary' in example) result.summary = example.summary;
    if ('description' in example) result.description = example.description;
    for (const [key, value] of Object.entries(example)) {
        if (key.startsWith('x-')) result[key] = value;
    }
    return result;
}

/**
 * Place `x-examples` entries where their `placement` says: a named
 * parameter, the request body, a response, or (for `schema`) the
 * `x-schema-examples` list.
 */
export function placeExamples(target: OpenApiMap, examples: unknown, method: string): void {
    if (!Array.isArray(examples)) return;

    for (const example of examples) {
        if (!isRecord(example)) continue;
        const placement = example.placement;
        const name = example.name;
        if (!placement || typeof name !== 'string' || !name) continue;

        if ('methods' in example) {
            const allowed = Array.isArray(example.methods) ? example.methods.map((m) => String(m).toLowerCase()) : [];
            if (!allowed.includes(method.toLowerCase())) continue;
        }

        const built = exampleObject(example);
        const contentType = typeof example.contentType === 'string' ? example.contentType : 'application/json';

        switch (placement) {
            case 'parameter': {
                const parameterName = example.parameter_name;
                if (!parameterName) break;
                const parameters: unknown[] = Array.isArray(target.parameters) ? target.parameters : [];
                target.parameters = parameters;
                const parameter = parameters.find((p): p is OpenApiMap => isRecord(p) && p.name === parameterName);
                if (parameter) ensureMap(parameter, 'examples')[name] = built;
                break;
            }
            case 'requestBody': {
                const content = ensureMap(ensureMap(target, 'requestBody'), 'content');
                ensureMap(ensureMap(content, contentType), 'examples')[name] = built;
                break;
            }
            case 'response': {
                const status = example.status_code;
                if (status === undefined || status === null) break;
                const response = ensureMap(ensureMap(target, 'responses'), String(status));
                if (!('description' in response)) response.description = 'Response';
                const content = ensureMap(response, 'content');
                ensureMap(ensureMap(content, contentType), 'examples')[name] = built;
                break;
            }
            case 'schema': {
                const collected: unknown[] = Array.isArray(target['x-schema-examples']) ? target['x-schema-examples'] : [];
                collected.push(clone(example));
                target['x-schema-examples'] = collected;
                break;
            }
        }
    }
}

// ── Conflicts ────────────────────────────────────────────

/** Render a value the way the docstring's own language would print it */
export function formatValue(value: unknown): string {
    if (value === null || value === undefined) return 'None';
    if (value === true) return 'True';
    if (value === false) return 'False';
    if (typeof value === 'string') {
        const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
        const escaped = value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
        return quote === "'" ? `'${escaped.replace(/'/g, "\\'")}'` : `"${escaped}"`;
    }
    if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
    if (isRecord(value)) {
        return `{${Object.entries(value).map(([k, v]) => `${formatValue(k)}: ${formatValue(v)}`).join(', ')}}`;
    }
    return String(value);
}

function asSortedSet(value: unknown): string[] {
    const items = Array.isArray(value) ? value : [value];
    return [...new Set(items.map(formatValue))].sort();
}

const SIMPLE_FIELDS = ['summary', 'description', 'operationId', 'deprecated'] as const;
const LIST_FIELDS = ['tags', 'security'] as const;

function isSet(value: unknown): boolean {
    if (value === undefined || value === null || value === false || value === '' || value === 0) return false;
    if (Array.isArray(value)) return value.length > 0;
    if (isRecord(value)) return Object.keys(value).length > 0;
    return true;
}

/**
 * Fields both sources set to different values.
 *
 * ```
 * Conflict in GET /api/v1/items field "summary": YAML='Old' vs Decorator='New' (using decorator)
 * ```
 */
export function detectConflicts(block: OpenApiMap, decorators: OpenApiMap, path: string, method: string): string[] {
    const conflicts: string[] = [];
    const endpointId = `${method.toUpperCase()} ${path}`;

    for (const field of SIMPLE_FIELDS) {
        const fromBlock = block[field];
        const fromDecorator = decorators[field];
        if (fromBlock === undefined || fromBlock === null || fromDecorator === undefined || fromDecorator === null) continue;
        if (!isDeepStrictEqual(fromBlock, fromDecorator)) {
            conflicts.push(
                `Conflict in ${endpointId} field "${field}": ` +
                `YAML=${formatValue(fromBlock)} vs Decorator=${formatValue(fromDecorator)} (using decorator)`,
            );
        }
    }

    for (const field of LIST_FIELDS) {
        const fromBlock = block[field];
        const fromDecorator = decorators[field];
        if (!isSet(fromBlock) || !isSet(fromDecorator)) continue;
        const blockSet = asSortedSet(fromBlock);
        const decoratorSet = asSortedSet(fromDecorator);
        if (!isDeepStrictEqual(blockSet, decoratorSet)) {
            conflicts.push(
                `Conflict in ${endpointId} field "${field}": ` +
                `YAML=[${blockSet.join(', ')}] vs Decorator=[${decoratorSet.join(', ')}] (using decorator)`,
            );
        }
    }

    const blockResponses = block.responses;
    const decoratorResponses = decorators.responses;
    if (isRecord(blockResponses) && isRecord(decoratorResponses)) {
        for (const status of Object.keys(blockResponses)) {
            if (!(status in decoratorResponses)) continue;
            if (!isDeepStrictEqual(blockResponses[status], decoratorResponses[status])) {
                conflicts.push(
                    `Conflict in ${endpointId} response ${status}: ` +
                    'Both YAML and decorator define this status code (merging, decorator takes precedence)',
                );
            }
        }
    }

    return conflicts;
}

// ── Merge ────────────────────────────────────────────────

const DECORATOR_WINS = ['summary', 'description', 'operationId', 'deprecated', 'externalDocs', 'tags', 'security'] as const;

/**
 * Merge block metadata with decorator metadata for one endpoint.
 *
 * @param block - Mapping parsed from the docstring block
 * @param decorators - Mapping assembled from `@openapi.*` decorators
 * @param path - Route path (used in conflict messages)
 * @param method - Lowercase HTTP method (filters method-scoped entries)
 */
export function mergeEndpointMetadata(
    block: OpenApiMap,
    decorators: OpenApiMap | undefined,
    path = '',
    method = '',
): MergeResult {
    if (!decorators || Object.keys(decorators).length === 0) {
        return { merged: clone(block), conflicts: [] };
    }

    const conflicts = detectConflicts(block, decorators, path, method);
    const merged = clone(block);

    for (const field of DECORATOR_WINS) {
        if (field in decorators) merged[field] = clone(decorators[field]);
    }

    const blockParams = merged.parameters;
    const decoratorParams = decorators.parameters;
    if (isSet(blockParams) || isSet(decoratorParams)) {
        merged.parameters = mergeListFields(blockParams, decoratorParams, 'name');
    }

    const requestBody = decorators.requestBody;
    if (isRecord(requestBody) && Object.keys(requestBody).length > 0) {
        if (appliesTo(requestBody, method)) merged.requestBody = withoutMethods(requestBody);
    }

    if (isSet(merged.responses) || isSet(decorators.responses)) {
        merged.responses = mergeResponses(merged.responses, decorators.responses, method);
    }

    if ('x-examples' in decorators) placeExamples(merged, decorators['x-examples'], method);
    if ('x-response-headers' in decorators) merged['x-response-headers'] = clone(decorators['x-response-headers']);

    return { merged, conflicts };
}
