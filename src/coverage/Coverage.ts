/**
 * Coverage — How Much of the API Is Documented From Code
 *
 * Compares scanned endpoints and model components with the swagger
 * document as it was loaded (before any merge), and counts handlers with
 * documentation, operations that already match, and swagger entries no
 * code backs.
 *
 * @module
 */
import { isDeepStrictEqual } from 'node:util';
import { HTTP_METHODS } from '../constants.js';
import { resolveEndpointMetadata, toOpenApiOperation } from '../endpoint/Endpoint.js';
import { documentSchemas } from '../merge/SwaggerMerge.js';
import { isRecord, type ComponentMap, type Endpoint, type IgnoredEndpoint, type SwaggerDocument } from '../types.js';

// ── Result Shapes ────────────────────────────────────────

export interface EndpointCoverage {
    readonly path: string;
    readonly method: string;
    readonly file: string;
    readonly function: string;
    readonly hasBlock: boolean;
    readonly hasDecorators: boolean;
    readonly inSwagger: boolean;
    /** The swagger operation equals the one generated from code */
    readonly definitionMatches: boolean;
}

export interface MethodCoverage {
    readonly total: number;
    readonly documented: number;
    readonly inSwagger: number;
}

export interface OperationRef {
    readonly path: string;
    readonly method: string;
}

export interface CoverageSummary {
    readonly handlersTotal: number;
    readonly ignoredTotal: number;
    readonly withBlock: number;
    readonly withDecorators: number;
    /** Handlers with a block, decorators, or both */
    readonly documented: number;
    readonly undocumented: number;
    readonly handlersInSwagger: number;
    readonly definitionMatches: number;
    readonly swaggerOperationsTotal: number;
    readonly swaggerOnlyOperations: number;
    readonly componentsTotal: number;
    readonly componentsGenerated: number;
    readonly orphanedComponents: number;
    readonly documentationRate: number;
    readonly swaggerRate: number;
    /** Matches over documented handlers */
    readonly definitionMatchRate: number;
    /** Share of swagger components backed by a model class (1 when there are none) */
    readonly componentAutomationRate: number;
    /** Keyed by uppercase method */
    readonly methods: Readonly<Record<string, MethodCoverage>>;
    /** Tag → number of handlers using it */
    readonly tags: Readonly<Record<string, number>>;
}

export interface CoverageResult {
    readonly summary: CoverageSummary;
    readonly endpoints: readonly EndpointCoverage[];
    readonly swaggerOnly: readonly OperationRef[];
    readonly orphanedComponents: readonly string[];
}

// ── Computation ──────────────────────────────────────────

function rate(count: number, total: number, empty = 0): number {
    return total > 0 ? count / total : empty;
}

function swaggerOperations(swagger: SwaggerDocument): OperationRef[] {
    const operations: OperationRef[] = [];
    if (!isRecord(swagger.paths)) return operations;
    for (const [path, methods] of Object.entries(swagger.paths)) {
        if (!isRecord(methods)) continue;
        for (const [method, operation] of Object.entries(methods)) {
            const lower = method.toLowerCase();
            if (HTTP_METHODS.has(lower) && isRecord(operation)) operations.push({ path, method: lower });
        }
    }
    return operations;
}

function existingOperation(swagger: SwaggerDocument, path: string, method: string): unknown {
    const paths = swagger.paths;
    if (!isRecord(paths)) return undefined;
    const entry = paths[path];
    return isRecord(entry) ? entry[method] : undefined;
}

/**
 * @param swagger - The document as loaded, before merging
 * @param components - Generated model components; when omitted every
 *   swagger component counts as orphaned
 */
export function computeCoverage(
    endpoints: readonly Endpoint[],
    ignored: readonly IgnoredEndpoint[],
    swagger: SwaggerDocument,
    components?: ComponentMap,
): CoverageResult {
    const records: EndpointCoverage[] = [];
    const methods: Record<string, { total: number; documented: number; inSwagger: number }> = {};
    const tags: Record<string, number> = {};
    let withBlock = 0;
    let withDecorators = 0;
    let documented = 0;
    let inSwagger = 0;
    let definitionMatches = 0;

    for (const endpoint of endpoints) {
        const hasBlock = Object.keys(endpoint.meta).length > 0;
        const hasDecorators = endpoint.decoratorMetadata !== undefined && Object.keys(endpoint.decoratorMetadata).length > 0;
        const isDocumented = hasBlock || hasDecorators;
        if (hasBlock) withBlock++;
        if (hasDecorators) withDecorators++;
        if (isDocumented) documented++;

        const methodKey = endpoint.method.toUpperCase();
        const stats = (methods[methodKey] ??= { total: 0, documented: 0, inSwagger: 0 });
        stats.total++;
        if (isDocumented) stats.documented++;

        const { merged } = resolveEndpointMetadata(endpoint);
        const endpointTags = typeof merged.tags === 'string' ? [merged.tags] : Array.isArray(merged.tags) ? merged.tags : [];
        for (const tag of endpointTags) {
            const name = String(tag);
            tags[name] = (tags[name] ?? 0) + 1;
        }

        const existing = existingOperation(swagger, endpoint.path, endpoint.method);
        let matches = false;
        if (existing !== undefined) {
            inSwagger++;
            stats.inSwagger++;
            matches = isDeepStrictEqual(existing, toOpenApiOperation(endpoint, merged));
            if (matches && isDocumented) definitionMatches++;
        }

        records.push({
            path: endpoint.path,
            method: endpoint.method,
            file: endpoint.file,
            function: endpoint.function,
            hasBlock,
            hasDecorators,
            inSwagger: existing !== undefined,
            definitionMatches: matches,
        });
    }

    const codePairs = new Set(endpoints.map((e) => `${e.path}\u0000${e.method}`));
    const operations = swaggerOperations(swagger);
    const swaggerOnly = operations.filter((op) => !codePairs.has(`${op.path}\u0000${op.method}`));

    const schemaNames = Object.keys(documentSchemas(swagger));
    const orphanedComponents = components ? schemaNames.filter((name) => !(name in components)) : schemaNames;

    const handlersTotal = endpoints.length;
    const summary: CoverageSummary = {
        handlersTotal,
        ignoredTotal: ignored.length,
        withBlock,
        withDecorators,
        documented,
        undocumented: handlersTotal - documented,
        handlersInSwagger: inSwagger,
        definitionMatches,
        swaggerOperationsTotal: operations.length,
        swaggerOnlyOperations: swaggerOnly.length,
        componentsTotal: schemaNames.length,
        componentsGenerated: components ? Object.keys(components).length : 0,
        orphanedComponents: orphanedComponents.length,
        documentationRate: rate(documented, handlersTotal),
        swaggerRate: rate(inSwagger, handlersTotal),
        definitionMatchRate: rate(definitionMatches, documented),
        componentAutomationRate: rate(schemaNames.length - orphanedComponents.length, schemaNames.length, 1),
        methods,
        tags,
    };

    return { summary, endpoints: records, swaggerOnly, orphanedComponents };
}
