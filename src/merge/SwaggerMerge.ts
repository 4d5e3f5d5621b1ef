/**
 * SwaggerMerge — Reconcile Scanned Code With the Swagger Document
 *
 * Writes each endpoint's canonical operation into `paths` and each
 * generated model schema into `components.schemas`, recording a unified
 * diff for everything that changed. The document is mutated in place;
 * persisting it is the caller's decision.
 *
 * @module
 */
import { basename } from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import { HTTP_METHODS } from '../constants.js';
import { resolveEndpointMetadata, toOpenApiOperation } from '../endpoint/Endpoint.js';
import { emit, type SyncObserverFn } from '../observability/SyncObserver.js';
import { ensureRecord, isRecord, type ComponentMap, type Endpoint, type SwaggerDocument } from '../types.js';
import { diffValues, dumpYamlLines, unifiedDiff } from './UnifiedDiff.js';

// ── Operations ───────────────────────────────────────────

export interface OperationDiff {
    readonly path: string;
    readonly method: string;
    readonly lines: readonly string[];
}

export interface EndpointMergeResult {
    readonly swagger: SwaggerDocument;
    readonly changed: boolean;
    /** `Updated GET /api/v1/items from items.py:list_items` */
    readonly notes: readonly string[];
    /** One entry per changed operation, in endpoint order */
    readonly diffs: readonly OperationDiff[];
}

/**
 * Merge every endpoint's operation into `swagger.paths`.
 *
 * Metadata conflicts between docstring blocks and decorators are
 * reported through the observer; changed operations are emitted as
 * `operation.changed` as well as returned.
 */
export function mergeEndpoints(
    swagger: SwaggerDocument,
    endpoints: readonly Endpoint[],
    observer?: SyncObserverFn,
): EndpointMergeResult {
    const paths = ensureRecord(swagger, 'paths');
    const notes: string[] = [];
    const diffs: OperationDiff[] = [];

    for (const endpoint of endpoints) {
        const entry = ensureRecord(paths, endpoint.path);
        const { merged, conflicts } = resolveEndpointMetadata(endpoint);
        if (observer) {
            for (const message of conflicts) emit(observer, { type: 'metadata.conflict', message });
        }

        const operation = toOpenApiOperation(endpoint, merged);
        const existing = entry[endpoint.method];
        if (isDeepStrictEqual(existing, operation)) continue;

        const lines = diffValues(existing, operation, `${endpoint.path}#${endpoint.method}`);
        const note = `Updated ${endpoint.method.toUpperCase()} ${endpoint.path} from ${basename(endpoint.file)}:${endpoint.function}`;
        entry[endpoint.method] = operation;
        notes.push(note);
        diffs.push({ path: endpoint.path, method: endpoint.method, lines });
        if (observer) {
            emit(observer, { type: 'operation.changed', path: endpoint.path, method: endpoint.method, note, diff: lines });
        }
    }

    return { swagger, changed: diffs.length > 0, notes, diffs };
}

// ── Orphans ──────────────────────────────────────────────

/**
 * Swagger entries with no code behind them.
 *
 * Component orphans are only reported when `components` is given and
 * the document has at least one schema.
 */
export function detectOrphans(
    swagger: SwaggerDocument,
    endpoints: readonly Endpoint[],
    components?: ComponentMap,
): string[] {
    const codePairs = new Set(endpoints.map((endpoint) => `${endpoint.path}\u0000${endpoint.method}`));
    const orphans: string[] = [];

    const paths = swagger.paths;
    if (isRecord(paths)) {
        for (const [path, methods] of Object.entries(paths)) {
            if (!isRecord(methods)) continue;
            for (const method of Object.keys(methods)) {
                const lower = method.toLowerCase();
                if (!HTTP_METHODS.has(lower) || codePairs.has(`${path}\u0000${lower}`)) continue;
                orphans.push(`Path present only in swagger (no handler): ${method.toUpperCase()} ${path}`);
            }
        }
    }

    if (components) {
        for (const name of Object.keys(documentSchemas(swagger))) {
            if (!(name in components)) orphans.push(`Component present only in swagger (no model class): ${name}`);
        }
    }

    return orphans;
}

// ── Components ───────────────────────────────────────────

export interface ComponentSyncResult {
    readonly changed: boolean;
    /** Names written because they were new or drifted */
    readonly updated: readonly string[];
    /** Excluded names deleted from the document */
    readonly removed: readonly string[];
}

/** `components.schemas` of a loaded document, or an empty mapping */
export function documentSchemas(swagger: SwaggerDocument): Record<string, unknown> {
    const components = swagger.components;
    if (!isRecord(components)) return {};
    return isRecord(components.schemas) ? components.schemas : {};
}

/**
 * Write generated component schemas and drop excluded ones.
 *
 * A schema that differs structurally but serializes identically is
 * replaced silently; anything else emits `component.changed` with its diff.
 */
export function syncComponents(
    swagger: SwaggerDocument,
    components: ComponentMap,
    excluded: ReadonlySet<string>,
    observer?: SyncObserverFn,
): ComponentSyncResult {
    const updated: string[] = [];
    const removed: string[] = [];
    if (Object.keys(components).length === 0 && excluded.size === 0) {
        return { changed: false, updated, removed };
    }

    const schemas = ensureRecord(ensureRecord(swagger, 'components'), 'schemas');

    for (const [name, schema] of Object.entries(components)) {
        const existing = schemas[name];
        if (isDeepStrictEqual(existing, schema)) continue;

        const before = dumpYamlLines(existing);
        const after = dumpYamlLines(schema);
        if (observer && !isDeepStrictEqual(before, after)) {
            emit(observer, {
                type: 'component.changed',
                name,
                change: existing === undefined ? 'added' : 'drift',
                diff: unifiedDiff(before, after, `components.schemas.${name}`),
            });
        }
        schemas[name] = structuredClone(schema);
        updated.push(name);
    }

    for (const name of [...excluded].sort()) {
        if (!(name in schemas)) continue;
        if (observer) {
            emit(observer, {
                type: 'component.changed',
                name,
                change: 'removed',
                diff: diffValues(schemas[name], undefined, `components.schemas.${name}`),
            });
        }
        delete schemas[name];
        removed.push(name);
    }

    return { changed: updated.length > 0 || removed.length > 0, updated, removed };
}
