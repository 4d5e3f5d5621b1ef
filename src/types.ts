/**
 * Shared data shapes for scanned code and the swagger document.
 *
 * @module
 */

/** A mapping loaded from YAML or assembled from decorators */
export type OpenApiMap = Record<string, unknown>;

/**
 * OpenAPI schema fragment. Known keywords are typed; extensions and any
 * other keyword authored in a documentation block pass through untouched.
 */
export interface SchemaObject {
    type?: string;
    format?: string;
    description?: string;
    enum?: unknown[];
    items?: SchemaObject;
    properties?: Record<string, SchemaObject>;
    required?: string[];
    nullable?: boolean;
    $ref?: string;
    allOf?: SchemaObject[];
    oneOf?: SchemaObject[];
    anyOf?: SchemaObject[];
    default?: unknown;
    [keyword: string]: unknown;
}

/** Component name → schema (generated, or verbatim from a documentation block) */
export type ComponentMap = Record<string, OpenApiMap>;

// ── Scan Results ─────────────────────────────────────────

/** One HTTP operation implemented by a decorated handler method */
export interface Endpoint {
    readonly path: string;
    /** Lowercase HTTP verb */
    readonly method: string;
    readonly file: string;
    readonly function: string;
    /** 1-based line of the handler definition */
    readonly line: number;
    /** Parsed documentation block (empty when the handler has none) */
    readonly meta: OpenApiMap;
    /** Metadata assembled from `@openapi.*` decorators on the handler */
    readonly decoratorMetadata?: OpenApiMap;
}

/** A handler excluded from the swagger document */
export interface IgnoredEndpoint {
    readonly path: string;
    readonly method: string;
    readonly file: string;
    readonly function: string;
}

export interface EndpointScanResult {
    readonly endpoints: readonly Endpoint[];
    readonly ignored: readonly IgnoredEndpoint[];
}

export interface ModelScanResult {
    readonly components: ComponentMap;
    readonly excluded: ReadonlySet<string>;
}

// ── Swagger Document ─────────────────────────────────────

/**
 * The swagger document as loaded from YAML. Only `paths` and
 * `components.schemas` are interpreted; everything else round-trips.
 */
export type SwaggerDocument = OpenApiMap;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Return `target[key]` as a mapping, creating (or replacing a non-mapping) when absent */
export function ensureRecord(target: Record<string, unknown>, key: string): Record<string, unknown> {
    const current = target[key];
    if (isRecord(current)) return current;
    const created: Record<string, unknown> = {};
    target[key] = created;
    return created;
}
