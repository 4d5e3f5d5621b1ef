/**
 * Constants — Markers, Key Sets and Name Tables
 *
 * Everything the scanners match against by name lives here so that the
 * recognized vocabulary of the analyzed code base is visible in one place.
 *
 * @module
 */

// ── Documentation Blocks ─────────────────────────────────

export const DEFAULT_OPENAPI_START = '>>>openapi';
export const DEFAULT_OPENAPI_END = '<<<openapi';

/** Docstring marker that excludes a handler (or a whole module) from the swagger document */
export const IGNORE_MARKER = '@openapi: ignore';

/** Operation fields copied from handler metadata into the swagger document */
export const SUPPORTED_KEYS = [
    'summary',
    'description',
    'tags',
    'parameters',
    'requestBody',
    'responses',
    'security',
] as const;

export type SupportedKey = typeof SUPPORTED_KEYS[number];

export const HTTP_METHODS: ReadonlySet<string> = new Set([
    'get', 'post', 'put', 'delete', 'patch', 'options', 'head',
]);

// ── Routing Decorators ───────────────────────────────────

export const ROUTE_DECORATORS = {
    variable: 'uri_variable_mapping',
    static: 'uri_mapping',
    pattern: 'uri_pattern_mapping',
} as const;

export const ROUTE_DECORATOR_NAMES: ReadonlySet<string> = new Set(Object.values(ROUTE_DECORATORS));

/** f-string placeholders that resolve to a fixed literal inside route paths */
export const PATH_PLACEHOLDERS: Readonly<Record<string, string>> = {
    API_VERSION: 'v1',
};

// ── Schema Vocabulary ────────────────────────────────────

export const SCHEMA_REF_PREFIX = '#/components/schemas/';

/** Capitalized names that are typing constructs, never model references */
export const TYPING_KEYWORDS: ReadonlySet<string> = new Set([
    'Optional', 'Union', 'List', 'Dict', 'Any', 'Type', 'Callable', 'Tuple', 'Set', 'Literal',
]);

export const NON_MODEL_BASES: ReadonlySet<string> = new Set([
    'object', 'ABC', 'ABCMeta', 'type', 'Protocol',
    'Dict', 'List', 'Tuple', 'Set', 'Mapping', 'Sequence', 'Iterable',
]);

export const EXCLUDE_EXTENSION = 'x-openapi-exclude';
export const MANAGED_EXTENSION = 'x-openapi-managed';

/** Helper modules (relative to the models root) that define attribute-alias decorators */
export const ATTRIBUTE_ALIAS_MODULES = ['openapi/openapi.py', 'openapi/core.py'] as const;

/** Bounds on iterative rewriting of annotation text */
export const MAX_UNION_FLATTEN_PASSES = 10;
export const MAX_ALIAS_EXPANSION_PASSES = 5;

export function schemaRef(name: string): string {
    return `${SCHEMA_REF_PREFIX}${name}`;
}

export function normalizeExtensionKey(name: string): string {
    return name.startsWith('x-') ? name : `x-${name}`;
}
