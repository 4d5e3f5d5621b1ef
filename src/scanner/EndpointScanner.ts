/**
 * EndpointScanner — Routed Handler Methods → Endpoints
 *
 * Walks the handler tree and reads every class method carrying a routing
 * decorator. Each declared HTTP method becomes one {@link Endpoint} with
 * the docstring block (and `@openapi.*` decorators) as its metadata.
 *
 * Two block layouts are accepted. Flat blocks describe every method the
 * handler serves; method-rooted blocks describe each one separately:
 *
 * ```yaml
 * get:
 *   summary: List items
 * post:
 *   summary: Create item
 * ```
 *
 * @module
 */
import { HTTP_METHODS, IGNORE_MARKER, ROUTE_DECORATORS, ROUTE_DECORATOR_NAMES } from '../constants.js';
import { MethodMismatchError } from '../errors.js';
import type { ScanSession } from '../ScanSession.js';
import { parsePython, PythonSyntaxError, type SyntaxNode } from '../python/PythonParser.js';
import { decodeStringLiteral, resolvePathLiteral } from '../python/literals.js';
import { bodyOf, callParts, classDefinitions, docstringOf, functionDefinitions, lineOf, statements } from '../python/syntax.js';
import { isRecord, type Endpoint, type EndpointScanResult, type IgnoredEndpoint, type OpenApiMap } from '../types.js';
import { decoratorMetadataToMap, extractHandlerDecorators } from './DecoratorMetadata.js';
import { extractOpenApiBlock } from './OpenApiBlock.js';
import { isIgnoredFile, listPythonFiles, readSource } from './SourceWalker.js';

interface RouteDecorator {
    readonly kind: string;
    /** null when the path argument is not a literal the scanner can resolve */
    readonly path: string | null;
    readonly methods: readonly string[];
}

/** Render like a Python list literal: `['get', 'post']` */
function formatMethodList(methods: Iterable<string>): string {
    return `[${[...methods].sort().map((m) => `'${m}'`).join(', ')}]`;
}

// ── Route Decorators ─────────────────────────────────────

function parseRouteDecorator(decorator: SyntaxNode): RouteDecorator | undefined {
    const call = callParts(decorator);
    if (!call || call.func.type !== 'identifier') return undefined;
    const kind = call.func.text;
    if (!ROUTE_DECORATOR_NAMES.has(kind)) return undefined;

    const first = call.args[0];
    if (!first) return undefined;
    const path = resolvePathLiteral(first);

    let methods: string[] = ['get'];
    for (const { name, value } of call.keywords) {
        if (name !== 'method') continue;
        const single = decodeStringLiteral(value);
        if (single !== undefined) {
            methods = [single.toLowerCase()];
        } else if (value.type === 'list' || value.type === 'tuple') {
            const collected = statements(value)
                .map((element) => decodeStringLiteral(element))
                .filter((element): element is string => element !== undefined)
                .map((element) => element.toLowerCase());
            if (collected.length > 0) methods = collected;
        }
    }
    return { kind, path, methods };
}

// ── Scanner ──────────────────────────────────────────────

/**
 * Scan a handler tree.
 *
 * @throws {MethodMismatchError} in strict mode, when a method-rooted block
 *   names a method the routing decorator does not declare
 * @throws {OpenApiBlockError} when a handler's block is not a YAML mapping
 */
export function scanEndpoints(handlersRoot: string, session: ScanSession): EndpointScanResult {
    const endpoints: Endpoint[] = [];
    const ignored: IgnoredEndpoint[] = [];

    for (const file of listPythonFiles(handlersRoot)) {
        if (isIgnoredFile(file, handlersRoot, session.ignoreFiles)) continue;
        const source = readSource(file);
        if (source === undefined) continue;

        let root: SyntaxNode;
        try {
            root = parsePython(source);
        } catch (err) {
            if (!(err instanceof PythonSyntaxError)) throw err;
            session.emit({ type: 'file.skipped', file, reason: `syntax error: ${err.message}` });
            continue;
        }

        const moduleIgnored = docstringOf(root).includes(IGNORE_MARKER);
        for (const cls of classDefinitions(root)) {
            const body = bodyOf(cls.node);
            if (!body) continue;
            for (const fn of functionDefinitions(body)) {
                scanHandler(fn.node, fn.name, fn.decorators, file, moduleIgnored, session, endpoints, ignored);
            }
        }
    }

    return { endpoints, ignored };
}

function scanHandler(
    node: SyntaxNode,
    name: string,
    decorators: readonly SyntaxNode[],
    file: string,
    moduleIgnored: boolean,
    session: ScanSession,
    endpoints: Endpoint[],
    ignored: IgnoredEndpoint[],
): void {
    const doc = docstringOf(bodyOf(node));
    const handlerIgnored = doc.includes(IGNORE_MARKER);
    const line = lineOf(node);
    const openapi = extractHandlerDecorators(decorators);
    const decoratorMetadata = decoratorMetadataToMap(openapi);

    for (const decorator of decorators) {
        const route = parseRouteDecorator(decorator);
        if (!route) continue;
        if (route.path === null || route.path === '') {
            const reason = route.path === null ? 'path is not a literal' : 'path is empty';
            session.emit({ type: 'route.skipped', file, handler: name, line, decorator: route.kind, reason });
            continue;
        }
        const path = route.path;

        if (route.kind === ROUTE_DECORATORS.pattern) {
            for (const method of route.methods) ignored.push({ path, method, file, function: name });
            continue;
        }

        const block = extractOpenApiBlock(doc, session.markers);
        const methodKeys = Object.keys(block).filter((key) => HTTP_METHODS.has(key.toLowerCase()));

        if (methodKeys.length > 0) {
            checkDeclaredMethods(methodKeys, route.methods, name, file, line, session);
        }

        for (const method of route.methods) {
            if (moduleIgnored || handlerIgnored || openapi.ignored) {
                ignored.push({ path, method, file, function: name });
                continue;
            }
            const meta = methodKeys.length > 0 ? methodBlock(block, method) : block;
            endpoints.push({
                path,
                method,
                file,
                function: name,
                line,
                meta,
                ...(Object.keys(decoratorMetadata).length > 0 ? { decoratorMetadata } : {}),
            });
        }
    }
}

function methodBlock(block: OpenApiMap, method: string): OpenApiMap {
    for (const [key, value] of Object.entries(block)) {
        if (key.toLowerCase() === method && isRecord(value)) return value;
    }
    return {};
}

function checkDeclaredMethods(
    methodKeys: readonly string[],
    declaredMethods: readonly string[],
    handler: string,
    file: string,
    line: number,
    session: ScanSession,
): void {
    const declared = new Set(declaredMethods);
    const undeclared = new Set(methodKeys.map((key) => key.toLowerCase()).filter((key) => !declared.has(key)));
    if (undeclared.size === 0) return;

    const message =
        `OpenAPI docstring method(s) ${formatMethodList(undeclared)} not declared in decorator for ${handler} ` +
        `at ${file}:${line}. Decorator methods: ${formatMethodList(declared)}`;
    if (session.strict) {
        throw new MethodMismatchError(message, {
            handler,
            file,
            line,
            undeclared: [...undeclared].sort(),
            declared: [...declared].sort(),
        });
    }
    session.emit({ type: 'method.mismatch', message: `WARNING: ${message}`, file, handler });
}
