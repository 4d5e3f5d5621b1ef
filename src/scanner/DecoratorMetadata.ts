/**
 * DecoratorMetadata — `@openapi.*` Handler Decorators
 *
 * Reads documentation decorators stacked on a handler method and turns
 * them into operation fields that merge with the docstring block:
 *
 * ```python
 * @uri_variable_mapping("/api/v1/guilds/{guild_id}", method="GET")
 * @openapi.tags("guilds")
 * @openapi.security("X-AUTH-TOKEN")
 * @openapi.response(200, description="Guild found", schema=DiscordGuild)
 * def get(self, request, **kwargs): ...
 * ```
 *
 * Only the call form `@openapi.<name>(...)` counts, and only when the
 * receiver is literally named `openapi`.
 *
 * @module
 */
import { schemaRef } from '../constants.js';
import type { SyntaxNode } from '../python/PythonParser.js';
import { extractConstant, type LiteralValue } from '../python/literals.js';
import { callParts, statements, type CallParts } from '../python/syntax.js';
import type { OpenApiMap } from '../types.js';

export interface ResponseDecorator {
    readonly statusCodes: readonly LiteralValue[];
    readonly description?: LiteralValue;
    readonly contentType?: string;
    readonly content?: OpenApiMap;
}

export interface HandlerDecorators {
    readonly tags: readonly string[];
    readonly security: readonly string[];
    readonly responses: readonly ResponseDecorator[];
    readonly summary?: string;
    readonly description?: string;
    readonly operationId?: string;
    readonly deprecated: boolean;
    /** `@openapi.ignore()` is present */
    readonly ignored: boolean;
}

// ── Recognition ──────────────────────────────────────────

/** `openapi.<name>(...)` → `<name>`; anything else → undefined */
function openApiDecoratorName(call: CallParts): string | undefined {
    if (call.func.type !== 'attribute') return undefined;
    const receiver = call.func.childForFieldName('object');
    if (receiver?.type !== 'identifier' || receiver.text !== 'openapi') return undefined;
    return call.func.childForFieldName('attribute')?.text;
}

function stringArgs(call: CallParts): string[] {
    const values: string[] = [];
    for (const arg of call.args) {
        const value = extractConstant(arg);
        if (typeof value === 'string') values.push(value);
    }
    return values;
}

function firstString(call: CallParts): string | undefined {
    const first = call.args[0];
    if (!first) return undefined;
    const value = extractConstant(first);
    return typeof value === 'string' ? value : undefined;
}

function parseResponse(call: CallParts): ResponseDecorator {
    let statusCodes: LiteralValue[] = [];
    const status = call.args[0];
    if (status?.type === 'list') {
        statusCodes = statements(status)
            .map((element) => extractConstant(element))
            .filter((value): value is LiteralValue => value !== undefined);
    } else if (status) {
        const value = extractConstant(status);
        if (value !== undefined) statusCodes = [value];
    }

    let contentType: string | undefined;
    for (const { name, value } of call.keywords) {
        const constant = extractConstant(value);
        if (name === 'contentType' && typeof constant === 'string') contentType = constant;
    }

    let description: LiteralValue | undefined;
    let content: OpenApiMap | undefined;
    for (const { name, value } of call.keywords) {
        if (name === 'description') {
            const constant = extractConstant(value);
            if (constant !== undefined) description = constant;
        } else if (name === 'schema' && value.type === 'identifier') {
            content = { [contentType ?? 'application/json']: { schema: { $ref: schemaRef(value.text) } } };
        }
    }

    return {
        statusCodes,
        ...(description !== undefined ? { description } : {}),
        ...(contentType !== undefined ? { contentType } : {}),
        ...(content !== undefined ? { content } : {}),
    };
}

// ── Extraction ───────────────────────────────────────────

/** Collect `@openapi.*` decorators in source order (later summaries win) */
export function extractHandlerDecorators(decorators: readonly SyntaxNode[]): HandlerDecorators {
    const tags: string[] = [];
    const security: string[] = [];
    const responses: ResponseDecorator[] = [];
    let summary: string | undefined;
    let description: string | undefined;
    let operationId: string | undefined;
    let deprecated = false;
    let ignored = false;

    for (const decorator of decorators) {
        const call = callParts(decorator);
        if (!call) continue;
        switch (openApiDecoratorName(call)) {
            case 'tags':
                tags.push(...stringArgs(call));
                break;
            case 'security':
                security.push(...stringArgs(call));
                break;
            case 'response':
                responses.push(parseResponse(call));
                break;
            case 'summary':
                summary = firstString(call);
                break;
            case 'description':
                description = firstString(call);
                break;
            case 'operationId':
                operationId = firstString(call);
                break;
            case 'deprecated':
                deprecated = true;
                break;
            case 'ignore':
                ignored = true;
                break;
        }
    }

    return {
        tags,
        security,
        responses,
        deprecated,
        ignored,
        ...(summary !== undefined ? { summary } : {}),
        ...(description !== undefined ? { description } : {}),
        ...(operationId !== undefined ? { operationId } : {}),
    };
}

/**
 * Operation fields from decorators; empty ones are omitted.
 *
 * ```
 * { tags: ['guilds'], security: [{ 'X-AUTH-TOKEN': [] }],
 *   responses: { '200': { description: 'Guild found', content: {...} } } }
 * ```
 */
export function decoratorMetadataToMap(decorators: HandlerDecorators): OpenApiMap {
    const result: OpenApiMap = {};
    if (decorators.tags.length > 0) result.tags = [...decorators.tags];
    if (decorators.security.length > 0) result.security = decorators.security.map((name) => ({ [name]: [] }));
    if (decorators.responses.length > 0) result.responses = buildResponses(decorators.responses);
    if (decorators.summary) result.summary = decorators.summary;
    if (decorators.description) result.description = decorators.description;
    if (decorators.operationId) result.operationId = decorators.operationId;
    if (decorators.deprecated) result.deprecated = true;
    return result;
}

function buildResponses(responses: readonly ResponseDecorator[]): OpenApiMap {
    const built: OpenApiMap = {};
    for (const response of responses) {
        for (const code of response.statusCodes) {
            built[String(code)] = {
                description: response.description ?? 'Response',
                ...(response.content !== undefined ? { content: response.content } : {}),
            };
        }
    }
    return built;
}
