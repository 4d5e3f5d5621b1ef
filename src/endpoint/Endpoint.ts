/**
 * Endpoint — Scanned Handler → OpenAPI Operation
 *
 * Computes the canonical operation object the swagger document should
 * hold for one endpoint. Metadata from the docstring block and from
 * `@openapi.*` decorators is merged on demand, never cached.
 *
 * @module
 */
import { basename } from 'node:path';
import { SUPPORTED_KEYS } from '../constants.js';
import { mergeEndpointMetadata, type MergeResult } from '../merge/MetadataMerge.js';
import type { Endpoint, OpenApiMap } from '../types.js';

/** Block metadata merged with decorator metadata (decorators win) */
export function resolveEndpointMetadata(endpoint: Endpoint): MergeResult {
    return mergeEndpointMetadata(endpoint.meta, endpoint.decoratorMetadata, endpoint.path, endpoint.method);
}

/**
 * Operation object for the swagger document: only recognized operation
 * fields are kept, `responses` defaults to a bare `200`, and a scalar
 * `tags` value is wrapped in a list.
 *
 * @param meta - Pre-merged metadata; resolved from the endpoint when omitted
 */
export function toOpenApiOperation(endpoint: Endpoint, meta?: OpenApiMap): OpenApiMap {
    const source = meta ?? resolveEndpointMetadata(endpoint).merged;
    const operation: OpenApiMap = {};
    for (const key of SUPPORTED_KEYS) {
        if (key in source) operation[key] = structuredClone(source[key]);
    }
    if (!('responses' in operation)) {
        operation.responses = { '200': { description: 'OK' } };
    }
    if (typeof operation.tags === 'string') {
        operation.tags = [operation.tags];
    }
    return operation;
}

/** `GET /api/v1/items (items.py:list_items)` */
export function describeEndpoint(endpoint: Endpoint): string {
    return `${endpoint.method.toUpperCase()} ${endpoint.path} (${basename(endpoint.file)}:${endpoint.function})`;
}
