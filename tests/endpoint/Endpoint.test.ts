import { describe, it, expect } from 'vitest';
import { describeEndpoint, resolveEndpointMetadata, toOpenApiOperation } from '../../src/endpoint/Endpoint.js';
import type { Endpoint } from '../../src/types.js';

function endpoint(overrides: Partial<Endpoint> = {}): Endpoint {
    return {
        path: '/api/v1/items',
        method: 'get',
        file: '/srv/handlers/items.py',
        function: 'list_items',
        line: 12,
        meta: {},
        ...overrides,
    };
}

// ============================================================================
// Endpoint Tests
// ============================================================================

describe('Endpoint', () => {
    describe('toOpenApiOperation()', () => {
        it('should default responses to a bare 200', () => {
            expect(toOpenApiOperation(endpoint())).toEqual({ responses: { '200': { description: 'OK' } } });
        });

        it('should keep recognized fields only and wrap a scalar tag', () => {
            const op = toOpenApiOperation(endpoint({
                meta: { summary: 'List items', tags: 'items', operationId: 'listItems', 'x-internal': true },
            }));
            expect(op).toEqual({
                summary: 'List items',
                tags: ['items'],
                responses: { '200': { description: 'OK' } },
            });
        });

        it('should copy rather than share nested values', () => {
            const meta = { parameters: [{ name: 'limit', in: 'query' }] };
            const op = toOpenApiOperation(endpoint({ meta }));
            expect(op.parameters).toEqual(meta.parameters);
            expect(op.parameters).not.toBe(meta.parameters);
        });

        it('should merge decorator metadata over the block', () => {
            const op = toOpenApiOperation(endpoint({
                meta: { summary: 'From block', description: 'Body text' },
                decoratorMetadata: { summary: 'From decorator', security: [{ Token: [] }] },
            }));
            expect(op).toEqual({
                summary: 'From decorator',
                description: 'Body text',
                security: [{ Token: [] }],
                responses: { '200': { description: 'OK' } },
            });
        });
    });

    describe('resolveEndpointMetadata()', () => {
        it('should name the endpoint in conflicts', () => {
            const { conflicts } = resolveEndpointMetadata(endpoint({
                meta: { summary: 'A' },
                decoratorMetadata: { summary: 'B' },
            }));
            expect(conflicts).toEqual([
                'Conflict in GET /api/v1/items field "summary": YAML=\'A\' vs Decorator=\'B\' (using decorator)',
            ]);
        });
    });

    describe('describeEndpoint()', () => {
        it('should show method, path, file name and function', () => {
            expect(describeEndpoint(endpoint())).toBe('GET /api/v1/items (items.py:list_items)');
        });
    });
});
