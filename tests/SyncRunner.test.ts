import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_CONFIG, type SyncConfig } from '../src/config/SyncConfig.js';
import { loadSwagger } from '../src/swagger/SwaggerFile.js';
import { exitCodeFor, hasDrift, listEndpoints, runSync } from '../src/SyncRunner.js';
import { collectEvents, createTempDir, lines, removeDir, writeFiles } from './helpers/fixtures.js';

const SWAGGER = lines(
    'openapi: 3.0.0',
    'info:',
    '  title: Test API',
    '  version: 1.0.0',
    'paths:',
    '  /api/v1/legacy:',
    '    get:',
    '      responses:',
    "        '200':",
    '          description: OK',
);

const HANDLERS = lines(
    'class ItemsHandler(BaseHandler):',
    '    @uri_mapping("/api/v1/items")',
    '    def list_items(self, request):',
    '        """',
    '        >>>openapi',
    '        summary: List items',
    '        tags: [items]',
    '        <<<openapi',
    '        """',
    '',
    '    @uri_mapping("/health")',
    '    def health(self, request):',
    '        pass',
);

const MODELS = lines(
    '@openapi.component("ItemModel")',
    'class ItemModel:',
    '    def __init__(self, data):',
    '        self.id: str = data["id"]',
);

function configFor(overrides: Partial<SyncConfig> = {}): SyncConfig {
    return {
        ...DEFAULT_CONFIG,
        swaggerFile: 'swagger.yaml',
        handlersRoot: 'handlers',
        modelsRoot: 'models',
        ...overrides,
    };
}

// ============================================================================
// SyncRunner Tests
// ============================================================================

describe('SyncRunner', () => {
    let dir: string;

    beforeEach(() => {
        dir = createTempDir();
        writeFiles(dir, {
            'swagger.yaml': SWAGGER,
            'handlers/items.py': HANDLERS,
            'models/item.py': MODELS,
        });
    });

    afterEach(() => {
        removeDir(dir);
    });

    describe('check mode', () => {
        it('should report drift without touching the file', () => {
            const config = configFor();
            const report = runSync({ config, cwd: dir, observer: collectEvents().observer });

            expect(report.operations.notes).toEqual([
                'Updated GET /api/v1/items from items.py:list_items',
                'Updated GET /health from items.py:health',
            ]);
            expect(report.componentSync.updated).toEqual(['ItemModel']);
            expect(report.orphans).toEqual(['Path present only in swagger (no handler): GET /api/v1/legacy']);
            expect(report.written).toBe(false);
            expect(readFileSync(join(dir, 'swagger.yaml'), 'utf-8')).toBe(SWAGGER);
            expect(hasDrift(report)).toBe(true);
            expect(exitCodeFor(report, config)).toBe(1);
        });

        it('should measure coverage against the loaded document', () => {
            const report = runSync({ config: configFor(), cwd: dir, observer: collectEvents().observer });
            expect(report.coverage.summary.handlersTotal).toBe(2);
            expect(report.coverage.summary.documented).toBe(1);
            expect(report.coverage.summary.documentationRate).toBe(0.5);
            expect(report.coverage.summary.handlersInSwagger).toBe(0);
        });

        it('should fail below the coverage threshold', () => {
            const base = configFor();
            const config = configFor({ options: { ...base.options, failOnCoverageBelow: 75 } });
            const report = runSync({ config, cwd: dir, observer: collectEvents().observer });
            expect(report.coverageFailed).toBe(true);

            const lenient = configFor({ options: { ...base.options, failOnCoverageBelow: 0.5 } });
            expect(runSync({ config: lenient, cwd: dir, observer: collectEvents().observer }).coverageFailed).toBe(false);
        });
    });

    describe('fix mode', () => {
        it('should write operations and components, then settle', () => {
            const report = runSync({ config: configFor({ mode: 'fix' }), cwd: dir, observer: collectEvents().observer });
            expect(report.written).toBe(true);
            expect(exitCodeFor(report, configFor({ mode: 'fix' }))).toBe(0);

            const saved = loadSwagger(join(dir, 'swagger.yaml'));
            expect(saved.paths).toEqual({
                '/api/v1/legacy': { get: { responses: { '200': { description: 'OK' } } } },
                '/api/v1/items': {
                    get: { summary: 'List items', tags: ['items'], responses: { '200': { description: 'OK' } } },
                },
                '/health': { get: { responses: { '200': { description: 'OK' } } } },
            });
            expect(saved.components).toEqual({
                schemas: {
                    ItemModel: { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] },
                },
            });

            const config = configFor();
            const rerun = runSync({ config, cwd: dir, observer: collectEvents().observer });
            expect(hasDrift(rerun)).toBe(false);
            expect(exitCodeFor(rerun, config)).toBe(0);
        });

        it('should leave components alone when model scanning is off', () => {
            const base = configFor({ mode: 'fix' });
            const config = configFor({ mode: 'fix', options: { ...base.options, modelComponents: false } });
            runSync({ config, cwd: dir, observer: collectEvents().observer });
            expect(loadSwagger(join(dir, 'swagger.yaml')).components).toBeUndefined();
        });
    });

    describe('coverage report', () => {
        it('should write the report where configured', () => {
            const config = configFor({ output: { coverageReport: 'reports/coverage.json', coverageFormat: 'json' } });
            const report = runSync({ config, cwd: dir, observer: collectEvents().observer });

            const path = join(dir, 'reports', 'coverage.json');
            expect(report.coverageReportPath).toBe(path);
            expect(existsSync(path)).toBe(true);
            const written: unknown = JSON.parse(readFileSync(path, 'utf-8'));
            expect(written).toMatchObject({ summary: { handlersTotal: 2, documented: 1 } });
        });
    });

    describe('listEndpoints()', () => {
        it('should scan handlers only', () => {
            const scan = listEndpoints({ config: configFor(), cwd: dir, observer: collectEvents().observer });
            expect(scan.endpoints.map((e) => `${e.method.toUpperCase()} ${e.path}`)).toEqual([
                'GET /api/v1/items',
                'GET /health',
            ]);
        });
    });
});
