import { describe, it, expect } from 'vitest';
import {
    ConfigFileSchema,
    DEFAULT_CONFIG,
    mergeConfig,
    mergePartial,
    normalizeCoverageThreshold,
} from '../../src/config/SyncConfig.js';

// ============================================================================
// SyncConfig Tests
// ============================================================================

describe('SyncConfig', () => {
    // ── Default Config ──

    describe('DEFAULT_CONFIG', () => {
        it('should point at the conventional project layout', () => {
            expect(DEFAULT_CONFIG.swaggerFile).toBe('.swagger.v1.yaml');
            expect(DEFAULT_CONFIG.handlersRoot).toBe('bot/lib/http/handlers');
            expect(DEFAULT_CONFIG.modelsRoot).toBe('bot/lib/models');
        });

        it('should default to check mode with the standard markers', () => {
            expect(DEFAULT_CONFIG.mode).toBe('check');
            expect(DEFAULT_CONFIG.markers).toEqual({ start: '>>>openapi', end: '<<<openapi' });
        });

        it('should generate model components and skip validation by default', () => {
            expect(DEFAULT_CONFIG.options.modelComponents).toBe(true);
            expect(DEFAULT_CONFIG.options.validate).toBe(false);
            expect(DEFAULT_CONFIG.options.strict).toBe(false);
            expect(DEFAULT_CONFIG.options.failOnCoverageBelow).toBeUndefined();
        });
    });

    // ── mergeConfig ──

    describe('mergeConfig()', () => {
        it('should return defaults for empty partial', () => {
            expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
        });

        it('should override individual options', () => {
            const config = mergeConfig({ options: { strict: true, failOnCoverageBelow: 80 } });
            expect(config.options).toEqual({ ...DEFAULT_CONFIG.options, strict: true, failOnCoverageBelow: 80 });
        });

        it('should fill missing marker halves from defaults', () => {
            const config = mergeConfig({ markers: { start: '---api' } });
            expect(config.markers).toEqual({ start: '---api', end: '<<<openapi' });
        });

        it('should carry the project root and coverage report when set', () => {
            const config = mergeConfig({ projectRoot: 'src', output: { coverageReport: 'out/coverage.json' } });
            expect(config.projectRoot).toBe('src');
            expect(config.output).toEqual({ coverageReport: 'out/coverage.json', coverageFormat: 'json' });
        });
    });

    describe('mergePartial()', () => {
        it('should overlay sections key by key', () => {
            const merged = mergePartial(
                { swaggerFile: 'a.yaml', options: { strict: false, validate: true } },
                { options: { strict: true } },
            );
            expect(merged.swaggerFile).toBe('a.yaml');
            expect(merged.options).toEqual({ strict: true, validate: true });
        });
    });

    // ── Schema ──

    describe('ConfigFileSchema', () => {
        it('should accept environments', () => {
            const parsed = ConfigFileSchema.safeParse({ mode: 'fix', environments: { ci: { options: { strict: true } } } });
            expect(parsed.success).toBe(true);
        });

        it('should reject unknown keys and invalid values', () => {
            expect(ConfigFileSchema.safeParse({ options: { bogus: true } }).success).toBe(false);
            expect(ConfigFileSchema.safeParse({ mode: 'repair' }).success).toBe(false);
            expect(ConfigFileSchema.safeParse({ options: { failOnCoverageBelow: 120 } }).success).toBe(false);
        });
    });

    describe('normalizeCoverageThreshold()', () => {
        it('should read values above 1 as percentages', () => {
            expect(normalizeCoverageThreshold(80)).toBe(0.8);
            expect(normalizeCoverageThreshold(0.75)).toBe(0.75);
            expect(normalizeCoverageThreshold(1)).toBe(1);
        });
    });
});
