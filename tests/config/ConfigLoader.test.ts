import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { applyCliOverrides, findConfigFile, loadConfig, parseConfigFile } from '../../src/config/ConfigLoader.js';
import { DEFAULT_CONFIG } from '../../src/config/SyncConfig.js';
import { ConfigError } from '../../src/errors.js';
import { createTempDir, lines, removeDir, writeFiles } from '../helpers/fixtures.js';

// ============================================================================
// ConfigLoader Tests
// ============================================================================

describe('ConfigLoader', () => {
    let dir: string;

    beforeEach(() => {
        dir = createTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    describe('loadConfig()', () => {
        it('should fall back to defaults without a config file', () => {
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should auto-detect swagger-sync.yaml in cwd', () => {
            writeFiles(dir, {
                'swagger-sync.yaml': lines(
                    'swaggerFile: api/swagger.yaml',
                    'handlersRoot: src/handlers',
                    'options:',
                    '  showOrphans: true',
                ),
            });
            const config = loadConfig(undefined, dir);
            expect(config.swaggerFile).toBe('api/swagger.yaml');
            expect(config.handlersRoot).toBe('src/handlers');
            expect(config.modelsRoot).toBe(DEFAULT_CONFIG.modelsRoot);
            expect(config.options.showOrphans).toBe(true);
        });

        it('should prefer the .yaml spelling over .yml', () => {
            writeFiles(dir, {
                'swagger-sync.yml': 'mode: fix\n',
                'swagger-sync.yaml': 'mode: check\n',
            });
            expect(loadConfig(undefined, dir).mode).toBe('check');
        });

        it('should load an explicit path relative to cwd', () => {
            writeFiles(dir, { 'conf/sync.yaml': 'mode: fix\n' });
            expect(loadConfig('conf/sync.yaml', dir).mode).toBe('fix');
        });

        it('should treat an empty file as all defaults', () => {
            writeFiles(dir, { 'swagger-sync.yaml': '' });
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should overlay the requested environment', () => {
            writeFiles(dir, {
                'swagger-sync.yaml': lines(
                    'options:',
                    '  strict: false',
                    '  validate: true',
                    'environments:',
                    '  ci:',
                    '    options:',
                    '      strict: true',
                    '      color: never',
                ),
            });
            const base = loadConfig(undefined, dir);
            const ci = loadConfig(undefined, dir, 'ci');
            expect(base.options.strict).toBe(false);
            expect(ci.options).toMatchObject({ strict: true, validate: true, color: 'never' });
        });

        it('should fail on an unknown environment', () => {
            writeFiles(dir, { 'swagger-sync.yaml': 'mode: check\n' });
            const file = join(dir, 'swagger-sync.yaml');
            expect(() => loadConfig(undefined, dir, 'staging')).toThrow(
                `Environment "staging" not found in config file "${file}"`,
            );
        });

        it('should fail when an environment is requested without a file', () => {
            expect(() => loadConfig(undefined, dir, 'ci')).toThrow(
                'Environment "ci" requested but no configuration file was found',
            );
        });
    });

    describe('findConfigFile()', () => {
        it('should throw for a missing explicit path', () => {
            expect(() => findConfigFile('nope.yaml', dir)).toThrow(ConfigError);
            expect(() => findConfigFile('nope.yaml', dir)).toThrow(`Config file not found: "${join(dir, 'nope.yaml')}"`);
        });

        it('should return undefined when nothing is found', () => {
            expect(findConfigFile(undefined, dir)).toBeUndefined();
        });

        it('should find dotted variants', () => {
            writeFiles(dir, { '.swagger-sync.yml': 'mode: fix\n' });
            expect(findConfigFile(undefined, dir)).toBe(join(dir, '.swagger-sync.yml'));
        });
    });

    describe('parseConfigFile()', () => {
        it('should report schema violations with their paths', () => {
            writeFiles(dir, { 'bad.yaml': lines('options:', '  strict: "yes"') });
            const file = join(dir, 'bad.yaml');
            let caught: unknown;
            try {
                parseConfigFile(file);
            } catch (err) {
                caught = err;
            }
            expect(caught).toBeInstanceOf(ConfigError);
            if (caught instanceof ConfigError) {
                expect(caught.message.startsWith(`Invalid config file "${file}": options.strict: `)).toBe(true);
                expect(caught.configPath).toBe(file);
                expect(caught.issues).toHaveLength(1);
            }
        });

        it('should wrap YAML syntax errors', () => {
            writeFiles(dir, { 'broken.yaml': 'options: [unclosed\n' });
            const file = join(dir, 'broken.yaml');
            expect(() => parseConfigFile(file)).toThrow(`Failed to read config file "${file}"`);
        });
    });

    describe('applyCliOverrides()', () => {
        it('should let CLI values win', () => {
            const config = applyCliOverrides(DEFAULT_CONFIG, {
                swaggerFile: 'other.yaml',
                mode: 'fix',
                markerStart: '[[api',
                ignoreFiles: ['test_*.py'],
                strict: true,
                failOnCoverageBelow: 90,
                coverageReport: 'coverage.json',
            });
            expect(config.swaggerFile).toBe('other.yaml');
            expect(config.mode).toBe('fix');
            expect(config.markers).toEqual({ start: '[[api', end: '<<<openapi' });
            expect(config.ignore.files).toEqual(['test_*.py']);
            expect(config.options.strict).toBe(true);
            expect(config.options.failOnCoverageBelow).toBe(90);
            expect(config.output.coverageReport).toBe('coverage.json');
        });

        it('should replace configured ignore globs', () => {
            const base = { ...DEFAULT_CONFIG, ignore: { files: ['a.py'] } };
            expect(applyCliOverrides(base, { ignoreFiles: ['b.py'] }).ignore.files).toEqual(['b.py']);
        });

        it('should not change anything without overrides', () => {
            expect(applyCliOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
        });
    });
});
