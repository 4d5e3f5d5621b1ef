/**
 * Command-line argument parsing for `swagger-sync`.
 *
 * @module
 */
import type { CliOverrides } from './config/ConfigLoader.js';
import type { ColorMode } from './config/SyncConfig.js';

export type CliCommand = 'check' | 'fix' | 'list' | 'validate-config' | 'help';

const COMMANDS: ReadonlySet<string> = new Set(['check', 'fix', 'list', 'validate-config', 'help']);

export interface RawCliArgs {
    readonly command: CliCommand;
    readonly config?: string;
    readonly env?: string;
    readonly overrides: CliOverrides;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

function isColorMode(value: string): value is ColorMode {
    return value === 'auto' || value === 'always' || value === 'never';
}

/**
 * Parse `process.argv`. The command is the first non-option argument
 * (default `check`, which then defers to the configured `mode`); `--help`
 * anywhere selects `help`.
 *
 * @throws {CliUsageError} unknown command or option, or a missing/invalid value
 */
export function parseArgs(argv: readonly string[]): RawCliArgs {
    const args = argv.slice(2);
    let command: CliCommand = 'check';
    let commandSeen = false;
    const values: Record<string, string | undefined> = {};
    const ignoreFiles: string[] = [];
    const flags: Record<string, boolean | undefined> = {};

    const valueOf = (index: number, option: string): string => {
        const value = args[index];
        if (value === undefined || value.startsWith('--')) {
            throw new CliUsageError(`Option ${option} requires a value.`);
        }
        return value;
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';
        switch (arg) {
            case '-h':
            case '--help':
                command = 'help';
                commandSeen = true;
                break;
            case '-c':
            case '--config':
                values['config'] = valueOf(++i, arg);
                break;
            case '--env':
                values['env'] = valueOf(++i, arg);
                break;
            case '--swagger-file':
                values['swaggerFile'] = valueOf(++i, arg);
                break;
            case '--handlers-root':
                values['handlersRoot'] = valueOf(++i, arg);
                break;
            case '--models-root':
                values['modelsRoot'] = valueOf(++i, arg);
                break;
            case '--project-root':
                values['projectRoot'] = valueOf(++i, arg);
                break;
            case '--openapi-start':
                values['markerStart'] = valueOf(++i, arg);
                break;
            case '--openapi-end':
                values['markerEnd'] = valueOf(++i, arg);
                break;
            case '--ignore-file':
                ignoreFiles.push(valueOf(++i, arg));
                break;
            case '--coverage-report':
                values['coverageReport'] = valueOf(++i, arg);
                break;
            case '--coverage-format':
                values['coverageFormat'] = valueOf(++i, arg);
                break;
            case '--fail-on-coverage-below':
                values['failOnCoverageBelow'] = valueOf(++i, arg);
                break;
            case '--color':
                values['color'] = valueOf(++i, arg);
                break;
            case '--strict':
                flags['strict'] = true;
                break;
            case '--show-orphans':
                flags['showOrphans'] = true;
                break;
            case '--show-ignored':
                flags['showIgnored'] = true;
                break;
            case '--no-model-components':
                flags['modelComponents'] = false;
                break;
            case '--validate':
                flags['validate'] = true;
                break;
            case '--fail-on-validation-errors':
                flags['failOnValidationErrors'] = true;
                break;
            default:
                if (arg.startsWith('-')) throw new CliUsageError(`Unknown option: "${arg}". Use --help for usage.`);
                if (commandSeen) throw new CliUsageError(`Unexpected argument: "${arg}".`);
                if (!COMMANDS.has(arg)) throw new CliUsageError(`Unknown command: "${arg}". Use --help for usage.`);
                command = arg === 'fix' || arg === 'list' || arg === 'validate-config' || arg === 'help' ? arg : 'check';
                commandSeen = true;
        }
    }

    const coverageFormat = values['coverageFormat'];
    if (coverageFormat !== undefined && coverageFormat !== 'json' && coverageFormat !== 'text') {
        throw new CliUsageError(`Invalid --coverage-format "${coverageFormat}". Use json or text.`);
    }
    const color = values['color'];
    if (color !== undefined && !isColorMode(color)) {
        throw new CliUsageError(`Invalid --color "${color}". Use auto, always or never.`);
    }
    let failOnCoverageBelow: number | undefined;
    const threshold = values['failOnCoverageBelow'];
    if (threshold !== undefined) {
        failOnCoverageBelow = Number(threshold);
        if (!Number.isFinite(failOnCoverageBelow) || failOnCoverageBelow < 0 || failOnCoverageBelow > 100) {
            throw new CliUsageError(`Invalid --fail-on-coverage-below "${threshold}". Use 0-1 or 0-100.`);
        }
    }

    const overrides: CliOverrides = {
        ...(values['swaggerFile'] !== undefined ? { swaggerFile: values['swaggerFile'] } : {}),
        ...(values['handlersRoot'] !== undefined ? { handlersRoot: values['handlersRoot'] } : {}),
        ...(values['modelsRoot'] !== undefined ? { modelsRoot: values['modelsRoot'] } : {}),
        ...(values['projectRoot'] !== undefined ? { projectRoot: values['projectRoot'] } : {}),
        ...(commandSeen && (command === 'check' || command === 'fix') ? { mode: command } : {}),
        ...(values['markerStart'] !== undefined ? { markerStart: values['markerStart'] } : {}),
        ...(values['markerEnd'] !== undefined ? { markerEnd: values['markerEnd'] } : {}),
        ...(ignoreFiles.length > 0 ? { ignoreFiles } : {}),
        ...(flags['strict'] !== undefined ? { strict: flags['strict'] } : {}),
        ...(flags['showOrphans'] !== undefined ? { showOrphans: flags['showOrphans'] } : {}),
        ...(flags['showIgnored'] !== undefined ? { showIgnored: flags['showIgnored'] } : {}),
        ...(flags['modelComponents'] !== undefined ? { modelComponents: flags['modelComponents'] } : {}),
        ...(flags['validate'] !== undefined ? { validate: flags['validate'] } : {}),
        ...(flags['failOnValidationErrors'] !== undefined ? { failOnValidationErrors: flags['failOnValidationErrors'] } : {}),
        ...(failOnCoverageBelow !== undefined ? { failOnCoverageBelow } : {}),
        ...(color !== undefined && isColorMode(color) ? { color } : {}),
        ...(coverageFormat === 'json' || coverageFormat === 'text' ? { coverageFormat } : {}),
        ...(values['coverageReport'] !== undefined ? { coverageReport: values['coverageReport'] } : {}),
    };

    return {
        command,
        ...(values['config'] !== undefined ? { config: values['config'] } : {}),
        ...(values['env'] !== undefined ? { env: values['env'] } : {}),
        overrides,
    };
}
