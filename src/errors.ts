/**
 * Error types surfaced by the scanners and the configuration layer.
 *
 * Scan-time problems that only affect one file are reported through the
 * observer and never thrown; the classes below are the fatal ones.
 *
 * @module
 */
import type { ZodIssue } from 'zod';

/**
 * An embedded documentation block that is not valid YAML, or whose
 * top level is not a mapping.
 */
export class OpenApiBlockError extends Error {
    /** Block text between the markers, as found in the docstring */
    readonly raw: string;

    constructor(message: string, raw: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'OpenApiBlockError';
        this.raw = raw;
    }
}

/**
 * A method-rooted documentation block declares HTTP methods that the
 * routing decorator does not. Thrown only in strict mode.
 */
export class MethodMismatchError extends Error {
    readonly handler: string;
    readonly file: string;
    readonly line: number;
    readonly undeclared: readonly string[];
    readonly declared: readonly string[];

    constructor(
        message: string,
        details: {
            handler: string;
            file: string;
            line: number;
            undeclared: readonly string[];
            declared: readonly string[];
        },
    ) {
        super(message);
        this.name = 'MethodMismatchError';
        this.handler = details.handler;
        this.file = details.file;
        this.line = details.line;
        this.undeclared = details.undeclared;
        this.declared = details.declared;
    }
}

/** Configuration file that cannot be read, parsed or validated */
export class ConfigError extends Error {
    readonly configPath: string | undefined;
    readonly issues: readonly ZodIssue[];

    constructor(message: string, configPath?: string, issues: readonly ZodIssue[] = [], cause?: unknown) {
        super(message, { cause });
        this.name = 'ConfigError';
        this.configPath = configPath;
        this.issues = issues;
    }
}

/** Swagger document that is missing or whose top level is not a mapping */
export class SwaggerFileError extends Error {
    readonly filePath: string;

    constructor(message: string, filePath: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'SwaggerFileError';
        this.filePath = filePath;
    }
}
