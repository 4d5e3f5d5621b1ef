/**
 * Reading and writing the swagger YAML document.
 *
 * @module
 */
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { parse, stringify } from 'yaml';
import { SwaggerFileError } from '../errors.js';
import { isRecord, type SwaggerDocument } from '../types.js';

/**
 * Load a swagger document. An empty file yields an empty document.
 *
 * @throws {SwaggerFileError} missing file, invalid YAML, or a non-mapping root
 */
export function loadSwagger(filePath: string): SwaggerDocument {
    if (!existsSync(filePath)) {
        throw new SwaggerFileError(`Swagger file ${filePath} not found.`, filePath);
    }

    let data: unknown;
    try {
        data = parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new SwaggerFileError(`Failed to parse swagger file ${filePath}: ${detail}`, filePath, err);
    }

    if (data === null || data === undefined) return {};
    if (!isRecord(data)) {
        throw new SwaggerFileError(`Swagger file ${filePath} must contain a YAML mapping.`, filePath);
    }
    return data;
}

/** Serialize without line folding and without anchors for shared subtrees */
export function dumpSwagger(swagger: SwaggerDocument): string {
    return stringify(swagger, { lineWidth: 0, aliasDuplicateObjects: false });
}

export function saveSwagger(filePath: string, swagger: SwaggerDocument): void {
    writeFileSync(filePath, dumpSwagger(swagger), 'utf-8');
}
