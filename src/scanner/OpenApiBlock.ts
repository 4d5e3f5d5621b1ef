/**
 * OpenApiBlock — Embedded YAML Blocks Inside Docstrings
 *
 * A block sits between a start and an end marker (default `>>>openapi` /
 * `<<<openapi`). Matching is case-insensitive, non-greedy and spans lines:
 *
 * ```python
 * def get(self, request):
 *     """Fetch a guild.
 *
 *     >>>openapi
 *     summary: Get guild
 *     tags: [guilds]
 *     <<<openapi
 *     """
 * ```
 *
 * @module
 */
import { parse as parseYaml } from 'yaml';
import { DEFAULT_OPENAPI_END, DEFAULT_OPENAPI_START } from '../constants.js';
import { OpenApiBlockError } from '../errors.js';
import { isRecord, type OpenApiMap } from '../types.js';

export interface BlockMarkers {
    readonly start: string;
    readonly end: string;
}

export const DEFAULT_MARKERS: BlockMarkers = {
    start: DEFAULT_OPENAPI_START,
    end: DEFAULT_OPENAPI_END,
};

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/** Pattern capturing the text between the markers (trimmed) */
export function buildBlockPattern(markers: BlockMarkers = DEFAULT_MARKERS, global = false): RegExp {
    const flags = global ? 'gi' : 'i';
    return new RegExp(`${escapeRegExp(markers.start)}\\s*([\\s\\S]*?)\\s*${escapeRegExp(markers.end)}`, flags);
}

function indent(text: string, prefix: string): string {
    return text
        .split('\n')
        .map((line) => (line.trim() ? `${prefix}${line}` : line))
        .join('\n');
}

/**
 * Parse one block body. A missing or empty body yields `{}`.
 *
 * @throws {OpenApiBlockError} on invalid YAML or a non-mapping document
 */
export function parseBlock(raw: string, markers: BlockMarkers = DEFAULT_MARKERS): OpenApiMap {
    try {
        const loaded: unknown = parseYaml(raw) ?? {};
        if (isRecord(loaded)) return loaded;
        throw new Error('OpenAPI block must be a mapping');
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new OpenApiBlockError(
            `Failed parsing ${markers.start} ${markers.end} block: ${detail}\nBlock contents:\n${indent(raw, '    ')}`,
            raw,
            err,
        );
    }
}

/** First block in a docstring, parsed; `{}` when there is none */
export function extractOpenApiBlock(doc: string, markers: BlockMarkers = DEFAULT_MARKERS): OpenApiMap {
    if (!doc) return {};
    const match = buildBlockPattern(markers).exec(doc);
    if (!match) return {};
    return parseBlock(match[1] ?? '', markers);
}

/** Raw text of every block in a docstring, in order */
export function findOpenApiBlocks(doc: string, markers: BlockMarkers = DEFAULT_MARKERS): string[] {
    if (!doc) return [];
    return Array.from(doc.matchAll(buildBlockPattern(markers, true)), (match) => match[1] ?? '');
}
