/**
 * Unified diffs of YAML-serialized fragments, for drift reports.
 *
 * @module
 */
import { structuredPatch } from 'diff';
import { stringify } from 'yaml';

/** YAML lines of a value; whitespace-only lines become empty */
export function dumpYamlLines(value: unknown): string[] {
    if (value === undefined) return [];
    const text = stringify(value, { lineWidth: 0, aliasDuplicateObjects: false }).trimEnd();
    if (!text) return [];
    return text.split('\n').map((line) => (line.trim() ? line : ''));
}

function formatRange(start: number, length: number): string {
    if (length === 1) return `${start}`;
    // only an empty side has no lines in a hunk with context
    if (length === 0) return '0,0';
    return `${start},${length}`;
}

/**
 * Line diff with three lines of context and `--- a/<id>` / `+++ b/<id>`
 * headers. Identical inputs produce no lines at all.
 */
export function unifiedDiff(before: readonly string[], after: readonly string[], id: string): string[] {
    const toText = (lines: readonly string[]): string => (lines.length > 0 ? `${lines.join('\n')}\n` : '');
    const patch = structuredPatch(`a/${id}`, `b/${id}`, toText(before), toText(after), undefined, undefined, {
        context: 3,
    });
    if (patch.hunks.length === 0) return [];

    const lines = [`--- a/${id}`, `+++ b/${id}`];
    for (const hunk of patch.hunks) {
        lines.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
        lines.push(...hunk.lines.filter((line) => !line.startsWith('\\')));
    }
    return lines;
}

/** Diff of two values' YAML forms */
export function diffValues(before: unknown, after: unknown, id: string): string[] {
    return unifiedDiff(dumpYamlLines(before), dumpYamlLines(after), id);
}
