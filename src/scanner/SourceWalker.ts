/**
 * SourceWalker — Python Source Discovery
 *
 * Depth-first, name-sorted walk over `*.py` files, plus the shell-style
 * glob matching used by the `ignore.files` option.
 *
 * @module
 */
import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, join, relative, sep } from 'node:path';

/** Absolute-or-root-joined paths of every `.py` file below `root`, sorted per directory */
export function listPythonFiles(root: string): string[] {
    if (!existsSync(root) || !statSync(root).isDirectory()) return [];
    const files: string[] = [];
    walk(root, files);
    return files;
}

function walk(dir: string, files: string[]): void {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => compare(a.name, b.name));
    for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) walk(full, files);
        else if (entry.isFile() && entry.name.endsWith('.py')) files.push(full);
    }
}

function compare(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/** File contents, or `undefined` when the file cannot be read */
export function readSource(file: string): string | undefined {
    try {
        return readFileSync(file, 'utf-8');
    } catch {
        return undefined;
    }
}

// ── Glob Matching ────────────────────────────────────────

const globCache = new Map<string, RegExp>();

/**
 * Shell-style match: `*` spans any characters (path separators included),
 * `?` matches one character, `[seq]` / `[!seq]` a character class.
 */
export function fnmatch(name: string, pattern: string): boolean {
    let regex = globCache.get(pattern);
    if (!regex) {
        regex = globToRegExp(pattern);
        globCache.set(pattern, regex);
    }
    return regex.test(name);
}

function globToRegExp(pattern: string): RegExp {
    let source = '';
    let i = 0;
    while (i < pattern.length) {
        const c = pattern.charAt(i);
        i++;
        if (c === '*') {
            source += '[\\s\\S]*';
        } else if (c === '?') {
            source += '[\\s\\S]';
        } else if (c === '[') {
            let j = i;
            if (pattern.charAt(j) === '!') j++;
            if (pattern.charAt(j) === ']') j++;
            while (j < pattern.length && pattern.charAt(j) !== ']') j++;
            if (j >= pattern.length) {
                source += '\\[';
            } else {
                let body = pattern.slice(i, j).replace(/\\/g, '\\\\');
                i = j + 1;
                if (body.startsWith('!')) body = `^${body.slice(1)}`;
                else if (body.startsWith('^')) body = `\\${body}`;
                source += `[${body}]`;
            }
        } else {
            source += c.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
        }
    }
    return new RegExp(`^${source}$`);
}

/** Whether a handler file is excluded by any ignore glob (root-relative path or bare name) */
export function isIgnoredFile(file: string, root: string, globs: readonly string[]): boolean {
    if (globs.length === 0) return false;
    const rel = relative(root, file).split(sep).join('/');
    const name = basename(file);
    return globs.some((pattern) => fnmatch(rel, pattern) || fnmatch(name, pattern));
}
