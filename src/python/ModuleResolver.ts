/**
 * ModuleResolver — `from X import y` → file on disk
 *
 * @module
 */
import { existsSync, statSync } from 'node:fs';
import { dirname, extname, join, resolve, sep } from 'node:path';

function isDirectory(path: string): boolean {
    return existsSync(path) && statSync(path).isDirectory();
}

function isFile(path: string): boolean {
    return existsSync(path) && statSync(path).isFile();
}

/**
 * Resolve the module named in an import-from statement to a source file.
 *
 * Relative imports (`level > 0`) climb `level - 1` directories above the
 * importing file, then try the package `__init__.py` and `<name>.py`.
 * Absolute imports try the project root first, then every ancestor
 * directory of the importing file.
 *
 * @param moduleName - Dotted module name (`null` for `from . import x`)
 * @param level - Number of leading dots
 * @param currentFile - File containing the import
 * @param projectRoot - Root for absolute imports
 */
export function resolveModulePath(
    moduleName: string | null,
    level: number,
    currentFile: string,
    projectRoot: string,
): string | null {
    const fromFile = resolve(currentFile);

    if (level > 0) {
        let base = dirname(fromFile);
        for (let i = 0; i < level - 1; i++) base = dirname(base);
        if (moduleName) base = join(base, moduleName.split('.').join(sep));

        if (isDirectory(base)) {
            const init = join(base, '__init__.py');
            if (isFile(init)) return init;
        }
        const candidate = extname(base) === '.py' ? base : `${base}.py`;
        if (isFile(candidate)) return candidate;
        return null;
    }

    if (!moduleName) return null;
    const relative = moduleName.split('.').join(sep);

    const roots = [resolve(projectRoot)];
    for (let dir = dirname(fromFile); ; dir = dirname(dir)) {
        roots.push(dir);
        if (dirname(dir) === dir) break;
    }

    for (const root of roots) {
        const file = join(root, `${relative}.py`);
        if (isFile(file)) return file;
        const pkg = join(root, relative, '__init__.py');
        if (isFile(pkg)) return pkg;
    }
    return null;
}
