/**
 * PythonParser — tree-sitter Front End for Analyzed Source
 *
 * Parses Python source into a concrete syntax tree. Nothing is ever
 * imported or executed; every scanner works on the returned nodes.
 *
 * @module
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

export type SyntaxNode = Parser.SyntaxNode;

/** Source text that tree-sitter could only recover from with ERROR or missing nodes */
export class PythonSyntaxError extends Error {
    /** 1-based line of the first error */
    readonly line: number;
    readonly column: number;

    constructor(line: number, column: number) {
        super(`invalid syntax (line ${line}, column ${column + 1})`);
        this.name = 'PythonSyntaxError';
        this.line = line;
        this.column = column;
    }
}

// ── Parser Instance ──────────────────────────────────────

let sharedParser: Parser | undefined;

function getParser(): Parser {
    if (!sharedParser) {
        sharedParser = new Parser();
        sharedParser.setLanguage(Python);
    }
    return sharedParser;
}

// tree-sitter's string input is capped at 32 KiB; feed chunks instead
const CHUNK_SIZE = 4096;

// ── Public API ───────────────────────────────────────────

/**
 * Parse a module and return its root node.
 *
 * @throws {PythonSyntaxError} when the tree contains an error or missing node
 */
export function parsePython(source: string): SyntaxNode {
    const tree = getParser().parse((index: number) => source.slice(index, index + CHUNK_SIZE));
    const root = tree.rootNode;
    const error = findFirstError(root);
    if (error) {
        throw new PythonSyntaxError(error.startPosition.row + 1, error.startPosition.column);
    }
    return root;
}

function findFirstError(root: SyntaxNode): SyntaxNode | undefined {
    const stack: SyntaxNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        if (node.type === 'ERROR') return node;
        // missing tokens are inserted as zero-width leaves
        if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex) return node;
        const children = node.children;
        for (let i = children.length - 1; i >= 0; i--) {
            const child = children[i];
            if (child) stack.push(child);
        }
    }
    return undefined;
}
