/**
 * Syntax-tree helpers shared by the endpoint and model scanners.
 *
 * @module
 */
import type { SyntaxNode } from './PythonParser.js';
import { cleanDocstring, decodeStringLiteral } from './literals.js';

// ── Children ─────────────────────────────────────────────

/** Named children without comments (tree-sitter keeps them as extras) */
export function statements(node: SyntaxNode): SyntaxNode[] {
    return node.namedChildren.filter((child) => child.type !== 'comment');
}

// ── Definitions ──────────────────────────────────────────

/** A class or function definition together with its decorator expressions */
export interface Definition {
    readonly node: SyntaxNode;
    readonly name: string;
    readonly decorators: readonly SyntaxNode[];
}

function unwrapDefinition(statement: SyntaxNode, type: string): Definition | undefined {
    let node = statement;
    let decorators: SyntaxNode[] = [];
    if (statement.type === 'decorated_definition') {
        const inner = statement.childForFieldName('definition');
        if (!inner) return undefined;
        node = inner;
        decorators = statement.namedChildren
            .filter((child) => child.type === 'decorator')
            .map((decorator) => statements(decorator)[0])
            .filter((expr): expr is SyntaxNode => expr !== undefined);
    }
    if (node.type !== type) return undefined;
    const name = node.childForFieldName('name')?.text;
    if (!name) return undefined;
    return { node, name, decorators };
}

/** Top-level (or block-level) class definitions, decorated or not */
export function classDefinitions(container: SyntaxNode): Definition[] {
    const result: Definition[] = [];
    for (const statement of statements(container)) {
        const def = unwrapDefinition(statement, 'class_definition');
        if (def) result.push(def);
    }
    return result;
}

/** Function definitions (sync or async) directly inside a block */
export function functionDefinitions(container: SyntaxNode): Definition[] {
    const result: Definition[] = [];
    for (const statement of statements(container)) {
        const def = unwrapDefinition(statement, 'function_definition');
        if (def) result.push(def);
    }
    return result;
}

export function bodyOf(definition: SyntaxNode): SyntaxNode | undefined {
    return definition.childForFieldName('body') ?? undefined;
}

/** 1-based line of a definition's `def` / `class` keyword */
export function lineOf(node: SyntaxNode): number {
    return node.startPosition.row + 1;
}

// ── Docstrings ───────────────────────────────────────────

/**
 * Docstring of a module or of a definition body, cleaned the way the
 * interpreter's own introspection does. Empty string when absent.
 */
export function docstringOf(container: SyntaxNode | undefined): string {
    if (!container) return '';
    const first = statements(container)[0];
    if (!first || first.type !== 'expression_statement') return '';
    const children = statements(first);
    const expr = children[0];
    if (children.length !== 1 || !expr) return '';
    if (expr.type !== 'string' && expr.type !== 'concatenated_string') return '';
    const value = decodeStringLiteral(expr);
    return value === undefined ? '' : cleanDocstring(value);
}

// ── Calls ────────────────────────────────────────────────

export interface KeywordArgument {
    readonly name: string;
    readonly value: SyntaxNode;
}

export interface CallParts {
    readonly func: SyntaxNode;
    /** Positional arguments (splats excluded) */
    readonly args: readonly SyntaxNode[];
    readonly keywords: readonly KeywordArgument[];
}

/** Break a `call` node into callee, positional and keyword arguments */
export function callParts(node: SyntaxNode): CallParts | undefined {
    if (node.type !== 'call') return undefined;
    const func = node.childForFieldName('function');
    const argumentList = node.childForFieldName('arguments');
    if (!func) return undefined;

    const args: SyntaxNode[] = [];
    const keywords: KeywordArgument[] = [];
    // generator_expression arguments (`f(x for x in y)`) count as one positional
    if (argumentList && argumentList.type === 'argument_list') {
        for (const arg of statements(argumentList)) {
            if (arg.type === 'keyword_argument') {
                const name = arg.childForFieldName('name')?.text;
                const value = arg.childForFieldName('value');
                if (name && value) keywords.push({ name, value });
            } else if (arg.type !== 'list_splat' && arg.type !== 'dictionary_splat') {
                args.push(arg);
            }
        }
    } else if (argumentList) {
        args.push(argumentList);
    }
    return { func, args, keywords };
}

/** `foo` → "foo", `a.b.foo` → "foo", anything else → null */
export function decoratorIdentifier(node: SyntaxNode): string | null {
    if (node.type === 'identifier') return node.text;
    if (node.type === 'attribute') return node.childForFieldName('attribute')?.text ?? null;
    return null;
}

// ── Expression Text ──────────────────────────────────────

const OPENING = '([{';
const CLOSING = ')]}';

/**
 * Canonical single-line text of an expression: comments dropped,
 * whitespace collapsed, `, ` after commas and ` | ` around pipes.
 * String literals are copied verbatim.
 *
 * ```
 * normalizeExpression('Optional[\n  Union[A,B]  # note\n]') // 'Optional[Union[A, B]]'
 * ```
 */
export function normalizeExpression(text: string): string {
    let out = '';
    let pendingSpace = false;
    let i = 0;

    const emitSpaceIfPending = (next: string): void => {
        const last = out.charAt(out.length - 1);
        const attached = (next === '[' || next === '(' || next === '.') && /[\w\])]/.test(last);
        if (pendingSpace && out !== '' && last !== ' ' && last !== '.' && !OPENING.includes(last) && !attached) {
            out += ' ';
        }
        pendingSpace = false;
    };

    while (i < text.length) {
        const c = text.charAt(i);

        if (c === '"' || c === "'") {
            const end = skipString(text, i);
            emitSpaceIfPending(c);
            out += text.slice(i, end);
            i = end;
            continue;
        }
        if (c === '#') {
            while (i < text.length && text.charAt(i) !== '\n') i++;
            continue;
        }
        if (c === '\\' && text.charAt(i + 1) === '\n') {
            pendingSpace = true;
            i += 2;
            continue;
        }
        if (/\s/.test(c)) {
            pendingSpace = true;
            i++;
            continue;
        }
        if (c === ',') {
            out = out.trimEnd() + ',';
            pendingSpace = true;
            i++;
            continue;
        }
        if (c === '|') {
            out = out.trimEnd() + ' | ';
            pendingSpace = false;
            i++;
            continue;
        }
        if (CLOSING.includes(c)) {
            out = out.trimEnd() + c;
            pendingSpace = false;
            i++;
            continue;
        }

        emitSpaceIfPending(c);
        out += c;
        i++;
    }
    return out.trim();
}

/** Index just past the string literal opening at `start` */
function skipString(text: string, start: number): number {
    const quote = text.charAt(start);
    const triple = text.startsWith(quote.repeat(3), start);
    const delimiter = triple ? quote.repeat(3) : quote;
    let i = start + delimiter.length;
    while (i < text.length) {
        if (text.charAt(i) === '\\') {
            i += 2;
            continue;
        }
        if (text.startsWith(delimiter, i)) return i + delimiter.length;
        if (!triple && text.charAt(i) === '\n') return i;
        i++;
    }
    return text.length;
}

/** Normalized source text of a node, or '' */
export function expressionText(node: SyntaxNode | null | undefined): string {
    return node ? normalizeExpression(node.text) : '';
}
