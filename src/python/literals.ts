/**
 * Literal extraction: strings, numbers, booleans, None and flat dict
 * displays, read straight from syntax nodes without evaluation.
 *
 * @module
 */
import type { SyntaxNode } from './PythonParser.js';
import { PATH_PLACEHOLDERS } from '../constants.js';

/** Values a literal node can carry */
export type LiteralValue = string | number | boolean | null;

// ── String Literals ──────────────────────────────────────

const STRING_LITERAL = /^([rRuUbBfF]*)('''|"""|'|")([\s\S]*)\2$/;

interface StringParts {
    readonly prefix: string;
    readonly body: string;
}

function splitStringLiteral(text: string): StringParts | undefined {
    const match = STRING_LITERAL.exec(text);
    if (!match) return undefined;
    return { prefix: (match[1] ?? '').toLowerCase(), body: match[3] ?? '' };
}

function pieces(node: SyntaxNode): SyntaxNode[] {
    return node.type === 'concatenated_string'
        ? node.namedChildren.filter((child) => child.type === 'string')
        : [node];
}

/**
 * Value of a plain string literal (adjacent literals concatenated).
 * Undefined for f-strings, bytes and non-string nodes.
 */
export function decodeStringLiteral(node: SyntaxNode): string | undefined {
    if (node.type !== 'string' && node.type !== 'concatenated_string') return undefined;
    let value = '';
    for (const piece of pieces(node)) {
        const parts = splitStringLiteral(piece.text);
        if (!parts || parts.prefix.includes('f') || parts.prefix.includes('b')) return undefined;
        value += parts.prefix.includes('r') ? parts.body : decodeEscapes(parts.body);
    }
    return value;
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
    '\\': '\\', "'": "'", '"': '"', n: '\n', t: '\t', r: '\r',
    a: '\x07', b: '\b', f: '\f', v: '\v', '0': '\0', '\n': '',
};

function decodeEscapes(body: string): string {
    return body.replace(
        /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[\s\S])/g,
        (whole: string, seq: string) => {
            if (seq.length > 1) return String.fromCodePoint(parseInt(seq.slice(1), 16));
            const simple = SIMPLE_ESCAPES[seq];
            return simple ?? whole;
        },
    );
}

/**
 * Route path from a decorator argument: a plain string, or an f-string
 * whose only placeholders are known constants (`{API_VERSION}` → `v1`).
 * Any other interpolation makes the path unresolvable.
 */
export function resolvePathLiteral(node: SyntaxNode): string | null {
    if (node.type !== 'string' && node.type !== 'concatenated_string') return null;
    let path = '';
    for (const piece of pieces(node)) {
        const parts = splitStringLiteral(piece.text);
        if (!parts || parts.prefix.includes('b')) return null;
        if (!parts.prefix.includes('f')) {
            path += parts.prefix.includes('r') ? parts.body : decodeEscapes(parts.body);
            continue;
        }
        const resolved = resolveFormatBody(parts.body, parts.prefix.includes('r'));
        if (resolved === null) return null;
        path += resolved;
    }
    return path;
}

function resolveFormatBody(body: string, raw: boolean): string | null {
    let out = '';
    let literal = '';
    let i = 0;
    const flush = (): void => {
        out += raw ? literal : decodeEscapes(literal);
        literal = '';
    };
    while (i < body.length) {
        const c = body.charAt(i);
        if (c === '{' && body.charAt(i + 1) === '{') {
            literal += '{';
            i += 2;
        } else if (c === '}' && body.charAt(i + 1) === '}') {
            literal += '}';
            i += 2;
        } else if (c === '{') {
            const close = body.indexOf('}', i);
            if (close === -1) return null;
            const replacement = PATH_PLACEHOLDERS[body.slice(i + 1, close).trim()];
            if (replacement === undefined) return null;
            flush();
            out += replacement;
            i = close + 1;
        } else {
            literal += c;
            i++;
        }
    }
    flush();
    return out;
}

// ── Scalars ──────────────────────────────────────────────

function parseInteger(text: string): number | undefined {
    const clean = text.replace(/_/g, '');
    if (/[jJ]$/.test(clean) || /[lL]$/.test(clean)) return undefined;
    const radix = /^0[xX]/.test(clean) ? 16 : /^0[oO]/.test(clean) ? 8 : /^0[bB]/.test(clean) ? 2 : 10;
    const digits = radix === 10 ? clean : clean.slice(2);
    const value = parseInt(digits, radix);
    return Number.isNaN(value) ? undefined : value;
}

function parseFloatLiteral(text: string): number | undefined {
    const clean = text.replace(/_/g, '');
    if (/[jJ]$/.test(clean)) return undefined;
    const value = Number(clean);
    return Number.isNaN(value) ? undefined : value;
}

/**
 * Constant value of a literal node, or `undefined` when the node is not
 * a literal. Handles unary minus on numbers.
 */
export function extractConstant(node: SyntaxNode): LiteralValue | undefined {
    switch (node.type) {
        case 'string':
        case 'concatenated_string':
            return decodeStringLiteral(node);
        case 'integer':
            return parseInteger(node.text);
        case 'float':
            return parseFloatLiteral(node.text);
        case 'true':
            return true;
        case 'false':
            return false;
        case 'none':
            return null;
        case 'unary_operator': {
            const operator = node.childForFieldName('operator')?.text;
            const operand = node.childForFieldName('argument');
            if (operator !== '-' || !operand) return undefined;
            if (operand.type !== 'integer' && operand.type !== 'float') return undefined;
            const value = extractConstant(operand);
            return typeof value === 'number' ? -value : undefined;
        }
        default:
            return undefined;
    }
}

/** Whether a literal node is an integer (not a bool) */
export function isIntegerLiteral(node: SyntaxNode): boolean {
    return node.type === 'integer' && parseInteger(node.text) !== undefined;
}

/**
 * `{"key": literal, ...}` with string keys and literal values only;
 * `undefined` for anything else (including `**spread` entries).
 */
export function extractConstantDict(node: SyntaxNode): Record<string, LiteralValue> | undefined {
    if (node.type !== 'dictionary') return undefined;
    const result: Record<string, LiteralValue> = {};
    for (const entry of node.namedChildren) {
        if (entry.type === 'comment') continue;
        if (entry.type !== 'pair') return undefined;
        const keyNode = entry.childForFieldName('key');
        const valueNode = entry.childForFieldName('value');
        if (!keyNode || !valueNode) return undefined;
        const key = extractConstant(keyNode);
        if (typeof key !== 'string') return undefined;
        const value = extractConstant(valueNode);
        if (value === undefined) return undefined;
        result[key] = value;
    }
    return result;
}

// ── Docstrings ───────────────────────────────────────────

/**
 * Clean up docstring indentation: tabs expanded, the first line
 * left-stripped, the common indentation of the remaining lines removed,
 * and blank leading/trailing lines dropped.
 */
export function cleanDocstring(doc: string): string {
    const lines = doc.replace(/\t/g, '        ').split(/\r\n|\r|\n/);
    let margin = Number.POSITIVE_INFINITY;
    for (const line of lines.slice(1)) {
        const content = line.trimStart();
        if (content) margin = Math.min(margin, line.length - content.length);
    }
    const cleaned = lines.map((line, index) => {
        if (index === 0) return line.trimStart();
        return Number.isFinite(margin) ? line.slice(margin) : line;
    });
    while (cleaned.length > 0 && !cleaned[0]) cleaned.shift();
    while (cleaned.length > 0 && !cleaned[cleaned.length - 1]) cleaned.pop();
    return cleaned.join('\n');
}
