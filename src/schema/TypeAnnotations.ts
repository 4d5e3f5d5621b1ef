/**
 * TypeAnnotations — Annotation Text → OpenAPI Schema
 *
 * Resolves the normalized text of a type annotation into a schema
 * fragment without evaluating anything. Rules apply in a fixed order:
 *
 * 1. `Literal[...]`                → `{ type: string, enum: [...] }`
 * 2. Optional / `None` members     → unwrapped, flagged nullable
 * 3. Nested unions                 → flattened into one union
 * 4. Unions with model members     → `{ oneOf | anyOf: [$ref...] }`
 * 5. Primitive / container names   → `array`, `object`, `integer`, ...
 *    then the first capitalized name → `$ref`, else `string`
 *
 * Model detection is a heuristic over capitalized identifiers; the
 * resolver never throws and degrades to `{ type: string }`.
 *
 * @module
 */
import { MAX_UNION_FLATTEN_PASSES, TYPING_KEYWORDS, schemaRef } from '../constants.js';
import type { SchemaObject } from '../types.js';

const MODEL_NAME = /\b([A-Z][A-Za-z0-9_]*)\b/g;

/** Capitalized identifiers in order of appearance, minus the excluded names */
export function modelNames(text: string, exclude: ReadonlySet<string> = TYPING_KEYWORDS): string[] {
    return Array.from(text.matchAll(MODEL_NAME), (m) => m[1] ?? '').filter((name) => name && !exclude.has(name));
}

// ── 1. Literal Enums ─────────────────────────────────────

const ENUM_TOKEN = /^[\p{L}\p{N}_.-]+$/u;

/**
 * Enum schema from the first `Literal[...]` in the text. Only plain
 * tokens (letters, digits, `-`, `_`, `.`) survive; quotes are stripped.
 */
export function extractLiteralSchema(text: string): SchemaObject | null {
    const start = text.indexOf('Literal[');
    if (start === -1) return null;
    const sub = text.slice(start);
    const end = sub.indexOf(']');
    if (end === -1) return null;

    const values: string[] = [];
    for (const token of sub.slice('Literal['.length, end).split(',')) {
        let value = token.trim();
        if (!value) continue;
        if (value.length >= 2 && ((value.startsWith("'") && value.endsWith("'")) || (value.startsWith('"') && value.endsWith('"')))) {
            value = value.slice(1, -1);
        }
        if (ENUM_TOKEN.test(value)) values.push(value);
    }
    if (values.length === 0) return null;
    return { type: 'string', enum: [...new Set(values)].sort() };
}

// ── 2. Optional Unwrapping ───────────────────────────────

export interface UnwrappedType {
    readonly inner: string;
    readonly nullable: boolean;
}

const OPTIONAL_WRAPPER = /^(?:typing\.)?Optional\s*\[\s*(.+)\s*\]$/;
const UNION_WRAPPER = /^(?:typing\.)?Union\s*\[\s*(.+)\s*\]$/;

/**
 * Strip the null member from `Optional[X]`, `Union[..., None]` and
 * `A | B | None`. Text without a null member comes back unchanged.
 *
 * ```
 * unwrapOptional('Optional[User]')          // { inner: 'User', nullable: true }
 * unwrapOptional('Union[A, B, None]')       // { inner: 'Union[A, B]', nullable: true }
 * unwrapOptional('int')                     // { inner: 'int', nullable: false }
 * ```
 */
export function unwrapOptional(text: string): UnwrappedType {
    if (!text) return { inner: text, nullable: false };
    const anno = text.trim();

    const optional = OPTIONAL_WRAPPER.exec(anno);
    if (optional) return { inner: (optional[1] ?? '').trim(), nullable: true };

    const union = UNION_WRAPPER.exec(anno);
    if (union) {
        const members = splitUnionMembers(union[1] ?? '');
        if (members.includes('None')) {
            const rest = members.filter((member) => member !== 'None');
            if (rest.length === 1) return { inner: rest[0] ?? '', nullable: true };
            if (rest.length > 1) return { inner: `Union[${rest.join(', ')}]`, nullable: true };
        }
    }

    if (anno.includes('|') && anno.includes('None')) {
        const parts = anno.split('|').map((part) => part.trim());
        if (parts.includes('None')) {
            const rest = parts.filter((part) => part !== 'None');
            if (rest.length === 1) return { inner: rest[0] ?? '', nullable: true };
            if (rest.length > 1) return { inner: rest.join(' | '), nullable: true };
        }
    }

    return { inner: anno, nullable: false };
}

// ── 3. Union Flattening ──────────────────────────────────

/** Split on commas that are not nested inside `[...]` */
export function splitUnionMembers(inner: string): string[] {
    const members: string[] = [];
    let current = '';
    let depth = 0;
    for (const char of inner) {
        if (char === '[') depth++;
        else if (char === ']') depth--;
        if (char === ',' && depth === 0) {
            members.push(current.trim());
            current = '';
        } else {
            current += char;
        }
    }
    if (current) members.push(current.trim());
    return members.filter(Boolean);
}

const PIPE_GROUP = /\(([^()]+\|[^()]+)\)/;
const NESTED_UNION = /^(?:typing\.)?Union\s*\[([\s\S]+)\]$/;
const UNION_OPEN = /(?:typing\.)?Union\s*\[/;

function flattenMembers(content: string): string[] {
    const flat: string[] = [];
    for (const member of splitUnionMembers(content)) {
        const nested = NESTED_UNION.exec(member);
        if (nested) flat.push(...flattenMembers(nested[1] ?? ''));
        else flat.push(member);
    }
    return flat;
}

/**
 * Inline nested unions: `(A | B)` groups inside pipe unions, and any
 * `Union[...]` inside a `Union[...]`. Each rewrite is bounded to
 * {@link MAX_UNION_FLATTEN_PASSES} passes.
 *
 * ```
 * flattenNestedUnions('Union[Union[A, B], C]') // 'Union[A, B, C]'
 * flattenNestedUnions('A | (B | C)')           // 'A | B | C'
 * ```
 */
export function flattenNestedUnions(text: string): string {
    if (!text) return text;
    let anno = text;

    if (anno.includes('|') && anno.includes('(')) {
        for (let pass = 0; pass < MAX_UNION_FLATTEN_PASSES && PIPE_GROUP.test(anno); pass++) {
            anno = anno.replace(new RegExp(PIPE_GROUP.source, 'g'), '$1');
        }
    }

    if (!anno.includes('Union')) return anno;

    for (let pass = 0; pass < MAX_UNION_FLATTEN_PASSES && anno.includes('Union['); pass++) {
        const open = UNION_OPEN.exec(anno);
        if (!open) break;

        const bracket = open.index + open[0].length - 1;
        let depth = 1;
        let end = bracket + 1;
        while (end < anno.length && depth > 0) {
            const ch = anno.charAt(end);
            if (ch === '[') depth++;
            else if (ch === ']') depth--;
            end++;
        }
        if (depth !== 0) break;

        const inner = anno.slice(bracket + 1, end - 1);
        if (!inner.includes('Union[')) break;

        const prefix = anno.startsWith('typing.', open.index) ? 'typing.' : '';
        const flattened = `${prefix}Union[${flattenMembers(inner).join(', ')}]`;
        anno = anno.slice(0, open.index) + flattened + anno.slice(end);
    }
    return anno;
}

// ── 4. Union → oneOf / anyOf ─────────────────────────────

const UNION_ARGS = /(?:typing\.)?Union\s*\[\s*([^\]]+)\s*\]/;
const CONTAINER_SUBSCRIPTS = ['List[', 'Dict[', 'Tuple[', 'Set['];
const UNION_MEMBER_KEYWORDS: ReadonlySet<string> = new Set([...TYPING_KEYWORDS, 'None']);

/** `$ref` per union member that names a model (None and primitives dropped) */
export function extractModelRefs(members: readonly string[]): SchemaObject[] {
    const refs: SchemaObject[] = [];
    for (const raw of members) {
        let member = raw.trim();
        if (!member || member === 'None') continue;
        if (member.startsWith('Optional[') && member.endsWith(']')) {
            member = member.slice('Optional['.length, -1).trim();
        }
        const name = modelNames(member, UNION_MEMBER_KEYWORDS)[0];
        if (name) refs.push({ $ref: schemaRef(name) });
    }
    return refs;
}

export interface UnionSchemaOptions {
    /** Emit `anyOf` instead of `oneOf` */
    readonly anyOf?: boolean;
    /** Add `nullable: true` to the composition */
    readonly nullable?: boolean;
}

/**
 * Composition schema for `Union[...]` or `A | B` text, or `null` when
 * no member names a model.
 */
export function extractUnionSchema(text: string, options: UnionSchemaOptions = {}): SchemaObject | null {
    if (!text) return null;
    const anno = flattenNestedUnions(text);
    const key = options.anyOf ? 'anyOf' : 'oneOf';

    const compose = (refs: SchemaObject[]): SchemaObject => ({
        [key]: refs,
        ...(options.nullable ? { nullable: true } : {}),
    });

    const union = UNION_ARGS.exec(anno);
    if (union) {
        const refs = extractModelRefs(splitUnionMembers(union[1] ?? ''));
        if (refs.length > 0) return compose(refs);
    }

    if (anno.includes('|') && !CONTAINER_SUBSCRIPTS.some((kw) => anno.includes(kw))) {
        let cleaned = anno.trim();
        if (cleaned.startsWith('(') && cleaned.endsWith(')')) cleaned = cleaned.slice(1, -1).trim();
        const refs = extractModelRefs(cleaned.split('|').map((part) => part.trim()));
        if (refs.length > 0) return compose(refs);
    }

    return null;
}

// ── 5. Full Resolution ───────────────────────────────────

/**
 * Resolve annotation text through every rule in order.
 *
 * ```
 * buildSchemaFromAnnotation('Optional[Union[RoleModel, UserModel]]')
 * // { oneOf: [{ $ref: '#/components/schemas/RoleModel' },
 * //           { $ref: '#/components/schemas/UserModel' }], nullable: true }
 * ```
 */
export function buildSchemaFromAnnotation(text: string): SchemaObject {
    const literal = extractLiteralSchema(text);
    if (literal) return literal;

    const { inner, nullable } = unwrapOptional(text);
    const union = extractUnionSchema(inner, { nullable });
    if (union) return union;

    return primitiveSchema(text);
}

/** Rule 5 on its own: container and scalar keywords, then a model name */
export function primitiveSchema(text: string): SchemaObject {
    const lower = text.toLowerCase();
    if (text.includes('list') || text.includes('List')) return { type: 'array', items: { type: 'string' } };
    if (lower.includes('dict') || lower.includes('mapping')) return { type: 'object' };
    if (text.includes('int')) return { type: 'integer' };
    if (text.includes('bool')) return { type: 'boolean' };
    if (text.includes('float') || lower.includes('double')) return { type: 'number' };

    const model = modelNames(text)[0];
    if (model) return { $ref: schemaRef(model) };
    return { type: 'string' };
}
