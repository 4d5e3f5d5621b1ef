/**
 * TypeAliasRegistry — Type Aliases, TypeVars and Base Classes
 *
 * Collects module-level `Name: TypeAlias = ...` declarations so that
 * annotations written against an alias can be expanded back to the
 * underlying type before schema inference. Aliases imported with
 * `from X import Name` are followed into the defining module.
 *
 * Two declaration spellings are recognized:
 *
 * ```python
 * UserOrRole: TypeAlias = Union[UserModel, RoleModel]
 *
 * MemberRef: TypeAlias = openapi.type_alias(
 *     "MemberRef", description="A member or a role", anyof=True,
 * )(Union[UserModel, RoleModel])
 * ```
 *
 * The second one also makes the alias a component schema in its own right.
 *
 * @module
 */
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
    ATTRIBUTE_ALIAS_MODULES,
    MANAGED_EXTENSION,
    MAX_ALIAS_EXPANSION_PASSES,
    NON_MODEL_BASES,
    normalizeExtensionKey,
} from '../constants.js';
import { resolveModulePath } from '../python/ModuleResolver.js';
import { parsePython, PythonSyntaxError, type SyntaxNode } from '../python/PythonParser.js';
import { extractConstant, extractConstantDict, type LiteralValue } from '../python/literals.js';
import {
    callParts,
    decoratorIdentifier,
    expressionText,
    functionDefinitions,
    bodyOf,
    statements,
    type CallParts,
} from '../python/syntax.js';

/** Alias name → underlying annotation text */
export type AliasMap = Record<string, string>;

/** Component metadata declared through the `type_alias(...)` factory */
export interface TypeAliasRecord {
    readonly alias: string;
    readonly component: string;
    readonly annotation: string;
    /** Absolute path of the defining file */
    readonly path: string;
    readonly description?: string;
    readonly default?: LiteralValue;
    readonly anyOf?: boolean;
    readonly extensions?: Readonly<Record<string, unknown>>;
}

// ── Registry ─────────────────────────────────────────────

export class TypeAliasRegistry {
    private readonly cache = new Map<string, AliasMap>();
    private readonly globalAliases: AliasMap = {};
    private readonly records = new Map<string, TypeAliasRecord>();

    constructor(private readonly projectRoot: string) {}

    /** Every alias seen so far, across files */
    get aliases(): Readonly<AliasMap> {
        return this.globalAliases;
    }

    /** Factory metadata, keyed by alias name (last declaration wins) */
    get metadata(): readonly TypeAliasRecord[] {
        return [...this.records.values()];
    }

    /**
     * Alias map of an already parsed module. Cached per resolved path, so
     * a file is only collected once per session.
     */
    register(file: string, root: SyntaxNode): AliasMap {
        const key = resolve(file);
        const cached = this.cache.get(key);
        if (cached) return cached;
        this.cache.set(key, {});
        const map = this.collect(root, key);
        this.cache.set(key, map);
        return map;
    }

    /**
     * Alias map of a file on disk. Unreadable or unparsable files yield an
     * empty map; a placeholder entry guards against import cycles.
     */
    load(file: string): AliasMap {
        const key = resolve(file);
        const cached = this.cache.get(key);
        if (cached) return cached;
        this.cache.set(key, {});

        if (!existsSync(key)) return {};
        let root: SyntaxNode;
        try {
            root = parsePython(readFileSync(key, 'utf-8'));
        } catch (err) {
            if (!(err instanceof PythonSyntaxError)) throw err;
            return {};
        }
        const map = this.collect(root, key);
        this.cache.set(key, map);
        return map;
    }

    /** Expand with the session-wide table */
    expand(annotation: string): string {
        return expandTypeAliases(annotation, this.globalAliases);
    }

    // ── Collection ───────────────────────────────────────

    private collect(root: SyntaxNode, file: string): AliasMap {
        const local: AliasMap = {};

        for (const stmt of statements(root)) {
            const assignment = singleExpression(stmt, 'assignment');
            if (!assignment) continue;
            const left = assignment.childForFieldName('left');
            const annotation = unwrapType(assignment.childForFieldName('type'));
            const value = assignment.childForFieldName('right');
            if (!left || left.type !== 'identifier' || !annotation || !isTypeAliasAnnotation(annotation)) continue;

            const alias = left.text;
            const factory = value ? factoryCall(value) : undefined;
            if (factory) {
                const target = factory.outer.args[0];
                const annotationText = expressionText(target);
                if (annotationText) local[alias] = annotationText;
                this.records.set(alias, buildRecord(alias, annotationText, file, factory.options));
                continue;
            }

            const text = expressionText(value);
            if (text) local[alias] = text;
        }

        // type_alias(...)(cast(Any, Name)) after a plain declaration
        for (const stmt of statements(root)) {
            const expr = singleExpression(stmt, 'call');
            const factory = expr ? factoryCall(expr) : undefined;
            if (!factory) continue;
            const alias = referencedAlias(factory.outer.args[0]);
            const annotationText = alias ? local[alias] : undefined;
            if (!alias || annotationText === undefined) continue;
            this.records.set(alias, buildRecord(alias, annotationText, file, factory.options));
        }

        for (const stmt of statements(root)) {
            if (stmt.type !== 'import_from_statement') continue;
            this.importAliases(stmt, file, local);
        }

        Object.assign(this.globalAliases, local);
        return local;
    }

    private importAliases(stmt: SyntaxNode, file: string, local: AliasMap): void {
        const moduleNode = stmt.childForFieldName('module_name');
        if (!moduleNode) return;

        let level = 0;
        let moduleName: string | null = moduleNode.text;
        if (moduleNode.type === 'relative_import') {
            const prefix = moduleNode.namedChildren.find((child) => child.type === 'import_prefix');
            level = prefix ? prefix.text.length : 0;
            const dotted = moduleNode.namedChildren.find((child) => child.type === 'dotted_name');
            moduleName = dotted ? dotted.text : null;
        }

        const target = resolveModulePath(moduleName, level, file, this.projectRoot);
        if (!target) return;
        const remote = this.load(target);
        if (Object.keys(remote).length === 0) return;

        for (const imported of importedNames(stmt)) {
            if (imported.local in local) continue;
            const value = remote[imported.name];
            if (value) local[imported.local] = value;
        }
    }
}

// ── Expansion ────────────────────────────────────────────

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace whole-word alias names with their parenthesized definition,
 * repeating until nothing changes or the pass limit is reached.
 *
 * ```
 * expandTypeAliases('Optional[MemberRef]', { MemberRef: 'Union[User, Role]' })
 * // 'Optional[(Union[User, Role])]'
 * ```
 */
export function expandTypeAliases(annotation: string, aliases: Readonly<AliasMap>): string {
    if (!annotation) return annotation;
    const entries = Object.entries(aliases).filter(([, value]) => value);
    if (entries.length === 0) return annotation;

    let expanded = annotation;
    for (let pass = 0; pass < MAX_ALIAS_EXPANSION_PASSES; pass++) {
        const previous = expanded;
        for (const [name, value] of entries) {
            expanded = expanded.replace(new RegExp(`\\b${escapeRegExp(name)}\\b`, 'g'), () => `(${value})`);
        }
        if (expanded === previous) break;
    }
    return expanded;
}

// ── Factory Calls ────────────────────────────────────────

interface FactoryOptions {
    component?: string;
    description?: string;
    default?: LiteralValue;
    managed: boolean;
    anyOf: boolean;
    attributes: Record<string, LiteralValue>;
}

interface FactoryCall {
    /** The call applying the factory result to the aliased type */
    readonly outer: CallParts;
    readonly options: FactoryOptions;
}

/** `type_alias(...)(value)`: a call whose callee is itself a `type_alias` call */
function factoryCall(node: SyntaxNode): FactoryCall | undefined {
    const outer = callParts(node);
    if (!outer) return undefined;
    const inner = callParts(outer.func);
    if (!inner || decoratorIdentifier(inner.func) !== 'type_alias') return undefined;
    return { outer, options: factoryOptions(inner) };
}

function factoryOptions(call: CallParts): FactoryOptions {
    const options: FactoryOptions = { managed: false, anyOf: false, attributes: {} };
    const first = call.args[0];
    if (first) {
        const name = extractConstant(first);
        if (typeof name === 'string') options.component = name;
    }
    for (const { name, value } of call.keywords) {
        const constant = extractConstant(value);
        switch (name) {
            case 'name':
                if (typeof constant === 'string') options.component = constant;
                break;
            case 'description':
                if (typeof constant === 'string') options.description = constant;
                break;
            case 'default':
                if (constant !== undefined) options.default = constant;
                break;
            case 'managed':
                if (typeof constant === 'boolean') options.managed = constant;
                break;
            case 'anyof':
                if (typeof constant === 'boolean') options.anyOf = constant;
                break;
            case 'attributes': {
                const attributes = extractConstantDict(value);
                if (attributes) options.attributes = attributes;
                break;
            }
        }
    }
    return options;
}

function buildRecord(alias: string, annotation: string, path: string, options: FactoryOptions): TypeAliasRecord {
    const extensions: Record<string, unknown> = {};
    if (options.managed) extensions[MANAGED_EXTENSION] = true;
    for (const [key, value] of Object.entries(options.attributes)) {
        extensions[normalizeExtensionKey(key)] = value;
    }
    return {
        alias,
        component: options.component || alias,
        annotation,
        path,
        ...(options.description !== undefined ? { description: options.description } : {}),
        ...(options.default !== undefined ? { default: options.default } : {}),
        ...(options.anyOf ? { anyOf: true } : {}),
        ...(Object.keys(extensions).length > 0 ? { extensions } : {}),
    };
}

/** `Name` or `cast(Any, Name)` */
function referencedAlias(node: SyntaxNode | undefined): string | undefined {
    if (!node) return undefined;
    if (node.type === 'identifier') return node.text;
    const cast = callParts(node);
    if (!cast || decoratorIdentifier(cast.func) !== 'cast') return undefined;
    const target = cast.args[1];
    return target?.type === 'identifier' ? target.text : undefined;
}

// ── Syntax Helpers ───────────────────────────────────────

function singleExpression(stmt: SyntaxNode, type: string): SyntaxNode | undefined {
    if (stmt.type !== 'expression_statement') return undefined;
    const children = statements(stmt);
    const expr = children[0];
    return children.length === 1 && expr?.type === type ? expr : undefined;
}

/** Annotation nodes are wrapped in a `type` node */
function unwrapType(node: SyntaxNode | null): SyntaxNode | undefined {
    if (!node) return undefined;
    if (node.type === 'type') return node.namedChildren[0];
    return node;
}

function isTypeAliasAnnotation(node: SyntaxNode): boolean {
    return decoratorIdentifier(node) === 'TypeAlias';
}

interface ImportedName {
    readonly name: string;
    readonly local: string;
}

function importedNames(stmt: SyntaxNode): ImportedName[] {
    const names: ImportedName[] = [];
    const moduleStart = stmt.childForFieldName('module_name')?.startIndex;
    for (const child of stmt.namedChildren) {
        if (child.startIndex === moduleStart) continue;
        if (child.type === 'aliased_import') {
            const name = child.childForFieldName('name')?.text;
            const local = child.childForFieldName('alias')?.text;
            if (name) names.push({ name, local: local ?? name });
        } else if (child.type === 'dotted_name') {
            names.push({ name: child.text, local: child.text });
        }
    }
    return names;
}

// ── TypeVars & Base Classes ──────────────────────────────

/** Module-level `T = TypeVar(...)` names (chained targets included) */
export function collectTypeVars(root: SyntaxNode): Set<string> {
    const typeVars = new Set<string>();
    for (const stmt of statements(root)) {
        let assignment = singleExpression(stmt, 'assignment');
        const targets: SyntaxNode[] = [];
        let value: SyntaxNode | null = null;
        while (assignment) {
            const left = assignment.childForFieldName('left');
            if (left) targets.push(left);
            value = assignment.childForFieldName('right');
            assignment = value?.type === 'assignment' ? value : undefined;
        }
        const call = value ? callParts(value) : undefined;
        if (!call || decoratorIdentifier(call.func) !== 'TypeVar') continue;
        for (const target of targets) {
            if (target.type === 'identifier') typeVars.add(target.text);
        }
    }
    return typeVars;
}

/**
 * Base classes that may be components themselves: `Generic`, TypeVars,
 * builtin bases and typing containers are dropped; subscripts and module
 * qualification are stripped.
 */
export function extractModelBaseClasses(classNode: SyntaxNode, typeVars: ReadonlySet<string>): string[] {
    const superclasses = classNode.childForFieldName('superclasses');
    if (!superclasses) return [];

    const bases: string[] = [];
    for (const base of statements(superclasses)) {
        if (base.type === 'keyword_argument' || base.type === 'list_splat' || base.type === 'dictionary_splat') continue;
        let name = expressionText(base);
        if (!name || name.includes('Generic[') || name === 'Generic') continue;
        if (name.includes('[')) name = name.split('[')[0]?.trim() ?? '';
        if (name.includes('.')) name = name.split('.').pop() ?? '';
        if (!name || typeVars.has(name) || NON_MODEL_BASES.has(name)) continue;
        if (/^[A-Z]/.test(name)) bases.push(name);
    }
    return bases;
}

// ── Attribute Aliases ────────────────────────────────────

/** Extension name (null when undeclared) and value (undefined → `true`) */
export type AttributeAlias = readonly [name: string | null, value: LiteralValue | undefined];

/**
 * Find helper decorators defined as `def exclude(): return attribute("exclude", True)`
 * in the models tree's `openapi` helper module. The first candidate file
 * that yields any alias wins.
 */
export function discoverAttributeAliases(modelsRoot: string): Map<string, AttributeAlias> {
    const aliases = new Map<string, AttributeAlias>();
    for (const candidate of ATTRIBUTE_ALIAS_MODULES) {
        const file = resolve(join(modelsRoot, candidate));
        if (!existsSync(file)) continue;
        let root: SyntaxNode;
        try {
            root = parsePython(readFileSync(file, 'utf-8'));
        } catch (err) {
            if (!(err instanceof PythonSyntaxError)) throw err;
            continue;
        }

        for (const fn of functionDefinitions(root)) {
            const returned = firstReturnValue(bodyOf(fn.node));
            const call = returned ? callParts(returned) : undefined;
            if (!call || decoratorIdentifier(call.func) !== 'attribute') continue;

            let name: string | null = null;
            let value: LiteralValue | undefined;
            const first = call.args[0];
            const second = call.args[1];
            if (first) {
                const constant = extractConstant(first);
                if (typeof constant === 'string') name = constant;
            }
            if (second) value = extractConstant(second) ?? null;
            for (const keyword of call.keywords) {
                const constant = extractConstant(keyword.value);
                if (keyword.name === 'name' && typeof constant === 'string') name = constant;
                else if (keyword.name === 'value') value = constant ?? null;
            }
            aliases.set(fn.name, [name, value]);
        }
        if (aliases.size > 0) break;
    }
    return aliases;
}

function firstReturnValue(body: SyntaxNode | undefined): SyntaxNode | undefined {
    if (!body) return undefined;
    for (const stmt of statements(body)) {
        if (stmt.type === 'return_statement') return stmt.namedChildren[0];
    }
    return undefined;
}
