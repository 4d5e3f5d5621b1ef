/**
 * ModelScanner — Decorated Model Classes → Component Schemas
 *
 * ```python
 * @openapi.component("DiscordRole", description="A guild role")
 * @openapi.property("color", description="RGB color value")
 * class DiscordRole(DiscordMentionable):
 *     def __init__(self, data: dict):
 *         self.id: str = data["id"]
 *         self.color: Optional[int] = data.get("color")
 * ```
 *
 * yields `{ allOf: [{ $ref: DiscordMentionable }, { properties, required }], description }`.
 *
 * Classes can also replace inference entirely with a docstring block
 * holding a complete schema (`type:` without `properties:`), and type
 * aliases declared through the `type_alias(...)` factory become
 * components of their own once every file has been read.
 *
 * @module
 */
import { basename, isAbsolute, relative, resolve } from 'node:path';
import { EXCLUDE_EXTENSION, normalizeExtensionKey, schemaRef } from '../constants.js';
import { OpenApiBlockError } from '../errors.js';
import type { ScanSession } from '../ScanSession.js';
import { parsePython, PythonSyntaxError, type SyntaxNode } from '../python/PythonParser.js';
import { extractConstant, type LiteralValue } from '../python/literals.js';
import {
    bodyOf,
    callParts,
    classDefinitions,
    decoratorIdentifier,
    docstringOf,
    expressionText,
    functionDefinitions,
    statements,
    type CallParts,
    type Definition,
} from '../python/syntax.js';
import {
    applyBlockMetadata,
    applyDecoratorMetadata,
    inferPropertySchema,
    propertyMetadataOf,
} from '../schema/PropertySchema.js';
import { buildSchemaFromAnnotation, extractUnionSchema, unwrapOptional } from '../schema/TypeAnnotations.js';
import {
    collectTypeVars,
    discoverAttributeAliases,
    expandTypeAliases,
    extractModelBaseClasses,
    type AliasMap,
    type AttributeAlias,
} from '../schema/TypeAliasRegistry.js';
import type { ComponentMap, ModelScanResult, OpenApiMap, SchemaObject } from '../types.js';
import { findOpenApiBlocks, parseBlock } from './OpenApiBlock.js';
import { listPythonFiles, readSource } from './SourceWalker.js';

// ── Class Decorators ─────────────────────────────────────

interface ClassDecorators {
    component?: string;
    description: string;
    extensions: Record<string, unknown>;
    properties: Record<string, Record<string, unknown>>;
}

function readClassDecorators(
    definition: Definition,
    attributeAliases: ReadonlyMap<string, AttributeAlias>,
): ClassDecorators {
    const result: ClassDecorators = { description: '', extensions: {}, properties: {} };

    for (const decorator of definition.decorators) {
        const call = callParts(decorator);
        const name = decoratorIdentifier(call ? call.func : decorator);
        if (!name) continue;

        switch (name) {
            case 'property':
                if (call) readPropertyDecorator(call, result.properties);
                break;

            case 'component': {
                const first = call?.args[0];
                if (!call) {
                    result.component = definition.name;
                } else if (first) {
                    const value = extractConstant(first);
                    if (typeof value === 'string') result.component = value;
                }
                for (const keyword of call?.keywords ?? []) {
                    const value = extractConstant(keyword.value);
                    if (typeof value !== 'string') continue;
                    if (keyword.name === 'name') result.component = value;
                    else if (keyword.name === 'description') result.description = value;
                }
                result.component ??= definition.name;
                break;
            }

            case 'attribute': {
                if (!call) break;
                let attrName: string | undefined;
                let attrValue: LiteralValue | undefined;
                const first = call.args[0];
                const second = call.args[1];
                if (first) {
                    const value = extractConstant(first);
                    if (typeof value === 'string') attrName = value;
                }
                if (second) attrValue = extractConstant(second) ?? null;
                for (const keyword of call.keywords) {
                    const value = extractConstant(keyword.value);
                    if (keyword.name === 'name' && typeof value === 'string') attrName = value;
                    else if (keyword.name === 'value') attrValue = value ?? null;
                }
                if (!attrName) break;
                result.extensions[normalizeExtensionKey(attrName)] = attrValue === undefined ? true : attrValue;
                break;
            }

            default: {
                const alias = attributeAliases.get(name);
                if (!alias) break;
                const [aliasName, aliasValue] = alias;
                if (!aliasName) break;
                result.extensions[normalizeExtensionKey(aliasName)] = aliasValue === undefined ? true : aliasValue;
            }
        }
    }
    return result;
}

/**
 * `@property("prop", description=...)`, `@property(property="prop", ...)`
 * and the legacy `@property("prop", "key", value)` triple.
 */
function readPropertyDecorator(
    call: CallParts,
    properties: Record<string, Record<string, unknown>>,
): void {
    let propName: LiteralValue | undefined;
    let keyName: LiteralValue | undefined;
    let keyValue: LiteralValue | undefined;
    const extras: Record<string, unknown> = {};

    const [first, second, third] = call.args;
    if (first) propName = extractConstant(first);
    if (second && third) {
        keyName = extractConstant(second);
        keyValue = extractConstant(third) ?? null;
    }

    for (const { name, value } of call.keywords) {
        switch (name) {
            case 'property':
                propName = extractConstant(value);
                break;
            case 'name':
                keyName = extractConstant(value);
                break;
            case 'value':
                keyValue = extractConstant(value) ?? null;
                break;
            case 'hint': {
                const hint = decodeHint(value);
                if (hint) extras.hint = hint;
                break;
            }
            default: {
                const constant = extractConstant(value);
                if (constant !== undefined && constant !== null) extras[name] = constant;
            }
        }
    }

    if (typeof propName !== 'string') return;
    const entry = properties[propName] ?? {};
    properties[propName] = entry;
    if (typeof keyName === 'string') entry[keyName] = keyValue ?? null;
    Object.assign(entry, extras);
}

/** A hint is either a type expression or a string holding one */
function decodeHint(node: SyntaxNode): string {
    const value = extractConstant(node);
    if (typeof value === 'string') return value;
    return expressionText(node);
}

// ── Docstring Blocks ─────────────────────────────────────

interface ClassBlocks {
    override?: OpenApiMap;
    properties: Record<string, Record<string, unknown>>;
}

function readClassBlocks(doc: string, session: ScanSession): ClassBlocks {
    const result: ClassBlocks = { properties: {} };
    for (const raw of findOpenApiBlocks(doc, session.markers)) {
        let block: OpenApiMap;
        try {
            block = parseBlock(raw, session.markers);
        } catch (err) {
            if (!(err instanceof OpenApiBlockError)) throw err;
            // later blocks may still apply
            continue;
        }
        if ('type' in block && !('properties' in block)) {
            result.override = { ...block };
            break;
        }
        for (const [name, meta] of Object.entries(propertyMetadataOf(block))) {
            const existing = result.properties[name];
            if (!existing) {
                result.properties[name] = { ...meta };
                continue;
            }
            for (const [key, value] of Object.entries(meta)) {
                if (!(key in existing)) existing[key] = value;
            }
        }
    }
    return result;
}

// ── Attributes ───────────────────────────────────────────

/** `self.<attr>` target name, or undefined */
function selfAttribute(node: SyntaxNode): string | undefined {
    if (node.type !== 'attribute') return undefined;
    const receiver = node.childForFieldName('object');
    if (receiver?.type !== 'identifier' || receiver.text !== 'self') return undefined;
    return node.childForFieldName('attribute')?.text;
}

function literalAnnotation(value: SyntaxNode | null): string {
    if (!value) return 'str';
    switch (value.type) {
        case 'true':
        case 'false':
            return 'bool';
        case 'integer':
            return 'int';
        case 'float':
            return 'float';
        default:
            return 'str';
    }
}

/**
 * Attribute name → annotation text, in assignment order, read from the
 * top level of `__init__`. Annotations are alias-expanded; plain
 * assignments fall back to the literal's type.
 */
function collectInitAnnotations(classBody: SyntaxNode, aliases: Readonly<AliasMap>): Map<string, string> {
    const annotations = new Map<string, string>();
    const init = functionDefinitions(classBody).find((fn) => fn.name === '__init__');
    const body = init ? bodyOf(init.node) : undefined;
    if (!body) return annotations;

    for (const stmt of statements(body)) {
        if (stmt.type !== 'expression_statement') continue;
        const [expr] = statements(stmt);
        if (expr?.type !== 'assignment') continue;

        const type = expr.childForFieldName('type');
        if (type) {
            const left = expr.childForFieldName('left');
            const attr = left ? selfAttribute(left) : undefined;
            if (!attr || attr.startsWith('_')) continue;
            const anno = expandTypeAliases(expressionText(type), aliases);
            annotations.set(attr, anno || 'str');
            continue;
        }

        // a = b = value: every target shares the final value
        const targets: SyntaxNode[] = [];
        let current: SyntaxNode | null = expr;
        let value: SyntaxNode | null = null;
        while (current?.type === 'assignment') {
            const left = current.childForFieldName('left');
            if (left) targets.push(left);
            value = current.childForFieldName('right');
            current = value;
        }
        for (const target of targets) {
            const attr = selfAttribute(target);
            if (!attr || attr.startsWith('_') || annotations.has(attr)) continue;
            annotations.set(attr, literalAnnotation(value));
        }
    }
    return annotations;
}

// ── Schema Assembly ──────────────────────────────────────

interface ClassContext {
    readonly definition: Definition;
    readonly decorators: ClassDecorators;
    readonly blocks: ClassBlocks;
    readonly aliases: Readonly<AliasMap>;
    readonly typeVars: ReadonlySet<string>;
}

function buildComponentSchema(context: ClassContext): OpenApiMap {
    const { definition, decorators, blocks } = context;
    const body = bodyOf(definition.node);

    const properties: Record<string, SchemaObject> = {};
    const required: string[] = [];
    const annotations = body ? collectInitAnnotations(body, context.aliases) : new Map<string, string>();

    for (const [attr, annotation] of annotations) {
        const text = expandTypeAliases(annotation, context.aliases);
        const propertyMeta = decorators.properties[attr];
        const hint = propertyMeta?.hint;
        const { schema, nullable } = inferPropertySchema(text, {
            typeVars: context.typeVars,
            ...(typeof hint === 'string' ? { hint } : {}),
        });
        applyBlockMetadata(schema, blocks.properties[attr]);
        applyDecoratorMetadata(schema, propertyMeta);
        properties[attr] = schema;
        if (!nullable) required.push(attr);
    }
    required.sort();

    const bases = extractModelBaseClasses(definition.node, context.typeVars);
    const description = decorators.description ? { description: decorators.description } : {};

    if (bases.length > 0) {
        const local: OpenApiMap = {
            ...(Object.keys(properties).length > 0 ? { properties } : {}),
            ...(required.length > 0 ? { required } : {}),
        };
        const allOf: OpenApiMap[] = bases.map((base) => ({ $ref: schemaRef(base) }));
        if (Object.keys(local).length > 0) allOf.push(local);
        return { allOf, ...description, ...decorators.extensions };
    }

    return {
        type: 'object',
        properties,
        ...(required.length > 0 ? { required } : {}),
        ...description,
        ...decorators.extensions,
    };
}

// ── Scanner ──────────────────────────────────────────────

/**
 * Scan a models tree. Files whose name starts with `_`, unreadable files
 * and files that do not parse are skipped without a diagnostic.
 */
export function scanModels(modelsRoot: string, session: ScanSession): ModelScanResult {
    const components: ComponentMap = {};
    const excluded = new Set<string>();
    const files = listPythonFiles(modelsRoot);
    if (files.length === 0) return { components, excluded };

    const attributeAliases = discoverAttributeAliases(modelsRoot);

    for (const file of files) {
        if (basename(file).startsWith('_')) continue;
        const source = readSource(file);
        if (source === undefined) continue;
        let root: SyntaxNode;
        try {
            root = parsePython(source);
        } catch (err) {
            if (!(err instanceof PythonSyntaxError)) throw err;
            continue;
        }

        const aliases = session.aliases.register(file, root);
        const typeVars = collectTypeVars(root);

        for (const definition of classDefinitions(root)) {
            const decorators = readClassDecorators(definition, attributeAliases);
            const blocks = readClassBlocks(docstringOf(bodyOf(definition.node)), session);
            const name = decorators.component;
            if (!name) continue;

            if (decorators.extensions[EXCLUDE_EXTENSION]) {
                excluded.add(name);
                continue;
            }

            if (blocks.override) {
                components[name] = {
                    ...blocks.override,
                    ...(decorators.description && !('description' in blocks.override)
                        ? { description: decorators.description }
                        : {}),
                    ...decorators.extensions,
                };
                continue;
            }

            components[name] = buildComponentSchema({ definition, decorators, blocks, aliases, typeVars });
        }
    }

    addAliasComponents(components, resolve(modelsRoot), session);
    return { components, excluded };
}

function isWithin(file: string, root: string): boolean {
    const rel = relative(root, resolve(file));
    return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/** Components declared through the `type_alias(...)` factory under the models root */
function addAliasComponents(components: ComponentMap, modelsRoot: string, session: ScanSession): void {
    for (const record of session.aliases.metadata) {
        if (!isWithin(record.path, modelsRoot)) continue;
        if (!record.component || !record.alias || record.component in components) continue;

        const expanded = session.aliases.expand(record.annotation);
        const { inner, nullable } = unwrapOptional(expanded);
        const schema: SchemaObject = record.anyOf
            ? extractUnionSchema(inner, { anyOf: true, nullable }) ?? buildSchemaFromAnnotation(expanded)
            : buildSchemaFromAnnotation(expanded);

        if (record.description !== undefined) schema.description = record.description;
        if (record.default !== undefined) schema.default = record.default;
        for (const [key, value] of Object.entries(record.extensions ?? {})) {
            schema[normalizeExtensionKey(key)] = value;
        }
        components[record.component] = schema;
    }
}
