/**
 * PropertySchema — Model Attribute Inference
 *
 * Turns the (alias-expanded) annotation of one `self.<attr>` assignment
 * into a property schema, then layers documentation-block metadata and
 * `@property(...)` decorator keywords on top.
 *
 * @module
 */
import { schemaRef } from '../constants.js';
import type { SchemaObject } from '../types.js';
import { isRecord } from '../types.js';
import { buildSchemaFromAnnotation, extractLiteralSchema, modelNames } from './TypeAnnotations.js';

// ── Hints ────────────────────────────────────────────────

/**
 * Schema for a `hint=` keyword given on a property decorator. Array hints
 * over mappings (`List[Dict[str, Any]]`) get object items.
 */
export function resolveHintSchema(hint: string | undefined): SchemaObject | null {
    if (!hint) return null;
    const schema = buildSchemaFromAnnotation(hint);
    if (schema.type === 'array') {
        const lower = hint.toLowerCase();
        if (lower.includes('dict') || lower.includes('mapping')) {
            return { ...schema, items: { type: 'object' } };
        }
    }
    return schema;
}

// ── Inference ────────────────────────────────────────────

export interface PropertyContext {
    /** TypeVars declared at module level in the defining file */
    readonly typeVars: ReadonlySet<string>;
    /** `hint=` text from the property decorator, if any */
    readonly hint?: string;
}

export interface InferredProperty {
    readonly schema: SchemaObject;
    readonly nullable: boolean;
}

const LIST_ITEM = /(?:List|list)\s*\[\s*([A-Za-z_][A-Za-z0-9_]*)\s*\]/;

/**
 * Infer a property schema from annotation text.
 *
 * ```
 * inferPropertySchema('Optional[str]', ctx)    // { schema: { type: 'string', nullable: true }, nullable: true }
 * inferPropertySchema('List[UserModel]', ctx)  // { type: 'array', items: { $ref: '...UserModel' } }
 * ```
 */
export function inferPropertySchema(text: string, context: PropertyContext): InferredProperty {
    const nullable = text.includes('Optional') || text.includes('None');
    let type = 'string';
    let schema: SchemaObject = extractLiteralSchema(text) ?? {};

    if (Object.keys(schema).length === 0) {
        const lower = text.toLowerCase();
        if (text.includes('list') || text.includes('List')) {
            type = 'array';
        } else if (lower.includes('dict') || lower.includes('mapping')) {
            type = 'object';
        } else if (text.includes('int')) {
            type = 'integer';
        } else if (text.includes('bool')) {
            type = 'boolean';
        } else if (text.includes('float')) {
            type = 'number';
        } else {
            const model = modelNames(text)[0];
            if (model && context.typeVars.has(model)) {
                schema = resolveHintSchema(context.hint) ?? { type: 'object' };
            } else if (model) {
                schema = { $ref: schemaRef(model) };
            }
        }
        if (Object.keys(schema).length === 0) schema = { type };
    }

    if (type === 'array') {
        schema.items = arrayItems(text, context);
    }

    if (nullable && schema.$ref === undefined) schema.nullable = true;
    return { schema, nullable };
}

function arrayItems(text: string, context: PropertyContext): SchemaObject {
    if (text.toLowerCase().includes('dict')) return { type: 'object' };

    const match = LIST_ITEM.exec(text);
    const inner = match?.[1];
    if (!inner) return { type: 'string' };

    if (context.typeVars.has(inner)) {
        const hinted = resolveHintSchema(context.hint);
        if (!hinted) return { type: 'object' };
        if (hinted.type === 'array' && hinted.items !== undefined) return hinted.items;
        return hinted;
    }
    if (/^[A-Z]/.test(inner)) return { $ref: schemaRef(inner) };
    return { type: 'string' };
}

// ── Metadata Layering ────────────────────────────────────

/**
 * Apply documentation-block metadata for one property: a string
 * `description` and a list `enum` override; other keys fill gaps only.
 */
export function applyBlockMetadata(schema: SchemaObject, meta: Record<string, unknown> | undefined): void {
    if (!meta) return;
    if (typeof meta.description === 'string') schema.description = meta.description;
    if (Array.isArray(meta.enum)) schema.enum = meta.enum;
    for (const [key, value] of Object.entries(meta)) {
        if (!(key in schema)) schema[key] = value;
    }
}

/**
 * Apply `@property(...)` keywords. `hint` only steers inference and is
 * never written; other keys fill absent or null entries.
 */
export function applyDecoratorMetadata(schema: SchemaObject, meta: Record<string, unknown> | undefined): void {
    if (!meta) return;
    for (const [key, value] of Object.entries(meta)) {
        if (key === 'hint') continue;
        if (!(key in schema) || schema[key] === null || schema[key] === undefined) schema[key] = value;
    }
}

/** Property-level metadata from a `properties:` mapping in a block */
export function propertyMetadataOf(block: Record<string, unknown>): Record<string, Record<string, unknown>> {
    const result: Record<string, Record<string, unknown>> = {};
    const properties = block.properties;
    if (!isRecord(properties)) return result;
    for (const [name, value] of Object.entries(properties)) {
        if (isRecord(value)) result[name] = value;
    }
    return result;
}
