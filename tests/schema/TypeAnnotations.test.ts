import { describe, it, expect } from 'vitest';
import {
    buildSchemaFromAnnotation,
    extractLiteralSchema,
    extractUnionSchema,
    flattenNestedUnions,
    modelNames,
    primitiveSchema,
    splitUnionMembers,
    unwrapOptional,
} from '../../src/schema/TypeAnnotations.js';

const ref = (name: string) => ({ $ref: `#/components/schemas/${name}` });

// ============================================================================
// TypeAnnotations Tests
// ============================================================================

describe('TypeAnnotations', () => {
    // ── Literal Enums ──

    describe('extractLiteralSchema()', () => {
        it('should build a sorted, de-duplicated string enum', () => {
            expect(extractLiteralSchema("Literal['open', 'closed', 'open']")).toEqual({
                type: 'string',
                enum: ['closed', 'open'],
            });
        });

        it('should strip double quotes and keep dotted tokens', () => {
            expect(extractLiteralSchema('Literal["v1.2", "beta-1"]')).toEqual({
                type: 'string',
                enum: ['beta-1', 'v1.2'],
            });
        });

        it('should drop tokens with characters outside the allowed set', () => {
            expect(extractLiteralSchema("Literal['a b', 'ok']")).toEqual({ type: 'string', enum: ['ok'] });
        });

        it('should return null without a Literal', () => {
            expect(extractLiteralSchema('str')).toBeNull();
        });
    });

    // ── Optional Unwrapping ──

    describe('unwrapOptional()', () => {
        it('should unwrap Optional[X]', () => {
            expect(unwrapOptional('Optional[UserModel]')).toEqual({ inner: 'UserModel', nullable: true });
        });

        it('should unwrap Union[X, None]', () => {
            expect(unwrapOptional('Union[UserModel, None]')).toEqual({ inner: 'UserModel', nullable: true });
        });

        it('should keep the remaining members of a wider union', () => {
            expect(unwrapOptional('Union[A, B, None]')).toEqual({ inner: 'Union[A, B]', nullable: true });
        });

        it('should unwrap X | None', () => {
            expect(unwrapOptional('UserModel | None')).toEqual({ inner: 'UserModel', nullable: true });
        });

        it('should leave annotations without a null member unchanged', () => {
            expect(unwrapOptional('Union[A, B]')).toEqual({ inner: 'Union[A, B]', nullable: false });
            expect(unwrapOptional('str')).toEqual({ inner: 'str', nullable: false });
        });
    });

    // ── Union Flattening ──

    describe('splitUnionMembers()', () => {
        it('should only split on top-level commas', () => {
            expect(splitUnionMembers('Dict[str, int], List[A], B')).toEqual(['Dict[str, int]', 'List[A]', 'B']);
        });
    });

    describe('flattenNestedUnions()', () => {
        it('should inline a nested Union', () => {
            expect(flattenNestedUnions('Union[Union[A, B], C]')).toBe('Union[A, B, C]');
        });

        it('should inline parenthesized pipe groups', () => {
            expect(flattenNestedUnions('A | (B | C)')).toBe('A | B | C');
        });

        it('should be idempotent on flat unions', () => {
            const once = flattenNestedUnions('Union[Union[A, B], C]');
            expect(flattenNestedUnions(once)).toBe(once);
            expect(flattenNestedUnions('Union[A, B]')).toBe('Union[A, B]');
        });
    });

    // ── Union → oneOf / anyOf ──

    describe('extractUnionSchema()', () => {
        it('should emit oneOf refs for model members', () => {
            expect(extractUnionSchema('Union[RoleModel, UserModel]')).toEqual({
                oneOf: [ref('RoleModel'), ref('UserModel')],
            });
        });

        it('should emit anyOf when requested', () => {
            expect(extractUnionSchema('RoleModel | UserModel', { anyOf: true })).toEqual({
                anyOf: [ref('RoleModel'), ref('UserModel')],
            });
        });

        it('should drop primitive members', () => {
            expect(extractUnionSchema('Union[str, GuildModel]', { nullable: true })).toEqual({
                oneOf: [ref('GuildModel')],
                nullable: true,
            });
        });

        it('should return null when no member names a model', () => {
            expect(extractUnionSchema('Union[str, bool]')).toBeNull();
        });
    });

    // ── Full Resolution ──

    describe('buildSchemaFromAnnotation()', () => {
        it('should resolve an optional union of models to a nullable oneOf', () => {
            expect(buildSchemaFromAnnotation('Optional[Union[RoleModel, UserModel]]')).toEqual({
                oneOf: [ref('RoleModel'), ref('UserModel')],
                nullable: true,
            });
        });

        it('should prefer Literal enums over everything else', () => {
            expect(buildSchemaFromAnnotation("Optional[Literal['a', 'b']]")).toEqual({
                type: 'string',
                enum: ['a', 'b'],
            });
        });

        it('should fall back to primitive mapping', () => {
            expect(buildSchemaFromAnnotation('Optional[bool]')).toEqual({ type: 'boolean' });
        });
    });

    describe('primitiveSchema()', () => {
        it('should map containers', () => {
            expect(primitiveSchema('List[str]')).toEqual({ type: 'array', items: { type: 'string' } });
            expect(primitiveSchema('Dict[str, Any]')).toEqual({ type: 'object' });
            expect(primitiveSchema('Mapping[str, str]')).toEqual({ type: 'object' });
        });

        it('should map scalars', () => {
            expect(primitiveSchema('int')).toEqual({ type: 'integer' });
            expect(primitiveSchema('bool')).toEqual({ type: 'boolean' });
            expect(primitiveSchema('float')).toEqual({ type: 'number' });
            expect(primitiveSchema('str')).toEqual({ type: 'string' });
        });

        it('should reference the first capitalized name', () => {
            expect(primitiveSchema('GuildModel')).toEqual(ref('GuildModel'));
        });
    });

    describe('modelNames()', () => {
        it('should skip typing keywords', () => {
            expect(modelNames('Optional[Dict[str, GuildModel]]')).toEqual(['GuildModel']);
        });
    });
});
