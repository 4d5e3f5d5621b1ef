import { describe, it, expect } from 'vitest';
import { parsePython, PythonSyntaxError, type SyntaxNode } from '../../src/python/PythonParser.js';
import {
    cleanDocstring,
    decodeStringLiteral,
    extractConstant,
    extractConstantDict,
    resolvePathLiteral,
} from '../../src/python/literals.js';
import { statements } from '../../src/python/syntax.js';

/** The expression of a one-line module */
function expr(source: string): SyntaxNode {
    const [stmt] = statements(parsePython(source));
    const [node] = stmt ? statements(stmt) : [];
    if (!node) throw new Error(`no expression in ${source}`);
    return node;
}

// ============================================================================
// Literal Extraction Tests
// ============================================================================

describe('literals', () => {
    describe('parsePython()', () => {
        it('should reject invalid source', () => {
            expect(() => parsePython('x = 1\ndef broken(:\n')).toThrow(PythonSyntaxError);
        });

        it('should parse sources larger than one input chunk', () => {
            const source = Array.from({ length: 2000 }, (_, i) => `value_${i} = ${i}`).join('\n');
            expect(statements(parsePython(source))).toHaveLength(2000);
        });
    });

    describe('extractConstant()', () => {
        it('should read scalars', () => {
            expect(extractConstant(expr('42'))).toBe(42);
            expect(extractConstant(expr('1_000'))).toBe(1000);
            expect(extractConstant(expr('0x1F'))).toBe(31);
            expect(extractConstant(expr('2.5'))).toBe(2.5);
            expect(extractConstant(expr('-3'))).toBe(-3);
            expect(extractConstant(expr('True'))).toBe(true);
            expect(extractConstant(expr('False'))).toBe(false);
            expect(extractConstant(expr('None'))).toBeNull();
        });

        it('should return undefined for non-literals', () => {
            expect(extractConstant(expr('name'))).toBeUndefined();
            expect(extractConstant(expr('f(1)'))).toBeUndefined();
            expect(extractConstant(expr('-name'))).toBeUndefined();
        });
    });

    describe('decodeStringLiteral()', () => {
        it('should decode escapes and concatenate adjacent literals', () => {
            expect(decodeStringLiteral(expr("'a\\tb'"))).toBe('a\tb');
            expect(decodeStringLiteral(expr("'ab' \"cd\""))).toBe('abcd');
        });

        it('should keep raw strings verbatim', () => {
            expect(decodeStringLiteral(expr("r'\\d+'"))).toBe('\\d+');
        });

        it('should refuse f-strings and bytes', () => {
            expect(decodeStringLiteral(expr("f'{x}'"))).toBeUndefined();
            expect(decodeStringLiteral(expr("b'raw'"))).toBeUndefined();
        });
    });

    describe('resolvePathLiteral()', () => {
        it('should substitute the API version placeholder', () => {
            expect(resolvePathLiteral(expr('f"/api/{API_VERSION}/items"'))).toBe('/api/v1/items');
        });

        it('should unescape doubled braces', () => {
            expect(resolvePathLiteral(expr('f"/api/{API_VERSION}/guilds/{{guild_id}}"'))).toBe('/api/v1/guilds/{guild_id}');
        });

        it('should give up on unknown placeholders', () => {
            expect(resolvePathLiteral(expr('f"/api/{prefix}/items"'))).toBeNull();
        });

        it('should pass plain strings through', () => {
            expect(resolvePathLiteral(expr('"/health"'))).toBe('/health');
            expect(resolvePathLiteral(expr('PATH'))).toBeNull();
        });
    });

    describe('extractConstantDict()', () => {
        it('should read flat literal dicts', () => {
            expect(extractConstantDict(expr('{"owner": "team-a", "level": 2, "public": None}'))).toEqual({
                owner: 'team-a',
                level: 2,
                public: null,
            });
        });

        it('should refuse non-literal values and spreads', () => {
            expect(extractConstantDict(expr('{"a": value}'))).toBeUndefined();
            expect(extractConstantDict(expr('{**base}'))).toBeUndefined();
        });
    });

    describe('cleanDocstring()', () => {
        it('should strip common indentation and blank edges', () => {
            expect(cleanDocstring('\n    First line\n      nested\n    last\n    ')).toBe('First line\n  nested\nlast');
        });

        it('should left-strip the first line only', () => {
            expect(cleanDocstring('Summary.\n\n    Details.')).toBe('Summary.\n\nDetails.');
        });
    });
});
