import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';
import { parsePython } from '../../src/python/PythonParser.js';
import { classDefinitions } from '../../src/python/syntax.js';
import {
    collectTypeVars,
    discoverAttributeAliases,
    expandTypeAliases,
    extractModelBaseClasses,
    TypeAliasRegistry,
} from '../../src/schema/TypeAliasRegistry.js';
import { createTempDir, lines, removeDir, writeFiles } from '../helpers/fixtures.js';

// ============================================================================
// TypeAliasRegistry Tests
// ============================================================================

describe('TypeAliasRegistry', () => {
    describe('expandTypeAliases()', () => {
        it('should replace whole words with the parenthesized definition', () => {
            expect(expandTypeAliases('Optional[MemberRef]', { MemberRef: 'Union[User, Role]' })).toBe(
                'Optional[(Union[User, Role])]',
            );
            expect(expandTypeAliases('MemberRefs', { MemberRef: 'int' })).toBe('MemberRefs');
        });

        it('should expand aliases of aliases', () => {
            expect(expandTypeAliases('A', { A: 'List[B]', B: 'int' })).toBe('(List[(int)])');
        });

        it('should leave text alone without aliases', () => {
            expect(expandTypeAliases('str', {})).toBe('str');
            expect(expandTypeAliases('', { A: 'int' })).toBe('');
        });
    });

    describe('collectTypeVars()', () => {
        it('should collect TypeVar names including chained targets', () => {
            const root = parsePython(lines('T = TypeVar("T")', 'K = V = TypeVar("KV")', 'X = 1'));
            expect([...collectTypeVars(root)].sort()).toEqual(['K', 'T', 'V']);
        });
    });

    describe('extractModelBaseClasses()', () => {
        it('should keep model bases only', () => {
            const root = parsePython(lines(
                'class Sample(Generic[T], BaseModel, models.Shared, Base[T], object, T, metaclass=ABCMeta):',
                '    pass',
            ));
            const [cls] = classDefinitions(root);
            expect(cls ? extractModelBaseClasses(cls.node, new Set(['T'])) : []).toEqual(['BaseModel', 'Shared', 'Base']);
        });

        it('should return nothing for a class without bases', () => {
            const [cls] = classDefinitions(parsePython(lines('class Bare:', '    pass')));
            expect(cls ? extractModelBaseClasses(cls.node, new Set()) : undefined).toEqual([]);
        });
    });

    describe('registry', () => {
        let dir: string;

        beforeEach(() => {
            dir = createTempDir();
        });

        afterEach(() => {
            removeDir(dir);
        });

        it('should collect annotated aliases and skip plain assignments', () => {
            writeFiles(dir, {
                'aliases.py': lines('UserOrRole: TypeAlias = Union[UserModel, RoleModel]', 'Plain = int'),
            });
            const registry = new TypeAliasRegistry(dir);
            expect(registry.load(join(dir, 'aliases.py'))).toEqual({ UserOrRole: 'Union[UserModel, RoleModel]' });
            expect(registry.aliases).toEqual({ UserOrRole: 'Union[UserModel, RoleModel]' });
            expect(registry.expand('List[UserOrRole]')).toBe('List[(Union[UserModel, RoleModel])]');
        });

        it('should follow relative imports with renames', () => {
            writeFiles(dir, {
                'pkg/aliases.py': lines('UserOrRole: TypeAlias = Union[UserModel, RoleModel]'),
                'pkg/model.py': lines('from .aliases import UserOrRole as Either'),
            });
            const registry = new TypeAliasRegistry(dir);
            expect(registry.load(join(dir, 'pkg', 'model.py'))).toEqual({ Either: 'Union[UserModel, RoleModel]' });
        });

        it('should follow absolute imports from the project root', () => {
            writeFiles(dir, {
                'pkg/aliases.py': lines('UserOrRole: TypeAlias = Union[UserModel, RoleModel]'),
                'app/other.py': lines('from pkg.aliases import UserOrRole'),
            });
            const registry = new TypeAliasRegistry(dir);
            expect(registry.load(join(dir, 'app', 'other.py'))).toEqual({ UserOrRole: 'Union[UserModel, RoleModel]' });
        });

        it('should record factory metadata', () => {
            writeFiles(dir, {
                'aliases.py': lines(
                    'MemberRef: TypeAlias = openapi.type_alias(',
                    '    "Member", description="A member", anyof=True, managed=True, attributes={"owner": "team-a"},',
                    ')(Union[UserModel, RoleModel])',
                    '',
                    'Plain: TypeAlias = Union[A, B]',
                    'openapi.type_alias("PlainRef")(cast(Any, Plain))',
                ),
            });
            const file = join(dir, 'aliases.py');
            const registry = new TypeAliasRegistry(dir);
            registry.load(file);

            expect(registry.metadata).toEqual([
                {
                    alias: 'MemberRef',
                    component: 'Member',
                    annotation: 'Union[UserModel, RoleModel]',
                    path: resolve(file),
                    description: 'A member',
                    anyOf: true,
                    extensions: { 'x-openapi-managed': true, 'x-owner': 'team-a' },
                },
                { alias: 'Plain', component: 'PlainRef', annotation: 'Union[A, B]', path: resolve(file) },
            ]);
        });

        it('should keep literal defaults and leave out computed ones', () => {
            writeFiles(dir, {
                'defaults.py': lines(
                    'NoneRef: TypeAlias = openapi.type_alias("NoneRef", default=None)(Union[A, B])',
                    'ComputedRef: TypeAlias = openapi.type_alias("ComputedRef", default=DEFAULT_REF)(Union[A, B])',
                ),
            });
            const file = join(dir, 'defaults.py');
            const registry = new TypeAliasRegistry(dir);
            registry.load(file);

            expect(registry.metadata).toEqual([
                { alias: 'NoneRef', component: 'NoneRef', annotation: 'Union[A, B]', path: resolve(file), default: null },
                { alias: 'ComputedRef', component: 'ComputedRef', annotation: 'Union[A, B]', path: resolve(file) },
            ]);
        });

        it('should yield an empty map for missing or broken files', () => {
            writeFiles(dir, { 'broken.py': 'def broken(:\n' });
            const registry = new TypeAliasRegistry(dir);
            expect(registry.load(join(dir, 'missing.py'))).toEqual({});
            expect(registry.load(join(dir, 'broken.py'))).toEqual({});
        });
    });

    describe('discoverAttributeAliases()', () => {
        let dir: string;

        beforeEach(() => {
            dir = createTempDir();
        });

        afterEach(() => {
            removeDir(dir);
        });

        it('should map helper functions returning attribute calls', () => {
            writeFiles(dir, {
                'openapi/openapi.py': lines(
                    'def exclude():',
                    '    return attribute("x-openapi-exclude", True)',
                    '',
                    'def managed():',
                    '    return attribute(name="x-openapi-managed")',
                    '',
                    'def helper():',
                    '    return 1',
                ),
            });

            expect([...discoverAttributeAliases(dir).entries()]).toEqual([
                ['exclude', ['x-openapi-exclude', true]],
                ['managed', ['x-openapi-managed', undefined]],
            ]);
        });

        it('should return an empty map without helper modules', () => {
            expect(discoverAttributeAliases(dir).size).toBe(0);
        });
    });
});
