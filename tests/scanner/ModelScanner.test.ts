import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ScanSession } from '../../src/ScanSession.js';
import { scanModels } from '../../src/scanner/ModelScanner.js';
import { collectEvents, createTempDir, lines, removeDir, writeFiles } from '../helpers/fixtures.js';

const ref = (name: string) => ({ $ref: `#/components/schemas/${name}` });

// ============================================================================
// ModelScanner Tests
// ============================================================================

describe('ModelScanner', () => {
    let dir: string;

    beforeEach(() => {
        dir = createTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    const scan = () => scanModels(dir, new ScanSession({ observer: collectEvents().observer, projectRoot: dir }));

    describe('object components', () => {
        it('should infer properties and required names from __init__', () => {
            writeFiles(dir, {
                'guild.py': lines(
                    '@openapi.component("GuildModel", description="A guild")',
                    'class GuildModel:',
                    '    def __init__(self, data: dict):',
                    '        self.id: str = data["id"]',
                    '        self.name: Optional[str] = data.get("name")',
                    '        self.member_count: int = data["member_count"]',
                    '        self.active = True',
                    '        self._secret = "hidden"',
                ),
            });

            expect(scan().components).toEqual({
                GuildModel: {
                    type: 'object',
                    properties: {
                        id: { type: 'string' },
                        name: { type: 'string', nullable: true },
                        member_count: { type: 'integer' },
                        active: { type: 'boolean' },
                    },
                    required: ['active', 'id', 'member_count'],
                    description: 'A guild',
                },
            });
        });

        it('should layer block and decorator property metadata', () => {
            writeFiles(dir, {
                'channel.py': lines(
                    '@openapi.component("ChannelModel")',
                    '@openapi.property("topic", description="Channel topic")',
                    'class ChannelModel:',
                    '    """',
                    '    >>>openapi',
                    '    properties:',
                    '      kind:',
                    '        description: Channel kind',
                    '        enum: [text, voice]',
                    '    <<<openapi',
                    '    """',
                    '',
                    '    def __init__(self, data):',
                    '        self.kind: str = data["kind"]',
                    '        self.topic: Optional[str] = None',
                ),
            });

            expect(scan().components.ChannelModel).toEqual({
                type: 'object',
                properties: {
                    kind: { type: 'string', description: 'Channel kind', enum: ['text', 'voice'] },
                    topic: { type: 'string', nullable: true, description: 'Channel topic' },
                },
                required: ['kind'],
            });
        });

        it('should fall back to the class name when the call names no component', () => {
            writeFiles(dir, {
                'thing.py': lines(
                    '@openapi.component(description="A thing")',
                    'class ThingModel:',
                    '    def __init__(self, data: dict):',
                    '        self.count: int = data["count"]',
                ),
            });

            expect(scan().components).toEqual({
                ThingModel: {
                    type: 'object',
                    properties: { count: { type: 'integer' } },
                    required: ['count'],
                    description: 'A thing',
                },
            });
        });

        it('should skip classes without a component decorator', () => {
            writeFiles(dir, { 'plain.py': lines('class Plain:', '    def __init__(self):', '        self.x: int = 1') });
            expect(scan().components).toEqual({});
        });
    });

    describe('inheritance', () => {
        it('should compose model bases with allOf', () => {
            writeFiles(dir, {
                'users.py': lines(
                    '@openapi.component("UserModel")',
                    'class UserModel:',
                    '    def __init__(self, data):',
                    '        self.id: str = data["id"]',
                    '',
                    '@openapi.component("MemberModel")',
                    'class MemberModel(UserModel):',
                    '    def __init__(self, data):',
                    '        super().__init__(data)',
                    '        self.nick: Optional[str] = data.get("nick")',
                ),
            });

            expect(scan().components.MemberModel).toEqual({
                allOf: [ref('UserModel'), { properties: { nick: { type: 'string', nullable: true } } }],
            });
        });
    });

    describe('overrides and attributes', () => {
        it('should take a complete schema from a block with type and no properties', () => {
            writeFiles(dir, {
                'color.py': lines(
                    '@openapi.component("Color", description="Hex color")',
                    'class Color:',
                    '    """',
                    '    >>>openapi',
                    '    type: string',
                    '    format: hex',
                    '    <<<openapi',
                    '    """',
                ),
            });

            expect(scan().components.Color).toEqual({ type: 'string', format: 'hex', description: 'Hex color' });
        });

        it('should add extensions from attribute decorators', () => {
            writeFiles(dir, {
                'tag.py': lines(
                    '@openapi.component("TagModel")',
                    '@openapi.attribute("deprecated-since", "2.0")',
                    'class TagModel:',
                    '    def __init__(self):',
                    '        self.label: str = ""',
                ),
            });

            expect(scan().components.TagModel).toEqual({
                type: 'object',
                properties: { label: { type: 'string' } },
                required: ['label'],
                'x-deprecated-since': '2.0',
            });
        });

        it('should record excluded components through helper decorators', () => {
            writeFiles(dir, {
                'openapi/core.py': lines(
                    'def exclude():',
                    '    return attribute("x-openapi-exclude", True)',
                ),
                'batch.py': lines(
                    '@openapi.component("BatchRequest")',
                    '@openapi.exclude()',
                    'class BatchRequest:',
                    '    def __init__(self):',
                    '        self.ids: List[str] = []',
                ),
            });

            const result = scan();
            expect(result.components).toEqual({});
            expect([...result.excluded]).toEqual(['BatchRequest']);
        });
    });

    describe('type alias components', () => {
        it('should emit a component for factory-declared aliases', () => {
            writeFiles(dir, {
                'aliases.py': lines(
                    'MemberRef: TypeAlias = openapi.type_alias(',
                    '    "MemberRef", description="A member or a role", anyof=True,',
                    ')(Union[UserModel, RoleModel])',
                ),
            });

            expect(scan().components.MemberRef).toEqual({
                anyOf: [ref('UserModel'), ref('RoleModel')],
                description: 'A member or a role',
            });
        });
    });

    it('should return nothing for a missing models root', () => {
        const result = scanModels(`${dir}/missing`, new ScanSession({ observer: collectEvents().observer }));
        expect(result.components).toEqual({});
        expect(result.excluded.size).toBe(0);
    });
});
