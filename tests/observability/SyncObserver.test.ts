import { describe, it, expect } from 'vitest';
import { createSyncObserver, emit, shouldColor, type SyncEvent } from '../../src/observability/SyncObserver.js';

// ============================================================================
// SyncObserver Tests
// ============================================================================

describe('SyncObserver', () => {
    describe('createSyncObserver()', () => {
        it('should return a custom handler as-is', () => {
            const handler = (_event: SyncEvent): void => undefined;
            expect(createSyncObserver(handler)).toBe(handler);
        });

        it('should render warnings and component diffs without color', () => {
            const out: string[] = [];
            const observer = createSyncObserver(undefined, { color: false, write: (line) => out.push(line) });

            emit(observer, { type: 'file.skipped', file: 'handlers/broken.py', reason: 'syntax error: line 3' });
            emit(observer, { type: 'route.skipped', file: 'a.py', handler: 'items', line: 4, decorator: 'uri_mapping', reason: 'path is not a literal' });
            emit(observer, { type: 'metadata.conflict', message: 'Conflict on summary' });
            emit(observer, { type: 'method.mismatch', message: 'WARNING: mismatch', file: 'a.py', handler: 'get' });
            emit(observer, {
                type: 'component.changed',
                name: 'UserModel',
                change: 'drift',
                diff: ['--- a/x', '+++ b/x', '-old', '+new'],
            });
            emit(observer, { type: 'operation.changed', path: '/a', method: 'get', note: 'Updated', diff: ['+x'] });

            expect(out).toEqual([
                'WARNING: Skipping handlers/broken.py due to syntax error: line 3',
                'WARNING: Skipping @uri_mapping on items at a.py:4: path is not a literal',
                'WARNING: Conflict on summary',
                'WARNING: mismatch',
                "WARNING: Model schema drift detected for component 'UserModel'.",
                '--- a/x',
                '+++ b/x',
                '-old',
                '+new',
            ]);
        });

        it('should label added and removed components', () => {
            const out: string[] = [];
            const observer = createSyncObserver(undefined, { color: false, write: (line) => out.push(line) });
            emit(observer, { type: 'component.changed', name: 'A', change: 'added', diff: [] });
            emit(observer, { type: 'component.changed', name: 'B', change: 'removed', diff: [] });
            expect(out).toEqual([
                "WARNING: New model schema component 'A' added.",
                "WARNING: Excluded model schema component 'B' removed.",
            ]);
        });
    });

    describe('shouldColor()', () => {
        it('should follow the TTY state of the given stream in auto mode', () => {
            expect(shouldColor('auto', { isTTY: true })).toBe(true);
            expect(shouldColor('auto', { isTTY: false })).toBe(false);
            expect(shouldColor('auto', {})).toBe(false);
        });

        it('should let always and never override the stream', () => {
            expect(shouldColor('always', { isTTY: false })).toBe(true);
            expect(shouldColor('never', { isTTY: true })).toBe(false);
        });
    });

    describe('emit()', () => {
        it('should stamp events with a timestamp', () => {
            const events: SyncEvent[] = [];
            emit((event) => events.push(event), { type: 'metadata.conflict', message: 'm' });
            expect(events[0]?.type).toBe('metadata.conflict');
            expect(typeof events[0]?.timestamp).toBe('number');
        });
    });
});
