import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { SyncEvent, SyncObserverFn } from '../../src/observability/SyncObserver.js';

// ============================================================================
// Test Fixtures — temp project trees and event collection
// ============================================================================

export function createTempDir(): string {
    return mkdtempSync(join(tmpdir(), 'swagger-sync-'));
}

export function removeDir(dir: string): void {
    rmSync(dir, { recursive: true, force: true });
}

/** Write `relative path → contents`, creating directories as needed */
export function writeFiles(root: string, files: Readonly<Record<string, string>>): void {
    for (const [relativePath, contents] of Object.entries(files)) {
        const full = join(root, relativePath);
        mkdirSync(dirname(full), { recursive: true });
        writeFileSync(full, contents, 'utf-8');
    }
}

/** Source lines joined with newlines, so line numbers stay countable */
export function lines(...source: string[]): string {
    return `${source.join('\n')}\n`;
}

export interface EventCollector {
    readonly events: SyncEvent[];
    readonly observer: SyncObserverFn;
    ofType<T extends SyncEvent['type']>(type: T): Extract<SyncEvent, { type: T }>[];
}

export function collectEvents(): EventCollector {
    const events: SyncEvent[] = [];
    return {
        events,
        observer: (event) => events.push(event),
        ofType<T extends SyncEvent['type']>(type: T): Extract<SyncEvent, { type: T }>[] {
            return events.filter((event): event is Extract<SyncEvent, { type: T }> => event.type === type);
        },
    };
}
