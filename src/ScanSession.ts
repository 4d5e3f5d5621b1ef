/**
 * ScanSession — Per-Invocation Scan State
 *
 * Owns everything a scan accumulates across files: the type-alias
 * registry (per-file cache, session-wide alias table, factory metadata)
 * and the observer diagnostics are sent to. One session is built per CLI
 * run; tests build a fresh one per case.
 *
 * @module
 */
import { resolve } from 'node:path';
import { DEFAULT_MARKERS, type BlockMarkers } from './scanner/OpenApiBlock.js';
import { createSyncObserver, emit, type SyncEventInput, type SyncObserverFn } from './observability/SyncObserver.js';
import { TypeAliasRegistry } from './schema/TypeAliasRegistry.js';

export interface ScanSessionOptions {
    /** Documentation block markers (default `>>>openapi` / `<<<openapi`) */
    readonly markers?: BlockMarkers;
    /** Receives diagnostics (default: colored stderr renderer) */
    readonly observer?: SyncObserverFn;
    /** Root for absolute imports when following type aliases (default: cwd) */
    readonly projectRoot?: string;
    /** Undeclared method-rooted block keys throw instead of warning */
    readonly strict?: boolean;
    /** fnmatch-style globs of handler files to skip */
    readonly ignoreFiles?: readonly string[];
}

export class ScanSession {
    readonly markers: BlockMarkers;
    readonly observer: SyncObserverFn;
    readonly projectRoot: string;
    readonly strict: boolean;
    readonly ignoreFiles: readonly string[];
    readonly aliases: TypeAliasRegistry;

    constructor(options: ScanSessionOptions = {}) {
        this.markers = options.markers ?? DEFAULT_MARKERS;
        this.observer = createSyncObserver(options.observer);
        this.projectRoot = resolve(options.projectRoot ?? process.cwd());
        this.strict = options.strict ?? false;
        this.ignoreFiles = options.ignoreFiles ?? [];
        this.aliases = new TypeAliasRegistry(this.projectRoot);
    }

    emit(event: SyncEventInput): void {
        emit(this.observer, event);
    }
}
