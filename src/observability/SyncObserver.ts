/**
 * SyncObserver — Structured Diagnostics for a Sync Run
 *
 * Scanners and the merge engine never print. Everything worth telling the
 * user (skipped files and routes, method mismatches, metadata conflicts, proposed
 * operation and component changes) is emitted as a typed event to a
 * single observer function owned by the scan session.
 *
 * @example
 * ```typescript
 * // Default: colored output on stderr
 * const observer = createSyncObserver();
 *
 * // Custom: collect events (tests, CI annotations)
 * const events: SyncEvent[] = [];
 * const observer = createSyncObserver((event) => events.push(event));
 * ```
 *
 * @module
 */
import pc from 'picocolors';
import type { ColorMode } from '../config/SyncConfig.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** A source file was not scanned (unreadable, or not valid Python) */
export interface FileSkippedEvent {
    readonly type: 'file.skipped';
    readonly file: string;
    readonly reason: string;
    readonly timestamp: number;
}

/** A routing decorator whose path argument is not a resolvable literal */
export interface RouteSkippedEvent {
    readonly type: 'route.skipped';
    readonly file: string;
    readonly handler: string;
    readonly line: number;
    /** Routing decorator name */
    readonly decorator: string;
    readonly reason: string;
    readonly timestamp: number;
}

/** A method-rooted block names methods the routing decorator does not declare */
export interface MethodMismatchEvent {
    readonly type: 'method.mismatch';
    readonly message: string;
    readonly file: string;
    readonly handler: string;
    readonly timestamp: number;
}

/** Docstring and decorator metadata disagree on a field (decorator wins) */
export interface MetadataConflictEvent {
    readonly type: 'metadata.conflict';
    readonly message: string;
    readonly timestamp: number;
}

/** An operation in `paths` differs from what the handler declares */
export interface OperationChangedEvent {
    readonly type: 'operation.changed';
    readonly path: string;
    readonly method: string;
    readonly note: string;
    readonly diff: readonly string[];
    readonly timestamp: number;
}

/** A component schema was added, drifted, or removed because it is excluded */
export interface ComponentChangedEvent {
    readonly type: 'component.changed';
    readonly name: string;
    readonly change: 'added' | 'drift' | 'removed';
    readonly diff: readonly string[];
    readonly timestamp: number;
}

export type SyncEvent =
    | FileSkippedEvent
    | RouteSkippedEvent
    | MethodMismatchEvent
    | MetadataConflictEvent
    | OperationChangedEvent
    | ComponentChangedEvent;

export type SyncObserverFn = (event: SyncEvent) => void;

/** Distributes `Omit` over the union so each event keeps its own fields */
export type SyncEventInput = SyncEvent extends infer E
    ? E extends SyncEvent ? Omit<E, 'timestamp'> : never
    : never;

/** Stamp and deliver an event */
export function emit(observer: SyncObserverFn, event: SyncEventInput): void {
    observer({ ...event, timestamp: Date.now() });
}

// ============================================================================
// Default Console Observer
// ============================================================================

/** Resolve a color mode for the stream the output is written to */
export function shouldColor(mode: ColorMode, stream: { readonly isTTY?: boolean }): boolean {
    if (mode === 'always') return true;
    if (mode === 'never') return false;
    return Boolean(stream.isTTY);
}

export interface ConsoleObserverOptions {
    /** Enable ANSI colors (default: when stderr is a TTY) */
    readonly color?: boolean;
    /** Sink for rendered lines (default: `console.error`) */
    readonly write?: (line: string) => void;
}

/**
 * Create an observer. A custom handler is returned as-is; otherwise
 * events are rendered as warnings and unified diffs:
 *
 * ```
 * WARNING: Skipping handlers/broken.py due to syntax error: line 3
 * WARNING: Model schema drift detected for component 'UserModel'.
 * --- a/components.schemas.UserModel
 * +++ b/components.schemas.UserModel
 * ```
 */
export function createSyncObserver(handler?: SyncObserverFn, options: ConsoleObserverOptions = {}): SyncObserverFn {
    if (handler) return handler;

    const colors = pc.createColors(options.color ?? Boolean(process.stderr.isTTY));
    const write = options.write ?? ((line: string) => console.error(line));
    const warn = (message: string): void => write(colors.yellow(`WARNING: ${message}`));

    return (event: SyncEvent): void => {
        switch (event.type) {
            case 'file.skipped':
                warn(`Skipping ${event.file} due to ${event.reason}`);
                break;

            case 'route.skipped':
                warn(`Skipping @${event.decorator} on ${event.handler} at ${event.file}:${event.line}: ${event.reason}`);
                break;

            case 'method.mismatch':
                // message already carries its WARNING prefix
                write(colors.yellow(event.message));
                break;

            case 'metadata.conflict':
                warn(event.message);
                break;

            case 'operation.changed':
                // printed with the drift summary, after the scan
                break;

            case 'component.changed': {
                const label = event.change === 'added'
                    ? `New model schema component '${event.name}' added.`
                    : event.change === 'drift'
                        ? `Model schema drift detected for component '${event.name}'.`
                        : `Excluded model schema component '${event.name}' removed.`;
                warn(label);
                for (const line of colorizeDiff(event.diff, colors)) write(line);
                break;
            }
        }
    };
}

// ── Diff Coloring ────────────────────────────────────────

type Colors = ReturnType<typeof pc.createColors>;

/** Headers and hunk markers cyan, additions green, removals red */
export function colorizeDiff(lines: readonly string[], colors: Colors): string[] {
    return lines.map((line) => {
        if (line.startsWith('+++ ') || line.startsWith('--- ') || line.startsWith('@@ ')) return colors.cyan(line);
        if (line.startsWith('+')) return colors.green(line);
        if (line.startsWith('-')) return colors.red(line);
        return line;
    });
}
