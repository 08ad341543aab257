import { watch, type WatchOptions } from 'chokidar';
import {
    DEFAULT_MOVE_WINDOW_MS,
    MoveCorrelator,
    type EntryFingerprint,
} from './move-correlator.js';
import { describeError, type Logger } from '../utils/logger.js';
import type {
    FileEvent,
    FileEventListener,
    FileEventSource,
    WatchTarget,
} from '../types/file-watcher.js';

type ChokidarEvent = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

const CHOKIDAR_EVENTS: readonly ChokidarEvent[] = ['add', 'addDir', 'change', 'unlink', 'unlinkDir'];

const EVENT_MAP: Record<ChokidarEvent, Pick<FileEvent, 'kind' | 'isDirectory'>> = {
    add: { kind: 'created', isDirectory: false },
    addDir: { kind: 'created', isDirectory: true },
    change: { kind: 'modified', isDirectory: false },
    unlink: { kind: 'deleted', isDirectory: false },
    unlinkDir: { kind: 'deleted', isDirectory: true },
};

/** The stat fields chokidar hands over with `alwaysStat`. */
export interface EntryStats {
    ino: number;
    size: number;
    mtimeMs: number;
}

/** The slice of chokidar's `FSWatcher` this service drives. */
export interface WatchHandle {
    on(event: ChokidarEvent, listener: (path: string, stats?: EntryStats) => void): unknown;
    on(event: 'error', listener: (err: unknown) => void): unknown;
    once(event: 'ready', listener: () => void): unknown;
    close(): Promise<void>;
}

export type WatchFn = (directory: string, options: WatchOptions) => WatchHandle;

/** Some filesystems report inode 0; such entries have no usable identity. */
function fingerprintOf(stats: EntryStats | undefined, isDirectory: boolean): EntryFingerprint | undefined {
    if (!stats || !stats.ino) return undefined;
    return isDirectory ? { ino: stats.ino } : { ino: stats.ino, size: stats.size, mtimeMs: stats.mtimeMs };
}

export interface FileWatcherOptions {
    /** How long a create or delete waits for its move counterpart before it is reported. */
    moveWindowMs?: number;
    /** Replaces `chokidar.watch`. */
    watchFn?: WatchFn;
}

/**
 * Watches one directory through `chokidar` and hands normalized events to the
 * registered listeners.
 *
 * Listeners run strictly one event at a time: the next event is not
 * delivered until every listener has settled for the previous one.
 *
 * Usage:
 * ```ts
 * const watcher = new FileWatcherService({ directory: '/srv/inbox', recursive: true }, logger);
 * watcher.onEvent((event) => notifier.onFileEvent(event));
 * await watcher.start();
 * ```
 */
export class FileWatcherService implements FileEventSource {
    readonly #target: WatchTarget;
    readonly #logger: Logger;
    readonly #listeners: Set<FileEventListener> = new Set();
    readonly #correlator: MoveCorrelator;
    readonly #watch: WatchFn;
    /** Last known identity of every entry under the target, keyed by path. */
    readonly #entries: Map<string, EntryFingerprint> = new Map();
    #watcher: WatchHandle | null = null;
    #ready = false;
    #chain: Promise<void> = Promise.resolve();

    constructor(target: WatchTarget, logger: Logger, options: FileWatcherOptions = {}) {
        this.#target = target;
        this.#logger = logger;
        this.#watch = options.watchFn ?? watch;
        this.#correlator = new MoveCorrelator(
            (event) => this.#enqueue(event),
            options.moveWindowMs ?? DEFAULT_MOVE_WINDOW_MS,
        );
    }

    /** Subscribe to file events. Returns an unsubscribe function. */
    onEvent(listener: FileEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    get isWatching(): boolean {
        return this.#watcher !== null;
    }

    /** Start watching. Resolves once the initial scan has finished. */
    async start(): Promise<void> {
        if (this.#watcher) return;

        // The initial scan is not reported; it only seeds the identity index
        // that lets a delete be matched with the create of the same entry.
        const watcher = this.#watch(this.#target.directory, {
            persistent: true,
            ignoreInitial: false,
            alwaysStat: true,
            depth: this.#target.recursive ? undefined : 0,
        });

        for (const eventType of CHOKIDAR_EVENTS) {
            watcher.on(eventType, (filePath: string, stats?: EntryStats) => {
                this.#observe(eventType, filePath, stats);
            });
        }

        watcher.on('error', (err: unknown) => {
            this.#logger.error(`Watcher error on ${this.#target.directory}: ${describeError(err)}`);
        });

        this.#watcher = watcher;

        await new Promise<void>((resolve) => {
            watcher.once('ready', () => resolve());
        });
        this.#ready = true;

        this.#logger.debug(`Watcher ready on ${this.#target.directory}`);
    }

    /**
     * Stop watching. Held creates and deletes are released, the chokidar
     * handle is closed and in-flight listeners are allowed to finish.
     */
    async stop(): Promise<void> {
        const watcher = this.#watcher;
        if (!watcher) return;
        this.#watcher = null;
        this.#ready = false;

        await watcher.close();
        this.#correlator.flush();
        await this.#chain;
        this.#entries.clear();

        this.#logger.debug(`Watcher closed on ${this.#target.directory}`);
    }

    /**
     * Resolves when every event released so far has been handled. Creates and
     * deletes still held for move matching are not included.
     */
    idle(): Promise<void> {
        return this.#chain;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #observe(eventType: ChokidarEvent, filePath: string, stats?: EntryStats): void {
        const event: FileEvent = { ...EVENT_MAP[eventType], path: filePath };
        let fingerprint: EntryFingerprint | undefined;

        if (event.kind === 'deleted') {
            fingerprint = this.#entries.get(filePath);
            this.#entries.delete(filePath);
        } else {
            fingerprint = fingerprintOf(stats, event.isDirectory);
            if (fingerprint) {
                this.#entries.set(filePath, fingerprint);
            } else {
                this.#entries.delete(filePath);
            }
        }

        if (!this.#ready) return;
        this.#correlator.push({ event, fingerprint });
    }

    #enqueue(event: FileEvent): void {
        this.#chain = this.#chain.then(() => this.#dispatch(event));
    }

    async #dispatch(event: FileEvent): Promise<void> {
        this.#logger.debug(`${event.kind.toUpperCase()} detected: ${event.path}`);

        for (const listener of this.#listeners) {
            try {
                await listener(event);
            } catch (err) {
                this.#logger.error(`Listener failed for ${event.path}: ${describeError(err)}`);
            }
        }
    }
}
