/** Kinds of filesystem changes the watcher reports. */
export type FileEventKind = 'created' | 'modified' | 'deleted' | 'moved';

/** Normalized filesystem event payload. */
export interface FileEvent {
    kind: FileEventKind;
    /** Path of the affected file or directory (the source path for moves). */
    path: string;
    /** Where the entry ended up. Only set for `moved`. */
    destPath?: string;
    isDirectory: boolean;
}

/** Callback invoked when a watched filesystem event occurs. */
export type FileEventListener = (event: FileEvent) => Promise<void> | void;

/** What to watch and how deep. */
export interface WatchTarget {
    /** Directory to monitor. */
    directory: string;
    /** Descend into subdirectories. When false only direct children are reported. */
    recursive: boolean;
}

/**
 * Anything that can produce file events for a target. The chokidar-backed
 * `FileWatcherService` is the production source; tests drive an in-memory one.
 */
export interface FileEventSource {
    onEvent(listener: FileEventListener): () => void;
    start(): Promise<void>;
    stop(): Promise<void>;
}
