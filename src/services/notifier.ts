import { stat } from 'node:fs/promises';
import path from 'node:path';
import { shouldProcess } from './event-filter.js';
import { formatFileSize, formatLocalTimestamp } from '../utils/format.js';
import { describeError, type Logger } from '../utils/logger.js';
import type { FilterConfig } from '../types/config.js';
import type { FileEvent } from '../types/file-watcher.js';
import type {
    DeliveryResult,
    NotificationDraft,
    NotificationOptions,
    NotificationPayload,
    PriorityLevel,
    PriorityName,
} from '../types/notification.js';

// ── Priorities & Tags ────────────────────────────────────────────────────────

const PRIORITY_BY_NAME: Record<PriorityName, PriorityLevel> = {
    urgent: 5,
    high: 4,
    default: 3,
    low: 2,
    min: 1,
};

function isPriorityName(value: string): value is PriorityName {
    return Object.prototype.hasOwnProperty.call(PRIORITY_BY_NAME, value);
}

function isPriorityLevel(value: number): value is PriorityLevel {
    return Number.isInteger(value) && value >= 1 && value <= 5;
}

/** ntfy emoji short-codes per notification kind. */
export const EVENT_TAGS = {
    created: 'file_folder,new',
    modified: 'pencil',
    deleted: 'wastebasket,warning',
    moved: 'arrow_right',
    started: 'rocket',
    stopped: 'stop_sign',
} as const;

export const SIZE_NOT_A_FILE = 'N/A (directory)';
export const SIZE_UNKNOWN = 'Unknown';

/**
 * Map a priority given as an integer or a name onto ntfy's 1–5 scale.
 * Returns `undefined` for anything unrecognised so the field is left out.
 */
export function resolvePriority(input: number | string | undefined): PriorityLevel | undefined {
    if (input === undefined) return undefined;
    if (typeof input === 'number') {
        return isPriorityLevel(input) ? input : undefined;
    }
    return isPriorityName(input) ? PRIORITY_BY_NAME[input] : undefined;
}

/** Assemble the JSON body for one publish. Empty optional fields are dropped. */
export function buildPayload(
    topic: string,
    message: string,
    options: NotificationOptions = {},
): NotificationPayload {
    const payload: NotificationPayload = { topic, message };

    if (options.title) payload.title = options.title;

    const priority = resolvePriority(options.priority);
    if (priority !== undefined) payload.priority = priority;

    if (options.tags) payload.tags = [options.tags];
    if (options.click) payload.click = options.click;
    if (options.attach) payload.attach = options.attach;
    if (options.actions) payload.actions = options.actions;

    return payload;
}

// ── Formatting ───────────────────────────────────────────────────────────────

/**
 * Human-readable size of whatever is at `filePath` right now.
 * Anything that is not a regular file, including a path that has already
 * gone, reads as `N/A (directory)`.
 */
export async function describeFileSize(filePath: string, logger: Logger): Promise<string> {
    try {
        const stats = await stat(filePath);
        return stats.isFile() ? formatFileSize(stats.size) : SIZE_NOT_A_FILE;
    } catch (err) {
        if (isMissingEntryError(err)) {
            return SIZE_NOT_A_FILE;
        }
        logger.error(`Error getting file size: ${describeError(err)}`);
        return SIZE_UNKNOWN;
    }
}

function isMissingEntryError(err: unknown): boolean {
    if (!(err instanceof Error) || !('code' in err)) return false;
    return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/** Title for a move: a rename when the entry stayed in the same directory. */
export function movedTitle(srcPath: string, destPath: string): string {
    if (path.dirname(srcPath) === path.dirname(destPath)) {
        return `File Renamed: ${path.basename(srcPath)} → ${path.basename(destPath)}`;
    }
    return 'File Moved';
}

export interface EventDetails {
    /** Local timestamp printed in the body. */
    time: string;
    /** Pre-rendered size; only read for created and modified events. */
    size: string;
}

/** Turn a file event into message body, title, priority and tags. */
export function formatFileEvent(event: FileEvent, details: EventDetails): NotificationDraft {
    const name = path.basename(event.path);

    switch (event.kind) {
        case 'created':
            return {
                message:
                    `File created: ${name}\n` +
                    `Location: ${event.path}\n` +
                    `Size: ${details.size}\n` +
                    `Time: ${details.time}`,
                title: 'File Created',
                priority: PRIORITY_BY_NAME.default,
                tags: EVENT_TAGS.created,
            };
        case 'modified':
            return {
                message:
                    `File modified: ${name}\n` +
                    `Location: ${event.path}\n` +
                    `Size: ${details.size}\n` +
                    `Time: ${details.time}`,
                title: 'File Modified',
                priority: PRIORITY_BY_NAME.low,
                tags: EVENT_TAGS.modified,
            };
        case 'deleted':
            return {
                message:
                    `File deleted: ${name}\n` +
                    `Location: ${event.path}\n` +
                    `Time: ${details.time}`,
                title: 'File Deleted',
                priority: PRIORITY_BY_NAME.high,
                tags: EVENT_TAGS.deleted,
            };
        case 'moved': {
            const destPath = event.destPath ?? event.path;
            return {
                message:
                    `File moved:\n` +
                    `From: ${event.path}\n` +
                    `To: ${destPath}\n` +
                    `Time: ${details.time}`,
                title: movedTitle(event.path, destPath),
                priority: PRIORITY_BY_NAME.default,
                tags: EVENT_TAGS.moved,
            };
        }
    }
}

// ── Notifier ─────────────────────────────────────────────────────────────────

/** Anything that can deliver a payload to the relay. */
export interface NotificationPublisher {
    publish(payload: NotificationPayload): Promise<DeliveryResult>;
}

export interface NotifierConfig extends FilterConfig {
    topic: string;
}

const LOG_LABEL: Record<FileEvent['kind'], string> = {
    created: 'Created',
    modified: 'Modified',
    deleted: 'Deleted',
    moved: 'Moved',
};

/**
 * Filters raw file events, formats the ones that qualify and publishes them
 * to the configured topic.
 *
 * Delivery failures are logged by the publisher and never surface here, so
 * a dead relay cannot stop the watch loop.
 */
export class FileEventNotifier {
    readonly #config: NotifierConfig;
    readonly #publisher: NotificationPublisher;
    readonly #logger: Logger;
    readonly #now: () => Date;

    constructor(
        config: NotifierConfig,
        publisher: NotificationPublisher,
        logger: Logger,
        now: () => Date = () => new Date(),
    ) {
        this.#config = config;
        this.#publisher = publisher;
        this.#logger = logger;
        this.#now = now;
    }

    /** Publish an arbitrary message to the configured topic. */
    async notify(message: string, options: NotificationOptions = {}): Promise<DeliveryResult> {
        return this.#publisher.publish(buildPayload(this.#config.topic, message, options));
    }

    /**
     * Handle one filesystem event end to end. Resolves once delivery has
     * been attempted; resolves without sending when the filter rejects it.
     */
    async onFileEvent(event: FileEvent): Promise<void> {
        if (!shouldProcess(event, this.#config)) return;

        if (event.kind === 'moved') {
            this.#logger.info(`Moved: ${event.path} -> ${event.destPath ?? event.path}`);
        } else {
            this.#logger.info(`${LOG_LABEL[event.kind]}: ${event.path}`);
        }

        const needsSize = event.kind === 'created' || event.kind === 'modified';
        const size = needsSize ? await describeFileSize(event.path, this.#logger) : '';
        const draft = formatFileEvent(event, { time: formatLocalTimestamp(this.#now()), size });

        const { message, ...options } = draft;
        await this.notify(message, options);
    }

    async notifyStarted(): Promise<DeliveryResult> {
        return this.notify('Started monitoring folder for changes', {
            title: 'Folder Monitoring Started',
            priority: PRIORITY_BY_NAME.default,
            tags: EVENT_TAGS.started,
        });
    }

    async notifyStopped(): Promise<DeliveryResult> {
        return this.notify('Folder monitoring stopped by user', {
            title: 'Monitoring Stopped',
            priority: PRIORITY_BY_NAME.default,
            tags: EVENT_TAGS.stopped,
        });
    }
}
