import { FileWatcherService } from '../services/file-watcher.js';
import { FileEventNotifier, type NotificationPublisher } from '../services/notifier.js';
import { NtfyClient, type FetchFn } from '../services/ntfy-client.js';
import {
    ConfigurationError,
    resolvedWatchPath,
    validateMonitorConfig,
} from '../config/monitor-config.js';
import type { Logger } from '../utils/logger.js';
import type { MonitorConfig } from '../types/config.js';
import type { FileEventSource } from '../types/file-watcher.js';

export interface MonitorDeps {
    logger: Logger;
    /** Event source; a chokidar watcher on `config.path` when omitted. */
    source?: FileEventSource;
    /** Relay publisher; an `NtfyClient` on `config.serverUrl` when omitted. */
    publisher?: NotificationPublisher;
    /** Passed to the default `NtfyClient`. */
    fetchFn?: FetchFn;
    now?: () => Date;
}

export interface MonitorHandle {
    readonly notifier: FileEventNotifier;
    /** Send the stop notification and release the watcher. Idempotent. */
    stop(): Promise<void>;
}

/**
 * Validate the configuration, announce the start, and begin forwarding file
 * events to the relay.
 *
 * Throws `ConfigurationError` before creating any watcher when the
 * configuration is unusable.
 */
export async function startMonitor(config: MonitorConfig, deps: MonitorDeps): Promise<MonitorHandle> {
    const { logger } = deps;

    const issues = validateMonitorConfig(config);
    if (issues.length > 0) {
        for (const issue of issues) {
            logger.error(`${issue.message} ${issue.remediation}`);
        }
        throw new ConfigurationError(issues);
    }

    const publisher =
        deps.publisher ?? new NtfyClient(logger, { serverUrl: config.serverUrl, fetchFn: deps.fetchFn });
    const notifier = new FileEventNotifier(config, publisher, logger, deps.now);

    await notifier.notifyStarted();
    logger.info(`Started monitoring. Notifications will be sent to topic: ${config.topic}`);
    if (config.allowedExtensions) {
        logger.info(`Monitoring only these extensions: ${config.allowedExtensions.join(', ')}`);
    }

    const source =
        deps.source ?? new FileWatcherService({ directory: config.path, recursive: config.recursive }, logger);
    const unsubscribe = source.onEvent((event) => notifier.onFileEvent(event));
    await source.start();

    logger.info(`Monitoring folder: ${resolvedWatchPath(config)} (recursive: ${config.recursive})`);

    let stopping: Promise<void> | null = null;

    return {
        notifier,
        stop(): Promise<void> {
            stopping ??= (async () => {
                logger.info('Monitoring stopped by user');
                await notifier.notifyStopped();
                await source.stop();
                unsubscribe();
            })();
            return stopping;
        },
    };
}
