#!/usr/bin/env node
import {
    CliUsageError,
    handleHelpCli,
    parseCliArgs,
    reportUsageError,
    type CliArgs,
} from './core/cli.js';
import { startMonitor } from './core/monitor.js';
import {
    ConfigurationError,
    buildMonitorConfig,
    logLevelIssue,
} from './config/monitor-config.js';
import { describeError, Logger } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot CLI commands ──────────────────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

let args: CliArgs;
try {
    args = parseCliArgs(argv);
} catch (error) {
    if (error instanceof CliUsageError) {
        reportUsageError(error);
        process.exit(process.exitCode ?? 2);
    }
    throw error;
}

// ── Configuration & Logging ──────────────────────────────────────────────────

const config = buildMonitorConfig(args, process.env);
const logger = new Logger({ level: config.logLevel });

const levelIssue = logLevelIssue(process.env);
if (levelIssue) {
    logger.warn(`${levelIssue.message} ${levelIssue.remediation}`);
}

// ── Monitor ──────────────────────────────────────────────────────────────────

try {
    const monitor = await startMonitor(config, { logger });

    const shutdown = (signal: NodeJS.Signals): void => {
        logger.debug(`Received ${signal}`);
        void monitor.stop().then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error(`Shutdown failed: ${describeError(err)}`);
                process.exit(1);
            },
        );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
} catch (error) {
    if (error instanceof ConfigurationError) {
        process.exit(1);
    }
    logger.error(`Failed to start monitoring: ${describeError(error)}`);
    process.exit(1);
}
