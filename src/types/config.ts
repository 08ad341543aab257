import type { LogLevel } from '../utils/logger.js';

/** Immutable run configuration, fixed at startup. */
export interface MonitorConfig {
    /** Root directory to watch. */
    readonly path: string;
    /** Relay topic every notification is published to. */
    readonly topic: string;
    /** Lowercase, dot-prefixed extensions. Absent means every file qualifies. */
    readonly allowedExtensions?: readonly string[];
    readonly excludeDirectories: boolean;
    readonly recursive: boolean;
    /** Relay base URL. */
    readonly serverUrl: string;
    readonly logLevel: LogLevel;
}

/** The subset of configuration the event filter needs. */
export type FilterConfig = Pick<MonitorConfig, 'allowedExtensions' | 'excludeDirectories'>;
