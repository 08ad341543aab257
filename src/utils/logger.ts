import { formatLocalTimestamp } from './format.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/** Receives one fully formatted record, without a trailing newline. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
    /** Records below this level are dropped. @default 'info' */
    level?: LogLevel;
    /** Where formatted records go. Defaults to stderr. */
    sink?: LogSink;
    /** Clock used for the record timestamp. */
    now?: () => Date;
}

const SENSITIVE_ASSIGNMENT = /\b(token|password|secret|authorization|api[_-]?key)(\s*[=:]\s*)([^\s&,;]+)/gi;
const BEARER_VALUE = /\bBearer\s+[A-Za-z0-9._~+/=-]+/g;

/**
 * Mask credential-looking values before they reach the log stream.
 * Keys are kept so the record stays readable: `token=[REDACTED]`.
 */
export function scrubSensitiveText(text: string): string {
    return text
        .replace(SENSITIVE_ASSIGNMENT, (_match, key: string, sep: string) => `${key}${sep}[REDACTED]`)
        .replace(BEARER_VALUE, 'Bearer [REDACTED]');
}

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

const stderrSink: LogSink = (line) => {
    process.stderr.write(`${line}\n`);
};

/**
 * Single-line leveled logger shared by every component of a run.
 *
 * Records look like `2024-05-01 12:00:00 - INFO - Created: /watched/a.txt`.
 */
export class Logger {
    readonly #threshold: number;
    readonly #sink: LogSink;
    readonly #now: () => Date;

    constructor(options: LoggerOptions = {}) {
        this.#threshold = LEVEL_RANK[options.level ?? 'info'];
        this.#sink = options.sink ?? stderrSink;
        this.#now = options.now ?? (() => new Date());
    }

    debug(message: string): void {
        this.#write('debug', message);
    }

    info(message: string): void {
        this.#write('info', message);
    }

    warn(message: string): void {
        this.#write('warn', message);
    }

    error(message: string): void {
        this.#write('error', message);
    }

    isLevelEnabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= this.#threshold;
    }

    #write(level: LogLevel, message: string): void {
        if (!this.isLevelEnabled(level)) return;

        // Multi-line messages (notification bodies) are folded onto one line.
        const flat = scrubSensitiveText(message).replace(/\r?\n/g, ' | ');
        this.#sink(`${formatLocalTimestamp(this.#now())} - ${level.toUpperCase()} - ${flat}`);
    }
}

/**
 * Describe an unknown thrown value. A chained `cause` is appended, which is
 * where undici puts the DNS or socket failure behind `fetch failed`.
 */
export function describeError(err: unknown): string {
    if (!(err instanceof Error)) return String(err);
    return err.cause !== undefined ? `${err.message}: ${describeError(err.cause)}` : err.message;
}
