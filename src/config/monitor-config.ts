/**
 * Run configuration: assembled once from CLI flags and environment, frozen,
 * then validated before anything starts watching.
 */

import { statSync } from 'node:fs';
import path from 'node:path';
import { DEFAULT_NTFY_SERVER } from '../services/ntfy-client.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import type { MonitorConfig } from '../types/config.js';
import type { CliArgs } from '../core/cli.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_path' | 'not_directory' | 'format_error';

export interface ConfigIssue {
  /** Affected config key. */
  key: string;
  /** Semantic category for automation. */
  class: ConfigIssueClass;
  /** Human-readable description of the problem. */
  message: string;
  /** Actionable remediation hint. */
  remediation: string;
}

/** Thrown when the configuration is unusable and the process must not start. */
export class ConfigurationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(issues.map((issue) => issue.message).join(' '));
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Environment keys read on top of the CLI flags. */
export const ENV_KEYS = {
  serverUrl: 'NTFY_SERVER_URL',
  logLevel: 'LOG_LEVEL',
} as const;

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// ── Builders ─────────────────────────────────────────────────────────────────

/**
 * Normalize a comma-separated extension list: trimmed, lowercased and
 * dot-prefixed. Empty entries are dropped.
 *
 * @example normalizeExtensions('TXT, .Pdf') // ['.txt', '.pdf']
 */
export function normalizeExtensions(raw: string): string[] {
  return raw
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Assemble the immutable run configuration.
 *
 * An unknown `LOG_LEVEL` falls back to `info`; `logLevelIssue` reports it
 * so the caller can warn.
 */
export function buildMonitorConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const extensions = args.extensions !== undefined ? normalizeExtensions(args.extensions) : [];
  const rawLevel = readEnv(env, ENV_KEYS.logLevel)?.toLowerCase();

  const config: MonitorConfig = {
    path: args.path,
    topic: args.topic,
    allowedExtensions: extensions.length > 0 ? Object.freeze(extensions) : undefined,
    excludeDirectories: !args.includeDirectories,
    recursive: args.recursive,
    serverUrl: readEnv(env, ENV_KEYS.serverUrl) ?? DEFAULT_NTFY_SERVER,
    logLevel: rawLevel !== undefined && isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL,
  };

  return Object.freeze(config);
}

// ── Validation ───────────────────────────────────────────────────────────────

function pathIssue(watchPath: string): ConfigIssue | null {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(watchPath).isDirectory();
  } catch {
    return {
      key: '--path',
      class: 'missing_path',
      message: `The specified path does not exist: ${watchPath}`,
      remediation: 'Pass an existing directory with --path.',
    };
  }

  if (!isDirectory) {
    return {
      key: '--path',
      class: 'not_directory',
      message: `The specified path is not a directory: ${watchPath}`,
      remediation: 'Point --path at the folder that contains the files to watch.',
    };
  }

  return null;
}

function serverUrlIssue(serverUrl: string): ConfigIssue | null {
  const issue: ConfigIssue = {
    key: ENV_KEYS.serverUrl,
    class: 'format_error',
    message: `${ENV_KEYS.serverUrl} must be an http(s) URL, got '${serverUrl}'.`,
    remediation: `Unset ${ENV_KEYS.serverUrl} to use ${DEFAULT_NTFY_SERVER}, or set it to your own ntfy server.`,
  };

  let parsed: URL;
  try {
    parsed = new URL(serverUrl);
  } catch {
    return issue;
  }

  return parsed.protocol === 'https:' || parsed.protocol === 'http:' ? null : issue;
}

/**
 * Check `LOG_LEVEL`. Not fatal: the built config falls back to `info` and the
 * caller logs this as a warning.
 */
export function logLevelIssue(env: NodeJS.ProcessEnv = process.env): ConfigIssue | null {
  const raw = readEnv(env, ENV_KEYS.logLevel);
  if (raw === undefined || isLogLevel(raw.toLowerCase())) return null;

  return {
    key: ENV_KEYS.logLevel,
    class: 'format_error',
    message: `${ENV_KEYS.logLevel} must be one of debug, info, warn, error, got '${raw}'.`,
    remediation: `Unset ${ENV_KEYS.logLevel} to log at ${DEFAULT_LOG_LEVEL}.`,
  };
}

/**
 * Validate a built configuration. Every issue returned is fatal: the caller
 * must not start watching when the list is non-empty.
 */
export function validateMonitorConfig(config: MonitorConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  const watchPath = pathIssue(config.path);
  if (watchPath) issues.push(watchPath);

  const serverUrl = serverUrlIssue(config.serverUrl);
  if (serverUrl) issues.push(serverUrl);

  return issues;
}

/** Absolute form of the watch path, for log lines. */
export function resolvedWatchPath(config: MonitorConfig): string {
  return path.resolve(config.path);
}
