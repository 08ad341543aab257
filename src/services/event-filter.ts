import path from 'node:path';
import type { FilterConfig } from '../types/config.js';
import type { FileEvent } from '../types/file-watcher.js';

/**
 * Lowercased extension of the base name, dot included, or `''` when there is
 * none. A leading dot alone (`.env`) does not start an extension.
 */
export function fileExtension(filePath: string): string {
    const base = path.basename(filePath);
    const dot = base.lastIndexOf('.');
    if (dot <= 0) return '';
    return base.slice(dot).toLowerCase();
}

/** Decide whether a raw filesystem event should become a notification. */
export function shouldProcess(event: FileEvent, config: FilterConfig): boolean {
    if (config.excludeDirectories && event.isDirectory) {
        return false;
    }

    const allowed = config.allowedExtensions;
    if (allowed && allowed.length > 0 && !event.isDirectory) {
        return allowed.includes(fileExtension(event.path));
    }

    return true;
}
