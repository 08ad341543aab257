const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalTimestamp(date: Date = new Date()): string {
    const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
    const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
    return `${day} ${time}`;
}

/**
 * Render a byte count with two decimals in the largest unit that keeps the
 * value under 1024, topping out at TB.
 *
 * @example formatFileSize(1536) // "1.50 KB"
 */
export function formatFileSize(bytes: number): string {
    let value = bytes;
    for (const unit of SIZE_UNITS) {
        if (value < 1024 || unit === 'TB') {
            return `${value.toFixed(2)} ${unit}`;
        }
        value /= 1024;
    }
    return `${value.toFixed(2)} TB`;
}
