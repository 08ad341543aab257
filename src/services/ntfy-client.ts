import { describeError, type Logger } from '../utils/logger.js';
import type { DeliveryResult, NotificationPayload } from '../types/notification.js';

export const DEFAULT_NTFY_SERVER = 'https://ntfy.sh';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface NtfyClientOptions {
    /** Relay base URL. The topic travels in the JSON body, not the path. */
    serverUrl?: string;
    /** Injected in tests; the global `fetch` otherwise. */
    fetchFn?: FetchFn;
}

/**
 * Publishes JSON notifications to an ntfy server.
 *
 * One POST per payload, no retries and no timeout. A failed publish is logged
 * and reported through the returned result; `publish` itself never rejects.
 */
export class NtfyClient {
    readonly #url: string;
    readonly #fetch: FetchFn;
    readonly #logger: Logger;

    constructor(logger: Logger, options: NtfyClientOptions = {}) {
        this.#url = (options.serverUrl ?? DEFAULT_NTFY_SERVER).replace(/\/+$/, '');
        this.#fetch = options.fetchFn ?? ((url, init) => fetch(url, init));
        this.#logger = logger;
    }

    get url(): string {
        return this.#url;
    }

    async publish(payload: NotificationPayload): Promise<DeliveryResult> {
        let response: Response;
        try {
            response = await this.#fetch(this.#url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
            });
        } catch (err) {
            const message = describeError(err);
            this.#logger.error(`Error sending notification: ${message}`);
            return { ok: false, error: message };
        }

        // Only the status matters; release the connection instead of leaving
        // the unread body to the garbage collector.
        await response.body?.cancel().catch((err: unknown) => {
            this.#logger.debug(`Could not discard relay response body: ${describeError(err)}`);
        });

        if (response.status !== 200) {
            this.#logger.error(`Failed to send notification: ${response.status}`);
            return { ok: false, status: response.status, error: `ntfy returned ${response.status}` };
        }

        this.#logger.debug(`Notification sent: ${payload.title ?? payload.message}`);
        return { ok: true, status: response.status };
    }
}
