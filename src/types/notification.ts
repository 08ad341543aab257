/** ntfy priority names, highest first. */
export type PriorityName = 'urgent' | 'high' | 'default' | 'low' | 'min';

/** Numeric ntfy priority, 1 (min) to 5 (urgent). */
export type PriorityLevel = 1 | 2 | 3 | 4 | 5;

/** JSON body published to the relay. */
export interface NotificationPayload {
    topic: string;
    message: string;
    title?: string;
    priority?: PriorityLevel;
    /** Always a single comma-joined string, e.g. `['wastebasket,warning']`. */
    tags?: [string];
    click?: string;
    attach?: string;
    actions?: string;
}

/** Optional fields accepted when sending a notification. */
export interface NotificationOptions {
    title?: string;
    /** Integer 1–5 or a priority name. Unrecognised names are left out. */
    priority?: number | string;
    /** Comma-separated tag / emoji short-codes, e.g. `file_folder,new`. */
    tags?: string;
    /** URL opened when the notification is tapped. */
    click?: string;
    /** URL of an attachment. */
    attach?: string;
    /** ntfy action-button descriptors in header shorthand. */
    actions?: string;
}

/** A formatted notification before the topic is attached. */
export interface NotificationDraft extends NotificationOptions {
    message: string;
}

export interface DeliveryResult {
    ok: boolean;
    /** HTTP status when a response arrived. */
    status?: number;
    error?: string;
}
