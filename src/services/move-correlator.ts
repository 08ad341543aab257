import path from 'node:path';
import type { FileEvent } from '../types/file-watcher.js';

export const DEFAULT_MOVE_WINDOW_MS = 250;

/**
 * Identity of a filesystem entry as last seen by the watcher. A rename keeps
 * all three values; directories only carry `ino`.
 */
export interface EntryFingerprint {
    ino: number;
    size?: number;
    mtimeMs?: number;
}

/** A raw event plus whatever identity the watcher knows for its path. */
export interface ObservedChange {
    event: FileEvent;
    fingerprint?: EntryFingerprint;
}

interface Slot {
    event: FileEvent;
    fingerprint?: EntryFingerprint;
    held: boolean;
    timer?: NodeJS.Timeout;
}

function sameEntry(a: EntryFingerprint, b: EntryFingerprint): boolean {
    return a.ino === b.ino && a.size === b.size && a.mtimeMs === b.mtimeMs;
}

/**
 * How well a held create/delete pairs with an incoming one of the opposite
 * kind. 0 means no pair.
 *
 * With both identities known only an exact match pairs. Without them a
 * shared base name (move) or a shared parent directory (rename) does.
 */
function pairScore(held: Slot, incoming: ObservedChange): number {
    const a = held.event;
    const b = incoming.event;
    if (a.isDirectory !== b.isDirectory || a.path === b.path) return 0;

    if (held.fingerprint && incoming.fingerprint) {
        return sameEntry(held.fingerprint, incoming.fingerprint) ? 3 : 0;
    }
    if (path.basename(a.path) === path.basename(b.path)) return 2;
    if (path.dirname(a.path) === path.dirname(b.path)) return 1;
    return 0;
}

/**
 * Rebuilds rename/move events out of chokidar's separate unlink and add.
 *
 * Creates and deletes are held for `windowMs` so their counterpart can
 * arrive in either order; a matched pair becomes one `moved` event at the
 * position of its earlier half. Events leave strictly in arrival order, so
 * a modification never overtakes a held create or delete.
 */
export class MoveCorrelator {
    readonly #emit: (event: FileEvent) => void;
    readonly #windowMs: number;
    readonly #queue: Slot[] = [];

    constructor(emit: (event: FileEvent) => void, windowMs: number = DEFAULT_MOVE_WINDOW_MS) {
        this.#emit = emit;
        this.#windowMs = windowMs;
    }

    push(change: ObservedChange): void {
        const { event } = change;

        if (event.kind !== 'created' && event.kind !== 'deleted') {
            this.#queue.push({ event, held: false });
            this.#drain();
            return;
        }

        const partner = this.#findPartner(change);
        if (partner) {
            clearTimeout(partner.timer);
            const source = event.kind === 'deleted' ? event : partner.event;
            const dest = event.kind === 'created' ? event : partner.event;
            partner.event = {
                kind: 'moved',
                path: source.path,
                destPath: dest.path,
                isDirectory: event.isDirectory,
            };
            partner.fingerprint = undefined;
            partner.held = false;
            this.#drain();
            return;
        }

        const slot: Slot = { event, fingerprint: change.fingerprint, held: true };
        slot.timer = setTimeout(() => {
            slot.held = false;
            this.#drain();
        }, this.#windowMs);
        this.#queue.push(slot);
    }

    /** Release every held event immediately, in arrival order. */
    flush(): void {
        for (const slot of this.#queue) {
            clearTimeout(slot.timer);
            slot.held = false;
        }
        this.#drain();
    }

    get pendingCount(): number {
        return this.#queue.length;
    }

    #findPartner(change: ObservedChange): Slot | undefined {
        const opposite = change.event.kind === 'created' ? 'deleted' : 'created';
        let best: Slot | undefined;
        let bestScore = 0;

        // Later slots win ties: the most recent candidate is the closest in time.
        for (const slot of this.#queue) {
            if (!slot.held || slot.event.kind !== opposite) continue;
            const score = pairScore(slot, change);
            if (score > 0 && score >= bestScore) {
                best = slot;
                bestScore = score;
            }
        }
        return best;
    }

    #drain(): void {
        while (this.#queue.length > 0 && !this.#queue[0].held) {
            const slot = this.#queue.shift();
            if (slot) this.#emit(slot.event);
        }
    }
}
