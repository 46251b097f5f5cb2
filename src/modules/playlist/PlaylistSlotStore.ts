/**
 * @fileoverview Quick-slot configuration reader.
 * @module modules/playlist/PlaylistSlotStore
 * @version 1.0.0
 *
 * The stored value is a JSON array of up to six `{ "Emoji", "Url" }` objects,
 * written by an external settings tool. It is read, never written, here.
 */

import type { IPlaylistSlotStore } from './interfaces';
import type { PlaylistSlot, StoredPlaylistSlot } from './types';
import { DEFAULT_PLAYLIST_SLOTS, PLAYLIST_SLOT_COUNT } from './constants';
import { STORAGE_KEYS } from '../../config/storageKeys';
import { AppErrorCode } from '../../types/app-errors';
import { safeStoreGet, type KeyValueStore } from '../../utils/storage';
import type { Logger } from '../../utils/interfaces';
import { createConsoleLogger } from '../../utils/logger';

export class PlaylistSlotStore implements IPlaylistSlotStore {
    private readonly _logger: Logger;

    constructor(
        private readonly _store: KeyValueStore | null,
        logger?: Logger,
        private readonly _storageKey: string = STORAGE_KEYS.PLAYLIST_SLOTS
    ) {
        this._logger = logger ?? createConsoleLogger('PlaylistSlotStore');
    }

    /**
     * Six slots: stored overrides applied by index over the defaults.
     * Any configuration problem is logged and otherwise ignored.
     */
    public loadSlots(): PlaylistSlot[] {
        const slots = DEFAULT_PLAYLIST_SLOTS.map((slot) => ({ ...slot }));
        const serialized = safeStoreGet(this._store, this._storageKey);
        if (serialized === null) {
            return slots;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(serialized);
        } catch (error) {
            this._logger.warn(
                `${AppErrorCode.CONFIG_INVALID}: Slot configuration is not valid JSON, using defaults`,
                error
            );
            return slots;
        }

        if (!Array.isArray(parsed)) {
            this._logger.warn(`${AppErrorCode.CONFIG_INVALID}: Slot configuration is not an array, using defaults`);
            return slots;
        }

        const count = Math.min(parsed.length, PLAYLIST_SLOT_COUNT);
        for (let index = 0; index < count; index++) {
            const entry: unknown = parsed[index];
            const current = slots[index];
            if (!current) continue;
            if (!isStoredSlot(entry)) {
                this._logger.warn(
                    `${AppErrorCode.CONFIG_INVALID}: Slot ${index + 1} configuration is malformed, keeping default`
                );
                continue;
            }
            slots[index] = {
                glyph: entry.Emoji,
                streamUrl: normalizeUrl(entry.Url),
                tooltip: current.tooltip,
            };
        }
        return slots;
    }
}

function isStoredSlot(value: unknown): value is StoredPlaylistSlot {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    if (!('Emoji' in value) || typeof value.Emoji !== 'string' || value.Emoji.trim().length === 0) {
        return false;
    }
    if (!('Url' in value)) {
        return false;
    }
    return value.Url === null || typeof value.Url === 'string';
}

function normalizeUrl(url: string | null): string | null {
    if (url === null) return null;
    const trimmed = url.trim();
    return trimmed.length > 0 ? trimmed : null;
}
