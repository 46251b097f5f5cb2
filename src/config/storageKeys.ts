/**
 * @fileoverview channelview storage key constants.
 * @module config/storageKeys
 * @version 1.0.0
 */

/**
 * Canonical storage keys used across modules.
 *
 * Keep this file free of module imports so every layer can depend on it.
 */
export const STORAGE_KEYS = {
    /** JSON array of up to 6 `{ Emoji, Url }` quick-slot overrides */
    PLAYLIST_SLOTS: 'channelview_playlist_slots',
    /** Enables debug-level logging when set to "1" or "true" */
    DEBUG_LOGGING: 'channelview_debug_logging',
} as const;
