/**
 * @fileoverview Type definitions for the Playlist module.
 * @module modules/playlist/types
 * @version 1.0.0
 */

// ============================================
// Channel
// ============================================

/**
 * One playable entry from a playlist. Immutable once constructed.
 */
export interface Channel {
    /** Display name (free text after the directive's last comma) */
    readonly name: string;
    /** `group-title` attribute, empty string when absent */
    readonly group: string;
    /** `tvg-logo` attribute */
    readonly logoUrl?: string;
    /** Stream URL from the line following the directive */
    readonly streamUrl: string;
}

// ============================================
// Quick Slots
// ============================================

/**
 * One of the six quick-load playlist buttons.
 */
export interface PlaylistSlot {
    /** Button glyph (usually an emoji) */
    readonly glyph: string;
    /** Playlist URL, null when the slot is not configured */
    readonly streamUrl: string | null;
    /** Tooltip text */
    readonly tooltip: string;
}

/**
 * Stored slot override shape, as written by the external settings tool.
 */
export interface StoredPlaylistSlot {
    Emoji: string;
    Url: string | null;
}

// ============================================
// Catalog
// ============================================

/**
 * An atomic view of the catalog: readers get the whole list or nothing.
 */
export interface CatalogSnapshot {
    readonly channels: readonly Channel[];
    /** Display label for the loaded playlist, null before any load */
    readonly label: string | null;
}

/**
 * Typed event map for catalog events.
 */
export interface ChannelCatalogEventMap {
    /** Emitted after every full replacement */
    catalogReplaced: CatalogSnapshot;
    /** Index signature for EventEmitter compatibility */
    [key: string]: unknown;
}

// ============================================
// Loading
// ============================================

/**
 * Where a playlist load came from.
 */
export type PlaylistOrigin =
    | { kind: 'url'; url: string }
    | { kind: 'file'; path: string }
    | { kind: 'slot'; index: number; url: string };

/**
 * Classification of free-form user input from the advanced-controls box.
 */
export type PlaylistInput =
    | { kind: 'url'; url: string }
    | { kind: 'path'; path: string }
    | { kind: 'invalid'; raw: string };

/**
 * Result of a playlist load attempt.
 * `superseded` means a newer load started before this one finished; its
 * result was discarded and the catalog left untouched.
 */
export type PlaylistLoadResult =
    | { status: 'loaded'; snapshot: CatalogSnapshot; origin: PlaylistOrigin }
    | { status: 'superseded'; origin: PlaylistOrigin };
