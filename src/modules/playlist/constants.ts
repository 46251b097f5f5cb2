/**
 * @fileoverview Constants for the Playlist module.
 * @module modules/playlist/constants
 * @version 1.0.0
 */

import type { PlaylistSlot } from './types';

// ============================================
// Playlist Format
// ============================================

/** Directive tag, matched case-insensitively at the start of a trimmed line */
export const EXTINF_TAG = '#EXTINF:';

/** Comment prefix; lines starting with it are never stream URLs */
export const COMMENT_PREFIX = '#';

/** Recognized directive attributes */
export const PLAYLIST_ATTRIBUTES = {
    GROUP: 'group-title',
    LOGO: 'tvg-logo',
} as const;

/** File extensions accepted for playlist URLs and files */
export const PLAYLIST_EXTENSIONS = ['.m3u', '.m3u8'] as const;

/** Label used when a URL cannot be parsed into something friendlier */
export const FALLBACK_PLAYLIST_LABEL = 'Playlist';

/** Channel list header text */
export const CHANNEL_HEADER = 'Channels';

// ============================================
// Network
// ============================================

/** User-Agent sent with playlist fetches */
export const DEFAULT_USER_AGENT = 'channelview/1.0';

// ============================================
// Quick Slots
// ============================================

/** Number of quick-load buttons */
export const PLAYLIST_SLOT_COUNT = 6;

/**
 * Built-in quick slots, used whenever the stored configuration is missing,
 * malformed, or shorter than six entries.
 */
export const DEFAULT_PLAYLIST_SLOTS: readonly PlaylistSlot[] = [
    {
        glyph: '🛕',
        streamUrl: 'https://raw.githubusercontent.com/akkradet/IPTV-THAI/refs/heads/master/FREETV.m3u',
        tooltip: 'Thai playlist',
    },
    {
        glyph: '💂',
        streamUrl: 'https://raw.githubusercontent.com/iptv-org/iptv/refs/heads/master/streams/uk.m3u',
        tooltip: 'UK playlist',
    },
    {
        glyph: '🍁',
        streamUrl: 'https://raw.githubusercontent.com/iptv-org/iptv/refs/heads/master/streams/ca.m3u',
        tooltip: 'Canada playlist',
    },
    {
        glyph: '🗽',
        streamUrl: 'https://raw.githubusercontent.com/iptv-org/iptv/refs/heads/master/streams/us.m3u',
        tooltip: 'USA playlist',
    },
    {
        glyph: '🦘',
        streamUrl: 'https://raw.githubusercontent.com/iptv-org/iptv/refs/heads/master/streams/au.m3u',
        tooltip: 'Australia playlist',
    },
    {
        glyph: '🌏',
        streamUrl: 'https://iptv-org.github.io/iptv/index.m3u',
        tooltip: 'Global playlist',
    },
];

// ============================================
// Error Messages
// ============================================

export const PLAYLIST_ERROR_MESSAGES = {
    FETCH_FAILED_PREFIX: 'Failed to load playlist.',
    SLOT_UNCONFIGURED:
        'This playlist button isn’t configured yet.\nUse Advanced Controls to load a list.',
    INPUT_INVALID: 'Not a valid URL or path to a .m3u/.m3u8 file.',
    FILE_UNREADABLE_PREFIX: 'Failed to read playlist file.',
} as const;
