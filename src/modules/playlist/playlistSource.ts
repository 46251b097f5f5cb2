/**
 * @fileoverview Helpers for naming and classifying playlist sources.
 * @module modules/playlist/playlistSource
 * @version 1.0.0
 */

import * as path from 'node:path';

import type { PlaylistInput } from './types';
import {
    CHANNEL_HEADER,
    FALLBACK_PLAYLIST_LABEL,
    PLAYLIST_EXTENSIONS,
} from './constants';

function parseHttpUrl(value: string): URL | null {
    let parsed: URL;
    try {
        parsed = new URL(value);
    } catch {
        return null;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        return null;
    }
    return parsed;
}

function hasPlaylistExtension(value: string): boolean {
    const lower = value.toLowerCase();
    return PLAYLIST_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Whether text is an absolute http(s) URL whose path ends in .m3u/.m3u8.
 * Gates the "Load URL" action of the advanced-controls dialog.
 */
export function isLoadablePlaylistUrl(text: string): boolean {
    const parsed = parseHttpUrl(text.trim());
    return parsed !== null && hasPlaylistExtension(parsed.pathname);
}

/**
 * Label for a remote playlist: the file name without extension when the last
 * path segment is a playlist file, otherwise the host.
 */
export function friendlyNameFromUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return FALLBACK_PLAYLIST_LABEL;
    }
    const segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
    const last = segments[segments.length - 1] ?? '';
    if (hasPlaylistExtension(last)) {
        return last.slice(0, last.length - path.extname(last).length);
    }
    return parsed.hostname;
}

/**
 * Label for a local playlist file: its name without extension.
 */
export function friendlyNameFromPath(filePath: string): string {
    return path.basename(filePath, path.extname(filePath));
}

/**
 * Header text shown above the channel list.
 */
export function formatChannelHeader(label: string | null): string {
    const clean = label?.trim() ?? '';
    return clean.length > 0 ? `${CHANNEL_HEADER}: ${clean}` : CHANNEL_HEADER;
}

/**
 * Classify advanced-controls input as a URL, an existing file path, or junk.
 * @param fileExists - Existence check for local paths
 */
export async function classifyPlaylistInput(
    input: string,
    fileExists: (filePath: string) => Promise<boolean>
): Promise<PlaylistInput> {
    const trimmed = input.trim();
    const parsed = parseHttpUrl(trimmed);
    if (parsed) {
        return { kind: 'url', url: parsed.href };
    }
    if (trimmed.length > 0 && (await fileExists(trimmed))) {
        return { kind: 'path', path: trimmed };
    }
    return { kind: 'invalid', raw: input };
}
