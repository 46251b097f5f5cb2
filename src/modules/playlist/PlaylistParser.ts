/**
 * @fileoverview Best-effort playlist text parser (M3U subset).
 * @module modules/playlist/PlaylistParser
 * @version 1.0.0
 *
 * A `#EXTINF:` directive opens a pending entry; the next non-blank,
 * non-comment line is its stream URL. Everything else is skipped. Malformed
 * input never throws: the worst outcome is an empty list.
 */

import type { Channel } from './types';
import { COMMENT_PREFIX, EXTINF_TAG, PLAYLIST_ATTRIBUTES } from './constants';

/**
 * Directive metadata waiting for its URL line.
 */
interface PendingEntry {
    name: string;
    group: string;
    logoUrl: string | null;
}

const LINE_BREAK = /\r?\n/;

/**
 * Parse playlist text into channels, preserving source order.
 */
export function parsePlaylist(text: string): Channel[] {
    const channels: Channel[] = [];
    let pending: PendingEntry | null = null;

    for (const raw of text.split(LINE_BREAK)) {
        const line = raw.trim();
        if (line.length === 0) {
            continue;
        }

        if (isDirective(line)) {
            // A second directive before a URL replaces the first.
            pending = parseDirective(line);
            continue;
        }

        if (line.startsWith(COMMENT_PREFIX) || pending === null) {
            continue;
        }

        channels.push(createChannel(pending, line));
        pending = null;
    }

    return channels;
}

/**
 * Extract a `key="value"` attribute from a directive line.
 * The key match is case-insensitive; the value runs to the next double quote.
 * @returns The raw value, or null when the key or its closing quote is missing
 */
export function getDirectiveAttribute(line: string, key: string): string | null {
    const needle = `${key}="`;
    const start = line.toLowerCase().indexOf(needle.toLowerCase());
    if (start < 0) {
        return null;
    }
    const valueStart = start + needle.length;
    const end = line.indexOf('"', valueStart);
    if (end < 0) {
        return null;
    }
    return line.slice(valueStart, end);
}

function isDirective(line: string): boolean {
    return line.slice(0, EXTINF_TAG.length).toUpperCase() === EXTINF_TAG;
}

function parseDirective(line: string): PendingEntry {
    const lastComma = line.lastIndexOf(',');
    const name = (lastComma >= 0 ? line.slice(lastComma + 1) : line).trim();
    const logo = getDirectiveAttribute(line, PLAYLIST_ATTRIBUTES.LOGO);
    return {
        name,
        group: getDirectiveAttribute(line, PLAYLIST_ATTRIBUTES.GROUP) ?? '',
        logoUrl: logo !== null && logo.length > 0 ? logo : null,
    };
}

function createChannel(entry: PendingEntry, streamUrl: string): Channel {
    return Object.freeze({
        name: entry.name,
        group: entry.group,
        ...(entry.logoUrl !== null ? { logoUrl: entry.logoUrl } : {}),
        streamUrl,
    });
}
