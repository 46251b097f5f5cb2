/**
 * @fileoverview Interface definitions for the Playlist module.
 * @module modules/playlist/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { CatalogSnapshot, Channel, ChannelCatalogEventMap, PlaylistSlot } from './types';

/**
 * Channel Catalog Interface.
 * Replacement is whole-list and atomic; reads never see a half-loaded list.
 */
export interface IChannelCatalog {
    replace(channels: readonly Channel[], label: string | null): CatalogSnapshot;
    getSnapshot(): CatalogSnapshot;
    size(): number;
    hasChannels(): boolean;
    filter(query: string): Channel[];
    on<K extends keyof ChannelCatalogEventMap>(
        event: K,
        handler: (payload: ChannelCatalogEventMap[K]) => void
    ): IDisposable;
}

/**
 * Options passed through to the network collaborator.
 */
export interface FetchTextOptions {
    headers?: Record<string, string>;
}

/**
 * Network collaborator. A single capability: fetch a URL as text.
 * Implementations reject with a NetworkError-style Error on transport
 * failure or a non-success status.
 */
export interface INetworkClient {
    fetchText(url: string, options?: FetchTextOptions): Promise<string>;
}

/**
 * Local file access for playlists picked from disk.
 */
export interface IPlaylistFileSystem {
    readText(filePath: string): Promise<string>;
    exists(filePath: string): Promise<boolean>;
}

/**
 * Quick-slot configuration source.
 * Never throws; malformed configuration yields the defaults.
 */
export interface IPlaylistSlotStore {
    loadSlots(): PlaylistSlot[];
}
