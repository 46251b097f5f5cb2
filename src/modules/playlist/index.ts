/**
 * @fileoverview Public exports for the Playlist module.
 * @module modules/playlist
 * @version 1.0.0
 */

export { parsePlaylist, getDirectiveAttribute } from './PlaylistParser';
export { ChannelCatalog, filterChannels } from './ChannelCatalog';
export { PlaylistLoader } from './PlaylistLoader';
export { PlaylistSlotStore } from './PlaylistSlotStore';
export { FetchNetworkClient } from './FetchNetworkClient';
export { NodePlaylistFileSystem } from './NodePlaylistFileSystem';
export { PlaylistError, NetworkError } from './errors';
export {
    isLoadablePlaylistUrl,
    friendlyNameFromUrl,
    friendlyNameFromPath,
    formatChannelHeader,
    classifyPlaylistInput,
} from './playlistSource';

// Interfaces
export type {
    IChannelCatalog,
    INetworkClient,
    IPlaylistFileSystem,
    IPlaylistSlotStore,
    FetchTextOptions,
} from './interfaces';
export type { PlaylistLoaderDeps } from './PlaylistLoader';

// Types
export type {
    Channel,
    PlaylistSlot,
    StoredPlaylistSlot,
    CatalogSnapshot,
    ChannelCatalogEventMap,
    PlaylistOrigin,
    PlaylistInput,
    PlaylistLoadResult,
} from './types';

// Constants
export {
    DEFAULT_PLAYLIST_SLOTS,
    PLAYLIST_SLOT_COUNT,
    PLAYLIST_ERROR_MESSAGES,
    DEFAULT_USER_AGENT,
} from './constants';
