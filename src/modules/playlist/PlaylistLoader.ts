/**
 * @fileoverview Playlist loading from URLs, files and quick slots.
 * @module modules/playlist/PlaylistLoader
 * @version 1.0.0
 *
 * Loads are last-writer-wins: each load takes a generation number, and a
 * completion whose generation is no longer current is dropped without
 * touching the catalog (including its failure).
 */

import type { IChannelCatalog, INetworkClient, IPlaylistFileSystem } from './interfaces';
import type { PlaylistLoadResult, PlaylistOrigin, PlaylistSlot } from './types';
import { parsePlaylist } from './PlaylistParser';
import { PlaylistError } from './errors';
import { PLAYLIST_ERROR_MESSAGES } from './constants';
import { classifyPlaylistInput, friendlyNameFromPath, friendlyNameFromUrl } from './playlistSource';
import { AppErrorCode, describeError } from '../../types/app-errors';
import type { Logger } from '../../utils/interfaces';
import { createConsoleLogger } from '../../utils/logger';
import { redactSensitiveTokens } from '../../utils/redact';

/**
 * Collaborators required by the loader.
 */
export interface PlaylistLoaderDeps {
    catalog: IChannelCatalog;
    network: INetworkClient;
    files: IPlaylistFileSystem;
    logger?: Logger;
}

export class PlaylistLoader {
    private readonly _catalog: IChannelCatalog;
    private readonly _network: INetworkClient;
    private readonly _files: IPlaylistFileSystem;
    private readonly _logger: Logger;
    private _generation = 0;

    constructor(deps: PlaylistLoaderDeps) {
        this._catalog = deps.catalog;
        this._network = deps.network;
        this._files = deps.files;
        this._logger = deps.logger ?? createConsoleLogger('PlaylistLoader');
    }

    /**
     * Fetch and load a remote playlist.
     * @param label - Display label; derived from the URL when omitted
     * @throws PlaylistError (PLAYLIST_FETCH_FAILED) when this load is still current
     */
    public loadUrl(url: string, label?: string): Promise<PlaylistLoadResult> {
        return this._load({ kind: 'url', url }, label ?? friendlyNameFromUrl(url));
    }

    /**
     * Read and load a local playlist file.
     * @throws PlaylistError (PLAYLIST_FILE_UNREADABLE) when this load is still current
     */
    public loadFile(filePath: string): Promise<PlaylistLoadResult> {
        return this._load({ kind: 'file', path: filePath }, friendlyNameFromPath(filePath));
    }

    /**
     * Load the playlist behind a quick slot.
     * @throws PlaylistError (PLAYLIST_SLOT_UNCONFIGURED) when the slot has no URL
     */
    public async loadSlot(slot: PlaylistSlot, index: number): Promise<PlaylistLoadResult> {
        const url = slot.streamUrl?.trim() ?? '';
        if (url.length === 0) {
            throw new PlaylistError(
                AppErrorCode.PLAYLIST_SLOT_UNCONFIGURED,
                PLAYLIST_ERROR_MESSAGES.SLOT_UNCONFIGURED
            );
        }
        return this._load({ kind: 'slot', index, url }, friendlyNameFromUrl(url));
    }

    /**
     * Load from free-form input: an http(s) URL or an existing file path.
     * @throws PlaylistError (PLAYLIST_INPUT_INVALID) for anything else
     */
    public async loadFromInput(input: string): Promise<PlaylistLoadResult> {
        const classified = await classifyPlaylistInput(input, (filePath) =>
            this._files.exists(filePath)
        );
        switch (classified.kind) {
            case 'url':
                return this.loadUrl(classified.url);
            case 'path':
                return this.loadFile(classified.path);
            case 'invalid':
                throw new PlaylistError(
                    AppErrorCode.PLAYLIST_INPUT_INVALID,
                    PLAYLIST_ERROR_MESSAGES.INPUT_INVALID
                );
        }
    }

    // ============================================
    // Internals
    // ============================================

    private async _load(origin: PlaylistOrigin, label: string): Promise<PlaylistLoadResult> {
        const generation = ++this._generation;
        const source = describeOrigin(origin);
        this._logger.debug(`Loading playlist #${generation} from ${source}`);

        let text: string;
        try {
            text = await this._readSource(origin);
        } catch (error) {
            if (generation !== this._generation) {
                this._logger.warn(`Discarding failure of superseded load #${generation} (${source})`);
                return { status: 'superseded', origin };
            }
            throw toPlaylistError(origin, error);
        }

        if (generation !== this._generation) {
            this._logger.warn(`Discarding superseded load #${generation} (${source})`);
            return { status: 'superseded', origin };
        }

        const channels = parsePlaylist(text);
        const snapshot = this._catalog.replace(channels, label);
        this._logger.info(`Loaded ${channels.length} channels from ${source}`);
        return { status: 'loaded', snapshot, origin };
    }

    private _readSource(origin: PlaylistOrigin): Promise<string> {
        switch (origin.kind) {
            case 'url':
            case 'slot':
                return this._network.fetchText(origin.url);
            case 'file':
                return this._files.readText(origin.path);
        }
    }
}

function describeOrigin(origin: PlaylistOrigin): string {
    switch (origin.kind) {
        case 'url':
            return redactSensitiveTokens(origin.url);
        case 'slot':
            return `slot ${origin.index + 1} (${redactSensitiveTokens(origin.url)})`;
        case 'file':
            return origin.path;
    }
}

function toPlaylistError(origin: PlaylistOrigin, error: unknown): PlaylistError {
    const detail = describeError(error);
    if (origin.kind === 'file') {
        return new PlaylistError(
            AppErrorCode.PLAYLIST_FILE_UNREADABLE,
            `${PLAYLIST_ERROR_MESSAGES.FILE_UNREADABLE_PREFIX}\n${detail}`
        );
    }
    return new PlaylistError(
        AppErrorCode.PLAYLIST_FETCH_FAILED,
        `${PLAYLIST_ERROR_MESSAGES.FETCH_FAILED_PREFIX}\n${detail}`
    );
}
