/**
 * @fileoverview Player session: owns the catalog, the playback controller, the
 * surface manager and the overlay, and wires their events together.
 * @module PlayerSession
 * @version 1.0.0
 *
 * The session is the only long-lived context. Components never reach for each
 * other directly; callbacks submit events here, and every status or catalog
 * change ends in a single overlay refresh.
 */

import { AppErrorCode, normalizeError, type AppError } from './types/app-errors';
import { STORAGE_KEYS } from './config/storageKeys';
import type { IDisposable, Logger } from './utils/interfaces';
import { createConsoleLogger } from './utils/logger';
import { MicrotaskDispatcher, type IUiDispatcher } from './utils/dispatcher';
import { getDefaultStore, isStoredTrue, safeStoreGet, type KeyValueStore } from './utils/storage';
import {
    ChannelCatalog,
    FetchNetworkClient,
    NodePlaylistFileSystem,
    PlaylistLoader,
    PlaylistSlotStore,
    DEFAULT_USER_AGENT,
    formatChannelHeader,
    isLoadablePlaylistUrl,
    type Channel,
    type INetworkClient,
    type IPlaylistFileSystem,
    type PlaylistLoadResult,
    type PlaylistSlot,
} from './modules/playlist';
import {
    PlaybackController,
    ResumeNudger,
    DEFAULT_PLAYBACK_CONFIG,
    MAX_RESUME_NUDGES,
    RESUME_NUDGE_DELAY_MS,
    type IPlaybackEngine,
    type PlaybackSnapshot,
} from './modules/player';
import {
    SurfaceManager,
    DEFAULT_SURFACE_CONFIG,
    type FloatingLayout,
    type IWindowHost,
    type Surface,
} from './modules/surface';
import { OverlayCoordinator, type IOverlayView, type OverlayState } from './modules/ui/overlay';
import {
    ShortcutHandler,
    DEFAULT_VOLUME_STEP,
    type IShortcutTarget,
    type ShortcutCommand,
    type ShortcutKeyEvent,
} from './modules/navigation';

// ============================================
// Configuration
// ============================================

export interface PlayerSessionConfig {
    /** Volume of the first player, 0..1 */
    initialVolume: number;
    /** Volume change per shortcut press */
    volumeStep: number;
    resumeNudgeAttempts: number;
    resumeNudgeDelayMs: number;
    floating: FloatingLayout;
    /** Title prefix for secondary windows */
    windowTitle: string;
    /** User-Agent sent with playlist fetches */
    userAgent: string;
    /** Desired live offset requested from adaptive resolution */
    desiredLiveOffsetMs: number;
    /** Extra headers passed to adaptive resolution */
    adaptiveHeaders?: Record<string, string>;
}

export const DEFAULT_PLAYER_SESSION_CONFIG: PlayerSessionConfig = {
    initialVolume: DEFAULT_PLAYBACK_CONFIG.initialVolume,
    volumeStep: DEFAULT_VOLUME_STEP,
    resumeNudgeAttempts: MAX_RESUME_NUDGES,
    resumeNudgeDelayMs: RESUME_NUDGE_DELAY_MS,
    floating: DEFAULT_SURFACE_CONFIG.floating,
    windowTitle: DEFAULT_SURFACE_CONFIG.windowTitle,
    userAgent: DEFAULT_USER_AGENT,
    desiredLiveOffsetMs: DEFAULT_PLAYBACK_CONFIG.desiredLiveOffsetMs,
};

/**
 * Host collaborators. Only the engine and the window host are required.
 */
export interface PlayerSessionDeps {
    engine: IPlaybackEngine;
    windows: IWindowHost;
    network?: INetworkClient;
    files?: IPlaylistFileSystem;
    /** Slot configuration and debug flag source; null for none */
    store?: KeyValueStore | null;
    dispatcher?: IUiDispatcher;
    overlayView?: IOverlayView | null;
    /** Shared logger; each component otherwise logs under its own prefix */
    logger?: Logger;
}

// ============================================
// Interface
// ============================================

export interface IPlayerSession extends IShortcutTarget {
    // Playlists
    getSlots(): readonly PlaylistSlot[];
    loadSlot(index: number): Promise<PlaylistLoadResult | null>;
    loadPlaylistFromInput(input: string): Promise<PlaylistLoadResult | null>;
    loadPlaylistUrl(url: string, label?: string): Promise<PlaylistLoadResult | null>;
    loadPlaylistFile(filePath: string): Promise<PlaylistLoadResult | null>;
    isLoadablePlaylistUrl(text: string): boolean;

    // Channel list
    setSearchQuery(query: string): void;
    getSearchQuery(): string;
    getVisibleChannels(): Channel[];
    getHeader(): string;

    // Playback
    play(url: string): Promise<void>;
    selectChannel(channel: Channel): Promise<void>;
    getPlaybackSnapshot(): PlaybackSnapshot;

    // Surfaces
    getActiveSurface(): Surface;
    enterFullscreen(): Promise<void>;
    exitFullscreen(): Promise<void>;
    enterFloating(): Promise<void>;
    exitFloating(): Promise<void>;

    // Overlay & errors
    getOverlayState(): OverlayState;
    dismissError(): void;
    handleError(error: unknown, context: string): AppError;
    handleShortcut(event: ShortcutKeyEvent): ShortcutCommand | null;

    dispose(): void;
}

// ============================================
// Implementation
// ============================================

export class PlayerSession implements IPlayerSession {
    private readonly _config: PlayerSessionConfig;
    private readonly _logger: Logger;
    private readonly _catalog: ChannelCatalog;
    private readonly _loader: PlaylistLoader;
    private readonly _controller: PlaybackController;
    private readonly _surfaces: SurfaceManager;
    private readonly _overlay: OverlayCoordinator;
    private readonly _shortcuts: ShortcutHandler;
    private readonly _slots: readonly PlaylistSlot[];
    private readonly _subscriptions: IDisposable[] = [];
    private _query = '';
    private _disposed = false;

    constructor(deps: PlayerSessionDeps, config: Partial<PlayerSessionConfig> = {}) {
        this._config = { ...DEFAULT_PLAYER_SESSION_CONFIG, ...config };
        const store = deps.store === undefined ? getDefaultStore() : deps.store;
        const debugEnabled = isStoredTrue(safeStoreGet(store, STORAGE_KEYS.DEBUG_LOGGING));
        const loggerFor = (prefix: string): Logger =>
            deps.logger ?? createConsoleLogger(prefix, debugEnabled);

        this._logger = loggerFor('PlayerSession');

        this._catalog = new ChannelCatalog();
        this._loader = new PlaylistLoader({
            catalog: this._catalog,
            network: deps.network ?? new FetchNetworkClient(this._config.userAgent),
            files: deps.files ?? new NodePlaylistFileSystem(),
            logger: loggerFor('PlaylistLoader'),
        });
        this._slots = new PlaylistSlotStore(store, loggerFor('PlaylistSlotStore')).loadSlots();

        this._surfaces = new SurfaceManager(
            {
                windows: deps.windows,
                resumeTarget: {
                    isPlaying: () => this._controller.getStatus() === 'playing',
                    nudge: () => this._nudgeResume(),
                },
                nudger: new ResumeNudger(
                    this._config.resumeNudgeAttempts,
                    this._config.resumeNudgeDelayMs,
                    loggerFor('ResumeNudger')
                ),
                logger: loggerFor('SurfaceManager'),
            },
            { floating: this._config.floating, windowTitle: this._config.windowTitle }
        );

        this._controller = new PlaybackController(
            {
                engine: deps.engine,
                dispatcher: deps.dispatcher ?? new MicrotaskDispatcher(),
                attachPlayer: (player) => this._surfaces.attachPlayer(player),
                logger: loggerFor('PlaybackController'),
            },
            {
                initialVolume: this._config.initialVolume,
                desiredLiveOffsetMs: this._config.desiredLiveOffsetMs,
                ...(this._config.adaptiveHeaders ? { adaptiveHeaders: this._config.adaptiveHeaders } : {}),
            }
        );

        this._overlay = new OverlayCoordinator({
            getInputs: () => ({
                hasCatalog: this._catalog.hasChannels(),
                status: this._controller.getStatus(),
                everPlayed: this._controller.getSnapshot().everPlayed,
            }),
            view: deps.overlayView ?? null,
            logger: loggerFor('Overlay'),
        });

        this._shortcuts = new ShortcutHandler(
            this,
            { volumeStep: this._config.volumeStep },
            loggerFor('ShortcutHandler')
        );

        this._wireEvents();
        this._overlay.refresh();
    }

    // ============================================
    // Playlists
    // ============================================

    getSlots(): readonly PlaylistSlot[] {
        return this._slots;
    }

    async loadSlot(index: number): Promise<PlaylistLoadResult | null> {
        const slot = this._slots[index];
        if (!slot) {
            this._logger.warn(`No playlist slot at index ${index}`);
            return null;
        }
        return this._runLoad(() => this._loader.loadSlot(slot, index));
    }

    loadPlaylistFromInput(input: string): Promise<PlaylistLoadResult | null> {
        return this._runLoad(() => this._loader.loadFromInput(input));
    }

    loadPlaylistUrl(url: string, label?: string): Promise<PlaylistLoadResult | null> {
        return this._runLoad(() => this._loader.loadUrl(url, label));
    }

    loadPlaylistFile(filePath: string): Promise<PlaylistLoadResult | null> {
        return this._runLoad(() => this._loader.loadFile(filePath));
    }

    isLoadablePlaylistUrl(text: string): boolean {
        return isLoadablePlaylistUrl(text);
    }

    // ============================================
    // Channel list
    // ============================================

    setSearchQuery(query: string): void {
        this._query = query;
        this._overlay.refresh();
    }

    getSearchQuery(): string {
        return this._query;
    }

    getVisibleChannels(): Channel[] {
        return this._catalog.filter(this._query);
    }

    getHeader(): string {
        return formatChannelHeader(this._catalog.getSnapshot().label);
    }

    // ============================================
    // Playback
    // ============================================

    async play(url: string): Promise<void> {
        if (this._disposed) return;
        this._surfaces.cancelResumeNudges();
        // Status is already Opening once play() returns its promise; clearing the
        // error after that renders Loading directly.
        const pending = this._controller.play(url);
        this._overlay.dismissError();
        try {
            await pending;
        } catch (error) {
            this.handleError(error, 'PlaybackController');
        }
    }

    selectChannel(channel: Channel): Promise<void> {
        return this.play(channel.streamUrl);
    }

    getPlaybackSnapshot(): PlaybackSnapshot {
        return this._controller.getSnapshot();
    }

    togglePlayPause(): void {
        this._surfaces.cancelResumeNudges();
        this._controller.togglePlayPause();
    }

    adjustVolume(delta: number): number {
        return this._controller.adjustVolume(delta);
    }

    toggleMute(): boolean {
        return this._controller.toggleMute();
    }

    // ============================================
    // Surfaces
    // ============================================

    getActiveSurface(): Surface {
        return this._surfaces.getActiveSurface();
    }

    enterFullscreen(): Promise<void> {
        return this._surfaces.enterFullscreen();
    }

    exitFullscreen(): Promise<void> {
        return this._surfaces.exitFullscreen();
    }

    toggleFullscreen(): Promise<void> {
        return this._surfaces.toggleFullscreen();
    }

    enterFloating(): Promise<void> {
        return this._surfaces.enterFloating();
    }

    exitFloating(): Promise<void> {
        return this._surfaces.exitFloating();
    }

    toggleFloating(): Promise<void> {
        return this._surfaces.toggleFloating();
    }

    exitActiveSecondary(): Promise<boolean> {
        return this._surfaces.exitActiveSecondary();
    }

    // ============================================
    // Overlay & errors
    // ============================================

    getOverlayState(): OverlayState {
        return this._overlay.getState();
    }

    dismissError(): void {
        this._overlay.dismissError();
    }

    /**
     * Single funnel for user-visible failures: log, then show the error overlay.
     */
    handleError(error: unknown, context: string): AppError {
        const appError = normalizeError(error);
        this._logger.error(`[${context}] ${appError.code}: ${appError.message}`);
        if (appError.code === AppErrorCode.UNKNOWN && error instanceof Error && error.stack) {
            this._logger.debug(error.stack);
        }
        if (!this._disposed) {
            this._overlay.showError(appError.message);
        }
        return appError;
    }

    handleShortcut(event: ShortcutKeyEvent): ShortcutCommand | null {
        if (this._disposed) return null;
        return this._shortcuts.handleKey(event);
    }

    dispose(): void {
        if (this._disposed) return;
        this._disposed = true;
        this._subscriptions.forEach((subscription) => subscription.dispose());
        this._subscriptions.length = 0;
        this._surfaces.dispose();
        this._controller.dispose();
        this._overlay.dispose();
    }

    // ============================================
    // Internals
    // ============================================

    private _wireEvents(): void {
        this._subscriptions.push(
            this._catalog.on('catalogReplaced', () => {
                this._overlay.refresh();
            }),
            this._controller.on('statusChange', ({ to }) => {
                if (to === 'playing') {
                    this._overlay.dismissError();
                }
                this._overlay.refresh();
            }),
            this._controller.on('opened', () => {
                this._overlay.dismissError();
            }),
            this._controller.on('failed', ({ error }) => {
                this.handleError(error, 'PlaybackController');
            })
        );
    }

    /**
     * Resume a player left paused by a surface handoff. Any other status
     * belongs to a newer request or to the engine, so it is left alone.
     */
    private _nudgeResume(): void {
        if (this._controller.getStatus() === 'paused') {
            this._controller.resume();
        }
    }

    private async _runLoad(
        load: () => Promise<PlaylistLoadResult>
    ): Promise<PlaylistLoadResult | null> {
        if (this._disposed) return null;
        try {
            const result = await load();
            if (result.status === 'loaded') {
                this._query = '';
                this._overlay.dismissError();
                this._overlay.refresh();
            }
            return result;
        } catch (error) {
            this.handleError(error, 'PlaylistLoader');
            return null;
        }
    }
}
