/**
 * @fileoverview Playback controller: one fresh engine player per play request.
 * @module modules/player/PlaybackController
 * @version 1.0.0
 *
 * Every `play(url)` takes a new generation number. Only the current
 * generation may drive status: a superseded request's resolution result,
 * failure, or engine callbacks are dropped on arrival.
 */

import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable, Logger } from '../../utils/interfaces';
import type { IUiDispatcher } from '../../utils/dispatcher';
import { createConsoleLogger } from '../../utils/logger';
import { redactSensitiveTokens } from '../../utils/redact';
import type { IEnginePlayer, IPlaybackController, IPlaybackEngine } from './interfaces';
import type {
    EngineNotification,
    EngineSource,
    PlaybackControllerConfig,
    PlaybackControllerEventMap,
    PlaybackEvent,
    PlaybackSnapshot,
    PlaybackStatus,
} from './types';
import { PlaybackEngineAdapter } from './PlaybackEngineAdapter';
import { nextPlaybackStatus } from './playbackTransitions';
import { createEngineFailureError, createResolutionError, type PlaybackError } from './ErrorHandler';
import { DEFAULT_PLAYBACK_CONFIG, MAX_VOLUME, MIN_VOLUME } from './constants';

/**
 * Collaborators required by the controller.
 */
export interface PlaybackControllerDeps {
    engine: IPlaybackEngine;
    dispatcher: IUiDispatcher;
    /**
     * Attach a freshly created player to whichever surface is active.
     * Called before the previous player is disposed.
     */
    attachPlayer: (player: IEnginePlayer) => void;
    logger?: Logger;
}

export class PlaybackController implements IPlaybackController {
    private readonly _emitter: EventEmitter<PlaybackControllerEventMap> = new EventEmitter();
    private readonly _config: PlaybackControllerConfig;
    private readonly _engine: IPlaybackEngine;
    private readonly _dispatcher: IUiDispatcher;
    private readonly _attachPlayer: (player: IEnginePlayer) => void;
    private readonly _logger: Logger;

    private _status: PlaybackStatus = 'idle';
    private _generation = 0;
    private _adapter: PlaybackEngineAdapter | null = null;
    private _url: string | null = null;
    private _volume: number;
    private _muted = false;
    private _everPlayed = false;

    constructor(deps: PlaybackControllerDeps, config: Partial<PlaybackControllerConfig> = {}) {
        this._config = { ...DEFAULT_PLAYBACK_CONFIG, ...config };
        this._engine = deps.engine;
        this._dispatcher = deps.dispatcher;
        this._attachPlayer = deps.attachPlayer;
        this._logger = deps.logger ?? createConsoleLogger('PlaybackController');
        this._volume = clampVolume(this._config.initialVolume);
    }

    // ========================================
    // Play
    // ========================================

    public async play(url: string): Promise<void> {
        const generation = ++this._generation;
        this._url = url;
        this._logger.debug(`Play #${generation}: ${redactSensitiveTokens(url)}`);

        const previous = this._adapter;
        if (previous) {
            this._volume = previous.getVolume();
            this._muted = previous.isMuted();
        }

        const player = this._engine.createPlayer({ volume: this._volume, muted: this._muted });
        const adapter = new PlaybackEngineAdapter(
            player,
            generation,
            this._dispatcher,
            (notification) => this._handleNotification(notification)
        );
        this._adapter = adapter;
        this._apply({ type: 'playRequested' }, generation);

        // New player takes the surface before the old one is released.
        this._attachPlayer(player);
        if (previous) {
            this._disposeAdapter(previous);
        }

        let source: EngineSource | null;
        try {
            source = await this._resolveSource(url, generation);
        } catch (error) {
            if (!this._isCurrent(generation)) {
                this._logger.warn(`Discarding failure of superseded play #${generation}`);
                return;
            }
            this._fail(createResolutionError(error), generation);
            return;
        }

        if (source === null || !this._isCurrent(generation)) {
            this._logger.warn(`Discarding superseded play #${generation}`);
            if (source !== null) {
                this._releaseStaleSource(source, generation);
            }
            return;
        }

        adapter.setSource(source);
        adapter.play();
    }

    // ========================================
    // Transport
    // ========================================

    public pause(): void {
        if (this._status !== 'playing') return;
        this._adapter?.pause();
    }

    public resume(): void {
        if (!this._adapter || this._status === 'idle' || this._status === 'failed') return;
        this._adapter.play();
    }

    public togglePlayPause(): void {
        if (this._status === 'playing') {
            this.pause();
        } else {
            this.resume();
        }
    }

    public adjustVolume(delta: number): number {
        const current = this._adapter ? this._adapter.getVolume() : this._volume;
        this._volume = clampVolume(current + delta);
        this._adapter?.setVolume(this._volume);
        return this._volume;
    }

    public toggleMute(): boolean {
        const current = this._adapter ? this._adapter.isMuted() : this._muted;
        this._muted = !current;
        this._adapter?.setMuted(this._muted);
        return this._muted;
    }

    // ========================================
    // Queries
    // ========================================

    public getStatus(): PlaybackStatus {
        return this._status;
    }

    public getSnapshot(): PlaybackSnapshot {
        return {
            status: this._status,
            generation: this._generation,
            url: this._url,
            volume: this._adapter ? this._adapter.getVolume() : this._volume,
            muted: this._adapter ? this._adapter.isMuted() : this._muted,
            everPlayed: this._everPlayed,
        };
    }

    public getCurrentPlayer(): IEnginePlayer | null {
        return this._adapter?.player ?? null;
    }

    public on<K extends keyof PlaybackControllerEventMap>(
        event: K,
        handler: (payload: PlaybackControllerEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    public dispose(): void {
        // Invalidate anything still in flight.
        this._generation++;
        if (this._adapter) {
            this._disposeAdapter(this._adapter);
            this._adapter = null;
        }
        this._emitter.removeAllListeners();
    }

    // ========================================
    // Internals
    // ========================================

    /**
     * Adaptive first; on failure or rejection, a direct open.
     * @returns null when the request was superseded between the two attempts
     */
    private async _resolveSource(url: string, generation: number): Promise<EngineSource | null> {
        try {
            const resolution = await this._engine.resolveAdaptive(url, {
                desiredLiveOffsetMs: this._config.desiredLiveOffsetMs,
                ...(this._config.adaptiveHeaders ? { headers: this._config.adaptiveHeaders } : {}),
            });
            if (resolution.status === 'success') {
                return resolution.source;
            }
            this._logger.debug(`Adaptive resolution failed (${resolution.reason}), opening directly`);
        } catch (error) {
            this._logger.debug('Adaptive resolution threw, opening directly', error);
        }

        if (!this._isCurrent(generation)) {
            return null;
        }
        return this._engine.openDirect(url);
    }

    private _handleNotification(notification: EngineNotification): void {
        if (!this._isCurrent(notification.generation)) {
            this._logger.debug(`Dropping engine callback from superseded play #${notification.generation}`);
            return;
        }

        switch (notification.kind) {
            case 'opened':
                this._emitter.emit('opened', { generation: notification.generation });
                break;
            case 'state':
                this._apply(notification.event, notification.generation);
                break;
            case 'failed':
                this._fail(createEngineFailureError(notification.failure), notification.generation);
                break;
        }
    }

    /**
     * `failed` goes out before the status change, so listeners that derive
     * UI from the status already see the error.
     */
    private _fail(error: PlaybackError, generation: number): void {
        this._adapter?.releaseSource();
        this._logger.error(`Play #${generation} failed: ${error.message}`);
        this._emitter.emit('failed', {
            error: error.toAppError({ url: this._url === null ? null : redactSensitiveTokens(this._url) }),
            generation,
        });
        if (this._isCurrent(generation)) {
            this._apply({ type: 'engineFailed' }, generation);
        }
    }

    private _releaseStaleSource(source: EngineSource, generation: number): void {
        try {
            this._engine.releaseSource?.(source);
        } catch (error) {
            this._logger.warn(`Failed to release source of superseded play #${generation}`, error);
        }
    }

    /**
     * Apply an event through the transition table.
     * Same-status results are silent no-ops (except a play request); unknown
     * transitions are logged and ignored.
     */
    private _apply(event: PlaybackEvent, generation: number): void {
        const from = this._status;
        const to = nextPlaybackStatus(from, event);
        if (to === null) {
            this._logger.warn(`Ignoring ${event.type} in status ${from}`);
            return;
        }
        if (to === from && event.type !== 'playRequested') {
            return;
        }

        this._status = to;
        if (to === 'playing') {
            this._everPlayed = true;
        }
        this._logger.debug(`Status ${from} -> ${to} (#${generation})`);
        this._emitter.emit('statusChange', { from, to, generation });
    }

    private _isCurrent(generation: number): boolean {
        return generation === this._generation;
    }

    private _disposeAdapter(adapter: PlaybackEngineAdapter): void {
        try {
            adapter.dispose();
        } catch (error) {
            this._logger.warn(`Failed to dispose player #${adapter.generation}`, error);
        }
    }
}

function clampVolume(volume: number): number {
    return Math.min(MAX_VOLUME, Math.max(MIN_VOLUME, volume));
}
