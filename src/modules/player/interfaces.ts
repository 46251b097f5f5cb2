/**
 * @fileoverview Interface definitions for the Player module.
 * @module modules/player/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type {
    AdaptiveResolution,
    AdaptiveResolveOptions,
    EngineFailure,
    EnginePlayerInit,
    EngineSource,
    EngineState,
    PlaybackControllerEventMap,
    PlaybackSnapshot,
    PlaybackStatus,
} from './types';

/**
 * External playback engine. Decoding, adaptive bitrate and networking all
 * live behind this seam.
 */
export interface IPlaybackEngine {
    /** Allocate a fresh player with the given audio settings. */
    createPlayer(init: EnginePlayerInit): IEnginePlayer;

    /** Resolve a URL as an adaptive manifest (HLS/DASH). */
    resolveAdaptive(url: string, options: AdaptiveResolveOptions): Promise<AdaptiveResolution>;

    /** Open a URL as a single direct media resource. */
    openDirect(url: string): Promise<EngineSource>;

    /** Free a resolved source that will never be set on a player. */
    releaseSource?(source: EngineSource): void;
}

/**
 * One engine player instance. Callbacks may fire from any execution
 * context; each subscription returns its unsubscribe function.
 */
export interface IEnginePlayer {
    setSource(source: EngineSource | null): void;
    play(): void;
    pause(): void;

    getVolume(): number;
    setVolume(volume: number): void;
    isMuted(): boolean;
    setMuted(muted: boolean): void;

    onOpened(callback: () => void): () => void;
    onStateChanged(callback: (state: EngineState) => void): () => void;
    onFailed(callback: (failure: EngineFailure) => void): () => void;

    dispose(): void;
}

/**
 * Playback Controller Interface.
 * Owns one engine player per play request and the status state machine.
 */
export interface IPlaybackController {
    /**
     * Start playing a URL on a fresh player.
     * Resolves once the source is set (or the request failed or was superseded).
     */
    play(url: string): Promise<void>;
    pause(): void;
    resume(): void;
    togglePlayPause(): void;

    /** Change volume by a signed step, clamped to [0, 1]. Returns the new volume. */
    adjustVolume(delta: number): number;
    /** Returns the new muted flag. */
    toggleMute(): boolean;

    getStatus(): PlaybackStatus;
    getSnapshot(): PlaybackSnapshot;
    /** The live player, null before the first play. */
    getCurrentPlayer(): IEnginePlayer | null;

    on<K extends keyof PlaybackControllerEventMap>(
        event: K,
        handler: (payload: PlaybackControllerEventMap[K]) => void
    ): IDisposable;

    dispose(): void;
}
