/**
 * @fileoverview Thin wrapper around one engine player.
 * @module modules/player/PlaybackEngineAdapter
 * @version 1.0.0
 *
 * Engine callbacks may arrive from worker contexts. The adapter marshals each
 * one through the UI dispatcher, normalizes it, and tags it with the
 * generation of the play request that created the player. After `dispose()`
 * nothing more is delivered, even for callbacks already queued.
 */

import type { IEnginePlayer } from './interfaces';
import type { EngineNotification, EngineSource } from './types';
import { engineStateToEvent } from './playbackTransitions';
import type { IUiDispatcher } from '../../utils/dispatcher';
import { MAX_VOLUME, MIN_VOLUME } from './constants';

export class PlaybackEngineAdapter {
    private readonly _unsubscribers: Array<() => void> = [];
    private _disposed = false;

    constructor(
        private readonly _player: IEnginePlayer,
        public readonly generation: number,
        private readonly _dispatcher: IUiDispatcher,
        private readonly _onNotification: (notification: EngineNotification) => void
    ) {
        this._unsubscribers.push(
            _player.onOpened(() => {
                this._deliver({ kind: 'opened', generation });
            }),
            _player.onStateChanged((state) => {
                const event = engineStateToEvent(state);
                if (event) {
                    this._deliver({ kind: 'state', generation, event });
                }
            }),
            _player.onFailed((failure) => {
                this._deliver({ kind: 'failed', generation, failure: { ...failure } });
            })
        );
    }

    public get player(): IEnginePlayer {
        return this._player;
    }

    // ========================================
    // Commands
    // ========================================

    public setSource(source: EngineSource | null): void {
        if (this._disposed) return;
        this._player.setSource(source);
    }

    public play(): void {
        if (this._disposed) return;
        this._player.play();
    }

    public pause(): void {
        if (this._disposed) return;
        this._player.pause();
    }

    /**
     * Stop output and drop the source so the engine frees it.
     */
    public releaseSource(): void {
        if (this._disposed) return;
        this._player.pause();
        this._player.setSource(null);
    }

    public getVolume(): number {
        return this._player.getVolume();
    }

    public setVolume(volume: number): void {
        if (this._disposed) return;
        this._player.setVolume(Math.min(MAX_VOLUME, Math.max(MIN_VOLUME, volume)));
    }

    public isMuted(): boolean {
        return this._player.isMuted();
    }

    public setMuted(muted: boolean): void {
        if (this._disposed) return;
        this._player.setMuted(muted);
    }

    /**
     * Unsubscribe and dispose the underlying player. Idempotent.
     */
    public dispose(): void {
        if (this._disposed) return;
        this._disposed = true;
        for (const unsubscribe of this._unsubscribers.splice(0)) {
            unsubscribe();
        }
        this._player.dispose();
    }

    private _deliver(notification: EngineNotification): void {
        if (this._disposed) return;
        this._dispatcher.enqueue(() => {
            if (this._disposed) return;
            this._onNotification(notification);
        });
    }
}
