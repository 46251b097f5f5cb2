/**
 * @fileoverview Exclusive ownership of the player across presentation surfaces.
 * @module modules/surface/SurfaceManager
 * @version 1.0.0
 *
 * Handoff is always attach-new-then-release-old:
 * - enter: attach to the new window's host, then release main's host, then
 *   hand the taskbar to the new window and minimize main.
 * - exit: attach to main's host, then release and close the secondary
 *   window, then restore main.
 *
 * Requests are serialized through a promise chain. Every exit path (API,
 * accelerator, OS close) funnels into one synchronous routine that clears
 * the secondary record first, so duplicate or re-entrant exits are no-ops.
 */

import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable, Logger } from '../../utils/interfaces';
import { createConsoleLogger } from '../../utils/logger';
import { describeError } from '../../types/app-errors';
import type { IEnginePlayer } from '../player/interfaces';
import { ResumeNudger, type ResumeTarget } from '../player/ResumeNudger';
import type { ISecondaryWindow, ISurfaceManager, IVideoHost, IWindowHost } from './interfaces';
import type {
    Rect,
    SecondarySurface,
    Surface,
    SurfaceManagerConfig,
    SurfaceManagerEventMap,
} from './types';
import { computeFloatingBounds } from './floatingGeometry';
import { SurfaceError } from './errors';
import { DEFAULT_SURFACE_CONFIG, SURFACE_TITLE_SUFFIX } from './constants';

/**
 * Collaborators required by the surface manager.
 */
export interface SurfaceManagerDeps {
    windows: IWindowHost;
    /** Playback as seen by the post-exit resume nudges */
    resumeTarget: ResumeTarget;
    nudger?: ResumeNudger;
    logger?: Logger;
}

/**
 * The live secondary window and its close subscription.
 */
interface SecondaryRecord {
    surface: SecondarySurface;
    window: ISecondaryWindow;
    unsubscribeClosed: () => void;
}

export class SurfaceManager implements ISurfaceManager {
    private readonly _emitter: EventEmitter<SurfaceManagerEventMap> = new EventEmitter();
    private readonly _config: SurfaceManagerConfig;
    private readonly _windows: IWindowHost;
    private readonly _resumeTarget: ResumeTarget;
    private readonly _nudger: ResumeNudger;
    private readonly _logger: Logger;

    private _active: Surface = 'main';
    private _secondary: SecondaryRecord | null = null;
    private _player: IEnginePlayer | null = null;
    private _savedMainBounds: Rect | null = null;
    private _queue: Promise<void> = Promise.resolve();
    private _disposed = false;

    constructor(deps: SurfaceManagerDeps, config: Partial<SurfaceManagerConfig> = {}) {
        this._config = { ...DEFAULT_SURFACE_CONFIG, ...config };
        this._windows = deps.windows;
        this._resumeTarget = deps.resumeTarget;
        this._logger = deps.logger ?? createConsoleLogger('SurfaceManager');
        this._nudger = deps.nudger ?? new ResumeNudger(undefined, undefined, this._logger);
    }

    public getActiveSurface(): Surface {
        return this._active;
    }

    public attachPlayer(player: IEnginePlayer | null): void {
        this._player = player;
        this._activeHost().attach(player);
    }

    // ========================================
    // Requests
    // ========================================

    public enterFullscreen(): Promise<void> {
        return this._enqueue(() => this._enter('fullscreen'));
    }

    public exitFullscreen(): Promise<void> {
        return this._enqueue(() => {
            this._exit('fullscreen');
        });
    }

    public toggleFullscreen(): Promise<void> {
        return this._enqueue(async () => {
            if (this._active === 'fullscreen') {
                this._exit('fullscreen');
            } else {
                await this._enter('fullscreen');
            }
        });
    }

    public enterFloating(): Promise<void> {
        return this._enqueue(() => this._enter('floating'));
    }

    public exitFloating(): Promise<void> {
        return this._enqueue(() => {
            this._exit('floating');
        });
    }

    public toggleFloating(): Promise<void> {
        return this._enqueue(async () => {
            if (this._active === 'floating') {
                this._exit('floating');
            } else {
                await this._enter('floating');
            }
        });
    }

    public async exitActiveSecondary(): Promise<boolean> {
        let exited = false;
        await this._enqueue(() => {
            exited = this._exit(null);
        });
        return exited;
    }

    public cancelResumeNudges(): void {
        this._nudger.cancel();
    }

    public on<K extends keyof SurfaceManagerEventMap>(
        event: K,
        handler: (payload: SurfaceManagerEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    /**
     * Close any secondary window and leave every host empty. The player
     * itself belongs to the caller, who disposes it next.
     */
    public dispose(): void {
        this._disposed = true;
        this._exit(null);
        this._nudger.cancel();
        this._windows.main.host.attach(null);
        this._player = null;
        this._emitter.removeAllListeners();
    }

    // ========================================
    // Protocol
    // ========================================

    private async _enter(surface: SecondarySurface): Promise<void> {
        if (this._disposed || this._active === surface) {
            return;
        }
        // Only one secondary surface at a time.
        if (this._secondary) {
            this._exit(this._secondary.surface);
        }

        // Resolve geometry before any visible change.
        const display = this._windows.getDisplayForMain();
        const bounds = surface === 'fullscreen'
            ? { ...display.bounds }
            : computeFloatingBounds(display.workArea, this._config.floating);

        let window: ISecondaryWindow;
        try {
            window = await this._windows.createSecondaryWindow({
                surface,
                title: `${this._config.windowTitle} ${SURFACE_TITLE_SUFFIX[surface]}`,
                bounds,
                alwaysOnTop: surface === 'floating',
            });
        } catch (error) {
            const failure = new SurfaceError(`Could not create ${surface} window: ${describeError(error)}`);
            this._logger.error(failure.message);
            return;
        }

        if (this._disposed) {
            window.close();
            return;
        }

        window.host.attach(this._player);
        this._windows.main.host.attach(null);

        this._savedMainBounds = this._windows.main.getBounds();
        window.setShownInSwitchers(true);
        this._windows.main.setShownInSwitchers(false);
        this._windows.main.minimize();
        window.activate();

        const unsubscribeClosed = window.onClosed(() => this._handleWindowClosed(window));
        this._secondary = { surface, window, unsubscribeClosed };
        this._setActive(surface);
    }

    /**
     * Single exit routine.
     * @param surface - Only exit if this surface is active; null for whichever
     * @returns whether anything was exited
     */
    private _exit(surface: SecondarySurface | null): boolean {
        const secondary = this._secondary;
        if (!secondary || (surface !== null && secondary.surface !== surface)) {
            return false;
        }
        this._secondary = null;
        secondary.unsubscribeClosed();

        const wasPlaying = this._resumeTarget.isPlaying();
        const main = this._windows.main;

        main.host.attach(this._player);
        secondary.window.host.attach(null);
        try {
            secondary.window.close();
        } catch (error) {
            this._logger.warn(`Closing ${secondary.surface} window failed`, error);
        }

        main.setShownInSwitchers(true);
        main.restore();
        if (this._savedMainBounds) {
            main.setBounds(this._savedMainBounds);
            this._savedMainBounds = null;
        }

        this._setActive('main');

        if (wasPlaying && !this._disposed) {
            this._nudger.start(this._resumeTarget);
        }
        return true;
    }

    private _handleWindowClosed(window: ISecondaryWindow): void {
        if (this._secondary?.window !== window) {
            return;
        }
        this._enqueue(() => {
            if (this._secondary?.window === window) {
                this._exit(this._secondary.surface);
            }
        }).catch((error: unknown) => {
            this._logger.error('Exit after window close failed', error);
        });
    }

    // ========================================
    // Helpers
    // ========================================

    private _activeHost(): IVideoHost {
        return this._secondary ? this._secondary.window.host : this._windows.main.host;
    }

    private _setActive(surface: Surface): void {
        const from = this._active;
        if (from === surface) return;
        this._active = surface;
        this._logger.debug(`Surface ${from} -> ${surface}`);
        this._emitter.emit('surfaceChange', { from, to: surface });
    }

    /**
     * Run an operation after every earlier one has settled.
     * The returned promise carries the operation's own outcome.
     */
    private _enqueue(operation: () => Promise<void> | void): Promise<void> {
        const run = this._queue.then(operation);
        this._queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }
}
