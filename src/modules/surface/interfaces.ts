/**
 * @fileoverview Interface definitions for the Surface module.
 * @module modules/surface/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { IEnginePlayer } from '../player/interfaces';
import type {
    DisplayInfo,
    Rect,
    SecondaryWindowOptions,
    Surface,
    SurfaceManagerEventMap,
} from './types';

/**
 * An element that can present a player. Attaching null releases it.
 */
export interface IVideoHost {
    attach(player: IEnginePlayer | null): void;
}

/**
 * The application's main window.
 */
export interface IMainWindow {
    readonly host: IVideoHost;
    getBounds(): Rect;
    setBounds(bounds: Rect): void;
    minimize(): void;
    /** Restore from minimized and bring to the foreground */
    restore(): void;
    /** Show or hide in the taskbar and window switcher */
    setShownInSwitchers(shown: boolean): void;
}

/**
 * A fullscreen or floating window created on demand.
 */
export interface ISecondaryWindow {
    readonly host: IVideoHost;
    setShownInSwitchers(shown: boolean): void;
    activate(): void;
    close(): void;
    /** Fires when the window closes for any reason; returns unsubscribe */
    onClosed(callback: () => void): () => void;
}

/**
 * Window system collaborator.
 */
export interface IWindowHost {
    readonly main: IMainWindow;
    /** Display the main window occupies (nearest, if straddling) */
    getDisplayForMain(): DisplayInfo;
    createSecondaryWindow(options: SecondaryWindowOptions): Promise<ISecondaryWindow>;
}

/**
 * Surface Manager Interface.
 * Owns which surface presents the player; all requests are serialized.
 */
export interface ISurfaceManager {
    getActiveSurface(): Surface;

    /**
     * Present a (new) player on the active surface immediately.
     * Not queued: the caller releases its previous player right after.
     */
    attachPlayer(player: IEnginePlayer | null): void;

    enterFullscreen(): Promise<void>;
    exitFullscreen(): Promise<void>;
    toggleFullscreen(): Promise<void>;

    enterFloating(): Promise<void>;
    exitFloating(): Promise<void>;
    toggleFloating(): Promise<void>;

    /**
     * Exit whichever secondary surface is active.
     * @returns whether there was one to exit
     */
    exitActiveSecondary(): Promise<boolean>;

    /** Stop any pending post-exit resume nudges. */
    cancelResumeNudges(): void;

    on<K extends keyof SurfaceManagerEventMap>(
        event: K,
        handler: (payload: SurfaceManagerEventMap[K]) => void
    ): IDisposable;

    dispose(): void;
}
