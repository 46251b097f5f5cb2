/**
 * @fileoverview Overlay types.
 * @module modules/ui/overlay/types
 * @version 1.0.0
 */

import type { PlaybackStatus } from '../../player/types';

/**
 * What is drawn over (or instead of) the video. Derived, never stored.
 */
export type OverlayState =
    | { kind: 'none' }
    | { kind: 'welcome' }
    | { kind: 'loading' }
    | { kind: 'error'; message: string };

export type OverlayKind = OverlayState['kind'];

/**
 * Everything the overlay depends on.
 */
export interface OverlayInputs {
    /** A catalog with at least one channel is loaded */
    hasCatalog: boolean;
    status: PlaybackStatus;
    /** Some source has opened at least once this session */
    everPlayed: boolean;
    /** Message of the visible error, or null */
    errorMessage: string | null;
}

/**
 * Inputs the coordinator reads from the session on every refresh.
 */
export type OverlaySessionInputs = Omit<OverlayInputs, 'errorMessage'>;

export interface OverlayCoordinatorEventMap {
    overlayChange: { from: OverlayState; to: OverlayState };
    /** Index signature for EventEmitter compatibility */
    [key: string]: unknown;
}
