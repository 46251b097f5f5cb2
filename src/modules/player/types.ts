/**
 * @fileoverview Type definitions for the Player module.
 * @module modules/player/types
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';

// ============================================
// Playback State
// ============================================

/**
 * Controller-level playback status. One per live engine handle.
 */
export type PlaybackStatus =
    | 'idle'
    | 'opening'
    | 'buffering'
    | 'playing'
    | 'paused'
    | 'failed';

/**
 * State as reported by the external engine's session.
 * `none` is reported when no source is loaded and maps to no transition.
 */
export type EngineState = 'none' | 'opening' | 'buffering' | 'playing' | 'paused';

/**
 * Failure reported by the engine after a source was attached.
 */
export interface EngineFailure {
    /** Engine's own error text */
    message: string;
    /** Platform error code (formatted as 8-digit hex for display) */
    errorCode: number;
}

/**
 * Events accepted by the playback transition table.
 */
export type PlaybackEvent =
    | { type: 'playRequested' }
    | { type: 'engineBuffering' }
    | { type: 'enginePlaying' }
    | { type: 'enginePaused' }
    | { type: 'engineFailed' };

export type PlaybackEventType = PlaybackEvent['type'];

/**
 * Normalized engine callback, tagged with the generation of the play
 * request that created the handle.
 */
export type EngineNotification =
    | { kind: 'opened'; generation: number }
    | { kind: 'state'; generation: number; event: PlaybackEvent }
    | { kind: 'failed'; generation: number; failure: EngineFailure };

// ============================================
// Sources
// ============================================

/**
 * An engine-owned media source. Opaque to the controller beyond its origin.
 */
export interface EngineSource {
    readonly kind: 'adaptive' | 'direct';
    readonly url: string;
}

/**
 * Options for adaptive manifest resolution.
 */
export interface AdaptiveResolveOptions {
    /** Desired distance behind the live edge; best-effort */
    desiredLiveOffsetMs: number;
    /** Extra request headers, passed through untouched */
    headers?: Record<string, string>;
}

/**
 * Outcome of adaptive resolution. A failure triggers the direct fallback.
 */
export type AdaptiveResolution =
    | { status: 'success'; source: EngineSource }
    | { status: 'failure'; reason: string };

/**
 * Initial audio settings for a freshly created player.
 */
export interface EnginePlayerInit {
    volume: number;
    muted: boolean;
}

// ============================================
// Controller
// ============================================

/**
 * Controller configuration.
 */
export interface PlaybackControllerConfig {
    /** Volume for the very first player (0.0 to 1.0) */
    initialVolume: number;
    /** Desired live offset passed to adaptive resolution */
    desiredLiveOffsetMs: number;
    /** Headers forwarded to adaptive resolution */
    adaptiveHeaders?: Record<string, string>;
}

/**
 * Read-only view of the controller.
 */
export interface PlaybackSnapshot {
    status: PlaybackStatus;
    /** Generation of the most recent play request, 0 before any */
    generation: number;
    /** URL of the most recent play request */
    url: string | null;
    volume: number;
    muted: boolean;
    /** Whether any stream reached Playing this session */
    everPlayed: boolean;
}

/**
 * Typed event map for controller events.
 */
export interface PlaybackControllerEventMap {
    /** Every accepted status transition */
    statusChange: { from: PlaybackStatus; to: PlaybackStatus; generation: number };
    /** User-visible failure of the current play request */
    failed: { error: AppError; generation: number };
    /** Engine reported the current source as opened */
    opened: { generation: number };
    /** Index signature for EventEmitter compatibility */
    [key: string]: unknown;
}
