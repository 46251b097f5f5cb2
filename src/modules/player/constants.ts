/**
 * @fileoverview Constants for the Player module.
 * @module modules/player/constants
 * @version 1.0.0
 */

import type { PlaybackControllerConfig, PlaybackEventType, PlaybackStatus } from './types';

// ============================================
// State Machine
// ============================================

const ANY_STATUS: readonly PlaybackStatus[] = [
    'idle',
    'opening',
    'buffering',
    'playing',
    'paused',
    'failed',
];

/**
 * Valid playback transitions.
 * Key is the event, `from` lists the statuses it may fire in, `to` is the result.
 * Events arriving in any other status are ignored.
 */
export const PLAYBACK_TRANSITIONS: Record<
    PlaybackEventType,
    { readonly from: readonly PlaybackStatus[]; readonly to: PlaybackStatus }
> = {
    playRequested: { from: ANY_STATUS, to: 'opening' },
    engineBuffering: { from: ['opening'], to: 'buffering' },
    enginePlaying: { from: ['opening', 'buffering', 'paused'], to: 'playing' },
    enginePaused: { from: ['playing'], to: 'paused' },
    engineFailed: { from: ANY_STATUS, to: 'failed' },
};

// ============================================
// Resume Nudges
// ============================================

/**
 * Maximum resume nudges after a surface reattachment.
 */
export const MAX_RESUME_NUDGES = 3;

/**
 * Delay before each resume nudge in milliseconds.
 */
export const RESUME_NUDGE_DELAY_MS = 150;

// ============================================
// Audio
// ============================================

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 1;

// ============================================
// Defaults
// ============================================

/**
 * Default controller configuration.
 */
export const DEFAULT_PLAYBACK_CONFIG: PlaybackControllerConfig = {
    initialVolume: 0.5,
    desiredLiveOffsetMs: 2000,
};

// ============================================
// Messages
// ============================================

export const PLAYBACK_ERROR_MESSAGES = {
    PLAY_FAILED_PREFIX: 'Play failed.',
} as const;
