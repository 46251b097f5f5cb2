/**
 * @fileoverview Public exports for the Player module.
 * @module modules/player
 * @version 1.0.0
 */

export { PlaybackController } from './PlaybackController';
export { PlaybackEngineAdapter } from './PlaybackEngineAdapter';
export { ResumeNudger } from './ResumeNudger';
export { nextPlaybackStatus, engineStateToEvent } from './playbackTransitions';
export {
    PlaybackError,
    formatErrorCode,
    formatEngineFailure,
    createEngineFailureError,
    createResolutionError,
} from './ErrorHandler';

// Interfaces
export type { IPlaybackEngine, IEnginePlayer, IPlaybackController } from './interfaces';
export type { PlaybackControllerDeps } from './PlaybackController';
export type { ResumeTarget } from './ResumeNudger';

// Types
export type {
    PlaybackStatus,
    EngineState,
    EngineFailure,
    PlaybackEvent,
    PlaybackEventType,
    EngineNotification,
    EngineSource,
    AdaptiveResolveOptions,
    AdaptiveResolution,
    EnginePlayerInit,
    PlaybackControllerConfig,
    PlaybackSnapshot,
    PlaybackControllerEventMap,
} from './types';

// Constants
export {
    PLAYBACK_TRANSITIONS,
    DEFAULT_PLAYBACK_CONFIG,
    MAX_RESUME_NUDGES,
    RESUME_NUDGE_DELAY_MS,
} from './constants';
