/**
 * @fileoverview Playback error construction and formatting.
 * @module modules/player/ErrorHandler
 * @version 1.0.0
 */

import { AppErrorCode, CodedError, describeError } from '../../types/app-errors';
import type { EngineFailure } from './types';
import { PLAYBACK_ERROR_MESSAGES } from './constants';

/**
 * Playback-specific error with AppErrorCode.
 * Always recoverable: re-selecting a channel starts a fresh player.
 */
export class PlaybackError extends CodedError {
    constructor(code: AppErrorCode, message: string) {
        super(code, message, true);
        this.name = 'PlaybackError';
    }
}

/**
 * Format a platform error code as 8 upper-case hex digits (two's complement
 * for negative codes).
 * @example formatErrorCode(-1072875869) === 'C00D36A3'
 */
export function formatErrorCode(errorCode: number): string {
    return (errorCode >>> 0).toString(16).toUpperCase().padStart(8, '0');
}

/**
 * Message shown for an engine-reported failure: `<message> (0x<code>)`.
 */
export function formatEngineFailure(failure: EngineFailure): string {
    return `${failure.message} (0x${formatErrorCode(failure.errorCode)})`;
}

/**
 * Wrap an engine-reported failure.
 */
export function createEngineFailureError(failure: EngineFailure): PlaybackError {
    return new PlaybackError(AppErrorCode.PLAYBACK_FAILED, formatEngineFailure(failure));
}

/**
 * Wrap a failure to resolve or open a source (both adaptive and direct).
 */
export function createResolutionError(error: unknown): PlaybackError {
    return new PlaybackError(
        AppErrorCode.PLAYBACK_RESOLUTION_FAILED,
        `${PLAYBACK_ERROR_MESSAGES.PLAY_FAILED_PREFIX}\n${describeError(error)}`
    );
}
