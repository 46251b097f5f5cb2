/**
 * @fileoverview Playlist error class.
 * @module modules/playlist/errors
 * @version 1.0.0
 */

import { AppErrorCode, CodedError } from '../../types/app-errors';

/**
 * Playlist-specific error with AppErrorCode.
 * Parse problems are never errors; only fetch, file and input failures are.
 */
export class PlaylistError extends CodedError {
    constructor(code: AppErrorCode, message: string, recoverable = true) {
        super(code, message, recoverable);
        this.name = 'PlaylistError';
    }
}

/**
 * Network-level failure fetching a playlist (transport error or non-2xx).
 */
export class NetworkError extends Error {
    public readonly status: number | null;

    constructor(message: string, status: number | null = null) {
        super(message);
        this.name = 'NetworkError';
        this.status = status;
    }
}
