/**
 * @fileoverview Canonical application error taxonomy and base error shape.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for consistent error handling across the app.
 */
export enum AppErrorCode {
    // Playlist Errors (1xx)
    PLAYLIST_FETCH_FAILED = 'PLAYLIST_FETCH_FAILED',
    PLAYLIST_INPUT_INVALID = 'PLAYLIST_INPUT_INVALID',
    PLAYLIST_SLOT_UNCONFIGURED = 'PLAYLIST_SLOT_UNCONFIGURED',
    PLAYLIST_FILE_UNREADABLE = 'PLAYLIST_FILE_UNREADABLE',

    // Playback Errors (2xx)
    PLAYBACK_RESOLUTION_FAILED = 'PLAYBACK_RESOLUTION_FAILED',
    PLAYBACK_FAILED = 'PLAYBACK_FAILED',

    // Surface Errors (3xx)
    SURFACE_UNAVAILABLE = 'SURFACE_UNAVAILABLE',

    // Configuration Errors (4xx)
    CONFIG_INVALID = 'CONFIG_INVALID',

    // Generic
    UNKNOWN = 'UNKNOWN',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** User-facing (or technical, when not surfaced) message */
    message: string;
    /** Whether recovery might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Error subclass carrying an AppErrorCode, thrown across module seams.
 */
export class CodedError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = true) {
        super(message);
        this.name = 'CodedError';
        this.code = code;
        this.recoverable = recoverable;
    }

    toAppError(context?: Record<string, unknown>): AppError {
        return {
            code: this.code,
            message: this.message,
            recoverable: this.recoverable,
            ...(context !== undefined ? { context } : {}),
        };
    }
}

/**
 * Pull a readable message out of anything thrown.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (
        typeof error === 'object' &&
        error !== null &&
        'message' in error &&
        typeof error.message === 'string'
    ) {
        return error.message;
    }
    return String(error);
}

const APP_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(AppErrorCode));

/**
 * Type guard for plain AppError objects (as carried on events).
 */
export function isAppError(value: unknown): value is AppError {
    return (
        typeof value === 'object' &&
        value !== null &&
        'code' in value &&
        typeof value.code === 'string' &&
        APP_ERROR_CODES.has(value.code) &&
        'message' in value &&
        typeof value.message === 'string' &&
        'recoverable' in value &&
        typeof value.recoverable === 'boolean'
    );
}

/**
 * Normalize anything thrown or reported into an AppError.
 */
export function normalizeError(error: unknown): AppError {
    if (error instanceof CodedError) {
        return error.toAppError();
    }
    if (isAppError(error)) {
        return error;
    }
    return {
        code: AppErrorCode.UNKNOWN,
        message: describeError(error),
        recoverable: true,
    };
}
