/**
 * @fileoverview Surface error class.
 * @module modules/surface/errors
 * @version 1.0.0
 */

import { AppErrorCode, CodedError } from '../../types/app-errors';

/**
 * A secondary surface could not be presented. Logged only; the player stays
 * on the main surface.
 */
export class SurfaceError extends CodedError {
    constructor(message: string) {
        super(AppErrorCode.SURFACE_UNAVAILABLE, message, true);
        this.name = 'SurfaceError';
    }
}
