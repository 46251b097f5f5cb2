/**
 * @fileoverview Overlay derivation.
 * @module modules/ui/overlay/computeOverlayState
 * @version 1.0.0
 */

import type { OverlayInputs, OverlayState } from './types';
import { ACTIVE_STATUSES, LOADING_STATUSES, OVERLAY_NONE } from './constants';

/**
 * Priority, highest first: error, loading, welcome, none.
 *
 * Welcome needs a loaded catalog, no successful open yet this session, and
 * nothing playing, paused or loading.
 */
export function computeOverlayState(inputs: OverlayInputs): OverlayState {
    if (inputs.errorMessage !== null) {
        return { kind: 'error', message: inputs.errorMessage };
    }
    const loading = LOADING_STATUSES.includes(inputs.status);
    if (loading) {
        return { kind: 'loading' };
    }
    const active = ACTIVE_STATUSES.includes(inputs.status);
    if (inputs.hasCatalog && !inputs.everPlayed && !active) {
        return { kind: 'welcome' };
    }
    return OVERLAY_NONE;
}

export function isSameOverlayState(a: OverlayState, b: OverlayState): boolean {
    if (a.kind === 'error' && b.kind === 'error') {
        return a.message === b.message;
    }
    return a.kind === b.kind;
}
