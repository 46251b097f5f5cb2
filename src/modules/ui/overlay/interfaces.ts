/**
 * @fileoverview Overlay interfaces.
 * @module modules/ui/overlay/interfaces
 */

import type { IDisposable } from '../../../utils/interfaces';
import type { OverlayCoordinatorEventMap, OverlayState } from './types';

/**
 * Host-side renderer. Receives every distinct overlay state.
 */
export interface IOverlayView {
    render(state: OverlayState): void;
}

export interface IOverlayCoordinator {
    getState(): OverlayState;
    /** Recompute from current inputs; renders and emits only on change */
    refresh(): OverlayState;
    showError(message: string): void;
    dismissError(): void;
    hasError(): boolean;
    on<K extends keyof OverlayCoordinatorEventMap>(
        event: K,
        handler: (payload: OverlayCoordinatorEventMap[K]) => void
    ): IDisposable;
    dispose(): void;
}
