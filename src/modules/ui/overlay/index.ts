/**
 * @fileoverview Overlay exports.
 * @module modules/ui/overlay
 */

export { OverlayCoordinator } from './OverlayCoordinator';
export { computeOverlayState, isSameOverlayState } from './computeOverlayState';
export { OVERLAY_NONE, LOADING_STATUSES, ACTIVE_STATUSES } from './constants';
export type { IOverlayView, IOverlayCoordinator } from './interfaces';
export type { OverlayCoordinatorDeps } from './OverlayCoordinator';
export type {
    OverlayState,
    OverlayKind,
    OverlayInputs,
    OverlaySessionInputs,
    OverlayCoordinatorEventMap,
} from './types';
