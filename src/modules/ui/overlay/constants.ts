/**
 * @fileoverview Overlay constants.
 * @module modules/ui/overlay/constants
 */

import type { PlaybackStatus } from '../../player/types';
import type { OverlayState } from './types';

export const OVERLAY_NONE: OverlayState = { kind: 'none' };

/** Statuses that show the spinner */
export const LOADING_STATUSES: readonly PlaybackStatus[] = ['opening', 'buffering'];

/** Statuses that mean a picture is (or was just) on screen */
export const ACTIVE_STATUSES: readonly PlaybackStatus[] = ['playing', 'paused'];
