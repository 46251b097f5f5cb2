/**
 * @fileoverview Constants for the Surface module.
 * @module modules/surface/constants
 * @version 1.0.0
 */

import type { SurfaceManagerConfig } from './types';

/**
 * Floating window size: 16:9, anchored bottom-right.
 */
export const FLOATING_WIDTH = 480;
export const FLOATING_HEIGHT = 270;
export const FLOATING_MARGIN = 12;

export const DEFAULT_SURFACE_CONFIG: SurfaceManagerConfig = {
    floating: {
        width: FLOATING_WIDTH,
        height: FLOATING_HEIGHT,
        margin: FLOATING_MARGIN,
    },
    windowTitle: 'channelview',
};

export const SURFACE_TITLE_SUFFIX = {
    fullscreen: 'Fullscreen',
    floating: 'Floating',
} as const;
