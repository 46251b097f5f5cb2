/**
 * @fileoverview Public exports for the Surface module.
 * @module modules/surface
 * @version 1.0.0
 */

export { SurfaceManager } from './SurfaceManager';
export { SurfaceError } from './errors';
export { computeFloatingBounds } from './floatingGeometry';

// Interfaces
export type {
    ISurfaceManager,
    IWindowHost,
    IMainWindow,
    ISecondaryWindow,
    IVideoHost,
} from './interfaces';
export type { SurfaceManagerDeps } from './SurfaceManager';

// Types
export type {
    Surface,
    SecondarySurface,
    Rect,
    DisplayInfo,
    FloatingLayout,
    SecondaryWindowOptions,
    SurfaceManagerConfig,
    SurfaceChangeEvent,
    SurfaceManagerEventMap,
} from './types';

// Constants
export { DEFAULT_SURFACE_CONFIG, FLOATING_WIDTH, FLOATING_HEIGHT, FLOATING_MARGIN } from './constants';
