/**
 * @fileoverview Type definitions for the Surface module.
 * @module modules/surface/types
 * @version 1.0.0
 */

// ============================================
// Surfaces
// ============================================

/**
 * The three mutually exclusive presentation surfaces.
 * Exactly one owns the player at any time.
 */
export type Surface = 'main' | 'fullscreen' | 'floating';

/**
 * Surfaces hosted in their own window.
 */
export type SecondarySurface = Exclude<Surface, 'main'>;

// ============================================
// Geometry
// ============================================

export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * A display, as seen from the main window.
 */
export interface DisplayInfo {
    /** Whole display, used by fullscreen */
    bounds: Rect;
    /** Display minus taskbars/docks, used by floating */
    workArea: Rect;
}

/**
 * Fixed compact size for the floating surface.
 */
export interface FloatingLayout {
    width: number;
    height: number;
    /** Gap from the work area's edges */
    margin: number;
}

// ============================================
// Windows
// ============================================

/**
 * Request to create a secondary presentation window.
 */
export interface SecondaryWindowOptions {
    surface: SecondarySurface;
    title: string;
    bounds: Rect;
    /** Always-on-top compact presentation */
    alwaysOnTop: boolean;
}

// ============================================
// Manager
// ============================================

/**
 * Surface manager configuration.
 */
export interface SurfaceManagerConfig {
    floating: FloatingLayout;
    /** Title prefix for secondary windows */
    windowTitle: string;
}

export interface SurfaceChangeEvent {
    from: Surface;
    to: Surface;
}

/**
 * Typed event map for surface events.
 */
export interface SurfaceManagerEventMap {
    /** Emitted after every completed enter or exit */
    surfaceChange: SurfaceChangeEvent;
    /** Index signature for EventEmitter compatibility */
    [key: string]: unknown;
}
