/**
 * @fileoverview Floating window placement.
 * @module modules/surface/floatingGeometry
 * @version 1.0.0
 */

import type { FloatingLayout, Rect } from './types';

/**
 * Bottom-right corner of the work area, inset by the margin.
 * On a work area too small for the window, it pins to the top-left inset instead
 * of going off-screen.
 */
export function computeFloatingBounds(workArea: Rect, layout: FloatingLayout): Rect {
    const { width, height, margin } = layout;
    return {
        x: Math.max(workArea.x + margin, workArea.x + workArea.width - width - margin),
        y: Math.max(workArea.y + margin, workArea.y + workArea.height - height - margin),
        width,
        height,
    };
}
