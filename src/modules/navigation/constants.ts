/**
 * @fileoverview Keyboard shortcut constants.
 * @module modules/navigation/constants
 * @version 1.0.0
 */

import type { ShortcutCommand, ShortcutHandlerConfig } from './interfaces';

/**
 * KeyboardEvent.key values to commands. Letters are bound in both cases.
 */
export const SHORTCUT_KEY_MAP: Map<string, ShortcutCommand> = new Map([
    [' ', 'togglePlayPause'],
    ['Spacebar', 'togglePlayPause'],
    ['ArrowUp', 'volumeUp'],
    ['ArrowDown', 'volumeDown'],
    ['m', 'toggleMute'],
    ['M', 'toggleMute'],
    ['f', 'toggleFullscreen'],
    ['F', 'toggleFullscreen'],
    ['p', 'toggleFloating'],
    ['P', 'toggleFloating'],
    ['Escape', 'exitSecondary'],
]);

export const DEFAULT_VOLUME_STEP = 0.05;

export const DEFAULT_SHORTCUT_CONFIG: ShortcutHandlerConfig = {
    volumeStep: DEFAULT_VOLUME_STEP,
};
