/**
 * @fileoverview Public exports for the Navigation module.
 * @module modules/navigation
 * @version 1.0.0
 */

export { ShortcutHandler } from './ShortcutHandler';
export { SHORTCUT_KEY_MAP, DEFAULT_VOLUME_STEP, DEFAULT_SHORTCUT_CONFIG } from './constants';
export type {
    ShortcutCommand,
    ShortcutKeyEvent,
    IShortcutTarget,
    IShortcutHandler,
    ShortcutHandlerConfig,
} from './interfaces';
