/**
 * @fileoverview Keyboard shortcut interfaces.
 * @module modules/navigation/interfaces
 * @version 1.0.0
 */

/**
 * Commands reachable from the keyboard.
 */
export type ShortcutCommand =
    | 'togglePlayPause'
    | 'volumeUp'
    | 'volumeDown'
    | 'toggleMute'
    | 'toggleFullscreen'
    | 'toggleFloating'
    | 'exitSecondary';

/**
 * Host-neutral key press. `key` follows KeyboardEvent.key values.
 */
export interface ShortcutKeyEvent {
    key: string;
    /** A text box, search box or rich edit control has focus */
    textInputFocused?: boolean;
}

/**
 * What the shortcuts drive. Implemented by the player session.
 */
export interface IShortcutTarget {
    togglePlayPause(): void;
    adjustVolume(delta: number): number;
    toggleMute(): boolean;
    toggleFullscreen(): Promise<void>;
    toggleFloating(): Promise<void>;
    exitActiveSecondary(): Promise<boolean>;
}

export interface ShortcutHandlerConfig {
    /** Volume change per ArrowUp/ArrowDown press */
    volumeStep: number;
}

export interface IShortcutHandler {
    /**
     * Map a key to its command.
     * @returns The command or null if the key is not bound
     */
    mapKey(key: string): ShortcutCommand | null;

    /**
     * Run the command bound to a key press.
     * @returns The command that ran, or null when the press was ignored
     */
    handleKey(event: ShortcutKeyEvent): ShortcutCommand | null;
}
