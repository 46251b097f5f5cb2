/**
 * @fileoverview Maps key presses to player commands.
 * @module modules/navigation/ShortcutHandler
 * @version 1.0.0
 *
 * Binding to the window's key events stays with the host; it forwards each
 * press here and suppresses the default action when a command ran.
 */

import type { Logger } from '../../utils/interfaces';
import { createConsoleLogger } from '../../utils/logger';
import type {
    IShortcutHandler,
    IShortcutTarget,
    ShortcutCommand,
    ShortcutHandlerConfig,
    ShortcutKeyEvent,
} from './interfaces';
import { DEFAULT_SHORTCUT_CONFIG, SHORTCUT_KEY_MAP } from './constants';

export class ShortcutHandler implements IShortcutHandler {
    private readonly _config: ShortcutHandlerConfig;
    private readonly _logger: Logger;

    constructor(
        private readonly _target: IShortcutTarget,
        config: Partial<ShortcutHandlerConfig> = {},
        logger?: Logger
    ) {
        this._config = { ...DEFAULT_SHORTCUT_CONFIG, ...config };
        this._logger = logger ?? createConsoleLogger('ShortcutHandler');
    }

    public mapKey(key: string): ShortcutCommand | null {
        const command = SHORTCUT_KEY_MAP.get(key);
        return command !== undefined ? command : null;
    }

    public handleKey(event: ShortcutKeyEvent): ShortcutCommand | null {
        // Typing in a text box must not drive the player.
        if (event.textInputFocused) {
            return null;
        }
        const command = this.mapKey(event.key);
        if (command === null) {
            return null;
        }
        this._logger.debug(`Shortcut ${JSON.stringify(event.key)} -> ${command}`);
        this._run(command);
        return command;
    }

    private _run(command: ShortcutCommand): void {
        switch (command) {
            case 'togglePlayPause':
                this._target.togglePlayPause();
                return;
            case 'volumeUp':
                this._target.adjustVolume(this._config.volumeStep);
                return;
            case 'volumeDown':
                this._target.adjustVolume(-this._config.volumeStep);
                return;
            case 'toggleMute':
                this._target.toggleMute();
                return;
            case 'toggleFullscreen':
                this._settle(command, this._target.toggleFullscreen());
                return;
            case 'toggleFloating':
                this._settle(command, this._target.toggleFloating());
                return;
            case 'exitSecondary':
                this._settle(command, this._target.exitActiveSecondary());
                return;
        }
    }

    private _settle(command: ShortcutCommand, pending: Promise<unknown>): void {
        pending.catch((error: unknown) => {
            this._logger.error(`Shortcut ${command} failed`, error);
        });
    }
}
