/**
 * @fileoverview Pure playback status reducer over the transition table.
 * @module modules/player/playbackTransitions
 * @version 1.0.0
 */

import type { EngineState, PlaybackEvent, PlaybackStatus } from './types';
import { PLAYBACK_TRANSITIONS } from './constants';

/**
 * Next status for an event, or null when the table has no such transition.
 * An event that lands on the current status returns that status.
 */
export function nextPlaybackStatus(from: PlaybackStatus, event: PlaybackEvent): PlaybackStatus | null {
    const transition = PLAYBACK_TRANSITIONS[event.type];
    if (transition.to === from) {
        return from;
    }
    return transition.from.includes(from) ? transition.to : null;
}

/**
 * Map an engine session state onto a table event.
 * `none` carries no transition.
 */
export function engineStateToEvent(state: EngineState): PlaybackEvent | null {
    switch (state) {
        case 'opening':
        case 'buffering':
            return { type: 'engineBuffering' };
        case 'playing':
            return { type: 'enginePlaying' };
        case 'paused':
            return { type: 'enginePaused' };
        case 'none':
            return null;
    }
}
