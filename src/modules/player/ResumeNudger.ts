/**
 * @fileoverview Bounded resume nudges after a surface reattachment.
 * @module modules/player/ResumeNudger
 * @version 1.0.0
 *
 * Moving a player between hosts can leave it paused on some engines. A run
 * issues a few delayed nudges, stopping as soon as the player reports
 * playing; after the last one the nudger gives up without reporting.
 */

import type { Logger } from '../../utils/interfaces';
import { createConsoleLogger } from '../../utils/logger';
import { MAX_RESUME_NUDGES, RESUME_NUDGE_DELAY_MS } from './constants';

/**
 * What the nudger needs from playback.
 */
export interface ResumeTarget {
    isPlaying(): boolean;
    nudge(): void;
}

export class ResumeNudger {
    /** Nudges issued in the current run */
    private _attempt = 0;

    /** Pending nudge timer */
    private _timer: ReturnType<typeof setTimeout> | null = null;

    private readonly _maxAttempts: number;
    private readonly _delayMs: number;
    private readonly _logger: Logger;

    constructor(
        maxAttempts: number = MAX_RESUME_NUDGES,
        delayMs: number = RESUME_NUDGE_DELAY_MS,
        logger?: Logger
    ) {
        this._maxAttempts = Math.max(0, Math.floor(maxAttempts));
        this._delayMs = Math.max(0, delayMs);
        this._logger = logger ?? createConsoleLogger('ResumeNudger');
    }

    /**
     * Start a run, cancelling any previous one.
     * Playback is only checked when each timer fires: engine state changes
     * caused by the reattachment arrive after this call.
     */
    public start(target: ResumeTarget): void {
        this.cancel();
        if (this._maxAttempts === 0) {
            return;
        }
        this._schedule(target);
    }

    /**
     * Cancel the pending nudge, if any.
     */
    public cancel(): void {
        if (this._timer) {
            clearTimeout(this._timer);
            this._timer = null;
        }
        this._attempt = 0;
    }

    public isActive(): boolean {
        return this._timer !== null;
    }

    /**
     * Nudges issued in the current (or last) run.
     */
    public getAttemptCount(): number {
        return this._attempt;
    }

    private _schedule(target: ResumeTarget): void {
        this._timer = setTimeout(() => {
            this._timer = null;
            if (target.isPlaying()) {
                return;
            }
            this._attempt++;
            this._logger.debug(`Resume nudge ${this._attempt}/${this._maxAttempts}`);
            target.nudge();
            if (this._attempt < this._maxAttempts) {
                this._schedule(target);
            }
        }, this._delayMs);
    }
}
