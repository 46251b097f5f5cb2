/**
 * @fileoverview Overlay coordinator: owns the error message and pushes the
 * derived overlay to the view.
 * @module modules/ui/overlay/OverlayCoordinator
 * @version 1.0.0
 */

import { EventEmitter } from '../../../utils/EventEmitter';
import type { IDisposable, Logger } from '../../../utils/interfaces';
import { createConsoleLogger } from '../../../utils/logger';
import type { IOverlayCoordinator, IOverlayView } from './interfaces';
import type { OverlayCoordinatorEventMap, OverlaySessionInputs, OverlayState } from './types';
import { computeOverlayState, isSameOverlayState } from './computeOverlayState';
import { OVERLAY_NONE } from './constants';

export interface OverlayCoordinatorDeps {
    getInputs: () => OverlaySessionInputs;
    view?: IOverlayView | null;
    logger?: Logger;
}

export class OverlayCoordinator implements IOverlayCoordinator {
    private readonly _emitter: EventEmitter<OverlayCoordinatorEventMap> = new EventEmitter();
    private readonly _logger: Logger;
    private _errorMessage: string | null = null;
    private _state: OverlayState = OVERLAY_NONE;
    private _disposed = false;

    constructor(private readonly deps: OverlayCoordinatorDeps) {
        this._logger = deps.logger ?? createConsoleLogger('Overlay');
    }

    getState(): OverlayState {
        return this._state;
    }

    hasError(): boolean {
        return this._errorMessage !== null;
    }

    showError(message: string): void {
        this._errorMessage = message;
        this.refresh();
    }

    dismissError(): void {
        if (this._errorMessage === null) return;
        this._errorMessage = null;
        this.refresh();
    }

    refresh(): OverlayState {
        if (this._disposed) return this._state;

        const next = computeOverlayState({
            ...this.deps.getInputs(),
            errorMessage: this._errorMessage,
        });
        if (isSameOverlayState(this._state, next)) {
            return this._state;
        }

        const from = this._state;
        this._state = next;
        this._logger.debug(`Overlay ${from.kind} -> ${next.kind}`);
        this.deps.view?.render(next);
        this._emitter.emit('overlayChange', { from, to: next });
        return next;
    }

    on<K extends keyof OverlayCoordinatorEventMap>(
        event: K,
        handler: (payload: OverlayCoordinatorEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    dispose(): void {
        this._disposed = true;
        this._emitter.removeAllListeners();
    }
}
