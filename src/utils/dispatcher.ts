/**
 * @fileoverview UI-thread marshalling for asynchronous engine callbacks.
 * @module utils/dispatcher
 * @version 1.0.0
 */

/**
 * Marshals work onto the single logical UI thread.
 * Engine and network completions call `enqueue`; they never touch shared
 * state directly.
 */
export interface IUiDispatcher {
    enqueue(task: () => void): void;
}

/**
 * Runs each task on a fresh microtask, after the current call stack unwinds.
 */
export class MicrotaskDispatcher implements IUiDispatcher {
    public enqueue(task: () => void): void {
        queueMicrotask(task);
    }
}

/**
 * Runs tasks inline. For hosts whose callbacks already arrive on the UI thread.
 * Tasks queued while another is running are drained in order afterwards.
 */
export class SynchronousDispatcher implements IUiDispatcher {
    private readonly _pending: Array<() => void> = [];
    private _draining = false;

    public enqueue(task: () => void): void {
        this._pending.push(task);
        if (this._draining) {
            return;
        }
        this._draining = true;
        try {
            let next = this._pending.shift();
            while (next) {
                next();
                next = this._pending.shift();
            }
        } finally {
            this._draining = false;
        }
    }
}
