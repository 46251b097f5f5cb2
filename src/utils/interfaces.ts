/**
 * @fileoverview Interface definitions shared by the utils module.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Handle returned by subscriptions; `dispose()` unsubscribes.
 */
export interface IDisposable {
    dispose(): void;
}

/**
 * Minimal leveled logger. Modules accept one of these and fall back to a
 * console-backed logger carrying their module prefix.
 */
export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

/**
 * Handler for one event of an event map.
 */
export type EventHandler<TPayload> = (payload: TPayload) => void;

/**
 * Typed publish/subscribe. A throwing handler is logged and skipped; the
 * remaining handlers still run.
 *
 * @example
 * ```typescript
 * const emitter: IEventEmitter<{ catalogReplaced: { size: number } }> = new EventEmitter();
 * emitter.on('catalogReplaced', ({ size }) => renderCount(size));
 * ```
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    on<K extends keyof TEventMap>(event: K, handler: EventHandler<TEventMap[K]>): IDisposable;
    off<K extends keyof TEventMap>(event: K, handler: EventHandler<TEventMap[K]>): void;
    /** Handler is removed before its first call */
    once<K extends keyof TEventMap>(event: K, handler: EventHandler<TEventMap[K]>): IDisposable;
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;
    /** Drop the handlers of one event, or of every event when omitted */
    removeAllListeners(event?: keyof TEventMap): void;
    listenerCount(event: keyof TEventMap): number;
}
