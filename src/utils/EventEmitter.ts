/**
 * @fileoverview Typed event emitter with per-handler error isolation.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import type { EventHandler, IDisposable, IEventEmitter, Logger } from './interfaces';
import { createConsoleLogger } from './logger';

type AnyHandler = EventHandler<unknown>;

/**
 * Event emitter used by every stateful component.
 *
 * Emission walks a copy of the handler set, so handlers may subscribe or
 * unsubscribe (themselves or siblings) while an event is being delivered.
 * A handler added during delivery first runs on the next emit.
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private readonly _handlers = new Map<keyof TEventMap, Set<AnyHandler>>();
    private readonly _logger: Logger;

    constructor(logger?: Logger) {
        this._logger = logger ?? createConsoleLogger('EventEmitter');
    }

    public on<K extends keyof TEventMap>(
        event: K,
        handler: EventHandler<TEventMap[K]>
    ): IDisposable {
        let handlers = this._handlers.get(event);
        if (!handlers) {
            handlers = new Set();
            this._handlers.set(event, handlers);
        }
        handlers.add(handler as AnyHandler);
        return { dispose: (): void => this.off(event, handler) };
    }

    public off<K extends keyof TEventMap>(event: K, handler: EventHandler<TEventMap[K]>): void {
        const handlers = this._handlers.get(event);
        if (!handlers) return;
        handlers.delete(handler as AnyHandler);
        if (handlers.size === 0) {
            this._handlers.delete(event);
        }
    }

    public once<K extends keyof TEventMap>(
        event: K,
        handler: EventHandler<TEventMap[K]>
    ): IDisposable {
        const fireOnce = (payload: TEventMap[K]): void => {
            this.off(event, fireOnce);
            handler(payload);
        };
        return this.on(event, fireOnce);
    }

    /**
     * Deliver a payload. Handler errors are logged and not rethrown.
     */
    public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void {
        const handlers = this._handlers.get(event);
        if (!handlers) return;

        for (const handler of [...handlers]) {
            try {
                handler(payload);
            } catch (error) {
                this._logger.error(`Handler error for event '${String(event)}':`, error);
            }
        }
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event === undefined) {
            this._handlers.clear();
            return;
        }
        this._handlers.delete(event);
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._handlers.get(event)?.size ?? 0;
    }
}
