/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.0.0
 */

export { EventEmitter } from './EventEmitter';
export { createConsoleLogger, silentLogger } from './logger';
export { MicrotaskDispatcher, SynchronousDispatcher } from './dispatcher';
export { redactSensitiveTokens } from './redact';
export {
    getDefaultStore,
    safeStoreGet,
    isStoredTrue,
} from './storage';
export type { KeyValueStore } from './storage';
export type { IUiDispatcher } from './dispatcher';
export type { IEventEmitter, IDisposable, Logger, EventHandler } from './interfaces';
