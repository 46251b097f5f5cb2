/**
 * @fileoverview Public API of channelview.
 * @module index
 * @version 1.0.0
 *
 * A host supplies a playback engine and a window host, builds a PlayerSession
 * and forwards UI input to it.
 */

export { PlayerSession, DEFAULT_PLAYER_SESSION_CONFIG } from './PlayerSession';
export type { IPlayerSession, PlayerSessionConfig, PlayerSessionDeps } from './PlayerSession';

export * from './modules/playlist';
export * from './modules/player';
export * from './modules/surface';
export * from './modules/ui/overlay';
export * from './modules/navigation';

export { STORAGE_KEYS } from './config/storageKeys';
export * from './types';
export * from './utils';
