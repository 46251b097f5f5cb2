/**
 * @fileoverview Channel catalog: the last-loaded channel list plus its label.
 * @module modules/playlist/ChannelCatalog
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable } from '../../utils/interfaces';
import type { IChannelCatalog } from './interfaces';
import type { CatalogSnapshot, Channel, ChannelCatalogEventMap } from './types';

const EMPTY_SNAPSHOT: CatalogSnapshot = Object.freeze({
    channels: Object.freeze([]),
    label: null,
});

/**
 * Holds one immutable snapshot and swaps it whole on every load.
 * Filtering and sorting always work on copies.
 */
export class ChannelCatalog implements IChannelCatalog {
    private _emitter: EventEmitter<ChannelCatalogEventMap> = new EventEmitter();
    private _snapshot: CatalogSnapshot = EMPTY_SNAPSHOT;

    /**
     * Replace the whole catalog in one assignment.
     * @param label - Display label for the source, null for none
     */
    public replace(channels: readonly Channel[], label: string | null): CatalogSnapshot {
        const snapshot: CatalogSnapshot = Object.freeze({
            channels: Object.freeze(channels.slice()),
            label: normalizeLabel(label),
        });
        this._snapshot = snapshot;
        this._emitter.emit('catalogReplaced', snapshot);
        return snapshot;
    }

    public getSnapshot(): CatalogSnapshot {
        return this._snapshot;
    }

    public size(): number {
        return this._snapshot.channels.length;
    }

    public hasChannels(): boolean {
        return this._snapshot.channels.length > 0;
    }

    /**
     * Channels whose name or group contains the trimmed query
     * (case-insensitive), sorted by name, case-insensitive ascending.
     * An empty query yields the whole catalog.
     */
    public filter(query: string): Channel[] {
        return filterChannels(this._snapshot.channels, query);
    }

    public on<K extends keyof ChannelCatalogEventMap>(
        event: K,
        handler: (payload: ChannelCatalogEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }
}

/**
 * Pure filter + sort over any channel list.
 */
export function filterChannels(channels: readonly Channel[], query: string): Channel[] {
    const needle = query.trim().toLocaleLowerCase();
    const matches = needle.length === 0
        ? channels.slice()
        : channels.filter((channel) =>
            channel.name.toLocaleLowerCase().includes(needle) ||
            (channel.group.length > 0 && channel.group.toLocaleLowerCase().includes(needle))
        );
    return matches.sort(compareByName);
}

function compareByName(a: Channel, b: Channel): number {
    return a.name.localeCompare(b.name, undefined, { sensitivity: 'base' });
}

function normalizeLabel(label: string | null): string | null {
    if (label === null) return null;
    const trimmed = label.trim();
    return trimmed.length > 0 ? trimmed : null;
}
