/**
 * @fileoverview Safe key-value storage helpers.
 * @module utils/storage
 * @version 1.0.0
 *
 * Hosts may hand us a `Storage`, an in-memory map, or nothing at all (plain
 * Node has no localStorage). Reads treat storage as optional and never throw.
 */

/**
 * The subset of the Web Storage API the app reads and writes.
 */
export interface KeyValueStore {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
    removeItem(key: string): void;
}

function isKeyValueStore(candidate: unknown): candidate is KeyValueStore {
    return (
        typeof candidate === 'object' &&
        candidate !== null &&
        'getItem' in candidate &&
        typeof candidate.getItem === 'function' &&
        'setItem' in candidate &&
        typeof candidate.setItem === 'function' &&
        'removeItem' in candidate &&
        typeof candidate.removeItem === 'function'
    );
}

/**
 * Resolve the host's localStorage, or null where there is none.
 */
export function getDefaultStore(): KeyValueStore | null {
    try {
        const candidate: unknown = Reflect.get(globalThis, 'localStorage');
        return isKeyValueStore(candidate) ? candidate : null;
    } catch {
        return null;
    }
}

export function safeStoreGet(store: KeyValueStore | null, key: string): string | null {
    if (!store) return null;
    try {
        return store.getItem(key);
    } catch {
        return null;
    }
}

/**
 * Interpret a stored flag value ("1"/"true", case-insensitive) as a boolean.
 */
export function isStoredTrue(value: string | null): boolean {
    if (value === null) return false;
    const normalized = value.trim().toLowerCase();
    return normalized === '1' || normalized === 'true';
}
