/**
 * @fileoverview Network collaborator backed by the runtime's fetch.
 * @module modules/playlist/FetchNetworkClient
 * @version 1.0.0
 */

import type { FetchTextOptions, INetworkClient } from './interfaces';
import { NetworkError } from './errors';
import { DEFAULT_USER_AGENT } from './constants';

/**
 * Fetches playlist text with a fixed User-Agent.
 * Non-2xx responses reject with a NetworkError carrying the status.
 */
export class FetchNetworkClient implements INetworkClient {
    constructor(private readonly _userAgent: string = DEFAULT_USER_AGENT) {}

    public async fetchText(url: string, options?: FetchTextOptions): Promise<string> {
        let response: Response;
        try {
            response = await fetch(url, {
                headers: {
                    'User-Agent': this._userAgent,
                    ...(options?.headers ?? {}),
                },
            });
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            throw new NetworkError(message);
        }

        if (!response.ok) {
            throw new NetworkError(
                `Response status code does not indicate success: ${response.status} (${response.statusText}).`,
                response.status
            );
        }
        return response.text();
    }
}
