/**
 * @fileoverview Local playlist file access through fs/promises.
 * @module modules/playlist/NodePlaylistFileSystem
 * @version 1.0.0
 */

import { access, readFile, stat } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';

import type { IPlaylistFileSystem } from './interfaces';

export class NodePlaylistFileSystem implements IPlaylistFileSystem {
    public async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8');
    }

    public async exists(filePath: string): Promise<boolean> {
        try {
            await access(filePath, fsConstants.R_OK);
            const info = await stat(filePath);
            return info.isFile();
        } catch {
            return false;
        }
    }
}
