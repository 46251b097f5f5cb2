import { PlaylistLoader } from '../PlaylistLoader';
import { ChannelCatalog } from '../ChannelCatalog';
import { PlaylistError, NetworkError } from '../errors';
import type { INetworkClient, IPlaylistFileSystem } from '../interfaces';
import { AppErrorCode } from '../../../types/app-errors';
import { silentLogger } from '../../../utils/logger';

const PLAYLIST_A = '#EXTINF:-1,Alpha\nhttp://streams.test/alpha\n';
const PLAYLIST_B = '#EXTINF:-1,Bravo\nhttp://streams.test/bravo\n#EXTINF:-1,Charlie\nhttp://streams.test/charlie\n';

interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (reason: unknown) => void;
}

function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

const setup = (): {
    loader: PlaylistLoader;
    catalog: ChannelCatalog;
    network: jest.Mocked<INetworkClient>;
    files: jest.Mocked<IPlaylistFileSystem>;
} => {
    const catalog = new ChannelCatalog();
    const network: jest.Mocked<INetworkClient> = { fetchText: jest.fn() };
    const files: jest.Mocked<IPlaylistFileSystem> = {
        readText: jest.fn(),
        exists: jest.fn().mockResolvedValue(false),
    };
    const loader = new PlaylistLoader({ catalog, network, files, logger: silentLogger });
    return { loader, catalog, network, files };
};

describe('PlaylistLoader', () => {
    it('loads a URL into the catalog with a label derived from the URL', async () => {
        const { loader, catalog, network } = setup();
        network.fetchText.mockResolvedValue(PLAYLIST_B);

        const result = await loader.loadUrl('https://lists.test/streams/uk.m3u');

        expect(network.fetchText).toHaveBeenCalledWith('https://lists.test/streams/uk.m3u');
        expect(result.status).toBe('loaded');
        expect(catalog.getSnapshot().label).toBe('uk');
        expect(catalog.getSnapshot().channels.map((c) => c.name)).toEqual(['Bravo', 'Charlie']);
    });

    it('prefers an explicit label', async () => {
        const { loader, catalog, network } = setup();
        network.fetchText.mockResolvedValue(PLAYLIST_A);
        await loader.loadUrl('https://lists.test/x.m3u', 'Favourites');
        expect(catalog.getSnapshot().label).toBe('Favourites');
    });

    it('wraps fetch failures and leaves the catalog untouched', async () => {
        const { loader, catalog, network } = setup();
        network.fetchText.mockResolvedValueOnce(PLAYLIST_A);
        await loader.loadUrl('https://lists.test/a.m3u');
        const before = catalog.getSnapshot();

        network.fetchText.mockRejectedValueOnce(new NetworkError('Response status code does not indicate success: 404 (Not Found).', 404));

        const failure = loader.loadUrl('https://lists.test/missing.m3u');
        await expect(failure).rejects.toBeInstanceOf(PlaylistError);
        await expect(failure).rejects.toMatchObject({
            code: AppErrorCode.PLAYLIST_FETCH_FAILED,
            message: 'Failed to load playlist.\nResponse status code does not indicate success: 404 (Not Found).',
        });
        expect(catalog.getSnapshot()).toBe(before);
    });

    it('lets only the most recent load replace the catalog', async () => {
        const { loader, catalog, network } = setup();
        const slow = deferred<string>();
        const fast = deferred<string>();
        network.fetchText.mockReturnValueOnce(slow.promise).mockReturnValueOnce(fast.promise);

        const first = loader.loadUrl('https://lists.test/slow.m3u');
        const second = loader.loadUrl('https://lists.test/fast.m3u');

        fast.resolve(PLAYLIST_B);
        await expect(second).resolves.toMatchObject({ status: 'loaded' });

        slow.resolve(PLAYLIST_A);
        await expect(first).resolves.toEqual({
            status: 'superseded',
            origin: { kind: 'url', url: 'https://lists.test/slow.m3u' },
        });

        expect(catalog.getSnapshot().label).toBe('fast');
        expect(catalog.size()).toBe(2);
    });

    it('discards the failure of a superseded load', async () => {
        const { loader, catalog, network } = setup();
        const slow = deferred<string>();
        network.fetchText.mockReturnValueOnce(slow.promise).mockResolvedValueOnce(PLAYLIST_A);

        const first = loader.loadUrl('https://lists.test/slow.m3u');
        await loader.loadUrl('https://lists.test/fast.m3u');
        slow.reject(new NetworkError('socket hang up'));

        await expect(first).resolves.toMatchObject({ status: 'superseded' });
        expect(catalog.size()).toBe(1);
    });

    it('rejects an unconfigured slot without fetching', async () => {
        const { loader, network } = setup();
        await expect(
            loader.loadSlot({ glyph: 'x', streamUrl: null, tooltip: 't' }, 3)
        ).rejects.toMatchObject({
            code: AppErrorCode.PLAYLIST_SLOT_UNCONFIGURED,
            message: 'This playlist button isn’t configured yet.\nUse Advanced Controls to load a list.',
        });
        expect(network.fetchText).not.toHaveBeenCalled();
    });

    it('loads a configured slot', async () => {
        const { loader, network } = setup();
        network.fetchText.mockResolvedValue(PLAYLIST_A);
        await expect(
            loader.loadSlot({ glyph: 'x', streamUrl: 'https://lists.test/ca.m3u', tooltip: 't' }, 2)
        ).resolves.toMatchObject({
            status: 'loaded',
            origin: { kind: 'slot', index: 2, url: 'https://lists.test/ca.m3u' },
        });
    });

    it('loads a local file labelled by its name', async () => {
        const { loader, catalog, files } = setup();
        files.readText.mockResolvedValue(PLAYLIST_A);

        await loader.loadFile('/data/lists/local.m3u8');

        expect(files.readText).toHaveBeenCalledWith('/data/lists/local.m3u8');
        expect(catalog.getSnapshot().label).toBe('local');
    });

    it('wraps file read failures', async () => {
        const { loader, files } = setup();
        files.readText.mockRejectedValue(new Error('EACCES: permission denied'));
        await expect(loader.loadFile('/data/locked.m3u')).rejects.toMatchObject({
            code: AppErrorCode.PLAYLIST_FILE_UNREADABLE,
            message: 'Failed to read playlist file.\nEACCES: permission denied',
        });
    });

    describe('loadFromInput', () => {
        it('fetches URL input', async () => {
            const { loader, network } = setup();
            network.fetchText.mockResolvedValue(PLAYLIST_A);
            await loader.loadFromInput('https://lists.test/input.m3u');
            expect(network.fetchText).toHaveBeenCalledWith('https://lists.test/input.m3u');
        });

        it('reads existing file paths', async () => {
            const { loader, files, catalog } = setup();
            files.exists.mockResolvedValue(true);
            files.readText.mockResolvedValue(PLAYLIST_B);
            await loader.loadFromInput('/data/mine.m3u');
            expect(catalog.getSnapshot().label).toBe('mine');
        });

        it('rejects anything else', async () => {
            const { loader } = setup();
            await expect(loader.loadFromInput('nonsense')).rejects.toMatchObject({
                code: AppErrorCode.PLAYLIST_INPUT_INVALID,
                message: 'Not a valid URL or path to a .m3u/.m3u8 file.',
            });
        });
    });
});
