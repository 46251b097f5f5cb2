import {
    classifyPlaylistInput,
    formatChannelHeader,
    friendlyNameFromPath,
    friendlyNameFromUrl,
    isLoadablePlaylistUrl,
} from '../playlistSource';

describe('isLoadablePlaylistUrl', () => {
    it('accepts http(s) URLs ending in .m3u or .m3u8', () => {
        expect(isLoadablePlaylistUrl('https://lists.test/tv/uk.m3u')).toBe(true);
        expect(isLoadablePlaylistUrl('  http://lists.test/live.M3U8  ')).toBe(true);
        expect(isLoadablePlaylistUrl('https://lists.test/list.m3u?x=1')).toBe(true);
    });

    it('rejects other schemes, extensions and junk', () => {
        expect(isLoadablePlaylistUrl('ftp://lists.test/uk.m3u')).toBe(false);
        expect(isLoadablePlaylistUrl('https://lists.test/uk.txt')).toBe(false);
        expect(isLoadablePlaylistUrl('uk.m3u')).toBe(false);
        expect(isLoadablePlaylistUrl('')).toBe(false);
    });
});

describe('friendlyNameFromUrl', () => {
    it('uses the playlist file name without extension', () => {
        expect(friendlyNameFromUrl('https://lists.test/streams/uk.m3u')).toBe('uk');
        expect(friendlyNameFromUrl('https://lists.test/FREETV.m3u8')).toBe('FREETV');
    });

    it('falls back to the host', () => {
        expect(friendlyNameFromUrl('https://lists.test/streams/')).toBe('lists.test');
        expect(friendlyNameFromUrl('https://lists.test/playlist.php')).toBe('lists.test');
    });

    it('returns Playlist for unparsable input', () => {
        expect(friendlyNameFromUrl('not a url')).toBe('Playlist');
    });
});

describe('friendlyNameFromPath', () => {
    it('strips directory and extension', () => {
        expect(friendlyNameFromPath('/home/user/lists/favourites.m3u')).toBe('favourites');
    });
});

describe('formatChannelHeader', () => {
    it('shows the label when present', () => {
        expect(formatChannelHeader(null)).toBe('Channels');
        expect(formatChannelHeader('   ')).toBe('Channels');
        expect(formatChannelHeader(' uk ')).toBe('Channels: uk');
    });
});

describe('classifyPlaylistInput', () => {
    it('classifies URLs without touching the file system', async () => {
        const exists = jest.fn().mockResolvedValue(true);
        await expect(classifyPlaylistInput(' https://lists.test/a.m3u ', exists)).resolves.toEqual({
            kind: 'url',
            url: 'https://lists.test/a.m3u',
        });
        expect(exists).not.toHaveBeenCalled();
    });

    it('classifies existing paths', async () => {
        const exists = jest.fn().mockResolvedValue(true);
        await expect(classifyPlaylistInput('/tmp/list.m3u', exists)).resolves.toEqual({
            kind: 'path',
            path: '/tmp/list.m3u',
        });
        expect(exists).toHaveBeenCalledWith('/tmp/list.m3u');
    });

    it('classifies everything else as invalid', async () => {
        const exists = jest.fn().mockResolvedValue(false);
        await expect(classifyPlaylistInput('nowhere', exists)).resolves.toEqual({
            kind: 'invalid',
            raw: 'nowhere',
        });
        await expect(classifyPlaylistInput('   ', exists)).resolves.toEqual({
            kind: 'invalid',
            raw: '   ',
        });
        expect(exists).toHaveBeenCalledTimes(1);
    });
});
