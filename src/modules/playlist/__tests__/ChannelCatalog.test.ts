import { ChannelCatalog, filterChannels } from '../ChannelCatalog';
import type { Channel } from '../types';

const channel = (name: string, group = ''): Channel => ({
    name,
    group,
    streamUrl: `http://streams.test/${encodeURIComponent(name)}`,
});

describe('ChannelCatalog', () => {
    let catalog: ChannelCatalog;

    beforeEach(() => {
        catalog = new ChannelCatalog();
    });

    it('starts empty with no label', () => {
        expect(catalog.getSnapshot()).toEqual({ channels: [], label: null });
        expect(catalog.size()).toBe(0);
        expect(catalog.hasChannels()).toBe(false);
    });

    it('filter("") returns the whole catalog sorted case-insensitively', () => {
        catalog.replace([channel('zulu'), channel('Alpha'), channel('bravo')], 'test');
        expect(catalog.filter('').map((c) => c.name)).toEqual(['Alpha', 'bravo', 'zulu']);
        expect(catalog.filter('   ').map((c) => c.name)).toEqual(['Alpha', 'bravo', 'zulu']);
    });

    it('filter("b") matches and sorts case-insensitively', () => {
        catalog.replace([channel('BBC'), channel('abc'), channel('Zeta')], null);
        expect(catalog.filter('b').map((c) => c.name)).toEqual(['abc', 'BBC']);
    });

    it('matches on group as well as name', () => {
        catalog.replace([channel('One', 'Sports'), channel('Two', 'News'), channel('Sportsman')], null);
        expect(catalog.filter(' SPORT ').map((c) => c.name)).toEqual(['One', 'Sportsman']);
    });

    it('is idempotent for the same query', () => {
        catalog.replace(
            [channel('News 24', 'News'), channel('Kids', 'Family'), channel('newsroom'), channel('Movies')],
            null
        );
        const once = catalog.filter('news');
        expect(filterChannels(once, 'news')).toEqual(once);
    });

    it('never mutates the stored list', () => {
        const source = [channel('b'), channel('a')];
        catalog.replace(source, null);
        catalog.filter('');
        expect(catalog.getSnapshot().channels.map((c) => c.name)).toEqual(['b', 'a']);
        expect(source.map((c) => c.name)).toEqual(['b', 'a']);
    });

    it('replaces the snapshot atomically and emits catalogReplaced', () => {
        const handler = jest.fn();
        catalog.on('catalogReplaced', handler);

        const before = catalog.getSnapshot();
        const after = catalog.replace([channel('x')], '  Label  ');

        expect(before.channels).toHaveLength(0);
        expect(after).toBe(catalog.getSnapshot());
        expect(after.label).toBe('Label');
        expect(Object.isFrozen(after.channels)).toBe(true);
        expect(handler).toHaveBeenCalledWith(after);
    });

    it('normalizes a blank label to null', () => {
        expect(catalog.replace([], '   ').label).toBeNull();
    });
});
