import { SurfaceManager } from '../SurfaceManager';
import type { SurfaceChangeEvent } from '../types';
import { ResumeNudger, type ResumeTarget } from '../../player/ResumeNudger';
import type { IEnginePlayer } from '../../player/interfaces';
import type { Logger } from '../../../utils/interfaces';
import { silentLogger } from '../../../utils/logger';
import { FakeEnginePlayer } from '../../player/__tests__/fakeEngine';
import { FakeWindowHost } from './fakeWindows';

const label = (player: IEnginePlayer | null): string =>
    player instanceof FakeEnginePlayer ? `p${player.id}` : 'null';

const setup = (options: { isPlaying?: () => boolean } = {}): {
    manager: SurfaceManager;
    windows: FakeWindowHost;
    player: FakeEnginePlayer;
    resumeTarget: jest.Mocked<ResumeTarget>;
    logger: jest.Mocked<Logger>;
    changes: SurfaceChangeEvent[];
} => {
    const windows = new FakeWindowHost(label);
    const resumeTarget: jest.Mocked<ResumeTarget> = {
        isPlaying: jest.fn(options.isPlaying ?? ((): boolean => false)),
        nudge: jest.fn(),
    };
    const logger: jest.Mocked<Logger> = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
    const manager = new SurfaceManager({
        windows,
        resumeTarget,
        nudger: new ResumeNudger(3, 150, silentLogger),
        logger,
    });
    const player = new FakeEnginePlayer({ volume: 0.5, muted: false }, 1);
    manager.attachPlayer(player);
    windows.journal.length = 0;
    const changes: SurfaceChangeEvent[] = [];
    manager.on('surfaceChange', (change) => changes.push(change));
    return { manager, windows, player, resumeTarget, logger, changes };
};

describe('SurfaceManager', () => {
    it('starts on main with the player attached there', () => {
        const { manager, windows, player } = setup();
        expect(manager.getActiveSurface()).toBe('main');
        expect(windows.main.host.player).toBe(player);
    });

    describe('fullscreen', () => {
        it('resolves the display first and attaches the new window before releasing main', async () => {
            const { manager, windows } = setup();

            await manager.enterFullscreen();

            expect(windows.journal).toEqual([
                'display',
                'create(fullscreen)',
                'fullscreen.attach(p1)',
                'main.attach(null)',
                'fullscreen.switchers(true)',
                'main.switchers(false)',
                'main.minimize',
                'fullscreen.activate',
            ]);
            expect(manager.getActiveSurface()).toBe('fullscreen');
        });

        it('covers the whole display', async () => {
            const { manager, windows } = setup();
            await manager.enterFullscreen();
            expect(windows.latest.options).toEqual({
                surface: 'fullscreen',
                title: 'channelview Fullscreen',
                bounds: { x: 0, y: 0, width: 1920, height: 1080 },
                alwaysOnTop: false,
            });
        });

        it('reattaches to main before closing the window and restores main', async () => {
            const { manager, windows, player } = setup();
            await manager.enterFullscreen();
            windows.main.bounds = { x: 0, y: 0, width: 160, height: 40 };
            windows.journal.length = 0;

            await manager.exitFullscreen();

            expect(windows.journal).toEqual([
                'main.attach(p1)',
                'fullscreen.attach(null)',
                'fullscreen.close',
                'main.switchers(true)',
                'main.restore',
                'main.setBounds',
            ]);
            expect(windows.main.bounds).toEqual({ x: 100, y: 80, width: 1200, height: 800 });
            expect(windows.main.host.player).toBe(player);
            expect(manager.getActiveSurface()).toBe('main');
        });

        it('serializes an exit requested while the enter is still pending', async () => {
            const { manager, windows, player } = setup();

            const entering = manager.enterFullscreen();
            const exiting = manager.exitFullscreen();
            await Promise.all([entering, exiting]);

            expect(manager.getActiveSurface()).toBe('main');
            expect(windows.latest.closed).toBe(true);
            expect(windows.main.host.player).toBe(player);
            expect(windows.latest.host.player).toBeNull();
        });

        it('toggles in and out', async () => {
            const { manager, changes } = setup();
            await manager.toggleFullscreen();
            await manager.toggleFullscreen();
            expect(changes).toEqual([
                { from: 'main', to: 'fullscreen' },
                { from: 'fullscreen', to: 'main' },
            ]);
        });

        it('ignores a second enter', async () => {
            const { manager, windows } = setup();
            await manager.enterFullscreen();
            await manager.enterFullscreen();
            expect(windows.created).toHaveLength(1);
        });
    });

    describe('floating', () => {
        it('anchors a compact always-on-top window to the bottom-right of the work area', async () => {
            const { manager, windows } = setup();
            await manager.enterFloating();
            expect(windows.latest.options).toEqual({
                surface: 'floating',
                title: 'channelview Floating',
                bounds: { x: 1428, y: 758, width: 480, height: 270 },
                alwaysOnTop: true,
            });
        });

        it('fully exits fullscreen before entering floating', async () => {
            const { manager, windows, changes } = setup();
            await manager.enterFullscreen();
            const fullscreen = windows.latest;
            windows.journal.length = 0;

            await manager.enterFloating();

            expect(fullscreen.closed).toBe(true);
            expect(windows.journal.indexOf('fullscreen.close')).toBeLessThan(
                windows.journal.indexOf('create(floating)')
            );
            expect(changes).toEqual([
                { from: 'main', to: 'fullscreen' },
                { from: 'fullscreen', to: 'main' },
                { from: 'main', to: 'floating' },
            ]);
            expect(manager.getActiveSurface()).toBe('floating');
        });

        it('fully exits floating before entering fullscreen', async () => {
            const { manager, windows } = setup();
            await manager.enterFloating();
            const floating = windows.latest;

            await manager.toggleFullscreen();

            expect(floating.closed).toBe(true);
            expect(floating.host.player).toBeNull();
            expect(manager.getActiveSurface()).toBe('fullscreen');
        });
    });

    describe('exit idempotence', () => {
        it('runs the exit routine once across duplicate and OS-initiated exits', async () => {
            const { manager, windows } = setup();
            await manager.enterFloating();
            const floating = windows.latest;
            windows.journal.length = 0;

            await Promise.all([manager.exitFloating(), manager.exitFloating(), manager.exitActiveSecondary()]);
            floating.simulateClosed();
            await manager.exitFloating();

            expect(floating.closeCalls).toBe(1);
            expect(windows.journal.filter((entry) => entry === 'main.restore')).toHaveLength(1);
        });

        it('funnels an OS close through the same exit', async () => {
            const { manager, windows, player } = setup();
            await manager.enterFullscreen();

            windows.latest.simulateClosed();
            await manager.exitActiveSecondary();

            expect(manager.getActiveSurface()).toBe('main');
            expect(windows.main.host.player).toBe(player);
            expect(windows.main.minimized).toBe(false);
            expect(windows.main.shownInSwitchers).toBe(true);
        });

        it('reports whether escape had anything to exit', async () => {
            const { manager } = setup();
            await expect(manager.exitActiveSecondary()).resolves.toBe(false);
            await manager.enterFloating();
            await expect(manager.exitActiveSecondary()).resolves.toBe(true);
        });
    });

    it('attaches a replacement player to whichever surface is active', async () => {
        const { manager, windows } = setup();
        await manager.enterFullscreen();
        const replacement = new FakeEnginePlayer({ volume: 0.5, muted: false }, 2);

        manager.attachPlayer(replacement);
        expect(windows.latest.host.player).toBe(replacement);
        expect(windows.main.host.player).toBeNull();

        await manager.exitFullscreen();
        expect(windows.main.host.player).toBe(replacement);
    });

    it('stays on main and logs when the window cannot be created', async () => {
        const { manager, windows, player, logger } = setup();
        windows.failNextCreate = new Error('no display');

        await manager.enterFullscreen();

        expect(manager.getActiveSurface()).toBe('main');
        expect(windows.main.host.player).toBe(player);
        expect(windows.main.minimized).toBe(false);
        expect(logger.error).toHaveBeenCalledWith('Could not create fullscreen window: no display');
    });

    describe('resume nudges', () => {
        beforeEach(() => {
            jest.useFakeTimers();
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        it('nudges a player that stopped during the handoff', async () => {
            const states = [true, false, false, false, false];
            const { manager, resumeTarget } = setup({ isPlaying: () => states.shift() ?? false });
            await manager.enterFullscreen();

            await manager.exitFullscreen();
            jest.advanceTimersByTime(1000);

            expect(resumeTarget.nudge).toHaveBeenCalledTimes(3);
        });

        it('nudges when playback stops only after the exit returns', async () => {
            let playing = true;
            const { manager, resumeTarget } = setup({ isPlaying: () => playing });
            await manager.enterFullscreen();

            await manager.exitFullscreen();
            playing = false;
            jest.advanceTimersByTime(1000);

            expect(resumeTarget.nudge).toHaveBeenCalledTimes(3);
        });

        it('stops pending nudges on request', async () => {
            let playing = true;
            const { manager, resumeTarget } = setup({ isPlaying: () => playing });
            await manager.enterFullscreen();
            await manager.exitFullscreen();
            playing = false;

            jest.advanceTimersByTime(150);
            manager.cancelResumeNudges();
            jest.advanceTimersByTime(1000);

            expect(resumeTarget.nudge).toHaveBeenCalledTimes(1);
        });

        it('does not nudge a player that was not playing', async () => {
            const { manager, resumeTarget } = setup({ isPlaying: () => false });
            await manager.enterFullscreen();

            await manager.exitFullscreen();
            jest.advanceTimersByTime(1000);

            expect(resumeTarget.nudge).not.toHaveBeenCalled();
        });

        it('does not nudge a player that kept playing', async () => {
            const { manager, resumeTarget } = setup({ isPlaying: () => true });
            await manager.enterFullscreen();

            await manager.exitFullscreen();
            jest.advanceTimersByTime(1000);

            expect(resumeTarget.nudge).not.toHaveBeenCalled();
        });
    });

    it('dispose closes a live secondary window and leaves every host empty', async () => {
        const { manager, windows } = setup();
        await manager.enterFloating();
        manager.dispose();
        expect(windows.latest.closed).toBe(true);
        expect(windows.latest.host.player).toBeNull();
        expect(windows.main.host.player).toBeNull();
        expect(manager.getActiveSurface()).toBe('main');
    });

    it('dispose releases main when no secondary window is open', () => {
        const { manager, windows } = setup();
        manager.dispose();
        expect(windows.main.host.player).toBeNull();
    });
});
