import { engineStateToEvent, nextPlaybackStatus } from '../playbackTransitions';
import { formatEngineFailure, formatErrorCode } from '../ErrorHandler';
import type { PlaybackStatus } from '../types';

const ALL: PlaybackStatus[] = ['idle', 'opening', 'buffering', 'playing', 'paused', 'failed'];

describe('nextPlaybackStatus', () => {
    it('enters opening from any status on a play request', () => {
        for (const from of ALL) {
            expect(nextPlaybackStatus(from, { type: 'playRequested' })).toBe('opening');
        }
    });

    it('enters failed from any status on an engine failure', () => {
        for (const from of ALL) {
            expect(nextPlaybackStatus(from, { type: 'engineFailed' })).toBe('failed');
        }
    });

    it('allows only the listed engine transitions', () => {
        expect(nextPlaybackStatus('opening', { type: 'engineBuffering' })).toBe('buffering');
        expect(nextPlaybackStatus('playing', { type: 'engineBuffering' })).toBeNull();

        expect(nextPlaybackStatus('opening', { type: 'enginePlaying' })).toBe('playing');
        expect(nextPlaybackStatus('buffering', { type: 'enginePlaying' })).toBe('playing');
        expect(nextPlaybackStatus('paused', { type: 'enginePlaying' })).toBe('playing');
        expect(nextPlaybackStatus('failed', { type: 'enginePlaying' })).toBeNull();
        expect(nextPlaybackStatus('idle', { type: 'enginePlaying' })).toBeNull();

        expect(nextPlaybackStatus('playing', { type: 'enginePaused' })).toBe('paused');
        expect(nextPlaybackStatus('buffering', { type: 'enginePaused' })).toBeNull();
    });

    it('keeps the current status for an event that lands on it', () => {
        expect(nextPlaybackStatus('buffering', { type: 'engineBuffering' })).toBe('buffering');
        expect(nextPlaybackStatus('playing', { type: 'enginePlaying' })).toBe('playing');
        expect(nextPlaybackStatus('paused', { type: 'enginePaused' })).toBe('paused');
    });
});

describe('engineStateToEvent', () => {
    it('folds opening and buffering together', () => {
        expect(engineStateToEvent('opening')).toEqual({ type: 'engineBuffering' });
        expect(engineStateToEvent('buffering')).toEqual({ type: 'engineBuffering' });
        expect(engineStateToEvent('playing')).toEqual({ type: 'enginePlaying' });
        expect(engineStateToEvent('paused')).toEqual({ type: 'enginePaused' });
        expect(engineStateToEvent('none')).toBeNull();
    });
});

describe('engine failure formatting', () => {
    it('renders codes as eight upper-case hex digits', () => {
        expect(formatErrorCode(0)).toBe('00000000');
        expect(formatErrorCode(0x1f)).toBe('0000001F');
        expect(formatErrorCode(-2147467259)).toBe('80004005');
    });

    it('appends the code to the engine message', () => {
        expect(formatEngineFailure({ message: 'Network unreachable', errorCode: 0x80072efd })).toBe(
            'Network unreachable (0x80072EFD)'
        );
    });
});
