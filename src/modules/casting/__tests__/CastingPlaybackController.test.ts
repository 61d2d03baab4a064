/**
 * @fileoverview Unit tests for CastingPlaybackController.
 * @module modules/casting/__tests__/CastingPlaybackController.test
 */

import { FakeRemoteProtocol, LIVING_ROOM, makeStatus } from '../../../__tests__/mocks/FakeRemoteProtocol';
import { AppErrorCode } from '../../../types';
import { CoordinationLoop, MemoryKeyValueStore } from '../../../utils';
import { DeviceRepository, RemoteSessionManager } from '../../remote';
import { SequenceTracker } from '../../sequence';
import { CastingPlaybackController } from '../CastingPlaybackController';
import type { CastingControllerConfig } from '../types';

const PRIMARY_URL = 'https://media.test/primary.mp3';
const SECONDARY_URL = 'https://media.test/secondary.mp3';

function setup(config: Partial<CastingControllerConfig> = {}): {
    protocol: FakeRemoteProtocol;
    manager: RemoteSessionManager;
    controller: CastingPlaybackController;
    callbacks: { onStarted: jest.Mock; onFailed: jest.Mock; onCompletion: jest.Mock };
} {
    const protocol = new FakeRemoteProtocol();
    const loop = new CoordinationLoop();
    const manager = new RemoteSessionManager(
        { protocol, devices: new DeviceRepository(new MemoryKeyValueStore()), loop },
        { discoverOnInitialize: false }
    );
    manager.initialize();
    protocol.startSession(LIVING_ROOM.id);
    const controller = new CastingPlaybackController({ sessionManager: manager, loop }, config);
    const callbacks = { onStarted: jest.fn(), onFailed: jest.fn(), onCompletion: jest.fn() };
    return { protocol, manager, controller, callbacks };
}

function single(url = PRIMARY_URL, loop = false): {
    alarmId: string;
    url: string;
    title: string;
    volume: number;
    loop: boolean;
} {
    return { alarmId: 'alarm-1', url, title: 'Wake up', volume: 0.6, loop };
}

describe('CastingPlaybackController', () => {
    beforeEach(() => {
        jest.useFakeTimers();
        jest.spyOn(console, 'log').mockImplementation(() => {});
        jest.spyOn(console, 'warn').mockImplementation(() => {});
        jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    describe('acceptance', () => {
        it('rejects a cast without a connected session', () => {
            const { protocol, controller, callbacks } = setup();
            protocol.endSession();

            const result = controller.castSingle(single(), callbacks);

            expect(result).toMatchObject({ ok: false, error: { code: AppErrorCode.NO_USABLE_DEVICE } });
            expect(protocol.loadMedia).not.toHaveBeenCalled();
            expect(controller.isCasting()).toBe(false);
        });

        it('rejects a second cast while one is in flight', () => {
            const { protocol, controller, callbacks } = setup();
            controller.castSingle(single(), callbacks);

            const second = controller.castSingle({ ...single(), alarmId: 'alarm-2' }, callbacks);

            expect(second).toMatchObject({ ok: false, error: { code: AppErrorCode.ALREADY_CASTING } });
            expect(controller.getActiveAlarmId()).toBe('alarm-1');
            expect(protocol.loadMedia).toHaveBeenCalledTimes(1);
        });

        it('sets the volume and loads the media with autoplay', () => {
            const { protocol, controller, callbacks } = setup();

            expect(controller.castSingle(single(), callbacks)).toEqual({ ok: true });

            expect(protocol.setVolume).toHaveBeenCalledWith(0.6);
            expect(protocol.loadMedia).toHaveBeenCalledWith({
                url: PRIMARY_URL,
                contentType: 'audio/mpeg',
                title: 'Wake up',
                artist: 'Alarm',
                autoplay: true,
            });
        });
    });

    describe('single clip', () => {
        it('reports start once and completion when the receiver finishes', async () => {
            const { protocol, controller, callbacks } = setup();
            controller.castSingle(single(), callbacks);
            await jest.advanceTimersByTimeAsync(0);

            protocol.emitStatus(makeStatus({ playerState: 'buffering', contentId: PRIMARY_URL }));
            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL }));
            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL, positionMs: 1_000 }));
            expect(callbacks.onStarted).toHaveBeenCalledTimes(1);

            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));
            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));

            expect(callbacks.onCompletion).toHaveBeenCalledTimes(1);
            expect(callbacks.onFailed).not.toHaveBeenCalled();
            expect(controller.isCasting()).toBe(false);
        });

        it('fails with LOAD_FAILED when the receiver rejects the load', async () => {
            const { protocol, controller, callbacks } = setup();
            protocol.loadResult = { ok: false, status: 'INVALID_REQUEST' };

            controller.castSingle(single(), callbacks);
            await jest.advanceTimersByTimeAsync(0);

            expect(callbacks.onFailed).toHaveBeenCalledTimes(1);
            expect(callbacks.onFailed.mock.calls[0][0]).toMatchObject({
                code: AppErrorCode.LOAD_FAILED,
                message: 'Load failed: INVALID_REQUEST',
            });
            expect(controller.isCasting()).toBe(false);
        });

        it('fails verification when nothing plays within the delay', async () => {
            const { controller, callbacks } = setup();
            controller.castSingle(single(), callbacks);
            await jest.advanceTimersByTimeAsync(2_999);
            expect(callbacks.onFailed).not.toHaveBeenCalled();

            await jest.advanceTimersByTimeAsync(1);

            expect(callbacks.onFailed.mock.calls[0][0]).toMatchObject({
                code: AppErrorCode.PLAYBACK_VERIFICATION_FAILED,
                message: 'Receiver reported no status 3000ms after load',
            });
            expect(controller.isCasting()).toBe(false);
        });

        it('passes verification once the receiver reports playing', async () => {
            const { protocol, controller, callbacks } = setup();
            controller.castSingle(single(), callbacks);
            await jest.advanceTimersByTimeAsync(1_000);
            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL }));

            await jest.advanceTimersByTimeAsync(5_000);

            expect(callbacks.onFailed).not.toHaveBeenCalled();
            expect(controller.isCasting()).toBe(true);
        });

        it('reloads a looping clip instead of completing', async () => {
            const { protocol, controller, callbacks } = setup();
            controller.castSingle(single(PRIMARY_URL, true), callbacks);
            await jest.advanceTimersByTimeAsync(0);
            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL }));

            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));
            expect(protocol.loadMedia).toHaveBeenCalledTimes(2);

            // Same report again before the reload starts playing.
            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));
            expect(protocol.loadMedia).toHaveBeenCalledTimes(2);

            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL }));
            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));
            expect(protocol.loadMedia).toHaveBeenCalledTimes(3);
            expect(callbacks.onCompletion).not.toHaveBeenCalled();
            expect(callbacks.onStarted).toHaveBeenCalledTimes(1);
        });
    });

    describe('sequence', () => {
        it('loads the secondary clip after the gap, not before', async () => {
            const { protocol, controller, callbacks } = setup();
            const sequence = new SequenceTracker('alarm-1');
            controller.castSequence(
                {
                    alarmId: 'alarm-1',
                    primaryUrl: PRIMARY_URL,
                    secondaryUrl: SECONDARY_URL,
                    title: 'Wake up',
                    volume: 1,
                    sequenceGapMs: 500,
                    sequence,
                },
                callbacks
            );
            await jest.advanceTimersByTimeAsync(0);

            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL }));
            expect(sequence.getState()).toBe('PlayingPrimary');
            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));
            expect(sequence.getState()).toBe('WaitingGap');

            await jest.advanceTimersByTimeAsync(499);
            expect(protocol.loadMedia).toHaveBeenCalledTimes(1);

            await jest.advanceTimersByTimeAsync(1);
            expect(protocol.loadMedia).toHaveBeenCalledTimes(2);
            expect(protocol.loadMedia).toHaveBeenLastCalledWith(expect.objectContaining({ url: SECONDARY_URL }));
            expect(sequence.getState()).toBe('PlayingSecondary');

            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));
            expect(callbacks.onCompletion).not.toHaveBeenCalled();

            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: SECONDARY_URL }));
            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: SECONDARY_URL }));

            expect(sequence.getState()).toBe('Completed');
            expect(callbacks.onCompletion).toHaveBeenCalledTimes(1);
            expect(callbacks.onStarted).toHaveBeenCalledTimes(1);
        });

        it('completes after the primary when no secondary is configured', async () => {
            const { protocol, controller, callbacks } = setup();
            const sequence = new SequenceTracker('alarm-1');
            controller.castSequence(
                {
                    alarmId: 'alarm-1',
                    primaryUrl: PRIMARY_URL,
                    secondaryUrl: null,
                    title: 'Wake up',
                    volume: 1,
                    sequenceGapMs: 500,
                    sequence,
                },
                callbacks
            );
            await jest.advanceTimersByTimeAsync(0);

            protocol.emitStatus(makeStatus({ playerState: 'idle', idleReason: 'finished', contentId: PRIMARY_URL }));

            expect(sequence.getState()).toBe('Completed');
            expect(callbacks.onCompletion).toHaveBeenCalledTimes(1);
            expect(protocol.loadMedia).toHaveBeenCalledTimes(1);
        });
    });

    describe('teardown', () => {
        it('fails with SESSION_LOST when the session ends mid-cast', async () => {
            const { protocol, controller, callbacks } = setup();
            controller.castSingle(single(), callbacks);
            await jest.advanceTimersByTimeAsync(0);

            protocol.endSession(0);

            expect(callbacks.onFailed.mock.calls[0][0]).toMatchObject({ code: AppErrorCode.SESSION_LOST });
            expect(controller.isCasting()).toBe(false);
        });

        it('turns an exception in the start observer into a failure', async () => {
            const { protocol, controller, callbacks } = setup();
            callbacks.onStarted.mockImplementation(() => {
                throw new Error('observer boom');
            });
            controller.castSingle(single(), callbacks);
            await jest.advanceTimersByTimeAsync(0);

            protocol.emitStatus(makeStatus({ playerState: 'playing', contentId: PRIMARY_URL }));

            expect(callbacks.onFailed.mock.calls[0][0]).toMatchObject({
                code: AppErrorCode.UNKNOWN,
                message: 'Status observer failed: observer boom',
            });
            expect(controller.isCasting()).toBe(false);
        });

        it('stopCasting silences the attempt and stops the receiver', async () => {
            const { protocol, controller, callbacks } = setup();
            controller.castSingle(single(), callbacks);

            expect(controller.stopCasting()).toBe(true);
            await jest.advanceTimersByTimeAsync(10_000);

            expect(protocol.stop).toHaveBeenCalledTimes(1);
            expect(callbacks.onFailed).not.toHaveBeenCalled();
            expect(callbacks.onCompletion).not.toHaveBeenCalled();
            expect(controller.stopCasting()).toBe(false);
        });
    });
});
