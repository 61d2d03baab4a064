/**
 * @fileoverview Unit tests for CoordinationLoop and TimerSlot.
 * @module utils/__tests__/CoordinationLoop.test
 */

import { CoordinationLoop } from '../CoordinationLoop';
import { TimerSlot } from '../TimerSlot';

describe('CoordinationLoop', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('runs a task synchronously when idle', () => {
        const loop = new CoordinationLoop();
        const order: string[] = [];

        loop.post('a', () => order.push('a'));
        order.push('after');

        expect(order).toEqual(['a', 'after']);
    });

    it('queues a task posted from inside another task', () => {
        const loop = new CoordinationLoop();
        const order: string[] = [];
        let pendingDuringOuter = -1;

        loop.post('outer', () => {
            order.push('outer:start');
            loop.post('inner', () => order.push('inner'));
            pendingDuringOuter = loop.pendingCount();
            order.push('outer:end');
        });

        expect(order).toEqual(['outer:start', 'outer:end', 'inner']);
        expect(pendingDuringOuter).toBe(1);
        expect(loop.isRunning()).toBe(false);
    });

    it('passes bound arguments through the loop', () => {
        const loop = new CoordinationLoop();
        const seen: Array<[string, number]> = [];
        const bound = loop.bind('pair', (name: string, count: number) => seen.push([name, count]));

        let seenDuringOuter = -1;

        loop.post('outer', () => {
            bound('x', 1);
            seenDuringOuter = seen.length;
        });

        expect(seenDuringOuter).toBe(0);
        expect(seen).toEqual([['x', 1]]);
    });

    it('keeps draining after a task throws and reports it', () => {
        jest.spyOn(console, 'error').mockImplementation(() => {});
        const loop = new CoordinationLoop();
        const onError = jest.fn();
        loop.setTaskErrorHandler(onError);
        const failure = new Error('task broke');
        const after = jest.fn();

        loop.post('outer', () => {
            loop.post('broken', () => {
                throw failure;
            });
            loop.post('after', after);
        });

        expect(onError).toHaveBeenCalledWith('broken', failure);
        expect(after).toHaveBeenCalledTimes(1);
        expect(console.error).toHaveBeenCalledWith("[CoordinationLoop] Task 'broken' failed:", failure);
    });

    it('drops tasks after dispose', () => {
        jest.spyOn(console, 'debug').mockImplementation(() => {});
        const loop = new CoordinationLoop();
        const task = jest.fn();

        loop.dispose();
        loop.post('late', task);

        expect(task).not.toHaveBeenCalled();
    });
});

describe('TimerSlot', () => {
    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('fires once after the delay', () => {
        const slot = new TimerSlot('test');
        const fn = jest.fn();

        slot.schedule(500, fn);
        expect(slot.isPending()).toBe(true);

        jest.advanceTimersByTime(499);
        expect(fn).not.toHaveBeenCalled();

        jest.advanceTimersByTime(1);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(slot.isPending()).toBe(false);
    });

    it('replaces the pending callback when scheduled again', () => {
        const slot = new TimerSlot('test');
        const stale = jest.fn();
        const fresh = jest.fn();

        slot.schedule(500, stale);
        jest.advanceTimersByTime(300);
        slot.schedule(500, fresh);
        jest.advanceTimersByTime(500);

        expect(stale).not.toHaveBeenCalled();
        expect(fresh).toHaveBeenCalledTimes(1);
    });

    it('never fires after cancel', () => {
        const slot = new TimerSlot('test');
        const fn = jest.fn();

        slot.schedule(100, fn);
        slot.cancel();
        jest.advanceTimersByTime(1000);

        expect(fn).not.toHaveBeenCalled();
        expect(jest.getTimerCount()).toBe(0);
    });

    it('delivers through the loop when one is given', () => {
        const loop = new CoordinationLoop();
        const post = jest.spyOn(loop, 'post');
        const slot = new TimerSlot('casting.gap.alarm-1', loop);
        const fn = jest.fn();

        slot.schedule(10, fn);
        jest.advanceTimersByTime(10);

        expect(post).toHaveBeenCalledWith('casting.gap.alarm-1', fn);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(slot.label).toBe('casting.gap.alarm-1');
    });
});
