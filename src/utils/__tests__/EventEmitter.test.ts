/**
 * @fileoverview Unit tests for the EventEmitter class.
 * @module utils/__tests__/EventEmitter.test
 * @version 1.0.0
 */

import { EventEmitter } from '../EventEmitter';

type Events = {
    ping: { value: number };
    tick: void;
};

describe('EventEmitter', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('on/emit', () => {
        it('delivers the payload to every subscriber', () => {
            const emitter = new EventEmitter<Events>();
            const first = jest.fn();
            const second = jest.fn();

            emitter.on('ping', first);
            emitter.on('ping', second);
            emitter.emit('ping', { value: 42 });

            expect(first).toHaveBeenCalledWith({ value: 42 });
            expect(second).toHaveBeenCalledWith({ value: 42 });
        });

        it('stops delivering once the subscription is disposed', () => {
            const emitter = new EventEmitter<Events>();
            const handler = jest.fn();

            const subscription = emitter.on('tick', handler);
            subscription.dispose();
            emitter.emit('tick', undefined);

            expect(handler).not.toHaveBeenCalled();
            expect(emitter.listenerCount('tick')).toBe(0);
        });

        it('treats a second dispose as a no-op', () => {
            const emitter = new EventEmitter<Events>();
            const subscription = emitter.on('tick', jest.fn());
            emitter.on('tick', jest.fn());

            subscription.dispose();
            subscription.dispose();

            expect(emitter.listenerCount('tick')).toBe(1);
        });

        it('emits to a snapshot taken before the first handler runs', () => {
            const emitter = new EventEmitter<Events>();
            const calls: string[] = [];
            const late = (): void => {
                calls.push('late');
            };

            emitter.on('tick', () => {
                calls.push('first');
                emitter.on('tick', late);
            });
            const second = emitter.on('tick', () => {
                calls.push('second');
            });
            emitter.on('tick', () => second.dispose());

            emitter.emit('tick', undefined);
            expect(calls).toEqual(['first', 'second']);

            calls.length = 0;
            emitter.emit('tick', undefined);
            expect(calls).toEqual(['first', 'late']);
        });
    });

    describe('error isolation', () => {
        it('keeps calling handlers after one throws and logs with the owner tag', () => {
            const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
            const emitter = new EventEmitter<Events>('RemoteSessionManager');
            const failure = new Error('boom');
            const good = jest.fn();

            emitter.on('tick', () => {
                throw failure;
            });
            emitter.on('tick', good);

            expect(() => emitter.emit('tick', undefined)).not.toThrow();
            expect(good).toHaveBeenCalledTimes(1);
            expect(consoleSpy).toHaveBeenCalledWith("[RemoteSessionManager] Handler error for event 'tick':", failure);
        });

        it('reports handler errors to the hook', () => {
            jest.spyOn(console, 'error').mockImplementation(() => {});
            const reporter = jest.fn();
            const emitter = new EventEmitter<Events>('Test', reporter);
            const failure = new Error('boom');

            emitter.on('ping', () => {
                throw failure;
            });
            emitter.emit('ping', { value: 1 });

            expect(reporter).toHaveBeenCalledWith('ping', failure);
        });
    });

    describe('once', () => {
        it('fires a single time', () => {
            const emitter = new EventEmitter<Events>();
            const handler = jest.fn();

            emitter.once('ping', handler);
            emitter.emit('ping', { value: 1 });
            emitter.emit('ping', { value: 2 });

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith({ value: 1 });
        });

        it('can be disposed before it fires', () => {
            const emitter = new EventEmitter<Events>();
            const handler = jest.fn();

            emitter.once('tick', handler).dispose();
            emitter.emit('tick', undefined);

            expect(handler).not.toHaveBeenCalled();
        });
    });

    describe('removeAllListeners', () => {
        it('clears one event or all of them', () => {
            const emitter = new EventEmitter<Events>();
            emitter.on('ping', jest.fn());
            emitter.on('tick', jest.fn());

            emitter.removeAllListeners('ping');
            expect(emitter.listenerCount('ping')).toBe(0);
            expect(emitter.listenerCount('tick')).toBe(1);

            emitter.removeAllListeners();
            expect(emitter.listenerCount('tick')).toBe(0);
        });
    });
});
