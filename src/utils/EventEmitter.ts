/**
 * @fileoverview Type-safe subscription registry with error isolation.
 * One handler's error does not prevent other handlers from executing.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import type { IEventEmitter, IDisposable } from './interfaces';

/**
 * Reporter invoked when a handler throws.
 */
export type HandlerErrorReporter = (event: string, error: unknown) => void;

/**
 * Type-safe event emitter with error isolation.
 *
 * Subscriptions are strong references; every `on()` hands back an
 * {@link IDisposable} and the subscriber is responsible for disposing it.
 *
 * @template TEventMap - A record type mapping event names to payload types
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private _handlers: { [K in keyof TEventMap]?: Set<(payload: TEventMap[K]) => void> } = {};

    /**
     * @param _tag - Log tag of the owning component
     * @param _onHandlerError - Optional hook notified after a handler throws
     */
    constructor(
        private readonly _tag: string = 'EventEmitter',
        private readonly _onHandlerError: HandlerErrorReporter | null = null
    ) {}

    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        const handlerSet = this._handlers[event] ?? new Set<(payload: TEventMap[K]) => void>();
        handlerSet.add(handler);
        this._handlers[event] = handlerSet;

        let disposed = false;
        return {
            dispose: (): void => {
                if (disposed) {
                    return;
                }
                disposed = true;
                this._remove(event, handler);
            },
        };
    }

    public once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        const subscription = this.on(event, (payload: TEventMap[K]): void => {
            subscription.dispose();
            handler(payload);
        });
        return subscription;
    }

    /**
     * Emit an event to a snapshot of the registered handlers.
     * CRITICAL: Errors in handlers are caught and logged, NOT propagated,
     * so a faulty subscriber never unwinds into the emitter's caller.
     */
    public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void {
        const handlerSet = this._handlers[event];
        if (!handlerSet || handlerSet.size === 0) {
            return;
        }

        for (const handler of Array.from(handlerSet)) {
            try {
                handler(payload);
            } catch (error) {
                console.error(`[${this._tag}] Handler error for event '${String(event)}':`, error);
                if (this._onHandlerError) {
                    this._onHandlerError(String(event), error);
                }
            }
        }
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event !== undefined) {
            delete this._handlers[event];
        } else {
            this._handlers = {};
        }
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._handlers[event]?.size ?? 0;
    }

    private _remove<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        const handlerSet = this._handlers[event];
        if (!handlerSet) {
            return;
        }
        handlerSet.delete(handler);
        if (handlerSet.size === 0) {
            delete this._handlers[event];
        }
    }
}
