/**
 * @fileoverview Interface definitions for shared utilities.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable handle returned by every subscription.
 * Callers own the handle and must dispose it on teardown.
 */
export interface IDisposable {
    /**
     * Release the subscription. Safe to call more than once.
     */
    dispose(): void;
}

/**
 * Type-safe event emitter interface with error isolation.
 * One handler's error does not prevent other handlers from executing.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * interface SessionEvents {
 *   stateChange: { from: string; to: string };
 * }
 *
 * const emitter: IEventEmitter<SessionEvents> = new EventEmitter('Session');
 * const sub = emitter.on('stateChange', (payload) => console.debug(payload.to));
 * sub.dispose();
 * ```
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    /**
     * Register an event handler.
     * @returns A disposable to remove the handler
     */
    on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Register a handler that is removed after it fires once.
     * @returns A disposable to remove the handler before it fires
     */
    once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are caught and reported, NOT propagated.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;

    /**
     * Remove all handlers for one event, or for every event when omitted.
     */
    removeAllListeners(event?: keyof TEventMap): void;

    /**
     * Number of handlers registered for an event.
     */
    listenerCount(event: keyof TEventMap): number;
}
