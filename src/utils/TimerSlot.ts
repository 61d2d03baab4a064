/**
 * @fileoverview Cancellable timer token.
 * @module utils/TimerSlot
 * @version 1.0.0
 */

import type { CoordinationLoop } from './CoordinationLoop';

/**
 * Holds at most one pending timer. Scheduling again cancels the previous
 * token first, so a stale callback never fires against newer state.
 */
export class TimerSlot {
    private _timerId: ReturnType<typeof setTimeout> | null = null;
    private _generation = 0;

    /**
     * @param _label - Name used for the loop task and logs
     * @param _loop - When set, the fired callback is posted to this loop
     */
    constructor(
        private readonly _label: string,
        private readonly _loop: CoordinationLoop | null = null
    ) {}

    /**
     * Schedule `fn` after `delayMs`, replacing any pending timer.
     */
    public schedule(delayMs: number, fn: () => void): void {
        this.cancel();
        const generation = ++this._generation;
        this._timerId = setTimeout(() => {
            if (generation !== this._generation) {
                return;
            }
            this._timerId = null;
            if (this._loop) {
                this._loop.post(this._label, fn);
            } else {
                fn();
            }
        }, Math.max(0, delayMs));
    }

    public cancel(): void {
        this._generation++;
        if (this._timerId !== null) {
            clearTimeout(this._timerId);
            this._timerId = null;
        }
    }

    public isPending(): boolean {
        return this._timerId !== null;
    }

    public get label(): string {
        return this._label;
    }
}
