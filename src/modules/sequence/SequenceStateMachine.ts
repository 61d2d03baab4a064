/**
 * @fileoverview Primary → gap → secondary progression shared by local and cast playback.
 * @module modules/sequence/SequenceStateMachine
 * @version 1.0.0
 */

import { SEQUENCE_STATE_ORDER } from './constants';
import type { SequenceEffect, SequenceEvent, SequenceState, SequenceTransition } from './types';

const IGNORED = (state: SequenceState): SequenceTransition => ({
    state,
    effect: 'resetOnly',
    changed: false,
});

/**
 * Pure transition function.
 *
 * Unknown or out-of-order events leave the state untouched and yield
 * `resetOnly`. `Completed` absorbs every event.
 */
export function advanceSequence(state: SequenceState, event: SequenceEvent): SequenceTransition {
    if (state === 'Completed') {
        return IGNORED(state);
    }

    let next: SequenceState | null = null;
    let effect: SequenceEffect = 'resetOnly';

    switch (event) {
        case 'primaryStarted':
            if (state === 'NotStarted') {
                next = 'PlayingPrimary';
            }
            break;

        // A finish reported before the start was recorded still counts:
        // the clip did play.
        case 'primaryFinished':
            if (state === 'NotStarted' || state === 'PlayingPrimary') {
                next = 'WaitingGap';
                effect = 'scheduleSecondaryAfterGap';
            }
            break;

        case 'noSecondaryConfigured':
            if (state === 'NotStarted' || state === 'PlayingPrimary') {
                next = 'Completed';
                effect = 'completeAlarmIfStopAfterSecondary';
            }
            break;

        case 'gapElapsed':
            if (state === 'WaitingGap') {
                next = 'PlayingSecondary';
            }
            break;

        case 'secondaryFinished':
            if (state === 'PlayingSecondary') {
                next = 'Completed';
                effect = 'completeAlarmIfStopAfterSecondary';
            }
            break;
    }

    if (next === null || SEQUENCE_STATE_ORDER[next] <= SEQUENCE_STATE_ORDER[state]) {
        return IGNORED(state);
    }
    return { state: next, effect, changed: true };
}

/**
 * Mutable holder of one alarm's {@link SequenceState}.
 * Owned by the orchestrator; cast and local paths advance the same instance.
 */
export class SequenceTracker {
    private _state: SequenceState = 'NotStarted';

    constructor(
        private readonly _alarmId: string,
        private readonly _debug: boolean = false
    ) {}

    public getState(): SequenceState {
        return this._state;
    }

    public isCompleted(): boolean {
        return this._state === 'Completed';
    }

    public advance(event: SequenceEvent): SequenceTransition {
        const from = this._state;
        const transition = advanceSequence(from, event);
        if (transition.changed) {
            this._state = transition.state;
        }
        if (!this._debug) {
            return transition;
        }
        if (transition.changed) {
            console.debug(
                `[SequenceTracker] ${this._alarmId}: ${from} -> ${transition.state} (${event}, ${transition.effect})`
            );
        } else {
            console.debug(`[SequenceTracker] ${this._alarmId}: ignored ${event} in ${from}`);
        }
        return transition;
    }

    /**
     * Return to `NotStarted`. Only valid when an alarm starts or fully stops.
     */
    public reset(): void {
        this._state = 'NotStarted';
    }
}
