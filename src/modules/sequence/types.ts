/**
 * @fileoverview Type definitions for the primary/secondary sequence state machine.
 * @module modules/sequence/types
 * @version 1.0.0
 */

/**
 * Progress of one alarm through its clips. Transitions only move forward.
 */
export type SequenceState =
    | 'NotStarted'
    | 'PlayingPrimary'
    | 'WaitingGap'
    | 'PlayingSecondary'
    | 'Completed';

/**
 * Inputs to {@link advanceSequence}.
 *
 * - `primaryStarted` / `gapElapsed` record that a clip began playing.
 * - `primaryFinished` is reported when a secondary clip is configured.
 * - `noSecondaryConfigured` is reported instead when the primary finishes alone.
 */
export type SequenceEvent =
    | 'primaryStarted'
    | 'primaryFinished'
    | 'noSecondaryConfigured'
    | 'gapElapsed'
    | 'secondaryFinished';

/**
 * What the caller must do after a transition.
 * `resetOnly` means nothing beyond recording the new state.
 */
export type SequenceEffect =
    | 'scheduleSecondaryAfterGap'
    | 'completeAlarmIfStopAfterSecondary'
    | 'resetOnly';

export interface SequenceTransition {
    state: SequenceState;
    effect: SequenceEffect;
    /** False when the event did not apply to the current state */
    changed: boolean;
}

