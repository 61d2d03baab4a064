/**
 * @fileoverview Constants for the sequence state machine.
 * @module modules/sequence/constants
 * @version 1.0.0
 */

import type { SequenceState } from './types';

/**
 * Forward order of sequence states; a transition never lowers the rank.
 */
export const SEQUENCE_STATE_ORDER: Readonly<Record<SequenceState, number>> = {
    NotStarted: 0,
    PlayingPrimary: 1,
    WaitingGap: 2,
    PlayingSecondary: 3,
    Completed: 4,
};
