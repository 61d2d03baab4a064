/**
 * @fileoverview Public exports for the sequence module.
 * @module modules/sequence
 * @version 1.0.0
 */

export { advanceSequence, SequenceTracker } from './SequenceStateMachine';
export { SEQUENCE_STATE_ORDER } from './constants';
export type { SequenceState, SequenceEvent, SequenceEffect, SequenceTransition } from './types';
