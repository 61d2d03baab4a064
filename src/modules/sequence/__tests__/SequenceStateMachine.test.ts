/**
 * @fileoverview Unit tests for the primary/secondary sequence state machine.
 * @module modules/sequence/__tests__/SequenceStateMachine.test
 */

import { SequenceTracker, advanceSequence } from '../SequenceStateMachine';
import type { SequenceEvent, SequenceState } from '../types';

describe('advanceSequence', () => {
    it('walks the full primary -> gap -> secondary path', () => {
        const started = advanceSequence('NotStarted', 'primaryStarted');
        expect(started).toEqual({ state: 'PlayingPrimary', effect: 'resetOnly', changed: true });

        const finished = advanceSequence(started.state, 'primaryFinished');
        expect(finished).toEqual({ state: 'WaitingGap', effect: 'scheduleSecondaryAfterGap', changed: true });

        const gap = advanceSequence(finished.state, 'gapElapsed');
        expect(gap).toEqual({ state: 'PlayingSecondary', effect: 'resetOnly', changed: true });

        const done = advanceSequence(gap.state, 'secondaryFinished');
        expect(done).toEqual({ state: 'Completed', effect: 'completeAlarmIfStopAfterSecondary', changed: true });
    });

    it('completes straight from the primary when no secondary is configured', () => {
        expect(advanceSequence('PlayingPrimary', 'noSecondaryConfigured')).toEqual({
            state: 'Completed',
            effect: 'completeAlarmIfStopAfterSecondary',
            changed: true,
        });
    });

    it('accepts a primary finish reported before its start', () => {
        expect(advanceSequence('NotStarted', 'primaryFinished').state).toBe('WaitingGap');
    });

    it.each<SequenceEvent>(['primaryStarted', 'primaryFinished', 'noSecondaryConfigured', 'gapElapsed', 'secondaryFinished'])(
        'treats Completed as absorbing for %s',
        (event) => {
            expect(advanceSequence('Completed', event)).toEqual({
                state: 'Completed',
                effect: 'resetOnly',
                changed: false,
            });
        }
    );

    it.each<[SequenceState, SequenceEvent]>([
        ['NotStarted', 'secondaryFinished'],
        ['NotStarted', 'gapElapsed'],
        ['PlayingPrimary', 'primaryStarted'],
        ['WaitingGap', 'primaryFinished'],
        ['WaitingGap', 'noSecondaryConfigured'],
        ['PlayingSecondary', 'primaryFinished'],
        ['PlayingSecondary', 'gapElapsed'],
    ])('ignores %s + %s', (state, event) => {
        expect(advanceSequence(state, event)).toEqual({ state, effect: 'resetOnly', changed: false });
    });
});

describe('SequenceTracker', () => {
    it('advances and reports completion', () => {
        const tracker = new SequenceTracker('alarm-1');

        tracker.advance('primaryStarted');
        tracker.advance('primaryFinished');
        expect(tracker.getState()).toBe('WaitingGap');
        expect(tracker.isCompleted()).toBe(false);

        tracker.advance('gapElapsed');
        const last = tracker.advance('secondaryFinished');

        expect(last.effect).toBe('completeAlarmIfStopAfterSecondary');
        expect(tracker.isCompleted()).toBe(true);
    });

    it('yields the completing effect only once', () => {
        const tracker = new SequenceTracker('alarm-1');

        const first = tracker.advance('noSecondaryConfigured');
        const second = tracker.advance('noSecondaryConfigured');

        expect(first.changed).toBe(true);
        expect(second).toEqual({ state: 'Completed', effect: 'resetOnly', changed: false });
    });

    it('returns to NotStarted on reset', () => {
        const tracker = new SequenceTracker('alarm-1');
        tracker.advance('noSecondaryConfigured');

        tracker.reset();

        expect(tracker.getState()).toBe('NotStarted');
        expect(tracker.advance('primaryStarted').changed).toBe(true);
    });

    it('logs transitions only when debug is enabled', () => {
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});

        new SequenceTracker('quiet').advance('primaryStarted');
        expect(debug).not.toHaveBeenCalled();

        new SequenceTracker('loud', true).advance('primaryStarted');
        expect(debug).toHaveBeenCalledWith('[SequenceTracker] loud: NotStarted -> PlayingPrimary (primaryStarted, resetOnly)');

        debug.mockRestore();
    });
});
