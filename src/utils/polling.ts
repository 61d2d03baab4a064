/**
 * @fileoverview Awaitable, cancellable polling and wait steps.
 * @module utils/polling
 * @version 1.0.0
 */

export type PollStatus = 'satisfied' | 'exhausted' | 'cancelled';

export interface PollResult {
    status: PollStatus;
    /** Number of checks performed (0 when cancelled before the first) */
    polls: number;
}

export interface PollOptions {
    intervalMs: number;
    maxPolls: number;
    signal: AbortSignal;
    /** Invoked after each unsatisfied check with the running count */
    onPoll?: (polls: number) => void;
}

/**
 * Check `condition` every `intervalMs`, up to `maxPolls` times.
 * The first check happens one interval after the call.
 *
 * Never rejects: a throwing condition counts as unsatisfied.
 */
export function pollUntil(condition: () => boolean, options: PollOptions): Promise<PollResult> {
    const { intervalMs, maxPolls, signal } = options;

    return new Promise<PollResult>((resolve) => {
        let polls = 0;
        let timerId: ReturnType<typeof setTimeout> | null = null;

        const finish = (status: PollStatus): void => {
            if (timerId !== null) {
                clearTimeout(timerId);
                timerId = null;
            }
            signal.removeEventListener('abort', onAbort);
            resolve({ status, polls });
        };

        const onAbort = (): void => finish('cancelled');

        const tick = (): void => {
            timerId = null;
            if (signal.aborted) {
                finish('cancelled');
                return;
            }
            polls++;
            let satisfied = false;
            try {
                satisfied = condition();
            } catch (error) {
                console.warn('[polling] Condition check threw:', error);
            }
            if (satisfied) {
                finish('satisfied');
                return;
            }
            if (options.onPoll) {
                options.onPoll(polls);
            }
            if (polls >= maxPolls) {
                finish('exhausted');
                return;
            }
            timerId = setTimeout(tick, intervalMs);
        };

        if (signal.aborted) {
            resolve({ status: 'cancelled', polls });
            return;
        }
        signal.addEventListener('abort', onAbort);
        timerId = setTimeout(tick, intervalMs);
    });
}

/**
 * Resolve `true` after `delayMs`, or `false` as soon as `signal` aborts.
 */
export function waitFor(delayMs: number, signal: AbortSignal): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
        if (signal.aborted) {
            resolve(false);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timerId);
            resolve(false);
        };
        const timerId = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve(true);
        }, Math.max(0, delayMs));
        signal.addEventListener('abort', onAbort);
    });
}
