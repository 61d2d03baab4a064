/**
 * @fileoverview Single logical coordination loop.
 * @module utils/CoordinationLoop
 * @version 1.0.0
 *
 * Every callback that originates outside the core (remote protocol, local
 * audio backend, timers) is posted here before it touches shared state.
 * A task posted while another task is running is queued and runs after it,
 * so two callbacks never interleave their mutations.
 */

export type LoopTaskErrorHandler = (label: string, error: unknown) => void;

interface QueuedTask {
    label: string;
    run: () => void;
}

export class CoordinationLoop {
    private _queue: QueuedTask[] = [];
    private _draining = false;
    private _disposed = false;
    private _onTaskError: LoopTaskErrorHandler | null = null;

    /**
     * Register a hook notified whenever a task throws.
     * The loop keeps draining regardless.
     */
    public setTaskErrorHandler(handler: LoopTaskErrorHandler | null): void {
        this._onTaskError = handler;
    }

    /**
     * Run a task on the loop. Runs synchronously when the loop is idle,
     * otherwise after every task already queued.
     */
    public post(label: string, run: () => void): void {
        if (this._disposed) {
            console.debug(`[CoordinationLoop] Dropping task after dispose: ${label}`);
            return;
        }
        this._queue.push({ label, run });
        if (this._draining) {
            return;
        }
        this._drain();
    }

    /**
     * Wrap a callback so each invocation is posted to the loop.
     */
    public bind<TArgs extends unknown[]>(
        label: string,
        fn: (...args: TArgs) => void
    ): (...args: TArgs) => void {
        return (...args: TArgs): void => {
            this.post(label, () => fn(...args));
        };
    }

    /**
     * Whether a task is currently executing.
     */
    public isRunning(): boolean {
        return this._draining;
    }

    public pendingCount(): number {
        return this._queue.length;
    }

    public dispose(): void {
        this._disposed = true;
        this._queue = [];
    }

    private _drain(): void {
        this._draining = true;
        try {
            let task = this._queue.shift();
            while (task) {
                this._runTask(task);
                task = this._queue.shift();
            }
        } finally {
            this._draining = false;
        }
    }

    private _runTask(task: QueuedTask): void {
        try {
            task.run();
        } catch (error) {
            console.error(`[CoordinationLoop] Task '${task.label}' failed:`, error);
            if (this._onTaskError) {
                try {
                    this._onTaskError(task.label, error);
                } catch (hookError) {
                    console.error('[CoordinationLoop] Task error handler failed:', hookError);
                }
            }
        }
    }
}
