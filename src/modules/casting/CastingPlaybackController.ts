/**
 * @fileoverview Loads alarm media onto a connected remote session and
 * reports start, failure and completion.
 * @module modules/casting/CastingPlaybackController
 * @version 1.0.0
 */

import { AppErrorCode, createAppError, errorMessageOf } from '../../types';
import type { AppError } from '../../types';
import { TimerSlot, redactMediaUrl } from '../../utils';
import type { CoordinationLoop, IDisposable } from '../../utils';
import type { IRemoteSessionManager, MediaLoadResult, RemoteMediaStatus } from '../remote';
import type { SequenceTracker } from '../sequence';
import { DEFAULT_CASTING_CONTROLLER_CONFIG } from './constants';
import type { ICastingPlaybackController } from './interfaces';
import type {
    CastCallbacks,
    CastClip,
    CastingControllerConfig,
    CastSequenceRequest,
    CastSingleRequest,
    CastStartResult,
} from './types';

export interface CastingPlaybackControllerDeps {
    sessionManager: IRemoteSessionManager;
    loop: CoordinationLoop;
}

interface ActiveCast {
    alarmId: string;
    title: string;
    callbacks: CastCallbacks;
    loop: boolean;
    /** Null for single-clip casts */
    sequence: SequenceTracker | null;
    secondaryUrl: string | null;
    gapMs: number;
    clip: CastClip;
    expectedUrl: string;
    started: boolean;
    /** Set on a loop reload so the previous pass's finish is not counted twice */
    ignoreFinishUntilActive: boolean;
    verification: TimerSlot;
    gap: TimerSlot;
    subscriptions: IDisposable[];
}

export class CastingPlaybackController implements ICastingPlaybackController {
    private readonly _sessionManager: IRemoteSessionManager;
    private readonly _loop: CoordinationLoop;
    private readonly _config: CastingControllerConfig;

    // The in-flight flag: set when a cast is accepted, cleared on every terminal outcome.
    private _active: ActiveCast | null = null;

    constructor(deps: CastingPlaybackControllerDeps, config: Partial<CastingControllerConfig> = {}) {
        this._sessionManager = deps.sessionManager;
        this._loop = deps.loop;
        this._config = { ...DEFAULT_CASTING_CONTROLLER_CONFIG, ...config };
    }

    public castSingle(request: CastSingleRequest, callbacks: CastCallbacks): CastStartResult {
        const rejection = this._checkAcceptance(request.alarmId);
        if (rejection) {
            return { ok: false, error: rejection };
        }
        const cast = this._begin(request.alarmId, request.title, callbacks, {
            loop: request.loop,
            sequence: null,
            secondaryUrl: null,
            gapMs: 0,
            clip: 'single',
            expectedUrl: request.url,
        });
        this._sessionManager.setVolume(request.volume);
        this._load(cast, request.url, 'single');
        return { ok: true };
    }

    public castSequence(request: CastSequenceRequest, callbacks: CastCallbacks): CastStartResult {
        const rejection = this._checkAcceptance(request.alarmId);
        if (rejection) {
            return { ok: false, error: rejection };
        }
        const cast = this._begin(request.alarmId, request.title, callbacks, {
            loop: false,
            sequence: request.sequence,
            secondaryUrl: request.secondaryUrl,
            gapMs: Math.max(0, request.sequenceGapMs),
            clip: 'primary',
            expectedUrl: request.primaryUrl,
        });
        this._sessionManager.setVolume(request.volume);
        this._load(cast, request.primaryUrl, 'primary');
        return { ok: true };
    }

    public stopCasting(): boolean {
        const cast = this._active;
        if (!cast) {
            return false;
        }
        console.log(`[CastingController] Stopping cast for ${cast.alarmId}`);
        this._teardown(cast);
        this._sessionManager.stopRemotePlayback();
        return true;
    }

    public isCasting(): boolean {
        return this._active !== null;
    }

    public getActiveAlarmId(): string | null {
        return this._active ? this._active.alarmId : null;
    }

    public dispose(): void {
        if (this._active) {
            this._teardown(this._active);
        }
    }

    // ============================================
    // Attempt lifecycle
    // ============================================

    private _checkAcceptance(alarmId: string): AppError | null {
        if (this._active) {
            console.warn(`[CastingController] Rejecting cast for ${alarmId}: ${this._active.alarmId} is casting`);
            return createAppError(AppErrorCode.ALREADY_CASTING, 'A cast start is already in flight', {
                alarmId,
                activeAlarmId: this._active.alarmId,
            });
        }
        const state = this._sessionManager.getState();
        if (state.kind !== 'Connected' || !this._sessionManager.isSessionActive()) {
            return createAppError(AppErrorCode.NO_USABLE_DEVICE, `No connected session (state ${state.kind})`, {
                alarmId,
            });
        }
        return null;
    }

    private _begin(
        alarmId: string,
        title: string,
        callbacks: CastCallbacks,
        shape: Pick<ActiveCast, 'loop' | 'sequence' | 'secondaryUrl' | 'gapMs' | 'clip' | 'expectedUrl'>
    ): ActiveCast {
        const cast: ActiveCast = {
            alarmId,
            title,
            callbacks,
            ...shape,
            started: false,
            ignoreFinishUntilActive: false,
            verification: new TimerSlot(`casting.verify.${alarmId}`, this._loop),
            gap: new TimerSlot(`casting.gap.${alarmId}`, this._loop),
            subscriptions: [],
        };
        this._active = cast;

        // Observers go in before the load: a receiver may report during it.
        cast.subscriptions.push(
            this._sessionManager.onMediaStatus((status) => this._observeStatus(cast, status)),
            this._sessionManager.onSessionTerminated(({ error }) => {
                if (this._active === cast) {
                    this._fail(cast, error);
                }
            })
        );
        return cast;
    }

    private _load(cast: ActiveCast, url: string, clip: CastClip): void {
        cast.clip = clip;
        cast.expectedUrl = url;
        cast.verification.cancel();
        console.log(`[CastingController] Loading ${clip} for ${cast.alarmId}: ${redactMediaUrl(url)}`);

        this._sessionManager
            .loadMedia({
                url,
                contentType: this._config.contentType,
                title: cast.title,
                artist: this._config.artist,
                autoplay: true,
            })
            .then((result) => {
                this._loop.post('casting.loadResult', () => this._handleLoadResult(cast, url, result));
            })
            .catch((error: unknown) => {
                console.error('[CastingController] Load result handling failed:', error);
            });
    }

    private _handleLoadResult(cast: ActiveCast, url: string, result: MediaLoadResult): void {
        // Stopped, failed, or moved on to another clip while the load was out.
        if (this._active !== cast || cast.expectedUrl !== url) {
            return;
        }
        if (!result.ok) {
            this._fail(
                cast,
                createAppError(AppErrorCode.LOAD_FAILED, `Load failed: ${result.status}`, {
                    status: result.status,
                    clip: cast.clip,
                })
            );
            return;
        }
        cast.verification.schedule(this._config.verificationDelayMs, () => this._verifyPlayback(cast, url));
    }

    private _verifyPlayback(cast: ActiveCast, url: string): void {
        if (this._active !== cast || cast.expectedUrl !== url) {
            return;
        }
        const status = this._sessionManager.getMediaStatus();
        const matches = status !== null && (status.contentId === null || status.contentId === url);
        if (matches && (status.playerState === 'playing' || status.playerState === 'buffering')) {
            if (this._config.debugLogging) {
                console.debug(`[CastingController] Verified ${cast.clip} playback for ${cast.alarmId}`);
            }
            return;
        }
        const reported = status ? status.playerState : 'no status';
        this._fail(
            cast,
            createAppError(
                AppErrorCode.PLAYBACK_VERIFICATION_FAILED,
                `Receiver reported ${reported} ${this._config.verificationDelayMs}ms after load`,
                { clip: cast.clip }
            )
        );
    }

    // ============================================
    // Status observer
    // ============================================

    private _observeStatus(cast: ActiveCast, status: RemoteMediaStatus): void {
        if (this._active !== cast) {
            return;
        }
        // Late reports about the previous clip.
        if (status.contentId !== null && status.contentId !== cast.expectedUrl) {
            return;
        }
        try {
            this._applyStatus(cast, status);
        } catch (error) {
            console.error('[CastingController] Status observer failed:', error);
            if (this._active === cast) {
                this._fail(
                    cast,
                    createAppError(AppErrorCode.UNKNOWN, `Status observer failed: ${errorMessageOf(error)}`)
                );
            }
        }
    }

    private _applyStatus(cast: ActiveCast, status: RemoteMediaStatus): void {
        switch (status.playerState) {
            case 'loading':
            case 'buffering':
                cast.ignoreFinishUntilActive = false;
                return;

            case 'playing':
                cast.ignoreFinishUntilActive = false;
                if (cast.sequence && cast.clip === 'primary') {
                    cast.sequence.advance('primaryStarted');
                }
                if (!cast.started) {
                    cast.started = true;
                    console.log(`[CastingController] Playback started for ${cast.alarmId}`);
                    cast.callbacks.onStarted();
                }
                return;

            case 'paused':
                return;

            case 'error':
                this._fail(cast, createAppError(AppErrorCode.LOAD_FAILED, 'Receiver reported a playback error'));
                return;

            case 'idle':
                if (status.idleReason === 'error') {
                    this._fail(cast, createAppError(AppErrorCode.LOAD_FAILED, 'Receiver stopped with an error'));
                } else if (status.idleReason === 'finished' && !cast.ignoreFinishUntilActive) {
                    this._handleClipFinished(cast);
                }
                return;
        }
    }

    private _handleClipFinished(cast: ActiveCast): void {
        cast.verification.cancel();

        if (!cast.sequence) {
            if (cast.loop) {
                cast.ignoreFinishUntilActive = true;
                this._load(cast, cast.expectedUrl, 'single');
                return;
            }
            this._complete(cast);
            return;
        }

        const sequence = cast.sequence;
        if (cast.clip === 'primary') {
            const secondaryUrl = cast.secondaryUrl;
            const transition = sequence.advance(secondaryUrl ? 'primaryFinished' : 'noSecondaryConfigured');
            // Repeated finish reports for the primary while the gap runs.
            if (!transition.changed) {
                return;
            }
            if (transition.effect === 'scheduleSecondaryAfterGap' && secondaryUrl) {
                console.log(`[CastingController] Primary finished; secondary in ${cast.gapMs}ms`);
                cast.gap.schedule(cast.gapMs, () => {
                    if (this._active !== cast) {
                        return;
                    }
                    sequence.advance('gapElapsed');
                    this._load(cast, secondaryUrl, 'secondary');
                });
                return;
            }
            this._complete(cast);
            return;
        }

        if (cast.clip === 'secondary' && sequence.advance('secondaryFinished').changed) {
            this._complete(cast);
        }
    }

    // ============================================
    // Terminal outcomes
    // ============================================

    private _complete(cast: ActiveCast): void {
        this._teardown(cast);
        console.log(`[CastingController] Cast completed for ${cast.alarmId}`);
        try {
            cast.callbacks.onCompletion();
        } catch (error) {
            console.error('[CastingController] Completion observer failed:', error);
            this._notifyFailed(
                cast,
                createAppError(AppErrorCode.UNKNOWN, `Completion observer failed: ${errorMessageOf(error)}`)
            );
        }
    }

    private _fail(cast: ActiveCast, error: AppError): void {
        this._teardown(cast);
        console.warn(`[CastingController] Cast failed for ${cast.alarmId}: ${error.code} ${error.message}`);
        this._notifyFailed(cast, error);
    }

    private _notifyFailed(cast: ActiveCast, error: AppError): void {
        try {
            cast.callbacks.onFailed(error);
        } catch (callbackError) {
            console.error('[CastingController] Failure observer failed:', callbackError);
        }
    }

    /**
     * Cancel timers, drop observers and clear the in-flight flag.
     */
    private _teardown(cast: ActiveCast): void {
        cast.verification.cancel();
        cast.gap.cancel();
        for (const subscription of cast.subscriptions) {
            subscription.dispose();
        }
        cast.subscriptions = [];
        if (this._active === cast) {
            this._active = null;
        }
    }
}
