/**
 * @fileoverview Alarm Playback Orchestrator - decides cast vs local per alarm
 * and owns every alarm's termination.
 * @module Orchestrator
 * @version 1.0.0
 *
 * Responsibilities:
 * - Request validation and the at-most-one-active-start guard
 * - Cast path: device resolution, reconnection, cast start, safety timeout
 * - One-way remote -> local fallback
 * - Local sequencing against the shared SequenceTracker
 * - The single termination routine (`stop`)
 */

import type { ICastingPlaybackController } from './modules/casting';
import { EMPTY_PLAYBACK_SNAPSHOT, clampVolume, describeSessionState } from './modules/remote';
import type { IRemoteSessionManager, PlaybackSnapshot, ReconnectOutcome, RemoteDeviceRef } from './modules/remote';
import { SequenceTracker } from './modules/sequence';
import type { SequenceState } from './modules/sequence';
import {
    AppErrorCode,
    CASTING_PATH_ERROR_CODES,
    createAppError,
    errorMessageOf,
    httpCastUrlResolver,
    summarizeErrorForLog,
    validateAlarmPlaybackRequest,
} from './types';
import type {
    AlarmPlaybackRequest,
    AppError,
    BookkeepingResult,
    IAlarmBookkeeping,
    ICastUrlResolver,
    ILocalAudioBackend,
    IRingingSignal,
    IVibrationControl,
} from './types';
import { TimerSlot, redactMediaUrl } from './utils';
import type { CoordinationLoop, IDisposable } from './utils';

// ============================================
// Configuration
// ============================================

export interface OrchestratorConfig {
    /** Last-resort ceiling for a cast whose completion never arrives */
    safetyTimeoutMs: number;
    /** A position this close to the duration counts as finished */
    completionMarginMs: number;
    /** Wait before the cast path starts; 0 starts it in the same tick */
    castStartDelayMs: number;
    defaultFadeMs: number;
    defaultFadeSteps: number;
    debugLogging: boolean;
}

export const SAFETY_TIMEOUT_MS = 2 * 60 * 60 * 1000;
export const COMPLETION_MARGIN_MS = 5000;
export const CAST_START_DELAY_MS = 2500;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
    safetyTimeoutMs: SAFETY_TIMEOUT_MS,
    completionMarginMs: COMPLETION_MARGIN_MS,
    castStartDelayMs: CAST_START_DELAY_MS,
    defaultFadeMs: 0,
    defaultFadeSteps: 0,
    debugLogging: false,
};

export interface AlarmPlaybackOrchestratorDeps {
    loop: CoordinationLoop;
    sessionManager: IRemoteSessionManager;
    castingController: ICastingPlaybackController;
    localAudio: ILocalAudioBackend;
    bookkeeping: IAlarmBookkeeping;
    ringingSignal: IRingingSignal;
    vibration?: IVibrationControl;
    castUrlResolver?: ICastUrlResolver;
}

export type PlaybackPath = 'remote' | 'local';

export type AlarmStartResult = { ok: true; path: PlaybackPath } | { ok: false; error: AppError };

export type ActiveBackend = 'pending' | 'remote' | 'local';

export type TerminationReason = 'stop' | 'completed' | 'safety-timeout' | 'dispose';

type LocalClip = 'single' | 'primary' | 'secondary';

type PlaybackSample = Pick<PlaybackSnapshot, 'positionMs' | 'durationMs' | 'isPlaying' | 'isBuffering'>;

interface CastPlan {
    device: RemoteDeviceRef;
    primaryUrl: string;
    secondaryUrl: string | null;
}

/**
 * Per-alarm state. Replaces process-wide flags: nothing here outlives `stop`.
 */
interface AlarmContext {
    request: AlarmPlaybackRequest;
    backend: ActiveBackend;
    sequence: SequenceTracker;
    castPlan: CastPlan | null;
    fallbackUsed: boolean;
    castStarted: boolean;
    localClip: { id: string; clip: LocalClip } | null;
    vibrating: boolean;
    stopped: boolean;
    castStartTimer: TimerSlot;
    safetyTimer: TimerSlot;
    gapTimer: TimerSlot;
    remoteSubscriptions: IDisposable[];
}

// ============================================
// Orchestrator
// ============================================

export class AlarmPlaybackOrchestrator {
    private readonly _loop: CoordinationLoop;
    private readonly _sessionManager: IRemoteSessionManager;
    private readonly _castingController: ICastingPlaybackController;
    private readonly _localAudio: ILocalAudioBackend;
    private readonly _bookkeeping: IAlarmBookkeeping;
    private readonly _ringingSignal: IRingingSignal;
    private readonly _vibration: IVibrationControl | null;
    private readonly _castUrlResolver: ICastUrlResolver;
    private readonly _config: OrchestratorConfig;

    private _contexts: Map<string, AlarmContext> = new Map();
    private _subscriptions: IDisposable[] = [];
    private _initialized = false;

    constructor(deps: AlarmPlaybackOrchestratorDeps, config: Partial<OrchestratorConfig> = {}) {
        this._loop = deps.loop;
        this._sessionManager = deps.sessionManager;
        this._castingController = deps.castingController;
        this._localAudio = deps.localAudio;
        this._bookkeeping = deps.bookkeeping;
        this._ringingSignal = deps.ringingSignal;
        this._vibration = deps.vibration ?? null;
        this._castUrlResolver = deps.castUrlResolver ?? httpCastUrlResolver;
        this._config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    }

    public initialize(): void {
        if (this._initialized) {
            return;
        }
        this._initialized = true;
        this._subscriptions.push(
            this._localAudio.onCompletion(
                this._loop.bind('orchestrator.localCompletion', (clipId: string) =>
                    this._handleLocalCompletion(clipId)
                )
            )
        );
    }

    /**
     * Stop every alarm and drop backend subscriptions.
     */
    public dispose(): void {
        for (const alarmId of Array.from(this._contexts.keys())) {
            this._terminate(alarmId, 'dispose');
        }
        for (const subscription of this._subscriptions) {
            try {
                subscription.dispose();
            } catch (error) {
                console.warn('[Orchestrator] Failed to dispose subscription:', summarizeErrorForLog(error));
            }
        }
        this._subscriptions = [];
        this._initialized = false;
    }

    // ============================================
    // Public API
    // ============================================

    /**
     * Begin ringing an alarm, casting when possible.
     */
    public start(request: AlarmPlaybackRequest): AlarmStartResult {
        const rejection = this._admit(request);
        if (rejection) {
            return { ok: false, error: rejection };
        }
        const context = this._register(request);

        const plan = this._planCast(request);
        if (!plan) {
            this._loop.post('orchestrator.startLocal', () => this._playLocal(context));
            return { ok: true, path: 'local' };
        }

        context.castPlan = plan;
        console.log(
            `[Orchestrator] Casting ${request.alarmId} to ${plan.device.name} ` +
                `(sequence: ${plan.secondaryUrl !== null})`
        );
        if (this._config.castStartDelayMs > 0) {
            context.castStartTimer.schedule(this._config.castStartDelayMs, () => this._beginCast(context));
        } else {
            this._loop.post('orchestrator.startCast', () => this._beginCast(context));
        }
        return { ok: true, path: 'remote' };
    }

    /**
     * Begin ringing an alarm on local audio only.
     */
    public playLocal(request: AlarmPlaybackRequest): AlarmStartResult {
        const rejection = this._admit(request);
        if (rejection) {
            return { ok: false, error: rejection };
        }
        const context = this._register(request);
        this._loop.post('orchestrator.playLocal', () => this._playLocal(context));
        return { ok: true, path: 'local' };
    }

    /**
     * The single termination path. Repeated calls are no-ops; never throws.
     */
    public stop(alarmId: string): void {
        this._terminate(alarmId, 'stop');
    }

    public isRinging(alarmId: string): boolean {
        return this._contexts.has(alarmId);
    }

    public getRingingAlarmIds(): string[] {
        return Array.from(this._contexts.keys());
    }

    public getActiveBackend(alarmId: string): ActiveBackend | null {
        const context = this._contexts.get(alarmId);
        return context ? context.backend : null;
    }

    public getSequenceState(alarmId: string): SequenceState | null {
        const context = this._contexts.get(alarmId);
        return context ? context.sequence.getState() : null;
    }

    /**
     * Playback mirror of whichever backend the alarm is on.
     * The local engine reports no progress, so local snapshots carry flags only.
     */
    public getPlaybackSnapshot(alarmId: string): PlaybackSnapshot | null {
        const context = this._contexts.get(alarmId);
        if (!context) {
            return null;
        }
        if (context.backend === 'remote') {
            return this._sessionManager.getPlaybackSnapshot();
        }
        const clip = context.localClip;
        const isPlaying = clip !== null && this._safeListPlaying().includes(clip.id);
        return {
            ...EMPTY_PLAYBACK_SNAPSHOT,
            isPlaying,
            currentMediaRef: clip ? this._mediaRefFor(context.request, clip.clip) : null,
            playerState: isPlaying ? 'playing' : 'idle',
            volume: this._resolveVolume(context.request),
        };
    }

    // ============================================
    // Admission
    // ============================================

    private _admit(request: AlarmPlaybackRequest): AppError | null {
        const invalid = validateAlarmPlaybackRequest(request);
        if (invalid) {
            console.warn(`[Orchestrator] ${invalid.message}`);
            return invalid;
        }
        if (this._contexts.has(request.alarmId)) {
            console.warn(`[Orchestrator] Alarm ${request.alarmId} is already active`);
            return createAppError(AppErrorCode.ALREADY_ACTIVE, `Alarm ${request.alarmId} is already active`, {
                alarmId: request.alarmId,
            });
        }
        if (request.allowOverlap === false && this._contexts.size > 0) {
            console.warn(`[Orchestrator] Alarm ${request.alarmId} refused: another alarm is ringing`);
            return createAppError(AppErrorCode.ALREADY_ACTIVE, 'Another alarm is ringing', {
                alarmId: request.alarmId,
                ringing: this.getRingingAlarmIds(),
            });
        }
        return null;
    }

    private _register(request: AlarmPlaybackRequest): AlarmContext {
        const alarmId = request.alarmId;
        const context: AlarmContext = {
            request,
            backend: 'pending',
            sequence: new SequenceTracker(alarmId, this._config.debugLogging),
            castPlan: null,
            fallbackUsed: false,
            castStarted: false,
            localClip: null,
            vibrating: false,
            stopped: false,
            castStartTimer: new TimerSlot(`orchestrator.castStart.${alarmId}`, this._loop),
            safetyTimer: new TimerSlot(`orchestrator.safety.${alarmId}`, this._loop),
            gapTimer: new TimerSlot(`orchestrator.gap.${alarmId}`, this._loop),
            remoteSubscriptions: [],
        };
        const wasIdle = this._contexts.size === 0;
        this._contexts.set(alarmId, context);

        if (wasIdle) {
            this._safely('ringing signal', () => this._ringingSignal.update(true));
        }
        this._report('alarmStarted', alarmId, () => this._bookkeeping.alarmStarted(alarmId));
        return context;
    }

    /**
     * Casting requested, a device to cast to, and a castable primary URL.
     * The session manager is not consulted when casting is disabled.
     */
    private _planCast(request: AlarmPlaybackRequest): CastPlan | null {
        const reasons: string[] = [];
        if (!request.castingEnabled) {
            console.log(`[Orchestrator] Local audio for ${request.alarmId}: casting disabled`);
            return null;
        }

        const device = request.preferredDevice ?? this._sessionManager.getSavedDevice();
        if (!device) {
            reasons.push('no saved device');
        }
        const primaryUrl = request.primaryMediaRef ? this._resolveCastUrl(request.primaryMediaRef) : null;
        if (!primaryUrl) {
            reasons.push('no cast URL');
        }
        if (!device || !primaryUrl) {
            console.log(`[Orchestrator] Local audio for ${request.alarmId}: ${reasons.join(', ')}`);
            return null;
        }

        const secondaryUrl = request.secondaryMediaRef ? this._resolveCastUrl(request.secondaryMediaRef) : null;
        return { device, primaryUrl, secondaryUrl };
    }

    /**
     * A resolver that throws counts as "not castable".
     */
    private _resolveCastUrl(mediaRef: string): string | null {
        try {
            return this._castUrlResolver.resolveCastUrl(mediaRef);
        } catch (error) {
            console.warn(
                `[Orchestrator] Cast URL lookup failed for ${redactMediaUrl(mediaRef)}:`,
                summarizeErrorForLog(error)
            );
            return null;
        }
    }

    // ============================================
    // Cast path
    // ============================================

    private _beginCast(context: AlarmContext): void {
        const plan = context.castPlan;
        if (!this._isLive(context) || !plan) {
            return;
        }
        const alarmId = context.request.alarmId;

        this._sessionManager
            .reconnect(plan.device, alarmId)
            .then((outcome) => {
                this._loop.post('orchestrator.reconnected', () => this._handleReconnect(context, plan, outcome));
            })
            .catch((error: unknown) => {
                console.error(`[Orchestrator] Reconnect for ${alarmId} failed:`, summarizeErrorForLog(error));
                this._loop.post('orchestrator.reconnectFailed', () =>
                    this._fallbackToLocal(
                        context,
                        createAppError(AppErrorCode.UNKNOWN, `Reconnect failed: ${errorMessageOf(error)}`)
                    )
                );
            });
    }

    private _handleReconnect(context: AlarmContext, plan: CastPlan, outcome: ReconnectOutcome): void {
        if (!this._isLive(context) || context.backend !== 'pending') {
            return;
        }
        // A cancelled attempt of a live alarm was displaced by another alarm's reconnect.
        if (!outcome.ok) {
            this._fallbackToLocal(context, outcome.error);
            return;
        }
        this._startCast(context, plan);
    }

    private _startCast(context: AlarmContext, plan: CastPlan): void {
        const request = context.request;
        const alarmId = request.alarmId;
        const title = request.title ?? `Alarm ${alarmId}`;
        const volume = this._resolveVolume(request);
        const callbacks = {
            onStarted: this._loop.bind('orchestrator.castStarted', () => this._handleCastStarted(context)),
            onFailed: this._loop.bind('orchestrator.castFailed', (error: AppError) =>
                this._fallbackToLocal(context, error)
            ),
            onCompletion: this._loop.bind('orchestrator.castCompleted', () => this._handleCastCompletion(context)),
        };

        const result = plan.secondaryUrl
            ? this._castingController.castSequence(
                  {
                      alarmId,
                      primaryUrl: plan.primaryUrl,
                      secondaryUrl: plan.secondaryUrl,
                      title,
                      volume,
                      sequenceGapMs: request.sequenceGapMs,
                      sequence: context.sequence,
                  },
                  callbacks
              )
            : this._castingController.castSingle(
                  { alarmId, url: plan.primaryUrl, title, volume, loop: request.loop },
                  callbacks
              );

        if (!result.ok) {
            this._fallbackToLocal(context, result.error);
            return;
        }

        context.backend = 'remote';
        context.remoteSubscriptions.push(
            this._sessionManager.onStateChange(({ current }) => {
                if (this._config.debugLogging) {
                    console.debug(`[Orchestrator] Remote state for ${alarmId}: ${describeSessionState(current)}`);
                }
                if (current.kind === 'Error' && this._isLive(context) && context.backend === 'remote') {
                    this._fallbackToLocal(
                        context,
                        createAppError(AppErrorCode.SESSION_LOST, `Remote session error: ${current.message}`)
                    );
                }
            })
        );
    }

    private _handleCastStarted(context: AlarmContext): void {
        if (!this._isLive(context) || context.backend !== 'remote') {
            return;
        }
        context.castStarted = true;
        console.log(`[Orchestrator] Cast started for ${context.request.alarmId}`);
        this._armSafetyTimeout(context);
    }

    private _handleCastCompletion(context: AlarmContext): void {
        if (!this._isLive(context) || context.backend !== 'remote') {
            return;
        }
        const request = context.request;
        const isSequence = context.castPlan !== null && context.castPlan.secondaryUrl !== null;
        if (isSequence ? request.stopAfterSecondary : !request.loop) {
            console.log(`[Orchestrator] Cast playback complete for ${request.alarmId}`);
            this._terminate(request.alarmId, 'completed');
            return;
        }
        console.log(`[Orchestrator] Cast playback complete for ${request.alarmId}; alarm keeps ringing`);
    }

    private _armSafetyTimeout(context: AlarmContext): void {
        context.safetyTimer.schedule(this._config.safetyTimeoutMs, () => this._handleSafetyTimeout(context));
    }

    /**
     * Terminate when the receiver has stopped or is within the margin of the
     * end; otherwise check again after another full period.
     */
    private _handleSafetyTimeout(context: AlarmContext): void {
        if (!this._isLive(context) || context.backend !== 'remote') {
            return;
        }
        const alarmId = context.request.alarmId;
        const sample = this._samplePlayback();
        const stopped = !sample.isPlaying && !sample.isBuffering;
        const nearEnd =
            sample.durationMs > 0 && sample.positionMs >= sample.durationMs - this._config.completionMarginMs;

        if (stopped || nearEnd) {
            const error = createAppError(AppErrorCode.SAFETY_TIMEOUT_FORCED, `Safety timeout forced stop of ${alarmId}`, {
                positionMs: sample.positionMs,
                durationMs: sample.durationMs,
                isPlaying: sample.isPlaying,
            });
            console.warn(`[Orchestrator] ${error.message}`, error.context);
            this._terminate(alarmId, 'safety-timeout');
            return;
        }
        console.log(
            `[Orchestrator] Safety timeout for ${alarmId}: still playing at ` +
                `${sample.positionMs}/${sample.durationMs}ms, rescheduling`
        );
        this._armSafetyTimeout(context);
    }

    // ============================================
    // Fallback
    // ============================================

    /**
     * Remote -> local, at most once per alarm. Never the other way.
     */
    private _fallbackToLocal(context: AlarmContext, error: AppError): void {
        if (!this._isLive(context) || context.fallbackUsed || context.backend === 'local') {
            return;
        }
        context.fallbackUsed = true;
        const alarmId = context.request.alarmId;
        if (CASTING_PATH_ERROR_CODES.has(error.code)) {
            console.warn(`[Orchestrator] Falling back to local audio for ${alarmId}: ${error.code} ${error.message}`);
        } else {
            console.error(`[Orchestrator] Unexpected cast failure for ${alarmId}, using local audio:`, error);
        }

        this._tearDownRemote(context);
        this._playLocal(context);
    }

    private _tearDownRemote(context: AlarmContext): void {
        const alarmId = context.request.alarmId;
        context.safetyTimer.cancel();
        context.castStartTimer.cancel();
        this._disposeRemoteSubscriptions(context);
        // Local-only alarms never touch the remote side.
        if (context.castPlan === null) {
            return;
        }
        this._safely('cancel reconnect', () => this._sessionManager.cancelReconnect(alarmId));

        if (this._castingController.getActiveAlarmId() === alarmId) {
            this._safely('stop casting', () => this._castingController.stopCasting());
        } else if (context.backend === 'remote') {
            // The controller already tore down; the receiver may still be playing.
            this._safely('stop remote playback', () => this._sessionManager.stopRemotePlayback());
        }
        context.castStarted = false;
    }

    private _disposeRemoteSubscriptions(context: AlarmContext): void {
        for (const subscription of context.remoteSubscriptions) {
            this._safely('dispose remote subscription', () => subscription.dispose());
        }
        context.remoteSubscriptions = [];
    }

    // ============================================
    // Local path
    // ============================================

    /**
     * Play on the local engine, resuming the sequence where it stands.
     */
    private _playLocal(context: AlarmContext): void {
        if (!this._isLive(context)) {
            return;
        }
        const request = context.request;
        const alarmId = request.alarmId;
        context.backend = 'local';

        if (request.vibrate && this._vibration && !context.vibrating) {
            const vibration = this._vibration;
            context.vibrating = true;
            this._safely('start vibration', () => vibration.start(alarmId));
        }

        if (!request.primaryMediaRef) {
            const error = createAppError(
                AppErrorCode.PLAYBACK_SOURCE_MISSING,
                `Alarm ${alarmId} has no primary media; ringing without audio`
            );
            console.error(`[Orchestrator] ${error.message}`);
            return;
        }

        const sequence = context.sequence;
        if (!request.secondaryMediaRef) {
            if (!sequence.isCompleted()) {
                this._playLocalClip(context, 'single', request.loop);
            }
            return;
        }

        switch (sequence.getState()) {
            case 'NotStarted':
            case 'PlayingPrimary':
                this._playLocalClip(context, 'primary', false);
                return;
            case 'WaitingGap':
                sequence.advance('gapElapsed');
                this._playLocalClip(context, 'secondary', false);
                return;
            case 'PlayingSecondary':
                this._playLocalClip(context, 'secondary', false);
                return;
            case 'Completed':
                return;
        }
    }

    private _playLocalClip(context: AlarmContext, clip: LocalClip, loop: boolean): void {
        const request = context.request;
        const url = this._mediaRefFor(request, clip);
        if (!url) {
            return;
        }
        const clipId = `${request.alarmId}:${clip}`;
        context.localClip = { id: clipId, clip };
        if (clip === 'primary' || clip === 'single') {
            context.sequence.advance('primaryStarted');
        }
        console.log(`[Orchestrator] Local ${clip} for ${request.alarmId}: ${redactMediaUrl(url)}`);
        this._safely('local play', () =>
            this._localAudio.play(
                clipId,
                url,
                loop,
                request.fadeMs ?? this._config.defaultFadeMs,
                request.fadeSteps ?? this._config.defaultFadeSteps
            )
        );
    }

    private _handleLocalCompletion(clipId: string): void {
        const context = this._findByLocalClip(clipId);
        if (!context) {
            if (this._config.debugLogging) {
                console.debug(`[Orchestrator] Ignoring completion for inactive clip ${clipId}`);
            }
            return;
        }
        const request = context.request;
        const clip = context.localClip ? context.localClip.clip : null;

        if (clip === 'single') {
            if (request.loop) {
                return;
            }
            context.sequence.advance('noSecondaryConfigured');
            this._terminate(request.alarmId, 'completed');
            return;
        }

        if (clip === 'primary') {
            const transition = context.sequence.advance('primaryFinished');
            if (transition.effect !== 'scheduleSecondaryAfterGap') {
                return;
            }
            context.gapTimer.schedule(request.sequenceGapMs, () => {
                if (!this._isLive(context) || context.backend !== 'local') {
                    return;
                }
                context.sequence.advance('gapElapsed');
                this._playLocalClip(context, 'secondary', false);
            });
            return;
        }

        if (clip === 'secondary') {
            const transition = context.sequence.advance('secondaryFinished');
            if (transition.effect === 'completeAlarmIfStopAfterSecondary' && request.stopAfterSecondary) {
                this._terminate(request.alarmId, 'completed');
            }
        }
    }

    private _findByLocalClip(clipId: string): AlarmContext | null {
        for (const context of this._contexts.values()) {
            if (context.backend === 'local' && context.localClip !== null && context.localClip.id === clipId) {
                return context;
            }
        }
        return null;
    }

    // ============================================
    // Termination
    // ============================================

    /**
     * Tear down everything the alarm owns. Each step runs even when an
     * earlier one throws.
     */
    private _terminate(alarmId: string, reason: TerminationReason): void {
        const context = this._contexts.get(alarmId);
        if (!context) {
            if (this._config.debugLogging) {
                console.debug(`[Orchestrator] Stop for inactive alarm ${alarmId} ignored`);
            }
            return;
        }
        console.log(`[Orchestrator] Stopping alarm ${alarmId} (${reason})`);
        context.stopped = true;
        this._contexts.delete(alarmId);

        context.gapTimer.cancel();
        this._tearDownRemote(context);

        const localClip = context.localClip;
        if (localClip) {
            this._safely('local stop', () => this._localAudio.stop(localClip.id));
            context.localClip = null;
        }
        if (context.vibrating && this._vibration) {
            const vibration = this._vibration;
            this._safely('stop vibration', () => vibration.stop(alarmId));
            context.vibrating = false;
        }
        context.sequence.reset();

        if (this._contexts.size === 0) {
            this._safely('ringing signal', () => this._ringingSignal.update(false));
        }
        this._report('alarmStopped', alarmId, () => this._bookkeeping.alarmStopped(alarmId));
    }

    // ============================================
    // Helpers
    // ============================================

    private _isLive(context: AlarmContext): boolean {
        return !context.stopped && this._contexts.get(context.request.alarmId) === context;
    }

    /**
     * Request volume when set, else the saved volume, else full volume.
     */
    /**
     * Read the receiver's status now; the snapshot only moves on pushed
     * status events. Falls back to the snapshot when no status is available.
     */
    private _samplePlayback(): PlaybackSample {
        const live = this._sessionManager.getMediaStatus();
        if (live) {
            return {
                positionMs: live.positionMs,
                durationMs: live.durationMs,
                isPlaying: live.playerState === 'playing',
                isBuffering: live.playerState === 'buffering' || live.playerState === 'loading',
            };
        }
        const snapshot = this._sessionManager.getPlaybackSnapshot();
        return {
            positionMs: snapshot.positionMs,
            durationMs: snapshot.durationMs,
            isPlaying: snapshot.isPlaying,
            isBuffering: snapshot.isBuffering,
        };
    }

    private _resolveVolume(request: AlarmPlaybackRequest): number {
        if (request.volume !== null) {
            return clampVolume(request.volume);
        }
        return this._sessionManager.getSavedVolume() ?? 1;
    }

    private _mediaRefFor(request: AlarmPlaybackRequest, clip: LocalClip): string | null {
        return clip === 'secondary' ? request.secondaryMediaRef : request.primaryMediaRef;
    }

    private _safeListPlaying(): string[] {
        try {
            return this._localAudio.listPlayingIds();
        } catch (error) {
            console.warn('[Orchestrator] listPlayingIds failed:', summarizeErrorForLog(error));
            return [];
        }
    }

    private _safely(label: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            console.error(`[Orchestrator] ${label} failed:`, summarizeErrorForLog(error));
        }
    }

    private _report(
        kind: 'alarmStarted' | 'alarmStopped',
        alarmId: string,
        call: () => Promise<BookkeepingResult>
    ): void {
        let result: Promise<BookkeepingResult>;
        try {
            result = call();
        } catch (error) {
            console.warn(`[Orchestrator] ${kind} for ${alarmId} threw:`, summarizeErrorForLog(error));
            return;
        }
        result
            .then((outcome) => {
                if (outcome.ok) {
                    console.log(`[Orchestrator] ${kind} for ${alarmId} acknowledged`);
                } else {
                    console.warn(`[Orchestrator] ${kind} for ${alarmId} failed: ${outcome.message}`);
                }
            })
            .catch((error: unknown) => {
                console.warn(`[Orchestrator] ${kind} for ${alarmId} rejected:`, summarizeErrorForLog(error));
            });
    }
}
