/**
 * @fileoverview Remote session lifecycle and three-tier reconnection.
 * @module modules/remote/RemoteSessionManager
 * @version 1.0.0
 */

import { AppErrorCode, createAppError, errorMessageOf, summarizeErrorForLog } from '../../types';
import type { AppError } from '../../types';
import { EventEmitter, pollUntil, waitFor } from '../../utils';
import type { CoordinationLoop, IDisposable, PollResult } from '../../utils';
import { DEFAULT_REMOTE_SESSION_CONFIG, EMPTY_PLAYBACK_SNAPSHOT, SESSION_STATUS_CODES } from './constants';
import { DeviceRepository, clampVolume } from './DeviceRepository';
import type { IRemoteCastProtocol, IRemoteSessionManager } from './interfaces';
import { describeSessionState, describeSessionStatusCode, sameSessionState } from './sessionState';
import type {
    MediaLoadRequest,
    MediaLoadResult,
    PlaybackSnapshot,
    ReconnectionAttempt,
    ReconnectOutcome,
    RemoteDeviceRef,
    RemoteMediaStatus,
    RemoteSessionConfig,
    RemoteSessionEvent,
    RemoteSessionEventMap,
    RemoteSessionInfo,
    RemoteSessionState,
} from './types';

export interface RemoteSessionManagerDeps {
    protocol: IRemoteCastProtocol;
    devices: DeviceRepository;
    loop: CoordinationLoop;
}

interface AttemptRecord extends ReconnectionAttempt {
    controller: AbortController;
    /** Set when a session start failure aborts the connecting phase */
    failure: AppError | null;
}

export class RemoteSessionManager implements IRemoteSessionManager {
    private readonly _protocol: IRemoteCastProtocol;
    private readonly _devices: DeviceRepository;
    private readonly _loop: CoordinationLoop;
    private readonly _config: RemoteSessionConfig;
    private readonly _emitter = new EventEmitter<RemoteSessionEventMap>('RemoteSessionManager');

    private _state: RemoteSessionState = { kind: 'Idle' };
    private _snapshot: PlaybackSnapshot = { ...EMPTY_PLAYBACK_SNAPSHOT };
    private _availableDevices: RemoteDeviceRef[] = [];
    private _attempts: Map<string, AttemptRecord> = new Map();

    private _subscriptions: IDisposable[] = [];
    private _statusSubscription: IDisposable | null = null;

    // User-initiated connect; a newer call aborts the route-settle wait of an older one.
    private _connectController: AbortController | null = null;
    private _routeSettling = false;

    private _initialized = false;

    constructor(deps: RemoteSessionManagerDeps, config: Partial<RemoteSessionConfig> = {}) {
        this._protocol = deps.protocol;
        this._devices = deps.devices;
        this._loop = deps.loop;
        this._config = { ...DEFAULT_REMOTE_SESSION_CONFIG, ...config };
    }

    // ============================================
    // Lifecycle
    // ============================================

    public initialize(): void {
        if (this._initialized) {
            return;
        }
        this._initialized = true;

        this._subscriptions.push(
            this._protocol.onSessionEvent(
                this._loop.bind('remote.sessionEvent', (event: RemoteSessionEvent) =>
                    this._handleSessionEvent(event)
                )
            ),
            this._protocol.onDevicesChanged(
                this._loop.bind('remote.devicesChanged', (devices: RemoteDeviceRef[]) =>
                    this._handleDevicesChanged(devices)
                )
            )
        );

        if (this._isSessionConnected()) {
            this._setState({ kind: 'Connected' });
            this._startStatusTracking();
        }

        if (this._config.discoverOnInitialize) {
            this.startDiscovery(false);
        }
    }

    public dispose(): void {
        for (const alarmId of Array.from(this._attempts.keys())) {
            this.cancelReconnect(alarmId);
        }
        if (this._connectController) {
            this._connectController.abort();
            this._connectController = null;
        }
        this._stopStatusTracking();

        // Keep tearing down even if one unsubscribe throws.
        for (const subscription of this._subscriptions) {
            try {
                subscription.dispose();
            } catch (error) {
                console.warn('[RemoteSessionManager] Failed to dispose subscription:', summarizeErrorForLog(error));
            }
        }
        this._subscriptions = [];

        try {
            this._protocol.stopDiscovery();
        } catch (error) {
            console.warn('[RemoteSessionManager] stopDiscovery failed during dispose:', summarizeErrorForLog(error));
        }
        this._emitter.removeAllListeners();
        this._initialized = false;
    }

    // ============================================
    // State and observers
    // ============================================

    public getState(): RemoteSessionState {
        return this._state;
    }

    public onStateChange(handler: (change: RemoteSessionEventMap['stateChange']) => void): IDisposable {
        return this._emitter.on('stateChange', handler);
    }

    public onSnapshot(handler: (snapshot: PlaybackSnapshot) => void): IDisposable {
        return this._emitter.on('snapshot', handler);
    }

    public onMediaStatus(handler: (status: RemoteMediaStatus) => void): IDisposable {
        return this._emitter.on('mediaStatus', handler);
    }

    public onDevicesChanged(handler: (devices: RemoteDeviceRef[]) => void): IDisposable {
        return this._emitter.on('devicesChanged', handler);
    }

    public onSessionTerminated(
        handler: (event: RemoteSessionEventMap['sessionTerminated']) => void
    ): IDisposable {
        return this._emitter.on('sessionTerminated', handler);
    }

    public getPlaybackSnapshot(): PlaybackSnapshot {
        return { ...this._snapshot };
    }

    public getMediaStatus(): RemoteMediaStatus | null {
        try {
            return this._protocol.getMediaStatus();
        } catch (error) {
            console.warn('[RemoteSessionManager] getMediaStatus failed:', summarizeErrorForLog(error));
            return null;
        }
    }

    // ============================================
    // Reconnection
    // ============================================

    public async reconnect(device: RemoteDeviceRef, alarmId: string): Promise<ReconnectOutcome> {
        this.cancelReconnect(alarmId);

        const record: AttemptRecord = {
            alarmId,
            deviceId: device.id,
            tier: 1,
            phase: 'resume',
            attempt: 0,
            maxAttempts: 1,
            pollIntervalMs: this._config.pollIntervalMs,
            controller: new AbortController(),
            failure: null,
        };
        this._attempts.set(alarmId, record);

        try {
            if (this._isSessionConnectedTo(device.id)) {
                console.log(`[RemoteSessionManager] Tier 1: resumed existing session on ${device.name}`);
                this._setState({ kind: 'Connected' });
                return { ok: true, tier: 1, device, polls: 0 };
            }
            return await this._rediscover(record, device);
        } finally {
            if (this._attempts.get(alarmId) === record) {
                this._attempts.delete(alarmId);
            }
        }
    }

    public cancelReconnect(alarmId: string): void {
        const record = this._attempts.get(alarmId);
        if (!record) {
            return;
        }
        this._attempts.delete(alarmId);
        record.controller.abort();
        if (this._config.debugLogging) {
            console.debug(`[RemoteSessionManager] Cancelled reconnect for ${alarmId} (${record.phase})`);
        }
    }

    public getAttempt(alarmId: string): ReconnectionAttempt | null {
        const record = this._attempts.get(alarmId);
        if (!record) {
            return null;
        }
        return {
            alarmId: record.alarmId,
            deviceId: record.deviceId,
            tier: record.tier,
            phase: record.phase,
            attempt: record.attempt,
            maxAttempts: record.maxAttempts,
            pollIntervalMs: record.pollIntervalMs,
        };
    }

    /**
     * Tier 2: active discovery, then route selection and session polling.
     * Falls through to the Tier 3 decline on any ceiling breach.
     */
    private async _rediscover(record: AttemptRecord, device: RemoteDeviceRef): Promise<ReconnectOutcome> {
        const { signal } = record.controller;
        const { pollIntervalMs } = this._config;

        record.tier = 2;
        record.phase = 'discovery';
        record.attempt = 0;
        record.maxAttempts = this._config.discoveryMaxPolls;

        try {
            this._protocol.startDiscovery(true);
        } catch (error) {
            console.warn('[RemoteSessionManager] Active discovery failed to start:', summarizeErrorForLog(error));
            return this._decline(
                record,
                createAppError(AppErrorCode.DISCOVERY_TIMEOUT, `Discovery could not start: ${errorMessageOf(error)}`),
                0
            );
        }
        this._setState({ kind: 'Discovering' });

        const discovery = await pollUntil(() => this._findDevice(device.id) !== null, {
            intervalMs: pollIntervalMs,
            maxPolls: record.maxAttempts,
            signal,
            onPoll: (polls) => {
                record.attempt = polls;
            },
        });
        record.attempt = discovery.polls;
        let polls = discovery.polls;

        const route = discovery.status === 'satisfied' ? this._findDevice(device.id) : null;
        if (!route) {
            this._releaseDiscovery(record);
            if (discovery.status === 'cancelled') {
                return this._cancelled(record, polls);
            }
            this._settleIdleState(record);
            return this._decline(
                record,
                createAppError(
                    AppErrorCode.DISCOVERY_TIMEOUT,
                    `Device ${device.name} not found after ${polls} discovery polls`,
                    { deviceId: device.id }
                ),
                polls
            );
        }

        record.phase = 'connecting';
        record.attempt = 0;
        record.maxAttempts = this._config.sessionMaxPolls;

        this._setState({ kind: 'Connecting' });
        try {
            this._protocol.selectDevice(route);
        } catch (error) {
            this._releaseDiscovery(record);
            this._settleIdleState(record);
            return this._decline(
                record,
                createAppError(
                    AppErrorCode.SESSION_START_FAILED,
                    `Selecting ${route.name} failed: ${errorMessageOf(error)}`,
                    { deviceId: route.id }
                ),
                polls
            );
        }
        this._devices.saveDevice(route);

        // Sessions often come up during selection; skip the first interval when they do.
        const connection: PollResult = this._isSessionConnectedTo(route.id)
            ? { status: 'satisfied', polls: 0 }
            : await pollUntil(() => this._isSessionConnectedTo(route.id), {
                  intervalMs: pollIntervalMs,
                  maxPolls: record.maxAttempts,
                  signal,
                  onPoll: (count) => {
                      record.attempt = count;
                  },
              });
        record.attempt = connection.polls;
        polls += connection.polls;
        this._releaseDiscovery(record);

        if (connection.status === 'satisfied') {
            console.log(`[RemoteSessionManager] Tier 2: connected to ${route.name} after ${polls} polls`);
            this._setState({ kind: 'Connected' });
            return { ok: true, tier: 2, device: route, polls };
        }
        if (record.failure) {
            return this._decline(record, record.failure, polls);
        }
        if (connection.status === 'cancelled') {
            return this._cancelled(record, polls);
        }
        this._settleIdleState(record);
        return this._decline(
            record,
            createAppError(
                AppErrorCode.CONNECTION_TIMEOUT,
                `No session with ${route.name} after ${connection.polls} polls`,
                { deviceId: route.id }
            ),
            polls
        );
    }

    private _decline(record: AttemptRecord, error: AppError, polls: number): ReconnectOutcome {
        record.tier = 3;
        console.warn(`[RemoteSessionManager] Tier 3: declining reconnect for ${record.alarmId}: ${error.message}`);
        return { ok: false, tier: 3, error, cancelled: false, polls };
    }

    private _cancelled(record: AttemptRecord, polls: number): ReconnectOutcome {
        this._settleIdleState(record);
        return {
            ok: false,
            tier: 3,
            error: createAppError(AppErrorCode.RECONNECT_CANCELLED, `Reconnect for ${record.alarmId} cancelled`),
            cancelled: true,
            polls,
        };
    }

    /**
     * Stop active discovery unless another attempt still relies on it.
     */
    private _releaseDiscovery(record: AttemptRecord): void {
        if (this._hasOtherTier2Attempt(record)) {
            return;
        }
        try {
            this._protocol.stopDiscovery();
        } catch (error) {
            console.warn('[RemoteSessionManager] stopDiscovery failed:', summarizeErrorForLog(error));
        }
    }

    private _hasOtherTier2Attempt(record: AttemptRecord): boolean {
        for (const other of this._attempts.values()) {
            if (other !== record && other.phase !== 'resume') {
                return true;
            }
        }
        return false;
    }

    /**
     * Leave the transient Discovering/Connecting states after a failed or
     * cancelled attempt, unless another attempt owns them now.
     */
    private _settleIdleState(record: AttemptRecord): void {
        if (this._hasOtherTier2Attempt(record)) {
            return;
        }
        if (this._state.kind !== 'Discovering' && this._state.kind !== 'Connecting') {
            return;
        }
        this._setState(this._isSessionConnected() ? { kind: 'Connected' } : { kind: 'Idle' });
    }

    // ============================================
    // Session lifecycle
    // ============================================

    private _handleSessionEvent(event: RemoteSessionEvent): void {
        if (this._config.debugLogging) {
            console.debug(`[RemoteSessionManager] Session event: ${event.type}`);
        }
        switch (event.type) {
            case 'starting':
            case 'resuming':
                this._setState({ kind: 'Connecting' });
                return;

            case 'started':
            case 'resumed':
                this._setState({ kind: 'Connected' });
                this._startStatusTracking();
                return;

            case 'suspended':
                console.warn(`[RemoteSessionManager] Session suspended (reason ${event.reason})`);
                return;

            case 'ending':
                return;

            case 'ended': {
                this._stopStatusTracking();
                this._resetSnapshot();
                this._setState({ kind: 'Idle' });
                const error = createAppError(
                    AppErrorCode.SESSION_LOST,
                    `Remote session ended (code ${event.errorCode})`,
                    { errorCode: event.errorCode }
                );
                this._emitter.emit('sessionTerminated', { reason: 'ended', error });
                return;
            }

            case 'startFailed':
                this._handleStartFailure(event.errorCode);
                return;

            case 'resumeFailed': {
                this._stopStatusTracking();
                const error = createAppError(
                    AppErrorCode.SESSION_LOST,
                    `Session resume failed: ${describeSessionStatusCode(event.errorCode)}`,
                    { errorCode: event.errorCode }
                );
                this._setState({ kind: 'Error', message: error.message });
                this._emitter.emit('sessionTerminated', { reason: 'resumeFailed', error });
                return;
            }
        }
    }

    private _handleStartFailure(errorCode: number): void {
        const reason = describeSessionStatusCode(errorCode);
        console.error(`[RemoteSessionManager] Session start failed: ${reason}`);

        // The receiver app is gone; a half-open session blocks every later start.
        if (errorCode === SESSION_STATUS_CODES.APPLICATION_NOT_FOUND) {
            try {
                this._protocol.endCurrentSession();
                this._protocol.resetRoute();
            } catch (error) {
                console.warn('[RemoteSessionManager] Route reset after start failure failed:', summarizeErrorForLog(error));
            }
        }

        const error = createAppError(AppErrorCode.SESSION_START_FAILED, `Session start failed: ${reason}`, {
            errorCode,
        });
        this._setState({ kind: 'Error', message: error.message });

        for (const record of this._attempts.values()) {
            if (record.phase === 'connecting') {
                record.failure = error;
                record.controller.abort();
            }
        }
        this._emitter.emit('sessionTerminated', { reason: 'startFailed', error });
    }

    private _startStatusTracking(): void {
        if (this._statusSubscription) {
            return;
        }
        this._statusSubscription = this._protocol.onMediaStatus(
            this._loop.bind('remote.mediaStatus', (status: RemoteMediaStatus) => this._handleMediaStatus(status))
        );
    }

    private _stopStatusTracking(): void {
        if (!this._statusSubscription) {
            return;
        }
        const subscription = this._statusSubscription;
        this._statusSubscription = null;
        try {
            subscription.dispose();
        } catch (error) {
            console.warn('[RemoteSessionManager] Failed to dispose status subscription:', summarizeErrorForLog(error));
        }
    }

    private _handleMediaStatus(status: RemoteMediaStatus): void {
        this._setState(this._stateForStatus(status));
        this._updateSnapshot(status);
        this._emitter.emit('mediaStatus', status);
    }

    private _stateForStatus(status: RemoteMediaStatus): RemoteSessionState {
        switch (status.playerState) {
            case 'loading':
                return { kind: 'Loading' };
            case 'buffering':
                return { kind: 'Buffering' };
            case 'playing':
                return { kind: 'Casting' };
            case 'paused':
                return { kind: 'Paused' };
            case 'error':
                return { kind: 'Error', message: 'Remote playback error' };
            case 'idle':
                if (status.idleReason === 'finished') {
                    return { kind: 'Ended', mediaRef: status.contentId ?? '' };
                }
                if (status.idleReason === 'error') {
                    return { kind: 'Error', message: 'Remote playback error' };
                }
                return this._isSessionConnected() ? { kind: 'Connected' } : { kind: 'Idle' };
        }
    }

    private _updateSnapshot(status: RemoteMediaStatus): void {
        const session = this._currentSession();
        const positionMs = Math.max(0, status.positionMs);
        const durationMs = Math.max(0, status.durationMs);
        const hasEnded = status.playerState === 'idle' && status.idleReason === 'finished';
        const failed = status.playerState === 'error' || status.idleReason === 'error';

        this._snapshot = {
            positionMs,
            durationMs,
            progress: durationMs > 0 ? Math.min(1, positionMs / durationMs) : 0,
            isPlaying: status.playerState === 'playing',
            isPaused: status.playerState === 'paused',
            isBuffering: status.playerState === 'buffering',
            isLoading: status.playerState === 'loading',
            hasEnded,
            currentMediaRef: status.contentId,
            title: status.title,
            volume: session ? session.volume : this._snapshot.volume,
            isMuted: session ? session.isMuted : this._snapshot.isMuted,
            playerState: hasEnded ? 'ended' : status.playerState,
            errorMessage: failed ? 'Remote playback error' : null,
        };
        this._emitter.emit('snapshot', { ...this._snapshot });
    }

    private _resetSnapshot(): void {
        this._snapshot = { ...EMPTY_PLAYBACK_SNAPSHOT, volume: this._snapshot.volume };
        this._emitter.emit('snapshot', { ...this._snapshot });
    }

    private _setState(next: RemoteSessionState): void {
        const previous = this._state;
        if (sameSessionState(previous, next)) {
            return;
        }
        this._state = next;
        if (this._config.debugLogging) {
            console.debug(
                `[RemoteSessionManager] State: ${describeSessionState(previous)} -> ${describeSessionState(next)}`
            );
        }
        this._emitter.emit('stateChange', { previous, current: next });
    }

    // ============================================
    // Devices and user-initiated connect
    // ============================================

    public startDiscovery(activeScan: boolean): void {
        try {
            this._protocol.startDiscovery(activeScan);
        } catch (error) {
            console.warn('[RemoteSessionManager] startDiscovery failed:', summarizeErrorForLog(error));
            return;
        }
        if (activeScan && this._state.kind === 'Idle') {
            this._setState({ kind: 'Discovering' });
        }
    }

    public stopDiscovery(): void {
        try {
            this._protocol.stopDiscovery();
        } catch (error) {
            console.warn('[RemoteSessionManager] stopDiscovery failed:', summarizeErrorForLog(error));
        }
        if (this._attempts.size === 0 && this._state.kind === 'Discovering') {
            this._setState(this._isSessionConnected() ? { kind: 'Connected' } : { kind: 'Idle' });
        }
    }

    public getAvailableDevices(): RemoteDeviceRef[] {
        return this._availableDevices.map((device) => ({ ...device }));
    }

    private _handleDevicesChanged(devices: RemoteDeviceRef[]): void {
        const seen = new Set<string>();
        const unique: RemoteDeviceRef[] = [];
        for (const device of devices) {
            if (!device.id || seen.has(device.id)) {
                continue;
            }
            seen.add(device.id);
            unique.push({ id: device.id, name: device.name });
        }
        this._availableDevices = unique;
        this._emitter.emit('devicesChanged', this.getAvailableDevices());
    }

    private _findDevice(deviceId: string): RemoteDeviceRef | null {
        let devices: RemoteDeviceRef[];
        try {
            devices = this._protocol.getDiscoveredDevices();
        } catch (error) {
            console.warn('[RemoteSessionManager] getDiscoveredDevices failed:', summarizeErrorForLog(error));
            devices = this._availableDevices;
        }
        return devices.find((device) => device.id === deviceId) ?? null;
    }

    public isRouteSettling(): boolean {
        return this._routeSettling;
    }

    /**
     * Connect to a discovered device on user request.
     *
     * Succeeds at once when the device is already selected with a live
     * session. Otherwise tears the current route down, waits for it to
     * settle, then selects the device; the session comes up asynchronously.
     */
    public async connectToDevice(deviceId: string): Promise<boolean> {
        const device = this._findDevice(deviceId);
        if (!device) {
            console.warn(`[RemoteSessionManager] connectToDevice: unknown device ${deviceId}`);
            return false;
        }

        if (this._selectedDeviceId() === deviceId && this._isSessionConnected()) {
            this._setState({ kind: 'Connected' });
            return true;
        }

        if (this._connectController) {
            this._connectController.abort();
        }
        const controller = new AbortController();
        this._connectController = controller;

        try {
            if (this._currentSession()) {
                this._protocol.endCurrentSession();
            }
            if (this._selectedDeviceId() !== null) {
                this._protocol.resetRoute();
            }
        } catch (error) {
            console.warn('[RemoteSessionManager] Route teardown failed:', summarizeErrorForLog(error));
        }

        this._setState({ kind: 'Connecting' });
        this._routeSettling = true;
        const settled = await waitFor(this._config.routeSettleMs, controller.signal);
        if (this._connectController === controller) {
            this._connectController = null;
            this._routeSettling = false;
        }
        if (!settled) {
            return false;
        }

        try {
            this._protocol.selectDevice(device);
        } catch (error) {
            console.error('[RemoteSessionManager] selectDevice failed:', summarizeErrorForLog(error));
            this._setState({ kind: 'Error', message: `Connection failed: ${errorMessageOf(error)}` });
            return false;
        }
        this._devices.saveDevice(device);
        return true;
    }

    // ============================================
    // Session queries and playback commands
    // ============================================

    public isSessionActive(): boolean {
        return this._isSessionConnected();
    }

    public getConnectedDeviceId(): string | null {
        const session = this._currentSession();
        return session && session.connected ? session.deviceId : null;
    }

    public getSavedDevice(): RemoteDeviceRef | null {
        return this._devices.getSavedDevice();
    }

    public hasSavedDevice(): boolean {
        return this._devices.hasSavedDevice();
    }

    public getSavedVolume(): number | null {
        return this._devices.getSavedVolume();
    }

    public setVolume(level: number): number {
        const clamped = clampVolume(level);
        if (this._isSessionConnected()) {
            try {
                this._protocol.setVolume(clamped);
            } catch (error) {
                console.warn('[RemoteSessionManager] setVolume failed:', summarizeErrorForLog(error));
            }
        }
        this._snapshot = { ...this._snapshot, volume: clamped };
        return this._devices.saveVolume(clamped);
    }

    public async loadMedia(request: MediaLoadRequest): Promise<MediaLoadResult> {
        try {
            return await this._protocol.loadMedia(request);
        } catch (error) {
            return { ok: false, status: errorMessageOf(error) };
        }
    }

    public stopRemotePlayback(): void {
        try {
            this._protocol.stop();
        } catch (error) {
            console.warn('[RemoteSessionManager] Remote stop failed:', summarizeErrorForLog(error));
        }
        if (this._isSessionConnected()) {
            this._setState({ kind: 'Connected' });
        }
    }

    private _currentSession(): RemoteSessionInfo | null {
        try {
            return this._protocol.getCurrentSession();
        } catch (error) {
            console.warn('[RemoteSessionManager] getCurrentSession failed:', summarizeErrorForLog(error));
            return null;
        }
    }

    private _selectedDeviceId(): string | null {
        try {
            return this._protocol.getSelectedDeviceId();
        } catch {
            return null;
        }
    }

    private _isSessionConnected(): boolean {
        const session = this._currentSession();
        return session !== null && session.connected;
    }

    private _isSessionConnectedTo(deviceId: string): boolean {
        const session = this._currentSession();
        return session !== null && session.connected && session.deviceId === deviceId;
    }
}
