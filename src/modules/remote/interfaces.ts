/**
 * @fileoverview Interface definitions for the Remote Session module.
 * @module modules/remote/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils';
import type {
    MediaLoadRequest,
    MediaLoadResult,
    PlaybackSnapshot,
    ReconnectionAttempt,
    ReconnectOutcome,
    RemoteDeviceRef,
    RemoteMediaStatus,
    RemoteSessionEvent,
    RemoteSessionEventMap,
    RemoteSessionInfo,
    RemoteSessionState,
} from './types';

/**
 * Remote session / casting SDK surface consumed by the core.
 * Callbacks may arrive on any tick; the session manager marshals them
 * onto the coordination loop before touching state.
 */
export interface IRemoteCastProtocol {
    /**
     * Begin scanning. An active scan is faster and more power-hungry.
     */
    startDiscovery(activeScan: boolean): void;
    stopDiscovery(): void;
    getDiscoveredDevices(): RemoteDeviceRef[];
    onDevicesChanged(handler: (devices: RemoteDeviceRef[]) => void): IDisposable;

    /**
     * Route output to the device; a session start follows asynchronously.
     */
    selectDevice(device: RemoteDeviceRef): void;
    /** Id of the selected device, or null when the local route is selected */
    getSelectedDeviceId(): string | null;
    /** Select the local (default) route */
    resetRoute(): void;

    getCurrentSession(): RemoteSessionInfo | null;
    endCurrentSession(): void;
    onSessionEvent(handler: (event: RemoteSessionEvent) => void): IDisposable;

    loadMedia(request: MediaLoadRequest): Promise<MediaLoadResult>;
    getMediaStatus(): RemoteMediaStatus | null;
    onMediaStatus(handler: (status: RemoteMediaStatus) => void): IDisposable;
    setVolume(level: number): void;
    stop(): void;
}

/**
 * Owner of the remote connection lifecycle and the only writer of
 * {@link RemoteSessionState}.
 */
export interface IRemoteSessionManager {
    initialize(): void;
    dispose(): void;

    getState(): RemoteSessionState;
    onStateChange(handler: (change: RemoteSessionEventMap['stateChange']) => void): IDisposable;
    onSnapshot(handler: (snapshot: PlaybackSnapshot) => void): IDisposable;
    onMediaStatus(handler: (status: RemoteMediaStatus) => void): IDisposable;
    onDevicesChanged(handler: (devices: RemoteDeviceRef[]) => void): IDisposable;
    /**
     * Fires when the session ends, fails to start, or fails to resume.
     * Casting attempts in flight must clean up on this signal.
     */
    onSessionTerminated(
        handler: (event: RemoteSessionEventMap['sessionTerminated']) => void
    ): IDisposable;

    /**
     * Three-tier reconnection to `device` on behalf of `alarmId`.
     * A second call for the same alarm cancels the first. Never rejects.
     */
    reconnect(device: RemoteDeviceRef, alarmId: string): Promise<ReconnectOutcome>;
    cancelReconnect(alarmId: string): void;
    getAttempt(alarmId: string): ReconnectionAttempt | null;

    isSessionActive(): boolean;
    getConnectedDeviceId(): string | null;
    connectToDevice(deviceId: string): Promise<boolean>;

    startDiscovery(activeScan: boolean): void;
    stopDiscovery(): void;
    getAvailableDevices(): RemoteDeviceRef[];

    getSavedDevice(): RemoteDeviceRef | null;
    hasSavedDevice(): boolean;
    getSavedVolume(): number | null;
    /** Clamp to [0, 1], apply to the session when active, persist */
    setVolume(level: number): number;

    /** Never rejects; protocol failures resolve `{ ok: false }` */
    loadMedia(request: MediaLoadRequest): Promise<MediaLoadResult>;
    getMediaStatus(): RemoteMediaStatus | null;
    getPlaybackSnapshot(): PlaybackSnapshot;
    stopRemotePlayback(): void;
}
