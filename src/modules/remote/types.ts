/**
 * @fileoverview Type definitions for the Remote Session module.
 * @module modules/remote/types
 * @version 1.0.0
 */

import type { AppError } from '../../types';

/**
 * Opaque remote playback device reference.
 */
export interface RemoteDeviceRef {
    id: string;
    name: string;
}

/**
 * Connection lifecycle of the remote playback path.
 * Single mutable value; the session manager is its only writer.
 */
export type RemoteSessionState =
    | { kind: 'Idle' }
    | { kind: 'Discovering' }
    | { kind: 'Connecting' }
    | { kind: 'Connected' }
    | { kind: 'Casting' }
    | { kind: 'Buffering' }
    | { kind: 'Paused' }
    | { kind: 'Loading' }
    | { kind: 'Error'; message: string }
    | { kind: 'Ended'; mediaRef: string };

export type RemoteSessionStateKind = RemoteSessionState['kind'];

/**
 * Player state as reported by the remote receiver.
 */
export type RemotePlayerState = 'idle' | 'loading' | 'buffering' | 'playing' | 'paused' | 'error';

export type RemoteIdleReason = 'finished' | 'cancelled' | 'interrupted' | 'error';

/**
 * One media status report from the receiver.
 */
export interface RemoteMediaStatus {
    playerState: RemotePlayerState;
    /** Only meaningful when `playerState` is `idle` */
    idleReason: RemoteIdleReason | null;
    /** URL of the media the status refers to */
    contentId: string | null;
    title: string | null;
    positionMs: number;
    durationMs: number;
}

/**
 * Remote session as seen by the protocol layer.
 */
export interface RemoteSessionInfo {
    sessionId: string;
    deviceId: string;
    connected: boolean;
    volume: number;
    isMuted: boolean;
}

/**
 * Session lifecycle callbacks delivered asynchronously by the protocol.
 */
export type RemoteSessionEvent =
    | { type: 'starting' }
    | { type: 'started'; session: RemoteSessionInfo }
    | { type: 'resuming' }
    | { type: 'resumed'; session: RemoteSessionInfo }
    | { type: 'suspended'; reason: number }
    | { type: 'ending' }
    | { type: 'ended'; errorCode: number }
    | { type: 'startFailed'; errorCode: number }
    | { type: 'resumeFailed'; errorCode: number };

export interface MediaLoadRequest {
    url: string;
    contentType: string;
    title: string;
    artist: string;
    autoplay: boolean;
}

/**
 * Acknowledgement of a load request. `status` carries the receiver's
 * status text for logs and {@link AppErrorCode.LOAD_FAILED} context.
 */
export interface MediaLoadResult {
    ok: boolean;
    status: string;
}

export type SnapshotPlayerState = RemotePlayerState | 'ended';

/**
 * Mirror of the active backend's playback, recomputed on every status update.
 */
export interface PlaybackSnapshot {
    positionMs: number;
    durationMs: number;
    /** position / duration in [0, 1]; 0 when duration is unknown */
    progress: number;
    isPlaying: boolean;
    isPaused: boolean;
    isBuffering: boolean;
    isLoading: boolean;
    hasEnded: boolean;
    currentMediaRef: string | null;
    title: string | null;
    volume: number;
    isMuted: boolean;
    playerState: SnapshotPlayerState;
    errorMessage: string | null;
}

/**
 * Tier of the reconnection algorithm. Tier 3 is the decline outcome.
 */
export type ReconnectTier = 1 | 2 | 3;

export type ReconnectPhase = 'resume' | 'discovery' | 'connecting';

/**
 * Read-only view of an in-flight reconnection attempt.
 */
export interface ReconnectionAttempt {
    alarmId: string;
    deviceId: string;
    tier: ReconnectTier;
    phase: ReconnectPhase;
    /** Polls issued so far in the current phase */
    attempt: number;
    /** Poll ceiling of the current phase */
    maxAttempts: number;
    pollIntervalMs: number;
}

export type ReconnectOutcome =
    | { ok: true; tier: 1 | 2; device: RemoteDeviceRef; polls: number }
    | { ok: false; tier: 3; error: AppError; cancelled: boolean; polls: number };

export type SessionTerminationReason = 'ended' | 'startFailed' | 'resumeFailed';

export type RemoteSessionEventMap = {
    stateChange: { previous: RemoteSessionState; current: RemoteSessionState };
    snapshot: PlaybackSnapshot;
    mediaStatus: RemoteMediaStatus;
    devicesChanged: RemoteDeviceRef[];
    sessionTerminated: { reason: SessionTerminationReason; error: AppError };
};

/**
 * Remote session manager configuration.
 */
export interface RemoteSessionConfig {
    pollIntervalMs: number;
    discoveryMaxPolls: number;
    sessionMaxPolls: number;
    /** Explicit wait between route reset and device reselection */
    routeSettleMs: number;
    /** Start passive discovery when the manager initializes */
    discoverOnInitialize: boolean;
    debugLogging: boolean;
}
