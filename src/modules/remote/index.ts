/**
 * @fileoverview Public exports for the Remote Session module.
 * @module modules/remote
 * @version 1.0.0
 */

export { RemoteSessionManager } from './RemoteSessionManager';
export type { RemoteSessionManagerDeps } from './RemoteSessionManager';
export { DeviceRepository, clampVolume } from './DeviceRepository';
export { describeSessionState, describeSessionStatusCode, sameSessionState } from './sessionState';
export {
    DEFAULT_REMOTE_SESSION_CONFIG,
    DISCOVERY_MAX_POLLS,
    EMPTY_PLAYBACK_SNAPSHOT,
    RECONNECT_POLL_INTERVAL_MS,
    ROUTE_SETTLE_MS,
    SESSION_MAX_POLLS,
    SESSION_STATUS_CODES,
} from './constants';
export type { IRemoteCastProtocol, IRemoteSessionManager } from './interfaces';
export type {
    MediaLoadRequest,
    MediaLoadResult,
    PlaybackSnapshot,
    ReconnectionAttempt,
    ReconnectOutcome,
    ReconnectPhase,
    ReconnectTier,
    RemoteDeviceRef,
    RemoteIdleReason,
    RemoteMediaStatus,
    RemotePlayerState,
    RemoteSessionConfig,
    RemoteSessionEvent,
    RemoteSessionEventMap,
    RemoteSessionInfo,
    RemoteSessionState,
    RemoteSessionStateKind,
    SessionTerminationReason,
    SnapshotPlayerState,
} from './types';
