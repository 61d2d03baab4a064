/**
 * @fileoverview Constants for the Remote Session module.
 * @module modules/remote/constants
 * @version 1.0.0
 */

import type { PlaybackSnapshot, RemoteSessionConfig } from './types';

/**
 * Interval between discovery and session-establishment polls.
 */
export const RECONNECT_POLL_INTERVAL_MS = 500;

/**
 * Discovery polls before Tier 2 gives up (10 seconds at 500ms).
 */
export const DISCOVERY_MAX_POLLS = 20;

/**
 * Session-establishment polls before Tier 2 gives up (15 seconds at 500ms).
 */
export const SESSION_MAX_POLLS = 30;

/**
 * Wait after resetting the route before selecting the device again.
 */
export const ROUTE_SETTLE_MS = 300;

/**
 * Receiver status codes reported on session start failure.
 */
export const SESSION_STATUS_CODES = {
    INTERNAL_ERROR: 8,
    TIMEOUT: 15,
    AUTHENTICATION_FAILED: 2000,
    CANCELED: 2002,
    APPLICATION_NOT_RUNNING: 2005,
    APPLICATION_NOT_FOUND: 2155,
} as const;

export const DEFAULT_REMOTE_SESSION_CONFIG: RemoteSessionConfig = {
    pollIntervalMs: RECONNECT_POLL_INTERVAL_MS,
    discoveryMaxPolls: DISCOVERY_MAX_POLLS,
    sessionMaxPolls: SESSION_MAX_POLLS,
    routeSettleMs: ROUTE_SETTLE_MS,
    discoverOnInitialize: true,
    debugLogging: false,
};

export const EMPTY_PLAYBACK_SNAPSHOT: Readonly<PlaybackSnapshot> = {
    positionMs: 0,
    durationMs: 0,
    progress: 0,
    isPlaying: false,
    isPaused: false,
    isBuffering: false,
    isLoading: false,
    hasEnded: false,
    currentMediaRef: null,
    title: null,
    volume: 1,
    isMuted: false,
    playerState: 'idle',
    errorMessage: null,
};
