/**
 * @fileoverview Alarm playback request and the host collaborators the core drives.
 * @module types/alarm
 * @version 1.0.0
 */

import type { RemoteDeviceRef } from '../modules/remote/types';
import type { IDisposable } from '../utils/interfaces';
import { AppErrorCode, createAppError } from './app-errors';
import type { AppError } from './app-errors';

/**
 * Everything needed to ring one alarm. Immutable for the alarm's lifetime.
 */
export interface AlarmPlaybackRequest {
    alarmId: string;
    /** Local path or URL of the main clip; null rings without audio */
    primaryMediaRef: string | null;
    secondaryMediaRef: string | null;
    /** Only applies to a single clip with no secondary */
    loop: boolean;
    sequenceGapMs: number;
    stopAfterSecondary: boolean;
    /** 0..1; null uses the saved volume */
    volume: number | null;
    castingEnabled: boolean;
    /** Overrides the saved device for this alarm */
    preferredDevice: RemoteDeviceRef | null;
    /** Receiver display title; defaults to `Alarm <id>` */
    title?: string;
    fadeMs?: number;
    fadeSteps?: number;
    vibrate?: boolean;
    /** When false, the alarm is refused while another one rings */
    allowOverlap?: boolean;
}

/**
 * Validate a request before any side effect.
 * @returns The first problem found, or null
 */
export function validateAlarmPlaybackRequest(request: AlarmPlaybackRequest): AppError | null {
    const problems: string[] = [];
    if (typeof request.alarmId !== 'string' || request.alarmId.trim() === '') {
        problems.push('alarmId must be a non-empty string');
    }
    if (!Number.isFinite(request.sequenceGapMs) || request.sequenceGapMs < 0) {
        problems.push('sequenceGapMs must be a finite, non-negative number');
    }
    if (request.volume !== null && !Number.isFinite(request.volume)) {
        problems.push('volume must be null or finite');
    }
    if (request.fadeMs !== undefined && (!Number.isFinite(request.fadeMs) || request.fadeMs < 0)) {
        problems.push('fadeMs must be a finite, non-negative number');
    }
    if (request.fadeSteps !== undefined && (!Number.isFinite(request.fadeSteps) || request.fadeSteps < 0)) {
        problems.push('fadeSteps must be a finite, non-negative number');
    }
    if (problems.length === 0) {
        return null;
    }
    return createAppError(AppErrorCode.INVALID_REQUEST, `Invalid alarm request: ${problems.join('; ')}`, {
        alarmId: request.alarmId,
    });
}

// ============================================
// Host collaborators
// ============================================

/**
 * Local audio engine. Clip ids are chosen by the caller.
 */
export interface ILocalAudioBackend {
    play(id: string, url: string, loop: boolean, fadeMs: number, fadeSteps: number): void;
    stop(id: string): void;
    onCompletion(handler: (id: string) => void): IDisposable;
    listPlayingIds(): string[];
}

export type BookkeepingResult = { ok: true } | { ok: false; message: string };

/**
 * Host bookkeeping. Results are logged, never acted on.
 */
export interface IAlarmBookkeeping {
    alarmStarted(alarmId: string): Promise<BookkeepingResult>;
    alarmStopped(alarmId: string): Promise<BookkeepingResult>;
}

/**
 * UI-presence "an alarm is ringing" signal.
 */
export interface IRingingSignal {
    update(isRinging: boolean): void;
}

export interface IVibrationControl {
    start(alarmId: string): void;
    stop(alarmId: string): void;
}

/**
 * Maps a media reference to a URL a remote receiver can fetch.
 */
export interface ICastUrlResolver {
    resolveCastUrl(mediaRef: string): string | null;
}

/**
 * Default resolver: only http(s) references are castable.
 */
export const httpCastUrlResolver: ICastUrlResolver = {
    resolveCastUrl(mediaRef: string): string | null {
        return /^https?:\/\//i.test(mediaRef) ? mediaRef : null;
    },
};
