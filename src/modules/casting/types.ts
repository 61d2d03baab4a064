/**
 * @fileoverview Type definitions for the Casting module.
 * @module modules/casting/types
 * @version 1.0.0
 */

import type { AppError } from '../../types';
import type { SequenceTracker } from '../sequence';

/**
 * Callbacks a cast reports through. Each fires at most once per cast,
 * and `onCompletion` and `onFailed` are mutually exclusive.
 */
export interface CastCallbacks {
    /** Receiver reported playing for the first time */
    onStarted: () => void;
    /** Any load, verification, session or observer failure */
    onFailed: (error: AppError) => void;
    /** Final clip finished; the caller decides whether that ends the alarm */
    onCompletion: () => void;
}

export interface CastSingleRequest {
    alarmId: string;
    url: string;
    title: string;
    volume: number;
    /** Receivers do not loop; the clip is loaded again each time it finishes */
    loop: boolean;
}

export interface CastSequenceRequest {
    alarmId: string;
    primaryUrl: string;
    secondaryUrl: string | null;
    title: string;
    volume: number;
    sequenceGapMs: number;
    /** Shared with the caller so a fallback can resume where casting stopped */
    sequence: SequenceTracker;
}

export type CastStartResult = { ok: true } | { ok: false; error: AppError };

export type CastClip = 'single' | 'primary' | 'secondary';

export interface CastingControllerConfig {
    verificationDelayMs: number;
    contentType: string;
    /** Metadata artist shown on the receiver */
    artist: string;
    debugLogging: boolean;
}
