/**
 * @fileoverview Interface definitions for the Casting module.
 * @module modules/casting/interfaces
 * @version 1.0.0
 */

import type { CastCallbacks, CastSequenceRequest, CastSingleRequest, CastStartResult } from './types';

export interface ICastingPlaybackController {
    /**
     * Load one clip onto the connected session.
     * Rejected while another cast is in flight or without a Connected session.
     */
    castSingle(request: CastSingleRequest, callbacks: CastCallbacks): CastStartResult;

    /**
     * Load the primary clip, then the secondary after the gap.
     */
    castSequence(request: CastSequenceRequest, callbacks: CastCallbacks): CastStartResult;

    /**
     * Tear down the active cast and stop the receiver. No callback fires.
     * @returns Whether a cast was active
     */
    stopCasting(): boolean;

    isCasting(): boolean;
    getActiveAlarmId(): string | null;
    dispose(): void;
}
