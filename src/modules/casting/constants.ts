/**
 * @fileoverview Constants for the Casting module.
 * @module modules/casting/constants
 * @version 1.0.0
 */

import type { CastingControllerConfig } from './types';

/**
 * Delay after a load before the receiver must report playing or buffering.
 */
export const PLAYBACK_VERIFICATION_DELAY_MS = 3000;

export const CAST_MEDIA_CONTENT_TYPE = 'audio/mpeg';

export const DEFAULT_CASTING_CONTROLLER_CONFIG: CastingControllerConfig = {
    verificationDelayMs: PLAYBACK_VERIFICATION_DELAY_MS,
    contentType: CAST_MEDIA_CONTENT_TYPE,
    artist: 'Alarm',
    debugLogging: false,
};
