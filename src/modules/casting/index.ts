/**
 * @fileoverview Public exports for the Casting module.
 * @module modules/casting
 * @version 1.0.0
 */

export { CastingPlaybackController } from './CastingPlaybackController';
export type { CastingPlaybackControllerDeps } from './CastingPlaybackController';
export {
    CAST_MEDIA_CONTENT_TYPE,
    DEFAULT_CASTING_CONTROLLER_CONFIG,
    PLAYBACK_VERIFICATION_DELAY_MS,
} from './constants';
export type { ICastingPlaybackController } from './interfaces';
export type {
    CastCallbacks,
    CastClip,
    CastingControllerConfig,
    CastSequenceRequest,
    CastSingleRequest,
    CastStartResult,
} from './types';
