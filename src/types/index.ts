/**
 * @fileoverview Shared types.
 */

export {
    AppErrorCode,
    CASTING_PATH_ERROR_CODES,
    createAppError,
    errorMessageOf,
    summarizeErrorForLog,
} from './app-errors';
export type { AppError } from './app-errors';
export { httpCastUrlResolver, validateAlarmPlaybackRequest } from './alarm';
export type {
    AlarmPlaybackRequest,
    BookkeepingResult,
    IAlarmBookkeeping,
    ICastUrlResolver,
    ILocalAudioBackend,
    IRingingSignal,
    IVibrationControl,
} from './alarm';
