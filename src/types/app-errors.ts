/**
 * @fileoverview Canonical error taxonomy and base error shape.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for alarm playback.
 */
export enum AppErrorCode {
    // Orchestration
    ALREADY_ACTIVE = 'ALREADY_ACTIVE',
    INVALID_REQUEST = 'INVALID_REQUEST',
    SAFETY_TIMEOUT_FORCED = 'SAFETY_TIMEOUT_FORCED',

    // Remote session / reconnection
    NO_USABLE_DEVICE = 'NO_USABLE_DEVICE',
    DISCOVERY_TIMEOUT = 'DISCOVERY_TIMEOUT',
    CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
    SESSION_START_FAILED = 'SESSION_START_FAILED',
    SESSION_LOST = 'SESSION_LOST',
    RECONNECT_CANCELLED = 'RECONNECT_CANCELLED',

    // Casting
    ALREADY_CASTING = 'ALREADY_CASTING',
    LOAD_FAILED = 'LOAD_FAILED',
    PLAYBACK_VERIFICATION_FAILED = 'PLAYBACK_VERIFICATION_FAILED',

    // Local playback
    PLAYBACK_SOURCE_MISSING = 'PLAYBACK_SOURCE_MISSING',

    // Generic
    UNKNOWN = 'UNKNOWN',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether recovery might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Codes that the orchestrator recovers from by falling back to local audio.
 */
export const CASTING_PATH_ERROR_CODES: ReadonlySet<AppErrorCode> = new Set([
    AppErrorCode.ALREADY_CASTING,
    AppErrorCode.NO_USABLE_DEVICE,
    AppErrorCode.DISCOVERY_TIMEOUT,
    AppErrorCode.CONNECTION_TIMEOUT,
    AppErrorCode.SESSION_START_FAILED,
    AppErrorCode.SESSION_LOST,
    AppErrorCode.RECONNECT_CANCELLED,
    AppErrorCode.LOAD_FAILED,
    AppErrorCode.PLAYBACK_VERIFICATION_FAILED,
]);

export function createAppError(
    code: AppErrorCode,
    message: string,
    context?: Record<string, unknown>
): AppError {
    const error: AppError = {
        code,
        message,
        recoverable: code !== AppErrorCode.PLAYBACK_SOURCE_MISSING && code !== AppErrorCode.INVALID_REQUEST,
    };
    if (context) {
        error.context = context;
    }
    return error;
}

/**
 * Reduce an unknown thrown value to loggable fields.
 */
export function summarizeErrorForLog(error: unknown): { name?: string; code?: unknown; message?: string } {
    if (!error || typeof error !== 'object') {
        return typeof error === 'string' ? { message: error } : {};
    }
    const name = 'name' in error ? error.name : undefined;
    const message = 'message' in error ? error.message : undefined;
    return {
        ...(typeof name === 'string' ? { name } : {}),
        ...('code' in error ? { code: error.code } : {}),
        ...(typeof message === 'string' ? { message } : {}),
    };
}

/**
 * Best-effort message extraction for thrown values.
 */
export function errorMessageOf(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
