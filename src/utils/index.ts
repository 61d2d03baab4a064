/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.0.0
 */

export { EventEmitter } from './EventEmitter';
export type { HandlerErrorReporter } from './EventEmitter';
export type { IEventEmitter, IDisposable } from './interfaces';
export { CoordinationLoop } from './CoordinationLoop';
export type { LoopTaskErrorHandler } from './CoordinationLoop';
export { TimerSlot } from './TimerSlot';
export { pollUntil, waitFor } from './polling';
export type { PollResult, PollStatus, PollOptions } from './polling';
export { redactMediaUrl } from './redact';
export {
    MemoryKeyValueStore,
    JsonFileKeyValueStore,
    safeStoreGet,
    safeStoreSet,
    safeStoreRemove,
} from './storage';
export type { IKeyValueStore } from './storage';
