/**
 * @fileoverview Public entry point.
 * @module index
 * @version 1.0.0
 */

export { createAlarmPlaybackSystem } from './App';
export type { AlarmPlaybackSystem, AlarmPlaybackSystemConfig, AlarmPlaybackSystemDeps } from './App';
export {
    AlarmPlaybackOrchestrator,
    CAST_START_DELAY_MS,
    COMPLETION_MARGIN_MS,
    DEFAULT_ORCHESTRATOR_CONFIG,
    SAFETY_TIMEOUT_MS,
} from './Orchestrator';
export type {
    ActiveBackend,
    AlarmPlaybackOrchestratorDeps,
    AlarmStartResult,
    OrchestratorConfig,
    PlaybackPath,
    TerminationReason,
} from './Orchestrator';

export * from './modules/remote';
export * from './modules/casting';
export * from './modules/sequence';
export * from './types';
export * from './utils';
export { PLAYBACK_STORAGE_KEYS } from './config/storageKeys';
