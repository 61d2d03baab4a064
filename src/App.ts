/**
 * @fileoverview Composition root - wires the coordination loop, remote
 * session, casting controller and orchestrator for a host.
 * @module App
 * @version 1.0.0
 */

import { AlarmPlaybackOrchestrator } from './Orchestrator';
import type { OrchestratorConfig } from './Orchestrator';
import { CastingPlaybackController } from './modules/casting';
import type { CastingControllerConfig } from './modules/casting';
import { DeviceRepository, RemoteSessionManager } from './modules/remote';
import type { IRemoteCastProtocol, RemoteSessionConfig } from './modules/remote';
import type {
    IAlarmBookkeeping,
    ICastUrlResolver,
    ILocalAudioBackend,
    IRingingSignal,
    IVibrationControl,
} from './types';
import { CoordinationLoop } from './utils';
import type { IKeyValueStore, LoopTaskErrorHandler } from './utils';

// ============================================
// Configuration
// ============================================

export interface AlarmPlaybackSystemConfig {
    remote?: Partial<RemoteSessionConfig>;
    casting?: Partial<CastingControllerConfig>;
    orchestrator?: Partial<OrchestratorConfig>;
    /** Turns on state traces in every component */
    debugLogging?: boolean;
    onTaskError?: LoopTaskErrorHandler;
}

/**
 * Host-provided collaborators.
 */
export interface AlarmPlaybackSystemDeps {
    protocol: IRemoteCastProtocol;
    store: IKeyValueStore;
    localAudio: ILocalAudioBackend;
    bookkeeping: IAlarmBookkeeping;
    ringingSignal: IRingingSignal;
    vibration?: IVibrationControl;
    castUrlResolver?: ICastUrlResolver;
}

export interface AlarmPlaybackSystem {
    loop: CoordinationLoop;
    devices: DeviceRepository;
    sessionManager: RemoteSessionManager;
    castingController: CastingPlaybackController;
    orchestrator: AlarmPlaybackOrchestrator;
    dispose(): void;
}

// ============================================
// Factory
// ============================================

/**
 * Build and initialize every component. The returned system is ready to
 * accept `orchestrator.start()`.
 */
export function createAlarmPlaybackSystem(
    deps: AlarmPlaybackSystemDeps,
    config: AlarmPlaybackSystemConfig = {}
): AlarmPlaybackSystem {
    const debug = config.debugLogging === true ? { debugLogging: true } : {};

    const loop = new CoordinationLoop();
    if (config.onTaskError) {
        loop.setTaskErrorHandler(config.onTaskError);
    }
    const devices = new DeviceRepository(deps.store);
    const sessionManager = new RemoteSessionManager(
        { protocol: deps.protocol, devices, loop },
        { ...config.remote, ...debug }
    );
    const castingController = new CastingPlaybackController(
        { sessionManager, loop },
        { ...config.casting, ...debug }
    );
    const orchestrator = new AlarmPlaybackOrchestrator(
        {
            loop,
            sessionManager,
            castingController,
            localAudio: deps.localAudio,
            bookkeeping: deps.bookkeeping,
            ringingSignal: deps.ringingSignal,
            ...(deps.vibration ? { vibration: deps.vibration } : {}),
            ...(deps.castUrlResolver ? { castUrlResolver: deps.castUrlResolver } : {}),
        },
        { ...config.orchestrator, ...debug }
    );

    sessionManager.initialize();
    orchestrator.initialize();
    console.log('[App] Alarm playback system ready');

    let disposed = false;
    return {
        loop,
        devices,
        sessionManager,
        castingController,
        orchestrator,
        dispose(): void {
            if (disposed) {
                return;
            }
            disposed = true;
            // Orchestrator first: stopping alarms still needs the session.
            orchestrator.dispose();
            castingController.dispose();
            sessionManager.dispose();
            loop.dispose();
            console.log('[App] Alarm playback system disposed');
        },
    };
}
