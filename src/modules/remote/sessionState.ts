/**
 * @fileoverview Helpers over the RemoteSessionState variant.
 * @module modules/remote/sessionState
 * @version 1.0.0
 */

import { SESSION_STATUS_CODES } from './constants';
import type { RemoteSessionState } from './types';

export function sameSessionState(a: RemoteSessionState, b: RemoteSessionState): boolean {
    if (a.kind === 'Error' && b.kind === 'Error') {
        return a.message === b.message;
    }
    if (a.kind === 'Ended' && b.kind === 'Ended') {
        return a.mediaRef === b.mediaRef;
    }
    return a.kind === b.kind;
}

export function describeSessionState(state: RemoteSessionState): string {
    switch (state.kind) {
        case 'Error':
            return `Error(${state.message})`;
        case 'Ended':
            return `Ended(${state.mediaRef})`;
        default:
            return state.kind;
    }
}

/**
 * Name a receiver status code, e.g. `APPLICATION_NOT_FOUND (2155)`.
 */
export function describeSessionStatusCode(code: number): string {
    for (const [name, value] of Object.entries(SESSION_STATUS_CODES)) {
        if (value === code) {
            return `${name} (${code})`;
        }
    }
    return `code ${code}`;
}
