/**
 * @fileoverview Last-used device and saved volume persistence.
 * @module modules/remote/DeviceRepository
 * @version 1.0.0
 */

import { PLAYBACK_STORAGE_KEYS } from '../../config/storageKeys';
import { safeStoreGet, safeStoreRemove, safeStoreSet } from '../../utils';
import type { IKeyValueStore } from '../../utils';
import type { RemoteDeviceRef } from './types';

export function clampVolume(level: number): number {
    if (!Number.isFinite(level)) {
        return 1;
    }
    return Math.min(1, Math.max(0, level));
}

/**
 * The only durable state of the playback core: the device last connected
 * and the volume last set.
 */
export class DeviceRepository {
    constructor(private readonly _store: IKeyValueStore) {}

    /**
     * Saved device, or null unless both id and name are non-empty.
     */
    public getSavedDevice(): RemoteDeviceRef | null {
        const id = safeStoreGet(this._store, PLAYBACK_STORAGE_KEYS.LAST_DEVICE_ID);
        const name = safeStoreGet(this._store, PLAYBACK_STORAGE_KEYS.LAST_DEVICE_NAME);
        if (!id || !name) {
            return null;
        }
        return { id, name };
    }

    public hasSavedDevice(): boolean {
        return this.getSavedDevice() !== null;
    }

    public saveDevice(device: RemoteDeviceRef): boolean {
        if (!device.id || !device.name) {
            console.warn('[DeviceRepository] Refusing to save device without id or name');
            return false;
        }
        const savedId = safeStoreSet(this._store, PLAYBACK_STORAGE_KEYS.LAST_DEVICE_ID, device.id);
        const savedName = safeStoreSet(this._store, PLAYBACK_STORAGE_KEYS.LAST_DEVICE_NAME, device.name);
        return savedId && savedName;
    }

    public clearSavedDevice(): void {
        safeStoreRemove(this._store, PLAYBACK_STORAGE_KEYS.LAST_DEVICE_ID);
        safeStoreRemove(this._store, PLAYBACK_STORAGE_KEYS.LAST_DEVICE_NAME);
    }

    public getSavedVolume(): number | null {
        const raw = safeStoreGet(this._store, PLAYBACK_STORAGE_KEYS.SAVED_VOLUME);
        if (raw === null) {
            return null;
        }
        const parsed = Number.parseFloat(raw);
        return Number.isFinite(parsed) ? clampVolume(parsed) : null;
    }

    /**
     * @returns The clamped value that was stored
     */
    public saveVolume(level: number): number {
        const clamped = clampVolume(level);
        safeStoreSet(this._store, PLAYBACK_STORAGE_KEYS.SAVED_VOLUME, String(clamped));
        return clamped;
    }
}
