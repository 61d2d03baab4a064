/**
 * @fileoverview Persisted key constants.
 * @module config/storageKeys
 * @version 1.0.0
 */

/**
 * Canonical key-value store keys. The last-used device and volume are the
 * only state that survives a process restart.
 */
export const PLAYBACK_STORAGE_KEYS = {
    LAST_DEVICE_ID: 'casting_last_device_id',
    LAST_DEVICE_NAME: 'casting_last_device_name',
    SAVED_VOLUME: 'casting_saved_volume',
} as const;
