/**
 * @fileoverview Key-value persistence with safe accessors.
 * @module utils/storage
 * @version 1.0.0
 *
 * Persistence is optional for playback: a failing store must never stop an
 * alarm from ringing. The safe helpers treat storage as best-effort and never throw.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Minimal synchronous key-value store (localStorage-shaped).
 */
export interface IKeyValueStore {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
    removeItem(key: string): void;
}

export function safeStoreGet(store: IKeyValueStore, key: string): string | null {
    try {
        return store.getItem(key);
    } catch {
        return null;
    }
}

export function safeStoreSet(store: IKeyValueStore, key: string, value: string): boolean {
    try {
        store.setItem(key, value);
        return true;
    } catch (error) {
        console.warn(`[storage] Failed to persist '${key}':`, error);
        return false;
    }
}

export function safeStoreRemove(store: IKeyValueStore, key: string): boolean {
    try {
        store.removeItem(key);
        return true;
    } catch {
        return false;
    }
}

/**
 * In-memory store. Used by tests and hosts without durable storage.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
    private _entries: Map<string, string>;

    constructor(initial: Record<string, string> = {}) {
        this._entries = new Map(Object.entries(initial));
    }

    public getItem(key: string): string | null {
        return this._entries.get(key) ?? null;
    }

    public setItem(key: string, value: string): void {
        this._entries.set(key, value);
    }

    public removeItem(key: string): void {
        this._entries.delete(key);
    }

    public toJSON(): Record<string, string> {
        return Object.fromEntries(this._entries);
    }
}

/**
 * Store backed by a single JSON object on disk.
 * The file is read once on construction and rewritten on every change.
 */
export class JsonFileKeyValueStore implements IKeyValueStore {
    private readonly _filePath: string;
    private _entries: Record<string, string> = {};

    constructor(filePath: string) {
        this._filePath = filePath;
        this._entries = this._load();
    }

    public getItem(key: string): string | null {
        return Object.prototype.hasOwnProperty.call(this._entries, key)
            ? (this._entries[key] ?? null)
            : null;
    }

    public setItem(key: string, value: string): void {
        this._entries = { ...this._entries, [key]: value };
        this._flush();
    }

    public removeItem(key: string): void {
        if (!Object.prototype.hasOwnProperty.call(this._entries, key)) {
            return;
        }
        const next = { ...this._entries };
        delete next[key];
        this._entries = next;
        this._flush();
    }

    private _load(): Record<string, string> {
        let raw: string;
        try {
            raw = fs.readFileSync(this._filePath, 'utf8');
        } catch {
            return {};
        }

        try {
            const parsed: unknown = JSON.parse(raw);
            if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
                console.warn('[storage] Ignoring non-object store file:', this._filePath);
                return {};
            }
            const entries: Record<string, string> = {};
            for (const [key, value] of Object.entries(parsed)) {
                if (typeof value === 'string') {
                    entries[key] = value;
                }
            }
            return entries;
        } catch (error) {
            console.warn('[storage] Corrupted store file, starting empty:', this._filePath, error);
            return {};
        }
    }

    private _flush(): void {
        fs.mkdirSync(path.dirname(this._filePath), { recursive: true });
        const tmpPath = `${this._filePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(this._entries, null, 2), 'utf8');
        fs.renameSync(tmpPath, this._filePath);
    }
}
