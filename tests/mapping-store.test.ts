/**
 * Hook mapping store unit tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { HookMappingStore } from '../src/database/mapping-store.js';

describe('HookMappingStore', () => {
    let store: HookMappingStore;

    beforeEach(() => {
        store = new HookMappingStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    it('returns an empty mapping for an unknown key', () => {
        expect(store.getMapping('missing').size).toBe(0);
    });

    it('saves and reads a mapping in insertion order', () => {
        store.saveMapping('lead-intake', new Map([[30, 3], [10, 1], [20, 2]]));
        expect(Array.from(store.getMapping('lead-intake'))).toEqual([[30, 3], [10, 1], [20, 2]]);
    });

    it('upserts entries and keeps the others', () => {
        store.saveMapping('lead-intake', new Map([[1, 100], [2, 200]]));
        store.saveMapping('lead-intake', new Map([[2, 250], [3, 300]]));

        expect(Array.from(store.getMapping('lead-intake'))).toEqual([[1, 100], [2, 250], [3, 300]]);
    });

    it('keeps keys separate', () => {
        store.saveMapping('a', new Map([[1, 100]]));
        store.saveMapping('b', new Map([[1, 200]]));

        expect(store.getMapping('a').get(1)).toBe(100);
        expect(store.getMapping('b').get(1)).toBe(200);
    });

    it('lists sources with their entry counts', () => {
        store.saveMapping('b', new Map([[1, 100]]));
        store.saveMapping('a', new Map([[1, 100], [2, 200]]));

        const sources = store.listSources();

        expect(sources.map(({ sourceKey, entries }) => ({ sourceKey, entries }))).toEqual([
            { sourceKey: 'a', entries: 2 },
            { sourceKey: 'b', entries: 1 },
        ]);
        expect(sources[0]?.updatedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('deletes a source and reports the number of entries removed', () => {
        store.saveMapping('a', new Map([[1, 100], [2, 200]]));

        expect(store.deleteSource('a')).toBe(2);
        expect(store.deleteSource('a')).toBe(0);
        expect(store.listSources()).toEqual([]);
    });
});

describe('HookMappingStore on disk', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hook-mappings-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('creates missing directories and persists across instances', () => {
        const dbPath = path.join(dir, 'nested', 'mappings.db');

        const first = new HookMappingStore(dbPath);
        first.saveMapping('lead-intake', new Map([[1, 100]]));
        first.close();

        const second = new HookMappingStore(dbPath);
        expect(Array.from(second.getMapping('lead-intake'))).toEqual([[1, 100]]);
        second.close();
    });
});
