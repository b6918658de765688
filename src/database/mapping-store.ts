import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { HookMapping } from '../blueprint/hooks.js';
import { createLogger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
// From src/database/ or dist/database/ → package root
const PACKAGE_ROOT = path.resolve(__dirname, '..', '..');

const IN_MEMORY = ':memory:';

const log = createLogger('store');

/**
 * Resolve the database path.
 *  - `:memory:`     → in-process database
 *  - Explicit path  → resolved against the working directory
 *  - Default        → <packageRoot>/data/hook-mappings.db
 */
function resolveDbPath(dbPath?: string): string {
    if (dbPath === IN_MEMORY) return IN_MEMORY;
    if (dbPath) return path.resolve(dbPath);
    return path.join(PACKAGE_ROOT, 'data', 'hook-mappings.db');
}

/** schema.sql sits in src/database; a build that copies it keeps it beside the compiled store. */
function resolveSchemaPath(): string {
    const srcPath = path.join(PACKAGE_ROOT, 'src', 'database', 'schema.sql');
    if (fs.existsSync(srcPath)) return srcPath;

    const distPath = path.join(__dirname, 'schema.sql');
    if (fs.existsSync(distPath)) return distPath;

    throw new Error(
        `schema.sql not found. Searched:\n  - ${srcPath}\n  - ${distPath}`
    );
}

interface MappingRow {
    old_hook_id: number;
    new_hook_id: number;
}

interface SourceRow {
    source_key: string;
    entries: number;
    updated_at: string;
}

export interface MappingSource {
    sourceKey: string;
    entries: number;
    updatedAt: string;
}

/**
 * Persists hook mappings between runs. Feeding a stored mapping back in as
 * the seed keeps a re-deploy of the same blueprint from creating a second
 * set of webhooks.
 */
export class HookMappingStore {
    private db: Database.Database;

    constructor(dbPath?: string) {
        const resolved = resolveDbPath(dbPath);
        if (resolved !== IN_MEMORY) {
            const dir = path.dirname(resolved);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
        }

        this.db = new Database(resolved);
        if (resolved !== IN_MEMORY) {
            this.db.pragma('journal_mode = WAL');
        }
        this.initializeSchema();
        log.debug(`Opened hook mapping store at ${resolved}`);
    }

    private initializeSchema() {
        const schema = fs.readFileSync(resolveSchemaPath(), 'utf-8');
        this.db.exec(schema);
    }

    getMapping(sourceKey: string): HookMapping {
        const rows = this.db
            .prepare<[string], MappingRow>('SELECT old_hook_id, new_hook_id FROM hook_mappings WHERE source_key = ? ORDER BY rowid')
            .all(sourceKey);
        return new Map(rows.map((row) => [row.old_hook_id, row.new_hook_id]));
    }

    /** Upsert every entry of `mapping` under `sourceKey`; other entries are kept. */
    saveMapping(sourceKey: string, mapping: ReadonlyMap<number, number>): void {
        const upsert = this.db.prepare<[string, number, number]>(`
            INSERT INTO hook_mappings (source_key, old_hook_id, new_hook_id)
            VALUES (?, ?, ?)
            ON CONFLICT (source_key, old_hook_id) DO UPDATE SET
                new_hook_id = excluded.new_hook_id,
                created_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        `);
        const saveAll = this.db.transaction((entries: Array<[number, number]>) => {
            for (const [oldHookId, newHookId] of entries) {
                upsert.run(sourceKey, oldHookId, newHookId);
            }
        });
        saveAll(Array.from(mapping.entries()));
        log.info(`Saved ${mapping.size} hook mapping(s) for "${sourceKey}"`);
    }

    listSources(): MappingSource[] {
        const rows = this.db
            .prepare<[], SourceRow>(`
                SELECT source_key, COUNT(*) AS entries, MAX(created_at) AS updated_at
                FROM hook_mappings
                GROUP BY source_key
                ORDER BY source_key
            `)
            .all();
        return rows.map((row) => ({ sourceKey: row.source_key, entries: row.entries, updatedAt: row.updated_at }));
    }

    /** Returns the number of entries removed. */
    deleteSource(sourceKey: string): number {
        const result = this.db.prepare<[string]>('DELETE FROM hook_mappings WHERE source_key = ?').run(sourceKey);
        return result.changes;
    }

    close() {
        this.db.close();
    }
}
