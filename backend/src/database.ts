import sqlite3 from 'sqlite3';
import { CONFIG } from './config';
import type { IProteinCache } from './interfaces';

interface CacheRow {
    payload: string;
    fetched_at: number;
}

/**
 * SQLite-backed protein lookup cache. Entries older than the TTL read as
 * absent; writes replace the previous entry for the key.
 */
export class Database implements IProteinCache {
    private db: sqlite3.Database;
    private ready: Promise<void>;

    constructor(
        filename: string = CONFIG.PATHS.CACHE_DB,
        private readonly ttlMs: number = CONFIG.UNIPROT.CACHE_TTL_MS,
        private readonly now: () => number = Date.now
    ) {
        let signalOpen: (err: Error | null) => void = () => undefined;
        const opened = new Promise<void>((resolve, reject) => {
            signalOpen = (err) => (err ? reject(err) : resolve());
        });
        this.db = new sqlite3.Database(filename, (err) => signalOpen(err));
        this.ready = opened.then(() => this.initSchema());
        this.ready.catch((err) => console.error('[Cache] Could not open database', err));
    }

    private initSchema(): Promise<void> {
        const sql = `
            CREATE TABLE IF NOT EXISTS protein_cache (
                cache_key TEXT PRIMARY KEY,
                payload TEXT NOT NULL,
                fetched_at INTEGER NOT NULL
            )
        `;
        return new Promise((resolve, reject) => {
            this.db.run(sql, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    public async get<T>(key: string): Promise<T | undefined> {
        await this.ready;
        const row = await new Promise<CacheRow | undefined>((resolve, reject) => {
            this.db.get('SELECT payload, fetched_at FROM protein_cache WHERE cache_key = ?', [key], (err: Error | null, found: CacheRow | undefined) => {
                if (err) reject(err);
                else resolve(found);
            });
        });

        if (!row || this.now() - row.fetched_at >= this.ttlMs) {
            return undefined;
        }
        console.log(`[Cache] HIT ${key}`);
        const value: T = JSON.parse(row.payload);
        return value;
    }

    public async set<T>(key: string, value: T): Promise<void> {
        await this.ready;
        await new Promise<void>((resolve, reject) => {
            this.db.run(
                'INSERT OR REPLACE INTO protein_cache (cache_key, payload, fetched_at) VALUES (?, ?, ?)',
                [key, JSON.stringify(value), this.now()],
                (err: Error | null) => {
                    if (err) reject(err);
                    else resolve();
                }
            );
        });
        console.log(`[Cache] SET ${key}`);
    }

    public async close(): Promise<void> {
        await this.ready;
        return new Promise((resolve, reject) => {
            this.db.close((err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }
}
