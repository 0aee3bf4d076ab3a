// cache_store.ts — key-addressed directory cache
//
// GUARANTEES:
// - Entries are immutable: the first save for a key wins, later saves are skipped
// - File contents are content-addressed (SHA-256) and shared between entries
// - Restore order: exact key, then each prefix in order (newest entry under the prefix)
// - Prefix matches never cross platform namespaces and are always reported as stale
// - An unavailable store degrades to "nothing cached": restore misses, save skips
//
// CONTRACT: Synchronous SQLite underneath (better-sqlite3); async surface so a
// remote backend can replace it without touching callers.

import Database from 'better-sqlite3';
import crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';
import { CACHE } from './config';
import { CacheUnavailableError, errorMessage } from './structured_error';
import type { CacheEntry, CacheKey, RestoreResult, SaveResult } from './matrix_types';

const log = createLogger('cache-store');

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;
const DAY_MS = 24 * 60 * 60 * 1000;

/* -------------------------------------------------------------------------- */
/* Rows                                                                       */
/* -------------------------------------------------------------------------- */

interface EntryRow {
  cache_key: string;
  namespace: string;
  content_hash: string;
  file_count: number;
  size_bytes: number;
  created_ms: number;
  last_restored_ms: number | null;
}

interface FileRow {
  rel_path: string;
  blob_hash: string;
  mode: number;
}

interface CollectedFile {
  relPath: string;
  absPath: string;
  mode: number;
  hash: string;
  size: number;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function sha256Hex(buf: Buffer | string): string {
  return crypto.createHash('sha256').update(buf).digest('hex');
}

function collectFiles(root: string): CollectedFile[] {
  const out: CollectedFile[] = [];

  const walk = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(abs);
      } else if (entry.isFile()) {
        const stat = fs.statSync(abs);
        if (stat.size > CACHE.MAX_FILE_BYTES) {
          throw new Error(`File too large for cache: ${abs} (${stat.size} bytes)`);
        }
        const content = fs.readFileSync(abs);
        out.push({
          relPath: path.relative(root, abs).split(path.sep).join('/'),
          absPath: abs,
          mode: stat.mode & 0o777,
          hash: sha256Hex(content),
          size: content.length,
        });
      }
      // symlinks and special files are not cached
    }
  };

  walk(root);
  return out.sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));
}

function manifestHash(files: CollectedFile[]): string {
  return sha256Hex(files.map((f) => `${f.relPath}\0${f.hash}\0${f.mode}`).join('\n'));
}

function isSafeRelPath(relPath: string): boolean {
  if (relPath === '' || path.posix.isAbsolute(relPath)) return false;
  return !relPath.split('/').some((part) => part === '..' || part === '');
}

function toEntry(row: EntryRow): CacheEntry {
  return {
    key: row.cache_key,
    namespace: row.namespace,
    contentHash: row.content_hash,
    fileCount: row.file_count,
    sizeBytes: row.size_bytes,
    createdAt: new Date(row.created_ms),
    lastRestoredAt: row.last_restored_ms === null ? null : new Date(row.last_restored_ms),
  };
}

/* -------------------------------------------------------------------------- */
/* Options                                                                    */
/* -------------------------------------------------------------------------- */

export interface CacheStoreOptions {
  busyTimeoutMs?: number;
  lruMaxBytes?: number;
  /** Clock override for tests */
  now?: () => number;
}

/* -------------------------------------------------------------------------- */
/* Cache Store                                                                */
/* -------------------------------------------------------------------------- */

export class CacheStore {
  private db: Database.Database | null = null;
  private readonly openError: string | null = null;
  private readonly now: () => number;

  // byte-aware cache of blob contents keyed by content hash
  private readonly blobCache: LRUCache<string, Buffer>;

  constructor(dbPath: string, opts: CacheStoreOptions = {}) {
    this.now = opts.now ?? Date.now;
    this.blobCache = new LRUCache<string, Buffer>({
      maxSize: opts.lruMaxBytes ?? CACHE.LRU_MAX_BYTES,
      sizeCalculation: (b: Buffer) => Math.max(1, b.length),
    });

    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      const db = new Database(dbPath);
      this.configureDatabase(db, opts.busyTimeoutMs ?? CACHE.BUSY_TIMEOUT_MS);
      this.runMigrations(db);
      this.db = db;
    } catch (e) {
      this.openError = errorMessage(e);
      log.warn(`Cache store unavailable, continuing without cache: ${this.openError}`, { dbPath });
    }
  }

  get available(): boolean {
    return this.db !== null;
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(db: Database.Database, busyTimeoutMs: number): void {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
    db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
  }

  private runMigrations(db: Database.Database): void {
    const tx = db.transaction(() => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;

      const current = row?.version ?? 0;

      if (current < 1) {
        db.exec(`
          CREATE TABLE IF NOT EXISTS blobs (
            content_hash TEXT PRIMARY KEY,
            content BLOB NOT NULL,
            size_bytes INTEGER NOT NULL,
            CHECK(length(content_hash) = 64)
          ) STRICT;

          CREATE TABLE IF NOT EXISTS cache_entries (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            cache_key TEXT NOT NULL UNIQUE,
            namespace TEXT NOT NULL,
            content_hash TEXT NOT NULL,
            file_count INTEGER NOT NULL,
            size_bytes INTEGER NOT NULL,
            created_ms INTEGER NOT NULL,
            last_restored_ms INTEGER
          ) STRICT;

          CREATE TABLE IF NOT EXISTS entry_files (
            entry_id INTEGER NOT NULL,
            rel_path TEXT NOT NULL,
            blob_hash TEXT NOT NULL,
            mode INTEGER NOT NULL,
            PRIMARY KEY (entry_id, rel_path),
            FOREIGN KEY (entry_id) REFERENCES cache_entries(id) ON DELETE CASCADE,
            FOREIGN KEY (blob_hash) REFERENCES blobs(content_hash)
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_entries_namespace ON cache_entries(namespace);
          CREATE INDEX IF NOT EXISTS idx_entry_files_blob ON entry_files(blob_hash);
        `);

        db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
      }
    });

    tx();
  }

  /** Runs fn against the open database; any failure means the store is unavailable. */
  private withDb<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new CacheUnavailableError(`Cache store not open (${operation}): ${this.openError ?? 'closed'}`);
    }
    try {
      return fn(this.db);
    } catch (e) {
      throw new CacheUnavailableError(`Cache ${operation} failed: ${errorMessage(e)}`, e);
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Restore                                                                  */
  /* ------------------------------------------------------------------------ */

  /**
   * Exact key first, then each prefix in order. Never throws: any store or
   * filesystem failure is reported as a miss.
   */
  async restore(exactKey: CacheKey, prefixKeys: string[], localPath: string): Promise<RestoreResult> {
    const miss: RestoreResult = { hit: 'miss', localPath, stale: false };

    try {
      const exact = this.withDb('lookup', (db) =>
        db
          .prepare(`SELECT * FROM cache_entries WHERE cache_key = ? AND namespace = ?`)
          .get(exactKey.key, exactKey.platform) as (EntryRow & { id: number }) | undefined
      );

      if (exact) {
        this.materialize(exact.id, localPath);
        this.touch(exact.id);
        log.info(`Cache restored from exact key ${exact.cache_key}`, { localPath });
        return { hit: 'exact', key: exact.cache_key, localPath, stale: false };
      }

      for (const prefix of prefixKeys) {
        const candidate = this.withDb('prefix lookup', (db) =>
          db
            .prepare(`
              SELECT * FROM cache_entries
              WHERE namespace = ? AND substr(cache_key, 1, length(?)) = ?
              ORDER BY id DESC LIMIT 1
            `)
            .get(exactKey.platform, prefix, prefix) as (EntryRow & { id: number }) | undefined
        );

        if (candidate) {
          this.materialize(candidate.id, localPath);
          this.touch(candidate.id);
          log.info(`Cache restored from prefix ${prefix} (key ${candidate.cache_key}); data may be stale`, { localPath });
          return { hit: 'prefix', key: candidate.cache_key, localPath, stale: true };
        }
      }

      log.info(`Cache miss for ${exactKey.key}`);
      return miss;
    } catch (e) {
      log.warn(`Cache restore degraded to miss: ${errorMessage(e)}`, { key: exactKey.key });
      return miss;
    }
  }

  private materialize(entryId: number, localPath: string): void {
    const files = this.withDb('read manifest', (db) =>
      db
        .prepare(`SELECT rel_path, blob_hash, mode FROM entry_files WHERE entry_id = ? ORDER BY rel_path`)
        .all(entryId) as FileRow[]
    );

    fs.mkdirSync(localPath, { recursive: true });

    for (const file of files) {
      if (!isSafeRelPath(file.rel_path)) {
        throw new Error(`Refusing unsafe cached path: ${file.rel_path}`);
      }
      const target = path.join(localPath, ...file.rel_path.split('/'));
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, this.readBlob(file.blob_hash));
      fs.chmodSync(target, file.mode);
    }
  }

  private readBlob(hash: string): Buffer {
    const cached = this.blobCache.get(hash);
    if (cached) return cached;

    const row = this.withDb('read blob', (db) =>
      db.prepare(`SELECT content FROM blobs WHERE content_hash = ?`).get(hash) as { content: Buffer } | undefined
    );
    if (!row) {
      throw new Error(`Blob missing from store: ${hash}`);
    }
    if (sha256Hex(row.content) !== hash) {
      throw new Error(`Blob corrupt (hash mismatch): ${hash}`);
    }

    this.blobCache.set(hash, row.content);
    return row.content;
  }

  private touch(entryId: number): void {
    this.withDb('touch', (db) =>
      db.prepare(`UPDATE cache_entries SET last_restored_ms = ? WHERE id = ?`).run(this.now(), entryId)
    );
  }

  /* ------------------------------------------------------------------------ */
  /* Save                                                                     */
  /* ------------------------------------------------------------------------ */

  /**
   * Persist localPath under exactKey unless an entry already exists. Never
   * throws: an unavailable store yields `skipped`.
   */
  async save(exactKey: CacheKey, localPath: string): Promise<SaveResult> {
    try {
      if (this.has(exactKey.key)) {
        log.info(`Cache entry ${exactKey.key} already exists, not overwriting`);
        return { outcome: 'skipped', reason: 'exists' };
      }

      const files = fs.existsSync(localPath) ? collectFiles(localPath) : [];
      if (files.length === 0) {
        log.warn(`Nothing to cache at ${localPath}`, { key: exactKey.key });
        return { outcome: 'skipped', reason: 'empty' };
      }

      const totalBytes = files.reduce((sum, f) => sum + f.size, 0);
      const contentHash = manifestHash(files);
      const createdMs = this.now();

      const inserted = this.withDb('save', (db) => {
        const insertBlob = db.prepare(
          `INSERT OR IGNORE INTO blobs (content_hash, content, size_bytes) VALUES (?, ?, ?)`
        );
        const insertEntry = db.prepare(`
          INSERT OR IGNORE INTO cache_entries (cache_key, namespace, content_hash, file_count, size_bytes, created_ms)
          VALUES (?, ?, ?, ?, ?, ?)
        `);
        const insertFile = db.prepare(
          `INSERT INTO entry_files (entry_id, rel_path, blob_hash, mode) VALUES (?, ?, ?, ?)`
        );

        const tx = db.transaction((): boolean => {
          const res = insertEntry.run(exactKey.key, exactKey.platform, contentHash, files.length, totalBytes, createdMs);
          // lost a race against another job saving the same key
          if (res.changes === 0) return false;

          const entryId = Number(res.lastInsertRowid);
          for (const f of files) {
            const content = fs.readFileSync(f.absPath);
            if (sha256Hex(content) !== f.hash) {
              throw new Error(`File changed while caching: ${f.relPath}`);
            }
            insertBlob.run(f.hash, content, content.length);
            insertFile.run(entryId, f.relPath, f.hash, f.mode);
          }
          return true;
        });

        return tx();
      });

      if (!inserted) {
        return { outcome: 'skipped', reason: 'exists' };
      }

      log.info(`Cache saved: ${exactKey.key}`, { files: files.length, bytes: totalBytes });
      return { outcome: 'stored' };
    } catch (e) {
      log.warn(`Cache save skipped: ${errorMessage(e)}`, { key: exactKey.key });
      return { outcome: 'skipped', reason: 'unavailable' };
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Inspection / Maintenance                                                 */
  /* ------------------------------------------------------------------------ */

  has(key: string): boolean {
    const row = this.withDb('lookup', (db) =>
      db.prepare(`SELECT 1 AS present FROM cache_entries WHERE cache_key = ?`).get(key) as { present: number } | undefined
    );
    return row !== undefined;
  }

  list(namespace?: string): CacheEntry[] {
    const rows = this.withDb('list', (db) =>
      namespace === undefined
        ? (db.prepare(`SELECT * FROM cache_entries ORDER BY id`).all() as EntryRow[])
        : (db.prepare(`SELECT * FROM cache_entries WHERE namespace = ? ORDER BY id`).all(namespace) as EntryRow[])
    );
    return rows.map(toEntry);
  }

  /**
   * Deletes entries neither stored nor restored within maxAgeDays, then any
   * blob no remaining entry references. Returns the number of entries removed.
   */
  prune(maxAgeDays: number = CACHE.PRUNE_DAYS): number {
    const cutoff = this.now() - maxAgeDays * DAY_MS;

    return this.withDb('prune', (db) => {
      const tx = db.transaction((): number => {
        const res = db
          .prepare(`DELETE FROM cache_entries WHERE max(created_ms, coalesce(last_restored_ms, 0)) < ?`)
          .run(cutoff);
        db.prepare(`DELETE FROM blobs WHERE content_hash NOT IN (SELECT DISTINCT blob_hash FROM entry_files)`).run();
        return res.changes;
      });
      const removed = tx();
      if (removed > 0) {
        this.blobCache.clear();
        log.info(`Pruned ${removed} cache entries older than ${maxAgeDays} days`);
      }
      return removed;
    });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.blobCache.clear();
  }
}
