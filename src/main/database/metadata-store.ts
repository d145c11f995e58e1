/**
 * Metadata Store
 *
 * Persists image metadata between runs in a sql.js (WebAssembly SQLite) file.
 * Rows are keyed by identity and only trusted while the file's size and mtime
 * still match; anything stored here can be rebuilt by reading the image again.
 */

import initSqlJs, { Database, SqlValue } from 'sql.js';
import fs from 'fs';
import path from 'path';
import { ImageMetadata } from '../../shared/image-cache-types';
import { ImageIdentity } from '../../shared/types';
import { describeError, log } from '../logging';

export const METADATA_FILE_NAME = 'metadata.sqlite';

export class MetadataStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetadataStoreError';
  }
}

/**
 * Fingerprint of the file on disk a stored row must match.
 */
export interface FileFingerprint {
  byteSize: number;
  modifiedAt: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS image_metadata (
    identity TEXT PRIMARY KEY,
    width INTEGER NOT NULL,
    height INTEGER NOT NULL,
    byte_size INTEGER NOT NULL,
    format TEXT NOT NULL,
    modified_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )
`;

function asNumber(value: SqlValue | undefined): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function asString(value: SqlValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// ============================================================================
// CONTRACT: MetadataStore class
// ============================================================================

/**
 * CONTRACT:
 *   State:
 *     - db: in-memory sql.js database loaded from {dir}/metadata.sqlite
 *     - dirty: true when rows changed since the last flush
 *
 *   Invariants:
 *     - get() returns a row only when byteSize and modifiedAt match the fingerprint;
 *       a mismatching row is deleted
 *     - flush() writes atomically (temp file + rename) and only when dirty
 *     - A corrupt or unreadable file is replaced by an empty database
 *     - Any call after close() throws MetadataStoreError
 */
export class MetadataStore {
  private db: Database | null;
  private dirty = false;

  private constructor(
    database: Database,
    private readonly filePath: string
  ) {
    this.db = database;
  }

  /**
   * Opens (or creates) the store in `dir`.
   */
  static async open(dir: string): Promise<MetadataStore> {
    const SQL = await initSqlJs();
    const filePath = path.join(dir, METADATA_FILE_NAME);

    let database: Database;
    try {
      database = new SQL.Database(fs.readFileSync(filePath));
      database.exec(SCHEMA);
    } catch (error) {
      if (fs.existsSync(filePath)) {
        log('warn', `Metadata store unreadable, starting empty: ${describeError(error)}`);
      }
      database = new SQL.Database();
      database.exec(SCHEMA);
    }
    return new MetadataStore(database, filePath);
  }

  get(identity: ImageIdentity, fingerprint: FileFingerprint): ImageMetadata | undefined {
    const db = this.requireOpen();
    const stmt = db.prepare(
      'SELECT width, height, byte_size, format, modified_at FROM image_metadata WHERE identity = ?'
    );
    let row: Record<string, SqlValue> | undefined;
    try {
      stmt.bind([identity]);
      if (stmt.step()) {
        row = stmt.getAsObject();
      }
    } finally {
      stmt.free();
    }
    if (!row) {
      return undefined;
    }

    const width = asNumber(row.width);
    const height = asNumber(row.height);
    const byteSize = asNumber(row.byte_size);
    const format = asString(row.format);
    const modifiedAt = asNumber(row.modified_at);
    if (
      width === undefined ||
      height === undefined ||
      byteSize === undefined ||
      format === undefined ||
      modifiedAt === undefined ||
      byteSize !== fingerprint.byteSize ||
      modifiedAt !== fingerprint.modifiedAt
    ) {
      this.delete(identity);
      return undefined;
    }
    return { identity, width, height, byteSize, format, modifiedAt };
  }

  put(metadata: ImageMetadata): void {
    const db = this.requireOpen();
    db.run(
      `INSERT INTO image_metadata (identity, width, height, byte_size, format, modified_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(identity) DO UPDATE SET
         width = excluded.width,
         height = excluded.height,
         byte_size = excluded.byte_size,
         format = excluded.format,
         modified_at = excluded.modified_at,
         updated_at = excluded.updated_at`,
      [
        metadata.identity,
        metadata.width,
        metadata.height,
        metadata.byteSize,
        metadata.format,
        metadata.modifiedAt,
        Date.now(),
      ]
    );
    this.dirty = true;
  }

  delete(identity: ImageIdentity): void {
    const db = this.requireOpen();
    db.run('DELETE FROM image_metadata WHERE identity = ?', [identity]);
    this.dirty = true;
  }

  count(): number {
    const db = this.requireOpen();
    const result = db.exec('SELECT COUNT(*) FROM image_metadata');
    return asNumber(result[0]?.values[0]?.[0]) ?? 0;
  }

  /**
   * Writes the database to disk if anything changed. Returns whether it wrote.
   */
  flush(): boolean {
    const db = this.requireOpen();
    if (!this.dirty) {
      return false;
    }
    const buffer = Buffer.from(db.export());
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, buffer);
    fs.renameSync(tempPath, this.filePath);
    this.dirty = false;
    return true;
  }

  close(): void {
    if (!this.db) {
      return;
    }
    this.flush();
    this.db.close();
    this.db = null;
  }

  private requireOpen(): Database {
    if (!this.db) {
      throw new MetadataStoreError('Metadata store is closed');
    }
    return this.db;
  }
}
