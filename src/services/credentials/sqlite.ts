/**
 * @fileoverview SQLite credential backend.
 *
 * Rows live in the `tokens` table. `realm_id` is not unique in the schema;
 * every save inserts the new row and removes older rows for the realm in the
 * same transaction, so a realm never has competing active rows.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { BackendUnavailableError, errorMessage } from '../../utils/errors.js';
import { parseRawPayload, toCredentialRecord } from './record.js';
import type { CredentialRecord, PersistenceBackend } from './types.js';

export const TOKENS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS tokens (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    realm_id TEXT NOT NULL,
    access_token TEXT NOT NULL,
    refresh_token TEXT NOT NULL,
    token_type TEXT NOT NULL,
    expires_at INTEGER NOT NULL,
    raw TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_tokens_realm_id ON tokens(realm_id, id);
`;

interface TokenRow {
  realm_id: unknown;
  access_token: unknown;
  refresh_token: unknown;
  token_type: unknown;
  expires_at: unknown;
  raw: unknown;
  created_at: unknown;
  updated_at: unknown;
}

/**
 * Open a database file and apply the tokens schema.
 */
export function openTokenDatabase(dbPath: string): Database.Database {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath, { fileMustExist: false });
  db.pragma('journal_mode = WAL');
  db.exec(TOKENS_SCHEMA);
  return db;
}

/**
 * SQLite credential backend. The connection opens on first use so that an
 * unreachable database surfaces as BackendUnavailableError from save/load
 * rather than at construction.
 */
export class SqlitePersistenceBackend implements PersistenceBackend {
  readonly name = 'sqlite';
  private db: Database.Database | null = null;

  /**
   * @param dbPath Path to SQLite database file
   */
  constructor(private readonly dbPath: string) {}

  private connection(): Database.Database {
    if (this.db) {
      return this.db;
    }
    try {
      this.db = openTokenDatabase(this.dbPath);
      return this.db;
    } catch (error) {
      throw new BackendUnavailableError(
        this.name,
        `Failed to open credential database: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async save(record: CredentialRecord): Promise<void> {
    const db = this.connection();

    try {
      const insert = db.prepare(
        `INSERT INTO tokens (realm_id, access_token, refresh_token, token_type, expires_at, raw, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      );
      const prune = db.prepare(`DELETE FROM tokens WHERE realm_id = ? AND id <> ?`);

      const replace = db.transaction((next: CredentialRecord) => {
        const result = insert.run(
          next.realmId,
          next.accessToken,
          next.refreshToken,
          next.tokenType,
          next.expiresAt,
          JSON.stringify(next.raw),
          next.createdAt,
          next.updatedAt
        );
        prune.run(next.realmId, result.lastInsertRowid);
      });

      replace(record);
    } catch (error) {
      throw new BackendUnavailableError(
        this.name,
        `Failed to write credential row: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async load(realmId: string): Promise<CredentialRecord | null> {
    const db = this.connection();

    let row: TokenRow | undefined;
    try {
      row = db
        .prepare(
          `SELECT realm_id, access_token, refresh_token, token_type, expires_at, raw, created_at, updated_at
           FROM tokens WHERE realm_id = ? ORDER BY id DESC LIMIT 1`
        )
        .get(realmId) as TokenRow | undefined;
    } catch (error) {
      throw new BackendUnavailableError(
        this.name,
        `Failed to read credential row: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!row) {
      return null;
    }

    const raw = typeof row.raw === 'string' ? parseRawPayload(row.raw, this.name, realmId) : row.raw;

    return toCredentialRecord(
      {
        realmId: row.realm_id,
        accessToken: row.access_token,
        refreshToken: row.refresh_token,
        tokenType: row.token_type,
        expiresAt: row.expires_at,
        raw,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
      },
      this.name,
      realmId
    );
  }

  /** Close the database connection. */
  close(): void {
    this.db?.close();
    this.db = null;
  }
}
