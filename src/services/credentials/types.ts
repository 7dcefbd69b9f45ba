/**
 * @fileoverview Credential record and persistence backend contract.
 *
 * One active record per QuickBooks realm. Backends store and return plain
 * records; the manager decides when a record is usable.
 */

/**
 * OAuth credential for one realm (QuickBooks company).
 */
export interface CredentialRecord {
  realmId: string;
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiresAt: number; // Unix timestamp in milliseconds
  /** Verbatim token endpoint response. */
  raw: Record<string, unknown>;
  createdAt: number;
  updatedAt: number;
}

/**
 * Interface for credential persistence backends.
 *
 * `save` replaces the active record for `record.realmId` atomically: a
 * concurrent `load` sees either the previous record or the new one.
 * Backends throw BackendUnavailableError when they cannot be reached and
 * CorruptRecordError when stored data does not parse.
 */
export interface PersistenceBackend {
  /** Short backend name used in logs and errors. */
  readonly name: string;

  /**
   * Store the record as the active one for its realm.
   * Overwrites any existing record for that realm.
   */
  save(record: CredentialRecord): Promise<void>;

  /**
   * Load the active record for a realm.
   * @returns The record, or null if the realm has never been connected.
   */
  load(realmId: string): Promise<CredentialRecord | null>;

  /** Drop the realm's record. A realm with no record is left as is. */
  remove?(realmId: string): Promise<void>;

  /** Release any handles held by the backend. */
  close?(): void | Promise<void>;
}
