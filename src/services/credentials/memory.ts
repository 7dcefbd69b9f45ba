/**
 * @fileoverview In-memory credential backend for testing.
 *
 * Data is lost on process restart. Use only for tests.
 */

import type { CredentialRecord, PersistenceBackend } from './types.js';

/**
 * In-memory credential backend for testing.
 */
export class MemoryPersistenceBackend implements PersistenceBackend {
  readonly name = 'memory';
  private store = new Map<string, CredentialRecord>();

  async save(record: CredentialRecord): Promise<void> {
    this.store.set(record.realmId, structuredClone(record));
  }

  async load(realmId: string): Promise<CredentialRecord | null> {
    const record = this.store.get(realmId);
    return record ? structuredClone(record) : null;
  }

  async remove(realmId: string): Promise<void> {
    this.store.delete(realmId);
  }

  /** Clear all credentials. Useful for test cleanup. */
  clear(): void {
    this.store.clear();
  }
}
