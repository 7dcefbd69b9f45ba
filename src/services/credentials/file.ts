/**
 * @fileoverview Local JSON file credential backend.
 *
 * Degraded-mode store used when the database is unset or unreachable.
 * All realms share one document: `{ "realms": { "<realmId>": record } }`.
 * Writes go to a temp file that is renamed over the target, so a crash never
 * leaves a truncated document behind.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { BackendUnavailableError, CorruptRecordError, errorMessage } from '../../utils/errors.js';
import { Mutex } from '../../utils/concurrency.js';
import { toCredentialRecord } from './record.js';
import type { CredentialRecord, PersistenceBackend } from './types.js';

type TokenDocument = { realms: Record<string, unknown> };

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class FilePersistenceBackend implements PersistenceBackend {
  readonly name = 'file';
  private readonly mutex = new Mutex();

  /**
   * @param filePath Path to the JSON token document
   */
  constructor(private readonly filePath: string) {}

  private async readDocument(): Promise<TokenDocument> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return { realms: {} };
      }
      throw new BackendUnavailableError(
        this.name,
        `Failed to read token file: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new CorruptRecordError(this.name, undefined, 'Token file is not valid JSON');
    }

    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('realms' in parsed) ||
      typeof parsed.realms !== 'object' ||
      parsed.realms === null ||
      Array.isArray(parsed.realms)
    ) {
      throw new CorruptRecordError(this.name, undefined, 'Token file has no realms map');
    }

    return { realms: Object.fromEntries(Object.entries(parsed.realms)) };
  }

  private async atomicWrite(content: string): Promise<void> {
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmp, content, { encoding: 'utf8', mode: 0o600 });
      await fs.rename(tmp, this.filePath);
    } catch (error) {
      await fs.rm(tmp, { force: true }).catch(() => undefined);
      throw new BackendUnavailableError(
        this.name,
        `Failed to write token file: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async save(record: CredentialRecord): Promise<void> {
    await this.mutex.lock(async () => {
      const document = await this.readDocument();
      document.realms[record.realmId] = record;
      await this.atomicWrite(JSON.stringify(document, null, 2));
    });
  }

  async load(realmId: string): Promise<CredentialRecord | null> {
    return this.mutex.lock(async () => {
      const document = await this.readDocument();
      const stored = document.realms[realmId];
      if (stored === undefined) {
        return null;
      }
      return toCredentialRecord(stored, this.name, realmId);
    });
  }

  async remove(realmId: string): Promise<void> {
    await this.mutex.lock(async () => {
      const document = await this.readDocument();
      if (!(realmId in document.realms)) {
        return;
      }
      delete document.realms[realmId];
      await this.atomicWrite(JSON.stringify(document, null, 2));
    });
  }
}
