/**
 * Unit tests for FallbackPersistenceBackend.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FallbackPersistenceBackend } from '../../../src/services/credentials/fallback.js';
import { FilePersistenceBackend } from '../../../src/services/credentials/file.js';
import { MemoryPersistenceBackend } from '../../../src/services/credentials/memory.js';
import type { CredentialRecord, PersistenceBackend } from '../../../src/services/credentials/types.js';
import {
  BackendUnavailableError,
  CorruptRecordError,
  StorageUnavailableError,
} from '../../../src/utils/errors.js';
import { BASE_TIME, makeRecord } from '../../fixtures/credentials.js';

class DownBackend implements PersistenceBackend {
  readonly name = 'sqlite';
  calls = 0;

  async save(_record: CredentialRecord): Promise<void> {
    this.calls++;
    throw new BackendUnavailableError('sqlite', 'connection refused');
  }

  async load(_realmId: string): Promise<CredentialRecord | null> {
    this.calls++;
    throw new BackendUnavailableError('sqlite', 'connection refused');
  }
}

class CorruptBackend implements PersistenceBackend {
  readonly name = 'sqlite';

  async save(_record: CredentialRecord): Promise<void> {}

  async load(realmId: string): Promise<CredentialRecord | null> {
    throw new CorruptRecordError('sqlite', realmId, 'Stored raw payload is not valid JSON');
  }
}

/** Memory backend that serves loads but refuses writes. */
class ReadOnlyBackend implements PersistenceBackend {
  readonly name = 'sqlite';
  readonly inner = new MemoryPersistenceBackend();

  async save(_record: CredentialRecord): Promise<void> {
    throw new BackendUnavailableError('sqlite', 'database is locked');
  }

  load(realmId: string): Promise<CredentialRecord | null> {
    return this.inner.load(realmId);
  }
}

class HangingBackend implements PersistenceBackend {
  readonly name = 'sqlite';

  save(_record: CredentialRecord): Promise<void> {
    return new Promise(() => {});
  }

  load(_realmId: string): Promise<CredentialRecord | null> {
    return new Promise(() => {});
  }
}

describe('FallbackPersistenceBackend', () => {
  let tempDir: string;
  let file: FilePersistenceBackend;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'qbo-fallback-'));
    file = new FilePersistenceBackend(path.join(tempDir, 'tokens.json'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('names itself after both backends', () => {
    expect(new FallbackPersistenceBackend(new DownBackend(), file, 1000).name).toBe('sqlite+file');
    expect(new FallbackPersistenceBackend(file, null, 1000).name).toBe('file');
  });

  it('uses the primary while it is available', async () => {
    const primary = new MemoryPersistenceBackend();
    const store = new FallbackPersistenceBackend(primary, file, 1000);

    await store.save(makeRecord());

    expect(await primary.load('realm-1')).toEqual(makeRecord());
    expect(await file.load('realm-1')).toBeNull();
  });

  it('round-trips through the file when the primary is down', async () => {
    const primary = new DownBackend();
    const store = new FallbackPersistenceBackend(primary, file, 1000);

    await store.save(makeRecord({ refreshToken: 'refresh-2' }));
    const loaded = await store.load('realm-1');

    expect(loaded?.refreshToken).toBe('refresh-2');
    expect(primary.calls).toBe(2);
  });

  it('throws StorageUnavailableError when both backends are down', async () => {
    const store = new FallbackPersistenceBackend(new DownBackend(), new DownBackend(), 1000);

    await expect(store.load('realm-1')).rejects.toThrow('No credential backend available for load');
    await expect(store.save(makeRecord())).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it('throws StorageUnavailableError when the primary is down and there is no fallback', async () => {
    const store = new FallbackPersistenceBackend(new DownBackend(), null, 1000);

    await expect(store.save(makeRecord())).rejects.toThrow('No credential backend available for save');
  });

  it('propagates corrupt records instead of falling back', async () => {
    await file.save(makeRecord());
    const store = new FallbackPersistenceBackend(new CorruptBackend(), file, 1000);

    await expect(store.load('realm-1')).rejects.toBeInstanceOf(CorruptRecordError);
  });

  it('treats a primary that does not answer in time as unavailable', async () => {
    await file.save(makeRecord({ accessToken: 'from-file' }));
    const store = new FallbackPersistenceBackend(new HangingBackend(), file, 20);

    const loaded = await store.load('realm-1');

    expect(loaded?.accessToken).toBe('from-file');
  });

  describe('after an outage', () => {
    const rotated = makeRecord({
      accessToken: 'access-2',
      refreshToken: 'refresh-2',
      updatedAt: BASE_TIME + 3600 * 1000,
    });

    it('moves a newer file record back into the primary', async () => {
      const primary = new MemoryPersistenceBackend();
      await primary.save(makeRecord());
      await file.save(rotated);
      const store = new FallbackPersistenceBackend(primary, file, 1000);

      const loaded = await store.load('realm-1');

      expect(loaded).toEqual(rotated);
      expect(await primary.load('realm-1')).toEqual(rotated);
      expect(await file.load('realm-1')).toBeNull();
    });

    it('moves a file record for a realm the primary has never seen', async () => {
      const primary = new MemoryPersistenceBackend();
      await file.save(rotated);
      const store = new FallbackPersistenceBackend(primary, file, 1000);

      expect(await store.load('realm-1')).toEqual(rotated);
      expect(await primary.load('realm-1')).toEqual(rotated);
    });

    it('keeps the primary record when the file one is not newer', async () => {
      const primary = new MemoryPersistenceBackend();
      await primary.save(rotated);
      await file.save(makeRecord());
      const store = new FallbackPersistenceBackend(primary, file, 1000);

      expect(await store.load('realm-1')).toEqual(rotated);
      expect(await file.load('realm-1')).toEqual(makeRecord());
    });

    it('serves the file record and keeps it while the primary refuses writes', async () => {
      const primary = new ReadOnlyBackend();
      await primary.inner.save(makeRecord());
      await file.save(rotated);
      const store = new FallbackPersistenceBackend(primary, file, 1000);

      expect(await store.load('realm-1')).toEqual(rotated);
      expect(await primary.inner.load('realm-1')).toEqual(makeRecord());
      expect(await file.load('realm-1')).toEqual(rotated);
    });

    it('serves the primary record when the token file is unreadable', async () => {
      const primary = new MemoryPersistenceBackend();
      await primary.save(makeRecord());
      fs.writeFileSync(path.join(tempDir, 'tokens.json'), '{not json');
      const store = new FallbackPersistenceBackend(primary, file, 1000);

      expect(await store.load('realm-1')).toEqual(makeRecord());
    });
  });
});
