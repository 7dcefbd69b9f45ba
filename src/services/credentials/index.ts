/**
 * @fileoverview Credential persistence factory.
 *
 * Returns the appropriate backend based on configuration.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config, { type CredentialStoreProvider } from '../../config.js';
import { createLogger } from '../../utils/observability/index.js';
import type { PersistenceBackend } from './types.js';
import { SqlitePersistenceBackend } from './sqlite.js';
import { FilePersistenceBackend } from './file.js';
import { MemoryPersistenceBackend } from './memory.js';
import { FallbackPersistenceBackend } from './fallback.js';
import { CredentialManager } from './manager.js';
import { OAuthExchanger } from '../oauth/exchanger.js';

export type { CredentialRecord, PersistenceBackend } from './types.js';
export type { CredentialState, CredentialStatus } from './manager.js';
export { CredentialManager } from './manager.js';

const logger = createLogger({ domain: 'credential-store' });

let instance: PersistenceBackend | null = null;
let manager: CredentialManager | null = null;

function isStoreProvider(value: string): value is CredentialStoreProvider {
  return value === 'sqlite' || value === 'file' || value === 'memory';
}

function createBackend(provider: CredentialStoreProvider): PersistenceBackend {
  const { databasePath, tokenFile, storageTimeoutMs } = config.credentials;

  switch (provider) {
    case 'sqlite': {
      const file = new FilePersistenceBackend(tokenFile);
      if (!databasePath) {
        logger.warn('credential_store_file_only', {
          reason: 'DATABASE_PATH not set',
          fileStorePath: tokenFile,
        });
        return new FallbackPersistenceBackend(file, null, storageTimeoutMs);
      }
      return new FallbackPersistenceBackend(
        new SqlitePersistenceBackend(databasePath),
        file,
        storageTimeoutMs
      );
    }
    case 'file':
      return new FallbackPersistenceBackend(
        new FilePersistenceBackend(tokenFile),
        null,
        storageTimeoutMs
      );
    case 'memory':
      return new MemoryPersistenceBackend();
  }
}

/**
 * Get the persistence backend instance.
 *
 * Returns a singleton based on CREDENTIAL_STORE_PROVIDER config:
 * - 'sqlite': database at DATABASE_PATH with the token file as fallback
 *   (default; file only when DATABASE_PATH is unset)
 * - 'file': token file only
 * - 'memory': In-memory store (for tests only)
 */
export function getPersistenceBackend(): PersistenceBackend {
  if (instance) {
    return instance;
  }

  const provider = config.credentials.provider;
  if (!isStoreProvider(provider)) {
    throw new Error(
      `Invalid CREDENTIAL_STORE_PROVIDER: ${provider}. Expected 'sqlite', 'file' or 'memory'.`
    );
  }

  instance = createBackend(provider);
  return instance;
}

/**
 * Close and reset the backend instance.
 * Useful for tests to get a fresh store.
 */
export async function resetPersistenceBackend(): Promise<void> {
  const current = instance;
  instance = null;
  manager = null;
  await current?.close?.();
}

/**
 * Get the credential manager instance, wired to the configured backend and
 * the QuickBooks token endpoint.
 */
export function getCredentialManager(): CredentialManager {
  if (manager) {
    return manager;
  }

  const { clientId, clientSecret, tokenUrl } = config.qbo;
  if (!clientId || !clientSecret) {
    throw new Error('QBO_CLIENT_ID and QBO_CLIENT_SECRET are required for the credential manager');
  }

  const exchanger = new OAuthExchanger({
    clientId,
    clientSecret,
    tokenUrl,
    timeoutMs: config.tokens.httpTimeoutMs,
  });

  manager = new CredentialManager(getPersistenceBackend(), exchanger, {
    skewMs: config.tokens.refreshSkewSeconds * 1000,
    retryBackoffMs: config.tokens.refreshRetryBackoffMs,
  });
  return manager;
}

/**
 * Replace the manager instance (tests inject stubbed collaborators).
 */
export function setCredentialManager(next: CredentialManager | null): void {
  manager = next;
}
