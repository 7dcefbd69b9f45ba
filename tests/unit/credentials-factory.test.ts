import { afterEach, describe, expect, it, vi } from 'vitest';

function mockConfig(credentials: Record<string, unknown>): void {
  vi.doMock('../../src/config.js', () => ({
    default: {
      logLevel: 'error',
      qbo: {
        clientId: 'test-client-id',
        clientSecret: 'test-client-secret',
        tokenUrl: 'https://oauth.example.test/tokens/bearer',
      },
      credentials: {
        tokenFile: './data/test-tokens.json',
        storageTimeoutMs: 1000,
        ...credentials,
      },
      tokens: {
        refreshSkewSeconds: 60,
        httpTimeoutMs: 15000,
        refreshRetryBackoffMs: 500,
      },
    },
  }));
}

describe('Credential Store Factory', () => {
  afterEach(() => {
    vi.doUnmock('../../src/config.js');
  });

  it('throws for invalid CREDENTIAL_STORE_PROVIDER values', async () => {
    vi.resetModules();
    mockConfig({ provider: 'invalid-provider' });

    const { getPersistenceBackend } = await import('../../src/services/credentials/index.js');

    expect(() => getPersistenceBackend()).toThrow(
      "Invalid CREDENTIAL_STORE_PROVIDER: invalid-provider. Expected 'sqlite', 'file' or 'memory'."
    );
  });

  it('falls back to the token file alone when DATABASE_PATH is unset', async () => {
    vi.resetModules();
    mockConfig({ provider: 'sqlite', databasePath: undefined });

    const { getPersistenceBackend } = await import('../../src/services/credentials/index.js');

    expect(getPersistenceBackend().name).toBe('file');
  });

  it('pairs the database with the token file when DATABASE_PATH is set', async () => {
    vi.resetModules();
    mockConfig({ provider: 'sqlite', databasePath: './data/test-tokens.db' });

    const { getPersistenceBackend } = await import('../../src/services/credentials/index.js');

    expect(getPersistenceBackend().name).toBe('sqlite+file');
  });

  it('returns the same backend and manager on repeated calls', async () => {
    vi.resetModules();
    mockConfig({ provider: 'memory' });

    const { getPersistenceBackend, getCredentialManager, resetPersistenceBackend } = await import(
      '../../src/services/credentials/index.js'
    );

    expect(getPersistenceBackend().name).toBe('memory');
    expect(getPersistenceBackend()).toBe(getPersistenceBackend());
    const manager = getCredentialManager();
    expect(getCredentialManager()).toBe(manager);

    await resetPersistenceBackend();
    expect(getCredentialManager()).not.toBe(manager);
  });
});
