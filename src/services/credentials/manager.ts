/**
 * @fileoverview Credential lifecycle manager.
 *
 * Owns the per-realm state machine:
 *
 *   unauthorized ──completeAuthorization──▶ valid
 *   valid ──(now ≥ expiresAt − skew)──▶ expiring
 *   expiring ──getAccessToken──▶ refresh_in_flight ──▶ valid | expiring | invalid
 *   invalid ──completeAuthorization──▶ valid
 *
 * Refresh is synchronous and caller-triggered: getAccessToken refreshes on
 * demand, there is no background timer. Concurrent callers for one realm share
 * a single resolution (load, decide, refresh, persist), so the upstream never
 * sees two refreshes with the same refresh token from this process.
 */

import {
  BackendUnavailableError,
  OperationTimeoutError,
  ReauthorizationRequiredError,
  RefreshFailedError,
  RefreshTokenInvalidError,
  StorageUnavailableError,
  errorMessage,
} from '../../utils/errors.js';
import { KeyedMutex, SingleFlight } from '../../utils/concurrency.js';
import { createLogger, withRealmContext } from '../../utils/observability/index.js';
import type { CredentialRecord, PersistenceBackend } from './types.js';

const logger = createLogger({ domain: 'credential-manager' });

export const DEFAULT_REFRESH_SKEW_MS = 60 * 1000;
export const DEFAULT_RETRY_BACKOFF_MS = 500;

export type CredentialState =
  | 'unauthorized'
  | 'valid'
  | 'expiring'
  | 'refresh_in_flight'
  | 'invalid';

/** Diagnostic view of a realm. Never carries token values. */
export interface CredentialStatus {
  realmId: string;
  state: CredentialState;
  expiresAt?: string;
}

/** The two token endpoint calls the manager depends on. */
export interface TokenExchanger {
  exchangeAuthorizationCode(
    realmId: string,
    code: string,
    redirectUri: string
  ): Promise<CredentialRecord>;
  refresh(record: CredentialRecord): Promise<CredentialRecord>;
}

export interface CredentialManagerOptions {
  /** Refresh this long before the reported expiry. */
  skewMs?: number;
  /** Wait before the single retry of a transient failure. */
  retryBackoffMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isStorageTransient(error: unknown): boolean {
  return error instanceof StorageUnavailableError;
}

/**
 * Report a backend that is down or too slow as StorageUnavailableError.
 * Time bounds belong to the store, which falls back before giving up.
 */
async function storageCall<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof BackendUnavailableError || error instanceof OperationTimeoutError) {
      throw new StorageUnavailableError(`Credential store unavailable: ${error.message}`, {
        errorCode: error.code,
      });
    }
    throw error;
  }
}

/** ISO time for logs and status; undefined when the instant is out of Date range. */
function toIsoTime(ms: number): string | undefined {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

export class CredentialManager {
  private readonly skewMs: number;
  private readonly retryBackoffMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly invalidRealms = new Set<string>();
  private readonly refreshing = new Set<string>();
  /** Records obtained upstream whose save has not succeeded yet. */
  private readonly unsaved = new Map<string, CredentialRecord>();
  private readonly resolutions = new SingleFlight<string>();
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly persistence: PersistenceBackend,
    private readonly exchanger: TokenExchanger,
    options: CredentialManagerOptions = {}
  ) {
    this.skewMs = options.skewMs ?? DEFAULT_REFRESH_SKEW_MS;
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Exchange an authorization code and store the resulting credential as the
   * realm's active record. Clears a previous `invalid` state.
   *
   * @throws AuthExchangeFailedError if the code is rejected; nothing is stored
   * @throws StorageUnavailableError if the record could not be saved (it is
   *   kept in memory and saved on the next call)
   */
  async completeAuthorization(realmId: string, code: string, redirectUri: string): Promise<void> {
    await withRealmContext(realmId, 'completeAuthorization', () =>
      this.locks.lock(realmId, async () => {
        const record = await this.exchanger.exchangeAuthorizationCode(realmId, code, redirectUri);

        this.invalidRealms.delete(realmId);
        await this.persist(record);

        logger.info('authorization_completed', { expiresAt: toIsoTime(record.expiresAt) });
      })
    );
  }

  /**
   * Return a usable access token for the realm, refreshing first when it is
   * within the skew window of its expiry.
   *
   * @throws ReauthorizationRequiredError if the realm was never connected or
   *   its refresh token was rejected
   * @throws RefreshFailedError if refresh failed twice
   * @throws StorageUnavailableError if the record could not be loaded
   */
  async getAccessToken(realmId: string): Promise<string> {
    if (this.invalidRealms.has(realmId)) {
      throw new ReauthorizationRequiredError(realmId, 'refresh_token_invalid');
    }

    return this.resolutions.run(realmId, () =>
      withRealmContext(realmId, 'getAccessToken', () =>
        this.locks.lock(realmId, () => this.resolve(realmId))
      )
    );
  }

  /**
   * Report the realm's state for diagnostics.
   */
  async getState(realmId: string): Promise<CredentialStatus> {
    if (this.invalidRealms.has(realmId)) {
      return { realmId, state: 'invalid' };
    }

    const record = this.unsaved.get(realmId) ?? (await this.load(realmId));
    if (!record) {
      return { realmId, state: 'unauthorized' };
    }

    const expiresAt = toIsoTime(record.expiresAt);
    if (this.refreshing.has(realmId)) {
      return { realmId, state: 'refresh_in_flight', expiresAt };
    }
    return { realmId, state: this.isFresh(record) ? 'valid' : 'expiring', expiresAt };
  }

  private isFresh(record: CredentialRecord): boolean {
    return this.now() < record.expiresAt - this.skewMs;
  }

  private async resolve(realmId: string): Promise<string> {
    if (this.invalidRealms.has(realmId)) {
      throw new ReauthorizationRequiredError(realmId, 'refresh_token_invalid');
    }

    const record = await this.currentRecord(realmId);
    if (!record) {
      throw new ReauthorizationRequiredError(realmId, 'not_connected');
    }

    if (this.isFresh(record)) {
      return record.accessToken;
    }

    logger.info('token_refresh_started', { expiresAt: toIsoTime(record.expiresAt) });

    let refreshed: CredentialRecord;
    this.refreshing.add(realmId);
    try {
      refreshed = await this.retryOnce(
        () => this.exchanger.refresh(record),
        (error) => error instanceof RefreshFailedError,
        'token_refresh'
      );
    } catch (error) {
      if (error instanceof RefreshTokenInvalidError) {
        this.invalidRealms.add(realmId);
        this.unsaved.delete(realmId);
        logger.error('refresh_token_invalid', { errorCode: error.code, status: error.status });
        throw new ReauthorizationRequiredError(realmId, 'refresh_token_invalid');
      }
      logger.error('token_refresh_failed', {
        errorCode: error instanceof RefreshFailedError ? error.code : undefined,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      this.refreshing.delete(realmId);
    }

    try {
      await this.persist(refreshed);
    } catch (error) {
      if (!isStorageTransient(error)) {
        throw error;
      }
      // The rotated pair stays in `unsaved` and is written on the next call.
      logger.error('credential_persist_deferred', { error: errorMessage(error) });
    }

    return refreshed.accessToken;
  }

  /**
   * The record to act on: an unsaved one first (retrying its save), else the
   * stored one.
   */
  private async currentRecord(realmId: string): Promise<CredentialRecord | null> {
    const pending = this.unsaved.get(realmId);
    if (!pending) {
      return this.load(realmId);
    }

    try {
      await storageCall(() => this.persistence.save(pending));
      this.unsaved.delete(realmId);
      logger.info('credential_persist_recovered');
    } catch (error) {
      if (!isStorageTransient(error)) {
        throw error;
      }
      logger.warn('credential_persist_pending', { error: errorMessage(error) });
    }
    return pending;
  }

  private load(realmId: string): Promise<CredentialRecord | null> {
    return this.retryOnce(
      () => storageCall(() => this.persistence.load(realmId)),
      isStorageTransient,
      'credential_load'
    );
  }

  /**
   * Save a record. On failure the record is held in memory so the refresh
   * token it carries is not lost.
   */
  private async persist(record: CredentialRecord): Promise<void> {
    try {
      await this.retryOnce(
        () => storageCall(() => this.persistence.save(record)),
        isStorageTransient,
        'credential_save'
      );
      this.unsaved.delete(record.realmId);
    } catch (error) {
      this.unsaved.set(record.realmId, record);
      throw error;
    }
  }

  private async retryOnce<T>(
    fn: () => Promise<T>,
    isTransient: (error: unknown) => boolean,
    operation: string
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!isTransient(error)) {
        throw error;
      }
      logger.warn('operation_retrying', {
        operation,
        retryInMs: this.retryBackoffMs,
        error: errorMessage(error),
      });
      await this.sleep(this.retryBackoffMs);
      return fn();
    }
  }
}
