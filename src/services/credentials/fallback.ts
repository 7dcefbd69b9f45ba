/**
 * @fileoverview Primary-with-fallback credential backend.
 *
 * Every call goes to the primary (database) backend first. When it reports
 * BackendUnavailableError or times out, the call is repeated against the
 * fallback (file) backend and a degraded-mode warning is logged. Callers see
 * the same contract either way. Without a fallback, an unavailable primary
 * is reported as StorageUnavailableError straight away.
 *
 * A record written to the fallback during an outage is newer than the row the
 * primary still holds. Loads compare the two and move the newer fallback
 * record back into the primary before returning it.
 */

import {
  BackendUnavailableError,
  CorruptRecordError,
  OperationTimeoutError,
  StorageUnavailableError,
  errorMessage,
  withTimeout,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type { CredentialRecord, PersistenceBackend } from './types.js';

const logger = createLogger({ domain: 'credential-store' });

function isUnavailable(error: unknown): boolean {
  return error instanceof BackendUnavailableError || error instanceof OperationTimeoutError;
}

export class FallbackPersistenceBackend implements PersistenceBackend {
  readonly name: string;

  /**
   * @param primary Authoritative backend
   * @param fallback Backend used while the primary is unavailable
   * @param timeoutMs Bound applied to each backend call
   */
  constructor(
    private readonly primary: PersistenceBackend,
    private readonly fallback: PersistenceBackend | null,
    private readonly timeoutMs: number
  ) {
    this.name = fallback ? `${primary.name}+${fallback.name}` : primary.name;
  }

  private bounded<T>(backend: PersistenceBackend, operation: string, call: Promise<T>): Promise<T> {
    return withTimeout(call, this.timeoutMs, `${backend.name}.${operation}`);
  }

  private unavailable(
    operation: string,
    realmId: string,
    primaryError: unknown,
    fallbackError?: unknown
  ): StorageUnavailableError {
    logger.error('credential_store_unavailable', {
      operation,
      realmId,
      error: errorMessage(fallbackError ?? primaryError),
    });
    return new StorageUnavailableError(`No credential backend available for ${operation}`, {
      realmId,
      primaryError: errorMessage(primaryError),
      fallbackError: fallbackError === undefined ? undefined : errorMessage(fallbackError),
    });
  }

  /** Repeat a call on the fallback once the primary has reported itself unavailable. */
  private async degraded<T>(
    operation: 'save' | 'load',
    realmId: string,
    primaryError: unknown,
    call: (backend: PersistenceBackend) => Promise<T>
  ): Promise<T> {
    const fallback = this.fallback;
    if (!fallback) {
      throw this.unavailable(operation, realmId, primaryError);
    }

    logger.warn('credential_store_degraded', {
      operation,
      realmId,
      primary: this.primary.name,
      fallback: fallback.name,
      error: errorMessage(primaryError),
    });

    try {
      return await this.bounded(fallback, operation, call(fallback));
    } catch (error) {
      if (!isUnavailable(error)) {
        throw error;
      }
      throw this.unavailable(operation, realmId, primaryError, error);
    }
  }

  async save(record: CredentialRecord): Promise<void> {
    try {
      await this.bounded(this.primary, 'save', this.primary.save(record));
    } catch (error) {
      if (!isUnavailable(error)) {
        throw error;
      }
      await this.degraded('save', record.realmId, error, (backend) => backend.save(record));
    }
  }

  async load(realmId: string): Promise<CredentialRecord | null> {
    let stored: CredentialRecord | null;
    try {
      stored = await this.bounded(this.primary, 'load', this.primary.load(realmId));
    } catch (error) {
      if (!isUnavailable(error)) {
        throw error;
      }
      return this.degraded('load', realmId, error, (backend) => backend.load(realmId));
    }

    return this.fallback ? this.reconcile(realmId, stored, this.fallback) : stored;
  }

  /**
   * Return whichever of the primary and fallback records was updated last.
   * A newer fallback record is written to the primary and then dropped from
   * the fallback. While the primary refuses the write it stays where it is.
   */
  private async reconcile(
    realmId: string,
    stored: CredentialRecord | null,
    fallback: PersistenceBackend
  ): Promise<CredentialRecord | null> {
    let pending: CredentialRecord | null;
    try {
      pending = await this.bounded(fallback, 'load', fallback.load(realmId));
    } catch (error) {
      if (!isUnavailable(error) && !(error instanceof CorruptRecordError)) {
        throw error;
      }
      logger.warn('credential_store_reconcile_skipped', {
        realmId,
        fallback: fallback.name,
        error: errorMessage(error),
      });
      return stored;
    }

    if (!pending || (stored && pending.updatedAt <= stored.updatedAt)) {
      return stored;
    }

    try {
      await this.bounded(this.primary, 'save', this.primary.save(pending));
    } catch (error) {
      if (!isUnavailable(error)) {
        throw error;
      }
      logger.warn('credential_store_degraded', {
        operation: 'reconcile',
        realmId,
        primary: this.primary.name,
        fallback: fallback.name,
        error: errorMessage(error),
      });
      return pending;
    }

    logger.info('credential_store_reconciled', {
      realmId,
      primary: this.primary.name,
      fallback: fallback.name,
    });

    if (fallback.remove) {
      try {
        await this.bounded(fallback, 'remove', fallback.remove(realmId));
      } catch (error) {
        if (!isUnavailable(error)) {
          throw error;
        }
        // The primary copy is now as new, so a leftover entry is never preferred.
        logger.warn('credential_store_cleanup_failed', {
          realmId,
          fallback: fallback.name,
          error: errorMessage(error),
        });
      }
    }

    return pending;
  }

  async close(): Promise<void> {
    await this.primary.close?.();
    await this.fallback?.close?.();
  }
}
