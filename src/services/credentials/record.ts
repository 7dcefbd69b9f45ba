/**
 * @fileoverview Parsing of stored credential payloads.
 *
 * Both the SQLite rows and the JSON file hold the same fields; anything that
 * does not yield a complete record is reported as CorruptRecordError.
 */

import { CorruptRecordError } from '../../utils/errors.js';
import type { CredentialRecord } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(
  source: Record<string, unknown>,
  field: string,
  backend: string,
  realmId: string | undefined
): string {
  const value = source[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new CorruptRecordError(backend, realmId, `Stored credential has invalid ${field}`);
  }
  return value;
}

function requireTimestamp(
  source: Record<string, unknown>,
  field: string,
  backend: string,
  realmId: string | undefined
): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new CorruptRecordError(backend, realmId, `Stored credential has invalid ${field}`);
  }
  return value;
}

/**
 * Parse a JSON string into a raw payload object.
 */
export function parseRawPayload(
  text: string,
  backend: string,
  realmId: string | undefined
): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new CorruptRecordError(backend, realmId, 'Stored raw payload is not valid JSON');
  }
  if (!isPlainObject(parsed)) {
    throw new CorruptRecordError(backend, realmId, 'Stored raw payload is not an object');
  }
  return parsed;
}

/**
 * Validate an unknown value as a CredentialRecord.
 * @throws CorruptRecordError if any field is missing or has the wrong type
 */
export function toCredentialRecord(
  value: unknown,
  backend: string,
  expectedRealmId?: string
): CredentialRecord {
  if (!isPlainObject(value)) {
    throw new CorruptRecordError(backend, expectedRealmId, 'Stored credential is not an object');
  }

  const realmId = requireString(value, 'realmId', backend, expectedRealmId);
  if (expectedRealmId !== undefined && realmId !== expectedRealmId) {
    throw new CorruptRecordError(backend, expectedRealmId, 'Stored credential belongs to another realm');
  }

  const raw = value.raw;
  if (!isPlainObject(raw)) {
    throw new CorruptRecordError(backend, realmId, 'Stored credential has invalid raw');
  }

  return {
    realmId,
    accessToken: requireString(value, 'accessToken', backend, realmId),
    refreshToken: requireString(value, 'refreshToken', backend, realmId),
    tokenType: requireString(value, 'tokenType', backend, realmId),
    expiresAt: requireTimestamp(value, 'expiresAt', backend, realmId),
    raw,
    createdAt: requireTimestamp(value, 'createdAt', backend, realmId),
    updatedAt: requireTimestamp(value, 'updatedAt', backend, realmId),
  };
}
