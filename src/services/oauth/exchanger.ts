/**
 * @fileoverview QuickBooks token endpoint exchanges.
 *
 * Two calls: authorization code → token pair, and refresh token → token
 * pair. Stateless: results are returned as new CredentialRecords and
 * persisting them is the caller's job.
 */

import {
  AuthExchangeFailedError,
  RefreshFailedError,
  RefreshTokenInvalidError,
  errorMessage,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type { CredentialRecord } from '../credentials/types.js';
import { FetchTokenTransport } from './transport.js';
import type {
  OAuthClientConfig,
  ParsedTokenResponse,
  TokenTransport,
  TransportResponse,
} from './types.js';

const logger = createLogger({ domain: 'oauth-exchanger' });

/** Lifetime assumed when the token endpoint omits expires_in. */
const DEFAULT_EXPIRES_IN_SECONDS = 3600;
/** Upper bound on expires_in: 36500 days. */
const MAX_EXPIRES_IN_SECONDS = 100 * 365 * 24 * 3600;

/** OAuth error codes that mean the refresh token will never work again. */
const TERMINAL_REFRESH_ERRORS = new Set(['invalid_grant']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Extract the OAuth `error` code from a token endpoint error body.
 */
export function oauthErrorCode(text: string): string | undefined {
  const body = parseJsonObject(text);
  const code = body?.error;
  return typeof code === 'string' ? code : undefined;
}

function parseExpiresIn(value: unknown): number | null {
  if (value === undefined || value === null) return DEFAULT_EXPIRES_IN_SECONDS;
  const seconds = typeof value === 'string' ? Number(value) : value;
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
    return null;
  }
  return Math.min(Math.floor(seconds), MAX_EXPIRES_IN_SECONDS);
}

/**
 * Validate a token endpoint success body.
 * @returns The parsed fields, or a reason string when the body is unusable.
 */
export function parseTokenResponse(text: string): ParsedTokenResponse | string {
  const payload = parseJsonObject(text);
  if (!payload) {
    return 'token response is not a JSON object';
  }

  const accessToken = payload.access_token;
  if (typeof accessToken !== 'string' || accessToken.length === 0) {
    return 'token response has no access_token';
  }

  let refreshToken: string | undefined;
  const rawRefreshToken = payload.refresh_token;
  if (typeof rawRefreshToken === 'string' && rawRefreshToken.length > 0) {
    refreshToken = rawRefreshToken;
  } else if (rawRefreshToken !== undefined && rawRefreshToken !== null) {
    return 'token response has an invalid refresh_token';
  }

  const expiresInSeconds = parseExpiresIn(payload.expires_in);
  if (expiresInSeconds === null) {
    return 'token response has an invalid expires_in';
  }

  const tokenType = typeof payload.token_type === 'string' && payload.token_type ? payload.token_type : 'bearer';

  return { accessToken, refreshToken, tokenType, expiresInSeconds, payload };
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class OAuthExchanger {
  /**
   * @param client Client credentials and token endpoint
   * @param transport HTTP transport (stub it in tests)
   * @param now Clock used to stamp expiry and bookkeeping times
   */
  constructor(
    private readonly client: OAuthClientConfig,
    private readonly transport: TokenTransport = new FetchTokenTransport(),
    private readonly now: () => number = Date.now
  ) {}

  private basicAuth(): string {
    const pair = `${this.client.clientId}:${this.client.clientSecret}`;
    return `Basic ${Buffer.from(pair, 'utf8').toString('base64')}`;
  }

  private post(form: Record<string, string>): Promise<TransportResponse> {
    return this.transport.postForm(
      this.client.tokenUrl,
      form,
      { Authorization: this.basicAuth() },
      this.client.timeoutMs
    );
  }

  private toRecord(realmId: string, parsed: ParsedTokenResponse, refreshToken: string): CredentialRecord {
    const now = this.now();
    return {
      realmId,
      accessToken: parsed.accessToken,
      refreshToken,
      tokenType: parsed.tokenType,
      expiresAt: now + parsed.expiresInSeconds * 1000,
      raw: parsed.payload,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Exchange a one-time authorization code for the realm's first token pair.
   *
   * @throws AuthExchangeFailedError on transport failure, non-2xx status or
   *   a response without both tokens
   */
  async exchangeAuthorizationCode(
    realmId: string,
    code: string,
    redirectUri: string
  ): Promise<CredentialRecord> {
    let response: TransportResponse;
    try {
      response = await this.post({
        grant_type: 'authorization_code',
        code,
        redirect_uri: redirectUri,
      });
    } catch (error) {
      logger.error('auth_code_exchange_transport_failed', { realmId, error: errorMessage(error) });
      throw new AuthExchangeFailedError(`Token exchange request failed: ${errorMessage(error)}`);
    }

    if (!isSuccess(response.status)) {
      logger.error('auth_code_exchange_rejected', {
        realmId,
        status: response.status,
        oauthError: oauthErrorCode(response.text),
      });
      throw new AuthExchangeFailedError(
        `Token exchange failed: ${response.status}`,
        response.status,
        response.text
      );
    }

    const parsed = parseTokenResponse(response.text);
    if (typeof parsed === 'string') {
      throw new AuthExchangeFailedError(`Token exchange failed: ${parsed}`, response.status);
    }
    if (!parsed.refreshToken) {
      throw new AuthExchangeFailedError('Token exchange failed: token response has no refresh_token', response.status);
    }

    logger.info('auth_code_exchanged', { realmId, expiresInSeconds: parsed.expiresInSeconds });
    return this.toRecord(realmId, parsed, parsed.refreshToken);
  }

  /**
   * Trade the record's refresh token for a new token pair. The returned
   * record carries whatever refresh token the server issued; the old one is
   * kept only when the response omits refresh_token.
   *
   * @throws RefreshTokenInvalidError when the server rejects the grant
   * @throws RefreshFailedError on any other failure
   */
  async refresh(record: CredentialRecord): Promise<CredentialRecord> {
    const { realmId } = record;

    let response: TransportResponse;
    try {
      response = await this.post({
        grant_type: 'refresh_token',
        refresh_token: record.refreshToken,
      });
    } catch (error) {
      logger.warn('token_refresh_transport_failed', { realmId, error: errorMessage(error) });
      throw new RefreshFailedError(`Token refresh request failed: ${errorMessage(error)}`);
    }

    if (!isSuccess(response.status)) {
      const oauthError = oauthErrorCode(response.text);
      logger.warn('token_refresh_rejected', { realmId, status: response.status, oauthError });
      if (oauthError && TERMINAL_REFRESH_ERRORS.has(oauthError)) {
        throw new RefreshTokenInvalidError(
          `Refresh token rejected: ${oauthError}`,
          response.status,
          response.text
        );
      }
      throw new RefreshFailedError(`Token refresh failed: ${response.status}`, response.status, response.text);
    }

    const parsed = parseTokenResponse(response.text);
    if (typeof parsed === 'string') {
      throw new RefreshFailedError(`Token refresh failed: ${parsed}`, response.status);
    }

    const rotated = parsed.refreshToken !== undefined && parsed.refreshToken !== record.refreshToken;
    logger.info('token_refreshed', { realmId, rotated, expiresInSeconds: parsed.expiresInSeconds });
    return this.toRecord(realmId, parsed, parsed.refreshToken ?? record.refreshToken);
  }
}
