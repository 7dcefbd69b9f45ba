/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the connector requires.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';
import { LOG_LEVELS, isLogLevel } from './utils/observability/types.js';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Return a path that differs between dev and production. */
function dataPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

export type CredentialStoreProvider = 'sqlite' | 'file' | 'memory';

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 5000),
  nodeEnv: optional('NODE_ENV', 'development'),
  logLevel: optional('LOG_LEVEL', 'info').toLowerCase(),

  /** Where the browser lands after a successful connect. */
  frontendUrl: optional('FRONTEND_URL', 'http://localhost:5173'),

  /** QuickBooks Online OAuth configuration */
  qbo: {
    clientId: required('QBO_CLIENT_ID'),
    clientSecret: required('QBO_CLIENT_SECRET'),
    redirectUri: optional('QBO_REDIRECT_URI', 'http://localhost:5000/callback'),
    defaultRealmId: process.env.QBO_REALM_ID,
    authUrl: optional('QBO_AUTH_URL', 'https://appcenter.intuit.com/connect/oauth2'),
    tokenUrl: optional('QBO_TOKEN_URL', 'https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer'),
    scope: optional(
      'QBO_SCOPE',
      'com.intuit.quickbooks.accounting openid profile email phone address'
    ),
  },

  /** Credential storage configuration */
  credentials: {
    provider: optional('CREDENTIAL_STORE_PROVIDER', 'sqlite'),
    /** Relational store; leave unset to run on the file store only. */
    databasePath: process.env.DATABASE_PATH,
    tokenFile: dataPath('TOKEN_FILE', '/app/data/tokens.json', './data/tokens.json'),
    storageTimeoutMs: optionalInt('STORAGE_TIMEOUT_MS', 5000),
  },

  /** Token lifecycle tuning */
  tokens: {
    refreshSkewSeconds: optionalInt('TOKEN_REFRESH_SKEW_SECONDS', 60),
    httpTimeoutMs: optionalInt('TOKEN_HTTP_TIMEOUT_MS', 15000),
    refreshRetryBackoffMs: optionalInt('REFRESH_RETRY_BACKOFF_MS', 500),
  },
};

const STORE_PROVIDERS: readonly string[] = ['sqlite', 'file', 'memory'];

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // QuickBooks OAuth client
  if (!config.qbo.clientId) errors.push('QBO_CLIENT_ID is required');
  if (!config.qbo.clientSecret) errors.push('QBO_CLIENT_SECRET is required');

  if (!STORE_PROVIDERS.includes(config.credentials.provider)) {
    errors.push(
      `CREDENTIAL_STORE_PROVIDER must be one of ${STORE_PROVIDERS.join(', ')}, got ${config.credentials.provider}`
    );
  }
  if (!isLogLevel(config.logLevel)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got ${config.logLevel}`);
  }

  // Numeric bounds
  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  const skew = config.tokens.refreshSkewSeconds;
  if (Number.isNaN(skew) || skew < 30 || skew > 120) {
    errors.push(`TOKEN_REFRESH_SKEW_SECONDS must be 30-120, got ${skew}`);
  }
  if (!(config.tokens.httpTimeoutMs >= 1000)) {
    errors.push(`TOKEN_HTTP_TIMEOUT_MS must be >= 1000, got ${config.tokens.httpTimeoutMs}`);
  }
  if (!(config.credentials.storageTimeoutMs >= 100)) {
    errors.push(`STORAGE_TIMEOUT_MS must be >= 100, got ${config.credentials.storageTimeoutMs}`);
  }
  if (!(config.tokens.refreshRetryBackoffMs >= 0)) {
    errors.push(`REFRESH_RETRY_BACKOFF_MS must be >= 0, got ${config.tokens.refreshRetryBackoffMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
