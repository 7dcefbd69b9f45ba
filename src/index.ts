/**
 * @fileoverview Express server entry point for the QuickBooks connector.
 *
 * Bootstraps the Express application, mounts the OAuth routes, and closes
 * the credential store on shutdown.
 */

import express from 'express';
import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();
import authRouter from './routes/auth.js';
import { healthHandler } from './routes/health.js';
import { requestContext } from './middleware/request-context.js';
import { getCredentialManager, resetPersistenceBackend } from './services/credentials/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';
import { errorMessage } from './utils/errors.js';

initObservability();

const logger = createLogger({ domain: 'server' });

// Build the manager eagerly so storage misconfiguration shows at startup
getCredentialManager();

const app = express();

app.use(requestContext);

// Health check endpoint
app.get('/health', healthHandler);

// OAuth routes
app.use(authRouter);

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
  });

  // Presence of critical settings only, never values
  logger.info('config_check', {
    hasClientCredentials: !!(config.qbo.clientId && config.qbo.clientSecret),
    redirectUri: config.qbo.redirectUri,
    hasDefaultRealm: !!config.qbo.defaultRealmId,
    storeProvider: config.credentials.provider,
    hasDatabase: !!config.credentials.databasePath,
    fileStorePath: config.credentials.tokenFile,
    refreshSkewSeconds: config.tokens.refreshSkewSeconds,
  });
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  try {
    await resetPersistenceBackend();
  } catch (error) {
    logger.error('credential_store_close_failed', { error: errorMessage(error) });
  }

  const forceExitTimer = setTimeout(() => {
    logger.warn('force_exit_after_timeout');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
