/**
 * @fileoverview QuickBooks OAuth routes.
 *
 * Flow:
 * 1. Front-end sends the user to /connect
 * 2. We register a one-time state and redirect to the Intuit consent screen
 * 3. Intuit redirects back to /callback with code, state and realmId
 * 4. We exchange the code, store the credential, and send the user back to
 *    the front-end with ?connected=true
 */

import { Router, type Request, type Response } from 'express';
import config from '../config.js';
import { getCredentialManager } from '../services/credentials/index.js';
import { buildAuthorizeUrl } from '../services/oauth/authorize.js';
import { getOAuthStateStore } from '../services/oauth/state-nonce.js';
import {
  AppError,
  AuthExchangeFailedError,
  OperationTimeoutError,
  StorageUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const router = Router();
const logger = createLogger({ domain: 'auth-routes' });

/** First string value of a query parameter. */
function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0].trim() || undefined;
  return undefined;
}

function realmFromQuery(req: Request): string | undefined {
  return queryString(req.query.realmId) ?? config.qbo.defaultRealmId;
}

/**
 * GET /connect
 * Redirects to the QuickBooks consent screen.
 */
router.get('/connect', (_req: Request, res: Response) => {
  if (!config.qbo.clientId || !config.qbo.redirectUri) {
    res.status(500).send(errorHtml('Missing QBO_CLIENT_ID or QBO_REDIRECT_URI'));
    return;
  }

  const state = getOAuthStateStore().issue();
  const url = buildAuthorizeUrl({
    authUrl: config.qbo.authUrl,
    clientId: config.qbo.clientId,
    redirectUri: config.qbo.redirectUri,
    scope: config.qbo.scope,
    state,
  });

  res.redirect(url);
});

/**
 * GET /callback
 * Handles the OAuth redirect from QuickBooks.
 */
router.get('/callback', async (req: Request, res: Response) => {
  const error = queryString(req.query.error);
  if (error) {
    logger.info('oauth_declined', { oauthError: error });
    res.status(400).send(errorHtml(`OAuth error: ${error}`));
    return;
  }

  const code = queryString(req.query.code);
  if (!code) {
    res.status(400).send(errorHtml('Missing code'));
    return;
  }

  const state = queryString(req.query.state);
  if (!state || !getOAuthStateStore().consume(state)) {
    logger.warn('oauth_state_rejected', { hasState: Boolean(state) });
    res.status(400).send(errorHtml('Invalid or expired link. Please connect again.'));
    return;
  }

  const realmId = realmFromQuery(req);
  if (!realmId) {
    res.status(400).send(errorHtml('Missing realmId'));
    return;
  }

  try {
    await getCredentialManager().completeAuthorization(realmId, code, config.qbo.redirectUri);
    logger.info('oauth_callback_completed', { realmId });
    res.redirect(`${config.frontendUrl}/?connected=true`);
  } catch (err) {
    if (err instanceof AuthExchangeFailedError) {
      res.status(500).send(errorHtml(`Token exchange failed: ${err.status ?? 'no response'}`));
      return;
    }
    if (err instanceof StorageUnavailableError || err instanceof OperationTimeoutError) {
      res.status(503).send(errorHtml('Connected, but the credential could not be saved. Please retry shortly.'));
      return;
    }
    logger.error('oauth_callback_failed', { realmId, error: errorMessage(err) });
    res.status(500).send(errorHtml('Token exchange exception'));
  }
});

/**
 * GET /auth/status
 * Reports the realm's credential state. Never returns token values.
 */
router.get('/auth/status', async (req: Request, res: Response) => {
  const realmId = realmFromQuery(req);
  if (!realmId) {
    res.status(400).json({ error: 'missing_realm' });
    return;
  }

  try {
    res.json(await getCredentialManager().getState(realmId));
  } catch (err) {
    const status = err instanceof StorageUnavailableError || err instanceof OperationTimeoutError ? 503 : 500;
    const code = err instanceof AppError ? err.code : 'INTERNAL';
    logger.error('credential_status_failed', { realmId, errorCode: code });
    res.status(status).json({ error: code });
  }
});

/**
 * Error page HTML.
 */
function errorHtml(message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Error</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background: #f5f5f5;
    }
    .card {
      background: white;
      padding: 2rem;
      border-radius: 12px;
      box-shadow: 0 2px 8px rgba(0,0,0,0.1);
      text-align: center;
      max-width: 400px;
    }
    h1 { margin: 0 0 0.5rem; color: #1a1a1a; }
    p { color: #666; margin: 0; }
  </style>
</head>
<body>
  <div class="card">
    <h1>QuickBooks connection failed</h1>
    <p>${escapeHtml(message)}</p>
  </div>
</body>
</html>`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export default router;
