/**
 * @fileoverview Per-request log context.
 *
 * Tags every log line written while handling a request with a request id,
 * and echoes the id back in the X-Request-Id header.
 */

import type { NextFunction, Request, Response } from 'express';
import { createRequestId, withLogContext } from '../utils/observability/index.js';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : createRequestId();
  res.setHeader('X-Request-Id', requestId);
  withLogContext({ requestId, operation: `${req.method} ${req.path}` }, () => next());
}
