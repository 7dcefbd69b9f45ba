/**
 * @fileoverview fetch-based token endpoint transport.
 */

import { OperationTimeoutError } from '../../utils/errors.js';
import type { TokenTransport, TransportResponse } from './types.js';

function isAbortTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class FetchTokenTransport implements TokenTransport {
  async postForm(
    url: string,
    form: Record<string, string>,
    headers: Record<string, string>,
    timeoutMs: number
  ): Promise<TransportResponse> {
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          ...headers,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(form).toString(),
        signal: AbortSignal.timeout(timeoutMs),
      });
      const text = await response.text();
      return { status: response.status, text };
    } catch (error) {
      if (isAbortTimeout(error)) {
        throw new OperationTimeoutError(`POST ${new URL(url).host}`, timeoutMs);
      }
      throw error;
    }
  }
}
