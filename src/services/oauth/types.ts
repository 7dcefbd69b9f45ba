/**
 * @fileoverview Token endpoint client types.
 */

/** Raw HTTP result from the token endpoint. */
export interface TransportResponse {
  status: number;
  text: string;
}

/**
 * Minimal HTTP client the exchanger needs: a form-encoded POST with a
 * bounded timeout. Implementations throw OperationTimeoutError on timeout
 * and any other error on network failure.
 */
export interface TokenTransport {
  postForm(
    url: string,
    form: Record<string, string>,
    headers: Record<string, string>,
    timeoutMs: number
  ): Promise<TransportResponse>;
}

/** OAuth client registration and token endpoint settings. */
export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  timeoutMs: number;
}

/** Standard OAuth2 token response fields, validated. */
export interface ParsedTokenResponse {
  accessToken: string;
  refreshToken?: string;
  tokenType: string;
  expiresInSeconds: number;
  payload: Record<string, unknown>;
}
