/**
 * @fileoverview Authorization URL for the QuickBooks consent screen.
 */

export interface AuthorizeUrlParams {
  authUrl: string;
  clientId: string;
  redirectUri: string;
  scope: string;
  state: string;
}

export function buildAuthorizeUrl(params: AuthorizeUrlParams): string {
  const query = new URLSearchParams({
    client_id: params.clientId,
    response_type: 'code',
    scope: params.scope,
    redirect_uri: params.redirectUri,
    state: params.state,
  });
  return `${params.authUrl}?${query.toString()}`;
}
