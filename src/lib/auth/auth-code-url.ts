/**
 * Authorization URL construction (RFC 6749 §4.1.1)
 */

import type { AuthCodeParams, OAuthClientConfig } from './oauth-types';
import { formatScopes } from './oauth-utils';

/**
 * Build the provider authorization URL for one flow
 *
 * Parameters are form-encoded in sorted key order and appended to the
 * configured endpoint, after `&` when it already has a query string.
 * Extra parameters never override the ones the flow depends on. The result
 * is ASCII only, so it can be sent as a Location header.
 *
 * @param config - Client configuration (redirect_url already resolved)
 * @param state - Correlation state for this attempt
 * @param extraParams - Additional provider-specific parameters
 */
export function buildAuthCodeUrl(
  config: OAuthClientConfig,
  state: string,
  extraParams: AuthCodeParams = {},
): string {
  const params: Record<string, string> = { ...extraParams };

  params.response_type = 'code';
  params.client_id = config.client_id;
  if (config.redirect_url) {
    params.redirect_uri = config.redirect_url;
  }
  if (config.scopes.length > 0) {
    params.scope = formatScopes(config.scopes);
  }
  params.state = state;

  const query = new URLSearchParams();
  for (const key of Object.keys(params).sort()) {
    query.append(key, params[key]);
  }

  const url = new URL(config.auth_url);
  url.search = url.search ? `${url.search.slice(1)}&${query.toString()}` : query.toString();
  return url.href;
}
