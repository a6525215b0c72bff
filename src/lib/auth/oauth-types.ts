/**
 * OAuth 2.0 Type Definitions
 *
 * Shared types for the Authorization Code Grant (RFC 6749 §4.1):
 * - client configuration handed to the flow
 * - token endpoint wire format
 * - normalized token record returned to callers
 */

/**
 * OAuth client configuration
 *
 * Opaque to the flow apart from the fields below. `redirect_url` may be left
 * empty, in which case the local listener URL is used.
 */
export interface OAuthClientConfig {
  client_id: string;
  client_secret: string;
  auth_url: string;  // Provider authorization endpoint
  token_url: string;  // Provider token endpoint
  redirect_url?: string;
  scopes: string[];
}

/**
 * Token endpoint response body (RFC 6749 §5.1)
 *
 * Lifetime fields arrive as numbers from most providers and as strings from
 * a few, so both are accepted here.
 */
export interface OAuthTokenResponse {
  access_token?: string;
  token_type?: string;
  id_token?: string;  // OpenID Connect providers only
  refresh_token?: string;
  scope?: string;
  expires_in?: number | string;  // Seconds until expiration
  expires?: number | string;  // Nonstandard spelling of expires_in (Facebook)
}

/**
 * OAuth error response (RFC 6749 §4.1.2.1)
 */
export interface OAuthErrorResponse {
  error: string;  // Error code
  error_description?: string;  // Human-readable description
  error_uri?: string;
}

/**
 * Normalized token record
 *
 * Built once from the token endpoint response and never mutated.
 */
export interface TokenRecord {
  readonly access_token: string;
  readonly token_type: string;
  readonly id_token?: string;
  readonly refresh_token?: string;
  readonly scope?: string;
  readonly expires_at: number | null;  // Unix timestamp (seconds), null when the provider sent no lifetime
}

/**
 * Extra query parameters appended to the authorization URL
 * (e.g. access_type=offline, prompt=consent)
 */
export type AuthCodeParams = Readonly<Record<string, string>>;
