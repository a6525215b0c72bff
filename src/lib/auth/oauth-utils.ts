/**
 * OAuth 2.0 Utility Functions
 *
 * Token record construction and expiry helpers
 */

import type { OAuthTokenResponse, TokenRecord } from './oauth-types';

const MAX_LIFETIME_SECONDS = 2147483647;

/**
 * Lifetime in seconds from one of the token response lifetime fields
 *
 * @returns 0 when the field is absent or not a number
 */
export function lifetimeSeconds(value: number | string | undefined): number {
  if (value === undefined) {
    return 0;
  }

  const seconds = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(value, 10);
  if (!Number.isFinite(seconds)) {
    return 0;
  }

  return Math.max(-MAX_LIFETIME_SECONDS, Math.min(MAX_LIFETIME_SECONDS, seconds));
}

/**
 * Convert a token endpoint response to a token record
 *
 * `expires_in` wins; the nonstandard `expires` is only used when
 * `expires_in` is absent or zero.
 *
 * @param response - Decoded token endpoint response
 * @param now - Exchange time in milliseconds (default: Date.now())
 */
export function convertTokenResponse(response: OAuthTokenResponse, now: number = Date.now()): TokenRecord {
  const lifetime = lifetimeSeconds(response.expires_in) || lifetimeSeconds(response.expires);
  const issuedAt = Math.floor(now / 1000);

  return Object.freeze({
    access_token: response.access_token ?? '',
    token_type: response.token_type ?? '',
    ...(response.id_token ? { id_token: response.id_token } : {}),
    ...(response.refresh_token ? { refresh_token: response.refresh_token } : {}),
    ...(response.scope ? { scope: response.scope } : {}),
    expires_at: lifetime !== 0 ? issuedAt + lifetime : null,
  });
}

/**
 * Get time until token expires
 *
 * @returns Seconds until expiration, 0 if already expired, null if the token has no expiry
 */
export function getTimeUntilExpiry(token: TokenRecord, now: number = Date.now()): number | null {
  if (token.expires_at === null) {
    return null;
  }

  return Math.max(0, token.expires_at - Math.floor(now / 1000));
}

/**
 * Format expiry time as human-readable string
 *
 * @returns e.g. "in 45 minutes", "expired" or "no expiry"
 */
export function formatExpiryTime(token: TokenRecord, now: number = Date.now()): string {
  const seconds = getTimeUntilExpiry(token, now);

  if (seconds === null) {
    return 'no expiry';
  }

  if (seconds === 0) {
    return 'expired';
  }

  if (seconds < 60) {
    return `in ${seconds} second${seconds !== 1 ? 's' : ''}`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `in ${minutes} minute${minutes !== 1 ? 's' : ''}`;
  }

  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `in ${hours} hour${hours !== 1 ? 's' : ''}`;
  }

  const days = Math.floor(hours / 24);
  return `in ${days} day${days !== 1 ? 's' : ''}`;
}

/**
 * Parse scope string into array
 *
 * @param scope - Space- or comma-separated scope string
 */
export function parseScopes(scope: string): string[] {
  const trimmed = scope.trim();
  if (!trimmed) {
    return [];
  }
  return trimmed.split(/[\s,]+/);
}

/**
 * Format scope array as space-separated string
 */
export function formatScopes(scopes: string[]): string {
  return scopes.join(' ');
}
