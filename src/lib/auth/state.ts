/**
 * OAuth state parameter generation (RFC 6749 §10.12)
 */

import { randomBytes } from 'crypto';

/**
 * Generate an unguessable state value for one authorization attempt
 *
 * Renders a cryptographically random 64-bit unsigned integer as lowercase hex
 * without zero padding (1 to 16 characters).
 */
export function newOAuthState(): string {
  return randomBytes(8).readBigUInt64LE(0).toString(16);
}
