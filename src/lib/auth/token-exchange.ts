/**
 * Authorization code exchange (RFC 6749 §4.1.3)
 *
 * Exchanges the code for a token at the provider's token endpoint,
 * authenticating the client with HTTP Basic credentials (§2.3.1).
 *
 * Single attempt: no retry or backoff. Callers that want to retry run the
 * whole flow again, since an authorization code can only be used once.
 */

import axios, { type AxiosResponse, type AxiosResponseHeaders, type RawAxiosResponseHeaders } from 'axios';
import type { Readable } from 'stream';
import { DecodeError, RetrieveError, TokenRequestError } from './errors';
import type { OAuthClientConfig, OAuthTokenResponse, TokenRecord } from './oauth-types';
import { convertTokenResponse } from './oauth-utils';

/** Upper bound on the token response body read into memory */
export const MAX_TOKEN_RESPONSE_BYTES = 1 << 20;

export interface TokenExchangeCallbacks {
  onTokenRequest?: (tokenUrl: string) => void;
  onTokenResponse?: (status: number, statusText: string) => void;
}

export interface TokenExchangeOptions {
  signal?: AbortSignal;
  callbacks?: TokenExchangeCallbacks;
}

const STRING_FIELDS = ['access_token', 'token_type', 'id_token', 'refresh_token', 'scope'] as const;
const LIFETIME_FIELDS = ['expires_in', 'expires'] as const;

/**
 * Exchange an authorization code for a token
 *
 * POST <token_url>
 * Authorization: Basic base64(client_id:client_secret)
 * Body: grant_type=authorization_code&code=<code>&redirect_uri=<redirect_url>
 *
 * @param config - Client configuration
 * @param code - Authorization code from the redirect callback
 * @param redirectUrl - Redirect URL used in the authorization request
 * @throws {TokenRequestError} when the endpoint cannot be reached or read
 * @throws {RetrieveError} when the endpoint answers outside 200-299
 * @throws {DecodeError} when a 2xx body is not a token response
 */
export async function exchangeWithBasicAuth(
  config: OAuthClientConfig,
  code: string,
  redirectUrl: string,
  options: TokenExchangeOptions = {},
): Promise<TokenRecord> {
  const { signal, callbacks } = options;

  const params = new URLSearchParams({
    grant_type: 'authorization_code',
    code,
    redirect_uri: redirectUrl,
  });
  const basicAuth = Buffer.from(`${config.client_id}:${config.client_secret}`).toString('base64');

  callbacks?.onTokenRequest?.(config.token_url);

  let response: AxiosResponse<Readable>;
  let body: Buffer;
  try {
    response = await axios.post<Readable>(config.token_url, params.toString(), {
      headers: {
        'Authorization': `Basic ${basicAuth}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'Accept': 'application/json',
      },
      responseType: 'stream',
      validateStatus: () => true,  // Status is checked below, after the body is read
      signal,
    });
    body = await readLimited(response.data, MAX_TOKEN_RESPONSE_BYTES);
  } catch (error) {
    throw new TokenRequestError(config.token_url, error);
  }

  callbacks?.onTokenResponse?.(response.status, response.statusText);

  if (response.status < 200 || response.status > 299) {
    throw new RetrieveError(response.status, response.statusText, plainHeaders(response.headers), body);
  }

  return convertTokenResponse(decodeTokenResponse(body));
}

/**
 * Decode a token endpoint body
 *
 * Fields other than the ones a token record needs are ignored. Lifetime
 * fields may be JSON numbers or numeric strings.
 *
 * @throws {DecodeError} when the body is not a JSON object of the expected shape
 */
export function decodeTokenResponse(body: Buffer): OAuthTokenResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf-8'));
  } catch (error) {
    throw new DecodeError(body, error instanceof Error ? error.message : 'invalid JSON', error);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new DecodeError(body, 'expected a JSON object');
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  const result: OAuthTokenResponse = {};

  for (const name of STRING_FIELDS) {
    const value = fields.get(name);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new DecodeError(body, `${name} must be a string`);
    }
    result[name] = value;
  }

  for (const name of LIFETIME_FIELDS) {
    const value = fields.get(name);
    if (value === undefined || value === null || value === '') continue;
    if (typeof value === 'number' && Number.isFinite(value)) {
      result[name] = value;
    } else if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
      result[name] = value.trim();
    } else {
      throw new DecodeError(body, `${name} must be a number`);
    }
  }

  return result;
}

/**
 * Read a stream into memory, stopping after `limit` bytes
 */
async function readLimited(stream: Readable, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of stream) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    const remaining = limit - total;
    if (buffer.length >= remaining) {
      chunks.push(buffer.subarray(0, remaining));
      total = limit;
      break;  // Leaving the loop destroys the stream
    }
    chunks.push(buffer);
    total += buffer.length;
  }

  return Buffer.concat(chunks, total);
}

function plainHeaders(headers: RawAxiosResponseHeaders | AxiosResponseHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}
