/**
 * OAuth 2.0 Authorization Code Grant Flow
 *
 * Implements RFC 6749 §4.1 for command-line programs that have no redirect
 * endpoint of their own.
 *
 * Flow:
 * 1. Start a local server on localhost (random port by default)
 * 2. Open the browser at the local server, which redirects to the provider
 * 3. Wait for the provider to redirect back with a code (or an error)
 * 4. Check the state parameter and shut the local server down
 * 5. Exchange the code for a token
 *
 * Usage:
 *   const flow = new AuthCodeFlow({ config });
 *   const token = await flow.getToken(AbortSignal.timeout(300_000));
 *   console.log(token.access_token);
 */

import { openBrowser, type BrowserOpener } from './browser';
import { buildAuthCodeUrl } from './auth-code-url';
import { createCallbackHandler, type CallbackRequest } from './callback-handler';
import {
  AuthorizationError,
  CallbackServerError,
  CancellationError,
  ConfigurationError,
  OAuthFlowError,
  StateMismatchError,
  TokenRequestError,
  errorMessage,
  type FlowStage,
} from './errors';
import { FirstResult } from './first-result';
import { LocalhostListener, DEFAULT_SHUTDOWN_GRACE_MS } from './local-listener';
import type { AuthCodeParams, OAuthClientConfig, TokenRecord } from './oauth-types';
import { newOAuthState } from './state';
import { exchangeWithBasicAuth, type TokenExchangeCallbacks } from './token-exchange';

/** Delay before the browser is opened, so the local server is ready for it */
export const DEFAULT_BROWSER_DELAY_MS = 500;

export interface AuthCodeFlowCallbacks extends TokenExchangeCallbacks {
  onAuthorizationUrl?: (url: string) => void;
  onCallback?: (request: CallbackRequest) => void;
  onBrowserOpenError?: (error: Error, url: string) => void;
  onSuccess?: (token: TokenRecord) => void;
  onError?: (error: OAuthFlowError) => void;
}

export interface AuthCodeFlowOptions {
  /** OAuth client configuration; redirect_url defaults to the local server URL */
  config: OAuthClientConfig;
  /** Extra authorization URL parameters */
  authCodeParams?: AuthCodeParams;
  /** Local server port (default: random free port) */
  localServerPort?: number;
  /** Only show the local server URL, don't open a browser */
  skipOpenBrowser?: boolean;
  /** Called with the local server URL once it is ready (default: print it) */
  showLocalServerUrl?: (url: string) => void;
  openBrowser?: BrowserOpener;
  generateState?: () => string;
  browserDelayMs?: number;
  shutdownGraceMs?: number;
  callbacks?: AuthCodeFlowCallbacks;
}

export class AuthCodeFlow {
  constructor(private readonly options: AuthCodeFlowOptions) {}

  /**
   * Run the whole flow and return the token issued by the provider
   *
   * The caller's config object is never modified. The local server is shut
   * down before the code is exchanged, whatever the outcome of the wait.
   *
   * @param signal - Cancels the flow (user interrupt, timeout)
   * @throws {OAuthFlowError} subclass describing the failed stage
   */
  async getToken(signal?: AbortSignal): Promise<TokenRecord> {
    const { callbacks } = this.options;
    let stage: FlowStage = 'configure';

    try {
      validateClientConfig(this.options.config);

      stage = 'listen';
      const listener = await LocalhostListener.open(this.options.localServerPort ?? 0);

      stage = 'authorize';
      const config: OAuthClientConfig = {
        ...this.options.config,
        redirect_url: this.options.config.redirect_url || listener.url,
      };

      let code: string;
      try {
        code = await this.getCode(config, listener, signal);
      } finally {
        await listener
          .close({ signal, graceMs: this.options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS })
          .catch((err: unknown) => {
            throw new CallbackServerError(err);
          });
      }

      stage = 'exchange';
      const token = await this.exchange(config, code, signal);

      callbacks?.onSuccess?.(token);
      return token;
    } catch (error) {
      const flowError = error instanceof OAuthFlowError
        ? error
        : new OAuthFlowError(stage, errorMessage(error), error);
      callbacks?.onError?.(flowError);
      throw flowError;
    }
  }

  /**
   * Serve the local URL until the provider redirects back
   *
   * Three producers race for one result: the callback handler (code or
   * provider error), the server's error event and the abort signal.
   */
  private async getCode(
    config: OAuthClientConfig,
    listener: LocalhostListener,
    signal?: AbortSignal,
  ): Promise<string> {
    const { callbacks } = this.options;
    const state = (this.options.generateState ?? newOAuthState)();
    const authCodeUrl = buildAuthCodeUrl(config, state, this.options.authCodeParams);
    callbacks?.onAuthorizationUrl?.(authCodeUrl);

    const result = new FirstResult<string>();

    listener.onRequest(createCallbackHandler({
      authCodeUrl,
      onRequest: callbacks?.onCallback,
      onCode: (code, gotState) => {
        if (gotState === state) {
          result.resolve(code);
        } else {
          result.reject(new StateMismatchError(state, gotState));
        }
      },
      onError: (error, errorDescription) => {
        result.reject(new AuthorizationError(error, errorDescription));
      },
      onFailure: (err) => {
        result.reject(new CallbackServerError(err));
      },
    }));
    listener.onError((err) => {
      result.reject(new CallbackServerError(err));
    });

    const onAbort = () => {
      result.reject(new CancellationError(signal?.reason));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      onAbort();
    }

    const browserTimer = setTimeout(
      () => this.openLocalServer(listener.url),
      this.options.browserDelayMs ?? DEFAULT_BROWSER_DELAY_MS,
    );

    try {
      return await result.promise;
    } finally {
      clearTimeout(browserTimer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private openLocalServer(url: string): void {
    const { callbacks, showLocalServerUrl, skipOpenBrowser } = this.options;

    if (showLocalServerUrl) {
      showLocalServerUrl(url);
    } else {
      console.log(`Open ${url} for authorization`);
    }

    if (skipOpenBrowser) {
      return;
    }

    const open = this.options.openBrowser ?? openBrowser;
    void open(url).catch((err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      if (callbacks?.onBrowserOpenError) {
        callbacks.onBrowserOpenError(error, url);
      } else {
        console.error(`Could not open browser automatically (${error.message}). Please open this URL manually: ${url}`);
      }
    });
  }

  private async exchange(config: OAuthClientConfig, code: string, signal?: AbortSignal): Promise<TokenRecord> {
    try {
      return await exchangeWithBasicAuth(config, code, config.redirect_url ?? '', {
        signal,
        callbacks: this.options.callbacks,
      });
    } catch (error) {
      if (error instanceof TokenRequestError && signal?.aborted) {
        throw new CancellationError(signal.reason, 'exchange');
      }
      throw error;
    }
  }
}

/**
 * Check the fields the flow relies on before anything is started
 *
 * @throws {ConfigurationError}
 */
export function validateClientConfig(config: OAuthClientConfig): void {
  if (!config.client_id) {
    throw new ConfigurationError('client_id is required');
  }
  requireHttpUrl('auth_url', config.auth_url);
  requireHttpUrl('token_url', config.token_url);
  if (config.redirect_url) {
    requireHttpUrl('redirect_url', config.redirect_url);
  }
}

function requireHttpUrl(name: string, value: string): void {
  if (!value) {
    throw new ConfigurationError(`${name} is required`);
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} is not a valid URL: ${value}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`${name} must be an http(s) URL: ${value}`);
  }
}
