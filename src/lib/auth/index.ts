/**
 * OAuth 2.0 Authorization Code Grant for command-line programs
 */

export { AuthCodeFlow, DEFAULT_BROWSER_DELAY_MS, validateClientConfig } from './auth-code-flow';
export type { AuthCodeFlowCallbacks, AuthCodeFlowOptions } from './auth-code-flow';

export { LocalhostListener, DEFAULT_SHUTDOWN_GRACE_MS } from './local-listener';
export type { CloseOptions } from './local-listener';

export { exchangeWithBasicAuth, decodeTokenResponse, MAX_TOKEN_RESPONSE_BYTES } from './token-exchange';
export type { TokenExchangeCallbacks, TokenExchangeOptions } from './token-exchange';

export { buildAuthCodeUrl } from './auth-code-url';
export { classifyCallbackRequest, createCallbackHandler } from './callback-handler';
export type { CallbackRequest, CallbackHandlerOptions } from './callback-handler';
export { openBrowser } from './browser';
export type { BrowserOpener } from './browser';
export { newOAuthState } from './state';
export { FirstResult } from './first-result';
export { convertTokenResponse, formatExpiryTime, getTimeUntilExpiry, parseScopes, formatScopes } from './oauth-utils';

export {
  OAuthFlowError,
  ConfigurationError,
  BindError,
  AuthorizationError,
  StateMismatchError,
  CancellationError,
  CallbackServerError,
  TokenRequestError,
  RetrieveError,
  DecodeError,
  describeStage,
} from './errors';
export type { FlowStage } from './errors';

export type {
  OAuthClientConfig,
  OAuthTokenResponse,
  OAuthErrorResponse,
  TokenRecord,
  AuthCodeParams,
} from './oauth-types';
