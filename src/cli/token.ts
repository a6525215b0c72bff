/**
 * Token command
 *
 * Runs the authorization code flow against the configured provider and
 * prints the issued token. Nothing is written to disk.
 */

import { Command, InvalidArgumentError } from 'commander';
import ora, { type Ora } from 'ora';
import * as colors from './colors';
import { separator } from './colors';
import { setCommandHelp } from './help-formatter';
import { getConfig, isValidTimeoutSeconds, MAX_TIMEOUT_SECONDS, type ConfigManager } from '../lib/config';
import {
  AuthCodeFlow,
  AuthorizationError,
  OAuthFlowError,
  RetrieveError,
  describeStage,
  formatExpiryTime,
  parseScopes,
  type AuthCodeFlowOptions,
  type BrowserOpener,
  type OAuthErrorResponse,
  type TokenRecord,
} from '../lib/auth';

export interface TokenCommandOptions {
  clientId?: string;
  clientSecret?: string;
  authUrl?: string;
  tokenUrl?: string;
  redirectUrl?: string;
  scope?: string[];
  port?: number;
  browser?: boolean;
  authParam?: string[];
  timeout?: number;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Parse a local server port (0 = random free port)
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

const TIMEOUT_MESSAGE = `Timeout must be a whole number of seconds from 1 to ${MAX_TIMEOUT_SECONDS}.`;

/**
 * Parse a positive number of seconds, no longer than a timer can wait
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!/^\d+$/.test(value) || !isValidTimeoutSeconds(seconds)) {
    throw new InvalidArgumentError(TIMEOUT_MESSAGE);
  }
  return seconds;
}

/**
 * Parse repeated key=value authorization parameters
 *
 * The first '=' splits key from value, so values may contain '='.
 */
export function parseAuthParams(pairs: string[]): Record<string, string> {
  const params: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentError(`Expected key=value, got '${pair}'.`);
    }
    params[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return params;
}

/**
 * Try to read a standard OAuth error response from a token endpoint body
 */
export function parseOAuthErrorBody(body: Buffer): OAuthErrorResponse | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf-8'));
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed) || typeof parsed.error !== 'string') {
    return null;
  }

  const result: OAuthErrorResponse = { error: parsed.error };
  if ('error_description' in parsed && typeof parsed.error_description === 'string') {
    result.error_description = parsed.error_description;
  }
  if ('error_uri' in parsed && typeof parsed.error_uri === 'string') {
    result.error_uri = parsed.error_uri;
  }
  return result;
}

/**
 * Human-readable token summary
 */
export function formatToken(token: TokenRecord, now: number = Date.now()): string[] {
  const lines: string[] = [];
  const row = (key: string, value: string) => `  ${colors.ui.key(key.padEnd(14))} ${colors.ui.value(value)}`;

  lines.push(row('Access token:', token.access_token));
  lines.push(row('Token type:', token.token_type || '(none)'));
  if (token.refresh_token !== undefined) lines.push(row('Refresh token:', token.refresh_token));
  if (token.id_token !== undefined) lines.push(row('ID token:', token.id_token));
  if (token.scope !== undefined) lines.push(row('Scope:', token.scope));
  lines.push(row('Expires:', formatExpiryTime(token, now)));
  return lines;
}

/**
 * Explain a flow failure, stage first
 */
export function formatFlowError(error: unknown): string[] {
  if (!(error instanceof OAuthFlowError)) {
    return [error instanceof Error ? error.message : String(error)];
  }

  const lines = [`${describeStage(error.stage)}: ${error.message.split('\n')[0]}`];

  if (error instanceof RetrieveError) {
    const oauthError = parseOAuthErrorBody(error.body);
    if (oauthError) {
      lines.push(`Provider error: ${oauthError.error}${oauthError.error_description ? ` (${oauthError.error_description})` : ''}`);
      if (oauthError.error_uri) lines.push(`See ${oauthError.error_uri}`);
    }
    lines.push(`Response body: ${error.body.toString('utf-8')}`);
  } else if (error instanceof AuthorizationError && error.error === 'access_denied') {
    lines.push('The authorization request was denied in the browser.');
  }

  return lines;
}

/**
 * Build flow options from flags and configuration
 *
 * Precedence: flags > environment > config file
 */
export function buildFlowOptions(options: TokenCommandOptions, config: ConfigManager): AuthCodeFlowOptions {
  return {
    config: config.getOAuthClientConfig({
      client_id: options.clientId,
      client_secret: options.clientSecret,
      auth_url: options.authUrl,
      token_url: options.tokenUrl,
      redirect_url: options.redirectUrl,
      scopes: parseScopes((options.scope ?? []).join(' ')),
    }),
    authCodeParams: { ...config.getAuthParams(), ...parseAuthParams(options.authParam ?? []) },
    localServerPort: options.port ?? config.getPort(),
    skipOpenBrowser: options.browser === false || !config.shouldOpenBrowser(),
  };
}

/**
 * Seconds to wait for the browser: --timeout, else the config file
 */
export function resolveTimeoutSeconds(options: TokenCommandOptions, config: ConfigManager): number {
  if (options.timeout === undefined) {
    return config.getTimeoutSeconds();
  }
  if (!isValidTimeoutSeconds(options.timeout)) {
    throw new InvalidArgumentError(TIMEOUT_MESSAGE);
  }
  return options.timeout;
}

interface TokenRunHooks {
  openBrowser?: BrowserOpener;
  spinner?: Ora;
}

/**
 * Run the flow and print the result
 *
 * @returns process exit code
 */
export async function runTokenCommand(
  options: TokenCommandOptions,
  config: ConfigManager = getConfig(),
  hooks: TokenRunHooks = {},
): Promise<number> {
  let flowOptions: AuthCodeFlowOptions;
  let timeoutSeconds: number;
  try {
    flowOptions = buildFlowOptions(options, config);
    timeoutSeconds = resolveTimeoutSeconds(options, config);
  } catch (error) {
    console.error(colors.status.error(`✗ ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }

  const verbose = (message: string) => {
    if (options.verbose) console.error(colors.status.dim(message));
  };
  const spinner = hooks.spinner ?? ora({ text: 'Starting local server...', isEnabled: !options.verbose });

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`timed out after ${timeoutSeconds} seconds`)),
    timeoutSeconds * 1000,
  );
  timer.unref();
  const onSigint = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', onSigint);

  const flow = new AuthCodeFlow({
    ...flowOptions,
    openBrowser: hooks.openBrowser,
    showLocalServerUrl: (url) => {
      spinner.stop();
      console.error(`Open ${colors.ui.command(url)} for authorization`);
      spinner.start('Waiting for authorization in the browser...');
    },
    callbacks: {
      onAuthorizationUrl: (url) => verbose(`Authorization URL: ${url}`),
      onBrowserOpenError: (error, url) => {
        spinner.stop();
        console.error(colors.status.warning(`⚠ Could not open browser automatically (${error.message})`));
        console.error(`  Open this URL manually: ${url}`);
        spinner.start('Waiting for authorization in the browser...');
      },
      onCallback: (request) => verbose(`Local server received a ${request.kind} request`),
      onTokenRequest: (tokenUrl) => {
        spinner.text = 'Exchanging code for a token...';
        verbose(`Token URL is ${tokenUrl}`);
      },
      onTokenResponse: (status, statusText) => verbose(`Token endpoint answered ${status} ${statusText}`),
    },
  });

  spinner.start();
  try {
    const token = await flow.getToken(controller.signal);
    spinner.succeed('Token received');

    if (options.json) {
      console.log(JSON.stringify(token, null, 2));
    } else {
      console.log('\n' + separator());
      formatToken(token).forEach(line => console.log(line));
      console.log(separator() + '\n');
    }
    return 0;
  } catch (error) {
    spinner.fail('Authorization failed');
    formatFlowError(error).forEach(line => console.error(colors.status.error(line)));
    return 1;
  } finally {
    clearTimeout(timer);
    process.removeListener('SIGINT', onSigint);
  }
}

export const tokenCommand = setCommandHelp(
  new Command('token'),
  'Get an access token via the browser',
  'Get an OAuth access token with the authorization code grant. A local server on localhost receives the redirect from the provider, so the provider must accept the local server URL (or --redirect-url) as a redirect URI. Values not given as flags come from the environment or the config file. Press Ctrl+C to cancel.'
)
  .option('--client-id <id>', 'OAuth client ID')
  .option('--client-secret <secret>', 'OAuth client secret')
  .option('--auth-url <url>', 'Provider authorization endpoint')
  .option('--token-url <url>', 'Provider token endpoint')
  .option('--redirect-url <url>', 'Redirect URL registered with the provider (default: the local server URL)')
  .option('--scope <scope...>', 'Scopes to request')
  .option('-p, --port <port>', 'Local server port (0 = random free port)', parsePort)
  .option('--no-browser', 'Print the local server URL without opening a browser')
  .option('--auth-param <key=value...>', 'Extra authorization URL parameters')
  .option('--timeout <seconds>', 'How long to wait for the browser', parseSeconds)
  .option('--json', 'Print the token as JSON')
  .option('--verbose', 'Show each step of the flow')
  .showHelpAfterError('(add --help for additional information)')
  .action(async (options: TokenCommandOptions) => {
    process.exitCode = await runTokenCommand(options);
  });
