/**
 * Token command tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import ansis from 'ansis';
import ora from 'ora';
import {
  buildFlowOptions,
  formatFlowError,
  formatToken,
  parseAuthParams,
  parseOAuthErrorBody,
  parsePort,
  parseSeconds,
  resolveTimeoutSeconds,
  runTokenCommand,
} from '../../src/cli/token';
import { ConfigManager } from '../../src/lib/config';
import {
  AuthorizationError,
  BindError,
  RetrieveError,
  convertTokenResponse,
} from '../../src/lib/auth';
import { FakeBrowser } from '../helpers/fake-browser';
import { TokenServerHelper } from '../helpers/token-server';

describe('option parsers', () => {
  it('should accept ports from 0 to 65535', () => {
    expect(parsePort('0')).toBe(0);
    expect(parsePort('8080')).toBe(8080);
    expect(() => parsePort('65536')).toThrow('Port must be an integer between 0 and 65535.');
    expect(() => parsePort('80a')).toThrow('Port must be an integer between 0 and 65535.');
  });

  it('should accept timeouts a timer can hold', () => {
    expect(parseSeconds('30')).toBe(30);
    expect(parseSeconds('2147483')).toBe(2147483);
    expect(() => parseSeconds('0')).toThrow('Timeout must be a whole number of seconds from 1 to 2147483.');
    expect(() => parseSeconds('2200000')).toThrow('Timeout must be a whole number of seconds from 1 to 2147483.');
  });

  it('should split auth params at the first equals sign', () => {
    expect(parseAuthParams(['prompt=consent', 'claims={"a":"b=c"}'])).toEqual({
      prompt: 'consent',
      claims: '{"a":"b=c"}',
    });
    expect(() => parseAuthParams(['=value'])).toThrow("Expected key=value, got '=value'.");
  });
});

describe('parseOAuthErrorBody', () => {
  it('should read a standard error response', () => {
    expect(parseOAuthErrorBody(Buffer.from('{"error":"invalid_grant","error_description":"Code expired","error_uri":"https://provider.test/errors"}'))).toEqual({
      error: 'invalid_grant',
      error_description: 'Code expired',
      error_uri: 'https://provider.test/errors',
    });
  });

  it('should return null for anything else', () => {
    expect(parseOAuthErrorBody(Buffer.from('<html>Bad Gateway</html>'))).toBeNull();
    expect(parseOAuthErrorBody(Buffer.from('{"message":"nope"}'))).toBeNull();
  });
});

describe('formatFlowError', () => {
  it('should lead with the failed stage', () => {
    expect(formatFlowError(new BindError(8080, new Error('address in use')))).toEqual([
      'Could not start the local server: Could not listen on port 8080: address in use',
    ]);
  });

  it('should show the provider error and the raw body for a token rejection', () => {
    const body = '{"error":"invalid_grant","error_description":"Code expired"}';
    const error = new RetrieveError(400, 'Bad Request', {}, Buffer.from(body));

    expect(formatFlowError(error)).toEqual([
      'Could not exchange the code for a token: Cannot fetch token: 400 Bad Request',
      'Provider error: invalid_grant (Code expired)',
      `Response body: ${body}`,
    ]);
  });

  it('should explain a denied request', () => {
    expect(formatFlowError(new AuthorizationError('access_denied', ''))).toEqual([
      'Could not get an authorization code: OAuth error: access_denied',
      'The authorization request was denied in the browser.',
    ]);
  });
});

describe('formatToken', () => {
  it('should list the token fields', () => {
    const now = 1_700_000_000_000;
    const token = convertTokenResponse({ access_token: 'test-access-token', token_type: 'Bearer', scope: 'openid', expires_in: 600 }, now);

    expect(formatToken(token, now).map(line => ansis.strip(line))).toEqual([
      '  Access token:  test-access-token',
      '  Token type:    Bearer',
      '  Scope:         openid',
      '  Expires:       in 10 minutes',
    ]);
  });
});

describe('runTokenCommand', () => {
  const tokenServer = new TokenServerHelper(() => TokenServerHelper.json(200, {
    access_token: 'test-access-token',
    token_type: 'Bearer',
  }));
  let tempConfigDir: string;
  let originalEnv: string | undefined;

  beforeAll(async () => {
    await tokenServer.start();
  });

  afterAll(async () => {
    await tokenServer.stop();
  });

  beforeEach(() => {
    tempConfigDir = fs.mkdtempSync(path.join(os.tmpdir(), 'authcode-test-'));
    originalEnv = process.env.XDG_CONFIG_HOME;
    process.env.XDG_CONFIG_HOME = tempConfigDir;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.XDG_CONFIG_HOME = originalEnv;
    } else {
      delete process.env.XDG_CONFIG_HOME;
    }
    fs.rmSync(tempConfigDir, { recursive: true, force: true });
  });

  it('should merge flags over the config file', () => {
    const config = new ConfigManager();
    config.set('client_id', 'file-client');
    config.set('auth_params', { prompt: 'login', access_type: 'offline' });
    config.set('port', 9000);

    const options = buildFlowOptions({ clientId: 'flag-client', authParam: ['prompt=consent'], browser: false }, config);

    expect(options.config.client_id).toBe('flag-client');
    expect(options.authCodeParams).toEqual({ prompt: 'consent', access_type: 'offline' });
    expect(options.localServerPort).toBe(9000);
    expect(options.skipOpenBrowser).toBe(true);
  });

  it('should split comma-separated scope flags', () => {
    const options = buildFlowOptions({ scope: ['openid,email', 'profile'] }, new ConfigManager());

    expect(options.config.scopes).toEqual(['openid', 'email', 'profile']);
  });

  it('should take the timeout from the flag, else the config file', () => {
    const config = new ConfigManager();
    config.set('timeout_seconds', 45);

    expect(resolveTimeoutSeconds({ timeout: 10 }, config)).toBe(10);
    expect(resolveTimeoutSeconds({}, config)).toBe(45);
    expect(() => resolveTimeoutSeconds({ timeout: 2200000 }, config)).toThrow(
      'Timeout must be a whole number of seconds from 1 to 2147483.'
    );
  });

  it('should refuse a timeout longer than a timer can wait', async () => {
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const browser = new FakeBrowser(state => `code=test-code&state=${state}`);

    const exitCode = await runTokenCommand(
      {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        authUrl: 'https://provider.test/authorize',
        tokenUrl: tokenServer.url,
        timeout: 2200000,
      },
      new ConfigManager(),
      { openBrowser: browser.open, spinner: ora({ isEnabled: false, isSilent: true }) },
    );

    expect(exitCode).toBe(1);
    expect(browser.visit).toBeNull();
    expect(stderr.mock.calls.map(([line]) => ansis.strip(String(line)))).toEqual([
      '✗ Timeout must be a whole number of seconds from 1 to 2147483.',
    ]);
    stderr.mockRestore();
  });

  it('should fall back to the default timeout when the config file has zero', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = new ConfigManager();
    config.set('timeout_seconds', 0);
    const browser = new FakeBrowser(state => `code=test-code&state=${state}`);

    const exitCode = await runTokenCommand(
      {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        authUrl: 'https://provider.test/authorize',
        tokenUrl: tokenServer.url,
        json: true,
      },
      config,
      { openBrowser: browser.open, spinner: ora({ isEnabled: false, isSilent: true }) },
    );

    expect(exitCode).toBe(0);
    expect(warn).toHaveBeenCalledWith('Warning: Ignoring timeout_seconds=0: expected a whole number from 1 to 2147483');

    log.mockRestore();
    stderr.mockRestore();
    warn.mockRestore();
  });

  it('should print the token as JSON and exit 0', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const browser = new FakeBrowser(state => `code=test-code&state=${state}`);

    const exitCode = await runTokenCommand(
      {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        authUrl: 'https://provider.test/authorize',
        tokenUrl: tokenServer.url,
        json: true,
      },
      new ConfigManager(),
      { openBrowser: browser.open, spinner: ora({ isEnabled: false, isSilent: true }) },
    );

    expect(exitCode).toBe(0);
    expect(log).toHaveBeenCalledWith(JSON.stringify({
      access_token: 'test-access-token',
      token_type: 'Bearer',
      expires_at: null,
    }, null, 2));

    log.mockRestore();
    stderr.mockRestore();
  });

  it('should exit 1 with the stage when the configuration is incomplete', async () => {
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const exitCode = await runTokenCommand(
      { clientId: 'test-client', tokenUrl: tokenServer.url },
      new ConfigManager(),
      { spinner: ora({ isEnabled: false, isSilent: true }) },
    );

    expect(exitCode).toBe(1);
    expect(stderr.mock.calls.map(([line]) => ansis.strip(String(line)))).toContain(
      'Invalid OAuth configuration: auth_url is required'
    );
    stderr.mockRestore();
  });
});
