/**
 * Configuration Manager for the authcode CLI
 *
 * Manages the OAuth client configuration stored at
 * ~/.config/authcode/config.json. Only client settings live here: tokens
 * obtained by the CLI are printed, never written to disk.
 *
 * Precedence: command-line flags > environment variables > config file > defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { AuthCodeParams, OAuthClientConfig } from './auth/oauth-types';
import { parseScopes } from './auth/oauth-utils';

export interface AuthCodeConfig {
  client_id?: string;
  client_secret?: string;
  auth_url?: string;         // Provider authorization endpoint
  token_url?: string;        // Provider token endpoint
  redirect_url?: string;     // Empty: use the local server URL
  scopes?: string[];         // Also read from a space- or comma-separated string
  port?: number;             // Local server port, 0 = random
  auth_params?: Record<string, string>;  // Extra authorization URL parameters
  open_browser?: boolean;
  timeout_seconds?: number;  // How long to wait for the browser
}

type ConfigRecord = { [key: string]: unknown };

/** Keys whose values are masked when configuration is displayed */
export const SECRET_KEYS: ReadonlySet<string> = new Set(['client_secret']);

/** Environment variables that override file settings */
export const ENV_OVERRIDES = {
  client_id: 'AUTHCODE_CLIENT_ID',
  client_secret: 'AUTHCODE_CLIENT_SECRET',
  auth_url: 'AUTHCODE_AUTH_URL',
  token_url: 'AUTHCODE_TOKEN_URL',
  redirect_url: 'AUTHCODE_REDIRECT_URL',
} as const;

export const DEFAULT_TIMEOUT_SECONDS = 300;

/** Longest wait a timer can hold (2^31-1 ms) */
export const MAX_TIMEOUT_SECONDS = Math.floor(2147483647 / 1000);

export function isValidTimeoutSeconds(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_TIMEOUT_SECONDS;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private config: ConfigRecord;

  constructor() {
    // Use XDG config directory (~/.config/authcode/)
    const xdgConfig = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
    this.configDir = path.join(xdgConfig, 'authcode');
    this.configPath = path.join(this.configDir, 'config.json');
    this.config = this.load();
  }

  /**
   * Get configuration file path
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from disk
   */
  private load(): ConfigRecord {
    try {
      if (fs.existsSync(this.configPath)) {
        const data: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
        if (isRecord(data)) {
          return data;
        }
        console.warn(`Warning: Ignoring ${this.configPath}: expected a JSON object`);
      }
    } catch (error) {
      console.warn(`Warning: Failed to load config from ${this.configPath}:`, error);
    }

    return this.getDefaultConfig();
  }

  /**
   * Get default configuration
   */
  private getDefaultConfig(): ConfigRecord {
    return {
      scopes: [],
      port: 0,
      auth_params: {},
      open_browser: true,
      timeout_seconds: DEFAULT_TIMEOUT_SECONDS,
    } satisfies AuthCodeConfig;
  }

  /**
   * Save configuration to disk
   *
   * The file holds the client secret, so it is readable by the owner only.
   */
  save(): void {
    try {
      if (!fs.existsSync(this.configDir)) {
        fs.mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
      }

      fs.writeFileSync(
        this.configPath,
        JSON.stringify(this.config, null, 2),
        { encoding: 'utf-8', mode: 0o600 }
      );
    } catch (error) {
      throw new Error(`Failed to save config to ${this.configPath}: ${error}`);
    }
  }

  /**
   * Get entire configuration, keeping only well-typed known keys
   */
  getAll(): AuthCodeConfig {
    const result: AuthCodeConfig = {};

    for (const key of ['client_id', 'client_secret', 'auth_url', 'token_url', 'redirect_url'] as const) {
      const value = this.config[key];
      if (typeof value === 'string') result[key] = value;
    }

    const scopes = this.config.scopes;
    if (Array.isArray(scopes)) {
      result.scopes = scopes
        .filter((scope): scope is string => typeof scope === 'string')
        .flatMap(parseScopes);
    } else if (typeof scopes === 'string') {
      result.scopes = parseScopes(scopes);
    }

    for (const key of ['port', 'timeout_seconds'] as const) {
      const value = this.config[key];
      if (typeof value === 'number') result[key] = value;
    }

    const authParams = this.config.auth_params;
    if (isRecord(authParams)) {
      const params: Record<string, string> = {};
      for (const [name, value] of Object.entries(authParams)) {
        if (typeof value === 'string') params[name] = value;
      }
      result.auth_params = params;
    }

    if (typeof this.config.open_browser === 'boolean') {
      result.open_browser = this.config.open_browser;
    }

    return result;
  }

  /**
   * Get a configuration value by key (supports nested keys with dot notation)
   */
  get(key: string): unknown {
    let value: unknown = this.config;

    for (const k of key.split('.')) {
      if (isRecord(value) && k in value) {
        value = value[k];
      } else {
        return undefined;
      }
    }

    return value;
  }

  /**
   * Set a configuration value by key (supports nested keys with dot notation)
   */
  set(key: string, value: unknown): void {
    const keys = key.split('.');
    const lastKey = keys.pop();
    if (!lastKey) {
      throw new Error('Configuration key cannot be empty');
    }

    let obj = this.config;
    for (const k of keys) {
      const next = obj[k];
      if (isRecord(next)) {
        obj = next;
      } else {
        const created: ConfigRecord = {};
        obj[k] = created;
        obj = created;
      }
    }

    obj[lastKey] = value;
    this.save();
  }

  /**
   * Delete a configuration key
   *
   * @returns false when the key did not exist
   */
  delete(key: string): boolean {
    const keys = key.split('.');
    const lastKey = keys.pop();
    if (!lastKey) {
      return false;
    }

    let obj = this.config;
    for (const k of keys) {
      const next = obj[k];
      if (!isRecord(next)) {
        return false;
      }
      obj = next;
    }

    if (!(lastKey in obj)) {
      return false;
    }

    delete obj[lastKey];
    this.save();
    return true;
  }

  /**
   * Check if config file exists
   */
  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  /**
   * Initialize config with defaults and save
   *
   * @param force - Overwrite an existing file
   */
  init(force: boolean = false): void {
    if (force || !this.exists()) {
      this.config = this.getDefaultConfig();
      this.save();
    }
  }

  /**
   * OAuth client configuration with environment variables and flag overrides applied
   *
   * Missing values come back as empty strings; the flow reports which one is
   * required before it starts.
   */
  getOAuthClientConfig(overrides: Partial<OAuthClientConfig> = {}): OAuthClientConfig {
    const file = this.getAll();
    const pick = (key: keyof typeof ENV_OVERRIDES): string =>
      overrides[key] || process.env[ENV_OVERRIDES[key]] || file[key] || '';

    return {
      client_id: pick('client_id'),
      client_secret: pick('client_secret'),
      auth_url: pick('auth_url'),
      token_url: pick('token_url'),
      redirect_url: pick('redirect_url'),
      scopes: overrides.scopes && overrides.scopes.length > 0 ? overrides.scopes : file.scopes ?? [],
    };
  }

  /**
   * Keys currently overridden by environment variables, mapped to the variable name
   */
  getEnvOverrides(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, envVar] of Object.entries(ENV_OVERRIDES)) {
      if (process.env[envVar]) result[key] = envVar;
    }
    return result;
  }

  /**
   * Local server port (0 = random free port)
   */
  getPort(): number {
    return this.getAll().port ?? 0;
  }

  /**
   * Extra authorization URL parameters
   */
  getAuthParams(): AuthCodeParams {
    return this.getAll().auth_params ?? {};
  }

  /**
   * Whether the browser is opened automatically
   */
  shouldOpenBrowser(): boolean {
    return this.getAll().open_browser ?? true;
  }

  /**
   * How long to wait for the authorization response
   *
   * A value that is not a whole number of seconds within the timer range is
   * ignored with a warning.
   */
  getTimeoutSeconds(): number {
    const seconds = this.getAll().timeout_seconds;
    if (seconds === undefined) {
      return DEFAULT_TIMEOUT_SECONDS;
    }
    if (!isValidTimeoutSeconds(seconds)) {
      console.warn(`Warning: Ignoring timeout_seconds=${seconds}: expected a whole number from 1 to ${MAX_TIMEOUT_SECONDS}`);
      return DEFAULT_TIMEOUT_SECONDS;
    }
    return seconds;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance
 */
export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}
