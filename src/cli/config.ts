/**
 * Configuration Commands
 */

import { Command } from 'commander';
import { getConfig, SECRET_KEYS } from '../lib/config';
import * as colors from './colors';
import { separator } from './colors';
import { setCommandHelp } from './help-formatter';

/**
 * Interpret a command-line value: JSON arrays/objects, booleans and numbers
 * are detected, anything else stays a string
 *
 * @throws {Error} when `json` is set and the value is not JSON
 */
export function parseConfigValue(value: string, options: { json?: boolean; string?: boolean } = {}): unknown {
  if (options.string) {
    return value;
  }

  if (options.json || value.startsWith('[') || value.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch (error) {
      if (options.json) {
        throw new Error(`Invalid JSON value: ${error instanceof Error ? error.message : String(error)}`);
      }
      return value;
    }
  }

  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  if (!isNaN(Number(value)) && value.trim() !== '') {
    return Number(value);
  }
  return value;
}

/**
 * Replace secret values for display
 */
export function maskSecrets(key: string, value: unknown): unknown {
  if (SECRET_KEYS.has(key) && typeof value === 'string' && value !== '') {
    return '***hidden***';
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const masked: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      masked[k] = maskSecrets(key ? `${key}.${k}` : k, v);
    }
    return masked;
  }
  return value;
}

function display(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function fail(action: string, error: unknown): void {
  console.error(colors.status.error(`✗ Failed to ${action}`));
  console.error(colors.status.error(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
}

export const configCommand = setCommandHelp(
  new Command('config'),
  'Manage CLI configuration',
  'Manage the OAuth client settings used by the token command. Settings are stored in a JSON file readable by the owner only (typically ~/.config/authcode/config.json). Environment variables such as AUTHCODE_CLIENT_SECRET override the file.'
)
  .alias('cfg')
  .showHelpAfterError('(add --help for additional information)')
  .showSuggestionAfterError()
  .addCommand(
    new Command('get')
      .description('Get one or all configuration values. Supports dot notation for nested keys (e.g., "auth_params.prompt").')
      .argument('[key]', 'Configuration key. Omit to show all configuration.')
      .option('--json', 'Output as JSON')
      .option('--show-secrets', 'Do not mask the client secret')
      .action((key: string | undefined, options: { json?: boolean; showSecrets?: boolean }) => {
        try {
          const config = getConfig();
          const reveal = (k: string, v: unknown) => options.showSecrets ? v : maskSecrets(k, v);

          if (!key) {
            const allConfig = reveal('', config.getAll());
            if (options.json) {
              console.log(JSON.stringify(allConfig, null, 2));
            } else {
              console.log('\n' + separator());
              console.log(colors.ui.title('⚙️  Current Configuration'));
              console.log(separator());
              console.log('\n' + colors.ui.value(JSON.stringify(allConfig, null, 2)));
              console.log('\n' + separator());
            }
            return;
          }

          const value = config.get(key);
          if (value === undefined) {
            console.error(colors.status.error(`✗ Configuration key '${key}' not found`));
            process.exitCode = 1;
            return;
          }

          const shown = reveal(key, value);
          if (options.json) {
            console.log(JSON.stringify({ [key]: shown }, null, 2));
          } else {
            console.log(`\n${colors.ui.key(key + ':')} ${colors.ui.value(typeof shown === 'object' ? JSON.stringify(shown, null, 2) : String(shown))}\n`);
          }
        } catch (error) {
          fail('get config', error);
        }
      })
  )
  .addCommand(
    new Command('set')
      .description('Set a configuration value. Auto-detects data types (boolean, number, JSON). Use --string to force literal string interpretation.')
      .argument('<key>', 'Configuration key (supports dot notation, e.g., "auth_params.prompt")')
      .argument('<value>', 'Value to set (auto-detects JSON arrays/objects, booleans, numbers)')
      .option('--json', 'Force parse value as JSON')
      .option('--string', 'Force treat value as string (no JSON parsing)')
      .action((key: string, value: string, options: { json?: boolean; string?: boolean }) => {
        try {
          const parsedValue = parseConfigValue(value, options);
          getConfig().set(key, parsedValue);
          console.log(colors.status.success(`✓ Set ${colors.ui.key(key)} = ${colors.ui.value(display(maskSecrets(key, parsedValue)))}`));
        } catch (error) {
          fail('set config', error);
        }
      })
  )
  .addCommand(
    new Command('delete')
      .description('Delete configuration key')
      .argument('<key>', 'Configuration key to delete')
      .action((key: string) => {
        try {
          if (getConfig().delete(key)) {
            console.log(colors.status.success(`✓ Deleted ${colors.ui.key(key)}`));
          } else {
            console.log(colors.status.warning(`⚠ Configuration key '${key}' not found`));
          }
        } catch (error) {
          fail('delete config key', error);
        }
      })
  )
  .addCommand(
    new Command('list')
      .description('List all configuration')
      .option('--json', 'Output as JSON')
      .action((options: { json?: boolean }) => {
        try {
          const config = getConfig();
          const allConfig = config.getAll();

          if (options.json) {
            console.log(JSON.stringify(maskSecrets('', allConfig), null, 2));
            return;
          }

          console.log('\n' + separator());
          console.log(colors.ui.title('⚙️  Configuration'));
          console.log(separator());

          const entries = Object.entries(allConfig);
          if (entries.length === 0) {
            console.log(colors.status.dim('  (empty)'));
          }
          const width = Math.max(0, ...entries.map(([k]) => k.length));
          for (const [k, v] of entries) {
            const shown = SECRET_KEYS.has(k) ? colors.ui.secret(display(maskSecrets(k, v))) : colors.ui.value(display(v));
            console.log(`  ${colors.ui.key(k.padEnd(width))}  ${shown}`);
          }

          console.log(separator());
          console.log(colors.status.dim(`  File: ${config.getConfigPath()}`));
          for (const [k, envVar] of Object.entries(config.getEnvOverrides())) {
            console.log(colors.status.dim(`  ${k} overridden by ${envVar}`));
          }
          console.log();
        } catch (error) {
          fail('list config', error);
        }
      })
  )
  .addCommand(
    new Command('path')
      .description('Show configuration file path')
      .action(() => {
        console.log(getConfig().getConfigPath());
      })
  )
  .addCommand(
    new Command('init')
      .description('Initialize configuration file with defaults')
      .option('-f, --force', 'Overwrite existing configuration')
      .action((options: { force?: boolean }) => {
        try {
          const config = getConfig();

          if (config.exists() && !options.force) {
            console.log(colors.status.warning(`⚠ Config file already exists: ${config.getConfigPath()}`));
            console.log(colors.status.dim('  Use --force to overwrite'));
            return;
          }

          config.init(true);
          console.log(colors.status.success(`✓ Initialized config at ${config.getConfigPath()}`));
        } catch (error) {
          fail('initialize config', error);
        }
      })
  );
