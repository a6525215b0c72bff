/**
 * System browser launcher
 *
 * Platform-specific commands:
 * - macOS: `open "url"`
 * - Windows: `cmd /c start "" url` (with `&` escaped for cmd)
 * - Linux and other Unix-like systems: `xdg-open "url"`
 */

import { spawn } from 'child_process';

export type BrowserOpener = (url: string) => Promise<void>;

export function browserCommand(url: string, platform: NodeJS.Platform): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '', url.replace(/&/g, '^&')] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Open the default browser at `url`
 *
 * Resolves once the launcher process has started, not when the user is done.
 * Rejects when the launcher cannot be spawned.
 */
export function openBrowser(url: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  const { command, args } = browserCommand(url, platform);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
    });

    child.once('error', (err) => {
      reject(new Error(`Could not launch ${command}: ${err.message}`));
    });

    child.once('spawn', () => {
      // Don't keep the CLI alive for the browser process
      child.unref();
      resolve();
    });
  });
}
