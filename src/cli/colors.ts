/**
 * Terminal color palette
 * Using ansis for terminal styling
 */

import ansis from 'ansis';

/**
 * Status colors
 */
export const status = {
  success: ansis.bold.hex('#00FF87'),       // Bright green
  warning: ansis.bold.hex('#FFD700'),       // Gold
  error: ansis.bold.hex('#FF5F5F'),         // Red
  dim: ansis.dim.hex('#808080'),            // Gray
};

/**
 * UI elements
 */
export const ui = {
  title: ansis.bold.hex('#FFD700'),         // Gold
  separator: ansis.dim.hex('#666666'),      // Dark gray
  header: ansis.bold.underline.hex('#B4F8C8'),
  key: ansis.hex('#9370DB'),                // Purple
  value: ansis.hex('#E6E6FA'),              // Lavender
  command: ansis.hex('#228B22'),            // Forest green for commands and options
  secret: ansis.italic.hex('#A9A9A9'),
};

/**
 * Create a visual separator
 */
export function separator(length: number = 80, char: string = '─'): string {
  return ui.separator(char.repeat(length));
}
