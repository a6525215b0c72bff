#!/usr/bin/env node
/**
 * authcode CLI - Entry Point
 */

import { program } from 'commander';
import { registerCommands } from './cli/commands';

registerCommands(program)
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
