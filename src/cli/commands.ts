/**
 * CLI Command Registration
 */

import { Command } from 'commander';
import pkg from '../../package.json';
import { configureColoredHelp } from './help-formatter';
import { tokenCommand } from './token';
import { configCommand } from './config';

export function registerCommands(program: Command): Command {
  program
    .name('authcode')
    .description('Get OAuth 2.0 access tokens from the command line with the authorization code grant. A temporary server on localhost receives the redirect from the provider.')
    .version(pkg.version)
    .showHelpAfterError('(add --help for additional information)')
    .showSuggestionAfterError();

  const subcommands = [
    tokenCommand,
    configCommand,
  ];

  subcommands.forEach(cmd => {
    program.addCommand(cmd);
  });

  configureColoredHelp(program);
  return program;
}
