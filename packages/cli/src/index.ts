/**
 * @envswitch/cli
 *
 * CLI entry point for envswitch commands.
 */

import { Command } from 'commander';
import {
  // Environment commands
  switchCommand,
  stopCommand,
  setupWorktreesCommand,
  // Inspection commands
  healthCommand,
  statusCommand,
  logsCommand,
  debugLogCommand,
  // Project commands
  initCommand,
} from './commands';

const program = new Command();

program
  .name('envswitch')
  .description('Switch a Docker Compose project between prod, staging and local environments')
  .version('0.1.0');

// Environment commands
program.addCommand(switchCommand);
program.addCommand(stopCommand);
program.addCommand(setupWorktreesCommand);

// Inspection commands
program.addCommand(healthCommand);
program.addCommand(statusCommand);
program.addCommand(logsCommand);
program.addCommand(debugLogCommand);

// Project commands
program.addCommand(initCommand);

program.parse();
