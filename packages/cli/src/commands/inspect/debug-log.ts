/**
 * envswitch debug-log
 *
 * View the debug log written by envswitch commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { getLogPath } from '../../logger';

function colorLine(line: string): string {
  if (line.includes('[ERROR]')) return chalk.red(line);
  if (line.includes('[WARN]')) return chalk.yellow(line);
  if (line.includes('[INFO]')) return chalk.cyan(line);
  if (line.includes('[CMD]')) return chalk.magenta(line);
  if (line.includes('[DEBUG]')) return chalk.gray(line);
  if (line.startsWith('=')) return chalk.blue(line);
  return line;
}

export const debugLogCommand = new Command('debug-log')
  .description('View the envswitch debug log')
  .option('-n, --lines <count>', 'Number of lines to show', '50')
  .option('--path', 'Show log file path only')
  .option('--clear', 'Clear the debug log')
  .action((options: { lines: string; path?: boolean; clear?: boolean }) => {
    const logPath = getLogPath();

    if (options.path) {
      console.log(logPath);
      return;
    }

    try {
      if (options.clear) {
        if (fs.existsSync(logPath)) {
          fs.unlinkSync(logPath);
          console.log(chalk.green(`\n  Cleared debug log: ${logPath}\n`));
        } else {
          console.log(chalk.gray(`\n  No log file exists at: ${logPath}\n`));
        }
        return;
      }

      if (!fs.existsSync(logPath)) {
        console.log(chalk.gray(`\n  No debug log found at: ${logPath}\n`));
        return;
      }

      const lines = fs.readFileSync(logPath, 'utf-8').split('\n');
      const lineCount = Number.parseInt(options.lines, 10) || 50;

      console.log(chalk.bold(`\n  Debug Log (last ${lineCount} lines)`));
      console.log(chalk.gray(`  ${logPath}\n`));
      console.log(chalk.gray('─'.repeat(80)));

      for (const line of lines.slice(Math.max(0, lines.length - lineCount))) {
        console.log(colorLine(line));
      }

      console.log(chalk.gray('─'.repeat(80)));
      console.log(chalk.gray(`\n  Total lines in log: ${lines.length}\n`));
    } catch (error) {
      console.log(chalk.red(`\n  Failed to access log: ${error instanceof Error ? error.message : String(error)}\n`));
      process.exitCode = 1;
    }
  });
