/**
 * envswitch logs
 *
 * Print (or follow) container logs of the active environment.
 * Ctrl+C stops following and releases the compose logs process.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext, reportError } from '../context';

export const logsCommand = new Command('logs')
  .alias('l')
  .description('Show container logs of the active environment')
  .argument('[service]', 'Only show logs of this service')
  .option('-f, --follow', 'Keep streaming new log lines')
  .option('-n, --tail <lines>', 'Number of lines to show from the end of the logs')
  .action(async (service: string | undefined, options: { follow?: boolean; tail?: string }) => {
    const controller = new AbortController();
    const onSignal = () => controller.abort();
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
      let tail: number | undefined;
      if (options.tail !== undefined) {
        tail = Number.parseInt(options.tail, 10);
        if (!Number.isInteger(tail) || tail < 0) {
          throw new Error(`--tail expects a non-negative number, got "${options.tail}"`);
        }
      }

      const { switcher } = await createContext('logs');

      if (options.follow) {
        console.log(chalk.gray('  Press Ctrl+C to stop\n'));
      }

      for await (const line of switcher.logs({
        service,
        follow: options.follow ?? false,
        tail,
        signal: controller.signal,
      })) {
        console.log(line.source ? `${chalk.cyan(line.source)} | ${line.message}` : line.message);
      }
    } catch (error) {
      reportError('logs', error);
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  });
