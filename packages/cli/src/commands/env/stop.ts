/**
 * envswitch stop
 *
 * Stop one environment, or all of them
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { ENVIRONMENT_NAMES, isEnvironmentName, type EnvironmentName } from '@envswitch/blueprint';
import { InvalidEnvironmentName } from '../../errors';
import type { FailureContext } from '../../logger';
import type { StopResult } from '../../services/switcher.service';
import { createContext, reportError } from '../context';

export const stopCommand = new Command('stop')
  .description('Stop an environment (default: all)')
  .argument('[environment]', 'prod, staging, local or all')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (environment: string | undefined, options: { yes?: boolean }) => {
    const failure: FailureContext = { environment: environment ?? 'all' };
    try {
      let target: EnvironmentName | undefined;
      if (environment !== undefined && environment !== 'all') {
        if (!isEnvironmentName(environment)) {
          throw new InvalidEnvironmentName(environment, [...ENVIRONMENT_NAMES, 'all']);
        }
        target = environment;
      }
      const stopAll = target === undefined;

      const { switcher } = await createContext('stop');

      // With nothing running only leftovers are swept, which needs no confirmation
      const running = stopAll && !options.yes ? (await switcher.status()).running : [];
      if (running.length > 0) {
        console.log(chalk.yellow(`\n  This will stop: ${running.join(', ')}`));
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: 'Stop all environments?',
            default: false,
          },
        ]);
        if (!confirm) {
          console.log(chalk.gray('\n  Cancelled.\n'));
          return;
        }
      }

      const spinner = ora(`Stopping ${target ?? 'all environments'}...`).start();
      let result: StopResult;
      try {
        result = await switcher.stop(target);
      } catch (error) {
        spinner.fail('Failed to stop');
        throw error;
      }

      if (result.stopped.length === 0) {
        spinner.info(target ? `${target} is not running` : 'Nothing was running');
      } else {
        spinner.succeed(`Stopped ${result.stopped.join(', ')}`);
      }
      if (result.removed.length > 0) {
        console.log(chalk.gray(`  Removed leftover containers: ${result.removed.join(', ')}`));
      }
      console.log('');
    } catch (error) {
      reportError('stop', error, failure);
    }
  });
