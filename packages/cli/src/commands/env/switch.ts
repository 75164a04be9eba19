/**
 * envswitch switch
 *
 * Stop whatever is running and bring up the requested environment.
 * Without an argument the environment follows the current git branch.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import {
  getComposeProjectName,
  getEnvironmentForBranch,
  isEnvironmentName,
  type EnvironmentName,
} from '@envswitch/blueprint';
import { InvalidEnvironmentName } from '../../errors';
import type { FailureContext } from '../../logger';
import type { SwitchResult } from '../../services/switcher.service';
import { createContext, reportError } from '../context';

export const switchCommand = new Command('switch')
  .alias('s')
  .description('Switch to an environment (prod, staging, local)')
  .argument('[environment]', 'Target environment; defaults to the one mapped from the current branch')
  .option('-d, --debug', 'Mount source directories into the containers')
  .option('-y, --yes', 'Skip confirmation prompts')
  .action(async (environment: string | undefined, options: { debug?: boolean; yes?: boolean }) => {
    const failure: FailureContext = { environment };
    try {
      if (environment !== undefined && !isEnvironmentName(environment)) {
        throw new InvalidEnvironmentName(environment);
      }

      const { project, git, switcher, logger } = await createContext('switch');
      const debug = options.debug ?? false;

      let target: EnvironmentName;
      if (environment !== undefined && isEnvironmentName(environment)) {
        target = environment;
      } else {
        const branch = await git.currentBranch();
        target = getEnvironmentForBranch(branch);
        console.log(chalk.gray(`\n  Branch ${branch ?? '(detached)'} maps to ${target}`));
      }
      failure.environment = target;
      failure.composeProject = getComposeProjectName(project.settings.containerPrefix, target);

      // Replacing a running release stack with a debug build deserves a second look
      if (debug && target !== 'local' && !options.yes) {
        const { active } = await switcher.status();
        if (active && !active.debug) {
          console.log(chalk.yellow(`\n  ${active.name} is running without debug mounts and will be stopped.`));
          const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
            {
              type: 'confirm',
              name: 'confirm',
              message: `Switch to ${target} in debug mode?`,
              default: false,
            },
          ]);
          if (!confirm) {
            console.log(chalk.gray('\n  Cancelled.\n'));
            return;
          }
        }
      }

      logger.info(`Switching to ${target}`, { debug });
      const spinner = ora(`Switching to ${target}${debug ? ' (debug)' : ''}...`).start();

      let result: SwitchResult;
      try {
        result = await switcher.switch(target, { debug });
      } catch (error) {
        spinner.fail(`Failed to switch to ${target}`);
        throw error;
      }

      if (result.ready) {
        spinner.succeed(`${result.environment.label} is up${debug ? chalk.yellow(' (debug)') : ''}`);
      } else {
        spinner.warn(`${result.environment.label} started, but no container reported running yet`);
      }

      for (const warning of result.warnings) {
        console.log(chalk.yellow(`  Warning: ${warning.message}`));
        console.log(chalk.gray('  Continuing on the current branch.'));
      }

      if (result.stopped.length > 0) {
        console.log(chalk.gray(`  Stopped: ${result.stopped.join(', ')}`));
      }
      if (result.worktree) {
        console.log(chalk.gray(`  Worktree ${result.environment.sourceDir} ${result.worktree}`));
      }

      console.log(chalk.bold('\n  Access points:\n'));
      for (const service of result.environment.services) {
        const url =
          service.probe.type === 'http' ? `http://localhost:${service.port}` : `localhost:${service.port}`;
        console.log(`    ${service.name.padEnd(20)} ${chalk.cyan(url)}`);
      }
      console.log(chalk.gray('\n  Run `envswitch health` to check the services.\n'));
    } catch (error) {
      reportError('switch', error, failure);
    }
  });
