/**
 * envswitch setup-worktrees
 *
 * Create (or refresh) the prod and staging worktrees used by debug switches
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ENVIRONMENTS } from '@envswitch/blueprint';
import { WorktreeManager } from '../../services/worktree.service';
import { createContext, reportError } from '../context';

const WORKTREE_ENVIRONMENTS = ['prod', 'staging'] as const;

export const setupWorktreesCommand = new Command('setup-worktrees')
  .description('Create the prod and staging worktrees for debug mode')
  .action(async () => {
    try {
      const { project, git, logger } = await createContext('setup-worktrees');
      const { settings } = project;

      console.log(chalk.bold('\n  Worktrees\n'));
      if (!settings.worktreeSupport) {
        console.log(chalk.yellow('  worktree_support is off; debug switches will mount the project root.'));
        console.log(chalk.gray('  Set "worktree_support": true in .container-config.json to use these.\n'));
      }

      const worktrees = new WorktreeManager({ root: settings.root, git, logger });

      for (const name of WORKTREE_ENVIRONMENTS) {
        const dir = settings.worktreeDirs[name];
        const branch = ENVIRONMENTS[name].branch ?? 'main';
        const spinner = ora({ text: `${name}: ${dir} (${branch})`, indent: 2 }).start();
        try {
          const outcome = await worktrees.ensureReady(dir, branch);
          spinner.succeed(`${name.padEnd(8)} ${dir} ${chalk.gray(`(${branch}, ${outcome})`)}`);
        } catch (error) {
          spinner.fail(`${name.padEnd(8)} ${dir}`);
          throw error;
        }
      }
      console.log('');
    } catch (error) {
      reportError('setup-worktrees', error);
    }
  });
