/**
 * envswitch init
 *
 * Write a .container-config.json from a template
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { CONFIG_FILENAME } from '@envswitch/blueprint';
import { scopedLogger } from '../../logger';
import { GitClient } from '../../services/git.service';
import { TEMPLATES, TEMPLATE_NAMES, isTemplateName, renderConfig } from '../../templates';
import { reportError } from '../context';

export const initCommand = new Command('init')
  .description(`Create ${CONFIG_FILENAME} (templates: ${TEMPLATE_NAMES.join(', ')})`)
  .argument('[template]', 'Config template', 'default')
  .option('-f, --force', 'Overwrite an existing config without asking')
  .option('--list', 'List available templates')
  .action(async (template: string, options: { force?: boolean; list?: boolean }) => {
    if (options.list) {
      console.log(chalk.bold('\n  Templates:\n'));
      for (const info of TEMPLATES) {
        console.log(`    ${chalk.cyan(info.name.padEnd(16))} ${chalk.gray(info.description)}`);
      }
      console.log('');
      return;
    }

    try {
      if (!isTemplateName(template)) {
        throw new Error(`Unknown template: ${template} (expected one of: ${TEMPLATE_NAMES.join(', ')})`);
      }

      const cwd = process.cwd();
      const logger = scopedLogger('init');
      const configPath = path.join(cwd, CONFIG_FILENAME);

      if (existsSync(configPath) && !options.force) {
        console.log(chalk.yellow(`\n  ${CONFIG_FILENAME} already exists.`));
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: 'Overwrite it?',
            default: false,
          },
        ]);
        if (!confirm) {
          console.log(chalk.gray('\n  Cancelled.\n'));
          return;
        }
      }

      const topLevel = await new GitClient({ cwd, logger }).topLevel();
      const projectName = path.basename(topLevel ?? cwd);

      await fs.writeFile(configPath, renderConfig(template, projectName));
      logger.info(`Wrote ${configPath}`, { template, projectName });

      console.log(chalk.green(`\n  ✓ Created ${CONFIG_FILENAME} (${template}) for "${projectName}"`));
      console.log(chalk.gray('\n  Next steps:'));
      console.log(chalk.gray('    1. Add docker/docker-compose.<env>.yml (and <env>-debug.yml) for prod, staging and local'));
      console.log(chalk.gray('    2. envswitch switch local\n'));
    } catch (error) {
      reportError('init', error);
    }
  });
