/**
 * envswitch status
 *
 * Show the active environment, its containers and where to reach them
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveEnvironment } from '@envswitch/blueprint';
import { detectDockerHost } from '../../services/health.service';
import { createContext, reportError } from '../context';

export const statusCommand = new Command('status')
  .alias('st')
  .description('Show the active environment and its containers')
  .action(async () => {
    try {
      const { project, switcher } = await createContext('status');
      const snapshot = await switcher.status();

      console.log(chalk.bold(`\n  Environment Status: ${project.settings.name}\n`));

      if (!snapshot.active) {
        console.log(chalk.gray('  No environment is running'));
        console.log(chalk.gray('  Run `envswitch switch <environment>` to start one\n'));
        return;
      }

      const { active } = snapshot;
      const mode = active.debug ? chalk.yellow('debug') : chalk.green('release');
      console.log(`    Active:   ${chalk.cyan(active.name)} (${mode})`);
      console.log(`    Project:  ${active.composeProject}`);

      if (snapshot.running.length > 1) {
        console.log(chalk.yellow(`\n    Several environments are running: ${snapshot.running.join(', ')}`));
        console.log(chalk.gray('    Run `envswitch stop all` and switch again.'));
      }

      console.log(chalk.bold('\n  Containers:\n'));
      if (snapshot.containers.length === 0) {
        console.log(chalk.gray('    (none)'));
      }
      for (const container of snapshot.containers) {
        const color = container.state === 'running' ? chalk.green : chalk.yellow;
        const cpu = container.cpuPercent === null ? '-' : `${container.cpuPercent.toFixed(1)}%`;
        const memory = container.memoryUsage ?? '-';
        console.log(`    ${container.name.padEnd(32)} ${color(container.state.padEnd(10))} ${cpu.padStart(7)}  ${chalk.gray(memory)}`);
      }

      const host = await detectDockerHost();
      const environment = resolveEnvironment(project.settings, active.name, active.debug);
      console.log(chalk.bold('\n  Access points:\n'));
      for (const service of environment.services) {
        const url = service.probe.type === 'http' ? `http://${host}:${service.port}` : `${host}:${service.port}`;
        console.log(`    ${service.name.padEnd(20)} ${chalk.cyan(url)}`);
      }
      console.log('');
    } catch (error) {
      reportError('status', error);
    }
  });
