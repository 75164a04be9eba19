/**
 * envswitch health
 *
 * Probe every service of the active environment. Always exits 0 once the
 * report is produced; an unhealthy service is a result, not a failure.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { HealthStatus } from '../../services/health.service';
import { createContext, reportError } from '../context';

const STATUS_STYLES: Record<HealthStatus, { icon: string; label: string; color: (text: string) => string }> = {
  healthy: { icon: '✓', label: 'healthy', color: chalk.green },
  unhealthy: { icon: '✗', label: 'unhealthy', color: chalk.red },
  unreachable: { icon: '?', label: 'unreachable', color: chalk.yellow },
  'not-running': { icon: '-', label: 'not running', color: chalk.gray },
};

export const healthCommand = new Command('health')
  .alias('h')
  .description('Check health of the active environment')
  .action(async () => {
    try {
      const { switcher } = await createContext('health');

      const spinner = ora({ text: 'Probing services...', indent: 2 }).start();
      const report = await switcher.health();
      spinner.stop();

      if (!report.environment) {
        console.log(chalk.bold('\n  Health Check\n'));
        console.log(chalk.gray('  No environment is running'));
        console.log(chalk.gray('  Run `envswitch switch <environment>` to start one\n'));
        return;
      }

      const heading = `${report.environment}${report.debug ? ' (debug)' : ''}`;
      console.log(chalk.bold(`\n  Health Check: ${heading}\n`));

      for (const [name, health] of Object.entries(report.services)) {
        const style = STATUS_STYLES[health.status];
        const port = health.port === null ? '' : chalk.gray(`port ${health.port}`);
        console.log(
          `    ${style.color(style.icon)} ${name.padEnd(20)} ${style.color(style.label.padEnd(12))} ${port}  ${chalk.gray(health.detail)}`
        );
      }

      const healthy = Object.values(report.services).filter((s) => s.status === 'healthy').length;
      const total = Object.keys(report.services).length;
      const summary = `${healthy}/${total} healthy`;
      console.log(`\n  ${healthy === total ? chalk.green(summary) : chalk.yellow(summary)}\n`);
    } catch (error) {
      reportError('health', error);
    }
  });
