/**
 * Shared wiring for commands: load the project, build the switcher,
 * report failures the same way everywhere.
 */

import chalk from 'chalk';
import { CONFIG_FILENAME } from '@envswitch/blueprint';
import { ConfigError, EnvSwitchError } from '../errors';
import { getLogPath, logFailure, scopedLogger, type CommandLogger, type FailureContext } from '../logger';
import { DockerComposeEngine } from '../services/engine.service';
import { GitClient } from '../services/git.service';
import { FetchProber } from '../services/health.service';
import { loadProject, type LoadedProject } from '../services/project.service';
import { EnvironmentSwitcher } from '../services/switcher.service';

export interface CommandContext {
  project: LoadedProject;
  git: GitClient;
  switcher: EnvironmentSwitcher;
  logger: CommandLogger;
}

export async function createContext(commandName: string, cwd: string = process.cwd()): Promise<CommandContext> {
  const logger = scopedLogger(commandName);
  const git = new GitClient({ cwd, logger });
  const project = await loadProject(cwd, git);

  if (!project.configPath) {
    console.log(chalk.yellow(`\n  No ${CONFIG_FILENAME} found, using detected defaults for "${project.settings.name}".`));
    console.log(chalk.gray('  Run `envswitch init` to create one.'));
  }

  const switcher = new EnvironmentSwitcher({
    project: project.settings,
    engine: new DockerComposeEngine({ logger }),
    git,
    prober: new FetchProber(),
    logger,
  });

  return { project, git, switcher, logger };
}

/**
 * Print a failure, log it with what the command was acting on and
 * mark the process as failed.
 */
export function reportError(commandName: string, error: unknown, context: FailureContext = {}): void {
  const message = error instanceof Error ? error.message : String(error);
  console.log(chalk.red(`\n  Error: ${message}`));

  if (error instanceof ConfigError) {
    for (const problem of error.problems) {
      console.log(chalk.red(`    - ${problem}`));
    }
  }

  if (!(error instanceof EnvSwitchError)) {
    console.log(chalk.gray(`  Details written to ${getLogPath()}`));
  }
  console.log('');

  logFailure(commandName, error, context);
  process.exitCode = 1;
}
