/**
 * Error taxonomy for envswitch.
 *
 * An unreachable health probe is not an error; it is the `unreachable`
 * status value in a health report.
 */

import { ENVIRONMENT_NAMES } from '@envswitch/blueprint';

export type EnvSwitchErrorCode =
  | 'INVALID_ENVIRONMENT'
  | 'BRANCH_CHECKOUT_FAILED'
  | 'COMPOSE_FAILED'
  | 'WORKTREE_FAILED'
  | 'CONFIG_INVALID'
  | 'NO_ACTIVE_ENVIRONMENT';

export class EnvSwitchError extends Error {
  code: EnvSwitchErrorCode;

  constructor(message: string, code: EnvSwitchErrorCode) {
    super(message);
    this.name = 'EnvSwitchError';
    this.code = code;
  }
}

/**
 * User error; raised before any side effect is attempted.
 */
export class InvalidEnvironmentName extends EnvSwitchError {
  readonly value: string;

  constructor(value: string, allowed: readonly string[] = ENVIRONMENT_NAMES) {
    super(`Invalid environment: ${value} (expected one of: ${allowed.join(', ')})`, 'INVALID_ENVIRONMENT');
    this.name = 'InvalidEnvironmentName';
    this.value = value;
  }
}

/**
 * Warning-level. A switch records it and carries on with the current branch.
 */
export class BranchCheckoutFailure extends EnvSwitchError {
  readonly branch: string;

  constructor(branch: string, detail: string) {
    super(`Could not check out ${branch}: ${detail}`, 'BRANCH_CHECKOUT_FAILED');
    this.name = 'BranchCheckoutFailure';
    this.branch = branch;
  }
}

/**
 * The container engine could not bring a service set up or down.
 * The message is the engine's own diagnostic.
 */
export class ComposeFailure extends EnvSwitchError {
  constructor(diagnostic: string) {
    super(diagnostic, 'COMPOSE_FAILED');
    this.name = 'ComposeFailure';
  }
}

export class WorktreeFailure extends EnvSwitchError {
  readonly directory: string;

  constructor(directory: string, detail: string) {
    super(`Worktree ${directory}: ${detail}`, 'WORKTREE_FAILED');
    this.name = 'WorktreeFailure';
    this.directory = directory;
  }
}

export class ConfigError extends EnvSwitchError {
  readonly problems: string[];

  constructor(configPath: string, problems: string[]) {
    super(`Invalid configuration in ${configPath}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class NoActiveEnvironment extends EnvSwitchError {
  constructor() {
    super('No environment is running', 'NO_ACTIVE_ENVIRONMENT');
    this.name = 'NoActiveEnvironment';
  }
}

/**
 * Pull the most useful text out of a failed child process.
 */
export function describeProcessError(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
      return error.stderr.trim();
    }
    if ('stdout' in error && typeof error.stdout === 'string' && error.stdout.trim()) {
      return error.stdout.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}
