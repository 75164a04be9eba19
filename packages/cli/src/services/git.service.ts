/**
 * Git client for branch checkout and worktree management
 */

import * as path from 'path';
import { BranchCheckoutFailure, describeProcessError } from '../errors';
import { silentLogger, type CommandLogger } from '../logger';
import { runCommand, type CommandRunner } from './command-runner';

export interface VersionControl {
  /** Current branch of `dir` (default: the working directory), or null when detached/outside a repo */
  currentBranch(dir?: string): Promise<string | null>;
  /** Absolute path of the repository top level, or null outside a repo */
  topLevel(): Promise<string | null>;
  /** Throws BranchCheckoutFailure */
  checkout(branch: string): Promise<void>;
  addWorktree(dir: string, branch: string): Promise<void>;
  pull(dir: string, branch: string): Promise<void>;
}

export interface GitClientOptions {
  cwd: string;
  run?: CommandRunner;
  logger?: CommandLogger;
}

export class GitClient implements VersionControl {
  private readonly cwd: string;
  private readonly run: CommandRunner;
  private readonly logger: CommandLogger;

  constructor(options: GitClientOptions) {
    this.cwd = options.cwd;
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async currentBranch(dir?: string): Promise<string | null> {
    try {
      const { stdout } = await this.git(['branch', '--show-current'], dir);
      return stdout.trim() || null;
    } catch {
      return null;
    }
  }

  async topLevel(): Promise<string | null> {
    try {
      const { stdout } = await this.git(['rev-parse', '--show-toplevel']);
      return stdout.trim() || null;
    } catch {
      return null;
    }
  }

  async checkout(branch: string): Promise<void> {
    try {
      await this.git(['checkout', branch]);
    } catch (error) {
      throw new BranchCheckoutFailure(branch, describeProcessError(error));
    }
  }

  async addWorktree(dir: string, branch: string): Promise<void> {
    await this.git(['worktree', 'add', dir, branch]);
  }

  async pull(dir: string, branch: string): Promise<void> {
    await this.git(['pull', 'origin', branch], dir);
  }

  private git(args: string[], dir?: string) {
    const cwd = dir ? path.resolve(this.cwd, dir) : this.cwd;
    this.logger.command(`git ${args.join(' ')}`, { cwd });
    return this.run('git', args, { cwd });
  }
}
