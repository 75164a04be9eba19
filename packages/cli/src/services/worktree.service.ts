/**
 * Worktree management for prod/staging debug modes
 *
 * Each debug environment mounts its own worktree so the branch under
 * investigation never disturbs the main checkout.
 */

import { existsSync } from 'fs';
import * as path from 'path';
import { describeProcessError, WorktreeFailure } from '../errors';
import { silentLogger, type CommandLogger } from '../logger';
import type { VersionControl } from './git.service';

export interface WorktreeManagerOptions {
  root: string;
  git: VersionControl;
  logger?: CommandLogger;
  exists?: (file: string) => boolean;
}

export type WorktreeOutcome = 'created' | 'synced';

export class WorktreeManager {
  private readonly root: string;
  private readonly git: VersionControl;
  private readonly logger: CommandLogger;
  private readonly exists: (file: string) => boolean;

  constructor(options: WorktreeManagerOptions) {
    this.root = options.root;
    this.git = options.git;
    this.logger = options.logger ?? silentLogger;
    this.exists = options.exists ?? existsSync;
  }

  /**
   * A linked worktree has a `.git` file (not directory) at its root
   */
  worktreeExists(dir: string): boolean {
    const absolute = path.resolve(this.root, dir);
    return this.exists(absolute) && this.exists(path.join(absolute, '.git'));
  }

  /**
   * Make sure `dir` is a worktree of `branch` and up to date with origin.
   * Throws WorktreeFailure.
   */
  async ensureReady(dir: string, branch: string): Promise<WorktreeOutcome> {
    let outcome: WorktreeOutcome = 'synced';

    if (!this.worktreeExists(dir)) {
      this.logger.info(`Creating worktree ${dir} -> ${branch}`);
      try {
        await this.git.addWorktree(dir, branch);
      } catch (error) {
        throw new WorktreeFailure(dir, `could not be created: ${describeProcessError(error)}`);
      }
      outcome = 'created';
    }

    const current = await this.git.currentBranch(dir);
    if (current !== branch) {
      throw new WorktreeFailure(dir, `is on ${current ?? 'a detached HEAD'} (expected ${branch})`);
    }

    try {
      await this.git.pull(dir, branch);
    } catch (error) {
      throw new WorktreeFailure(
        dir,
        `could not pull ${branch}; resolve conflicts manually: ${describeProcessError(error)}`
      );
    }

    this.logger.info(`Worktree ready: ${dir} (${outcome})`);
    return outcome;
  }
}
